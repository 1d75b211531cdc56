import { Pool } from 'pg';
import type { CatalogStore, Ingredient, Tag } from '../types';
import { escapeLike } from './db';

export class PgCatalogStore implements CatalogStore {
  constructor(private readonly pool: Pool) {}

  async listTags(): Promise<Tag[]> {
    const result = await this.pool.query<Tag>('SELECT id, name, slug, color FROM tags ORDER BY name');
    return result.rows;
  }

  async findTag(id: string): Promise<Tag | null> {
    const result = await this.pool.query<Tag>('SELECT id, name, slug, color FROM tags WHERE id = $1', [id]);
    return result.rows[0] ?? null;
  }

  async findTagsByIds(ids: string[]): Promise<Tag[]> {
    if (ids.length === 0) return [];
    const result = await this.pool.query<Tag>(
      'SELECT id, name, slug, color FROM tags WHERE id = ANY($1::uuid[]) ORDER BY name',
      [ids]
    );
    return result.rows;
  }

  // Prefix matches first, then matches anywhere else in the name
  async searchIngredients(name?: string): Promise<Ingredient[]> {
    if (!name) {
      const result = await this.pool.query<Ingredient>(
        'SELECT id, name, measurement_unit FROM ingredients ORDER BY name, measurement_unit'
      );
      return result.rows;
    }

    const pattern = escapeLike(name.toLowerCase());
    const result = await this.pool.query<Ingredient>(
      `SELECT id, name, measurement_unit FROM ingredients
       WHERE lower(name) LIKE '%' || $1 || '%'
       ORDER BY (lower(name) LIKE $1 || '%') DESC, name, measurement_unit`,
      [pattern]
    );
    return result.rows;
  }

  async findIngredient(id: string): Promise<Ingredient | null> {
    const result = await this.pool.query<Ingredient>(
      'SELECT id, name, measurement_unit FROM ingredients WHERE id = $1',
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findIngredientsByIds(ids: string[]): Promise<Ingredient[]> {
    if (ids.length === 0) return [];
    const result = await this.pool.query<Ingredient>(
      'SELECT id, name, measurement_unit FROM ingredients WHERE id = ANY($1::uuid[])',
      [ids]
    );
    return result.rows;
  }
}
