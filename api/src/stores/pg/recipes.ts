import { Pool, type PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type {
  CartIngredientRow,
  IngredientAmount,
  NewRecipe,
  PageRequest,
  PageResult,
  RecipeChanges,
  RecipeDetail,
  RecipeFilter,
  RecipeIngredient,
  RecipeRecord,
  RecipeStore,
  Tag,
} from '../types';
import { rethrowConstraint, withTransaction } from './db';
import { PgRelation } from './relations';

const RECIPE_COLUMNS = 'r.id, r.author_id, r.name, r.text, r.cooking_time, r.image, r.created_at';

function buildWhere(filter: RecipeFilter): { clause: string; values: unknown[] } {
  const conditions: string[] = [];
  const values: unknown[] = [];
  let paramIndex = 1;

  if (filter.authorId !== undefined) {
    conditions.push(`r.author_id = $${paramIndex++}`);
    values.push(filter.authorId);
  }
  if (filter.tagSlugs !== undefined) {
    conditions.push(`EXISTS (
      SELECT 1 FROM recipe_tags rt JOIN tags t ON t.id = rt.tag_id
      WHERE rt.recipe_id = r.id AND t.slug = ANY($${paramIndex++}::text[]))`);
    values.push(filter.tagSlugs);
  }
  if (filter.favoritedBy !== undefined) {
    conditions.push(`EXISTS (
      SELECT 1 FROM favorites f WHERE f.recipe_id = r.id AND f.user_id = $${paramIndex++})`);
    values.push(filter.favoritedBy);
  }
  if (filter.inCartOf !== undefined) {
    conditions.push(`EXISTS (
      SELECT 1 FROM shopping_cart sc WHERE sc.recipe_id = r.id AND sc.user_id = $${paramIndex++})`);
    values.push(filter.inCartOf);
  }

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    values,
  };
}

async function insertEdges(
  client: PoolClient,
  recipeId: string,
  tagIds: string[],
  ingredients: IngredientAmount[]
): Promise<void> {
  await client.query(
    `INSERT INTO recipe_tags (recipe_id, tag_id)
     SELECT $1, tag_id FROM unnest($2::uuid[]) AS tag_id`,
    [recipeId, tagIds]
  );
  await client.query(
    `INSERT INTO recipe_ingredients (recipe_id, ingredient_id, amount)
     SELECT $1, ingredient_id, amount FROM unnest($2::uuid[], $3::int[]) AS x(ingredient_id, amount)`,
    [recipeId, ingredients.map((i) => i.id), ingredients.map((i) => i.amount)]
  );
}

export class PgRecipeStore implements RecipeStore {
  readonly favorites: PgRelation;
  readonly cart: PgRelation;

  constructor(private readonly pool: Pool) {
    this.favorites = new PgRelation(pool, 'favorites', 'user_id', 'recipe_id');
    this.cart = new PgRelation(pool, 'shopping_cart', 'user_id', 'recipe_id');
  }

  async list(filter: RecipeFilter, page: PageRequest): Promise<PageResult<RecipeDetail>> {
    const { clause, values } = buildWhere(filter);

    const countResult = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM recipes r ${clause}`,
      values
    );
    const result = await this.pool.query<RecipeRecord>(
      `SELECT ${RECIPE_COLUMNS} FROM recipes r ${clause}
       ORDER BY r.created_at DESC, r.id DESC
       LIMIT $${values.length + 1} OFFSET $${values.length + 2}`,
      [...values, page.limit, page.offset]
    );

    return {
      count: parseInt(countResult.rows[0].count, 10),
      rows: await this.withDetails(result.rows),
    };
  }

  async findById(id: string): Promise<RecipeDetail | null> {
    const result = await this.pool.query<RecipeRecord>(
      `SELECT ${RECIPE_COLUMNS} FROM recipes r WHERE r.id = $1`,
      [id]
    );
    if (result.rows.length === 0) return null;

    const [recipe] = await this.withDetails(result.rows);
    return recipe;
  }

  async listByAuthor(authorId: string, limit: number | null): Promise<RecipeRecord[]> {
    // LIMIT NULL is LIMIT ALL
    const result = await this.pool.query<RecipeRecord>(
      `SELECT ${RECIPE_COLUMNS} FROM recipes r
       WHERE r.author_id = $1
       ORDER BY r.created_at DESC, r.id DESC
       LIMIT $2`,
      [authorId, limit]
    );
    return result.rows;
  }

  async countByAuthors(authorIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    if (authorIds.length === 0) return counts;

    const result = await this.pool.query<{ author_id: string; count: string }>(
      `SELECT author_id, COUNT(*) AS count FROM recipes
       WHERE author_id = ANY($1::uuid[])
       GROUP BY author_id`,
      [authorIds]
    );
    for (const row of result.rows) {
      counts.set(row.author_id, parseInt(row.count, 10));
    }
    return counts;
  }

  async create(authorId: string, recipe: NewRecipe): Promise<string> {
    const recipeId = uuidv4();

    await withTransaction(this.pool, async (client) => {
      await client.query(
        `INSERT INTO recipes (id, author_id, name, text, cooking_time, image)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [recipeId, authorId, recipe.name, recipe.text, recipe.cooking_time, recipe.image]
      );
      await insertEdges(client, recipeId, recipe.tagIds, recipe.ingredients);
    });

    return recipeId;
  }

  async update(id: string, changes: RecipeChanges): Promise<void> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramIndex = 1;

    if (changes.name !== undefined) {
      updates.push(`name = $${paramIndex++}`);
      values.push(changes.name);
    }
    if (changes.text !== undefined) {
      updates.push(`text = $${paramIndex++}`);
      values.push(changes.text);
    }
    if (changes.cooking_time !== undefined) {
      updates.push(`cooking_time = $${paramIndex++}`);
      values.push(changes.cooking_time);
    }
    if (changes.image !== undefined) {
      updates.push(`image = $${paramIndex++}`);
      values.push(changes.image);
    }
    values.push(id);

    await withTransaction(this.pool, async (client) => {
      if (updates.length > 0) {
        await client.query(`UPDATE recipes SET ${updates.join(', ')} WHERE id = $${paramIndex}`, values);
      }
      // Tag and ingredient sets are replaced, never merged
      await client.query('DELETE FROM recipe_tags WHERE recipe_id = $1', [id]);
      await client.query('DELETE FROM recipe_ingredients WHERE recipe_id = $1', [id]);
      await insertEdges(client, id, changes.tagIds, changes.ingredients);
    });
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM recipes WHERE id = $1', [id]);
    return result.rowCount === 1;
  }

  async cartIngredients(userId: string): Promise<CartIngredientRow[]> {
    // Single statement, so the whole cart is read from one snapshot
    const result = await this.pool.query<CartIngredientRow>(
      `SELECT ri.recipe_id, i.id AS ingredient_id, i.name, i.measurement_unit, ri.amount
       FROM shopping_cart sc
       JOIN recipe_ingredients ri ON ri.recipe_id = sc.recipe_id
       JOIN ingredients i ON i.id = ri.ingredient_id
       WHERE sc.user_id = $1`,
      [userId]
    );
    return result.rows;
  }

  async saveShortLink(recipeId: string, hash: string): Promise<string> {
    try {
      await this.pool.query(
        `INSERT INTO short_links (recipe_id, hash) VALUES ($1, $2)
         ON CONFLICT (recipe_id) DO NOTHING`,
        [recipeId, hash]
      );
    } catch (error) {
      rethrowConstraint(error);
    }
    const result = await this.pool.query<{ hash: string }>(
      'SELECT hash FROM short_links WHERE recipe_id = $1',
      [recipeId]
    );
    return result.rows[0].hash;
  }

  async findByShortLink(hash: string): Promise<string | null> {
    const result = await this.pool.query<{ recipe_id: string }>(
      'SELECT recipe_id FROM short_links WHERE hash = $1',
      [hash]
    );
    return result.rows[0]?.recipe_id ?? null;
  }

  private async withDetails(recipes: RecipeRecord[]): Promise<RecipeDetail[]> {
    if (recipes.length === 0) return [];
    const ids = recipes.map((r) => r.id);

    const tagResult = await this.pool.query<Tag & { recipe_id: string }>(
      `SELECT rt.recipe_id, t.id, t.name, t.slug, t.color
       FROM recipe_tags rt JOIN tags t ON t.id = rt.tag_id
       WHERE rt.recipe_id = ANY($1::uuid[])
       ORDER BY t.name`,
      [ids]
    );
    const ingredientResult = await this.pool.query<RecipeIngredient & { recipe_id: string }>(
      `SELECT ri.recipe_id, i.id, i.name, i.measurement_unit, ri.amount
       FROM recipe_ingredients ri JOIN ingredients i ON i.id = ri.ingredient_id
       WHERE ri.recipe_id = ANY($1::uuid[])
       ORDER BY i.name`,
      [ids]
    );

    const tags = new Map<string, Tag[]>();
    for (const { recipe_id, ...tag } of tagResult.rows) {
      tags.set(recipe_id, [...(tags.get(recipe_id) ?? []), tag]);
    }
    const ingredients = new Map<string, RecipeIngredient[]>();
    for (const { recipe_id, ...ingredient } of ingredientResult.rows) {
      ingredients.set(recipe_id, [...(ingredients.get(recipe_id) ?? []), ingredient]);
    }

    return recipes.map((recipe) => ({
      ...recipe,
      tags: tags.get(recipe.id) ?? [],
      ingredients: ingredients.get(recipe.id) ?? [],
    }));
  }
}
