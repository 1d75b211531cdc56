import { NotFoundError } from '../errors';
import type { CatalogStore, Ingredient, Tag } from '../stores/types';

export class CatalogService {
  constructor(private readonly catalog: CatalogStore) {}

  listTags(): Promise<Tag[]> {
    return this.catalog.listTags();
  }

  async getTag(id: string): Promise<Tag> {
    const tag = await this.catalog.findTag(id);
    if (!tag) throw new NotFoundError('Tag not found');
    return tag;
  }

  searchIngredients(name: string | undefined): Promise<Ingredient[]> {
    const query = name?.trim();
    return this.catalog.searchIngredients(query ? query : undefined);
  }

  async getIngredient(id: string): Promise<Ingredient> {
    const ingredient = await this.catalog.findIngredient(id);
    if (!ingredient) throw new NotFoundError('Ingredient not found');
    return ingredient;
  }
}
