import { createHash } from 'crypto';
import type { AuthenticatedContext, RequestContext } from '../context';
import {
  AuthenticationRequiredError,
  DuplicateIngredientError,
  NotFoundError,
  PermissionDeniedError,
  UniqueConstraintError,
  ValidationError,
} from '../errors';
import { decodeImageDataUri } from '../media/images';
import type { MediaStorage } from '../media/storage';
import type {
  CatalogStore,
  IngredientAmount,
  PageRequest,
  PageResult,
  RecipeDetail,
  RecipeFilter,
  RecipeStore,
  UserStore,
} from '../stores/types';
import type { RecipeCreateInput, RecipeUpdateInput } from '../validation';
import { type RecipeView, recipeView, type ShortRecipeView, shortRecipeView } from '../views';
import { addMembership, removeMembership } from './membership';
import { aggregateShoppingList, type ShoppingListEntry } from './shopping-list';
import { UserService } from './users';

const IMAGE_FOLDER = 'recipes/images';
const SHORT_LINK_LENGTH = 6;
// Length of an unpadded base64url sha256 digest
const MAX_SHORT_LINK_LENGTH = 43;

const FAVORITE_MESSAGES = {
  alreadyExists: 'Recipe is already in favorites',
  notFound: 'Recipe is not in favorites',
};

const CART_MESSAGES = {
  alreadyExists: 'Recipe is already in the shopping cart',
  notFound: 'Recipe is not in the shopping cart',
};

export interface RecipeQuery {
  authorId?: string;
  tagSlugs?: string[];
  isFavorited: boolean;
  isInShoppingCart: boolean;
}

export function shortLinkHash(recipeId: string, length = SHORT_LINK_LENGTH): string {
  return createHash('sha256').update(recipeId).digest('base64url').slice(0, length);
}

export class RecipeService {
  constructor(
    private readonly recipes: RecipeStore,
    private readonly catalog: CatalogStore,
    private readonly users: UserStore,
    private readonly userService: UserService,
    private readonly media: MediaStorage
  ) {}

  async list(ctx: RequestContext, query: RecipeQuery, page: PageRequest): Promise<PageResult<RecipeView>> {
    const filter: RecipeFilter = {};
    if (query.authorId !== undefined) filter.authorId = query.authorId;
    if (query.tagSlugs !== undefined && query.tagSlugs.length > 0) filter.tagSlugs = query.tagSlugs;

    if (query.isFavorited || query.isInShoppingCart) {
      if (!ctx.user) {
        throw new AuthenticationRequiredError('Log in to filter by favorites or shopping cart');
      }
      if (query.isFavorited) filter.favoritedBy = ctx.user.id;
      if (query.isInShoppingCart) filter.inCartOf = ctx.user.id;
    }

    const { count, rows } = await this.recipes.list(filter, page);
    return { count, rows: await this.present(ctx, rows) };
  }

  async get(ctx: RequestContext, id: string): Promise<RecipeView> {
    const [view] = await this.present(ctx, [await this.requireRecipe(id)]);
    return view;
  }

  async create(ctx: AuthenticatedContext, input: RecipeCreateInput): Promise<RecipeView> {
    await this.checkReferences(input.ingredients, input.tags);
    const image = decodeImageDataUri(input.image, 'image');

    const imageUrl = await this.media.save(IMAGE_FOLDER, image);
    let recipeId: string;
    try {
      recipeId = await this.recipes.create(ctx.user.id, {
        name: input.name,
        text: input.text,
        cooking_time: input.cooking_time,
        image: imageUrl,
        tagIds: input.tags,
        ingredients: input.ingredients,
      });
    } catch (error) {
      await this.media.remove(imageUrl);
      throw error;
    }

    return this.get(ctx, recipeId);
  }

  async update(ctx: AuthenticatedContext, id: string, input: RecipeUpdateInput): Promise<RecipeView> {
    const recipe = await this.requireOwnRecipe(ctx, id);
    await this.checkReferences(input.ingredients, input.tags);
    const image = input.image !== undefined ? decodeImageDataUri(input.image, 'image') : null;

    const imageUrl = image ? await this.media.save(IMAGE_FOLDER, image) : undefined;
    try {
      await this.recipes.update(recipe.id, {
        name: input.name,
        text: input.text,
        cooking_time: input.cooking_time,
        image: imageUrl,
        tagIds: input.tags,
        ingredients: input.ingredients,
      });
    } catch (error) {
      if (imageUrl) await this.media.remove(imageUrl);
      throw error;
    }
    if (imageUrl) await this.media.remove(recipe.image);

    return this.get(ctx, recipe.id);
  }

  async delete(ctx: AuthenticatedContext, id: string): Promise<void> {
    const recipe = await this.requireOwnRecipe(ctx, id);
    const deleted = await this.recipes.delete(recipe.id);
    if (!deleted) {
      throw new NotFoundError('Recipe not found');
    }
    await this.media.remove(recipe.image);
  }

  async addFavorite(ctx: AuthenticatedContext, id: string): Promise<ShortRecipeView> {
    const recipe = await this.requireRecipe(id);
    await addMembership(this.recipes.favorites, ctx.user.id, recipe.id, FAVORITE_MESSAGES);
    return shortRecipeView(recipe);
  }

  async removeFavorite(ctx: AuthenticatedContext, id: string): Promise<void> {
    const recipe = await this.requireRecipe(id);
    await removeMembership(this.recipes.favorites, ctx.user.id, recipe.id, FAVORITE_MESSAGES);
  }

  async addToCart(ctx: AuthenticatedContext, id: string): Promise<ShortRecipeView> {
    const recipe = await this.requireRecipe(id);
    await addMembership(this.recipes.cart, ctx.user.id, recipe.id, CART_MESSAGES);
    return shortRecipeView(recipe);
  }

  async removeFromCart(ctx: AuthenticatedContext, id: string): Promise<void> {
    const recipe = await this.requireRecipe(id);
    await removeMembership(this.recipes.cart, ctx.user.id, recipe.id, CART_MESSAGES);
  }

  async shoppingList(ctx: AuthenticatedContext): Promise<ShoppingListEntry[]> {
    return aggregateShoppingList(await this.recipes.cartIngredients(ctx.user.id));
  }

  /**
   * Short link hash of a recipe; the same recipe always gets the same hash.
   * A hash already taken by another recipe is lengthened until it is free.
   */
  async shortLink(id: string): Promise<string> {
    const recipe = await this.requireRecipe(id);
    const digest = shortLinkHash(recipe.id, MAX_SHORT_LINK_LENGTH);

    for (let length = SHORT_LINK_LENGTH; length <= digest.length; length++) {
      try {
        return await this.recipes.saveShortLink(recipe.id, digest.slice(0, length));
      } catch (error) {
        if (!(error instanceof UniqueConstraintError && error.constraint === 'short_links_hash_key')) {
          throw error;
        }
      }
    }
    throw new Error(`No free short link hash for recipe ${recipe.id}`);
  }

  async resolveShortLink(hash: string): Promise<string> {
    const recipeId = await this.recipes.findByShortLink(hash);
    if (!recipeId) {
      throw new NotFoundError('Short link not found');
    }
    return recipeId;
  }

  private async requireRecipe(id: string): Promise<RecipeDetail> {
    const recipe = await this.recipes.findById(id);
    if (!recipe) {
      throw new NotFoundError('Recipe not found');
    }
    return recipe;
  }

  private async requireOwnRecipe(ctx: AuthenticatedContext, id: string): Promise<RecipeDetail> {
    const recipe = await this.requireRecipe(id);
    if (recipe.author_id !== ctx.user.id) {
      throw new PermissionDeniedError('Only the author can change this recipe');
    }
    return recipe;
  }

  private async checkReferences(ingredients: IngredientAmount[], tagIds: string[]): Promise<void> {
    const ingredientIds = new Set<string>();
    for (const { id } of ingredients) {
      if (ingredientIds.has(id)) {
        throw new DuplicateIngredientError(id);
      }
      ingredientIds.add(id);
    }

    const uniqueTagIds = new Set(tagIds);
    if (uniqueTagIds.size !== tagIds.length) {
      throw ValidationError.forField('tags', 'Tags must not repeat');
    }

    const foundIngredients = await this.catalog.findIngredientsByIds([...ingredientIds]);
    if (foundIngredients.length !== ingredientIds.size) {
      const found = new Set(foundIngredients.map((i) => i.id));
      const missing = [...ingredientIds].filter((id) => !found.has(id));
      throw ValidationError.forField('ingredients', `Unknown ingredients: ${missing.join(', ')}`);
    }

    const foundTags = await this.catalog.findTagsByIds([...uniqueTagIds]);
    if (foundTags.length !== uniqueTagIds.size) {
      const found = new Set(foundTags.map((t) => t.id));
      const missing = [...uniqueTagIds].filter((id) => !found.has(id));
      throw ValidationError.forField('tags', `Unknown tags: ${missing.join(', ')}`);
    }
  }

  private async present(ctx: RequestContext, recipes: RecipeDetail[]): Promise<RecipeView[]> {
    const recipeIds = recipes.map((r) => r.id);
    const authorIds = [...new Set(recipes.map((r) => r.author_id))];

    const authors = await this.userService.present(ctx, await this.users.findByIds(authorIds));
    const authorsById = new Map(authors.map((a) => [a.id, a]));

    const favorited = ctx.user
      ? await this.recipes.favorites.targetsOf(ctx.user.id, recipeIds)
      : new Set<string>();
    const inCart = ctx.user ? await this.recipes.cart.targetsOf(ctx.user.id, recipeIds) : new Set<string>();

    return recipes.map((recipe) => {
      const author = authorsById.get(recipe.author_id);
      if (!author) {
        throw new Error(`Author ${recipe.author_id} of recipe ${recipe.id} not found`);
      }
      return recipeView(recipe, author, {
        favorited: favorited.has(recipe.id),
        inCart: inCart.has(recipe.id),
      });
    });
  }
}
