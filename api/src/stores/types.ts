export interface UserRecord {
  id: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  avatar: string | null;
  created_at: Date;
}

export type NewUser = Omit<UserRecord, 'id' | 'avatar' | 'created_at'>;

export interface Tag {
  id: string;
  name: string;
  slug: string;
  color: string;
}

export interface Ingredient {
  id: string;
  name: string;
  measurement_unit: string;
}

export interface RecipeIngredient extends Ingredient {
  amount: number;
}

export interface RecipeRecord {
  id: string;
  author_id: string;
  name: string;
  text: string;
  cooking_time: number;
  image: string;
  created_at: Date;
}

export interface RecipeDetail extends RecipeRecord {
  tags: Tag[];
  ingredients: RecipeIngredient[];
}

export interface IngredientAmount {
  id: string;
  amount: number;
}

export interface NewRecipe {
  name: string;
  text: string;
  cooking_time: number;
  image: string;
  tagIds: string[];
  ingredients: IngredientAmount[];
}

export interface RecipeChanges {
  name?: string;
  text?: string;
  cooking_time?: number;
  image?: string;
  tagIds: string[];
  ingredients: IngredientAmount[];
}

export interface RecipeFilter {
  authorId?: string;
  tagSlugs?: string[];
  favoritedBy?: string;
  inCartOf?: string;
}

/** One ingredient line of one recipe in a user's cart. */
export interface CartIngredientRow {
  recipe_id: string;
  ingredient_id: string;
  name: string;
  measurement_unit: string;
  amount: number;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface PageResult<T> {
  count: number;
  rows: T[];
}

/**
 * A unique (owner, target) edge. `add` reports false when the edge already
 * existed, `remove` reports false when there was nothing to delete.
 */
export interface MembershipRelation {
  add(ownerId: string, targetId: string): Promise<boolean>;
  remove(ownerId: string, targetId: string): Promise<boolean>;
  /** Subset of `targetIds` that `ownerId` has an edge to. */
  targetsOf(ownerId: string, targetIds: string[]): Promise<Set<string>>;
}

export interface UserStore {
  create(user: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByIds(ids: string[]): Promise<UserRecord[]>;
  list(page: PageRequest): Promise<PageResult<UserRecord>>;
  listFollowed(followerId: string, page: PageRequest): Promise<PageResult<UserRecord>>;
  updatePassword(id: string, passwordHash: string): Promise<void>;
  updateAvatar(id: string, avatar: string | null): Promise<void>;
  readonly subscriptions: MembershipRelation;
}

export interface CatalogStore {
  listTags(): Promise<Tag[]>;
  findTag(id: string): Promise<Tag | null>;
  findTagsByIds(ids: string[]): Promise<Tag[]>;
  searchIngredients(name?: string): Promise<Ingredient[]>;
  findIngredient(id: string): Promise<Ingredient | null>;
  findIngredientsByIds(ids: string[]): Promise<Ingredient[]>;
}

export interface RecipeStore {
  list(filter: RecipeFilter, page: PageRequest): Promise<PageResult<RecipeDetail>>;
  findById(id: string): Promise<RecipeDetail | null>;
  /** Newest first; `limit` of null means all. */
  listByAuthor(authorId: string, limit: number | null): Promise<RecipeRecord[]>;
  countByAuthors(authorIds: string[]): Promise<Map<string, number>>;
  create(authorId: string, recipe: NewRecipe): Promise<string>;
  update(id: string, changes: RecipeChanges): Promise<void>;
  delete(id: string): Promise<boolean>;
  cartIngredients(userId: string): Promise<CartIngredientRow[]>;
  saveShortLink(recipeId: string, hash: string): Promise<string>;
  findByShortLink(hash: string): Promise<string | null>;
  readonly favorites: MembershipRelation;
  readonly cart: MembershipRelation;
}

export interface TokenStore {
  save(tokenHash: string, userId: string, expiresAt: Date): Promise<void>;
  /** User id of a stored, unexpired token. */
  findUserId(tokenHash: string): Promise<string | null>;
  remove(tokenHash: string): Promise<void>;
}

export interface Stores {
  users: UserStore;
  catalog: CatalogStore;
  recipes: RecipeStore;
  tokens: TokenStore;
  ping(): Promise<void>;
}
