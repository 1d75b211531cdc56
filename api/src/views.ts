import type { RecipeDetail, RecipeIngredient, RecipeRecord, Tag, UserRecord } from './stores/types';

export interface PublicUserView {
  email: string;
  id: string;
  username: string;
  first_name: string;
  last_name: string;
}

export interface UserView extends PublicUserView {
  is_subscribed: boolean;
  avatar: string | null;
}

export interface ShortRecipeView {
  id: string;
  name: string;
  image: string;
  cooking_time: number;
}

export interface AuthorView extends UserView {
  recipes: ShortRecipeView[];
  recipes_count: number;
}

export interface RecipeView {
  id: string;
  tags: Tag[];
  author: UserView;
  ingredients: RecipeIngredient[];
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
  name: string;
  image: string;
  text: string;
  cooking_time: number;
}

export function publicUserView(user: UserRecord): PublicUserView {
  return {
    email: user.email,
    id: user.id,
    username: user.username,
    first_name: user.first_name,
    last_name: user.last_name,
  };
}

export function userView(user: UserRecord, isSubscribed: boolean): UserView {
  return { ...publicUserView(user), is_subscribed: isSubscribed, avatar: user.avatar };
}

export function shortRecipeView(recipe: RecipeRecord): ShortRecipeView {
  return {
    id: recipe.id,
    name: recipe.name,
    image: recipe.image,
    cooking_time: recipe.cooking_time,
  };
}

export function recipeView(
  recipe: RecipeDetail,
  author: UserView,
  flags: { favorited: boolean; inCart: boolean }
): RecipeView {
  return {
    id: recipe.id,
    tags: recipe.tags,
    author,
    ingredients: recipe.ingredients,
    is_favorited: flags.favorited,
    is_in_shopping_cart: flags.inCart,
    name: recipe.name,
    image: recipe.image,
    text: recipe.text,
    cooking_time: recipe.cooking_time,
  };
}
