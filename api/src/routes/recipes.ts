import type { FastifyPluginAsync } from 'fastify';
import { requireUser } from '../context';
import { paginate, parsePageParams, toPageRequest } from '../pagination';
import type { RecipeQuery } from '../services/recipes';
import { renderShoppingList, SHOPPING_LIST_FILENAME } from '../services/shopping-list';
import { parseId, parseInput, recipeCreateSchema, recipeUpdateSchema, singleQueryValue } from '../validation';
import { requestUrl, type RouteOptions } from './types';

interface RecipeListQuery {
  page?: string;
  limit?: string;
  author?: string | string[];
  tags?: string | string[];
  is_favorited?: string | string[];
  is_in_shopping_cart?: string | string[];
}

type RecipeParams = { Params: { recipe_id: string } };

function isTrue(value: string | undefined): boolean {
  return value !== undefined && (value === '1' || value.toLowerCase() === 'true');
}

// Accepts ?tags=a&tags=b as well as ?tags=a,b
function parseTags(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const values = Array.isArray(value) ? value : [value];
  return values
    .flatMap((v) => v.split(','))
    .map((slug) => slug.trim())
    .filter((slug) => slug.length > 0);
}

export function parseRecipeQuery(query: RecipeListQuery): RecipeQuery {
  const author = singleQueryValue(query.author, 'author');
  return {
    authorId: author ? parseId(author, 'author') : undefined,
    tagSlugs: parseTags(query.tags),
    isFavorited: isTrue(singleQueryValue(query.is_favorited, 'is_favorited')),
    isInShoppingCart: isTrue(singleQueryValue(query.is_in_shopping_cart, 'is_in_shopping_cart')),
  };
}

export const recipeRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { config, services }) => {
  // GET /recipes
  fastify.get<{ Querystring: RecipeListQuery }>('/', async (request, reply) => {
    const params = parsePageParams(request.query, config);
    const query = parseRecipeQuery(request.query);
    const { count, rows } = await services.recipes.list(request.ctx, query, toPageRequest(params));
    fastify.log.info({ userId: request.ctx.user?.id, count }, 'List recipes');
    return reply.send(paginate(requestUrl(request), params, count, rows));
  });

  // POST /recipes (protected)
  fastify.post('/', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const input = parseInput(recipeCreateSchema, request.body);
    const recipe = await services.recipes.create(ctx, input);
    fastify.log.info({ recipeId: recipe.id, userId: ctx.user.id }, 'Recipe created');
    return reply.code(201).send(recipe);
  });

  // GET /recipes/download_shopping_cart (protected)
  fastify.get('/download_shopping_cart', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const entries = await services.recipes.shoppingList(ctx);
    fastify.log.info({ userId: ctx.user.id, count: entries.length }, 'Shopping list rendered');
    return reply
      .header('Content-Type', 'text/plain; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${SHOPPING_LIST_FILENAME}"`)
      .send(renderShoppingList(entries));
  });

  // GET /recipes/:recipe_id
  fastify.get<RecipeParams>('/:recipe_id', async (request, reply) => {
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    return reply.send(await services.recipes.get(request.ctx, recipeId));
  });

  // PATCH /recipes/:recipe_id (author only)
  fastify.patch<RecipeParams>('/:recipe_id', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    const input = parseInput(recipeUpdateSchema, request.body);
    return reply.send(await services.recipes.update(ctx, recipeId, input));
  });

  // DELETE /recipes/:recipe_id (author only)
  fastify.delete<RecipeParams>('/:recipe_id', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    await services.recipes.delete(ctx, recipeId);
    fastify.log.info({ recipeId, userId: ctx.user.id }, 'Recipe deleted');
    return reply.code(204).send();
  });

  // GET /recipes/:recipe_id/get-link
  fastify.get<RecipeParams>('/:recipe_id/get-link', async (request, reply) => {
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    const hash = await services.recipes.shortLink(recipeId);
    return reply.send({ 'short-link': `${config.baseUrl}${config.shortLinkPrefix}/${hash}` });
  });

  // POST /recipes/:recipe_id/favorite (protected)
  fastify.post<RecipeParams>('/:recipe_id/favorite', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    return reply.code(201).send(await services.recipes.addFavorite(ctx, recipeId));
  });

  // DELETE /recipes/:recipe_id/favorite (protected)
  fastify.delete<RecipeParams>('/:recipe_id/favorite', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    await services.recipes.removeFavorite(ctx, recipeId);
    return reply.code(204).send();
  });

  // POST /recipes/:recipe_id/shopping_cart (protected)
  fastify.post<RecipeParams>('/:recipe_id/shopping_cart', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    return reply.code(201).send(await services.recipes.addToCart(ctx, recipeId));
  });

  // DELETE /recipes/:recipe_id/shopping_cart (protected)
  fastify.delete<RecipeParams>('/:recipe_id/shopping_cart', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const recipeId = parseId(request.params.recipe_id, 'recipe_id');
    await services.recipes.removeFromCart(ctx, recipeId);
    return reply.code(204).send();
  });
};

export const shortLinkRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  // GET /s/:hash
  fastify.get<{ Params: { hash: string } }>('/:hash', async (request, reply) => {
    const recipeId = await services.recipes.resolveShortLink(request.params.hash);
    return reply.redirect(`/recipes/${recipeId}/`);
  });
};
