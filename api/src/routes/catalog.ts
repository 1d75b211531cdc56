import type { FastifyPluginAsync } from 'fastify';
import { parseId, singleQueryValue } from '../validation';
import type { RouteOptions } from './types';

export const tagRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  fastify.get('/', async (_request, reply) => {
    return reply.send(await services.catalog.listTags());
  });

  fastify.get<{ Params: { tag_id: string } }>('/:tag_id', async (request, reply) => {
    const tagId = parseId(request.params.tag_id, 'tag_id');
    return reply.send(await services.catalog.getTag(tagId));
  });
};

export const ingredientRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  fastify.get<{ Querystring: { name?: string | string[] } }>('/', async (request, reply) => {
    const name = singleQueryValue(request.query.name, 'name');
    return reply.send(await services.catalog.searchIngredients(name));
  });

  fastify.get<{ Params: { ingredient_id: string } }>('/:ingredient_id', async (request, reply) => {
    const ingredientId = parseId(request.params.ingredient_id, 'ingredient_id');
    return reply.send(await services.catalog.getIngredient(ingredientId));
  });
};
