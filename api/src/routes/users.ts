import type { FastifyPluginAsync } from 'fastify';
import { requireUser } from '../context';
import { paginate, parsePageParams, positiveInt, toPageRequest } from '../pagination';
import { avatarSchema, parseId, parseInput, registrationSchema, setPasswordSchema } from '../validation';
import { requestUrl, type RouteOptions } from './types';

interface PageQuery {
  page?: string;
  limit?: string;
}

interface SubscriptionQuery extends PageQuery {
  recipes_limit?: string;
}

export const userRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { config, services }) => {
  // POST /users - Register
  fastify.post('/', async (request, reply) => {
    const input = parseInput(registrationSchema, request.body);
    const user = await services.users.register(input);
    fastify.log.info({ userId: user.id }, 'User registered');
    return reply.code(201).send(user);
  });

  // GET /users
  fastify.get<{ Querystring: PageQuery }>('/', async (request, reply) => {
    const params = parsePageParams(request.query, config);
    const { count, rows } = await services.users.list(request.ctx, toPageRequest(params));
    return reply.send(paginate(requestUrl(request), params, count, rows));
  });

  // GET /users/me (protected)
  fastify.get('/me', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    return reply.send(await services.users.me(ctx));
  });

  // PUT /users/me/avatar (protected)
  fastify.put('/me/avatar', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const { avatar } = parseInput(avatarSchema, request.body);
    return reply.send(await services.users.setAvatar(ctx, avatar));
  });

  // DELETE /users/me/avatar (protected)
  fastify.delete('/me/avatar', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    await services.users.deleteAvatar(ctx);
    return reply.code(204).send();
  });

  // POST /users/set_password (protected)
  fastify.post('/set_password', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const { current_password, new_password } = parseInput(setPasswordSchema, request.body);
    await services.users.setPassword(ctx, current_password, new_password);
    return reply.code(204).send();
  });

  // GET /users/subscriptions (protected) - Authors the caller follows, with their recipes
  fastify.get<{ Querystring: SubscriptionQuery }>('/subscriptions', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const params = parsePageParams(request.query, config);
    const { count, rows } = await services.users.subscriptions(
      ctx,
      toPageRequest(params),
      positiveInt(request.query.recipes_limit)
    );
    return reply.send(paginate(requestUrl(request), params, count, rows));
  });

  // GET /users/:user_id
  fastify.get<{ Params: { user_id: string } }>('/:user_id', async (request, reply) => {
    const userId = parseId(request.params.user_id, 'user_id');
    return reply.send(await services.users.get(request.ctx, userId));
  });

  // POST /users/:user_id/subscribe (protected)
  fastify.post<{ Params: { user_id: string }; Querystring: SubscriptionQuery }>(
    '/:user_id/subscribe',
    async (request, reply) => {
      const ctx = requireUser(request.ctx);
      const authorId = parseId(request.params.user_id, 'user_id');
      const author = await services.users.subscribe(ctx, authorId, positiveInt(request.query.recipes_limit));
      return reply.code(201).send(author);
    }
  );

  // DELETE /users/:user_id/subscribe (protected)
  fastify.delete<{ Params: { user_id: string } }>('/:user_id/subscribe', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    const authorId = parseId(request.params.user_id, 'user_id');
    await services.users.unsubscribe(ctx, authorId);
    return reply.code(204).send();
  });
};
