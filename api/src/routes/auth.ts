import type { FastifyPluginAsync } from 'fastify';
import { requireUser } from '../context';
import { loginSchema, parseInput } from '../validation';
import type { RouteOptions } from './types';

export const authRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { services }) => {
  // POST /auth/token/login
  fastify.post('/token/login', async (request, reply) => {
    const { email, password } = parseInput(loginSchema, request.body);
    const result = await services.auth.login(email, password);
    return reply.send(result);
  });

  // POST /auth/token/logout (protected)
  fastify.post('/token/logout', async (request, reply) => {
    const ctx = requireUser(request.ctx);
    await services.auth.logout(ctx);
    fastify.log.info({ userId: ctx.user.id }, 'Token revoked');
    return reply.code(204).send();
  });
};
