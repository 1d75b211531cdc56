import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { PasswordHasher } from './auth/passwords';
import { TokenIssuer } from './auth/tokens';
import type { Config } from './config';
import { resolveContext } from './context';
import { AppError } from './errors';
import type { MediaStorage } from './media/storage';
import { authRoutes } from './routes/auth';
import { ingredientRoutes, tagRoutes } from './routes/catalog';
import { recipeRoutes, shortLinkRoutes } from './routes/recipes';
import type { Services } from './routes/types';
import { userRoutes } from './routes/users';
import { AuthService } from './services/auth';
import { CatalogService } from './services/catalog';
import { RecipeService } from './services/recipes';
import { UserService } from './services/users';
import type { Stores } from './stores/types';

export interface AppDeps {
  config: Config;
  stores: Stores;
  media: MediaStorage;
  logger?: boolean;
}

export function buildApp({ config, stores, media, logger = true }: AppDeps): FastifyInstance {
  const fastify = Fastify({ logger, bodyLimit: config.bodyLimitBytes });

  const issuer = new TokenIssuer(config.jwtSecret, config.authTokenTtlHours);
  const passwords = new PasswordHasher(config.bcryptCost);
  const users = new UserService(stores.users, stores.recipes, passwords, media);
  const services: Services = {
    auth: new AuthService(stores.users, stores.tokens, issuer, passwords),
    users,
    catalog: new CatalogService(stores.catalog),
    recipes: new RecipeService(stores.recipes, stores.catalog, stores.users, users, media),
  };

  fastify.register(cors, {
    origin: config.frontendOrigin ?? true,
    credentials: true,
  });

  // Request context: the authenticated user (or none) for every request
  fastify.decorateRequest('ctx', null);
  fastify.addHook('onRequest', async (request) => {
    request.ctx = await resolveContext(request.headers.authorization, {
      issuer,
      tokens: stores.tokens,
      users: stores.users,
    });
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      request.log.info({ code: error.code, message: error.message }, 'Request rejected');
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          ...(error.fields ? { fields: error.fields } : {}),
          request_id: request.id,
        },
      });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: {
          code: error.statusCode === 400 ? 'VALIDATION_ERROR' : 'BAD_REQUEST',
          message: error.message,
          request_id: request.id,
        },
      });
    }

    request.log.error({ error }, 'Unhandled error');
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
        request_id: request.id,
      },
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
        request_id: request.id,
      },
    });
  });

  const routeOptions = { config, services };
  fastify.register(authRoutes, { ...routeOptions, prefix: '/api/auth' });
  fastify.register(userRoutes, { ...routeOptions, prefix: '/api/users' });
  fastify.register(tagRoutes, { ...routeOptions, prefix: '/api/tags' });
  fastify.register(ingredientRoutes, { ...routeOptions, prefix: '/api/ingredients' });
  fastify.register(recipeRoutes, { ...routeOptions, prefix: '/api/recipes' });
  fastify.register(shortLinkRoutes, { ...routeOptions, prefix: config.shortLinkPrefix });

  // Health check
  fastify.get('/health', async () => {
    try {
      await stores.ping();
      return { status: 'healthy' };
    } catch (error) {
      return { status: 'unhealthy', error: String(error) };
    }
  });

  return fastify;
}
