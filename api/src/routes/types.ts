import type { FastifyRequest } from 'fastify';
import type { Config } from '../config';
import { AuthService } from '../services/auth';
import { CatalogService } from '../services/catalog';
import { RecipeService } from '../services/recipes';
import { UserService } from '../services/users';

export interface Services {
  auth: AuthService;
  users: UserService;
  catalog: CatalogService;
  recipes: RecipeService;
}

export interface RouteOptions {
  config: Config;
  services: Services;
}

/** Absolute URL of the current request, used for pagination links. */
export function requestUrl(request: FastifyRequest): URL {
  return new URL(request.url, `${request.protocol}://${request.headers.host ?? 'localhost'}`);
}
