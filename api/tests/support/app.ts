import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';
import type { Config } from '../../src/config';
import { createMemoryStores, MemoryMediaStorage, type MemoryStores } from './memory';

export const testConfig: Config = {
  port: 0,
  databaseUrl: 'postgres://unused',
  dbPoolMax: 1,
  jwtSecret: 'test-secret',
  authTokenTtlHours: 1,
  bcryptCost: 4,
  frontendOrigin: null,
  pageSize: 6,
  maxPageSize: 100,
  mediaRoot: '/tmp/unused',
  mediaUrl: '/media/',
  baseUrl: 'http://foodgram.test',
  shortLinkPrefix: '/s',
  bodyLimitBytes: 10 * 1024 * 1024,
};

// 1x1 transparent PNG
export const PNG_DATA_URI =
  'data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=';

export interface TestApp {
  app: FastifyInstance;
  stores: MemoryStores;
  media: MemoryMediaStorage;
}

export function createTestApp(config: Partial<Config> = {}): TestApp {
  const stores = createMemoryStores();
  const media = new MemoryMediaStorage();
  const app = buildApp({ config: { ...testConfig, ...config }, stores, media, logger: false });
  return { app, stores, media };
}

export interface TestUser {
  id: string;
  email: string;
  token: string;
  headers: { authorization: string };
}

/** Registers a user through the API and logs them in. */
export async function signUp(app: FastifyInstance, username: string): Promise<TestUser> {
  const email = `${username}@example.com`;
  const password = 'correct-horse-1';

  const registered = await app.inject({
    method: 'POST',
    url: '/api/users/',
    payload: { email, username, first_name: username, last_name: 'Tester', password },
  });
  if (registered.statusCode !== 201) {
    throw new Error(`Registration failed: ${registered.body}`);
  }

  const login = await app.inject({
    method: 'POST',
    url: '/api/auth/token/login',
    payload: { email, password },
  });
  const { auth_token } = login.json<{ auth_token: string }>();
  const { id } = registered.json<{ id: string }>();

  return { id, email, token: auth_token, headers: { authorization: `Token ${auth_token}` } };
}
