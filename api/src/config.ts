export interface Config {
  port: number;
  databaseUrl: string;
  dbPoolMax: number;
  jwtSecret: string;
  authTokenTtlHours: number;
  bcryptCost: number;
  frontendOrigin: string | null;
  pageSize: number;
  maxPageSize: number;
  mediaRoot: string;
  mediaUrl: string;
  baseUrl: string;
  shortLinkPrefix: string;
  bodyLimitBytes: number;
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value || value.trim() === '') {
    throw new Error(`Missing required environment variable ${name}`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const mediaUrl = env.MEDIA_URL || '/media/';

  return {
    port: integer(env, 'PORT', 8000),
    databaseUrl: required(env, 'DATABASE_URL'),
    dbPoolMax: integer(env, 'DB_POOL_MAX', 10),
    jwtSecret: required(env, 'JWT_SECRET'),
    authTokenTtlHours: integer(env, 'AUTH_TOKEN_TTL_HOURS', 168),
    bcryptCost: integer(env, 'BCRYPT_COST', 12),
    frontendOrigin: env.FRONTEND_ORIGIN || null,
    pageSize: integer(env, 'PAGE_SIZE', 6),
    maxPageSize: integer(env, 'MAX_PAGE_SIZE', 100),
    mediaRoot: env.MEDIA_ROOT || './media',
    // Media URLs are built by plain concatenation
    mediaUrl: mediaUrl.endsWith('/') ? mediaUrl : `${mediaUrl}/`,
    baseUrl: (env.BASE_URL || 'http://localhost').replace(/\/+$/, ''),
    shortLinkPrefix: env.SHORTLINK_PREFIX || '/s',
    // Recipe images arrive base64-encoded inside the JSON body
    bodyLimitBytes: integer(env, 'BODY_LIMIT_BYTES', 10 * 1024 * 1024),
  };
}
