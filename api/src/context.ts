import { AuthenticationRequiredError } from './errors';
import { extractToken, hashToken, TokenIssuer } from './auth/tokens';
import type { TokenStore, UserRecord, UserStore } from './stores/types';

/** Who is making the request; built once per request by the auth hook. */
export interface RequestContext {
  user: UserRecord | null;
  tokenHash: string | null;
}

export interface AuthenticatedContext extends RequestContext {
  user: UserRecord;
  tokenHash: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    ctx: RequestContext;
  }
}

export const ANONYMOUS: RequestContext = { user: null, tokenHash: null };

export function requireUser(ctx: RequestContext): AuthenticatedContext {
  if (!ctx.user || !ctx.tokenHash) {
    throw new AuthenticationRequiredError();
  }
  return { user: ctx.user, tokenHash: ctx.tokenHash };
}

export interface ContextDeps {
  issuer: TokenIssuer;
  tokens: TokenStore;
  users: UserStore;
}

/**
 * No Authorization header means an anonymous caller. A header that is present
 * must carry a valid, unrevoked token.
 */
export async function resolveContext(
  authorization: string | undefined,
  deps: ContextDeps
): Promise<RequestContext> {
  if (!authorization) return ANONYMOUS;

  const token = extractToken(authorization);
  if (!token) {
    throw new AuthenticationRequiredError('Invalid authorization header');
  }

  const userId = deps.issuer.verify(token);
  if (!userId) {
    throw new AuthenticationRequiredError('Invalid or expired token');
  }

  const tokenHash = hashToken(token);
  const storedUserId = await deps.tokens.findUserId(tokenHash);
  if (storedUserId !== userId) {
    throw new AuthenticationRequiredError('Invalid or expired token');
  }

  const user = await deps.users.findById(userId);
  if (!user) {
    throw new AuthenticationRequiredError('User not found');
  }

  return { user, tokenHash };
}
