import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, signUp, type TestApp } from '../support/app';

describe('auth routes', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('logs in with a registered email and password', async () => {
    const user = await signUp(ctx.app, 'alice');

    const me = await ctx.app.inject({ method: 'GET', url: '/api/users/me', headers: user.headers });

    expect(me.statusCode).toBe(200);
    expect(me.json()).toMatchObject({ id: user.id, username: 'alice', is_subscribed: false, avatar: null });
  });

  it('accepts the email in any case', async () => {
    await signUp(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/auth/token/login',
      payload: { email: 'ALICE@example.com', password: 'correct-horse-1' },
    });

    expect(response.statusCode).toBe(200);
    expect(typeof response.json().auth_token).toBe('string');
  });

  it('rejects a wrong password', async () => {
    await signUp(ctx.app, 'alice');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/auth/token/login',
      payload: { email: 'alice@example.com', password: 'wrong-password' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toMatchObject({ code: 'INVALID_CREDENTIALS', message: 'Invalid email or password' });
  });

  it('revokes the token on logout', async () => {
    const user = await signUp(ctx.app, 'alice');

    const logout = await ctx.app.inject({ method: 'POST', url: '/api/auth/token/logout', headers: user.headers });
    expect(logout.statusCode).toBe(204);

    const me = await ctx.app.inject({ method: 'GET', url: '/api/users/me', headers: user.headers });
    expect(me.statusCode).toBe(401);
    expect(me.json().error).toMatchObject({ code: 'AUTHENTICATION_REQUIRED', message: 'Invalid or expired token' });
  });

  it('accepts the Bearer scheme', async () => {
    const user = await signUp(ctx.app, 'alice');

    const me = await ctx.app.inject({
      method: 'GET',
      url: '/api/users/me',
      headers: { authorization: `Bearer ${user.token}` },
    });

    expect(me.statusCode).toBe(200);
  });

  it('rejects a malformed authorization header', async () => {
    const response = await ctx.app.inject({
      method: 'GET',
      url: '/api/recipes/',
      headers: { authorization: 'Basic dXNlcjpwYXNz' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error.message).toBe('Invalid authorization header');
  });

  it('requires a token for protected routes', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/users/me' });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toMatchObject({
      code: 'AUTHENTICATION_REQUIRED',
      message: 'Authentication credentials were not provided',
    });
  });
});
