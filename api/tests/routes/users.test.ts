import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, PNG_DATA_URI, signUp, type TestApp } from '../support/app';

describe('user routes', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  describe('registration', () => {
    const payload = {
      email: 'bob@example.com',
      username: 'bob',
      first_name: 'Bob',
      last_name: 'Baker',
      password: 'long-enough',
    };

    it('returns the public profile without the password', async () => {
      const response = await ctx.app.inject({ method: 'POST', url: '/api/users/', payload });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(Object.keys(body).sort()).toEqual(['email', 'first_name', 'id', 'last_name', 'username']);
      expect(body).toMatchObject({ email: 'bob@example.com', username: 'bob' });
    });

    it('rejects a taken email', async () => {
      await ctx.app.inject({ method: 'POST', url: '/api/users/', payload });

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/users/',
        payload: { ...payload, username: 'bobby', email: 'BOB@example.com' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({
        code: 'VALIDATION_ERROR',
        fields: { email: ['A user with this email already exists'] },
      });
    });

    it('rejects a taken username', async () => {
      await ctx.app.inject({ method: 'POST', url: '/api/users/', payload });

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/users/',
        payload: { ...payload, email: 'other@example.com' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.fields).toEqual({ username: ['A user with this username already exists'] });
    });

    it('rejects short passwords', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/users/',
        payload: { ...payload, password: 'short' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.fields).toEqual({ password: ['Password must be at least 8 characters'] });
    });
  });

  describe('profiles', () => {
    it('lists users with pagination links', async () => {
      for (const name of ['u1', 'u2', 'u3']) await signUp(ctx.app, name);

      const response = await ctx.app.inject({ method: 'GET', url: '/api/users/?limit=2' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.count).toBe(3);
      expect(body.results.map((u: { username: string }) => u.username)).toEqual(['u1', 'u2']);
      expect(body.previous).toBeNull();
      expect(new URL(body.next).searchParams.get('page')).toBe('2');
    });

    it('answers 404 for a page past the end', async () => {
      await signUp(ctx.app, 'u1');

      const response = await ctx.app.inject({ method: 'GET', url: '/api/users/?page=5' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('Invalid page');
    });

    it('answers 404 for an unknown user and 400 for a malformed id', async () => {
      const missing = await ctx.app.inject({
        method: 'GET',
        url: '/api/users/00000000-0000-4000-8000-000000000000',
      });
      expect(missing.statusCode).toBe(404);

      const malformed = await ctx.app.inject({ method: 'GET', url: '/api/users/42' });
      expect(malformed.statusCode).toBe(400);
      expect(malformed.json().error.fields).toEqual({ user_id: ['Invalid user_id format'] });
    });
  });

  describe('password', () => {
    it('changes the password after checking the current one', async () => {
      const user = await signUp(ctx.app, 'alice');

      const wrong = await ctx.app.inject({
        method: 'POST',
        url: '/api/users/set_password',
        headers: user.headers,
        payload: { current_password: 'nope', new_password: 'brand-new-pass' },
      });
      expect(wrong.statusCode).toBe(400);
      expect(wrong.json().error.fields).toEqual({ current_password: ['Current password is incorrect'] });

      const changed = await ctx.app.inject({
        method: 'POST',
        url: '/api/users/set_password',
        headers: user.headers,
        payload: { current_password: 'correct-horse-1', new_password: 'brand-new-pass' },
      });
      expect(changed.statusCode).toBe(204);

      const login = await ctx.app.inject({
        method: 'POST',
        url: '/api/auth/token/login',
        payload: { email: user.email, password: 'brand-new-pass' },
      });
      expect(login.statusCode).toBe(200);
    });
  });

  describe('avatar', () => {
    it('stores, replaces and deletes the avatar', async () => {
      const user = await signUp(ctx.app, 'alice');

      const first = await ctx.app.inject({
        method: 'PUT',
        url: '/api/users/me/avatar',
        headers: user.headers,
        payload: { avatar: PNG_DATA_URI },
      });
      expect(first.statusCode).toBe(200);
      expect(first.json()).toEqual({ avatar: '/media/users/avatars/file-1.png' });

      await ctx.app.inject({
        method: 'PUT',
        url: '/api/users/me/avatar',
        headers: user.headers,
        payload: { avatar: PNG_DATA_URI },
      });
      expect([...ctx.media.files.keys()]).toEqual(['/media/users/avatars/file-2.png']);

      const removed = await ctx.app.inject({ method: 'DELETE', url: '/api/users/me/avatar', headers: user.headers });
      expect(removed.statusCode).toBe(204);
      expect(ctx.media.files.size).toBe(0);
      expect(ctx.stores.users.rows.get(user.id)?.avatar).toBeNull();
    });

    it('rejects an avatar that is not a data URI', async () => {
      const user = await signUp(ctx.app, 'alice');

      const response = await ctx.app.inject({
        method: 'PUT',
        url: '/api/users/me/avatar',
        headers: user.headers,
        payload: { avatar: 'https://example.com/me.png' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('INVALID_IMAGE_ENCODING');
    });
  });

  describe('subscriptions', () => {
    it('subscribes to an author and lists them with their recipes', async () => {
      const reader = await signUp(ctx.app, 'reader');
      const author = await signUp(ctx.app, 'author');

      const subscribed = await ctx.app.inject({
        method: 'POST',
        url: `/api/users/${author.id}/subscribe`,
        headers: reader.headers,
      });
      expect(subscribed.statusCode).toBe(201);
      expect(subscribed.json()).toMatchObject({
        id: author.id,
        is_subscribed: true,
        recipes: [],
        recipes_count: 0,
      });

      const profile = await ctx.app.inject({ method: 'GET', url: `/api/users/${author.id}`, headers: reader.headers });
      expect(profile.json().is_subscribed).toBe(true);

      const anonymous = await ctx.app.inject({ method: 'GET', url: `/api/users/${author.id}` });
      expect(anonymous.json().is_subscribed).toBe(false);

      const list = await ctx.app.inject({ method: 'GET', url: '/api/users/subscriptions', headers: reader.headers });
      expect(list.statusCode).toBe(200);
      expect(list.json().count).toBe(1);
      expect(list.json().results[0].username).toBe('author');
    });

    it('refuses to subscribe to yourself', async () => {
      const user = await signUp(ctx.app, 'alice');

      const response = await ctx.app.inject({
        method: 'POST',
        url: `/api/users/${user.id}/subscribe`,
        headers: user.headers,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({
        code: 'INVALID_SELF_REFERENCE',
        message: 'You cannot subscribe to yourself',
      });
    });

    it('refuses a second subscription to the same author', async () => {
      const reader = await signUp(ctx.app, 'reader');
      const author = await signUp(ctx.app, 'author');
      const url = `/api/users/${author.id}/subscribe`;

      await ctx.app.inject({ method: 'POST', url, headers: reader.headers });
      const again = await ctx.app.inject({ method: 'POST', url, headers: reader.headers });

      expect(again.statusCode).toBe(400);
      expect(again.json().error).toMatchObject({
        code: 'ALREADY_EXISTS',
        message: 'You are already subscribed to this user',
      });
    });

    it('unsubscribes once and then reports the missing subscription', async () => {
      const reader = await signUp(ctx.app, 'reader');
      const author = await signUp(ctx.app, 'author');
      const url = `/api/users/${author.id}/subscribe`;
      await ctx.app.inject({ method: 'POST', url, headers: reader.headers });

      const removed = await ctx.app.inject({ method: 'DELETE', url, headers: reader.headers });
      expect(removed.statusCode).toBe(204);

      const again = await ctx.app.inject({ method: 'DELETE', url, headers: reader.headers });
      expect(again.statusCode).toBe(400);
      expect(again.json().error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'You are not subscribed to this user',
      });
    });

    it('answers 404 when the author does not exist', async () => {
      const reader = await signUp(ctx.app, 'reader');

      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/users/00000000-0000-4000-8000-000000000000/subscribe',
        headers: reader.headers,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('User not found');
    });
  });
});
