import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { extractToken, hashToken, TokenIssuer } from '../../src/auth/tokens';

const USER_ID = 'e0000000-0000-4000-8000-000000000001';

describe('TokenIssuer', () => {
  const issuer = new TokenIssuer('test-secret', 2);

  it('issues tokens that verify back to the user', () => {
    const { token, tokenHash } = issuer.issue(USER_ID);
    expect(issuer.verify(token)).toBe(USER_ID);
    expect(tokenHash).toBe(hashToken(token));
  });

  it('sets the stored expiry from the configured lifetime', () => {
    const now = new Date('2024-05-01T10:00:00Z');
    expect(issuer.issue(USER_ID, now).expiresAt.toISOString()).toBe('2024-05-01T12:00:00.000Z');
  });

  it('issues a distinct token on every login', () => {
    expect(issuer.issue(USER_ID).token).not.toBe(issuer.issue(USER_ID).token);
  });

  it('rejects tokens signed with another secret', () => {
    const { token } = new TokenIssuer('other-secret', 2).issue(USER_ID);
    expect(issuer.verify(token)).toBeNull();
  });

  it('rejects tokens that are not access tokens', () => {
    const token = jwt.sign({ sub: USER_ID, type: 'refresh' }, 'test-secret');
    expect(issuer.verify(token)).toBeNull();
  });

  it('rejects garbage', () => {
    expect(issuer.verify('not-a-jwt')).toBeNull();
  });
});

describe('extractToken', () => {
  it('accepts the Token and Bearer schemes', () => {
    expect(extractToken('Token abc')).toBe('abc');
    expect(extractToken('Bearer abc')).toBe('abc');
    expect(extractToken('token abc')).toBe('abc');
  });

  it('rejects other schemes and missing values', () => {
    expect(extractToken('Basic abc')).toBeNull();
    expect(extractToken('Token')).toBeNull();
    expect(extractToken(undefined)).toBeNull();
  });
});

describe('hashToken', () => {
  it('is a sha256 hex digest', () => {
    expect(hashToken('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});
