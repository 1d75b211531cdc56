import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../src/config';

const base = { DATABASE_URL: 'postgres://localhost/foodgram', JWT_SECRET: 'test-secret' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(base);
    expect(config).toMatchObject({
      port: 8000,
      dbPoolMax: 10,
      authTokenTtlHours: 168,
      bcryptCost: 12,
      frontendOrigin: null,
      pageSize: 6,
      maxPageSize: 100,
      mediaRoot: './media',
      mediaUrl: '/media/',
      baseUrl: 'http://localhost',
      shortLinkPrefix: '/s',
      bodyLimitBytes: 10485760,
    });
  });

  it('requires the database URL and the token secret', () => {
    expect(() => loadConfig({ JWT_SECRET: 'test-secret' })).toThrow(
      'Missing required environment variable DATABASE_URL'
    );
    expect(() => loadConfig({ DATABASE_URL: 'postgres://localhost/foodgram' })).toThrow(
      'Missing required environment variable JWT_SECRET'
    );
  });

  it('rejects non-numeric integers', () => {
    expect(() => loadConfig({ ...base, PAGE_SIZE: 'six' })).toThrow('PAGE_SIZE must be a positive integer, got "six"');
  });

  it('normalises media and base URLs', () => {
    const config = loadConfig({ ...base, MEDIA_URL: '/uploads', BASE_URL: 'https://foodgram.test/' });
    expect(config.mediaUrl).toBe('/uploads/');
    expect(config.baseUrl).toBe('https://foodgram.test');
  });
});
