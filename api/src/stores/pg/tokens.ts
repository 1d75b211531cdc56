import { Pool } from 'pg';
import type { TokenStore } from '../types';

export class PgTokenStore implements TokenStore {
  constructor(private readonly pool: Pool) {}

  async save(tokenHash: string, userId: string, expiresAt: Date): Promise<void> {
    await this.pool.query(
      'INSERT INTO auth_tokens (token_hash, user_id, expires_at) VALUES ($1, $2, $3)',
      [tokenHash, userId, expiresAt]
    );
  }

  async findUserId(tokenHash: string): Promise<string | null> {
    const result = await this.pool.query<{ user_id: string }>(
      'SELECT user_id FROM auth_tokens WHERE token_hash = $1 AND expires_at > NOW()',
      [tokenHash]
    );
    return result.rows[0]?.user_id ?? null;
  }

  async remove(tokenHash: string): Promise<void> {
    await this.pool.query('DELETE FROM auth_tokens WHERE token_hash = $1', [tokenHash]);
  }
}
