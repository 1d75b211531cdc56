import { Pool } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type { NewUser, PageRequest, PageResult, UserRecord, UserStore } from '../types';
import { rethrowConstraint } from './db';
import { PgRelation } from './relations';

const USER_COLUMNS = 'u.id, u.email, u.username, u.first_name, u.last_name, u.password_hash, u.avatar, u.created_at';

export class PgUserStore implements UserStore {
  readonly subscriptions: PgRelation;

  constructor(private readonly pool: Pool) {
    this.subscriptions = new PgRelation(pool, 'subscriptions', 'follower_id', 'author_id');
  }

  async create(user: NewUser): Promise<UserRecord> {
    try {
      const result = await this.pool.query<UserRecord>(
        `INSERT INTO users AS u (id, email, username, first_name, last_name, password_hash)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${USER_COLUMNS}`,
        [uuidv4(), user.email, user.username, user.first_name, user.last_name, user.password_hash]
      );
      return result.rows[0];
    } catch (error) {
      rethrowConstraint(error);
    }
  }

  async findById(id: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRecord>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRecord>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.email = $1`,
      [email]
    );
    return result.rows[0] ?? null;
  }

  async findByIds(ids: string[]): Promise<UserRecord[]> {
    if (ids.length === 0) return [];
    const result = await this.pool.query<UserRecord>(
      `SELECT ${USER_COLUMNS} FROM users u WHERE u.id = ANY($1::uuid[])`,
      [ids]
    );
    return result.rows;
  }

  async list(page: PageRequest): Promise<PageResult<UserRecord>> {
    const countResult = await this.pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM users');
    const result = await this.pool.query<UserRecord>(
      `SELECT ${USER_COLUMNS} FROM users u
       ORDER BY u.created_at, u.id
       LIMIT $1 OFFSET $2`,
      [page.limit, page.offset]
    );
    return { count: parseInt(countResult.rows[0].count, 10), rows: result.rows };
  }

  async listFollowed(followerId: string, page: PageRequest): Promise<PageResult<UserRecord>> {
    const countResult = await this.pool.query<{ count: string }>(
      'SELECT COUNT(*) AS count FROM subscriptions WHERE follower_id = $1',
      [followerId]
    );
    const result = await this.pool.query<UserRecord>(
      `SELECT ${USER_COLUMNS} FROM subscriptions s
       JOIN users u ON u.id = s.author_id
       WHERE s.follower_id = $1
       ORDER BY s.created_at DESC, u.id
       LIMIT $2 OFFSET $3`,
      [followerId, page.limit, page.offset]
    );
    return { count: parseInt(countResult.rows[0].count, 10), rows: result.rows };
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    await this.pool.query('UPDATE users SET password_hash = $1 WHERE id = $2', [passwordHash, id]);
  }

  async updateAvatar(id: string, avatar: string | null): Promise<void> {
    await this.pool.query('UPDATE users SET avatar = $1 WHERE id = $2', [avatar, id]);
  }
}
