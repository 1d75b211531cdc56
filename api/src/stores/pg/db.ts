import { DatabaseError, Pool, type PoolClient } from 'pg';
import { UniqueConstraintError } from '../../errors';

const UNIQUE_VIOLATION = '23505';

export function createPool(databaseUrl: string, max: number): Pool {
  return new Pool({
    connectionString: databaseUrl,
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });
}

export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/** Rethrows unique violations as UniqueConstraintError, anything else untouched. */
export function rethrowConstraint(error: unknown): never {
  if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION && error.constraint) {
    throw new UniqueConstraintError(error.constraint);
  }
  throw error;
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
