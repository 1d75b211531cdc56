import { Pool } from 'pg';
import type { MembershipRelation } from '../types';

/**
 * Unique (owner, target) edge table. `add` relies on the table's unique
 * constraint: a conflicting insert affects zero rows.
 */
export class PgRelation implements MembershipRelation {
  constructor(
    private readonly pool: Pool,
    private readonly table: string,
    private readonly ownerColumn: string,
    private readonly targetColumn: string
  ) {}

  async add(ownerId: string, targetId: string): Promise<boolean> {
    const result = await this.pool.query(
      `INSERT INTO ${this.table} (${this.ownerColumn}, ${this.targetColumn})
       VALUES ($1, $2)
       ON CONFLICT (${this.ownerColumn}, ${this.targetColumn}) DO NOTHING`,
      [ownerId, targetId]
    );
    return result.rowCount === 1;
  }

  async remove(ownerId: string, targetId: string): Promise<boolean> {
    const result = await this.pool.query(
      `DELETE FROM ${this.table} WHERE ${this.ownerColumn} = $1 AND ${this.targetColumn} = $2`,
      [ownerId, targetId]
    );
    return result.rowCount === 1;
  }

  async targetsOf(ownerId: string, targetIds: string[]): Promise<Set<string>> {
    if (targetIds.length === 0) return new Set();

    const result = await this.pool.query<{ target_id: string }>(
      `SELECT ${this.targetColumn} AS target_id FROM ${this.table}
       WHERE ${this.ownerColumn} = $1 AND ${this.targetColumn} = ANY($2::uuid[])`,
      [ownerId, targetIds]
    );
    return new Set(result.rows.map((row) => row.target_id));
  }
}
