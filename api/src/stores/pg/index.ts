import { Pool } from 'pg';
import type { Stores } from '../types';
import { PgCatalogStore } from './catalog';
import { PgRecipeStore } from './recipes';
import { PgTokenStore } from './tokens';
import { PgUserStore } from './users';

export { createPool } from './db';

export function createPgStores(pool: Pool): Stores {
  return {
    users: new PgUserStore(pool),
    catalog: new PgCatalogStore(pool),
    recipes: new PgRecipeStore(pool),
    tokens: new PgTokenStore(pool),
    ping: async () => {
      await pool.query('SELECT 1');
    },
  };
}
