import 'dotenv/config';
import { Pool } from 'pg';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';

// Same advisory lock id across all instances of this service
const ADVISORY_LOCK_ID = 482913;

// Resolves to api/migrations from both src/migrations and dist/migrations
const MIGRATIONS_DIR = process.env.MIGRATIONS_DIR || join(__dirname, '..', '..', 'migrations');

interface MigrationFile {
  version: number;
  file: string;
}

function listMigrations(dir: string): MigrationFile[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith('.sql') && /^\d+_/.test(f))
    .sort()
    .map((file) => ({ version: parseInt(file, 10), file }));
}

async function runMigrations(databaseUrl: string) {
  const pool = new Pool({ connectionString: databaseUrl });
  const client = await pool.connect();
  try {
    const lockResult = await client.query<{ locked: boolean }>(
      'SELECT pg_try_advisory_lock($1) AS locked',
      [ADVISORY_LOCK_ID]
    );
    if (!lockResult.rows[0].locked) {
      console.log('Another migration is running, waiting...');
      await client.query('SELECT pg_advisory_lock($1)', [ADVISORY_LOCK_ID]);
    }

    try {
      await client.query('BEGIN');

      await client.query(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          version INTEGER PRIMARY KEY,
          applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
        )
      `);

      const applied = await client.query<{ version: number }>(
        'SELECT version FROM schema_migrations ORDER BY version'
      );
      const appliedVersions = new Set(applied.rows.map((r) => r.version));

      for (const { version, file } of listMigrations(MIGRATIONS_DIR)) {
        if (appliedVersions.has(version)) {
          console.log(`Migration ${version} already applied, skipping`);
          continue;
        }

        console.log(`Applying migration ${version}: ${file}`);
        await client.query(readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'));
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
        console.log(`Applied migration ${version}`);
      }

      await client.query('COMMIT');
      console.log('Migrations completed');
    } catch (error) {
      await client.query('ROLLBACK');
      console.error('Migration failed:', error);
      throw error;
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [ADVISORY_LOCK_ID]);
    }
  } finally {
    client.release();
    await pool.end();
  }
}

const DATABASE_URL = process.env.DATABASE_URL;
if (!DATABASE_URL) {
  console.error('DATABASE_URL is required');
  process.exit(1);
}

runMigrations(DATABASE_URL).catch((error) => {
  console.error(error);
  process.exit(1);
});
