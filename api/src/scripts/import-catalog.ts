import 'dotenv/config';
import { Pool } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

const DATA_DIR = process.env.CATALOG_DATA_DIR || join(__dirname, '..', '..', 'data');

const ingredientsSchema = z.array(
  z.object({
    name: z.string().trim().min(1).max(128),
    measurement_unit: z.string().trim().min(1).max(64),
  })
);

const tagsSchema = z.array(
  z.object({
    name: z.string().trim().min(1).max(32),
    slug: z.string().regex(/^[-a-zA-Z0-9_]+$/).max(32),
    color: z.string().regex(/^#[0-9A-Fa-f]{6}$/),
  })
);

function readData<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> {
  const raw: unknown = JSON.parse(readFileSync(join(DATA_DIR, file), 'utf-8'));
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`${file} is malformed: ${result.error.message}`);
  }
  return result.data;
}

async function importCatalog(databaseUrl: string) {
  const ingredients = readData('ingredients.json', ingredientsSchema);
  const tags = readData('tags.json', tagsSchema);

  const pool = new Pool({ connectionString: databaseUrl });
  try {
    // Existing rows are matched on their unique constraints and left as they are
    const ingredientResult = await pool.query(
      `INSERT INTO ingredients (id, name, measurement_unit)
       SELECT * FROM unnest($1::uuid[], $2::text[], $3::text[])
       ON CONFLICT ON CONSTRAINT ingredients_name_unit_key DO NOTHING`,
      [
        ingredients.map(() => uuidv4()),
        ingredients.map((i) => i.name),
        ingredients.map((i) => i.measurement_unit),
      ]
    );
    console.log(`Imported ${ingredientResult.rowCount ?? 0} of ${ingredients.length} ingredients`);

    const tagResult = await pool.query(
      `INSERT INTO tags (id, name, slug, color)
       SELECT * FROM unnest($1::uuid[], $2::text[], $3::text[], $4::text[])
       ON CONFLICT DO NOTHING`,
      [tags.map(() => uuidv4()), tags.map((t) => t.name), tags.map((t) => t.slug), tags.map((t) => t.color)]
    );
    console.log(`Imported ${tagResult.rowCount ?? 0} of ${tags.length} tags`);
  } finally {
    await pool.end();
  }
}

const DATABASE_URL = process.env.DATABASE_URL;
if (!DATABASE_URL) {
  console.error('DATABASE_URL is required');
  process.exit(1);
}

importCatalog(DATABASE_URL).catch((error) => {
  console.error('Catalog import failed:', error);
  process.exit(1);
});
