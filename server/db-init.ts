import { readdir, readFile } from 'node:fs/promises';
import { sql } from 'drizzle-orm';
import { db } from './db';
import { logger } from './core/logger';

const MIGRATIONS_DIR = new URL('./migrations/', import.meta.url);

export function sortMigrationFiles(files: readonly string[]): string[] {
  return files.filter(file => /^\d+_.+\.sql$/.test(file)).sort();
}

/**
 * Applies every server/migrations/*.sql file that is not yet recorded in
 * schema_migrations, in file-name order, each in its own transaction.
 */
export async function applyMigrations(): Promise<string[]> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name varchar(255) PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);

  const applied = await db.execute<{ name: string }>(sql`SELECT name FROM schema_migrations`);
  const done = new Set(applied.rows.map(row => row.name));
  const pending = sortMigrationFiles(await readdir(MIGRATIONS_DIR)).filter(file => !done.has(file));

  for (const file of pending) {
    const text = await readFile(new URL(file, MIGRATIONS_DIR), 'utf8');
    await db.transaction(async (tx) => {
      await tx.execute(sql.raw(text));
      await tx.execute(sql`INSERT INTO schema_migrations (name) VALUES (${file})`);
    });
    logger.info(`[DB Init] Applied migration ${file}`);
  }

  if (pending.length === 0) {
    logger.info('[DB Init] Schema is up to date');
  }
  return pending;
}

export async function setupEmailNormalization(): Promise<void> {
  await db.execute(sql`
    CREATE OR REPLACE FUNCTION normalize_email()
    RETURNS TRIGGER
    LANGUAGE plpgsql
    SET search_path = ''
    AS $$
    BEGIN
      IF NEW.email IS NOT NULL THEN
        NEW.email := LOWER(TRIM(NEW.email));
      END IF;
      RETURN NEW;
    END;
    $$;
  `);
  await db.execute(sql`DROP TRIGGER IF EXISTS normalize_users_email ON users`);
  await db.execute(sql`
    CREATE TRIGGER normalize_users_email
    BEFORE INSERT OR UPDATE OF email ON users
    FOR EACH ROW EXECUTE FUNCTION normalize_email()
  `);
  logger.info('[DB Init] Email normalization trigger ready');
}
