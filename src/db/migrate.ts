import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';

const MIGRATIONS_TABLE = 'migrations';

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      run_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedMigrations(pool: Pool): Promise<Set<string>> {
  const res = await pool.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE};`);
  return new Set(res.rows.map((row) => row.name));
}

export function getMigrationsDir(): string {
  return path.join(__dirname, '..', '..', 'migrations');
}

export function loadMigrationFiles(migrationsDir: string = getMigrationsDir()): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql') && /^\d+_/.test(file))
    .sort();
}

async function runMigrationFile(pool: Pool, fileName: string): Promise<void> {
  const sql = fs.readFileSync(path.join(getMigrationsDir(), fileName), 'utf8');

  logger.info(`Running migration: ${fileName}`);

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query(
      `INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1) ON CONFLICT (name) DO NOTHING;`,
      [fileName]
    );
    await client.query('COMMIT');
    logger.info(`Migration completed: ${fileName}`);
  } catch (err) {
    await client.query('ROLLBACK');
    logger.error(`Migration failed: ${fileName}`, { error: String(err) });
    throw err;
  } finally {
    client.release();
  }
}

export async function runMigrations(pool: Pool): Promise<void> {
  await ensureMigrationsTable(pool);

  const applied = await getAppliedMigrations(pool);
  const files = loadMigrationFiles();

  logger.info(`Found ${files.length} migration(s), ${applied.size} already applied`);

  for (const file of files) {
    if (applied.has(file)) continue;
    await runMigrationFile(pool, file);
  }

  logger.info('All migrations completed');
}

// Run as a script
if (require.main === module) {
  const pool = new Pool(getDatabaseConfig());
  runMigrations(pool)
    .catch((err) => {
      logger.error('Migration process failed', { error: String(err) });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
