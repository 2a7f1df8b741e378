/**
 * Apply the SQL files in ./migrations that have not run yet, in file-name
 * order, each in its own transaction. Applied files are recorded by name in
 * `schema_migrations`.
 *
 * Usage: npm run migrate
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { query, getClient, disconnect } from './client.js';
import { logger } from '../config/logger.js';

// tsc does not copy .sql files, so dist/ falls back to the source tree
const MIGRATIONS_DIR = [path.join(__dirname, 'migrations'), path.resolve(process.cwd(), 'src/db/migrations')].find(
  (candidate) => existsSync(candidate)
);

export function pendingMigrations(files: readonly string[], applied: ReadonlySet<string>): string[] {
  return files.filter((file) => file.endsWith('.sql') && !applied.has(file)).sort();
}

async function appliedMigrations(): Promise<Set<string>> {
  await query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      file_name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMP NOT NULL DEFAULT NOW()
    )
  `);
  const result = await query<{ file_name: string }>('SELECT file_name FROM schema_migrations');
  return new Set(result.rows.map((row) => row.file_name));
}

async function applyMigration(directory: string, fileName: string): Promise<void> {
  const sql = await fs.readFile(path.join(directory, fileName), 'utf-8');
  const client = await getClient();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (file_name) VALUES ($1)', [fileName]);
    await client.query('COMMIT');
    logger.info(`Applied migration ${fileName}`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${fileName} failed`, { error });
    throw error;
  } finally {
    client.release();
  }
}

export async function runMigrations(): Promise<number> {
  if (!MIGRATIONS_DIR) {
    throw new Error('Migrations directory not found');
  }

  try {
    const pending = pendingMigrations(await fs.readdir(MIGRATIONS_DIR), await appliedMigrations());
    for (const fileName of pending) {
      await applyMigration(MIGRATIONS_DIR, fileName);
    }
    logger.info(`Migrations complete (${pending.length} applied)`);
    return pending.length;
  } finally {
    await disconnect();
  }
}

if (require.main === module) {
  runMigrations().catch((error) => {
    logger.error('Migration failed', { error });
    process.exit(1);
  });
}
