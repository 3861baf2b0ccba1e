/**
 * Apply pending SQL migrations from database/migrations in file-name order.
 * Each file runs in its own transaction and is recorded in schema_versions.
 *
 * Usage: npm run migrate
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { db } from '../src/db';
import { dbLogger } from '../src/logger';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const migrationsDir = path.join(__dirname, '../database/migrations');

function versionOf(fileName: string): string {
  return path.basename(fileName, '.sql');
}

async function appliedVersions(): Promise<Set<string>> {
  await db.query(
    `CREATE TABLE IF NOT EXISTS schema_versions (
       version TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );
  const result = await db.query<{ version: string }>('SELECT version FROM schema_versions');
  return new Set(result.rows.map((row) => row.version));
}

async function applyMigration(fileName: string): Promise<void> {
  const sql = fs.readFileSync(path.join(migrationsDir, fileName), 'utf-8');
  const version = versionOf(fileName);

  await db.transaction(async (query) => {
    await query(sql);
    await query('INSERT INTO schema_versions (version) VALUES ($1)', [version]);
  });

  dbLogger.info({ version }, 'Migration applied');
}

async function main(): Promise<void> {
  const files = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  const applied = await appliedVersions();
  const pending = files.filter((file) => !applied.has(versionOf(file)));

  if (pending.length === 0) {
    dbLogger.info('Schema is up to date');
    return;
  }

  for (const file of pending) {
    await applyMigration(file);
  }
}

main()
  .then(() => db.close())
  .catch(async (error: unknown) => {
    dbLogger.error({ err: error }, 'Migration failed');
    await db.close();
    process.exit(1);
  });
