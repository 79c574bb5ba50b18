import fs from 'node:fs';
import path from 'node:path';
import type { SQLiteDatabase } from './client.js';

function ensureMigrationsTable(db: SQLiteDatabase) {
  db.exec(`CREATE TABLE IF NOT EXISTS __migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`);
}

function readMigration(fullPath: string): string {
  // Strip UTF-8 BOMs, editors on some platforms add them
  return fs.readFileSync(fullPath, 'utf8').replace(/\ufeff/g, '');
}

/** Applies pending `*.sql` files in name order and returns their names. */
export function runMigrations(db: SQLiteDatabase, migrationsDir: string): string[] {
  if (!migrationsDir) {
    throw new Error('SQLite migrations directory not configured');
  }
  const resolvedDir = path.resolve(migrationsDir);
  if (!fs.existsSync(resolvedDir)) {
    throw new Error(`SQLite migrations directory ${resolvedDir} does not exist`);
  }
  ensureMigrationsTable(db);
  const files = fs
    .readdirSync(resolvedDir)
    .filter(name => name.endsWith('.sql'))
    .sort();
  const applied: string[] = [];
  for (const file of files) {
    const alreadyApplied = db.prepare('SELECT 1 FROM __migrations WHERE name = ? LIMIT 1').get(file);
    if (alreadyApplied) {
      continue;
    }
    db.exec(readMigration(path.join(resolvedDir, file)));
    db.prepare('INSERT INTO __migrations (name, applied_at) VALUES (?, ?)').run(file, new Date().toISOString());
    applied.push(file);
  }
  return applied;
}
