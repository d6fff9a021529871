import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrateOptions {
  /** Stop after this migration file (inclusive). */
  to?: string;
}

export interface MigrateResult {
  applied: string[];
  skipped: string[];
}

export function getMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  return new Set(rows.map((r) => r.name));
}

export function listMigrationFiles(): string[] {
  const migrationsDir = getMigrationsDir();
  if (!fs.existsSync(migrationsDir)) {
    throw new DbError(`Migrations directory not found: ${migrationsDir}`);
  }

  return fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

export function runMigrations(db: Database.Database, opts: MigrateOptions = {}): MigrateResult {
  ensureMigrationsTable(db);

  let files = listMigrationFiles();
  if (opts.to !== undefined) {
    const stop = files.indexOf(opts.to);
    if (stop === -1) {
      throw new DbError(`Unknown migration: ${opts.to}`, { migration: opts.to });
    }
    files = files.slice(0, stop + 1);
  }

  const alreadyApplied = getAppliedMigrations(db);
  const pending = files.filter((f) => !alreadyApplied.has(f));

  const applied: string[] = [];
  const skipped = [...alreadyApplied].sort();

  for (const migration of pending) {
    const sql = fs.readFileSync(path.join(getMigrationsDir(), migration), 'utf-8');

    const runInTransaction = db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration);
    });

    try {
      runInTransaction();
      applied.push(migration);
      logger.info({ migration }, 'Migration applied');
    } catch (err) {
      throw new DbError(`Migration failed: ${migration}`, {
        migration,
        cause: errorMessage(err),
      });
    }
  }

  return { applied, skipped };
}
