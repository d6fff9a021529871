import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { openDb, closeDb } from './db.js';
import { runMigrations } from './migrate.js';
import { loadSeedFile, seedDatabase, type SeedStats } from './seed.js';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface ResetOptions {
  path: string;
  /** Required to remove an existing database file. */
  destroyData: boolean;
  /** Fixture to load after migrating; omit to leave the database empty. */
  seedFile?: string;
  busyTimeoutMs?: number;
}

export interface ResetResult {
  path: string;
  destroyed: boolean;
  migrations: string[];
  seeded: SeedStats | null;
}

/**
 * Recreate a local database from scratch: delete it (only with destroyData),
 * apply every migration and load the fixture.
 */
export function resetDatabase(opts: ResetOptions): ResetResult {
  const dbPath = resolvePath(opts.path);
  const exists = fs.existsSync(dbPath);

  if (exists && !opts.destroyData) {
    throw new DbError(
      `Database ${dbPath} exists. If you're sure you want to delete it, re-run with --destroy-data.`,
      { path: dbPath },
    );
  }

  // Parse the fixture first so a bad file neither destroys nor creates anything
  const seed = opts.seedFile ? loadSeedFile(opts.seedFile) : null;

  if (exists) {
    logger.warn({ path: dbPath }, 'Destroying existing database');
    for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
      try {
        fs.rmSync(file, { force: true });
      } catch (err) {
        throw new DbError(`Failed to remove ${file}`, { path: file, cause: errorMessage(err) });
      }
    }
  }

  const db: Database.Database = openDb(dbPath, { busyTimeoutMs: opts.busyTimeoutMs });
  try {
    const { applied } = runMigrations(db);
    const seeded = seed ? seedDatabase(db, seed) : null;
    logger.info({ path: dbPath, migrations: applied.length, seeded: seeded !== null }, 'Database reset');
    return { path: dbPath, destroyed: exists, migrations: applied, seeded };
  } finally {
    closeDb(db);
  }
}
