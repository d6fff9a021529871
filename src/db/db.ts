import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface OpenDbOptions {
  busyTimeoutMs?: number;
}

/**
 * Open a database handle. The caller owns it: pass it to the stores and
 * close it with closeDb() when done.
 */
export function openDb(dbPath: string, opts: OpenDbOptions = {}): Database.Database {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${Math.trunc(opts.busyTimeoutMs ?? 5000)}`);
  } catch (err) {
    throw new DbError(`Failed to initialize database at ${resolved}`, {
      path: resolved,
      cause: errorMessage(err),
    });
  }

  // Cascading deletes are left to the engine, so enforcement must be on.
  if (db.pragma('foreign_keys', { simple: true }) !== 1) {
    db.close();
    throw new DbError('SQLite foreign key enforcement is unavailable', { path: resolved });
  }

  logger.debug({ path: resolved }, 'Database initialized');
  return db;
}

export function closeDb(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
