import type Database from 'better-sqlite3';
import type { FeedEntry, RecordResult } from './types.js';
import {
  IdSchema,
  ListEntriesSchema,
  RecordEntrySchema,
  parseInput,
  type RecordEntryInput,
} from './schema.js';
import { NotFoundError, sqliteErrorCode, toWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface RecordBatchStats {
  inserted: number;
  duplicates: number;
}

// The conflict target is the dedup key, so a re-fetched entry is a no-op
// while any other constraint failure still raises.
const INSERT_ENTRY_SQL = `
  INSERT INTO feed_entries (feed_id, title, published_at, url)
  VALUES (@feedId, @title, @publishedAt, @url)
  ON CONFLICT(feed_id, published_at, url) DO NOTHING
`;

function insertEntry(db: Database.Database, input: RecordEntryInput): RecordResult {
  const entry = parseInput(RecordEntrySchema, input, 'feed entry');

  try {
    const result = db.prepare(INSERT_ENTRY_SQL).run(entry);
    if (result.changes === 0) {
      return { status: 'duplicate' };
    }
    return { status: 'inserted', id: Number(result.lastInsertRowid) };
  } catch (err) {
    if (sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      throw new NotFoundError(`No feed with ID ${entry.feedId} exists`, { feed_id: entry.feedId });
    }
    throw toWriteError(err, 'Failed to record feed entry', {
      feed_id: entry.feedId,
      url: entry.url,
    });
  }
}

/**
 * Record one entry seen in a feed. Recording the same
 * (feed, published_at, url) again is reported as a duplicate and changes nothing.
 */
export function recordEntry(db: Database.Database, input: RecordEntryInput): RecordResult {
  const result = insertEntry(db, input);
  logger.debug({ feed_id: input.feedId, url: input.url, status: result.status }, 'Entry recorded');
  return result;
}

/**
 * Record everything one fetch of a feed produced, in a single transaction.
 */
export function recordEntries(
  db: Database.Database,
  feedId: number,
  entries: Array<Omit<RecordEntryInput, 'feedId'>>,
): RecordBatchStats {
  const stats: RecordBatchStats = { inserted: 0, duplicates: 0 };
  if (entries.length === 0) return stats;

  const runBatch = db.transaction(() => {
    for (const entry of entries) {
      const result = insertEntry(db, { ...entry, feedId });
      if (result.status === 'inserted') {
        stats.inserted++;
      } else {
        stats.duplicates++;
      }
    }
  });
  runBatch();

  logger.info({ feed_id: feedId, ...stats }, 'Feed entries recorded');
  return stats;
}

export function getEntry(db: Database.Database, id: number): FeedEntry | undefined {
  return db
    .prepare('SELECT id, feed_id, title, published_at, url FROM feed_entries WHERE id = ?')
    .get(id) as FeedEntry | undefined;
}

/**
 * Entries of one feed in publish order. With `since`, only entries published
 * strictly after that cursor.
 */
export function listEntries(
  db: Database.Database,
  feedId: number,
  opts: { since?: string } = {},
): FeedEntry[] {
  const { since } = parseInput(ListEntriesSchema, opts, 'entry listing options');

  if (since === undefined) {
    return db
      .prepare(
        `SELECT id, feed_id, title, published_at, url FROM feed_entries
         WHERE feed_id = ?
         ORDER BY published_at ASC, id ASC`,
      )
      .all(feedId) as FeedEntry[];
  }

  return db
    .prepare(
      `SELECT id, feed_id, title, published_at, url FROM feed_entries
       WHERE feed_id = ? AND published_at > ?
       ORDER BY published_at ASC, id ASC`,
    )
    .all(feedId, since) as FeedEntry[];
}

export function deleteEntry(db: Database.Database, id: number): void {
  const entryId = parseInput(IdSchema, id, 'entry id');

  let changes: number;
  try {
    changes = db.prepare('DELETE FROM feed_entries WHERE id = ?').run(entryId).changes;
  } catch (err) {
    throw toWriteError(err, 'Failed to delete feed entry', { entry_id: entryId });
  }

  if (changes === 0) {
    throw new NotFoundError(`No feed entry with ID ${entryId} exists`, { entry_id: entryId });
  }
  logger.debug({ entry_id: entryId }, 'Feed entry deleted');
}
