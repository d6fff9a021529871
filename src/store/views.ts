import type Database from 'better-sqlite3';
import type { UnviewedEntry } from './types.js';
import { IdSchema, UnviewedQuerySchema, parseInput, type UnviewedQuery } from './schema.js';
import { NotFoundError, sqliteErrorCode, toWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

// ================================================================
// Read-model query
// ================================================================

// Entries of feeds the user subscribes to, minus those with a view row for
// that user. Optional filters are expressed as NULL-able bound parameters so
// the statement text never changes.
const UNVIEWED_SQL = `
  SELECT e.id, e.feed_id, f.url AS feed_url, e.title, e.published_at, e.url
  FROM feed_entries e
  JOIN subscriptions s ON s.feed_id = e.feed_id AND s.user_id = @userId
  JOIN feeds f ON f.id = e.feed_id
  WHERE NOT EXISTS (
    SELECT 1 FROM views v
    WHERE v.user_id = @userId AND v.feed_entry_id = e.id
  )
  AND (@feedId IS NULL OR e.feed_id = @feedId)
  ORDER BY e.published_at ASC, e.id ASC
  LIMIT @limit
`;

const COUNT_UNVIEWED_SQL = `
  SELECT COUNT(*) AS count
  FROM feed_entries e
  JOIN subscriptions s ON s.feed_id = e.feed_id AND s.user_id = ?
  WHERE NOT EXISTS (
    SELECT 1 FROM views v
    WHERE v.user_id = s.user_id AND v.feed_entry_id = e.id
  )
`;

export function listUnviewedEntries(
  db: Database.Database,
  userId: number,
  query: UnviewedQuery = {},
): UnviewedEntry[] {
  const { feedId, limit } = parseInput(UnviewedQuerySchema, query, 'unviewed entry query');
  return db.prepare(UNVIEWED_SQL).all({
    userId,
    feedId: feedId ?? null,
    // SQLite treats a negative LIMIT as no limit
    limit: limit ?? -1,
  }) as UnviewedEntry[];
}

export function countUnviewedEntries(db: Database.Database, userId: number): number {
  const row = db.prepare(COUNT_UNVIEWED_SQL).get(userId) as { count: number };
  return row.count;
}

// ================================================================
// Read state
// ================================================================

/**
 * Mark an entry as read by a user. Returns false when it already was.
 */
export function markViewed(db: Database.Database, userId: number, entryId: number): boolean {
  const uid = parseInput(IdSchema, userId, 'user id');
  const eid = parseInput(IdSchema, entryId, 'entry id');

  try {
    const result = db
      .prepare(
        `INSERT INTO views (user_id, feed_entry_id) VALUES (?, ?)
         ON CONFLICT(user_id, feed_entry_id) DO NOTHING`,
      )
      .run(uid, eid);
    logger.debug({ user_id: uid, entry_id: eid, changed: result.changes > 0 }, 'Entry marked viewed');
    return result.changes > 0;
  } catch (err) {
    if (sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      throw new NotFoundError(`User ${uid} or feed entry ${eid} does not exist`, {
        user_id: uid,
        entry_id: eid,
      });
    }
    throw toWriteError(err, 'Failed to mark entry viewed', { user_id: uid, entry_id: eid });
  }
}

/**
 * Mark every entry of one feed as read by a user ("mark all read").
 * Returns the number of entries newly marked.
 */
export function markFeedViewed(db: Database.Database, userId: number, feedId: number): number {
  const uid = parseInput(IdSchema, userId, 'user id');
  const fid = parseInput(IdSchema, feedId, 'feed id');

  const run = db.transaction(() => {
    const row = db
      .prepare(
        `SELECT
           EXISTS(SELECT 1 FROM users WHERE id = @userId) AS user_exists,
           EXISTS(SELECT 1 FROM feeds WHERE id = @feedId) AS feed_exists`,
      )
      .get({ userId: uid, feedId: fid }) as { user_exists: number; feed_exists: number };

    if (row.user_exists === 0) {
      throw new NotFoundError(`No user with ID ${uid} exists`, { user_id: uid });
    }
    if (row.feed_exists === 0) {
      throw new NotFoundError(`No feed with ID ${fid} exists`, { feed_id: fid });
    }

    try {
      return db
        .prepare(
          `INSERT INTO views (user_id, feed_entry_id)
           SELECT ?, id FROM feed_entries WHERE feed_id = ?
           ON CONFLICT(user_id, feed_entry_id) DO NOTHING`,
        )
        .run(uid, fid).changes;
    } catch (err) {
      throw toWriteError(err, 'Failed to mark feed viewed', { user_id: uid, feed_id: fid });
    }
  });

  const marked = run();
  logger.info({ user_id: uid, feed_id: fid, marked }, 'Feed marked viewed');
  return marked;
}

/**
 * Whether a user has read an entry. Unknown users and entries are NotFound
 * rather than "not viewed".
 */
export function isViewed(db: Database.Database, userId: number, entryId: number): boolean {
  const row = db
    .prepare(
      `SELECT
         EXISTS(SELECT 1 FROM users WHERE id = @userId) AS user_exists,
         EXISTS(SELECT 1 FROM feed_entries WHERE id = @entryId) AS entry_exists,
         EXISTS(SELECT 1 FROM views WHERE user_id = @userId AND feed_entry_id = @entryId) AS viewed`,
    )
    .get({ userId, entryId }) as { user_exists: number; entry_exists: number; viewed: number };

  if (row.user_exists === 0) {
    throw new NotFoundError(`No user with ID ${userId} exists`, { user_id: userId });
  }
  if (row.entry_exists === 0) {
    throw new NotFoundError(`No feed entry with ID ${entryId} exists`, { entry_id: entryId });
  }
  return row.viewed === 1;
}
