import type Database from 'better-sqlite3';
import type { Feed } from './types.js';
import { CreateFeedSchema, FeedUrlSchema, IdSchema, parseInput, type CreateFeedInput } from './schema.js';
import { DuplicateFeedError, NotFoundError, sqliteErrorCode, toWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export function createFeed(db: Database.Database, input: CreateFeedInput): number {
  const { url, name } = parseInput(CreateFeedSchema, input, 'feed');

  try {
    const result = db.prepare('INSERT INTO feeds (name, url) VALUES (?, ?)').run(name ?? null, url);
    const id = Number(result.lastInsertRowid);
    logger.info({ feed_id: id, url }, 'Feed created');
    return id;
  } catch (err) {
    if (sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw new DuplicateFeedError(`Feed already exists: ${url}`, { url });
    }
    throw toWriteError(err, 'Failed to create feed', { url });
  }
}

export function getFeed(db: Database.Database, id: number): Feed | undefined {
  return db.prepare('SELECT id, name, url FROM feeds WHERE id = ?').get(id) as Feed | undefined;
}

export function getFeedByUrl(db: Database.Database, url: string): Feed | undefined {
  const normalized = parseInput(FeedUrlSchema, url, 'feed url');
  return db.prepare('SELECT id, name, url FROM feeds WHERE url = ?').get(normalized) as Feed | undefined;
}

/**
 * Every known feed, oldest first. This is the poller's work list.
 */
export function listFeeds(db: Database.Database): Feed[] {
  return db.prepare('SELECT id, name, url FROM feeds ORDER BY id ASC').all() as Feed[];
}

export function getFeedEntryCounts(db: Database.Database): Array<{ feed_id: number; count: number }> {
  return db
    .prepare('SELECT feed_id, COUNT(*) AS count FROM feed_entries GROUP BY feed_id ORDER BY feed_id')
    .all() as Array<{ feed_id: number; count: number }>;
}

/**
 * Delete a feed. Entries, subscriptions and views of those entries are
 * removed by the ON DELETE CASCADE clauses.
 */
export function deleteFeed(db: Database.Database, id: number): void {
  const feedId = parseInput(IdSchema, id, 'feed id');

  let changes: number;
  try {
    changes = db.prepare('DELETE FROM feeds WHERE id = ?').run(feedId).changes;
  } catch (err) {
    throw toWriteError(err, 'Failed to delete feed', { feed_id: feedId });
  }

  if (changes === 0) {
    throw new NotFoundError(`No feed with ID ${feedId} exists`, { feed_id: feedId });
  }
  logger.info({ feed_id: feedId }, 'Feed deleted');
}
