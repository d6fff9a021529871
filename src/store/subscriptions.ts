import type Database from 'better-sqlite3';
import type { Feed, User } from './types.js';
import { IdSchema, parseInput } from './schema.js';
import { createFeed, getFeed, getFeedByUrl } from './feeds.js';
import { NotFoundError, sqliteErrorCode, toWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Subscribe a user to a feed. Returns false when the subscription already
 * existed; the store is left unchanged in that case.
 */
export function subscribe(db: Database.Database, userId: number, feedId: number): boolean {
  const uid = parseInput(IdSchema, userId, 'user id');
  const fid = parseInput(IdSchema, feedId, 'feed id');

  try {
    const result = db
      .prepare(
        `INSERT INTO subscriptions (user_id, feed_id) VALUES (?, ?)
         ON CONFLICT(user_id, feed_id) DO NOTHING`,
      )
      .run(uid, fid);

    if (result.changes === 0) {
      logger.debug({ user_id: uid, feed_id: fid }, 'Already subscribed');
      return false;
    }
    logger.info({ user_id: uid, feed_id: fid }, 'Subscribed');
    return true;
  } catch (err) {
    if (sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
      throw new NotFoundError(`User ${uid} or feed ${fid} does not exist`, {
        user_id: uid,
        feed_id: fid,
      });
    }
    throw toWriteError(err, 'Failed to subscribe', { user_id: uid, feed_id: fid });
  }
}

/**
 * Subscribe a user to a feed by url, registering the feed if nobody has
 * subscribed to it before.
 */
export function subscribeToUrl(
  db: Database.Database,
  userId: number,
  url: string,
  name?: string,
): { feed: Feed; created: boolean } {
  const run = db.transaction(() => {
    const existing = getFeedByUrl(db, url);
    const feedId = existing ? existing.id : createFeed(db, { url, name });
    const feed = existing ?? getFeed(db, feedId);
    if (!feed) {
      throw new NotFoundError(`No feed with ID ${feedId} exists`, { feed_id: feedId });
    }
    subscribe(db, userId, feed.id);
    return { feed, created: existing === undefined };
  });
  return run();
}

export function unsubscribe(db: Database.Database, userId: number, feedId: number): boolean {
  const result = db
    .prepare('DELETE FROM subscriptions WHERE user_id = ? AND feed_id = ?')
    .run(userId, feedId);
  if (result.changes > 0) {
    logger.info({ user_id: userId, feed_id: feedId }, 'Unsubscribed');
  }
  return result.changes > 0;
}

export function listSubscribedFeeds(db: Database.Database, userId: number): Feed[] {
  return db
    .prepare(
      `SELECT f.id, f.name, f.url
       FROM subscriptions s
       JOIN feeds f ON f.id = s.feed_id
       WHERE s.user_id = ?
       ORDER BY f.id ASC`,
    )
    .all(userId) as Feed[];
}

export function listSubscribers(db: Database.Database, feedId: number): User[] {
  return db
    .prepare(
      `SELECT u.id, u.username
       FROM subscriptions s
       JOIN users u ON u.id = s.user_id
       WHERE s.feed_id = ?
       ORDER BY u.id ASC`,
    )
    .all(feedId) as User[];
}
