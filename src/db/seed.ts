import fs from 'node:fs';
import { z } from 'zod';
import { parse as yamlParse } from 'yaml';
import type Database from 'better-sqlite3';
import { FeedUrlSchema, UsernameSchema } from '../store/schema.js';
import { DbError, ValidationError, errorMessage, toWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const SeedSchema = z
  .object({
    feeds: z
      .array(z.object({ url: FeedUrlSchema, name: z.string().trim().min(1).optional() }))
      .default([]),
    users: z.array(z.object({ username: UsernameSchema })).default([]),
    subscriptions: z
      .array(z.object({ username: UsernameSchema, feed_url: FeedUrlSchema }))
      .default([]),
  })
  .superRefine((seed, ctx) => {
    const urls = new Set(seed.feeds.map((f) => f.url));
    const usernames = new Set(seed.users.map((u) => u.username));
    seed.subscriptions.forEach((sub, i) => {
      if (!usernames.has(sub.username)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['subscriptions', i, 'username'],
          message: `Unknown user: ${sub.username}`,
        });
      }
      if (!urls.has(sub.feed_url)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['subscriptions', i, 'feed_url'],
          message: `Unknown feed: ${sub.feed_url}`,
        });
      }
    });
  });

export type Seed = z.infer<typeof SeedSchema>;

export interface SeedStats {
  feeds: number;
  users: number;
  subscriptions: number;
}

export function parseSeedYaml(content: string): Seed {
  const raw = yamlParse(content) as unknown;
  const result = SeedSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ValidationError('Invalid seed fixture', {
      errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

export function loadSeedFile(filePath: string): Seed {
  if (!fs.existsSync(filePath)) {
    throw new DbError(`Seed file not found: ${filePath}`, { path: filePath });
  }
  return parseSeedYaml(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Remove every row from the data tables. Schema and migration history stay.
 */
export function clearData(db: Database.Database): void {
  db.transaction(() => {
    for (const table of ['views', 'subscriptions', 'feed_entries', 'users', 'feeds']) {
      db.prepare(`DELETE FROM ${table}`).run();
    }
    // Restart AUTOINCREMENT so fixture ids are stable across reseeds
    db.prepare(
      "DELETE FROM sqlite_sequence WHERE name IN ('feeds', 'feed_entries', 'users')",
    ).run();
  })();
}

/**
 * Replace the database contents with a fixture. Rows get ids in fixture order
 * starting at 1.
 */
export function seedDatabase(db: Database.Database, seed: Seed): SeedStats {
  const run = db.transaction((): SeedStats => {
    clearData(db);

    const feedIds = new Map<string, number>();
    const insertFeed = db.prepare('INSERT INTO feeds (name, url) VALUES (?, ?)');
    for (const feed of seed.feeds) {
      feedIds.set(feed.url, Number(insertFeed.run(feed.name ?? null, feed.url).lastInsertRowid));
    }

    const userIds = new Map<string, number>();
    const insertUser = db.prepare('INSERT INTO users (username) VALUES (?)');
    for (const user of seed.users) {
      userIds.set(user.username, Number(insertUser.run(user.username).lastInsertRowid));
    }

    const insertSubscription = db.prepare(
      'INSERT INTO subscriptions (user_id, feed_id) VALUES (?, ?) ON CONFLICT(user_id, feed_id) DO NOTHING',
    );
    let subscriptions = 0;
    for (const sub of seed.subscriptions) {
      const userId = userIds.get(sub.username);
      const feedId = feedIds.get(sub.feed_url);
      if (userId === undefined || feedId === undefined) {
        throw new ValidationError('Seed subscription references an unknown user or feed', { ...sub });
      }
      subscriptions += insertSubscription.run(userId, feedId).changes;
    }

    return { feeds: feedIds.size, users: userIds.size, subscriptions };
  });

  try {
    const stats = run();
    logger.info({ ...stats }, 'Database seeded');
    return stats;
  } catch (err) {
    throw toWriteError(err, 'Failed to seed database', { cause: errorMessage(err) });
  }
}
