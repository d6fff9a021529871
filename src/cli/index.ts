#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getDefaultSeedFile, getGemfeedDir, resolvePath } from '../shared/utils.js';
import { GemfeedError, NotFoundError, errorMessage } from '../shared/errors.js';
import { openDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadSeedFile, seedDatabase } from '../db/seed.js';
import { resetDatabase } from '../db/reset.js';
import { diagnose } from './doctor.js';
import { IdSchema, parseInput } from '../store/schema.js';
import { createFeed, deleteFeed, getFeedEntryCounts, listFeeds } from '../store/feeds.js';
import { listEntries } from '../store/entries.js';
import { createUser, getUser, listUsers } from '../store/users.js';
import { subscribeToUrl, unsubscribe } from '../store/subscriptions.js';
import { listUnviewedEntries, markViewed } from '../store/views.js';

const program = new Command();

program
  .name('gemfeed')
  .description('Manage the storage of a Gemini feed aggregator')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database, and apply migrations')
  .action(async () => {
    const configPath = path.join(getGemfeedDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig(true);
    const db = openDb(config.db.path, { busyTimeoutMs: config.db.busy_timeout_ms });
    try {
      const { applied } = runMigrations(db);
      log(
        applied.length > 0
          ? `✓ ${resolvePath(config.db.path)} ready (${applied.length} migrations applied)`
          : `✓ ${resolvePath(config.db.path)} already up to date`,
      );
    } finally {
      closeDb(db);
    }
  });

// === migrate ===
program
  .command('migrate')
  .description('Apply pending schema migrations')
  .option('--to <name>', 'Stop after this migration file')
  .action(async (opts: { to?: string }) => {
    const config = await loadConfig();
    const db = openDb(config.db.path, { busyTimeoutMs: config.db.busy_timeout_ms });
    try {
      const { applied } = runMigrations(db, { to: opts.to });
      if (applied.length === 0) {
        log('✓ No pending migrations');
      }
      for (const name of applied) {
        log(`✓ ${name}`);
      }
    } finally {
      closeDb(db);
    }
  });

// === reset ===
program
  .command('reset')
  .description('Recreate the database from scratch and load the seed fixture')
  .option('--destroy-data', 'Delete the existing database file', false)
  .option('--no-seed', 'Leave the new database empty')
  .action(async (opts: { destroyData: boolean; seed: boolean }) => {
    const config = await loadConfig();
    const result = resetDatabase({
      path: config.db.path,
      destroyData: opts.destroyData,
      seedFile: opts.seed ? seedFileFor(config) : undefined,
      busyTimeoutMs: config.db.busy_timeout_ms,
    });

    if (result.destroyed) log(`✓ Destroyed ${result.path}`);
    log(`✓ ${result.migrations.length} migrations applied`);
    if (result.seeded) {
      log(
        `✓ Seeded ${result.seeded.feeds} feeds, ${result.seeded.users} users, ${result.seeded.subscriptions} subscriptions`,
      );
    }
  });

// === seed ===
program
  .command('seed')
  .description('Replace all data with a seed fixture')
  .option('-f, --file <path>', 'Seed fixture (YAML)')
  .action(async (opts: { file?: string }) => {
    await withDb((db, config) => {
      const file = opts.file ? resolvePath(opts.file) : seedFileFor(config);
      const stats = seedDatabase(db, loadSeedFile(file));
      log(`✓ Seeded ${stats.feeds} feeds, ${stats.users} users, ${stats.subscriptions} subscriptions`);
    });
  });

// === doctor ===
program
  .command('doctor')
  .description('Check config and database health')
  .action(async () => {
    const results = await diagnose();
    log(`✓ ${results.join(' | ')}`);
  });

// === feed ===
const feedCmd = program.command('feed').description('Manage feeds');

feedCmd
  .command('add <url>')
  .description('Register a feed')
  .option('-n, --name <name>', 'Display name')
  .action(async (url: string, opts: { name?: string }) => {
    await withDb((db) => {
      const id = createFeed(db, { url, name: opts.name });
      log(`✓ Feed ${id} added: ${url}`);
    });
  });

feedCmd
  .command('list')
  .description('List feeds with their entry counts')
  .action(async () => {
    await withDb((db) => {
      const counts = new Map(getFeedEntryCounts(db).map((row) => [row.feed_id, row.count]));
      const feeds = listFeeds(db);
      if (feeds.length === 0) {
        log('No feeds.');
        return;
      }
      for (const feed of feeds) {
        const entries = String(counts.get(feed.id) ?? 0).padStart(5);
        log(`${String(feed.id).padStart(4)}  ${entries} entries  ${feed.url}${feed.name ? `  (${feed.name})` : ''}`);
      }
    });
  });

feedCmd
  .command('remove <id>')
  .description('Delete a feed with its entries and subscriptions')
  .action(async (id: string) => {
    await withDb((db) => {
      const feedId = parseId(id);
      deleteFeed(db, feedId);
      log(`✓ Feed ${feedId} removed`);
    });
  });

// === user ===
const userCmd = program.command('user').description('Manage users');

userCmd
  .command('add <username>')
  .description('Create a user')
  .action(async (username: string) => {
    await withDb((db) => {
      const id = createUser(db, username);
      log(`✓ User ${id} added: ${username}`);
    });
  });

userCmd
  .command('list')
  .description('List users')
  .action(async () => {
    await withDb((db) => {
      for (const user of listUsers(db)) {
        log(`${String(user.id).padStart(4)}  ${user.username}`);
      }
    });
  });

// === subscriptions ===
program
  .command('subscribe <username> <url>')
  .description('Subscribe a user to a feed url, registering the feed if needed')
  .option('-n, --name <name>', 'Display name for a new feed')
  .action(async (username: string, url: string, opts: { name?: string }) => {
    await withDb((db) => {
      const user = requireUser(db, username);
      const { feed, created } = subscribeToUrl(db, user.id, url, opts.name);
      log(`✓ ${user.username} subscribed to feed ${feed.id}${created ? ' (new feed)' : ''}`);
    });
  });

program
  .command('unsubscribe <username> <feed-id>')
  .description('Remove a subscription')
  .action(async (username: string, feedId: string) => {
    await withDb((db) => {
      const user = requireUser(db, username);
      const removed = unsubscribe(db, user.id, parseId(feedId));
      log(removed ? '✓ Unsubscribed' : `${user.username} is not subscribed to feed ${feedId}`);
    });
  });

// === entries & read state ===
program
  .command('entries <feed-id>')
  .description('List the entries of a feed')
  .option('--since <cursor>', 'Only entries published after this date')
  .action(async (feedId: string, opts: { since?: string }) => {
    await withDb((db) => {
      for (const entry of listEntries(db, parseId(feedId), { since: opts.since })) {
        log(`${String(entry.id).padStart(5)}  ${entry.published_at}  ${entry.title}  ${entry.url}`);
      }
    });
  });

program
  .command('unread <username>')
  .description("List unread entries of a user's subscriptions")
  .option('-l, --limit <n>', 'Maximum number of entries')
  .action(async (username: string, opts: { limit?: string }) => {
    await withDb((db) => {
      const user = requireUser(db, username);
      const entries = listUnviewedEntries(db, user.id, {
        limit: opts.limit ? parseId(opts.limit) : undefined,
      });
      if (entries.length === 0) {
        log('No unread entries.');
        return;
      }
      for (const entry of entries) {
        log(`${String(entry.id).padStart(5)}  ${entry.published_at}  ${entry.feed_url}  ${entry.title}  ${entry.url}`);
      }
    });
  });

program
  .command('read <username> <entry-id>')
  .description('Mark an entry as read')
  .action(async (username: string, entryId: string) => {
    await withDb((db) => {
      const user = requireUser(db, username);
      const marked = markViewed(db, user.id, parseId(entryId));
      log(marked ? '✓ Marked read' : 'Already read');
    });
  });

// === Helpers ===
async function withDb(fn: (db: Database.Database, config: Config) => void): Promise<void> {
  const config = await loadConfig();
  const dbPath = resolvePath(config.db.path);

  if (!fs.existsSync(dbPath)) {
    throw new NotFoundError(`Database not found at ${dbPath}. Run gemfeed init first.`);
  }

  const db = openDb(dbPath, { busyTimeoutMs: config.db.busy_timeout_ms });
  try {
    runMigrations(db);
    fn(db, config);
  } finally {
    closeDb(db);
  }
}

function requireUser(db: Database.Database, username: string) {
  const user = getUser(db, username);
  if (!user) {
    throw new NotFoundError(`No user named ${username}`);
  }
  return user;
}

function seedFileFor(config: Config): string {
  return config.seed.file ? resolvePath(config.seed.file) : getDefaultSeedFile();
}

function parseId(value: string): number {
  return parseInput(IdSchema, Number(value), 'id');
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

function logError(msg: string): void {
  // eslint-disable-next-line no-console
  console.error(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof GemfeedError) {
    logError(`✗ ${err.message}`);
  } else {
    logError(`✗ Unexpected error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
});
