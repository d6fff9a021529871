export { openDb, closeDb, type OpenDbOptions } from './db/db.js';
export { runMigrations, listMigrationFiles, type MigrateOptions, type MigrateResult } from './db/migrate.js';
export { SeedSchema, parseSeedYaml, loadSeedFile, seedDatabase, clearData, type Seed, type SeedStats } from './db/seed.js';
export { resetDatabase, type ResetOptions, type ResetResult } from './db/reset.js';

export { createFeed, getFeed, getFeedByUrl, listFeeds, getFeedEntryCounts, deleteFeed } from './store/feeds.js';
export {
  recordEntry,
  recordEntries,
  getEntry,
  listEntries,
  deleteEntry,
  type RecordBatchStats,
} from './store/entries.js';
export { createUser, getUser, getUserById, ensureUser, listUsers, deleteUser } from './store/users.js';
export {
  subscribe,
  subscribeToUrl,
  unsubscribe,
  listSubscribedFeeds,
  listSubscribers,
} from './store/subscriptions.js';
export {
  markViewed,
  markFeedViewed,
  isViewed,
  listUnviewedEntries,
  countUnviewedEntries,
} from './store/views.js';
export type { Feed, FeedEntry, User, Subscription, View, UnviewedEntry, RecordResult } from './store/types.js';
export type { CreateFeedInput, RecordEntryInput, UnviewedQuery } from './store/schema.js';

export {
  GemfeedError,
  ConfigError,
  DbError,
  ValidationError,
  NotFoundError,
  DuplicateFeedError,
  DuplicateUserError,
  ConstraintViolationError,
} from './shared/errors.js';
export { loadConfig, resetConfigCache, ConfigSchema, type Config } from './shared/config.js';
export { logger } from './shared/logger.js';
