import fs from 'node:fs';
import { loadConfig, type Config } from '../shared/config.js';
import { resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { openDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { listFeeds } from '../store/feeds.js';
import { listUsers } from '../store/users.js';

/**
 * Health report lines for `gemfeed doctor`. Config and database failures are
 * reported separately instead of thrown.
 */
export async function diagnose(load: () => Promise<Config> = () => loadConfig()): Promise<string[]> {
  let config: Config;
  try {
    config = await load();
  } catch (err) {
    return [`Config: error (${errorMessage(err)})`];
  }

  const results = ['Config: ok'];
  const dbPath = resolvePath(config.db.path);
  if (!fs.existsSync(dbPath)) {
    results.push('DB: missing (run gemfeed init)');
    return results;
  }

  try {
    const db = openDb(dbPath, { busyTimeoutMs: config.db.busy_timeout_ms });
    try {
      const { applied } = runMigrations(db);
      results.push(applied.length > 0 ? `DB: ok (${applied.length} migrations applied)` : 'DB: ok');
      results.push(`Feeds: ${listFeeds(db).length}`);
      results.push(`Users: ${listUsers(db).length}`);
    } finally {
      closeDb(db);
    }
  } catch (err) {
    results.push(`DB: error (${errorMessage(err)})`);
  }
  return results;
}
