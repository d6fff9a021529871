import type Database from 'better-sqlite3';
import type { User } from './types.js';
import { IdSchema, UsernameSchema, parseInput } from './schema.js';
import { DbError, DuplicateUserError, NotFoundError, sqliteErrorCode, toWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export function createUser(db: Database.Database, username: string): number {
  const name = parseInput(UsernameSchema, username, 'username');

  try {
    const result = db.prepare('INSERT INTO users (username) VALUES (?)').run(name);
    const id = Number(result.lastInsertRowid);
    logger.info({ user_id: id, username: name }, 'User created');
    return id;
  } catch (err) {
    if (sqliteErrorCode(err) === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw new DuplicateUserError(`User already exists: ${name}`, { username: name });
    }
    throw toWriteError(err, 'Failed to create user', { username: name });
  }
}

export function getUser(db: Database.Database, username: string): User | undefined {
  return db.prepare('SELECT id, username FROM users WHERE username = ?').get(username.trim()) as
    | User
    | undefined;
}

export function getUserById(db: Database.Database, id: number): User | undefined {
  return db.prepare('SELECT id, username FROM users WHERE id = ?').get(id) as User | undefined;
}

/**
 * Look a user up by name, creating it on first use. This is how a connecting
 * client selects who it is acting for.
 */
export function ensureUser(db: Database.Database, username: string): User {
  const name = parseInput(UsernameSchema, username, 'username');

  try {
    db.prepare('INSERT INTO users (username) VALUES (?) ON CONFLICT(username) DO NOTHING').run(name);
  } catch (err) {
    throw toWriteError(err, 'Failed to select user', { username: name });
  }

  const user = getUser(db, name);
  if (!user) {
    throw new DbError(`User ${name} was removed while being selected`, { username: name });
  }
  return user;
}

export function listUsers(db: Database.Database): User[] {
  return db.prepare('SELECT id, username FROM users ORDER BY id ASC').all() as User[];
}

/**
 * Delete a user together with their subscriptions and views.
 */
export function deleteUser(db: Database.Database, id: number): void {
  const userId = parseInput(IdSchema, id, 'user id');

  let changes: number;
  try {
    changes = db.prepare('DELETE FROM users WHERE id = ?').run(userId).changes;
  } catch (err) {
    throw toWriteError(err, 'Failed to delete user', { user_id: userId });
  }

  if (changes === 0) {
    throw new NotFoundError(`No user with ID ${userId} exists`, { user_id: userId });
  }
  logger.info({ user_id: userId }, 'User deleted');
}
