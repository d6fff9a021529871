export class GemfeedError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GemfeedError';
  }
}

export class ConfigError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class ValidationError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class DuplicateFeedError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DUPLICATE_FEED', details);
    this.name = 'DuplicateFeedError';
  }
}

export class DuplicateUserError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DUPLICATE_USER', details);
    this.name = 'DuplicateUserError';
  }
}

export class ConstraintViolationError extends GemfeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONSTRAINT_VIOLATION', details);
    this.name = 'ConstraintViolationError';
  }
}

/**
 * Extended result code of a better-sqlite3 `SqliteError`
 * (e.g. `SQLITE_CONSTRAINT_UNIQUE`), or null for anything else.
 */
export function sqliteErrorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code.startsWith('SQLITE_') ? err.code : null;
  }
  return null;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map an engine error raised by a write into the project's taxonomy.
 * Constraint failures become ConstraintViolationError, everything else DbError.
 */
export function toWriteError(
  err: unknown,
  message: string,
  details: Record<string, unknown> = {},
): GemfeedError {
  if (err instanceof GemfeedError) return err;
  const code = sqliteErrorCode(err);
  if (code !== null && code.startsWith('SQLITE_CONSTRAINT')) {
    return new ConstraintViolationError(`${message}: ${errorMessage(err)}`, {
      ...details,
      sqlite_code: code,
    });
  }
  return new DbError(`${message}: ${errorMessage(err)}`, { ...details, cause: errorMessage(err) });
}
