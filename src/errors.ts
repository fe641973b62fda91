/**
 * Error types shared by the store, caches, migrator and CLI.
 * Every error carries a stable code and the context it failed in.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'STORE_ERROR'
  | 'MIGRATION_ERROR'
  | 'CACHE_FORMAT_ERROR'
  | 'UNKNOWN_ERROR';

export type StoreErrorKind = 'busy' | 'storage' | 'corruption' | 'permission' | 'disk-full';

export class WorkdexError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WorkdexError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export class ConfigError extends WorkdexError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', context, options);
    this.name = 'ConfigError';
  }
}

export class StoreError extends WorkdexError {
  constructor(
    message: string,
    public readonly kind: StoreErrorKind,
    public readonly operation: string,
    public readonly key?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'STORE_ERROR', { kind, operation, key }, options);
    this.name = 'StoreError';
  }

  get retryable(): boolean {
    return this.kind === 'busy';
  }
}

export class MigrationError extends WorkdexError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, 'MIGRATION_ERROR', context, options);
    this.name = 'MigrationError';
  }
}

export class CacheFormatError extends WorkdexError {
  constructor(message: string, public readonly file: string, options?: { cause?: unknown }) {
    super(message, 'CACHE_FORMAT_ERROR', { file }, options);
    this.name = 'CacheFormatError';
  }
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a SQLite result code (SQLITE_BUSY, SQLITE_FULL, ...) or a filesystem errno
 * to a store error kind. Extended codes such as SQLITE_BUSY_SNAPSHOT map to their
 * primary code.
 */
export function classifySqliteError(error: unknown): StoreErrorKind {
  const code = sqliteCode(error) ?? '';
  if (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED')) return 'busy';
  if (code.startsWith('SQLITE_FULL') || code === 'ENOSPC') return 'disk-full';
  if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') return 'permission';
  if (code.startsWith('SQLITE_CORRUPT') || code.startsWith('SQLITE_NOTADB')) return 'corruption';
  if (
    code.startsWith('SQLITE_PERM') ||
    code.startsWith('SQLITE_READONLY') ||
    code.startsWith('SQLITE_CANTOPEN') ||
    code.startsWith('SQLITE_AUTH')
  ) {
    return 'permission';
  }
  return 'storage';
}

export function isErrno(error: unknown, code: string): boolean {
  return sqliteCode(error) === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a low-level error with the operation and key that failed.
 * StoreErrors pass through untouched.
 */
export function wrapStoreError(error: unknown, operation: string, key?: string): StoreError {
  if (error instanceof StoreError) return error;
  const kind = classifySqliteError(error);
  const target = key ? ` (${key})` : '';
  return new StoreError(`${operation}${target} failed: ${errorMessage(error)}`, kind, operation, key, { cause: error });
}

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  config: 2,
  storage: 3,
  permission: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.config;
  if (error instanceof StoreError) {
    return error.kind === 'permission' ? EXIT_CODES.permission : EXIT_CODES.storage;
  }
  const code = error instanceof Error && 'code' in error ? error.code : undefined;
  if (code === 'EACCES' || code === 'EPERM') return EXIT_CODES.permission;
  return EXIT_CODES.failure;
}
