import Database from 'better-sqlite3';

/**
 * storage: the SQLite engine rejected a statement.
 * resource: the database file or its directory could not be opened.
 * other: anything not otherwise classified.
 */
export type RepositoryErrorKind = 'storage' | 'resource' | 'other';

/** Single error type surfaced by every repository operation. */
export class RepositoryError extends Error {
  readonly kind: RepositoryErrorKind;

  constructor(kind: RepositoryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
    this.kind = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap a thrown value from a statement; SqliteError maps to storage. */
export function toRepositoryError(err: unknown, operation: string): RepositoryError {
  if (err instanceof RepositoryError) return err;
  const kind: RepositoryErrorKind = err instanceof Database.SqliteError ? 'storage' : 'other';
  return new RepositoryError(kind, `${operation} failed: ${messageOf(err)}`, { cause: err });
}

export function resourceError(err: unknown, dbPath: string): RepositoryError {
  return new RepositoryError('resource', `Cannot open database at ${dbPath}: ${messageOf(err)}`, {
    cause: err,
  });
}
