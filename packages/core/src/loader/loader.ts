/**
 * Loader Interface
 *
 * Byte-level persistence for one scope (`app/ns1/ns2`) of a backend.
 * Stores layer key encoding and serialization on top; loaders only move
 * bytes under opaque names.
 *
 * Implementations:
 * - FsLoader: one file per name under `<root>/<app>/<ns...>`
 * - SqliteLoader: rows of the `configs` table keyed by (scope, name)
 * - LmdbLoader: one named database per scope
 * - DatastoreLoader: entities under a per-scope ancestor
 * - MemoryLoader: in-process maps, for tests
 *
 * Contract shared by every implementation:
 * - `read` and `delete` of an absent name reject with NotFoundError
 * - `write` creates or fully replaces the entry
 * - any other failure rejects with BackendError carrying the cause
 */
export interface Loader {
  /** Backend identifier used in error and trace messages */
  readonly backend: string;

  /** Scope served by this loader, segments joined with `/` */
  readonly scope: string;

  /** Stored names. Only the SQLite loader guarantees an order. */
  list(): Promise<string[]>;

  read(name: string): Promise<Buffer>;

  write(name: string, data: Uint8Array): Promise<void>;

  delete(name: string): Promise<void>;
}

/**
 * Joins an application name and its namespaces into the scope string
 * stored by database backends.
 */
export function scopeOf(app: string, namespaces: readonly string[]): string {
  return [app, ...namespaces].join('/');
}

/**
 * Error code attached by Node (`ENOENT`) or native drivers (`SQLITE_BUSY`).
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
