import type { Logger } from '../../logger';

export type JournalMode = 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY' | 'WAL' | 'OFF';
export type SynchronousMode = 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
export type TempStore = 'DEFAULT' | 'FILE' | 'MEMORY';

/**
 * - json: bare key names, JSON documents
 * - multi: encoded names with format extension, every known format
 */
export type SqliteMode = 'json' | 'multi';

export const JOURNAL_MODES: readonly JournalMode[] = ['DELETE', 'TRUNCATE', 'PERSIST', 'MEMORY', 'WAL', 'OFF'];
export const SYNCHRONOUS_MODES: readonly SynchronousMode[] = ['OFF', 'NORMAL', 'FULL', 'EXTRA'];
export const TEMP_STORES: readonly TempStore[] = ['DEFAULT', 'FILE', 'MEMORY'];
export const SQLITE_MODES: readonly SqliteMode[] = ['json', 'multi'];

/**
 * Connection tuning. Every pragma is validated before it is applied.
 */
export interface SqlitePragmas {
  /** default: WAL */
  journalMode?: JournalMode;
  /** default: NORMAL */
  synchronous?: SynchronousMode;
  /** Wait for locks before reporting SQLITE_BUSY (default: 5000) */
  busyTimeoutMs?: number;
  /** Negative values are KiB, positive values pages (default: -2000) */
  cacheSize?: number;
  /** default: 64 MiB */
  mmapSize?: number;
  /** default: MEMORY */
  tempStore?: TempStore;
}

/**
 * Options for SqliteConfigDatabase
 */
export interface SqliteConfigDatabaseOptions extends SqlitePragmas {
  /** Database file, or ":memory:" */
  path: string;

  /** default: json */
  mode?: SqliteMode;

  logger?: Logger;
}

export type ResolvedSqlitePragmas = Required<SqlitePragmas>;

export const DEFAULT_SQLITE_PRAGMAS: ResolvedSqlitePragmas = Object.freeze({
  journalMode: 'WAL',
  synchronous: 'NORMAL',
  busyTimeoutMs: 5000,
  cacheSize: -2000,
  mmapSize: 64 * 1024 * 1024,
  tempStore: 'MEMORY',
});
