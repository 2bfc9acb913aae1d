import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { Loader } from '../loader';
import { errorCode, scopeOf } from '../loader';
import type { ConfigDatabase, ConfigStore } from '../../config_store';
import { BackendError, NotFoundError, UsageError, storeForLoader } from '../../config_store';
import { IDENTITY_KEY_CODEC } from '../../key_codec';
import type { Logger } from '../../logger';
import { logger as defaultLogger } from '../../logger';
import { userConfigDir } from '../fs/user_config_dir';
import type {
  ResolvedSqlitePragmas,
  SqliteConfigDatabaseOptions,
  SqliteMode,
  SqlitePragmas,
} from './sqlite_loader.types';
import {
  DEFAULT_SQLITE_PRAGMAS,
  JOURNAL_MODES,
  SQLITE_MODES,
  SYNCHRONOUS_MODES,
  TEMP_STORES,
} from './sqlite_loader.types';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS configs (
    scope TEXT NOT NULL,
    name  TEXT NOT NULL,
    data  BLOB NOT NULL,
    PRIMARY KEY (scope, name)
  )
`;

/**
 * Prepared statements shared by every scope of one connection.
 */
export interface SqliteStatements {
  list: Database.Statement<[string], { name: string }>;
  read: Database.Statement<[string, string], { data: Buffer | null }>;
  write: Database.Statement<[string, string, Buffer]>;
  remove: Database.Statement<[string, string]>;
}

export function prepareStatements(db: Database.Database): SqliteStatements {
  db.exec(SCHEMA);
  return {
    list: db.prepare<[string], { name: string }>('SELECT name FROM configs WHERE scope = ? ORDER BY name'),
    read: db.prepare<[string, string], { data: Buffer | null }>('SELECT data FROM configs WHERE scope = ? AND name = ?'),
    write: db.prepare<[string, string, Buffer]>(
      'INSERT INTO configs (scope, name, data) VALUES (?, ?, ?) ON CONFLICT (scope, name) DO UPDATE SET data = excluded.data',
    ),
    remove: db.prepare<[string, string]>('DELETE FROM configs WHERE scope = ? AND name = ?'),
  };
}

/**
 * Lock contention, possibly with an extended code such as SQLITE_BUSY_SNAPSHOT.
 */
function isContention(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'));
}

/**
 * SqliteLoader - rows of the `configs` table for one scope
 */
export class SqliteLoader implements Loader {
  readonly backend = 'sqlite';
  readonly scope: string;
  private readonly statements: SqliteStatements;

  constructor(statements: SqliteStatements, scope: string) {
    this.statements = statements;
    this.scope = scope;
  }

  private fail(operation: string, error: unknown, name?: string): BackendError {
    return new BackendError(
      { backend: this.backend, operation, scope: this.scope, entry: name, retryable: isContention(error) },
      { cause: error },
    );
  }

  async list(): Promise<string[]> {
    try {
      return this.statements.list.all(this.scope).map((row) => row.name);
    } catch (error) {
      throw this.fail('list', error);
    }
  }

  async read(name: string): Promise<Buffer> {
    let row: { data: Buffer | null } | undefined;
    try {
      row = this.statements.read.get(this.scope, name);
    } catch (error) {
      throw this.fail('read', error, name);
    }
    if (!row) {
      throw new NotFoundError(this.scope, name);
    }
    return row.data ?? Buffer.alloc(0);
  }

  async write(name: string, data: Uint8Array): Promise<void> {
    try {
      this.statements.write.run(this.scope, name, Buffer.from(data));
    } catch (error) {
      throw this.fail('write', error, name);
    }
  }

  async delete(name: string): Promise<void> {
    let changes: number;
    try {
      changes = this.statements.remove.run(this.scope, name).changes;
    } catch (error) {
      throw this.fail('delete', error, name);
    }
    if (changes === 0) {
      throw new NotFoundError(this.scope, name);
    }
  }
}

function checkChoice<T extends string>(field: string, value: T, allowed: readonly T[]): void {
  if (!allowed.includes(value)) {
    throw new UsageError(`sqlite ${field} must be one of ${allowed.join(', ')} (got "${String(value)}")`);
  }
}

function checkInteger(field: string, value: number, min?: number): void {
  if (!Number.isInteger(value) || (min !== undefined && value < min)) {
    throw new UsageError(`sqlite ${field} must be an integer${min !== undefined ? ` >= ${min}` : ''} (got ${value})`);
  }
}

/**
 * Applies defaults and checks every pragma value, so nothing user-supplied
 * reaches a PRAGMA statement unchecked.
 *
 * @throws UsageError for an invalid value
 */
export function resolveSqlitePragmas(pragmas: SqlitePragmas = {}): ResolvedSqlitePragmas {
  const resolved: ResolvedSqlitePragmas = {
    journalMode: pragmas.journalMode ?? DEFAULT_SQLITE_PRAGMAS.journalMode,
    synchronous: pragmas.synchronous ?? DEFAULT_SQLITE_PRAGMAS.synchronous,
    busyTimeoutMs: pragmas.busyTimeoutMs ?? DEFAULT_SQLITE_PRAGMAS.busyTimeoutMs,
    cacheSize: pragmas.cacheSize ?? DEFAULT_SQLITE_PRAGMAS.cacheSize,
    mmapSize: pragmas.mmapSize ?? DEFAULT_SQLITE_PRAGMAS.mmapSize,
    tempStore: pragmas.tempStore ?? DEFAULT_SQLITE_PRAGMAS.tempStore,
  };
  checkChoice('journalMode', resolved.journalMode, JOURNAL_MODES);
  checkChoice('synchronous', resolved.synchronous, SYNCHRONOUS_MODES);
  checkChoice('tempStore', resolved.tempStore, TEMP_STORES);
  checkInteger('busyTimeoutMs', resolved.busyTimeoutMs, 0);
  checkInteger('cacheSize', resolved.cacheSize);
  checkInteger('mmapSize', resolved.mmapSize, 0);
  return resolved;
}

/**
 * `<userConfigDir>/<app>/<ns...>/config.db`
 */
export function defaultSqlitePath(app: string, ...namespaces: string[]): string {
  return path.join(userConfigDir(), app, ...namespaces, 'config.db');
}

function isFileBacked(dbPath: string): boolean {
  return dbPath !== ':memory:' && dbPath !== '' && !dbPath.startsWith('file:');
}

function applyPragmas(db: Database.Database, pragmas: ResolvedSqlitePragmas): void {
  db.pragma(`journal_mode = ${pragmas.journalMode}`);
  db.pragma(`synchronous = ${pragmas.synchronous}`);
  db.pragma(`busy_timeout = ${pragmas.busyTimeoutMs}`);
  db.pragma(`cache_size = ${pragmas.cacheSize}`);
  db.pragma(`mmap_size = ${pragmas.mmapSize}`);
  db.pragma(`temp_store = ${pragmas.tempStore}`);
}

function openConnection(
  dbPath: string,
  pragmas: ResolvedSqlitePragmas,
): { db: Database.Database; statements: SqliteStatements } {
  let db: Database.Database | undefined;
  try {
    if (isFileBacked(dbPath)) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    db = new Database(dbPath, { timeout: pragmas.busyTimeoutMs });
    applyPragmas(db, pragmas);
    return { db, statements: prepareStatements(db) };
  } catch (error) {
    db?.close();
    throw new BackendError(
      { backend: 'sqlite', operation: 'open', scope: dbPath, retryable: isContention(error) },
      { cause: error },
    );
  }
}

/**
 * SqliteConfigDatabase - one connection shared by every scope it opens
 *
 * @example
 * const db = new SqliteConfigDatabase({ path: '/tmp/conf/config.db' });
 * const store = await db.open('myapp', 'testns');
 * await store.marshal('config', { Value: 'hello' });
 * await db.close();
 */
export class SqliteConfigDatabase implements ConfigDatabase {
  readonly path: string;
  readonly mode: SqliteMode;
  readonly pragmas: ResolvedSqlitePragmas;
  private readonly db: Database.Database;
  private readonly statements: SqliteStatements;
  private readonly logger: Logger;

  constructor(options: SqliteConfigDatabaseOptions) {
    const { path: dbPath, mode, logger, ...pragmas } = options;
    if (typeof dbPath !== 'string') {
      throw new UsageError('sqlite path is required');
    }
    this.mode = mode ?? 'json';
    checkChoice('mode', this.mode, SQLITE_MODES);
    this.pragmas = resolveSqlitePragmas(pragmas);
    this.path = dbPath;
    this.logger = logger ?? defaultLogger;

    const connection = openConnection(dbPath, this.pragmas);
    this.db = connection.db;
    this.statements = connection.statements;
    this.logger.debug(`opened sqlite database ${dbPath} (journal_mode=${this.pragmas.journalMode})`);
  }

  readonly open = async (app: string, ...namespaces: string[]): Promise<ConfigStore> => {
    if (!this.db.open) {
      throw new UsageError(`sqlite database ${this.path} is closed`);
    }
    const loader = new SqliteLoader(this.statements, scopeOf(app, namespaces));
    if (this.mode === 'multi') {
      return storeForLoader(loader, { mode: 'multi' });
    }
    return storeForLoader(loader, { format: 'json', keyCodec: IDENTITY_KEY_CODEC, useExtension: false });
  };

  async close(): Promise<void> {
    if (!this.db.open) return;
    this.db.close();
    this.logger.debug(`closed sqlite database ${this.path}`);
  }
}
