import * as fs from 'fs';
import * as path from 'path';
import { open } from 'lmdb';
import type { Database, RootDatabase } from 'lmdb';
import type { Loader } from '../loader';
import { scopeOf } from '../loader';
import type { ConfigDatabase, ConfigStore } from '../../config_store';
import { BackendError, NotFoundError, UsageError, storeForLoader } from '../../config_store';
import type { Logger } from '../../logger';
import { logger as defaultLogger } from '../../logger';
import { userConfigDir } from '../fs/user_config_dir';

export type LmdbMode = 'json' | 'multi';

export type LmdbBucket = Database<Buffer, string>;

/**
 * LmdbLoader - one named database ("bucket") per scope
 *
 * Reads see a snapshot; writes go through LMDB's single writer.
 */
export class LmdbLoader implements Loader {
  readonly backend = 'lmdb';
  readonly scope: string;
  private readonly bucket: LmdbBucket;

  constructor(bucket: LmdbBucket, scope: string) {
    this.bucket = bucket;
    this.scope = scope;
  }

  private fail(operation: string, error: unknown, name?: string): BackendError {
    return new BackendError({ backend: this.backend, operation, scope: this.scope, entry: name }, { cause: error });
  }

  async list(): Promise<string[]> {
    try {
      const names: string[] = [];
      for (const { key, value } of this.bucket.getRange()) {
        if (value === undefined) continue;
        names.push(key);
      }
      return names;
    } catch (error) {
      throw this.fail('list', error);
    }
  }

  async read(name: string): Promise<Buffer> {
    let value: Buffer | undefined;
    try {
      value = this.bucket.get(name);
    } catch (error) {
      throw this.fail('read', error, name);
    }
    if (value === undefined) {
      throw new NotFoundError(this.scope, name);
    }
    return Buffer.from(value);
  }

  async write(name: string, data: Uint8Array): Promise<void> {
    try {
      await this.bucket.put(name, Buffer.from(data));
    } catch (error) {
      throw this.fail('write', error, name);
    }
  }

  async delete(name: string): Promise<void> {
    let removed: boolean;
    try {
      // Check and remove in one write transaction
      removed = await this.bucket.transaction(() => {
        if (this.bucket.get(name) === undefined) return false;
        return this.bucket.removeSync(name);
      });
    } catch (error) {
      throw this.fail('delete', error, name);
    }
    if (!removed) {
      throw new NotFoundError(this.scope, name);
    }
  }
}

/**
 * Options for LmdbConfigDatabase
 */
export interface LmdbConfigDatabaseOptions {
  /** Database file */
  path: string;

  /** Upper bound on the number of scopes (default: 256) */
  maxDbs?: number;

  /** default: json */
  mode?: LmdbMode;

  logger?: Logger;
}

export const DEFAULT_LMDB_MAX_DBS = 256;

/**
 * `<userConfigDir>/<app>/<ns...>/config.lmdb`
 */
export function defaultLmdbPath(app: string, ...namespaces: string[]): string {
  return path.join(userConfigDir(), app, ...namespaces, 'config.lmdb');
}

function openEnvironment(dbPath: string, maxDbs: number): RootDatabase<Buffer, string> {
  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    return open<Buffer, string>({ path: dbPath, encoding: 'binary', maxDbs });
  } catch (error) {
    throw new BackendError({ backend: 'lmdb', operation: 'open', scope: dbPath }, { cause: error });
  }
}

/**
 * LmdbConfigDatabase - embedded key/value backend
 *
 * Buckets are created the first time their scope is opened.
 *
 * @example
 * const db = new LmdbConfigDatabase({ path: '/tmp/conf/config.lmdb' });
 * const store = await db.open('myapp');
 * await store.marshal('server', { port: 8080 }); // key "server.json"
 */
export class LmdbConfigDatabase implements ConfigDatabase {
  readonly path: string;
  readonly mode: LmdbMode;
  private readonly root: RootDatabase<Buffer, string>;
  private readonly buckets = new Map<string, LmdbBucket>();
  private readonly logger: Logger;
  private closed = false;

  constructor(options: LmdbConfigDatabaseOptions) {
    const maxDbs = options.maxDbs ?? DEFAULT_LMDB_MAX_DBS;
    if (!Number.isInteger(maxDbs) || maxDbs < 1) {
      throw new UsageError(`lmdb maxDbs must be a positive integer (got ${maxDbs})`);
    }
    this.mode = options.mode ?? 'json';
    if (this.mode !== 'json' && this.mode !== 'multi') {
      throw new UsageError(`unknown lmdb mode "${String(this.mode)}"`);
    }
    this.path = options.path;
    this.logger = options.logger ?? defaultLogger;
    this.root = openEnvironment(options.path, maxDbs);
    this.logger.debug(`opened lmdb environment ${options.path}`);
  }

  private bucket(scope: string): LmdbBucket {
    const cached = this.buckets.get(scope);
    if (cached) return cached;
    try {
      const bucket = this.root.openDB<Buffer, string>({ name: scope, encoding: 'binary' });
      this.buckets.set(scope, bucket);
      return bucket;
    } catch (error) {
      throw new BackendError({ backend: 'lmdb', operation: 'open', scope }, { cause: error });
    }
  }

  readonly open = async (app: string, ...namespaces: string[]): Promise<ConfigStore> => {
    if (this.closed) {
      throw new UsageError(`lmdb environment ${this.path} is closed`);
    }
    const scope = scopeOf(app, namespaces);
    const loader = new LmdbLoader(this.bucket(scope), scope);
    return storeForLoader(loader, this.mode === 'multi' ? { mode: 'multi' } : { format: 'json' });
  };

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buckets.clear();
    await this.root.close();
    this.logger.debug(`closed lmdb environment ${this.path}`);
  }
}
