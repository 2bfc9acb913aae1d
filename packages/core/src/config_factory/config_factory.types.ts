import type { FormatName } from '../marshaller';
import type { StoreMode, Opener } from '../config_store';
import type { SqliteMode, SqlitePragmas } from '../loader/sqlite';
import type { LmdbMode } from '../loader/lmdb';
import type { DatastoreClient } from '../loader/datastore';
import type { MemoryData } from '../loader/memory';
import type { TracerSettings } from '../store_tracer';
import type { Logger } from '../logger';

export type ConfigStoreBackend = 'directory' | 'sqlite' | 'lmdb' | 'datastore' | 'memory';

export const CONFIG_STORE_BACKENDS: readonly ConfigStoreBackend[] = ['directory', 'sqlite', 'lmdb', 'datastore', 'memory'];

export interface DirectoryFactoryOptions {
  /** Root directory (default: userConfigDir()) */
  path?: string;
  mode?: StoreMode;
  /** Simple mode only (default: toml) */
  format?: FormatName;
}

export interface SqliteFactoryOptions extends SqlitePragmas {
  /** One shared database file. Without it each scope gets `<userConfigDir>/<app>/<ns...>/config.db`. */
  path?: string;
  mode?: SqliteMode;
}

export interface LmdbFactoryOptions {
  /** One shared environment. Without it each scope gets `<userConfigDir>/<app>/<ns...>/config.lmdb`. */
  path?: string;
  maxDbs?: number;
  mode?: LmdbMode;
}

export interface DatastoreFactoryOptions {
  projectId?: string;
  namespace?: string;
  kind?: string;
}

export interface MemoryFactoryOptions {
  mode?: StoreMode;
  format?: FormatName;
}

/**
 * Backend selection plus the settings of each backend. Only the section
 * of the selected backend is used.
 */
export interface FactoryOptions {
  backend: ConfigStoreBackend;
  directory?: DirectoryFactoryOptions;
  sqlite?: SqliteFactoryOptions;
  lmdb?: LmdbFactoryOptions;
  datastore?: DatastoreFactoryOptions;
  memory?: MemoryFactoryOptions;
  trace?: TracerSettings;
}

/**
 * Collaborators the factory would otherwise create itself.
 */
export interface ConfigStoreFactoryDeps {
  logger?: Logger;

  /** Replaces the Google Cloud client of the datastore backend */
  datastoreClient?: DatastoreClient;

  /** Backing map of the memory backend */
  memoryData?: MemoryData;
}

export interface ConfigStoreFactory {
  readonly backend: ConfigStoreBackend;
  readonly open: Opener;

  /** Closes every handle the factory opened */
  close(): Promise<void>;
}
