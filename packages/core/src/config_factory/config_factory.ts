import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import type { ConfigDatabase, Opener } from '../config_store';
import { UsageError, validateLayout } from '../config_store';
import { FsConfigDatabase } from '../loader/fs';
import { MemoryConfigDatabase } from '../loader/memory';
import { SqliteConfigDatabase, defaultSqlitePath, resolveSqlitePragmas } from '../loader/sqlite';
import { LmdbConfigDatabase, defaultLmdbPath } from '../loader/lmdb';
import { DatastoreConfigDatabase } from '../loader/datastore';
import { StoreTracer } from '../store_tracer';
import type { Logger } from '../logger';
import { logger as defaultLogger } from '../logger';
import type {
  ConfigStoreFactory,
  ConfigStoreFactoryDeps,
  DirectoryFactoryOptions,
  FactoryOptions,
  LmdbFactoryOptions,
  SqliteFactoryOptions,
} from './config_factory.types';
import factoryOptionsSchema from './factory_options.schema.json';

const ajv = new Ajv({ allErrors: true, verbose: true });
const validateFactoryOptions = ajv.compile<FactoryOptions>(factoryOptionsSchema);

function describeViolation(error: ErrorObject): string {
  const at = error.instancePath || '/';
  if (error.instancePath === '/backend' && error.keyword === 'enum') {
    return `unknown config store type ${JSON.stringify(error.data)}`;
  }
  const additional: unknown = error.params['additionalProperty'];
  if (error.keyword === 'additionalProperties' && typeof additional === 'string') {
    return `${at}: unknown option "${additional}"`;
  }
  return `${at}: ${error.message ?? 'is invalid'}`;
}

/**
 * Validates untrusted factory options (parsed flags, a JSON config file).
 *
 * @throws UsageError listing every violation
 */
export function parseFactoryOptions(input: unknown): FactoryOptions {
  if (!validateFactoryOptions(input)) {
    const violations = (validateFactoryOptions.errors ?? []).map(describeViolation);
    throw new UsageError(`invalid config store options: ${violations.join('; ')}`);
  }
  // Combinations the schema does not express
  validateLayout(input.directory ?? {});
  validateLayout(input.memory ?? {});
  if (input.sqlite) resolveSqlitePragmas(input.sqlite);
  return input;
}

/**
 * Database handles keyed by path, opened on first use.
 */
class HandleCache<D extends ConfigDatabase> {
  private readonly handles = new Map<string, D>();

  get(path: string, create: () => D): D {
    let handle = this.handles.get(path);
    if (!handle) {
      handle = create();
      this.handles.set(path, handle);
    }
    return handle;
  }

  async closeAll(): Promise<void> {
    const handles = Array.from(this.handles.values());
    this.handles.clear();
    await Promise.all(handles.map((handle) => handle.close()));
  }
}

function fromDatabase(db: ConfigDatabase): { open: Opener; close: () => Promise<void> } {
  return { open: db.open, close: () => db.close() };
}

function sqliteBackend(options: SqliteFactoryOptions, logger: Logger): { open: Opener; close: () => Promise<void> } {
  const { path: sharedPath, ...settings } = options;
  const handles = new HandleCache<SqliteConfigDatabase>();
  const open: Opener = async (app, ...namespaces) => {
    const dbPath = sharedPath ?? defaultSqlitePath(app, ...namespaces);
    const db = handles.get(dbPath, () => new SqliteConfigDatabase({ ...settings, path: dbPath, logger }));
    return db.open(app, ...namespaces);
  };
  return { open, close: () => handles.closeAll() };
}

function lmdbBackend(options: LmdbFactoryOptions, logger: Logger): { open: Opener; close: () => Promise<void> } {
  const { path: sharedPath, ...settings } = options;
  const handles = new HandleCache<LmdbConfigDatabase>();
  const open: Opener = async (app, ...namespaces) => {
    const dbPath = sharedPath ?? defaultLmdbPath(app, ...namespaces);
    const db = handles.get(dbPath, () => new LmdbConfigDatabase({ ...settings, path: dbPath, logger }));
    return db.open(app, ...namespaces);
  };
  return { open, close: () => handles.closeAll() };
}

/**
 * Resolves validated options into an Opener for the selected backend.
 * Everything that can be checked without touching storage is checked
 * here, before the first open.
 *
 * @example
 * const factory = createConfigStoreFactory(parseFactoryOptions({
 *   backend: 'sqlite',
 *   sqlite: { path: '/tmp/conf/config.db' },
 *   trace: { enabled: true },
 * }));
 * const store = await factory.open('myapp', 'testns');
 * await factory.close();
 *
 * @throws UsageError for invalid options
 */
export function createConfigStoreFactory(options: FactoryOptions, deps: ConfigStoreFactoryDeps = {}): ConfigStoreFactory {
  const parsed = parseFactoryOptions(options);
  const logger = deps.logger ?? defaultLogger;

  let backend: { open: Opener; close: () => Promise<void> };
  switch (parsed.backend) {
    case 'directory': {
      const directory: DirectoryFactoryOptions = parsed.directory ?? {};
      const { path: basePath, ...layout } = directory;
      backend = fromDatabase(new FsConfigDatabase({ ...layout, basePath, logger }));
      break;
    }
    case 'memory':
      backend = fromDatabase(new MemoryConfigDatabase({ ...parsed.memory, initial: deps.memoryData }));
      break;
    case 'datastore':
      backend = fromDatabase(new DatastoreConfigDatabase({ ...parsed.datastore, logger }, deps.datastoreClient));
      break;
    case 'sqlite':
      backend = sqliteBackend(parsed.sqlite ?? {}, logger);
      break;
    case 'lmdb':
      backend = lmdbBackend(parsed.lmdb ?? {}, logger);
      break;
  }

  const open = parsed.trace ? new StoreTracer(parsed.trace, logger).wrapOpener(backend.open) : backend.open;
  logger.debug(`config store backend: ${parsed.backend}`);
  return { backend: parsed.backend, open, close: backend.close };
}
