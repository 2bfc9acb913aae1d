export { LmdbLoader, LmdbConfigDatabase, defaultLmdbPath, DEFAULT_LMDB_MAX_DBS } from './lmdb_loader';
export type { LmdbMode, LmdbBucket, LmdbConfigDatabaseOptions } from './lmdb_loader';
