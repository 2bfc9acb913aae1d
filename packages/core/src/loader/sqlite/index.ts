export {
  SqliteLoader,
  SqliteConfigDatabase,
  defaultSqlitePath,
  resolveSqlitePragmas,
  prepareStatements,
} from './sqlite_loader';
export type { SqliteStatements } from './sqlite_loader';
export type {
  JournalMode,
  SynchronousMode,
  TempStore,
  SqliteMode,
  SqlitePragmas,
  SqliteConfigDatabaseOptions,
  ResolvedSqlitePragmas,
} from './sqlite_loader.types';
export { DEFAULT_SQLITE_PRAGMAS, JOURNAL_MODES, SYNCHRONOUS_MODES, TEMP_STORES, SQLITE_MODES } from './sqlite_loader.types';
