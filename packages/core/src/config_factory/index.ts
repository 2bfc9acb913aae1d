export { parseFactoryOptions, createConfigStoreFactory } from './config_factory';
export { CONFIG_STORE_BACKENDS } from './config_factory.types';
export type {
  ConfigStoreBackend,
  ConfigStoreFactory,
  ConfigStoreFactoryDeps,
  FactoryOptions,
  DirectoryFactoryOptions,
  SqliteFactoryOptions,
  LmdbFactoryOptions,
  DatastoreFactoryOptions,
  MemoryFactoryOptions,
} from './config_factory.types';
