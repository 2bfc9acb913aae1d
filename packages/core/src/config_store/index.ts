/**
 * ConfigStore - named configuration documents over pluggable backends
 *
 * IMPORTANT: This module exports the store layer only, no backend.
 * For backends, use:
 * - @confstore/core/fs for FsConfigDatabase
 * - @confstore/core/sqlite, /lmdb, /datastore for database backends
 * - @confstore/core/memory for tests
 */

export type { ConfigStore, Opener, ConfigDatabase } from './config_store';
export type { Descriptor, DescriptorInput, KeyDescriptor, FormatDescriptor } from './descriptor';
export { key, formatKey, toDescriptor, describeDescriptor } from './descriptor';
export type { SimpleStoreOptions } from './simple_store';
export { SimpleStore } from './simple_store';
export type { MultiFormatOptions } from './multi_format_store';
export { MultiFormat } from './multi_format_store';
export type { StoreBinding } from './binding';
export { bind } from './binding';
export type { ConfigStoreErrorCode } from './config_store.errors';
export {
  ConfigStoreError,
  NotFoundError,
  UsageError,
  SerializationError,
  BackendError,
  AggregateStoreError,
  isNotFound,
  isUsageError,
  toError,
} from './config_store.errors';
export type { StoreMode, StoreLayout } from './store_layout';
export { storeForLoader, validateLayout, DEFAULT_FORMAT } from './store_layout';
