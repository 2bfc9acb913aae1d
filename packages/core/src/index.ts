/**
 * @confstore/core
 *
 * Interfaces, descriptors, key codec, marshallers, stores and tracer.
 * No backend is exported here. Use the entry points:
 * - @confstore/core/fs
 * - @confstore/core/memory
 * - @confstore/core/sqlite
 * - @confstore/core/lmdb
 * - @confstore/core/datastore
 * - @confstore/core/factory
 */

export * from './config_store';
export * from './key_codec';
export * from './marshaller';
export * from './loader';
export * from './store_tracer';

export * as Logger from './logger';
