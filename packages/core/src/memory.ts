/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for processes that only need scratch configuration.
 */

export { MemoryLoader, MemoryConfigDatabase } from './loader/memory';
export type { MemoryData, MemoryConfigDatabaseOptions } from './loader/memory';

export { MemoryDatastoreClient } from './loader/datastore/memory_datastore_client';
