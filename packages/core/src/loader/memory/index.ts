export { MemoryLoader, MemoryConfigDatabase } from './memory_loader';
export type { MemoryData, MemoryConfigDatabaseOptions } from './memory_loader';
