/**
 * Filesystem-dependent implementations
 *
 * Use @confstore/core/memory for in-memory alternatives.
 */

export { FsLoader, FsConfigDatabase, userConfigDir } from './loader/fs';
export type { FsConfigDatabaseOptions } from './loader/fs';
