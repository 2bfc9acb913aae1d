export { FsLoader, FsConfigDatabase } from './fs_loader';
export type { FsConfigDatabaseOptions } from './fs_loader';
export { userConfigDir } from './user_config_dir';
