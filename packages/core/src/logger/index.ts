export type { LogLevel, Logger } from './logger';
export { ConsoleLogger, createLogger, defaultLogLevel, isLogLevel, logger } from './logger';
