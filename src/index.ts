export * from './lib/websocket';
export { Logger, LogLevel, logger, createLogger } from './lib/utils/logger';
export type { LogContext, LogLevelName, LogLevelValue } from './lib/utils/logger';
