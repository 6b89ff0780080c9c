export { logger, log, setLogLevel, getLogLevel, isLogLevel, serializeError } from './observability/logger';
export type { Logger, LogLevel, LogEntry } from './observability/logger';
