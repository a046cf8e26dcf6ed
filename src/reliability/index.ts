export { createLogger, loggerFor, DEFAULT_LOGGER_OPTIONS } from './logger';
export type { Logger, LoggerOptions, LogLevel, LogFormat, LogContext } from './types';
