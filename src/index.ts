export * from './quirks';
export * from './markup';
export * from './collections';
export * from './config';
export { MissingFieldError, MarkupParseError } from './common/errors';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
