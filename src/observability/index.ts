export {
  LogLevel,
  parseLogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  formatLine,
} from './logger.js';

export type { Logger, LogLevelName, ConsoleLoggerOptions, LogEntry } from './logger.js';
