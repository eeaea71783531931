export {
  ConsoleLogger,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  type ConsoleLoggerOptions,
  type LogSink,
} from './console-logger.js';
