export {
  ConsoleLogger,
  NoopLogger,
  createDefaultLoggingConfig,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LogContext,
  type LoggingConfig,
} from './logging.js';
