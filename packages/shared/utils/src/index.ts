// Shared utilities for filefollow

export {
  ConsoleLogger,
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  parseLogLevel,
  type LogLevel,
  type Logger,
} from './logger.js';
