/**
 * @fileoverview Logging exports
 */

export {
  TrailLogger,
  getLogger,
  createLogger,
  resetLogger,
  isLogLevel,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
