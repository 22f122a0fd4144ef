/**
 * Logging Module
 *
 * @module logging
 */

export {
  createConsoleLogger,
  silentLogger,
  describeError,
  type Logger,
  type LogLevel,
  type ConsoleLoggerOptions,
} from './logger.js';
