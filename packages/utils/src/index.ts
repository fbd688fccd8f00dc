/**
 * @tiersync/utils
 * 
 * Shared utilities package containing:
 * - Structured logging
 * - Retry logic
 * - File helpers
 * - Type guards
 * - Time helpers
 */

// File operations
export {
  calculateFileHash,
  getFileSizeBytes,
  statIfExists,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Type guards
export { isString, isErrnoException } from './guards.js';

// Time utilities
export {
  sleep,
  formatDuration,
} from './time.js';

// Logger
export { logger, createLogger, createRootLogger, type Logger, type RootLoggerOptions } from './logger.js';
