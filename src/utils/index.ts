/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { consoleLogger, silentLogger, type Logger } from './logger.js';

export { ok, err, type Result } from './result.js';

export {
  withTimeout,
  checkCancelled,
  yieldToEventLoop,
  mapWithConcurrency,
  type MapWithConcurrencyOptions,
} from './async.js';

export {
  DEFAULT_PREVIEW_LENGTH,
  truncateText,
  formatFileSize,
  formatDuration,
  formatScore,
} from './format.js';
