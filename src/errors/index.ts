/**
 * Error handling module for docqa
 *
 * Usage:
 *   import { ConfigurationError, handleError } from './errors/index.js';
 *
 *   throw new ConfigurationError('Invalid option', 'Try: docqa config list');
 */

// Error types
export {
  RAGError,
  ConfigurationError,
  FileNotFoundError,
  NoDataError,
  ConnectivityError,
  MalformedResponseError,
  DimensionMismatchError,
  QueryError,
  ValidationError,
  OperationCancelledError,
  type ErrorKind,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  getFailureExitCode,
  handleError,
  createGlobalErrorHandler,
  toRAGError,
  toFailure,
  type ErrorHandlerOptions,
  type ErrorOutput,
  type Failure,
} from './handler.js';
