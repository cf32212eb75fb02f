/**
 * @fileoverview Barrel exports for the error handler utilities.
 * @module src/utils/internal/error-handler/index
 */

export { ErrorHandler } from './errorHandler.js';
export { getErrorMessage, getErrorName } from './helpers.js';
export type {
  BaseErrorMapping,
  ErrorContext,
  ErrorHandlerOptions,
} from './types.js';
