/**
 * @entry Shared infrastructure
 *
 * - Result<T,E>: explicit success/failure (ok/err/fromPromise)
 * - AppError: coded errors with category and suggestion (printError)
 * - Logger: scoped stderr loggers (createLogger/setLogLevel/logError)
 */

export { type Result, ok, err, fromPromise } from './result.js'

export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  isPermissionError,
  isNotFoundError,
  printError,
} from './error.js'

export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  setLogLevel,
  createLogger,
  logError,
} from './logger.js'

export { getErrorMessage, ensureError } from './assertError.js'
