/**
 * rxbind error system
 *
 * Every error rxbind throws is an {@link RxBindError} carrying a code
 * (RXBIND_B100, RXBIND_D201, ...), a category and a suggestion.
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  RxBindError,
  type RxBindErrorOptions,
  type SerializedRxBindError,
} from './rxbind-error.js';
