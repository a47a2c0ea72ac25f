import { RxBindError } from '../errors/rxbind-error.js';
import { describeError } from '../observability/logger.js';
import { getBindingConfig, isBindingDebug } from './config.js';

/**
 * Report an error that arrived on a stream bound to the user interface.
 *
 * Errors are never applied to views. A configured `onBindingError` handler
 * receives the error; otherwise debug configurations throw `RXBIND_B101`
 * and release configurations log it.
 */
export function bindingErrorToInterface(error: unknown): void {
  const config = getBindingConfig();

  if (config.onBindingError) {
    config.onBindingError(error);
    return;
  }

  if (isBindingDebug()) {
    throw new RxBindError({
      code: 'RXBIND_B101',
      message: `Binding error to UI: ${describeError(error).message}`,
      cause: error,
    });
  }

  config.logger.error('Binding error to UI', error);
}
