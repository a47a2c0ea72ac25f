/**
 * rxbind Error Codes
 *
 * Error codes are structured as RXBIND_[CATEGORY][NUMBER]:
 * - B: Binding errors (B100-B199)
 * - D: Data source errors (D200-D299)
 * - P: Delegate proxy errors (P300-P399)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Binding errors (B100-B199)
  RXBIND_B100: {
    code: 'RXBIND_B100',
    message: 'Element can be bound to user interface only on the main context.',
    suggestion:
      'Deliver UI-bound streams on the window event loop, e.g. with observeOn(asapScheduler) outside a worker.',
  },
  RXBIND_B101: {
    code: 'RXBIND_B101',
    message: 'Binding error to UI',
    suggestion:
      'Handle errors before binding, e.g. catchError(() => EMPTY), or configure onBindingError.',
  },

  // Data source errors (D200-D299)
  RXBIND_D200: {
    code: 'RXBIND_D200',
    message: 'No sectioned data source is installed',
    suggestion: 'modelAt() only works after binding items with rx(view).items* methods.',
  },
  RXBIND_D201: {
    code: 'RXBIND_D201',
    message: 'Index path is out of range',
    suggestion: 'Check that the index path refers to an item of the last bound value.',
  },
  RXBIND_D202: {
    code: 'RXBIND_D202',
    message: 'No cell is registered for the reuse identifier',
    suggestion: 'Call view.register(identifier, factory) before dequeuing cells.',
  },
  RXBIND_D203: {
    code: 'RXBIND_D203',
    message: 'Dequeued cell has an unexpected type',
    suggestion: 'Make the registered factory create elements of the requested cellType.',
  },
  RXBIND_D204: {
    code: 'RXBIND_D204',
    message: 'Model has an unexpected type',
    suggestion: 'Pass a type guard that matches the models bound to the view.',
  },

  // Delegate proxy errors (P300-P399)
  RXBIND_P300: {
    code: 'RXBIND_P300',
    message: 'A forward delegate is already installed',
    suggestion: 'Dispose the previous binding before installing another data source.',
  },

  // Internal errors (X900-X999)
  RXBIND_X900: {
    code: 'RXBIND_X900',
    message: 'Internal error',
    suggestion: 'This is likely a bug in rxbind. Please report it.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'binding' | 'data-source' | 'proxy' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(7);
  switch (letter) {
    case 'B':
      return 'binding';
    case 'D':
      return 'data-source';
    case 'P':
      return 'proxy';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
