import { RxBindError } from '../errors/rxbind-error.js';
import { getBindingConfig } from './config.js';

/** Whether the caller runs on the configured main context */
export function isMainContext(): boolean {
  return getBindingConfig().mainContext.isCurrent();
}

/**
 * Assert that the caller runs on the configured main context.
 *
 * This does not schedule anything onto the main context. Reaching it from
 * anywhere else is a programming error and throws `RXBIND_B100`.
 */
export function ensureMainContext(message?: string): void {
  const { mainContext } = getBindingConfig();
  if (mainContext.isCurrent()) return;

  throw new RxBindError({
    code: 'RXBIND_B100',
    message,
    context: { mainContext: mainContext.name },
  });
}
