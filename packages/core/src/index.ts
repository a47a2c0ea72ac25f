/**
 * @rxbind/core: reactive bindings between RxJS streams and UI elements.
 *
 * @example
 * ```typescript
 * import { BindingObserver, configureBindings } from '@rxbind/core';
 *
 * configureBindings({ debug: true });
 *
 * status$.subscribe(new BindingObserver(badge, (el, status) => {
 *   el.textContent = status;
 * }));
 * ```
 *
 * @module @rxbind/core
 */

// Bindings
export * from './binding/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './observability/index.js';
