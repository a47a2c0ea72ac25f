/**
 * Execution context that owns the user interface.
 *
 * UI elements may only be mutated from the window's event loop. A
 * {@link MainContext} answers whether the code currently running is on it.
 */
export interface MainContext {
  /** Name used in error context */
  readonly name: string;
  /** Whether the caller is currently running on this context */
  isCurrent(): boolean;
}

/**
 * The DOM main context: a document exists and the global scope is not a
 * worker scope.
 */
export const domMainContext: MainContext = {
  name: 'dom',
  isCurrent: () => typeof document !== 'undefined' && !('importScripts' in globalThis),
};

/**
 * Create a main context from a predicate, e.g. for hosts that render
 * without a document.
 *
 * @example
 * ```typescript
 * configureBindings({ mainContext: createMainContext('renderer', () => isRendererThread()) });
 * ```
 */
export function createMainContext(name: string, isCurrent: () => boolean): MainContext {
  return { name, isCurrent };
}
