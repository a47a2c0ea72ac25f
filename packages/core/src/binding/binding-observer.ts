import type { Observer } from 'rxjs';
import { bindingErrorToInterface } from './binding-errors.js';
import { ensureMainContext } from './main-context.js';

/** Applies one value to a UI element */
export type Binding<E extends object, V> = (element: E, value: V) => void;

/**
 * Observer that enforces user interface binding rules:
 *
 * - every event must arrive on the main context (`RXBIND_B100` otherwise)
 * - errors are never bound; they go to {@link bindingErrorToInterface}
 * - the element is held through a `WeakRef`, and values that arrive after
 *   it has been collected are dropped
 *
 * @typeParam E - The UI element type
 * @typeParam V - The value type
 *
 * @example
 * ```typescript
 * const title = document.querySelector('h1')!;
 *
 * count$
 *   .pipe(map((n) => `${n} items`))
 *   .subscribe(new BindingObserver(title, (el, text) => {
 *     el.textContent = text;
 *   }));
 * ```
 */
export class BindingObserver<E extends object, V> implements Observer<V> {
  private readonly target: WeakRef<E>;

  constructor(
    element: E,
    private readonly binding: Binding<E, V>
  ) {
    this.target = new WeakRef(element);
  }

  /** The bound element, or `undefined` once it has been collected */
  get element(): E | undefined {
    return this.target.deref();
  }

  next(value: V): void {
    ensureMainContext();

    const element = this.target.deref();
    if (element !== undefined) {
      this.binding(element, value);
    }
  }

  error(error: unknown): void {
    ensureMainContext();
    bindingErrorToInterface(error);
  }

  complete(): void {
    ensureMainContext();
  }

  /** Type-erased observer delegating to this one */
  asObserver(): Observer<V> {
    return {
      next: (value) => this.next(value),
      error: (error: unknown) => this.error(error),
      complete: () => this.complete(),
    };
  }
}

/** Factory function to create a BindingObserver */
export function createBindingObserver<E extends object, V>(
  element: E,
  binding: Binding<E, V>
): BindingObserver<E, V> {
  return new BindingObserver(element, binding);
}
