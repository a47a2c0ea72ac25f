/**
 * Two-way control properties for form elements.
 *
 * @module @rxbind/controls/properties
 */

import { BindingObserver, ControlProperty } from '@rxbind/core';
import { defer, EMPTY, fromEvent, map, startWith, type Observable } from 'rxjs';

/** Elements with a string `value` */
export type ValueElement = HTMLInputElement | HTMLSelectElement | HTMLTextAreaElement;

/**
 * Current value of `element`, then its value on each `eventType` event.
 * The element is only referenced weakly until someone subscribes.
 */
function elementProperty<E extends EventTarget & object, T>(
  element: E,
  eventType: string,
  read: (element: E) => T
): Observable<T> {
  const target = new WeakRef(element);
  return defer(() => {
    const current = target.deref();
    if (!current) return EMPTY;
    return fromEvent(current, eventType).pipe(
      map(() => read(current)),
      startWith(read(current))
    );
  });
}

/**
 * The `value` of a text field or select.
 *
 * @example
 * ```typescript
 * const query = value(searchInput);
 * query.changed.pipe(debounceTime(200)).subscribe(search);
 * of('').subscribe(query); // clear the field
 * ```
 */
export function value(element: ValueElement, eventType = 'input'): ControlProperty<string> {
  return new ControlProperty(
    elementProperty(element, eventType, (el) => el.value),
    new BindingObserver<ValueElement, string>(element, (el, next) => {
      if (el.value !== next) {
        el.value = next;
      }
    })
  );
}

/** The `checked` state of a checkbox or radio button */
export function checked(element: HTMLInputElement): ControlProperty<boolean> {
  return new ControlProperty(
    elementProperty(element, 'change', (el) => el.checked),
    new BindingObserver(element, (el, next: boolean) => {
      el.checked = next;
    })
  );
}
