import { Observable, type Subscriber, type Subscription } from 'rxjs';
import { bindingErrorToInterface } from './binding-errors.js';

/**
 * Subscribe `subscriber` to `source` so that it never receives an error.
 *
 * An upstream error completes the subscriber and is reported through
 * {@link bindingErrorToInterface}.
 */
export function subscribeWithoutErrors<T>(
  source: Observable<T>,
  subscriber: Subscriber<T>
): Subscription {
  return source.subscribe({
    next: (value) => subscriber.next(value),
    error: (error: unknown) => {
      subscriber.complete();
      bindingErrorToInterface(error);
    },
    complete: () => subscriber.complete(),
  });
}

/**
 * An observable of UI events.
 *
 * A control event never errors. It emits whatever its source emits, and a
 * source error completes it and is reported as a binding error.
 *
 * @example
 * ```typescript
 * const clicks = new ControlEvent(fromEvent<MouseEvent>(button, 'click'));
 * clicks.subscribe(() => save());
 * ```
 */
export class ControlEvent<T> extends Observable<T> {
  constructor(events: Observable<T>) {
    super((subscriber) => subscribeWithoutErrors(events, subscriber));
  }

  asControlEvent(): ControlEvent<T> {
    return this;
  }
}
