import { Subscription, connectable, type Observable, type Observer } from 'rxjs';
import { RxBindError } from '../errors/rxbind-error.js';

/** Anything that binds a source and returns its own handle, e.g. a curried items binder */
export type Binder<T, R> = (source: Observable<T>) => R;

/**
 * Bind `source` to one or more observers, or hand it to a binder.
 *
 * Several observers share a single subscription to `source`.
 *
 * @example
 * ```typescript
 * bindTo(title$, text(heading));
 * bindTo(items$, (items) => rx(view).items(items))((view, row, item) => renderRow(item));
 * ```
 */
export function bindTo<T>(
  source: Observable<T>,
  ...observers: [Partial<Observer<T>>, ...Partial<Observer<T>>[]]
): Subscription;
export function bindTo<T, R>(source: Observable<T>, binder: Binder<T, R>): R;
export function bindTo<T, R>(
  source: Observable<T>,
  ...targets: Array<Partial<Observer<T>> | Binder<T, R>>
): Subscription | R {
  const [first] = targets;
  if (typeof first === 'function' && targets.length === 1) {
    return first(source);
  }

  const observers: Partial<Observer<T>>[] = [];
  for (const target of targets) {
    if (typeof target === 'function') {
      throw new RxBindError({
        code: 'RXBIND_X900',
        message: 'bindTo() accepts either one binder function or observers',
      });
    }
    observers.push(target);
  }

  if (observers.length === 1) {
    return source.subscribe(observers[0]);
  }

  // One source subscription; an observer that throws does not stop delivery
  // to the others.
  const shared = connectable(source);
  const subscription = new Subscription();
  for (const observer of observers) {
    subscription.add(shared.subscribe(observer));
  }
  subscription.add(shared.connect());
  return subscription;
}
