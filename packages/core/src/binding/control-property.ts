import { Observable, skip, type Observer } from 'rxjs';
import { ControlEvent, subscribeWithoutErrors } from './control-event.js';

/**
 * A two-way UI property such as an input's value.
 *
 * Subscribing observes the property (current value first, then changes);
 * calling `next` writes a value through the sink.
 *
 * @example
 * ```typescript
 * const name = value(input);
 * name.subscribe((text) => console.log('typed', text));
 * of('initial').subscribe(name);
 * ```
 */
export class ControlProperty<T> extends Observable<T> implements Observer<T> {
  private readonly valueSink: Observer<T>;

  /** Changes only, without the current value replayed on subscribe */
  readonly changed: ControlEvent<T>;

  constructor(values: Observable<T>, valueSink: Observer<T>) {
    super((subscriber) => subscribeWithoutErrors(values, subscriber));
    this.valueSink = valueSink;
    this.changed = new ControlEvent(values.pipe(skip(1)));
  }

  next(value: T): void {
    this.valueSink.next(value);
  }

  error(error: unknown): void {
    this.valueSink.error(error);
  }

  complete(): void {
    this.valueSink.complete();
  }

  asControlProperty(): ControlProperty<T> {
    return this;
  }
}
