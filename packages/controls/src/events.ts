import { ControlEvent } from '@rxbind/core';
import { fromEvent, map } from 'rxjs';

/** DOM events of `type` dispatched on `target` */
export function controlEvent<E extends Event = Event>(
  target: EventTarget,
  type: string
): ControlEvent<E> {
  return new ControlEvent(fromEvent<E>(target, type));
}

/** Clicks on `element` */
export function tap(element: Element): ControlEvent<void> {
  return new ControlEvent(fromEvent(element, 'click').pipe(map((): void => undefined)));
}
