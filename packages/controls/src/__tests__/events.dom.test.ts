import { describe, expect, it } from 'vitest';
import { ControlEvent } from '@rxbind/core';
import { controlEvent, tap } from '../events.js';

describe('events', () => {
  it('should emit clicks as taps', () => {
    const button = document.createElement('button');
    let taps = 0;
    const subscription = tap(button).subscribe(() => taps++);

    button.click();
    button.click();
    subscription.unsubscribe();
    button.click();

    expect(taps).toBe(2);
  });

  it('should emit DOM events of a type', () => {
    const input = document.createElement('input');
    const events = controlEvent<KeyboardEvent>(input, 'keydown');
    const keys: string[] = [];
    events.subscribe((event) => keys.push(event.key));

    input.dispatchEvent(new KeyboardEvent('keydown', { key: 'Enter' }));
    input.dispatchEvent(new KeyboardEvent('keyup', { key: 'Enter' }));

    expect(events).toBeInstanceOf(ControlEvent);
    expect(keys).toEqual(['Enter']);
  });
});
