import { describe, expect, it } from 'vitest';
import { of } from 'rxjs';
import { checked, value } from '../properties.js';

function typeInto(input: HTMLInputElement, text: string): void {
  input.value = text;
  input.dispatchEvent(new Event('input'));
}

describe('properties', () => {
  describe('value', () => {
    it('should emit the current value then every edit', () => {
      const input = document.createElement('input');
      input.value = 'draft';
      const seen: string[] = [];

      value(input).subscribe((text) => seen.push(text));
      typeInto(input, 'draft 2');
      typeInto(input, 'final');

      expect(seen).toEqual(['draft', 'draft 2', 'final']);
    });

    it('should emit only edits from changed', () => {
      const input = document.createElement('input');
      input.value = 'draft';
      const seen: string[] = [];

      value(input).changed.subscribe((text) => seen.push(text));
      typeInto(input, 'edited');

      expect(seen).toEqual(['edited']);
    });

    it('should write bound values into the element', () => {
      const input = document.createElement('input');

      of('one', 'two').subscribe(value(input));

      expect(input.value).toBe('two');
    });

    it('should listen to the given event type', () => {
      const select = document.createElement('select');
      for (const [label, code] of [
        ['Small', 's'],
        ['Large', 'l'],
      ]) {
        const option = document.createElement('option');
        option.textContent = label;
        option.value = code;
        select.append(option);
      }
      const seen: string[] = [];

      value(select, 'change').subscribe((text) => seen.push(text));
      select.value = 'l';
      select.dispatchEvent(new Event('input'));
      select.dispatchEvent(new Event('change'));

      expect(seen).toEqual(['s', 'l']);
    });

    it('should stop listening on unsubscribe', () => {
      const input = document.createElement('input');
      const seen: string[] = [];

      const subscription = value(input).subscribe((text) => seen.push(text));
      subscription.unsubscribe();
      typeInto(input, 'ignored');

      expect(seen).toEqual(['']);
    });
  });

  describe('checked', () => {
    it('should emit the checked state on change', () => {
      const box = document.createElement('input');
      box.type = 'checkbox';
      const seen: boolean[] = [];

      checked(box).subscribe((state) => seen.push(state));
      box.checked = true;
      box.dispatchEvent(new Event('change'));

      expect(seen).toEqual([false, true]);
    });

    it('should write bound states into the element', () => {
      const box = document.createElement('input');
      box.type = 'checkbox';

      checked(box).next(true);

      expect(box.checked).toBe(true);
    });
  });
});
