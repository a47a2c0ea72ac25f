import { configureBindings, createLogger, type LogEntry } from '@rxbind/core';
import { CollectionView, type CollectionViewOptions } from '../collection-view.js';
import type { CollectionViewDataSource } from '../types.js';

/** A view on a fresh `<ul>` in the document with an `li` cell registered as 'Cell' */
export function createView(options?: CollectionViewOptions): CollectionView {
  const container = document.createElement('ul');
  document.body.append(container);
  const view = new CollectionView(container, options);
  view.register('Cell', () => document.createElement('li'));
  return view;
}

/** One section of text cells */
export function listDataSource(values: readonly string[]): CollectionViewDataSource {
  return {
    numberOfItemsInSection: (_view, section) => (section === 0 ? values.length : 0),
    cellForItemAt: (view, path) => {
      const cell = view.dequeueReusableCell('Cell', path);
      cell.textContent = values[path.item];
      return cell;
    },
  };
}

export function cellTexts(view: CollectionView): Array<string | null> {
  return view.visibleCells().map((cell) => cell.textContent);
}

/** Route binding logs into an array */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  configureBindings({ logger: createLogger({ handler: (e) => entries.push(e) }) });
  return entries;
}

export function focusIn(target: Element, relatedTarget: Element | null = null): void {
  target.dispatchEvent(new FocusEvent('focusin', { bubbles: true, relatedTarget }));
}

export function focusOut(target: Element, relatedTarget: Element | null = null): void {
  target.dispatchEvent(new FocusEvent('focusout', { bubbles: true, relatedTarget }));
}

export function caught(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}
