/**
 * @rxbind/controls: bindings for plain DOM elements and form controls.
 *
 * @example
 * ```typescript
 * import { bindTo } from '@rxbind/core';
 * import { enabled, tap, text, value } from '@rxbind/controls';
 *
 * const name = value(nameInput);
 * bindTo(name.pipe(map((n) => n.length > 0)), enabled(saveButton));
 * bindTo(name.pipe(map((n) => `Hello, ${n}`)), text(greeting));
 * tap(saveButton).subscribe(() => save());
 * ```
 *
 * @module @rxbind/controls
 */

export { controlEvent, tap } from './events.js';
export { checked, value, type ValueElement } from './properties.js';
export {
  attribute,
  classToggle,
  enabled,
  hidden,
  style,
  text,
  type AttributeValue,
  type DisableableElement,
  type TextValue,
} from './sinks.js';
