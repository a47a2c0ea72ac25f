/**
 * Element sinks: binding observers that write stream values into DOM
 * element properties.
 *
 * @module @rxbind/controls/sinks
 */

import { BindingObserver } from '@rxbind/core';

/** Elements with a `disabled` property */
export type DisableableElement =
  | HTMLButtonElement
  | HTMLFieldSetElement
  | HTMLInputElement
  | HTMLOptGroupElement
  | HTMLOptionElement
  | HTMLSelectElement
  | HTMLTextAreaElement;

/** Values rendered as text; `null` and `undefined` render nothing */
export type TextValue = string | number | null | undefined;

/** Values written to an attribute */
export type AttributeValue = string | number | boolean | null | undefined;

/** Writes each value to `textContent`; `null` and `undefined` clear it */
export function text(element: Element): BindingObserver<Element, TextValue> {
  return new BindingObserver<Element, TextValue>(element, (el, value) => {
    el.textContent = value === null || value === undefined ? '' : String(value);
  });
}

/**
 * Writes each value to an attribute.
 * `null`, `undefined` and `false` remove it; `true` sets it empty.
 */
export function attribute(
  element: Element,
  name: string
): BindingObserver<Element, AttributeValue> {
  return new BindingObserver<Element, AttributeValue>(element, (el, value) => {
    if (value === null || value === undefined || value === false) {
      el.removeAttribute(name);
    } else {
      el.setAttribute(name, value === true ? '' : String(value));
    }
  });
}

/** Adds `className` on `true`, removes it on `false` */
export function classToggle(element: Element, className: string): BindingObserver<Element, boolean> {
  return new BindingObserver<Element, boolean>(element, (el, on) => {
    el.classList.toggle(className, on);
  });
}

/** Writes each value to `hidden` */
export function hidden(element: HTMLElement): BindingObserver<HTMLElement, boolean> {
  return new BindingObserver<HTMLElement, boolean>(element, (el, isHidden) => {
    el.hidden = isHidden;
  });
}

/** Writes the negation of each value to `disabled` */
export function enabled(element: DisableableElement): BindingObserver<DisableableElement, boolean> {
  return new BindingObserver<DisableableElement, boolean>(element, (el, isEnabled) => {
    el.disabled = !isEnabled;
  });
}

/** Writes each value to an inline style property; `null` and `undefined` remove it */
export function style(
  element: HTMLElement,
  property: string
): BindingObserver<HTMLElement, TextValue> {
  return new BindingObserver<HTMLElement, TextValue>(element, (el, value) => {
    if (value === null || value === undefined) {
      el.style.removeProperty(property);
    } else {
      el.style.setProperty(property, String(value));
    }
  });
}
