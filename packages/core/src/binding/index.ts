/**
 * Reactive bindings to user interface elements.
 *
 * - {@link BindingObserver}: delivers stream values to a weakly held element
 * - {@link ensureMainContext}: asserts code runs on the UI context
 * - {@link bindingErrorToInterface}: where errors on UI streams end up
 * - {@link ControlEvent} / {@link ControlProperty}: UI event sources that never error
 * - {@link DelegateProxy}: turns callback protocols into observables
 *
 * @module binding
 */

export { bindTo, type Binder } from './bind-to.js';
export { bindingErrorToInterface } from './binding-errors.js';
export { BindingObserver, createBindingObserver, type Binding } from './binding-observer.js';
export {
  configureBindings,
  getBindingConfig,
  isBindingDebug,
  resetBindingConfig,
  type BindingConfig,
  type BindingConfigOptions,
} from './config.js';
export { createMainContext, domMainContext, type MainContext } from './context.js';
export { ControlEvent, subscribeWithoutErrors } from './control-event.js';
export { ControlProperty } from './control-property.js';
export { DelegateProxy, installForwardDelegate } from './delegate-proxy.js';
export { ensureMainContext, isMainContext } from './main-context.js';
