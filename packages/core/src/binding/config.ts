import { createLogger, isDebugMode, type RxBindLogger } from '../observability/logger.js';
import { domMainContext, type MainContext } from './context.js';

/**
 * Active binding configuration.
 */
export interface BindingConfig {
  /** Binding errors are fatal (thrown) instead of logged */
  readonly debug: boolean;
  /** Context UI bindings must run on */
  readonly mainContext: MainContext;
  /** Replaces the default debug/release handling of binding errors */
  readonly onBindingError?: (error: unknown) => void;
  /** Logger for release-mode binding errors and view diagnostics */
  readonly logger: RxBindLogger;
}

export type BindingConfigOptions = Partial<BindingConfig>;

function defaultConfig(): BindingConfig {
  return {
    debug: false,
    mainContext: domMainContext,
    logger: createLogger({ module: 'rxbind' }),
  };
}

let active: BindingConfig = defaultConfig();

/**
 * Merge options into the active binding configuration.
 *
 * @example
 * ```typescript
 * configureBindings({
 *   debug: import.meta.env.DEV,
 *   onBindingError: (error) => reportToMonitoring(error),
 * });
 * ```
 */
export function configureBindings(options: BindingConfigOptions): BindingConfig {
  active = { ...active, ...options };
  return active;
}

export function getBindingConfig(): BindingConfig {
  return active;
}

/** Restore the default configuration */
export function resetBindingConfig(): void {
  active = defaultConfig();
}

/** Debug if either the binding config or the global logger debug mode says so */
export function isBindingDebug(): boolean {
  return active.debug || isDebugMode();
}
