import { afterEach, describe, expect, it, vi } from 'vitest';
import { bindingErrorToInterface } from '../binding/binding-errors.js';
import {
  configureBindings,
  getBindingConfig,
  isBindingDebug,
  resetBindingConfig,
} from '../binding/config.js';
import { RxBindError } from '../errors/rxbind-error.js';
import { createLogger, setDebugMode, type LogEntry } from '../observability/logger.js';

describe('bindingErrorToInterface', () => {
  afterEach(() => {
    resetBindingConfig();
    setDebugMode(false);
  });

  it('should log in release configuration', () => {
    const entries: LogEntry[] = [];
    configureBindings({ logger: createLogger({ module: 'app', handler: (e) => entries.push(e) }) });

    bindingErrorToInterface(new Error('request failed'));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'error',
      module: 'app',
      message: 'Binding error to UI',
      context: { error: { name: 'Error', message: 'request failed' } },
    });
  });

  it('should throw in debug configuration', () => {
    configureBindings({ debug: true });
    const cause = new Error('request failed');

    let caught: unknown;
    try {
      bindingErrorToInterface(cause);
    } catch (error) {
      caught = error;
    }

    expect(RxBindError.isCode(caught, 'RXBIND_B101')).toBe(true);
    expect(caught).toMatchObject({ message: 'Binding error to UI: request failed', cause });
  });

  it('should treat global debug mode as a debug configuration', () => {
    expect(isBindingDebug()).toBe(false);
    setDebugMode(true);
    expect(isBindingDebug()).toBe(true);
    expect(() => bindingErrorToInterface('timeout')).toThrow('Binding error to UI: timeout');
  });

  it('should hand errors to a configured handler instead', () => {
    const onBindingError = vi.fn();
    const handler = vi.fn();
    configureBindings({
      debug: true,
      onBindingError,
      logger: createLogger({ handler }),
    });

    bindingErrorToInterface('lost connection');

    expect(onBindingError).toHaveBeenCalledWith('lost connection');
    expect(handler).not.toHaveBeenCalled();
  });

  it('should restore defaults on reset', () => {
    configureBindings({ debug: true, onBindingError: () => undefined });
    resetBindingConfig();

    const config = getBindingConfig();
    expect(config.debug).toBe(false);
    expect(config.onBindingError).toBeUndefined();
    expect(config.mainContext.name).toBe('dom');
    expect(config.logger.module).toBe('rxbind');
  });
});
