import { describe, expect, it } from 'vitest';
import { getErrorCategory, getErrorInfo } from '../errors/error-codes.js';
import { RxBindError } from '../errors/rxbind-error.js';

describe('RxBindError', () => {
  it('should use the default message and suggestion of its code', () => {
    const error = RxBindError.fromCode('RXBIND_D202', { identifier: 'Cell' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RxBindError');
    expect(error.message).toBe('No cell is registered for the reuse identifier');
    expect(error.suggestion).toBe(getErrorInfo('RXBIND_D202').suggestion);
    expect(error.category).toBe('data-source');
    expect(error.context).toEqual({ identifier: 'Cell' });
  });

  it('should categorize codes by letter', () => {
    expect(getErrorCategory('RXBIND_B100')).toBe('binding');
    expect(getErrorCategory('RXBIND_D201')).toBe('data-source');
    expect(getErrorCategory('RXBIND_P300')).toBe('proxy');
    expect(getErrorCategory('RXBIND_X900')).toBe('internal');
  });

  it('should match codes and categories', () => {
    const error = new RxBindError({ code: 'RXBIND_B101', message: 'Binding error to UI: boom' });

    expect(RxBindError.isRxBindError(error)).toBe(true);
    expect(RxBindError.isRxBindError(new Error('x'))).toBe(false);
    expect(RxBindError.isCode(error, 'RXBIND_B101')).toBe(true);
    expect(RxBindError.isCode(error, 'RXBIND_B100')).toBe(false);
    expect(RxBindError.isCategory(error, 'binding')).toBe(true);
  });

  it('should keep non-Error causes', () => {
    const error = new RxBindError({ code: 'RXBIND_B101', cause: 'offline' });

    expect(error.cause).toBe('offline');
    expect(error.toJSON().cause).toEqual({ name: 'string', message: 'offline' });
  });

  it('should serialize nested causes', () => {
    const inner = RxBindError.fromCode('RXBIND_D201', { item: 4 });
    const outer = new RxBindError({ code: 'RXBIND_B101', cause: inner });
    const json = outer.toJSON();

    expect(json.code).toBe('RXBIND_B101');
    expect(json.cause).toMatchObject({ code: 'RXBIND_D201', context: { item: 4 } });
  });

  it('should format code, context, cause and suggestion', () => {
    const error = new RxBindError({
      code: 'RXBIND_D201',
      context: { item: 3 },
      cause: new RangeError('too far'),
    });

    expect(error.format().split('\n')).toEqual([
      '[RXBIND_D201] Index path is out of range',
      'Context: {"item":3}',
      'Cause: RangeError: too far',
      'Suggestion: Check that the index path refers to an item of the last bound value.',
    ]);
    expect(String(error)).toBe(error.format());
  });
});
