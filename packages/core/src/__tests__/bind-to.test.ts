import { afterEach, describe, expect, it, vi } from 'vitest';
import { Observable, Subject, Subscription, config as rxConfig, map } from 'rxjs';
import { bindTo } from '../binding/bind-to.js';

describe('bindTo', () => {
  afterEach(() => {
    rxConfig.onUnhandledError = null;
  });

  it('should subscribe a single observer', () => {
    const source = new Subject<number>();
    const next = vi.fn();

    const subscription = bindTo(source, { next });
    source.next(1);
    source.next(2);

    expect(subscription).toBeInstanceOf(Subscription);
    expect(next.mock.calls).toEqual([[1], [2]]);

    subscription.unsubscribe();
    expect(source.observed).toBe(false);
  });

  it('should share one subscription between several observers', () => {
    const source = new Subject<string>();
    const first = { next: vi.fn(), complete: vi.fn() };
    const second = { next: vi.fn(), error: vi.fn() };

    bindTo(source, first, second);
    source.next('hello');
    source.complete();

    expect(first.next).toHaveBeenCalledWith('hello');
    expect(second.next).toHaveBeenCalledWith('hello');
    expect(first.complete).toHaveBeenCalledTimes(1);
    expect(second.error).not.toHaveBeenCalled();
  });

  it('should forward errors to every observer', () => {
    const source = new Subject<string>();
    const first = { error: vi.fn() };
    const second = { error: vi.fn() };
    const failure = new Error('lost connection');

    bindTo(source, first, second);
    source.error(failure);

    expect(first.error).toHaveBeenCalledWith(failure);
    expect(second.error).toHaveBeenCalledWith(failure);
  });

  it('should subscribe to the source once for several observers', () => {
    let subscriptions = 0;
    const source = new Observable<number>((subscriber) => {
      subscriptions++;
      subscriber.next(1);
      subscriber.complete();
    });
    const first = { next: vi.fn() };
    const second = { next: vi.fn() };

    bindTo(source, first, second);

    expect(subscriptions).toBe(1);
    expect(first.next).toHaveBeenCalledWith(1);
    expect(second.next).toHaveBeenCalledWith(1);
  });

  it('should keep delivering to later observers when one throws', async () => {
    const flagged: unknown[] = [];
    rxConfig.onUnhandledError = (error) => flagged.push(error);
    const source = new Subject<string>();
    const failure = new Error('sink failed');
    const first = {
      next: () => {
        throw failure;
      },
    };
    const second = { next: vi.fn(), error: vi.fn() };

    bindTo(source, first, second);
    source.next('a');
    source.next('b');
    source.error(new Error('upstream'));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(second.next.mock.calls).toEqual([['a'], ['b']]);
    expect(second.error).toHaveBeenCalledTimes(1);
    expect(flagged).toEqual([failure, failure, expect.objectContaining({ message: 'upstream' })]);
  });

  it('should unsubscribe every observer and the source together', () => {
    const source = new Subject<number>();
    const first = { next: vi.fn() };
    const second = { next: vi.fn() };

    const subscription = bindTo(source, first, second);
    subscription.unsubscribe();
    source.next(1);

    expect(source.observed).toBe(false);
    expect(first.next).not.toHaveBeenCalled();
    expect(second.next).not.toHaveBeenCalled();
  });

  it('should hand the source to a binder and return its result', () => {
    const source = new Subject<number>();
    const binder = (values: Observable<number>) => values.pipe(map((n) => n * 10));

    const result = bindTo(source, binder);
    const seen: number[] = [];
    result.subscribe((value) => seen.push(value));
    source.next(4);

    expect(seen).toEqual([40]);
  });

  it('should support curried binders', () => {
    const source = new Subject<string>();
    const received: string[] = [];
    const curried = (values: Observable<string>) => (prefix: string) =>
      values.subscribe((value) => received.push(`${prefix}${value}`));

    const subscription = bindTo(source, curried)('> ');
    source.next('ready');

    expect(received).toEqual(['> ready']);
    subscription.unsubscribe();
  });
});
