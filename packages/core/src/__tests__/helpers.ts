import { vi } from 'vitest';

const released = new WeakSet<object>();

/**
 * WeakRef stand-in whose target can be "collected" on demand with
 * {@link release}.
 */
export class ReleasableWeakRef<T extends object> {
  constructor(private readonly target: T) {}

  deref(): T | undefined {
    return released.has(this.target) ? undefined : this.target;
  }
}

/** Make every WeakRef created from now on releasable; undo with vi.unstubAllGlobals() */
export function stubWeakRef(): void {
  vi.stubGlobal('WeakRef', ReleasableWeakRef);
}

/** Simulate garbage collection of `target` */
export function release(target: object): void {
  released.add(target);
}
