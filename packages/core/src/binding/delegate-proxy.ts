import { Subject, Subscription, type Observable } from 'rxjs';
import { RxBindError } from '../errors/rxbind-error.js';

/**
 * Base class for objects that stand in for a view's delegate or data source.
 *
 * A proxy is installed as the view's callback object. Each callback is
 * published on an observable (see {@link DelegateProxy.methodSubject}) and
 * then forwarded to the optional forward delegate, so reactive and plain
 * callback consumers can share one view.
 *
 * The proxy never retains its parent view. The forward delegate is retained
 * only when installed with `retainDelegate`.
 *
 * @typeParam P - The callback protocol
 * @typeParam V - The parent view type
 */
export abstract class DelegateProxy<P extends object, V extends object> {
  private readonly parent: WeakRef<V>;
  private retainedForward: P | null = null;
  private weakForward: WeakRef<P> | null = null;
  private readonly completions: Array<() => void> = [];
  private disposed = false;

  protected constructor(parentObject: V) {
    this.parent = new WeakRef(parentObject);
  }

  /** The view this proxy belongs to, while it is alive */
  get parentObject(): V | undefined {
    return this.parent.deref();
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** The delegate callbacks are forwarded to, if any */
  forwardToDelegate(): P | undefined {
    return this.retainedForward ?? this.weakForward?.deref();
  }

  /**
   * Set the delegate callbacks are forwarded to.
   *
   * @param delegate - The forward delegate, or `null` to clear it
   * @param retainDelegate - Hold a strong reference to the delegate
   */
  setForwardToDelegate(delegate: P | null, retainDelegate: boolean): void {
    this.retainedForward = delegate !== null && retainDelegate ? delegate : null;
    this.weakForward = delegate !== null && !retainDelegate ? new WeakRef(delegate) : null;
  }

  /** Complete every callback observable and drop the forward delegate */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.setForwardToDelegate(null, false);
    for (const complete of this.completions) {
      complete();
    }
    this.completions.length = 0;
  }

  /** Create a subject for one callback; it completes when the proxy is disposed */
  protected methodSubject<A>(): Subject<A> {
    const subject = new Subject<A>();
    if (this.disposed) {
      subject.complete();
    } else {
      this.completions.push(() => subject.complete());
    }
    return subject;
  }

  /** Publish one callback invocation */
  protected invoked<A>(subject: Subject<A>, args: A): void {
    if (!this.disposed) {
      subject.next(args);
    }
  }

  /** Read-only view of a callback subject */
  protected observe<A>(subject: Subject<A>): Observable<A> {
    return subject.asObservable();
  }
}

/**
 * Install `delegate` as the forward delegate of `proxy`.
 *
 * Returns a subscription that removes it again. `refresh` runs after both
 * installation and removal, e.g. to reload a view from its new data source.
 *
 * @throws RxBindError `RXBIND_P300` when a forward delegate is already installed
 */
export function installForwardDelegate<P extends object, V extends object>(
  proxy: DelegateProxy<P, V>,
  delegate: P,
  retainDelegate: boolean,
  refresh?: () => void
): Subscription {
  const existing = proxy.forwardToDelegate();
  if (existing !== undefined) {
    throw RxBindError.fromCode('RXBIND_P300', { proxy: proxy.constructor.name });
  }

  proxy.setForwardToDelegate(delegate, retainDelegate);
  refresh?.();

  return new Subscription(() => {
    if (proxy.forwardToDelegate() === delegate) {
      proxy.setForwardToDelegate(null, false);
      refresh?.();
    }
  });
}
