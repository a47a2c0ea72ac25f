import { DelegateProxy } from '@rxbind/core';
import type { Observable } from 'rxjs';
import type { CollectionView } from './collection-view.js';
import type { IndexPath } from './index-path.js';
import type { CollectionViewDelegate, FocusUpdateContext } from './types.js';

const proxies = new WeakMap<CollectionView, CollectionViewDelegateProxy>();

/**
 * Stands in as a collection view's delegate, publishing every callback
 * before forwarding it.
 */
export class CollectionViewDelegateProxy
  extends DelegateProxy<CollectionViewDelegate, CollectionView>
  implements CollectionViewDelegate
{
  private readonly selected$$ = this.methodSubject<[CollectionView, IndexPath]>();
  private readonly deselected$$ = this.methodSubject<[CollectionView, IndexPath]>();
  private readonly focus$$ = this.methodSubject<[CollectionView, FocusUpdateContext]>();

  /** `didSelectItemAt` invocations */
  readonly didSelectItemAt$: Observable<[CollectionView, IndexPath]> = this.observe(this.selected$$);
  /** `didDeselectItemAt` invocations */
  readonly didDeselectItemAt$: Observable<[CollectionView, IndexPath]> = this.observe(
    this.deselected$$
  );
  /** `didUpdateFocus` invocations */
  readonly didUpdateFocus$: Observable<[CollectionView, FocusUpdateContext]> = this.observe(
    this.focus$$
  );

  constructor(view: CollectionView) {
    super(view);
  }

  didSelectItemAt(view: CollectionView, indexPath: IndexPath): void {
    this.invoked<[CollectionView, IndexPath]>(this.selected$$, [view, indexPath]);
    this.forwardToDelegate()?.didSelectItemAt?.(view, indexPath);
  }

  didDeselectItemAt(view: CollectionView, indexPath: IndexPath): void {
    this.invoked<[CollectionView, IndexPath]>(this.deselected$$, [view, indexPath]);
    this.forwardToDelegate()?.didDeselectItemAt?.(view, indexPath);
  }

  didUpdateFocus(view: CollectionView, context: FocusUpdateContext): void {
    this.invoked<[CollectionView, FocusUpdateContext]>(this.focus$$, [view, context]);
    this.forwardToDelegate()?.didUpdateFocus?.(view, context);
  }

  /**
   * The delegate proxy of `view`, installing it on first use.
   *
   * A delegate the view already had becomes the (non-retained) forward
   * delegate.
   */
  static proxyForObject(view: CollectionView): CollectionViewDelegateProxy {
    let proxy = proxies.get(view);
    if (!proxy) {
      const created = new CollectionViewDelegateProxy(view);
      view.destroyed$.subscribe({ complete: () => created.dispose() });
      proxies.set(view, created);
      proxy = created;
    }

    const current = view.delegate;
    if (current !== proxy) {
      if (current !== null && proxy.forwardToDelegate() === undefined) {
        proxy.setForwardToDelegate(current, false);
      }
      view.delegate = proxy;
    }
    return proxy;
  }
}
