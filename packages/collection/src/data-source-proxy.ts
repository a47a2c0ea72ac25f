import { DelegateProxy, installForwardDelegate, RxBindError } from '@rxbind/core';
import type { Subscription } from 'rxjs';
import type { CollectionView } from './collection-view.js';
import type { IndexPath } from './index-path.js';
import type { CollectionViewDataSource } from './types.js';

const proxies = new WeakMap<CollectionView, CollectionViewDataSourceProxy>();

/**
 * Stands in as a collection view's data source and forwards to the
 * installed one. Without a forward data source the view is empty.
 */
export class CollectionViewDataSourceProxy
  extends DelegateProxy<CollectionViewDataSource, CollectionView>
  implements CollectionViewDataSource
{
  constructor(view: CollectionView) {
    super(view);
  }

  numberOfSections(view: CollectionView): number {
    const forward = this.forwardToDelegate();
    if (!forward) return 0;
    return forward.numberOfSections?.(view) ?? 1;
  }

  numberOfItemsInSection(view: CollectionView, section: number): number {
    return this.forwardToDelegate()?.numberOfItemsInSection(view, section) ?? 0;
  }

  cellForItemAt(view: CollectionView, indexPath: IndexPath): HTMLElement {
    const forward = this.forwardToDelegate();
    if (!forward) {
      throw new RxBindError({
        code: 'RXBIND_X900',
        message: 'Cell requested from a data source proxy without a data source',
        context: { section: indexPath.section, item: indexPath.item },
      });
    }
    return forward.cellForItemAt(view, indexPath);
  }

  /**
   * The data source proxy of `view`, installing it on first use.
   *
   * A data source the view already had becomes the (non-retained) forward
   * data source.
   */
  static proxyForObject(view: CollectionView): CollectionViewDataSourceProxy {
    let proxy = proxies.get(view);
    if (!proxy) {
      const created = new CollectionViewDataSourceProxy(view);
      view.destroyed$.subscribe({ complete: () => created.dispose() });
      proxies.set(view, created);
      proxy = created;
    }

    const current = view.dataSource;
    if (current !== proxy) {
      if (current !== null && proxy.forwardToDelegate() === undefined) {
        proxy.setForwardToDelegate(current, false);
      }
      view.dataSource = proxy;
    }
    return proxy;
  }

  /**
   * Install `dataSource` behind the proxy of `view` and reload the view.
   * The returned subscription uninstalls it and reloads again; it does not
   * keep the view alive.
   *
   * @throws RxBindError `RXBIND_P300` when a data source is already installed
   */
  static installForwardDataSource(
    view: CollectionView,
    dataSource: CollectionViewDataSource,
    retainDataSource: boolean
  ): Subscription {
    const proxy = CollectionViewDataSourceProxy.proxyForObject(view);
    const target = new WeakRef(view);
    return installForwardDelegate(proxy, dataSource, retainDataSource, () =>
      target.deref()?.reloadData()
    );
  }
}
