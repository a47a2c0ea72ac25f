/**
 * Reactive extension of {@link CollectionView}.
 *
 * `rx(view)` binds element streams to the view's items and exposes the
 * view's delegate callbacks as {@link ControlEvent}s.
 *
 * @example Binding items
 * ```typescript
 * const view = new CollectionView(document.querySelector('#numbers')!);
 * view.register('Cell', () => document.createElement('li'));
 *
 * const subscription = rx(view).itemsWithCell(
 *   { cellIdentifier: 'Cell', cellType: HTMLLIElement },
 *   of([1, 2, 3]),
 *   (row, element, cell) => {
 *     cell.textContent = `${element} @ ${row}`;
 *   }
 * );
 * ```
 *
 * @example Reacting to selection
 * ```typescript
 * rx(view)
 *   .modelSelected((model): model is number => typeof model === 'number')
 *   .subscribe((value) => console.log('picked', value));
 * ```
 *
 * @module @rxbind/collection/collection-view-rx
 */

import {
  BindingObserver,
  ControlEvent,
  RxBindError,
} from '@rxbind/core';
import {
  EMPTY,
  Subscription,
  map,
  materialize,
  mergeMap,
  of,
  takeUntil,
  type Observable,
  type ObservableNotification,
} from 'rxjs';
import { ReactiveArrayDataSource, type ItemCellFactory } from './array-data-source.js';
import type { CollectionView } from './collection-view.js';
import { CollectionViewDataSourceProxy } from './data-source-proxy.js';
import { CollectionViewDelegateProxy } from './delegate-proxy.js';
import { indexPath, type IndexPath } from './index-path.js';
import {
  isSectionedViewDataSource,
  type CollectionViewDataSource,
  type FocusUpdateContext,
  type ReactiveCollectionViewDataSource,
} from './types.js';

/** A cell element class such as `HTMLLIElement` */
export type CellType<C extends HTMLElement> = abstract new (...args: never[]) => C;

/** Narrows a model read back from the data source */
export type ModelGuard<T> = (model: unknown) => model is T;

export interface CellBindingOptions<C extends HTMLElement> {
  /** Reuse identifier registered with `view.register` */
  cellIdentifier: string;
  /** Class every dequeued cell must be an instance of */
  cellType: CellType<C>;
}

export type ConfigureItemCell<T, C extends HTMLElement> = (row: number, element: T, cell: C) => void;

function castCell<C extends HTMLElement>(
  cell: HTMLElement,
  cellType: CellType<C>,
  identifier: string
): C {
  if (cell instanceof cellType) return cell;
  throw RxBindError.fromCode('RXBIND_D203', {
    identifier,
    expected: cellType.name,
    actual: cell.constructor.name,
  });
}

// Closures a bound source retains must not reach the view strongly.

function dequeuingCellFactory<T, C extends HTMLElement>(
  options: CellBindingOptions<C>,
  configure: ConfigureItemCell<T, C>
): ItemCellFactory<T> {
  const { cellIdentifier, cellType } = options;
  return (view, row, element) => {
    const cell = castCell(
      view.dequeueReusableCell(cellIdentifier, indexPath(row)),
      cellType,
      cellIdentifier
    );
    configure(row, element, cell);
    return cell;
  };
}

function observedEventBinding<E>(
  view: CollectionView,
  dataSource: ReactiveCollectionViewDataSource<E>
): BindingObserver<CollectionView, ObservableNotification<E>> {
  return new BindingObserver<CollectionView, ObservableNotification<E>>(view, (target, event) => {
    if (!target.isDestroyed) {
      dataSource.collectionViewObservedEvent(target, event);
    }
  });
}

export class CollectionViewRx {
  constructor(readonly base: CollectionView) {}

  /** The installed delegate proxy */
  get delegate(): CollectionViewDelegateProxy {
    return CollectionViewDelegateProxy.proxyForObject(this.base);
  }

  /** The installed data source proxy */
  get dataSource(): CollectionViewDataSourceProxy {
    return CollectionViewDataSourceProxy.proxyForObject(this.base);
  }

  // ── Items ───────────────────────────────────────────────

  /**
   * Bind a stream of element sequences to the view's items, creating each
   * cell with `cellFactory`.
   */
  items<T>(source: Observable<Iterable<T>>): (cellFactory: ItemCellFactory<T>) => Subscription;
  items<T>(source: Observable<Iterable<T>>, cellFactory: ItemCellFactory<T>): Subscription;
  items<T>(
    source: Observable<Iterable<T>>,
    cellFactory?: ItemCellFactory<T>
  ): Subscription | ((cellFactory: ItemCellFactory<T>) => Subscription) {
    const bind = (factory: ItemCellFactory<T>): Subscription =>
      this.itemsWithDataSource(new ReactiveArrayDataSource(factory), source);
    return cellFactory ? bind(cellFactory) : bind;
  }

  /**
   * Bind a stream of element sequences to the view's items, dequeuing a
   * `cellIdentifier` cell for each element and configuring it.
   *
   * @throws RxBindError `RXBIND_D203` (on reload) when a dequeued cell is not a `cellType`
   */
  itemsWithCell<T, C extends HTMLElement>(
    options: CellBindingOptions<C>
  ): (source: Observable<Iterable<T>>) => (configureCell: ConfigureItemCell<T, C>) => Subscription;
  itemsWithCell<T, C extends HTMLElement>(
    options: CellBindingOptions<C>,
    source: Observable<Iterable<T>>,
    configureCell: ConfigureItemCell<T, C>
  ): Subscription;
  itemsWithCell<T, C extends HTMLElement>(
    options: CellBindingOptions<C>,
    source?: Observable<Iterable<T>>,
    configureCell?: ConfigureItemCell<T, C>
  ):
    | Subscription
    | ((source: Observable<Iterable<T>>) => (configureCell: ConfigureItemCell<T, C>) => Subscription) {
    const bind = (
      items: Observable<Iterable<T>>,
      configure: ConfigureItemCell<T, C>
    ): Subscription =>
      this.itemsWithDataSource(
        new ReactiveArrayDataSource<T>(dequeuingCellFactory(options, configure)),
        items
      );

    if (source && configureCell) {
      return bind(source, configureCell);
    }
    return (items) => (configure) => bind(items, configure);
  }

  /**
   * Bind a stream to the view through a reactive data source.
   *
   * The data source is retained until the returned subscription is
   * unsubscribed. Events reach it on the main context, and only while the
   * view is alive and not destroyed. Neither the source nor the returned
   * subscription keeps the view alive.
   *
   * @throws RxBindError `RXBIND_P300` when another data source is installed
   */
  itemsWithDataSource<E>(
    dataSource: ReactiveCollectionViewDataSource<E> & CollectionViewDataSource,
    source: Observable<E>
  ): Subscription {
    // Install the delegate proxy before the data source so that a data
    // source reading `rx(view).delegate` during reload finds it in place.
    void this.delegate;

    const installation = CollectionViewDataSourceProxy.installForwardDataSource(
      this.base,
      dataSource,
      true
    );

    const subscription = source
      .pipe(materialize(), takeUntil(this.base.destroyed$))
      .subscribe(observedEventBinding(this.base, dataSource));

    return new Subscription(() => {
      subscription.unsubscribe();
      installation.unsubscribe();
    });
  }

  /**
   * Install a plain data source behind the proxy without retaining it.
   *
   * @throws RxBindError `RXBIND_P300` when another data source is installed
   */
  setDataSource(dataSource: CollectionViewDataSource): Subscription {
    return CollectionViewDataSourceProxy.installForwardDataSource(this.base, dataSource, false);
  }

  // ── Events ──────────────────────────────────────────────

  /** Index paths of selected items */
  get itemSelected(): ControlEvent<IndexPath> {
    return new ControlEvent(this.delegate.didSelectItemAt$.pipe(map(([, path]) => path)));
  }

  /** Index paths of deselected items */
  get itemDeselected(): ControlEvent<IndexPath> {
    return new ControlEvent(this.delegate.didDeselectItemAt$.pipe(map(([, path]) => path)));
  }

  /** Focus movements between cells */
  get didUpdateFocus(): ControlEvent<FocusUpdateContext> {
    return new ControlEvent(this.delegate.didUpdateFocus$.pipe(map(([, context]) => context)));
  }

  /**
   * Models of selected items, read from the bound data source.
   * A model failing `guard` ends the stream with a binding error.
   */
  modelSelected(): ControlEvent<unknown>;
  modelSelected<T>(guard: ModelGuard<T>): ControlEvent<T>;
  modelSelected<T>(guard?: ModelGuard<T>): ControlEvent<unknown> {
    return this.modelEvent(this.itemSelected, guard);
  }

  /** Models of deselected items, read from the bound data source */
  modelDeselected(): ControlEvent<unknown>;
  modelDeselected<T>(guard: ModelGuard<T>): ControlEvent<T>;
  modelDeselected<T>(guard?: ModelGuard<T>): ControlEvent<unknown> {
    return this.modelEvent(this.itemDeselected, guard);
  }

  /**
   * The model at `path` in the bound sectioned data source.
   *
   * @throws RxBindError `RXBIND_D200` when no sectioned data source is bound
   * @throws RxBindError `RXBIND_D201` when nothing is at `path`
   * @throws RxBindError `RXBIND_D204` when the model fails `guard`
   */
  modelAt(path: IndexPath): unknown;
  modelAt<T>(path: IndexPath, guard: ModelGuard<T>): T;
  modelAt<T>(path: IndexPath, guard?: ModelGuard<T>): unknown {
    const forward = this.dataSource.forwardToDelegate();
    if (!isSectionedViewDataSource(forward)) {
      throw RxBindError.fromCode('RXBIND_D200');
    }

    const model = forward.modelAt(path);
    if (guard && !guard(model)) {
      throw RxBindError.fromCode('RXBIND_D204', { section: path.section, item: path.item });
    }
    return model;
  }

  private modelEvent<T>(
    paths: Observable<IndexPath>,
    guard: ModelGuard<T> | undefined
  ): ControlEvent<unknown> {
    const view = new WeakRef(this.base);
    return new ControlEvent(
      paths.pipe(
        mergeMap((path) => {
          const current = view.deref();
          if (!current) return EMPTY;
          const reactive = new CollectionViewRx(current);
          return of(guard ? reactive.modelAt(path, guard) : reactive.modelAt(path));
        })
      )
    );
  }
}

/** Reactive extension of `view` */
export function rx(view: CollectionView): CollectionViewRx {
  return new CollectionViewRx(view);
}
