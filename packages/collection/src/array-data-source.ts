import { bindingErrorToInterface, RxBindError } from '@rxbind/core';
import type { ObservableNotification } from 'rxjs';
import type { CollectionView } from './collection-view.js';
import type { IndexPath } from './index-path.js';
import type {
  CollectionViewDataSource,
  ReactiveCollectionViewDataSource,
  SectionedViewDataSource,
} from './types.js';

/** Creates the cell for one element; `row` is the element's index */
export type ItemCellFactory<T> = (view: CollectionView, row: number, element: T) => HTMLElement;

/**
 * Single-section data source fed by a stream of element sequences.
 *
 * Each emitted sequence replaces the items and reloads the view.
 */
export class ReactiveArrayDataSource<T>
  implements
    CollectionViewDataSource,
    ReactiveCollectionViewDataSource<Iterable<T>>,
    SectionedViewDataSource
{
  private itemModels: readonly T[] | null = null;

  constructor(readonly cellFactory: ItemCellFactory<T>) {}

  /** Items of the last emitted sequence */
  get items(): readonly T[] {
    return this.itemModels ?? [];
  }

  numberOfSections(): number {
    return 1;
  }

  numberOfItemsInSection(_view: CollectionView, section: number): number {
    return section === 0 ? this.items.length : 0;
  }

  cellForItemAt(view: CollectionView, indexPath: IndexPath): HTMLElement {
    return this.cellFactory(view, indexPath.item, this.modelAt(indexPath));
  }

  /** @throws RxBindError `RXBIND_D201` when there is no item at `indexPath` */
  modelAt(indexPath: IndexPath): T {
    const items = this.items;
    if (indexPath.section !== 0 || indexPath.item < 0 || indexPath.item >= items.length) {
      throw RxBindError.fromCode('RXBIND_D201', {
        section: indexPath.section,
        item: indexPath.item,
        count: items.length,
      });
    }
    return items[indexPath.item];
  }

  collectionViewObservedEvent(view: CollectionView, event: ObservableNotification<Iterable<T>>): void {
    switch (event.kind) {
      case 'N':
        this.itemModels = Array.from(event.value);
        view.reloadData();
        break;
      case 'E':
        bindingErrorToInterface(event.error);
        break;
      case 'C':
        break;
    }
  }
}
