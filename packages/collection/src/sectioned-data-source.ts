import { bindingErrorToInterface, RxBindError } from '@rxbind/core';
import type { ObservableNotification } from 'rxjs';
import type { CollectionView } from './collection-view.js';
import type { IndexPath } from './index-path.js';
import type {
  CollectionViewDataSource,
  ReactiveCollectionViewDataSource,
  SectionedViewDataSource,
} from './types.js';

/** One section: its model and its items */
export interface SectionModel<S, I> {
  readonly model: S;
  readonly items: readonly I[];
}

export function sectionModel<S, I>(model: S, items: readonly I[]): SectionModel<S, I> {
  return { model, items };
}

export type ConfigureCell<S, I> = (
  dataSource: SectionedReloadDataSource<S, I>,
  view: CollectionView,
  indexPath: IndexPath,
  item: I
) => HTMLElement;

/**
 * Multi-section data source fed by a stream of section arrays. Every
 * emission reloads the whole view.
 *
 * @example
 * ```typescript
 * const dataSource = new SectionedReloadDataSource<string, number>((ds, view, path, value) => {
 *   const cell = view.dequeueReusableCell('Cell', path);
 *   cell.textContent = `${value} in ${ds.sectionAt(path.section).model}`;
 *   return cell;
 * });
 *
 * rx(view).itemsWithDataSource(dataSource, of([
 *   sectionModel('First section', [1, 2, 3]),
 *   sectionModel('Second section', [4, 5]),
 * ]));
 * ```
 */
export class SectionedReloadDataSource<S, I>
  implements
    CollectionViewDataSource,
    ReactiveCollectionViewDataSource<readonly SectionModel<S, I>[]>,
    SectionedViewDataSource
{
  private sections: readonly SectionModel<S, I>[] = [];

  constructor(public configureCell: ConfigureCell<S, I>) {}

  get sectionModels(): readonly SectionModel<S, I>[] {
    return this.sections;
  }

  /** @throws RxBindError `RXBIND_D201` when `section` does not exist */
  sectionAt(section: number): SectionModel<S, I> {
    if (section < 0 || section >= this.sections.length) {
      throw RxBindError.fromCode('RXBIND_D201', { section, count: this.sections.length });
    }
    return this.sections[section];
  }

  numberOfSections(): number {
    return this.sections.length;
  }

  numberOfItemsInSection(_view: CollectionView, section: number): number {
    return this.sections[section]?.items.length ?? 0;
  }

  cellForItemAt(view: CollectionView, indexPath: IndexPath): HTMLElement {
    return this.configureCell(this, view, indexPath, this.modelAt(indexPath));
  }

  /** @throws RxBindError `RXBIND_D201` when there is no item at `indexPath` */
  modelAt(indexPath: IndexPath): I {
    const { items } = this.sectionAt(indexPath.section);
    if (indexPath.item < 0 || indexPath.item >= items.length) {
      throw RxBindError.fromCode('RXBIND_D201', {
        section: indexPath.section,
        item: indexPath.item,
        count: items.length,
      });
    }
    return items[indexPath.item];
  }

  collectionViewObservedEvent(
    view: CollectionView,
    event: ObservableNotification<readonly SectionModel<S, I>[]>
  ): void {
    switch (event.kind) {
      case 'N':
        this.sections = event.value;
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
