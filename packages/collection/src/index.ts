/**
 * @rxbind/collection: reactive DOM collection views.
 *
 * A {@link CollectionView} renders cells from a data source into a
 * container element. `rx(view)` binds RxJS streams to its items and turns
 * its selection and focus callbacks into streams.
 *
 * @example
 * ```typescript
 * import { CollectionView, rx } from '@rxbind/collection';
 *
 * const view = new CollectionView(document.querySelector('#todos')!);
 * view.register('Todo', () => document.createElement('li'));
 *
 * rx(view).itemsWithCell(
 *   { cellIdentifier: 'Todo', cellType: HTMLLIElement },
 *   todos$,
 *   (row, todo, cell) => {
 *     cell.textContent = todo.title;
 *   }
 * );
 *
 * rx(view).itemSelected.subscribe((path) => console.log('selected row', path.item));
 * ```
 *
 * @module @rxbind/collection
 */

// Types
export type {
  CollectionViewDataSource,
  CollectionViewDelegate,
  FocusUpdateContext,
  ReactiveCollectionViewDataSource,
  SectionedViewDataSource,
} from './types.js';
export { isSectionedViewDataSource } from './types.js';

// Index paths
export {
  compareIndexPaths,
  formatIndexPath,
  indexPath,
  indexPathEquals,
  parseIndexPath,
  type IndexPath,
} from './index-path.js';

// View
export {
  CollectionView,
  type CellFactory,
  type CollectionViewOptions,
} from './collection-view.js';

// Proxies
export { CollectionViewDataSourceProxy } from './data-source-proxy.js';
export { CollectionViewDelegateProxy } from './delegate-proxy.js';

// Data sources
export { ReactiveArrayDataSource, type ItemCellFactory } from './array-data-source.js';
export {
  SectionedReloadDataSource,
  sectionModel,
  type ConfigureCell,
  type SectionModel,
} from './sectioned-data-source.js';

// Reactive extension
export {
  CollectionViewRx,
  rx,
  type CellBindingOptions,
  type CellType,
  type ConfigureItemCell,
  type ModelGuard,
} from './collection-view-rx.js';
