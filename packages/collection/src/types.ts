/**
 * Callback protocols of {@link CollectionView}.
 *
 * @module @rxbind/collection/types
 */

import type { ObservableNotification } from 'rxjs';
import type { CollectionView } from './collection-view.js';
import type { IndexPath } from './index-path.js';

/** Supplies the sections and cells of a collection view */
export interface CollectionViewDataSource {
  /** Number of sections (default: 1) */
  numberOfSections?(view: CollectionView): number;
  numberOfItemsInSection(view: CollectionView, section: number): number;
  /** Return the cell for an item, usually from `view.dequeueReusableCell` */
  cellForItemAt(view: CollectionView, indexPath: IndexPath): HTMLElement;
}

/** Focus movement between cells; an undefined side is outside the view */
export interface FocusUpdateContext {
  readonly previouslyFocusedIndexPath?: IndexPath;
  readonly nextFocusedIndexPath?: IndexPath;
}

/** Receives user interaction with a collection view */
export interface CollectionViewDelegate {
  didSelectItemAt?(view: CollectionView, indexPath: IndexPath): void;
  didDeselectItemAt?(view: CollectionView, indexPath: IndexPath): void;
  didUpdateFocus?(view: CollectionView, context: FocusUpdateContext): void;
}

/** A data source driven by stream notifications */
export interface ReactiveCollectionViewDataSource<E> {
  collectionViewObservedEvent(view: CollectionView, event: ObservableNotification<E>): void;
}

/** A data source that can return the model behind an index path */
export interface SectionedViewDataSource {
  /** @throws RxBindError `RXBIND_D201` when nothing is at `indexPath` */
  modelAt(indexPath: IndexPath): unknown;
}

export function isSectionedViewDataSource(value: unknown): value is SectionedViewDataSource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'modelAt' in value &&
    typeof value.modelAt === 'function'
  );
}
