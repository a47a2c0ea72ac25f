/**
 * A DOM collection view.
 *
 * Renders the sections and cells a {@link CollectionViewDataSource} supplies
 * into a container element, recycles cells by reuse identifier, and reports
 * selection and focus to a {@link CollectionViewDelegate}.
 *
 * ```
 * <container>
 *   <div data-rx-section="0">
 *     <cell data-rx-reuse-id="Cell" data-rx-index-path="0-0">
 *     <cell data-rx-reuse-id="Cell" data-rx-index-path="0-1">
 *   </div>
 *   <div data-rx-section="1"> ...
 * </container>
 * ```
 *
 * @module @rxbind/collection/collection-view
 */

import { getBindingConfig, RxBindError, type RxBindLogger } from '@rxbind/core';
import { Subject, type Observable } from 'rxjs';
import {
  compareIndexPaths,
  formatIndexPath,
  indexPath,
  type IndexPath,
} from './index-path.js';
import type { CollectionViewDataSource, CollectionViewDelegate } from './types.js';

/** Creates a new cell for a reuse identifier */
export type CellFactory = () => HTMLElement;

export interface CollectionViewOptions {
  /** Clicking a cell selects it (default: true) */
  allowsSelection?: boolean;
  /** Several cells may be selected; clicking a selected cell deselects it (default: false) */
  allowsMultipleSelection?: boolean;
  /** Class added to selected cells (default: 'rx-selected') */
  selectedClass?: string;
}

const CELL_SELECTOR = '[data-rx-index-path]';

interface RenderedSections {
  counts: number[];
  cells: Array<[IndexPath, HTMLElement]>;
  sections: HTMLElement[];
}

export class CollectionView {
  readonly container: HTMLElement;

  /** Supplies sections and cells; read on every {@link reloadData} */
  dataSource: CollectionViewDataSource | null = null;

  /** Receives selection and focus callbacks */
  delegate: CollectionViewDelegate | null = null;

  private readonly options: Required<CollectionViewOptions>;
  private readonly factories = new Map<string, CellFactory>();
  private readonly reusePool = new Map<string, HTMLElement[]>();
  private readonly cells = new Map<string, HTMLElement>();
  private readonly cellPaths = new WeakMap<HTMLElement, IndexPath>();
  private readonly selected = new Map<string, IndexPath>();
  private readonly destroyed$$ = new Subject<void>();
  private sectionCounts: number[] = [];
  private focused: IndexPath | undefined;
  private destroyed = false;
  /** Cells dequeued by the reload in progress */
  private inFlight: HTMLElement[] | null = null;

  /** Emits once and completes when the view is destroyed */
  readonly destroyed$: Observable<void> = this.destroyed$$.asObservable();

  constructor(container: HTMLElement, options: CollectionViewOptions = {}) {
    this.container = container;
    this.options = {
      allowsSelection: options.allowsSelection ?? true,
      allowsMultipleSelection: options.allowsMultipleSelection ?? false,
      selectedClass: options.selectedClass ?? 'rx-selected',
    };

    this.container.addEventListener('click', this.handleClick);
    this.container.addEventListener('focusin', this.handleFocusIn);
    this.container.addEventListener('focusout', this.handleFocusOut);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get allowsMultipleSelection(): boolean {
    return this.options.allowsMultipleSelection;
  }

  private get log(): RxBindLogger {
    return getBindingConfig().logger.child('collection-view');
  }

  // ── Cells ───────────────────────────────────────────────

  /** Register the factory that creates cells for `identifier` */
  register(identifier: string, factory: CellFactory): void {
    this.factories.set(identifier, factory);
  }

  /**
   * Return a recycled cell for `identifier`, or a new one from its factory.
   *
   * @throws RxBindError `RXBIND_D202` when `identifier` is not registered
   */
  dequeueReusableCell(identifier: string, path: IndexPath): HTMLElement {
    const factory = this.factories.get(identifier);
    if (!factory) {
      throw RxBindError.fromCode('RXBIND_D202', { identifier });
    }

    const cell = this.reusePool.get(identifier)?.pop() ?? factory();
    cell.dataset['rxReuseId'] = identifier;
    cell.dataset['rxIndexPath'] = formatIndexPath(path);
    this.inFlight?.push(cell);
    return cell;
  }

  /**
   * Rebuild every section and cell from the data source.
   *
   * Nothing is committed until every cell has been created. When the data
   * source throws, the view is left empty, the cells dequeued so far go back
   * to their reuse pools, and the error is rethrown.
   */
  reloadData(): void {
    if (this.destroyed) return;

    const end = this.log.time('reloadData');
    this.enqueueCells();
    this.selected.clear();
    this.focused = undefined;
    this.sectionCounts = [];
    this.container.replaceChildren();

    const dataSource = this.dataSource;
    if (!dataSource) {
      end({ sections: 0 });
      return;
    }

    const frame = this.renderSections(dataSource);
    this.sectionCounts = frame.counts;
    for (const [path, cell] of frame.cells) {
      this.cellPaths.set(cell, path);
      this.cells.set(formatIndexPath(path), cell);
    }
    this.container.replaceChildren(...frame.sections);

    end({ sections: frame.counts.length, cells: this.cells.size });
  }

  numberOfSections(): number {
    return this.sectionCounts.length;
  }

  numberOfItems(section: number): number {
    return this.sectionCounts[section] ?? 0;
  }

  cellForItem(path: IndexPath): HTMLElement | undefined {
    return this.cells.get(formatIndexPath(path));
  }

  indexPathForCell(cell: Element): IndexPath | undefined {
    return cell instanceof HTMLElement ? this.cellPaths.get(cell) : undefined;
  }

  /** Rendered cells in section and item order */
  visibleCells(): HTMLElement[] {
    return [...this.cells.values()];
  }

  // ── Selection ───────────────────────────────────────────

  /**
   * Mark an item selected without notifying the delegate.
   *
   * @throws RxBindError `RXBIND_D201` when the item is not rendered
   */
  selectItem(path: IndexPath): void {
    const cell = this.requireCell(path);
    if (!this.options.allowsMultipleSelection) {
      for (const previous of this.indexPathsForSelectedItems()) {
        this.deselectItem(previous);
      }
    }
    this.selected.set(formatIndexPath(path), path);
    cell.classList.add(this.options.selectedClass);
    cell.setAttribute('aria-selected', 'true');
  }

  /** Clear an item's selection without notifying the delegate */
  deselectItem(path: IndexPath): void {
    const key = formatIndexPath(path);
    if (!this.selected.delete(key)) return;

    const cell = this.cells.get(key);
    if (cell) {
      cell.classList.remove(this.options.selectedClass);
      cell.removeAttribute('aria-selected');
    }
  }

  indexPathsForSelectedItems(): IndexPath[] {
    return [...this.selected.values()].sort(compareIndexPaths);
  }

  isSelected(path: IndexPath): boolean {
    return this.selected.has(formatIndexPath(path));
  }

  // ── Lifecycle ───────────────────────────────────────────

  /** Detach from the container; the view does nothing afterwards */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    this.container.removeEventListener('click', this.handleClick);
    this.container.removeEventListener('focusin', this.handleFocusIn);
    this.container.removeEventListener('focusout', this.handleFocusOut);
    this.container.replaceChildren();

    this.cells.clear();
    this.reusePool.clear();
    this.selected.clear();
    this.sectionCounts = [];
    this.dataSource = null;
    this.delegate = null;

    this.destroyed$$.next();
    this.destroyed$$.complete();
  }

  // ── Private ─────────────────────────────────────────────

  private requireCell(path: IndexPath): HTMLElement {
    const cell = this.cells.get(formatIndexPath(path));
    if (!cell) {
      throw RxBindError.fromCode('RXBIND_D201', { section: path.section, item: path.item });
    }
    return cell;
  }

  /** Build every section off-document; on a throw, recycle what was dequeued */
  private renderSections(dataSource: CollectionViewDataSource): RenderedSections {
    const dequeued: HTMLElement[] = [];
    this.inFlight = dequeued;
    try {
      return this.buildSections(dataSource);
    } catch (error) {
      this.recycle(dequeued);
      throw error;
    } finally {
      this.inFlight = null;
    }
  }

  private buildSections(dataSource: CollectionViewDataSource): RenderedSections {
    const document = this.container.ownerDocument;
    const frame: RenderedSections = { counts: [], cells: [], sections: [] };

    const sectionCount = dataSource.numberOfSections?.(this) ?? 1;
    for (let section = 0; section < sectionCount; section++) {
      const itemCount = dataSource.numberOfItemsInSection(this, section);
      const sectionElement = document.createElement('div');
      sectionElement.dataset['rxSection'] = String(section);

      for (let item = 0; item < itemCount; item++) {
        const path = indexPath(item, section);
        const cell = dataSource.cellForItemAt(this, path);
        cell.dataset['rxIndexPath'] = formatIndexPath(path);
        frame.cells.push([path, cell]);
        sectionElement.append(cell);
      }

      frame.counts.push(itemCount);
      frame.sections.push(sectionElement);
    }
    return frame;
  }

  private enqueueCells(): void {
    this.recycle(this.cells.values());
    this.cells.clear();
  }

  /** Strip per-item state and return cells to their reuse pools */
  private recycle(cells: Iterable<HTMLElement>): void {
    for (const cell of cells) {
      cell.classList.remove(this.options.selectedClass);
      cell.removeAttribute('aria-selected');
      delete cell.dataset['rxIndexPath'];
      this.cellPaths.delete(cell);

      const identifier = cell.dataset['rxReuseId'];
      if (identifier === undefined) continue;

      const pool = this.reusePool.get(identifier);
      if (pool) {
        pool.push(cell);
      } else {
        this.reusePool.set(identifier, [cell]);
      }
    }
  }

  /** The index path of the innermost cell of this view containing `target` */
  private pathForEventTarget(target: EventTarget | null): IndexPath | undefined {
    let element = target instanceof Element ? target.closest<HTMLElement>(CELL_SELECTOR) : null;
    while (element && this.container.contains(element)) {
      const path = this.cellPaths.get(element);
      if (path) return path;
      element = element.parentElement?.closest<HTMLElement>(CELL_SELECTOR) ?? null;
    }
    return undefined;
  }

  private readonly handleClick = (event: Event): void => {
    if (!this.options.allowsSelection) return;
    const path = this.pathForEventTarget(event.target);
    if (!path) return;

    if (this.isSelected(path) && this.options.allowsMultipleSelection) {
      this.deselectItem(path);
      this.delegate?.didDeselectItemAt?.(this, path);
      return;
    }

    if (!this.options.allowsMultipleSelection) {
      for (const previous of this.indexPathsForSelectedItems()) {
        if (compareIndexPaths(previous, path) === 0) continue;
        this.deselectItem(previous);
        this.delegate?.didDeselectItemAt?.(this, previous);
      }
    }

    this.selectItem(path);
    this.delegate?.didSelectItemAt?.(this, path);
  };

  private readonly handleFocusIn = (event: Event): void => {
    const path = this.pathForEventTarget(event.target);
    if (!path) return;
    if (this.focused && compareIndexPaths(this.focused, path) === 0) return;

    const previouslyFocusedIndexPath = this.focused;
    this.focused = path;
    this.delegate?.didUpdateFocus?.(this, {
      previouslyFocusedIndexPath,
      nextFocusedIndexPath: path,
    });
  };

  private readonly handleFocusOut = (event: Event): void => {
    if (!this.focused) return;
    // Focus landing on a cell of this view is reported by focusin.
    const next = event instanceof FocusEvent ? event.relatedTarget : null;
    if (this.pathForEventTarget(next)) return;

    const previouslyFocusedIndexPath = this.focused;
    this.focused = undefined;
    this.delegate?.didUpdateFocus?.(this, {
      previouslyFocusedIndexPath,
      nextFocusedIndexPath: undefined,
    });
  };
}
