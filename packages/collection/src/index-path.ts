/**
 * Location of an item in a sectioned view.
 */
export interface IndexPath {
  readonly section: number;
  readonly item: number;
}

/** Create an index path; the section defaults to 0 */
export function indexPath(item: number, section = 0): IndexPath {
  return { section, item };
}

export function indexPathEquals(a: IndexPath, b: IndexPath): boolean {
  return a.section === b.section && a.item === b.item;
}

/** Order by section, then item */
export function compareIndexPaths(a: IndexPath, b: IndexPath): number {
  return a.section - b.section || a.item - b.item;
}

/** `"section-item"`, the form stored in `data-rx-index-path` */
export function formatIndexPath(path: IndexPath): string {
  return `${path.section}-${path.item}`;
}

const INDEX_PATH_PATTERN = /^(\d+)-(\d+)$/;

/** Inverse of {@link formatIndexPath}; `undefined` when malformed */
export function parseIndexPath(value: string): IndexPath | undefined {
  const match = INDEX_PATH_PATTERN.exec(value);
  if (!match) return undefined;
  return { section: Number(match[1]), item: Number(match[2]) };
}
