import type { BatesMap, ContentsEntry, Item, LinkRequest, OutlineEntry } from './types.js';
import type { OutlineMode } from './config.js';

const INDENT = '    ';

/**
 * The text of a contents row as the formatter lays it out:
 * four spaces per level below the top, then "{index} - {name}".
 */
export function contentsLineText(entry: Pick<ContentsEntry, 'index' | 'displayName' | 'depth'>): string {
  return `${INDENT.repeat(Math.max(0, entry.depth - 1))}${entry.index} - ${entry.displayName}`;
}

export function entryTitle(item: Pick<Item, 'index' | 'name'>): string {
  return `${item.index} - ${item.name}`;
}

/**
 * One contents row per item. Without a Bates map (the dry pass) no row has a number.
 */
export function buildContentsEntries(items: readonly Item[], batesMap?: BatesMap): ContentsEntry[] {
  return items.map(item => {
    const entry: ContentsEntry = {
      index: item.index,
      displayName: item.name,
      isDirectory: item.kind === 'directory',
      depth: item.depth
    };
    if (item.kind === 'file' && batesMap?.has(item.index)) {
      entry.pageNumber = batesMap.get(item.index);
    }
    return entry;
  });
}

export interface OutlineOptions {
  start: number;
  mode?: OutlineMode;
}

/**
 * Bookmarks pointing at each file's first page.
 *
 * flat: one level-1 entry per file.
 * nested: directories are added too and every entry sits at its index depth;
 * a directory targets the first file below it and is left out if it has none.
 */
export function buildOutline(items: readonly Item[], batesMap: BatesMap, options: OutlineOptions): OutlineEntry[] {
  const { start, mode = 'flat' } = options;
  const outline: OutlineEntry[] = [];

  items.forEach((item, position) => {
    if (item.kind === 'file') {
      const page = batesMap.get(item.index);
      if (page === undefined) return;
      outline.push({
        level: mode === 'nested' ? item.depth : 1,
        title: entryTitle(item),
        pageIndex: page - start
      });
      return;
    }

    if (mode !== 'nested') return;

    // Pre-order: the subtree is the run of deeper items right after the directory
    for (let i = position + 1; i < items.length && items[i].depth > item.depth; i++) {
      const descendant = items[i];
      const page = descendant.kind === 'file' ? batesMap.get(descendant.index) : undefined;
      if (page !== undefined) {
        outline.push({ level: item.depth, title: entryTitle(item), pageIndex: page - start });
        break;
      }
    }
  });

  return outline;
}

export interface LinkOptions {
  start: number;
  /** Page count of the committed contents unit at the front of the document */
  contentsPageCount: number;
}

/**
 * One link request per file: its contents row, searched on every contents page,
 * pointing at the file's first page.
 */
export function buildContentsLinks(items: readonly Item[], batesMap: BatesMap, options: LinkOptions): LinkRequest[] {
  const searchPages = Array.from({ length: options.contentsPageCount }, (_, i) => i);
  const links: LinkRequest[] = [];

  for (const item of items) {
    if (item.kind !== 'file') continue;
    const page = batesMap.get(item.index);
    if (page === undefined) continue;
    links.push({
      text: contentsLineText({ index: item.index, displayName: item.name, depth: item.depth }),
      searchPages,
      targetPageIndex: page - options.start
    });
  }

  return links;
}
