import type { FileItem, Item, ItemUnits, Unit } from './types.js';
import { AssemblyError } from './errors.js';

/**
 * File items in scan order
 */
export function fileItems(items: readonly Item[]): FileItem[] {
  return items.filter((item): item is FileItem => item.kind === 'file');
}

/**
 * Cover then content for each file, in scan order. Both the Bates arithmetic
 * and the merge read this sequence, so it is the only place the order is defined.
 */
export function sequenceItemUnits(
  files: readonly FileItem[],
  unitsByIndex: ReadonlyMap<string, ItemUnits>
): Unit[] {
  const sequence: Unit[] = [];
  for (const file of files) {
    const units = unitsByIndex.get(file.index);
    if (!units) {
      throw new AssemblyError(`No rendered units for item ${file.index} (${file.name})`);
    }
    sequence.push(units.cover, units.content);
  }
  return sequence;
}

/**
 * Full assembly order: the contents unit first, then every file's cover and content.
 */
export function sequenceUnits(
  contents: Unit,
  files: readonly FileItem[],
  unitsByIndex: ReadonlyMap<string, ItemUnits>
): Unit[] {
  return [contents, ...sequenceItemUnits(files, unitsByIndex)];
}
