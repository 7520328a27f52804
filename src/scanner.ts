import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Item, SourceKind } from './types.js';
import { ScanFailure, errorMessage } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Options for scanning the source tree
 */
export interface ScanOptions {
  /** Directory to walk */
  rootDir: string;
  /** Work/output directory, skipped along with everything under it */
  outputDir?: string;
  /** Final assembled PDF, never picked up as an input */
  finalOutput?: string;
  /** Further directories to skip (absolute) */
  excludeDirs?: readonly string[];
  /** Extensions that need rendering (default: .docx) */
  documentExtensions?: readonly string[];
  /** Extensions already in page form (default: .pdf) */
  pageExtensions?: readonly string[];
  /** Told about entries that are left out, such as dangling links */
  logger?: Logger;
}

interface DirListing {
  files: { name: string; fullPath: string; sourceKind: SourceKind }[];
  dirs: { name: string; fullPath: string }[];
}

/**
 * Case-insensitive name order; the raw name breaks ties so the order is total
 */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function isSameOrInside(candidate: string, dir: string): boolean {
  const rel = path.relative(dir, candidate);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Read one directory level, sorted and filtered. A directory that cannot be
 * read is fatal; a link that cannot be followed is left out.
 */
function listDirectory(
  dir: string,
  excludedDirs: string[],
  excludedFiles: Set<string>,
  kinds: Map<string, SourceKind>,
  logger?: Logger
): DirListing {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    throw new ScanFailure(`Cannot read directory ${dir}: ${err instanceof Error ? err.message : String(err)}`, dir);
  }

  const listing: DirListing = { files: [], dirs: [] };

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    let isFile = entry.isFile();
    let isDir = entry.isDirectory();

    // Follow symlinks the way a plain stat would
    if (entry.isSymbolicLink()) {
      try {
        const stat = fs.statSync(fullPath);
        isFile = stat.isFile();
        isDir = stat.isDirectory();
      } catch (err) {
        logger?.warn(`Skipping ${fullPath}, broken link: ${errorMessage(err)}`);
        continue;
      }
    }

    if (isDir) {
      if (!excludedDirs.some(excluded => isSameOrInside(fullPath, excluded))) {
        listing.dirs.push({ name: entry.name, fullPath });
      }
    } else if (isFile) {
      const sourceKind = kinds.get(path.extname(entry.name).toLowerCase());
      if (sourceKind && !excludedFiles.has(fullPath)) {
        listing.files.push({ name: entry.name, fullPath, sourceKind });
      }
    }
  }

  listing.files.sort((a, b) => compareNames(a.name, b.name));
  listing.dirs.sort((a, b) => compareNames(a.name, b.name));
  return listing;
}

/**
 * Walk the tree depth-first and number every file and directory.
 *
 * At each level files are numbered 1..n and subdirectories 1..m with
 * independent counters. A directory is emitted after its sibling files and
 * right before its own subtree, which is numbered under "{index}.".
 */
export function scanItems(options: ScanOptions): Item[] {
  const rootDir = path.resolve(options.rootDir);
  const excludedDirs = [
    ...(options.outputDir ? [path.resolve(options.outputDir)] : []),
    ...(options.excludeDirs ?? []).map(dir => path.resolve(dir))
  ];
  const excludedFiles = new Set(options.finalOutput ? [path.resolve(options.finalOutput)] : []);

  const kinds = new Map<string, SourceKind>();
  for (const ext of options.documentExtensions ?? ['.docx']) {
    kinds.set(ext.toLowerCase(), 'document-source');
  }
  for (const ext of options.pageExtensions ?? ['.pdf']) {
    kinds.set(ext.toLowerCase(), 'page-document');
  }

  const items: Item[] = [];

  const walk = (dir: string, prefix: string, depth: number): void => {
    const { files, dirs } = listDirectory(dir, excludedDirs, excludedFiles, kinds, options.logger);

    files.forEach((file, i) => {
      items.push({
        kind: 'file',
        index: `${prefix}${i + 1}`,
        path: file.fullPath,
        name: file.name,
        depth,
        sourceKind: file.sourceKind
      });
    });

    dirs.forEach((sub, j) => {
      const index = `${prefix}${j + 1}`;
      items.push({ kind: 'directory', index, path: sub.fullPath, name: sub.name, depth });
      walk(sub.fullPath, `${index}.`, depth + 1);
    });
  };

  walk(rootDir, '', 1);
  return items;
}

/**
 * The parent prefix of an index ("2.1.3" -> "2.1"), or null at the top level
 */
export function parentIndex(index: string): string | null {
  const cut = index.lastIndexOf('.');
  return cut === -1 ? null : index.slice(0, cut);
}
