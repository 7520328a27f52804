/**
 * Pagination: Bates arithmetic and the two-pass contents resolution.
 *
 * The contents page lists every file's page number, but its own length shifts
 * those numbers. The cycle is broken in exactly two passes:
 *
 *   1. dry pass    - render the contents with empty number slots, measure C0
 *   2. commit pass - number everything from C0, render the contents again and
 *                    keep that render without iterating
 *
 * The committed render is measured once more. A different page count means the
 * committed numbers are off by the difference; that drift is reported (and is
 * fatal under the "fail" policy) but never re-solved.
 */

import path from 'node:path';
import type { BatesMap, FileItem, Formatter, Item, ItemUnits, PageCounter, Renderer, Unit } from './types.js';
import type { DriftPolicy } from './config.js';
import type { Logger } from './logger.js';
import { PaginationDriftError, RenderFailure, errorMessage } from './errors.js';
import { buildContentsEntries } from './cross-reference.js';
import { fileItems, sequenceItemUnits } from './sequencer.js';
import { renderToPdf } from './unit-renderer.js';

/**
 * Zero-padded to at least three digits: 7 -> "007", 1234 -> "1234"
 */
export function formatBates(pageNumber: number): string {
  return String(pageNumber).padStart(3, '0');
}

/**
 * Number each file from the item sequence (cover, content, cover, content...).
 * The first file starts at start + contentsPageCount; each unit advances the
 * count by exactly its own page count.
 */
export function computeBatesMap(sequence: readonly Unit[], contentsPageCount: number, start: number): BatesMap {
  const batesMap = new Map<string, number>();
  let current = start + contentsPageCount;

  for (const unit of sequence) {
    if (unit.role === 'cover' && unit.itemIndex !== undefined) {
      batesMap.set(unit.itemIndex, current);
    }
    current += unit.pageCount;
  }

  return freezeMap(batesMap);
}

function freezeMap<K, V>(source: Map<K, V>): ReadonlyMap<K, V> {
  const frozen = new Map(source);
  const reject = (): never => {
    throw new TypeError('Bates map is read-only');
  };
  frozen.set = reject;
  frozen.delete = reject;
  frozen.clear = reject;
  return Object.freeze(frozen);
}

export interface PaginationDrift {
  dryPageCount: number;
  committedPageCount: number;
  /** How far every committed number is off */
  delta: number;
}

export interface Resolution {
  batesMap: BatesMap;
  /** The committed contents render, first in the assembly */
  contentsUnit: Unit;
  dryPageCount: number;
  committedPageCount: number;
  drift: PaginationDrift | null;
  /** Paths written by the resolver (for cleanup) */
  artifacts: string[];
}

export interface ResolverDeps {
  formatter: Formatter;
  renderer: Renderer;
  pageCounter: PageCounter;
  logger: Logger;
}

export interface ResolverOptions {
  workDir: string;
  start: number;
  onContentsDrift: DriftPolicy;
}

export class PaginationResolver {
  constructor(private readonly deps: ResolverDeps, private readonly options: ResolverOptions) {}

  async resolve(items: readonly Item[], unitsByIndex: ReadonlyMap<string, ItemUnits>): Promise<Resolution> {
    const { logger } = this.deps;
    const { start } = this.options;
    const files: FileItem[] = fileItems(items);
    const artifacts: string[] = [];

    // Dry pass
    const dry = await this.renderContents(items, undefined, 'contents_dummy', artifacts);
    logger.debug(`Dry contents render: ${dry.pageCount} page(s)`);

    // Commit pass
    const batesMap = computeBatesMap(sequenceItemUnits(files, unitsByIndex), dry.pageCount, start);
    logger.debug(`Bates mapping: ${JSON.stringify(Object.fromEntries(batesMap))}`);

    const committed = await this.renderContents(items, batesMap, 'contents', artifacts);

    let drift: PaginationDrift | null = null;
    if (committed.pageCount !== dry.pageCount) {
      drift = {
        dryPageCount: dry.pageCount,
        committedPageCount: committed.pageCount,
        delta: committed.pageCount - dry.pageCount
      };
      const message =
        `Contents page count changed from ${dry.pageCount} to ${committed.pageCount} once numbers were filled in; ` +
        `committed Bates numbers are off by ${drift.delta}`;
      if (this.options.onContentsDrift === 'fail') {
        throw new PaginationDriftError(message, dry.pageCount, committed.pageCount);
      }
      logger.warn(message);
    }

    return {
      batesMap,
      contentsUnit: { role: 'contents', path: committed.pdfPath, pageCount: committed.pageCount },
      dryPageCount: dry.pageCount,
      committedPageCount: committed.pageCount,
      drift,
      artifacts
    };
  }

  private async renderContents(
    items: readonly Item[],
    batesMap: BatesMap | undefined,
    baseName: string,
    artifacts: string[]
  ): Promise<{ pdfPath: string; pageCount: number }> {
    const { formatter, renderer, pageCounter } = this.deps;
    const sourcePath = path.join(this.options.workDir, `${baseName}${formatter.extension}`);
    const pdfPath = path.join(this.options.workDir, `${baseName}.pdf`);

    await formatter.renderContentsPage(buildContentsEntries(items, batesMap), sourcePath);
    artifacts.push(sourcePath);
    try {
      await renderToPdf(renderer, sourcePath, pdfPath);
    } catch (err) {
      throw new RenderFailure(`Contents page render failed: ${errorMessage(err)}`);
    }
    artifacts.push(pdfPath);

    return { pdfPath, pageCount: await pageCounter.countPages(pdfPath) };
  }
}
