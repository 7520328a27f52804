/**
 * Binder run: scan, render, resolve pagination, merge, annotate, publish.
 *
 * Phases run strictly one after another. The merged document is built in
 * "{finalOutput}.partial" and only renamed over the final output once every
 * annotation step has succeeded, so a failed run leaves the previous output
 * untouched.
 */

import fs from 'fs-extra';
import path from 'node:path';
import type { BinderConfig } from './config.js';
import type { Logger } from './logger.js';
import type {
  BatesMap,
  Formatter,
  Item,
  LinkResult,
  MergeReport,
  Merger,
  PageAnnotator,
  PageCounter,
  Renderer,
  Unit
} from './types.js';
import { EmptyBinderError, OutputWriteFailure, errorMessage } from './errors.js';
import { scanItems } from './scanner.js';
import { renderItemUnits } from './unit-renderer.js';
import { PaginationResolver, formatBates, type PaginationDrift } from './pagination.js';
import { fileItems, sequenceUnits } from './sequencer.js';
import { buildContentsLinks, buildOutline } from './cross-reference.js';
import { HtmlFormatter } from './formatter.js';
import { OfficeRenderer } from './office-renderer.js';
import { PdfMerger, PdfPageCounter } from './pdf-document.js';
import { PdfAnnotator } from './annotator.js';

/**
 * Collaborators for a run. Anything left out gets the production implementation.
 */
export interface BinderDeps {
  logger: Logger;
  formatter?: Formatter;
  renderer?: Renderer;
  pageCounter?: PageCounter;
  merger?: Merger;
  annotator?: PageAnnotator;
}

export interface BinderResult {
  outputPath: string;
  items: Item[];
  batesMap: BatesMap;
  /** Units in assembly order, contents first */
  unitOrder: Unit[];
  contentsPageCount: number;
  drift: PaginationDrift | null;
  totalPages: number;
  merge: MergeReport;
  links: LinkResult[];
}

function reportLinks(results: readonly LinkResult[], logger: Logger): void {
  for (const result of results) {
    if (result.status === 'not-found') {
      logger.warn(result.warning.message);
    } else if (result.status === 'invalid-target') {
      logger.warn(`Link target page ${result.request.targetPageIndex + 1} is out of range for "${result.request.text.trim()}"`);
    }
  }
}

async function publish(partialPath: string, finalOutput: string): Promise<void> {
  try {
    await fs.rename(partialPath, finalOutput);
  } catch (err) {
    throw new OutputWriteFailure(`Cannot replace ${finalOutput}: ${errorMessage(err)}`, finalOutput);
  }
}

/**
 * Remove the run's intermediate files, then the work directory if nothing else is left in it.
 */
export async function cleanupWorkFiles(workDir: string, artifacts: readonly string[], logger: Logger): Promise<void> {
  for (const artifact of new Set(artifacts)) {
    await fs.remove(artifact);
  }
  if ((await fs.pathExists(workDir)) && (await fs.readdir(workDir)).length === 0) {
    await fs.remove(workDir);
  }
  logger.info(`Cleaned up ${new Set(artifacts).size} intermediate file(s)`);
}

export async function runBinder(config: Readonly<BinderConfig>, deps: BinderDeps): Promise<BinderResult> {
  const { logger } = deps;
  const formatter = deps.formatter ?? new HtmlFormatter({ date: config.contentsDate });
  const renderer = deps.renderer ?? new OfficeRenderer({
    sofficePath: config.sofficePath,
    timeoutMs: config.renderTimeoutMs,
    logger: logger.child('Render')
  });
  const pageCounter = deps.pageCounter ?? new PdfPageCounter(logger.child('Pages'));
  const merger = deps.merger ?? new PdfMerger(logger.child('Merge'));
  const annotator = deps.annotator ?? new PdfAnnotator(logger.child('Annotate'));

  const partialPath = `${config.finalOutput}.partial`;
  const artifacts: string[] = [];

  logger.info(`Binding documents under ${config.rootDir}`);
  await fs.ensureDir(config.workDir);

  try {
    const items = scanItems({
      rootDir: config.rootDir,
      outputDir: config.workDir,
      finalOutput: config.finalOutput,
      excludeDirs: config.excludeDirs,
      documentExtensions: config.documentExtensions,
      pageExtensions: config.pageExtensions,
      logger: logger.child('Scan')
    });
    const files = fileItems(items);
    if (files.length === 0) {
      const extensions = [...config.documentExtensions, ...config.pageExtensions].join(', ');
      throw new EmptyBinderError(`No ${extensions} files found under ${config.rootDir}`);
    }
    logger.info(`Found ${files.length} file(s) and ${items.length - files.length} folder(s)`);

    const rendered = await renderItemUnits(
      { formatter, renderer, pageCounter, logger: logger.child('Render') },
      files,
      { workDir: config.workDir, concurrency: config.concurrency }
    );
    artifacts.push(...rendered.artifacts);

    const resolver = new PaginationResolver(
      { formatter, renderer, pageCounter, logger: logger.child('Pagination') },
      { workDir: config.workDir, start: config.batesStart, onContentsDrift: config.onContentsDrift }
    );
    const resolution = await resolver.resolve(items, rendered.unitsByIndex);
    artifacts.push(...resolution.artifacts);

    const unitOrder = sequenceUnits(resolution.contentsUnit, files, rendered.unitsByIndex);
    const merge = await merger.merge(unitOrder.map(unit => unit.path), partialPath);

    await annotator.stampSequential(partialPath, config.batesStart, config.batesFontSize);
    await annotator.setOutline(
      partialPath,
      buildOutline(items, resolution.batesMap, { start: config.batesStart, mode: config.outlineMode })
    );
    const links = await annotator.insertLinks(
      partialPath,
      buildContentsLinks(items, resolution.batesMap, {
        start: config.batesStart,
        contentsPageCount: resolution.committedPageCount
      })
    );
    reportLinks(links, logger);

    await publish(partialPath, config.finalOutput);
    const lastPage = config.batesStart + merge.pageCount - 1;
    logger.info(
      `Final PDF written: ${path.basename(config.finalOutput)} ` +
      `(${merge.pageCount} pages, ${formatBates(config.batesStart)}-${formatBates(lastPage)})`
    );

    if (config.keepWorkFiles) {
      logger.info(`Keeping intermediate files in ${config.workDir}`);
    } else {
      await cleanupWorkFiles(config.workDir, artifacts, logger);
    }

    return {
      outputPath: config.finalOutput,
      items,
      batesMap: resolution.batesMap,
      unitOrder,
      contentsPageCount: resolution.committedPageCount,
      drift: resolution.drift,
      totalPages: merge.pageCount,
      merge,
      links
    };
  } catch (err) {
    await fs.remove(partialPath);
    await fs.remove(`${partialPath}.tmp`);
    throw err;
  }
}
