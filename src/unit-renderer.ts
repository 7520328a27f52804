/**
 * Rendering stage: turns every file item into a cover unit and a content unit.
 *
 * Items are independent, so they go through the worker pool; the results are
 * joined into a map keyed by item index before anything reads them.
 */

import fs from 'fs-extra';
import path from 'node:path';
import type { FileItem, Formatter, ItemUnits, PageCounter, Renderer } from './types.js';
import type { Logger } from './logger.js';
import { RenderFailure, errorMessage, type ItemRenderFailure } from './errors.js';
import { runPool } from './worker-pool.js';

/**
 * Render and check that the target really exists afterwards.
 */
export async function renderToPdf(renderer: Renderer, sourcePath: string, targetPath: string): Promise<string> {
  if (!(await fs.pathExists(sourcePath))) {
    throw new RenderFailure(`${sourcePath} not found`);
  }
  const produced = await renderer.render(sourcePath, targetPath);
  if (!(await fs.pathExists(produced))) {
    throw new RenderFailure(`Conversion failed: ${produced} not created`);
  }
  return produced;
}

export interface UnitRenderDeps {
  formatter: Formatter;
  renderer: Renderer;
  pageCounter: PageCounter;
  logger: Logger;
}

export interface RenderedUnits {
  unitsByIndex: ReadonlyMap<string, ItemUnits>;
  /** Intermediate files written into the work directory */
  artifacts: string[];
}

async function renderOne(deps: UnitRenderDeps, workDir: string, file: FileItem, artifacts: string[]): Promise<ItemUnits> {
  const { formatter, renderer, pageCounter, logger } = deps;

  const coverSource = path.join(workDir, `cover_${file.index}${formatter.extension}`);
  const coverPdf = path.join(workDir, `cover_${file.index}.pdf`);
  logger.debug(`Creating cover page: ${path.basename(coverSource)}`);
  await formatter.renderCoverPage(file.index, file.name, coverSource);
  artifacts.push(coverSource);
  await renderToPdf(renderer, coverSource, coverPdf);
  artifacts.push(coverPdf);
  const coverPages = await pageCounter.countPages(coverPdf);

  let contentPdf = file.path;
  if (file.sourceKind === 'document-source') {
    contentPdf = path.join(workDir, `file_${file.index}.pdf`);
    logger.info(`Converting ${file.name} -> ${path.basename(contentPdf)}`);
    await renderToPdf(renderer, file.path, contentPdf);
    artifacts.push(contentPdf);
  }
  const contentPages = await pageCounter.countPages(contentPdf);

  logger.debug(
    `Processed ${file.index}: cover=${path.basename(coverPdf)} (${coverPages} pages), ` +
    `file=${path.basename(contentPdf)} (${contentPages} pages)`
  );

  return {
    cover: { role: 'cover', itemIndex: file.index, path: coverPdf, pageCount: coverPages },
    content: { role: 'content', itemIndex: file.index, path: contentPdf, pageCount: contentPages }
  };
}

/**
 * Render every file's cover and content. If any item fails, all failures are
 * logged and a single RenderFailure naming them is thrown once the pool drains.
 */
export async function renderItemUnits(
  deps: UnitRenderDeps,
  files: readonly FileItem[],
  options: { workDir: string; concurrency: number }
): Promise<RenderedUnits> {
  const artifacts: string[] = [];
  const settled = await runPool(files, options.concurrency, file => renderOne(deps, options.workDir, file, artifacts));

  const unitsByIndex = new Map<string, ItemUnits>();
  const failures: ItemRenderFailure[] = [];

  settled.forEach((outcome, position) => {
    const file = files[position];
    if (outcome.ok) {
      unitsByIndex.set(file.index, outcome.value);
    } else {
      const message = errorMessage(outcome.error);
      deps.logger.error(`Error rendering ${file.index} (${file.name}): ${message}`);
      failures.push({ itemIndex: file.index, sourcePath: file.path, message });
    }
  });

  if (failures.length > 0) {
    const names = failures.map(f => f.itemIndex).join(', ');
    throw new RenderFailure(`Rendering failed for ${failures.length} item(s): ${names}`, failures);
  }

  return { unitsByIndex, artifacts };
}
