/**
 * Page-document basics on top of pdf-lib: counting, merging and
 * temp-then-rename writes.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { PDFDocument } from 'pdf-lib';
import type { Logger } from './logger.js';
import type { MergeReport, MergeSkip, Merger, PageCounter } from './types.js';
import { MergeInputMissing, OutputWriteFailure, errorMessage } from './errors.js';

/**
 * Load a PDF, or null when the file is unreadable or not a PDF.
 */
export async function loadPdf(pdfPath: string): Promise<PDFDocument | null> {
  try {
    const bytes = await fs.readFile(pdfPath);
    return await PDFDocument.load(bytes, { ignoreEncryption: true });
  } catch {
    return null;
  }
}

/**
 * Write next to the target and rename over it, so readers never see a half-written file.
 */
export async function writeFileAtomic(targetPath: string, bytes: Uint8Array): Promise<void> {
  const tempPath = `${targetPath}.tmp`;
  try {
    await fs.outputFile(tempPath, bytes);
    await fs.rename(tempPath, targetPath);
  } catch (err) {
    await fs.remove(tempPath);
    throw new OutputWriteFailure(`Failed to write ${targetPath}: ${errorMessage(err)}`, targetPath);
  }
}

export class PdfPageCounter implements PageCounter {
  constructor(private readonly logger?: Logger) {}

  async countPages(pdfPath: string): Promise<number> {
    const doc = await loadPdf(pdfPath);
    if (!doc) {
      this.logger?.error(`Error counting pages in ${pdfPath}`);
      return 0;
    }
    return doc.getPageCount();
  }
}

/**
 * Concatenates PDFs in the order given. Missing, unreadable and empty inputs
 * are skipped with a warning; the merge only fails if nothing is left.
 */
export class PdfMerger implements Merger {
  constructor(private readonly logger: Logger) {}

  async merge(inputs: readonly string[], outputPath: string): Promise<MergeReport> {
    this.logger.info(`Merging PDFs into ${path.basename(outputPath)}`);
    const output = await PDFDocument.create();
    const appended: string[] = [];
    const skipped: MergeSkip[] = [];

    const skip = (inputPath: string, reason: MergeSkip['reason'], message: string) => {
      this.logger.warn(message);
      skipped.push({ inputPath, reason, warning: new MergeInputMissing(message, inputPath) });
    };

    for (const inputPath of inputs) {
      if (!(await fs.pathExists(inputPath))) {
        skip(inputPath, 'missing', `File missing: ${path.basename(inputPath)}`);
        continue;
      }
      const source = await loadPdf(inputPath);
      if (!source) {
        skip(inputPath, 'unreadable', `Skipping ${path.basename(inputPath)}, unreadable.`);
        continue;
      }
      const pages = source.getPageCount();
      if (pages === 0) {
        skip(inputPath, 'empty', `Skipping ${path.basename(inputPath)}, 0 pages.`);
        continue;
      }

      this.logger.debug(`Appending ${path.basename(inputPath)} (${pages} pages)`);
      const copiedPages = await output.copyPages(source, source.getPageIndices());
      copiedPages.forEach(page => output.addPage(page));
      appended.push(inputPath);
    }

    if (appended.length === 0) {
      throw new OutputWriteFailure(`Nothing to merge into ${outputPath}`, outputPath);
    }

    await writeFileAtomic(outputPath, await output.save());
    this.logger.info(`Merged PDF saved: ${path.basename(outputPath)}`);

    return { outputPath, pageCount: output.getPageCount(), appended, skipped };
  }
}
