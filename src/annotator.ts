/**
 * Page annotation with pdf-lib: Bates stamps, the outline tree and
 * internal links. Every operation rewrites the file through a temp file.
 */

import fs from 'fs-extra';
import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFNumber,
  PDFRef,
  StandardFonts,
  rgb,
} from 'pdf-lib';
import type { Logger } from './logger.js';
import type { LinkRequest, LinkResult, OutlineEntry, PageAnnotator } from './types.js';
import { LinkTargetNotFound, OutputWriteFailure, errorMessage } from './errors.js';
import { formatBates } from './pagination.js';
import { writeFileAtomic } from './pdf-document.js';
import { extractPageLines, findLineMatches } from './text-search.js';

// Stamp geometry, measured from the bottom-right corner
const STAMP_RIGHT_OFFSET = 80;
const STAMP_BASELINE = 40;
const STAMP_BOX = { left: 10, below: 5, width: 70, height: 30 };
const STAMP_BACKGROUND = rgb(0.9, 0.9, 0.9);

interface OutlineNode {
  entry: OutlineEntry;
  ref: PDFRef;
  children: OutlineNode[];
}

function destination(doc: PDFDocument, pageRef: PDFRef): PDFArray {
  const dest = PDFArray.withContext(doc.context);
  dest.push(pageRef);
  dest.push(PDFName.of('XYZ'));
  dest.push(PDFNull);
  dest.push(PDFNull);
  dest.push(PDFNull);
  return dest;
}

function numberArray(doc: PDFDocument, values: number[]): PDFArray {
  const array = PDFArray.withContext(doc.context);
  for (const value of values) {
    array.push(PDFNumber.of(value));
  }
  return array;
}

/**
 * Arrange [level, title, page] entries into a tree. A level more than one
 * deeper than its predecessor is pulled up to predecessor + 1.
 */
function buildOutlineTree(doc: PDFDocument, entries: readonly OutlineEntry[]): OutlineNode[] {
  const roots: OutlineNode[] = [];
  const stack: OutlineNode[] = [];

  for (const entry of entries) {
    const level = Math.max(1, Math.min(entry.level, stack.length + 1));
    const node: OutlineNode = { entry, ref: doc.context.nextRef(), children: [] };
    stack.length = level - 1;
    if (level === 1) {
      roots.push(node);
    } else {
      stack[level - 2].children.push(node);
    }
    stack.push(node);
  }

  return roots;
}

export class PdfAnnotator implements PageAnnotator {
  constructor(private readonly logger: Logger) {}

  async stampSequential(pdfPath: string, startNumber: number, fontSize: number): Promise<void> {
    this.logger.info(`Applying Bates numbering to ${pdfPath}`);
    const { doc } = await this.open(pdfPath);
    const font = await doc.embedFont(StandardFonts.Helvetica);

    doc.getPages().forEach((page, i) => {
      const { width } = page.getSize();
      const x = width - STAMP_RIGHT_OFFSET;
      const y = STAMP_BASELINE;
      page.drawRectangle({
        x: x - STAMP_BOX.left,
        y: y - STAMP_BOX.below,
        width: STAMP_BOX.width,
        height: STAMP_BOX.height,
        color: STAMP_BACKGROUND,
      });
      page.drawText(formatBates(startNumber + i), { x, y, size: fontSize, font, color: rgb(0, 0, 0) });
    });

    await writeFileAtomic(pdfPath, await doc.save());
  }

  async setOutline(pdfPath: string, entries: readonly OutlineEntry[]): Promise<void> {
    this.logger.info('Adding PDF bookmarks (outline)...');
    const { doc } = await this.open(pdfPath);
    const pageRefs = doc.getPages().map(page => page.ref);

    doc.catalog.delete(PDFName.of('Outlines'));
    if (entries.length > 0 && pageRefs.length > 0) {
      const rootRef = doc.context.nextRef();
      const roots = buildOutlineTree(doc, entries);

      const writeSiblings = (nodes: OutlineNode[], parentRef: PDFRef): number => {
        let total = 0;
        nodes.forEach((node, i) => {
          const descendants = writeSiblings(node.children, node.ref);
          const pageIndex = Math.max(0, Math.min(node.entry.pageIndex, pageRefs.length - 1));

          const dict = PDFDict.withContext(doc.context);
          dict.set(PDFName.of('Title'), PDFHexString.fromText(node.entry.title));
          dict.set(PDFName.of('Parent'), parentRef);
          dict.set(PDFName.of('Dest'), destination(doc, pageRefs[pageIndex]));
          if (i > 0) dict.set(PDFName.of('Prev'), nodes[i - 1].ref);
          if (i < nodes.length - 1) dict.set(PDFName.of('Next'), nodes[i + 1].ref);
          if (node.children.length > 0) {
            dict.set(PDFName.of('First'), node.children[0].ref);
            dict.set(PDFName.of('Last'), node.children[node.children.length - 1].ref);
            dict.set(PDFName.of('Count'), PDFNumber.of(descendants));
          }
          doc.context.assign(node.ref, dict);
          total += 1 + descendants;
        });
        return total;
      };

      const count = writeSiblings(roots, rootRef);
      const root = PDFDict.withContext(doc.context);
      root.set(PDFName.of('Type'), PDFName.of('Outlines'));
      root.set(PDFName.of('First'), roots[0].ref);
      root.set(PDFName.of('Last'), roots[roots.length - 1].ref);
      root.set(PDFName.of('Count'), PDFNumber.of(count));
      doc.context.assign(rootRef, root);

      doc.catalog.set(PDFName.of('Outlines'), rootRef);
      doc.catalog.set(PDFName.of('PageMode'), PDFName.of('UseOutlines'));
    }

    await writeFileAtomic(pdfPath, await doc.save());
    this.logger.info('PDF bookmarks added.');
  }

  /**
   * Link every line that matches a request's text on its search pages.
   * All requests share one load and one save.
   */
  async insertLinks(pdfPath: string, requests: readonly LinkRequest[]): Promise<LinkResult[]> {
    const { doc, bytes } = await this.open(pdfPath);
    const pages = doc.getPages();
    const searchPages = [...new Set(requests.flatMap(r => r.searchPages))].sort((a, b) => a - b);
    const linesByPage = await extractPageLines(bytes, searchPages);

    const results: LinkResult[] = [];
    let linked = 0;

    for (const request of requests) {
      if (request.targetPageIndex < 0 || request.targetPageIndex >= pages.length) {
        results.push({ status: 'invalid-target', request });
        continue;
      }
      const targetRef = pages[request.targetPageIndex].ref;
      let matches = 0;

      for (const pageIndex of request.searchPages) {
        const lines = linesByPage.get(pageIndex);
        if (!lines) continue;
        for (const rect of findLineMatches(lines, request.text)) {
          const annot = PDFDict.withContext(doc.context);
          annot.set(PDFName.of('Type'), PDFName.of('Annot'));
          annot.set(PDFName.of('Subtype'), PDFName.of('Link'));
          annot.set(PDFName.of('Rect'), numberArray(doc, [rect.x1, rect.y1, rect.x2, rect.y2]));
          annot.set(PDFName.of('Border'), numberArray(doc, [0, 0, 0]));
          annot.set(PDFName.of('Dest'), destination(doc, targetRef));
          pages[pageIndex].node.addAnnot(doc.context.register(annot));
          matches++;
        }
      }

      if (matches > 0) {
        results.push({ status: 'linked', request, matches });
      } else {
        const text = request.text.trim();
        results.push({
          status: 'not-found',
          request,
          warning: new LinkTargetNotFound(`Link target not found: "${text}"`, request.text)
        });
      }
      linked += matches;
    }

    if (linked > 0) {
      await writeFileAtomic(pdfPath, await doc.save());
    }
    this.logger.info(`Inserted ${linked} contents link(s)`);
    return results;
  }

  private async open(pdfPath: string): Promise<{ doc: PDFDocument; bytes: Uint8Array }> {
    try {
      const bytes = await fs.readFile(pdfPath);
      const doc = await PDFDocument.load(bytes, { ignoreEncryption: true });
      return { doc, bytes };
    } catch (err) {
      throw new OutputWriteFailure(`Cannot open ${pdfPath}: ${errorMessage(err)}`, pdfPath);
    }
  }
}
