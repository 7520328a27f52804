/**
 * Text search on rendered pages.
 *
 * pdfjs-dist gives positioned text fragments; fragments sharing a baseline are
 * joined back into lines (a space goes in wherever the horizontal gap is wide
 * enough) and whitespace is collapsed, so indentation and non-breaking spaces
 * from the layout do not affect matching.
 */

import { createRequire } from 'node:module';
import { pathToFileURL } from 'node:url';
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs';

const Y_LINE_TOLERANCE = 2;
const X_GAP_SPACE_RATIO = 0.2;
const DESCENT_RATIO = 0.25;

const configurePdfJsWorker = () => {
  const resolveFrom = createRequire(import.meta.url);
  GlobalWorkerOptions.workerSrc = pathToFileURL(resolveFrom.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs')).href;
};

configurePdfJsWorker();

/** PDF user-space rectangle (origin bottom-left) */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

interface Fragment {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

interface PlacedFragment extends Fragment {
  /** Offsets into the line's normalized text */
  start: number;
  end: number;
}

export interface TextLine {
  text: string;
  fragments: PlacedFragment[];
}

export function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function joinLine(fragments: Fragment[]): TextLine {
  const sorted = [...fragments].sort((a, b) => a.x - b.x);
  const placed: PlacedFragment[] = [];
  let text = '';
  let previousRight: number | null = null;

  for (const fragment of sorted) {
    let piece = fragment.text.replace(/\s+/g, ' ');
    if (text === '') {
      piece = piece.trimStart();
    } else if (previousRight !== null) {
      const gap = fragment.x - previousRight;
      const wantsSpace = gap > fragment.height * X_GAP_SPACE_RATIO;
      if (wantsSpace && !text.endsWith(' ') && !piece.startsWith(' ')) {
        text += ' ';
      }
      if (text.endsWith(' ') && piece.startsWith(' ')) {
        piece = piece.trimStart();
      }
    }
    const start = text.length;
    text += piece;
    placed.push({ ...fragment, start, end: text.length });
    previousRight = fragment.x + fragment.width;
  }

  return { text: text.trimEnd(), fragments: placed };
}

/**
 * Group fragments into lines, top of the page first.
 */
export function buildLines(fragments: Fragment[]): TextLine[] {
  const byBaseline = [...fragments].sort((a, b) => b.y - a.y || a.x - b.x);
  const groups: Fragment[][] = [];
  let lineY: number | null = null;

  for (const fragment of byBaseline) {
    if (lineY === null || Math.abs(fragment.y - lineY) > Y_LINE_TOLERANCE) {
      groups.push([]);
      lineY = fragment.y;
    }
    groups[groups.length - 1].push(fragment);
  }

  return groups.map(joinLine).filter(line => line.text !== '');
}

/**
 * Rectangles of every line that starts with the target text, followed by the
 * end of the line or whitespace. Each rectangle covers only the target's part of the line.
 */
export function findLineMatches(lines: readonly TextLine[], target: string): Rect[] {
  const needle = normalizeText(target);
  if (needle === '') return [];

  const matches: Rect[] = [];
  for (const line of lines) {
    if (!line.text.startsWith(needle)) continue;
    const boundary = line.text.charAt(needle.length);
    if (boundary !== '' && boundary !== ' ') continue;

    const covered = line.fragments.filter(f => f.start < needle.length && f.end > f.start);
    if (covered.length === 0) continue;
    matches.push({
      x1: Math.min(...covered.map(f => f.x)),
      y1: Math.min(...covered.map(f => f.y - f.height * DESCENT_RATIO)),
      x2: Math.max(...covered.map(f => f.x + f.width)),
      y2: Math.max(...covered.map(f => f.y + f.height))
    });
  }
  return matches;
}

/**
 * Extract the text lines of the given 0-based pages. Pages out of range are left out.
 */
export async function extractPageLines(pdfBytes: Uint8Array, pageIndices: readonly number[]): Promise<Map<number, TextLine[]>> {
  // pdfjs takes ownership of the buffer it is given
  const loadingTask = getDocument({
    data: new Uint8Array(pdfBytes),
    disableFontFace: true,
    isEvalSupported: false,
    verbosity: 0
  });
  const document = await loadingTask.promise;
  const result = new Map<number, TextLine[]>();

  try {
    for (const pageIndex of pageIndices) {
      if (pageIndex < 0 || pageIndex >= document.numPages) continue;
      const page = await document.getPage(pageIndex + 1);
      const content = await page.getTextContent();

      const fragments: Fragment[] = [];
      for (const item of content.items) {
        if (!('str' in item) || item.str === '') continue;
        const [, , c, d, x, y] = item.transform;
        fragments.push({
          text: item.str,
          x,
          y,
          width: item.width,
          height: item.height > 0 ? item.height : Math.hypot(c, d)
        });
      }
      result.set(pageIndex, buildLines(fragments));
    }
  } finally {
    await loadingTask.destroy();
  }

  return result;
}
