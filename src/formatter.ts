import fs from 'fs-extra';
import { Marked } from 'marked';
import { format } from 'date-fns';
import type { ContentsEntry, Formatter } from './types.js';
import { contentsLineText } from './cross-reference.js';
import { formatBates } from './pagination.js';

/**
 * Options for the generated pages
 */
export interface HtmlFormatterOptions {
  /** Date printed under the contents title (default: now) */
  date?: Date;
}

const CONTENTS_DATE_FORMAT = 'MMMM dd, yyyy';

// CommonMark lets any ASCII punctuation be backslash-escaped
const MARKDOWN_SPECIAL = /[\\`*_{}[\]()#+\-.!|<>&~]/g;

/**
 * Escape text so markdown renders it literally (HTML included)
 */
export function escapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_SPECIAL, '\\$&');
}

/**
 * A contents row's document cell. Leading spaces become non-breaking so the
 * indentation survives HTML whitespace collapsing.
 */
export function contentsCell(entry: ContentsEntry): string {
  const line = contentsLineText(entry);
  const text = line.trimStart();
  const indent = '&nbsp;'.repeat(line.length - text.length);
  const escaped = escapeMarkdown(text);
  return indent + (entry.isDirectory ? `**${escaped}**` : escaped);
}

export function coverMarkdown(index: string, displayName: string): string {
  return [
    '# DOCUMENT INDEX',
    '',
    `## ${escapeMarkdown(index)}`,
    '',
    escapeMarkdown(displayName),
    ''
  ].join('\n');
}

export function contentsMarkdown(entries: readonly ContentsEntry[], date: Date): string {
  const rows = entries.map(entry => {
    const page = entry.pageNumber === undefined ? '' : formatBates(entry.pageNumber);
    return `| ${contentsCell(entry)} | ${page} |`;
  });

  return [
    '# TABLE OF CONTENTS',
    '',
    format(date, CONTENTS_DATE_FORMAT),
    '',
    '| Document | Page |',
    '| :--- | ---: |',
    ...rows,
    ''
  ].join('\n');
}

const PAGE_STYLE = `
  body { font-family: "Times New Roman", serif; font-size: 12pt; margin: 1in; }
  h1 { text-align: center; font-size: 18pt; }
  h2 { text-align: center; font-size: 16pt; }
  table { width: 100%; border-collapse: collapse; }
  th, td { padding: 2pt 4pt; vertical-align: top; }
`;

function wrapDocument(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>${title}</title>
<style>${PAGE_STYLE}</style>
</head>
<body>
${body}</body>
</html>
`;
}

/**
 * Writes cover and contents pages as HTML generated from markdown.
 */
export class HtmlFormatter implements Formatter {
  readonly extension = '.html';
  private readonly markdown = new Marked({ gfm: true });
  private readonly date: Date;

  constructor(options: HtmlFormatterOptions = {}) {
    this.date = options.date ?? new Date();
  }

  async renderCoverPage(index: string, displayName: string, targetPath: string): Promise<string> {
    const body = await this.markdown.parse(coverMarkdown(index, displayName));
    await fs.outputFile(targetPath, wrapDocument('Document Index', body));
    return targetPath;
  }

  async renderContentsPage(entries: readonly ContentsEntry[], targetPath: string): Promise<string> {
    const body = await this.markdown.parse(contentsMarkdown(entries, this.date));
    await fs.outputFile(targetPath, wrapDocument('Table of Contents', body));
    return targetPath;
  }
}
