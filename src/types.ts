import type { LinkTargetNotFound, MergeInputMissing } from './errors.js';

/**
 * How a file item reaches page form.
 * - `document-source` needs the renderer (e.g. .docx)
 * - `page-document` is already paginated (e.g. .pdf) and is used as-is
 */
export type SourceKind = 'document-source' | 'page-document';

interface ItemBase {
  /** Dotted hierarchical index, e.g. "2.1.3" */
  index: string;

  /** Absolute filesystem location */
  path: string;

  /** File or directory name as displayed on covers and the contents page */
  name: string;

  /** Number of segments in the index ("2.1.3" -> 3) */
  depth: number;
}

export interface FileItem extends ItemBase {
  kind: 'file';
  sourceKind: SourceKind;
}

/**
 * Directories contribute a contents entry but no pages.
 */
export interface DirectoryItem extends ItemBase {
  kind: 'directory';
}

/**
 * A scanned file or directory. Read-only once the scan returns.
 */
export type Item = FileItem | DirectoryItem;

export type UnitRole = 'contents' | 'cover' | 'content';

/**
 * A page-producing artifact in the assembled document.
 */
export interface Unit {
  role: UnitRole;

  /** Owning file item; absent for the contents unit */
  itemIndex?: string;

  /** Page document on disk */
  path: string;

  /** Rendered page count (0 means the merger will skip it) */
  pageCount: number;
}

/**
 * The cover and content units produced for one file item.
 */
export interface ItemUnits {
  cover: Unit;
  content: Unit;
}

/**
 * File index -> first absolute page of that item's block. Built once, never mutated.
 */
export type BatesMap = ReadonlyMap<string, number>;

/**
 * One row of the contents page.
 */
export interface ContentsEntry {
  index: string;
  displayName: string;
  isDirectory: boolean;
  depth: number;
  /** Present only for file items once pagination has resolved */
  pageNumber?: number;
}

/**
 * One bookmark. Levels follow the classic [level, title, page] TOC convention:
 * level 1 is top-level and each entry is at most one level deeper than the previous.
 */
export interface OutlineEntry {
  level: number;
  title: string;
  /** 0-based page in the assembled document */
  pageIndex: number;
}

/**
 * A request to turn a line of contents text into a link.
 */
export interface LinkRequest {
  /** Line text as the formatter renders it, indentation included */
  text: string;
  /** 0-based pages of the assembled document to search */
  searchPages: number[];
  /** 0-based destination page */
  targetPageIndex: number;
}

export type LinkResult =
  | { status: 'linked'; request: LinkRequest; matches: number }
  | { status: 'not-found'; request: LinkRequest; warning: LinkTargetNotFound }
  | { status: 'invalid-target'; request: LinkRequest };

export interface MergeSkip {
  inputPath: string;
  reason: 'missing' | 'unreadable' | 'empty';
  warning: MergeInputMissing;
}

export interface MergeReport {
  outputPath: string;
  pageCount: number;
  appended: string[];
  skipped: MergeSkip[];
}

/**
 * Converts a source document (DOCX, HTML, ...) into a page document.
 */
export interface Renderer {
  render(sourcePath: string, targetPath: string): Promise<string>;
}

export interface PageCounter {
  /** Never throws; unreadable input counts as 0 pages */
  countPages(pdfPath: string): Promise<number>;
}

export interface Merger {
  merge(inputs: readonly string[], outputPath: string): Promise<MergeReport>;
}

export interface PageAnnotator {
  stampSequential(pdfPath: string, startNumber: number, fontSize: number): Promise<void>;
  setOutline(pdfPath: string, entries: readonly OutlineEntry[]): Promise<void>;
  insertLinks(pdfPath: string, requests: readonly LinkRequest[]): Promise<LinkResult[]>;
}

/**
 * Lays out the generated pages as renderable source documents.
 */
export interface Formatter {
  /** File extension (with dot) of the source documents this formatter writes */
  readonly extension: string;
  renderCoverPage(index: string, displayName: string, targetPath: string): Promise<string>;
  renderContentsPage(entries: readonly ContentsEntry[], targetPath: string): Promise<string>;
}
