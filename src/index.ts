export * from './types.js';
export * from './errors.js';
export { loadConfig, resolveConfig, parseConfigInput, CONFIG_FILE_NAME, DEFAULTS } from './config.js';
export type { BinderConfig, ConfigInput, DriftPolicy, OutlineMode, LoadConfigOptions } from './config.js';
export { createLogger, createMemoryLogger, formatLogLine, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LogEntry, LoggerOptions, MemoryLogger } from './logger.js';
export { scanItems, compareNames, parentIndex } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { renderItemUnits, renderToPdf } from './unit-renderer.js';
export { PaginationResolver, computeBatesMap, formatBates } from './pagination.js';
export type { PaginationDrift, Resolution } from './pagination.js';
export { fileItems, sequenceItemUnits, sequenceUnits } from './sequencer.js';
export { buildContentsEntries, buildContentsLinks, buildOutline, contentsLineText } from './cross-reference.js';
export { runPool } from './worker-pool.js';
export { HtmlFormatter } from './formatter.js';
export { OfficeRenderer } from './office-renderer.js';
export { PdfMerger, PdfPageCounter } from './pdf-document.js';
export { PdfAnnotator } from './annotator.js';
export { runBinder, cleanupWorkFiles } from './orchestrator.js';
export type { BinderDeps, BinderResult } from './orchestrator.js';
