/**
 * Binder configuration.
 *
 * One immutable BinderConfig is built per run and handed to the orchestrator.
 * Sources, lowest precedence first: defaults, a JSON config file
 * ({root}/binder.config.json, $BINDER_CONFIG, or an explicit path), overrides
 * (CLI flags). Relative paths resolve against rootDir.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export type OutlineMode = 'flat' | 'nested';
export type DriftPolicy = 'warn' | 'fail';

export interface BinderConfig {
  rootDir: string;
  /** Intermediate covers, contents and rendered files; excluded from the scan */
  workDir: string;
  finalOutput: string;
  logFile: string;
  batesStart: number;
  batesFontSize: number;
  /** Parallel per-item renders */
  concurrency: number;
  documentExtensions: readonly string[];
  pageExtensions: readonly string[];
  excludeDirs: readonly string[];
  keepWorkFiles: boolean;
  outlineMode: OutlineMode;
  onContentsDrift: DriftPolicy;
  sofficePath: string;
  renderTimeoutMs: number;
  /** Date printed on the contents page */
  contentsDate: Date;
  logLevel: LogLevel;
}

/**
 * Shape accepted from the config file and from overrides. Paths may be relative.
 */
export interface ConfigInput {
  workDir?: string;
  finalOutput?: string;
  logFile?: string;
  batesStart?: number;
  batesFontSize?: number;
  concurrency?: number;
  documentExtensions?: string[];
  pageExtensions?: string[];
  excludeDirs?: string[];
  keepWorkFiles?: boolean;
  outlineMode?: OutlineMode;
  onContentsDrift?: DriftPolicy;
  sofficePath?: string;
  renderTimeoutMs?: number;
  contentsDate?: Date | string;
  logLevel?: LogLevel;
}

export const CONFIG_FILE_NAME = 'binder.config.json';

export const DEFAULTS = {
  workDirName: 'output',
  finalOutputName: 'final_output.pdf',
  logFileName: 'binder_log.txt',
  batesStart: 1,
  batesFontSize: 14,
  concurrency: 1,
  documentExtensions: ['.docx'],
  pageExtensions: ['.pdf'],
  sofficePath: 'soffice',
  renderTimeoutMs: 120_000,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${key} must be a non-empty string`);
  }
  return value;
}

function readInteger(source: Record<string, unknown>, key: string, min: number): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}`);
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be true or false`);
  }
  return value;
}

function readStringList(source: Record<string, unknown>, key: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`${key} must be an array of strings`);
  }
  return value;
}

function readChoice<T extends string>(
  source: Record<string, unknown>,
  key: string,
  choices: readonly T[]
): T | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new ConfigError(`${key} must be one of: ${choices.join(', ')}`);
  }
  return match;
}

function readDate(source: Record<string, unknown>, key: string): Date | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ConfigError(`${key} must be a valid date`);
  }
  return date;
}

/**
 * Validate an untyped object (parsed JSON) into a ConfigInput.
 */
export function parseConfigInput(raw: unknown, origin = 'config'): ConfigInput {
  if (!isRecord(raw)) {
    throw new ConfigError(`${origin}: expected a JSON object`);
  }
  try {
    return {
      workDir: readString(raw, 'workDir'),
      finalOutput: readString(raw, 'finalOutput'),
      logFile: readString(raw, 'logFile'),
      batesStart: readInteger(raw, 'batesStart', 0),
      batesFontSize: readInteger(raw, 'batesFontSize', 1),
      concurrency: readInteger(raw, 'concurrency', 1),
      documentExtensions: readStringList(raw, 'documentExtensions'),
      pageExtensions: readStringList(raw, 'pageExtensions'),
      excludeDirs: readStringList(raw, 'excludeDirs'),
      keepWorkFiles: readBoolean(raw, 'keepWorkFiles'),
      outlineMode: readChoice(raw, 'outlineMode', ['flat', 'nested'] as const),
      onContentsDrift: readChoice(raw, 'onContentsDrift', ['warn', 'fail'] as const),
      sofficePath: readString(raw, 'sofficePath'),
      renderTimeoutMs: readInteger(raw, 'renderTimeoutMs', 1),
      contentsDate: readDate(raw, 'contentsDate'),
      logLevel: readChoice(raw, 'logLevel', LOG_LEVELS),
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`${origin}: ${err.message}`);
    }
    throw err;
  }
}

function normalizeExtensions(list: readonly string[]): string[] {
  return list.map(ext => {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
  });
}

/**
 * Merge file values and overrides over the defaults. Pure; no I/O.
 */
export function resolveConfig(
  rootDir: string,
  fileInput: ConfigInput = {},
  overrides: ConfigInput = {}
): Readonly<BinderConfig> {
  const root = path.resolve(rootDir);
  const pick = <K extends keyof ConfigInput>(key: K): ConfigInput[K] => overrides[key] ?? fileInput[key];
  const resolvePath = (value: string | undefined, fallback: string) => path.resolve(root, value ?? fallback);

  const documentExtensions = normalizeExtensions(pick('documentExtensions') ?? DEFAULTS.documentExtensions);
  const pageExtensions = normalizeExtensions(pick('pageExtensions') ?? DEFAULTS.pageExtensions);
  const overlap = documentExtensions.filter(ext => pageExtensions.includes(ext));
  if (overlap.length > 0) {
    throw new ConfigError(`extensions listed as both document and page types: ${overlap.join(', ')}`);
  }

  const contentsDate = pick('contentsDate');

  const config: BinderConfig = {
    rootDir: root,
    workDir: resolvePath(pick('workDir'), DEFAULTS.workDirName),
    finalOutput: resolvePath(pick('finalOutput'), DEFAULTS.finalOutputName),
    logFile: resolvePath(pick('logFile'), DEFAULTS.logFileName),
    batesStart: pick('batesStart') ?? DEFAULTS.batesStart,
    batesFontSize: pick('batesFontSize') ?? DEFAULTS.batesFontSize,
    concurrency: pick('concurrency') ?? DEFAULTS.concurrency,
    documentExtensions: Object.freeze(documentExtensions),
    pageExtensions: Object.freeze(pageExtensions),
    excludeDirs: Object.freeze((pick('excludeDirs') ?? []).map(dir => path.resolve(root, dir))),
    keepWorkFiles: pick('keepWorkFiles') ?? false,
    outlineMode: pick('outlineMode') ?? 'flat',
    onContentsDrift: pick('onContentsDrift') ?? 'warn',
    sofficePath: pick('sofficePath') ?? DEFAULTS.sofficePath,
    renderTimeoutMs: pick('renderTimeoutMs') ?? DEFAULTS.renderTimeoutMs,
    contentsDate: contentsDate === undefined ? new Date() : new Date(contentsDate),
    logLevel: pick('logLevel') ?? 'info',
  };

  if (config.workDir === config.rootDir) {
    throw new ConfigError('workDir must not be the root directory');
  }
  return Object.freeze(config);
}

export interface LoadConfigOptions {
  rootDir: string;
  /** Explicit config file; must exist */
  configFile?: string;
  overrides?: ConfigInput;
}

/**
 * Load the config file (if any) and resolve the final configuration.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<Readonly<BinderConfig>> {
  const root = path.resolve(options.rootDir);
  const explicit = options.configFile ?? process.env.BINDER_CONFIG;
  const configPath = explicit ? path.resolve(root, explicit) : path.join(root, CONFIG_FILE_NAME);

  let fileInput: ConfigInput = {};
  if (await fs.pathExists(configPath)) {
    let raw: unknown;
    try {
      raw = await fs.readJson(configPath);
    } catch (err) {
      throw new ConfigError(`Failed to read ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    fileInput = parseConfigInput(raw, path.basename(configPath));
  } else if (explicit) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  return resolveConfig(root, fileInput, options.overrides);
}
