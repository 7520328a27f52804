import { ConfigError } from './errors.js';
import { parseConfigInput, type ConfigInput } from './config.js';

export interface CliArgs {
  rootDir: string;
  configFile?: string;
  overrides: ConfigInput;
  help: boolean;
}

type FlagTarget = { key: keyof ConfigInput; numeric?: boolean; list?: boolean };

const VALUE_FLAGS = new Map<string, FlagTarget>([
  ['--output-dir', { key: 'workDir' }],
  ['--output', { key: 'finalOutput' }],
  ['--log', { key: 'logFile' }],
  ['--start', { key: 'batesStart', numeric: true }],
  ['--font-size', { key: 'batesFontSize', numeric: true }],
  ['--concurrency', { key: 'concurrency', numeric: true }],
  ['--outline', { key: 'outlineMode' }],
  ['--on-drift', { key: 'onContentsDrift' }],
  ['--soffice', { key: 'sofficePath' }],
  ['--timeout', { key: 'renderTimeoutMs', numeric: true }],
  ['--log-level', { key: 'logLevel' }],
  ['--exclude', { key: 'excludeDirs', list: true }]
]);

export const USAGE = `Usage: bates-binder [options]

  --root=DIR            Directory to bind (default: current directory)
  --output-dir=DIR      Work directory for intermediate files (default: {root}/output)
  --output=FILE         Final PDF (default: {root}/final_output.pdf)
  --log=FILE            Run log (default: {root}/binder_log.txt)
  --config=FILE         JSON config file (default: {root}/binder.config.json)
  --start=N             First Bates number (default: 1)
  --font-size=N         Bates label font size (default: 14)
  --concurrency=N       Parallel renders (default: 1)
  --outline=flat|nested Bookmark layout (default: flat)
  --on-drift=warn|fail  Contents page count drift policy (default: warn)
  --soffice=PATH        LibreOffice executable (default: soffice)
  --timeout=MS          Per-document render timeout (default: 120000)
  --log-level=LEVEL     debug, info, warn or error (default: info)
  --exclude=DIR         Skip a directory (repeatable)
  --keep-work           Keep intermediate files
  --help                Show this message
`;

/**
 * Parse "--name=value" style arguments. Values are validated like config file values.
 */
export function parseCliArgs(argv: readonly string[], cwd: string): CliArgs {
  const raw: Record<string, unknown> = {};
  const excludes: string[] = [];
  let rootDir = cwd;
  let configFile: string | undefined;
  let help = false;

  for (const arg of argv) {
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? undefined : arg.slice(eq + 1);

    if (name === '--help' || name === '-h') {
      help = true;
      continue;
    }
    if (name === '--keep-work') {
      raw.keepWorkFiles = true;
      continue;
    }

    if (value === undefined || value === '') {
      throw new ConfigError(
        VALUE_FLAGS.has(name) || name === '--root' || name === '--config'
          ? `${name} needs a value (${name}=...)`
          : `Unknown argument: ${arg}`
      );
    }

    if (name === '--root') {
      rootDir = value;
    } else if (name === '--config') {
      configFile = value;
    } else {
      const target = VALUE_FLAGS.get(name);
      if (!target) {
        throw new ConfigError(`Unknown argument: ${arg}`);
      }
      if (target.list) {
        excludes.push(value);
      } else {
        raw[target.key] = target.numeric ? Number(value) : value;
      }
    }
  }

  if (excludes.length > 0) {
    raw.excludeDirs = excludes;
  }

  return {
    rootDir,
    configFile,
    overrides: parseConfigInput(raw, 'command line'),
    help
  };
}
