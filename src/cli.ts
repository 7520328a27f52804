#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { errorMessage } from './errors.js';
import { parseCliArgs, USAGE } from './cli-args.js';
import { runBinder } from './orchestrator.js';

/**
 * Run the binder from the command line
 */
async function main(): Promise<number> {
  let logger: Logger | null = null;
  try {
    const args = parseCliArgs(process.argv.slice(2), process.cwd());
    if (args.help) {
      console.log(USAGE);
      return 0;
    }

    const config = await loadConfig({ rootDir: args.rootDir, configFile: args.configFile, overrides: args.overrides });
    logger = await createLogger({ tag: 'Binder', level: config.logLevel, logFile: config.logFile });
    logger.info(`Logging to ${config.logFile}`);

    const result = await runBinder(config, { logger });

    const files = result.items.filter(item => item.kind === 'file').length;
    logger.info(`Bound ${files} file(s) into ${result.outputPath} (${result.totalPages} pages)`);
    if (result.drift) {
      logger.warn(
        `Contents went from ${result.drift.dryPageCount} to ${result.drift.committedPageCount} page(s); ` +
        `Bates numbers are off by ${result.drift.delta} (--on-drift=fail stops instead)`
      );
    }
    return 0;
  } catch (err) {
    if (logger) {
      logger.error(`Fatal error: ${errorMessage(err)}`);
    } else {
      console.error(`[Binder] Fatal error: ${errorMessage(err)}`);
    }
    return 1;
  } finally {
    await logger?.close();
  }
}

main().then(code => {
  process.exitCode = code;
}, (err: unknown) => {
  console.error('[Binder] Unexpected failure:', err);
  process.exitCode = 1;
});
