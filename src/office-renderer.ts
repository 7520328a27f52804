import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { spawn } from 'node:child_process';
import { pathToFileURL } from 'node:url';
import type { Renderer } from './types.js';
import type { Logger } from './logger.js';
import { RenderFailure } from './errors.js';

export interface OfficeRendererOptions {
  /** LibreOffice executable (default: soffice on the PATH) */
  sofficePath?: string;
  /** Kill a conversion after this long (default: 2 minutes) */
  timeoutMs?: number;
  /** Parent of the per-conversion scratch directories (default: OS temp dir) */
  scratchRoot?: string;
  logger: Logger;
}

const STDERR_TAIL = 500;

/**
 * Converts documents to PDF with headless LibreOffice.
 *
 * Each call gets its own scratch directory holding the output and a private
 * user profile, since concurrent soffice processes sharing a profile block
 * each other. The result is moved to the requested target.
 */
export class OfficeRenderer implements Renderer {
  private readonly sofficePath: string;
  private readonly timeoutMs: number;
  private readonly scratchRoot: string;
  private readonly logger: Logger;

  constructor(options: OfficeRendererOptions) {
    this.sofficePath = options.sofficePath ?? 'soffice';
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.scratchRoot = options.scratchRoot ?? os.tmpdir();
    this.logger = options.logger;
  }

  async render(sourcePath: string, targetPath: string): Promise<string> {
    if (!(await fs.pathExists(sourcePath))) {
      throw new RenderFailure(`${sourcePath} not found`);
    }

    await fs.ensureDir(this.scratchRoot);
    const scratch = await fs.mkdtemp(path.join(this.scratchRoot, 'binder-render-'));
    try {
      const outDir = path.join(scratch, 'out');
      await fs.ensureDir(outDir);
      const profileUrl = pathToFileURL(path.join(scratch, 'profile')).href;

      await this.run([
        '--headless',
        `-env:UserInstallation=${profileUrl}`,
        '--convert-to', 'pdf',
        '--outdir', outDir,
        sourcePath
      ]);

      const produced = path.join(outDir, `${path.parse(sourcePath).name}.pdf`);
      if (!(await fs.pathExists(produced))) {
        throw new RenderFailure(`Conversion failed: ${path.basename(produced)} not created`);
      }
      await fs.move(produced, targetPath, { overwrite: true });
      return targetPath;
    } finally {
      await fs.remove(scratch);
    }
  }

  private run(args: string[]): Promise<void> {
    this.logger.debug(`Running ${this.sofficePath} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.sofficePath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.timeoutMs);

      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr = (stderr + chunk).slice(-STDERR_TAIL);
      });

      child.on('error', err => {
        clearTimeout(timer);
        reject(new RenderFailure(`Cannot start ${this.sofficePath}: ${err.message}`));
      });

      child.on('close', code => {
        clearTimeout(timer);
        if (timedOut) {
          reject(new RenderFailure(`Conversion timed out after ${this.timeoutMs} ms`));
        } else if (code !== 0) {
          const detail = stderr.trim();
          reject(new RenderFailure(`${this.sofficePath} exited with code ${code}${detail ? `: ${detail}` : ''}`));
        } else {
          resolve();
        }
      });
    });
  }
}
