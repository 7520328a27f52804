/**
 * LogFile - Append-only run log with buffered writes.
 *
 * Explicit lifecycle: call create() once at the start of a run (truncates
 * any previous log), append() lines as they happen, and flush() before
 * the process exits. Appends are debounced to disk and written in order.
 */

import fs from 'fs-extra';

export class LogFile {
  private created = false;
  private pendingAppends: string[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private maxDelayTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly filePath: string,
    private readonly debounceMs: number = 100,
    private readonly maxDelayMs: number = 2000
  ) {}

  /**
   * Create (or truncate) the file. Must be called before append().
   */
  async create(): Promise<void> {
    await fs.outputFile(this.filePath, '', 'utf8');
    this.created = true;
  }

  isCreated(): boolean {
    return this.created;
  }

  /**
   * Queue a line. The newline is added here.
   */
  append(line: string): void {
    if (!this.created) {
      throw new Error(`LogFile(${this.filePath}): create() must be called before append()`);
    }
    this.pendingAppends.push(line.trimEnd() + '\n');
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (!this.maxDelayTimer) {
      this.maxDelayTimer = setTimeout(() => void this.flushToFile(), this.maxDelayMs);
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => void this.flushToFile(), this.debounceMs);
  }

  private flushToFile(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.maxDelayTimer) {
      clearTimeout(this.maxDelayTimer);
      this.maxDelayTimer = null;
    }

    if (this.pendingAppends.length > 0) {
      const toWrite = this.pendingAppends.join('');
      this.pendingAppends = [];
      this.writeChain = this.writeChain.then(async () => {
        try {
          await fs.appendFile(this.filePath, toWrite, 'utf8');
        } catch (err) {
          console.error(`[LogFile] Failed to append to ${this.filePath}:`, err);
        }
      });
    }
    return this.writeChain;
  }

  /**
   * Write everything queued so far. Call before exit.
   */
  async flush(): Promise<void> {
    await this.flushToFile();
  }
}
