import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, createMemoryLogger, formatLogLine } from '../logger.js';
import { LogFile } from '../log-file.js';
import { makeTempDir } from './support/fakes.js';

const { describe, it, beforeEach, afterEach } = test;

/** Drop the leading ISO timestamp */
function withoutTimestamps(text: string): string[] {
  return text.split('\n').filter(Boolean).map(line => line.slice(line.indexOf(' ') + 1));
}

describe('formatLogLine', () => {
  it('writes timestamp, tag, level and message', () => {
    const line = formatLogLine({
      timestamp: new Date('2024-05-06T07:08:09.010Z'),
      level: 'warn',
      tag: 'Merge',
      message: 'File missing: a.pdf'
    });
    assert.strictEqual(line, '2024-05-06T07:08:09.010Z [Merge] WARN: File missing: a.pdf');
  });
});

describe('createLogger', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('binder-log-');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('truncates the log file and appends filtered lines in order', async () => {
    const logFile = path.join(tempDir, 'logs', 'run.txt');
    fs.mkdirSync(path.dirname(logFile));
    fs.writeFileSync(logFile, 'stale\n');

    const logger = await createLogger({ tag: 'Binder', level: 'info', console: false, logFile });
    logger.debug('hidden');
    logger.info('first');
    logger.child('Merge').warn('second');
    logger.error('third');
    await logger.close();

    assert.deepStrictEqual(withoutTimestamps(fs.readFileSync(logFile, 'utf8')), [
      '[Binder] INFO: first',
      '[Merge] WARN: second',
      '[Binder] ERROR: third'
    ]);
  });

  it('writes nothing to disk without a log file', async () => {
    const logger = await createLogger({ console: false });
    logger.info('console only');
    await logger.close();
    assert.deepStrictEqual(fs.readdirSync(tempDir), []);
  });
});

describe('createMemoryLogger', () => {
  it('captures every level with its tag', () => {
    const logger = createMemoryLogger('Test');
    logger.debug('d');
    logger.child('Sub').info('i');
    logger.warn('w');

    assert.deepStrictEqual(
      logger.entries.map(e => `${e.tag}/${e.level}/${e.message}`),
      ['Test/debug/d', 'Sub/info/i', 'Test/warn/w']
    );
    assert.deepStrictEqual(logger.messages('info'), ['i']);
  });
});

describe('LogFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('binder-logfile-');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('refuses appends before create()', () => {
    const file = new LogFile(path.join(tempDir, 'x.txt'));
    assert.strictEqual(file.isCreated(), false);
    assert.throws(() => file.append('early'), /create\(\) must be called before append\(\)/);
  });

  it('writes batched lines on flush', async () => {
    const target = path.join(tempDir, 'x.txt');
    const file = new LogFile(target, 10_000, 10_000);
    await file.create();
    file.append('one');
    file.append('two  ');

    assert.strictEqual(fs.readFileSync(target, 'utf8'), '');
    await file.flush();
    assert.strictEqual(fs.readFileSync(target, 'utf8'), 'one\ntwo\n');
  });

  it('flushes on its own after the debounce delay', async () => {
    const target = path.join(tempDir, 'x.txt');
    const file = new LogFile(target, 5, 1000);
    await file.create();
    file.append('later');

    await new Promise(resolve => setTimeout(resolve, 100));
    assert.strictEqual(fs.readFileSync(target, 'utf8'), 'later\n');
    await file.flush();
  });
});
