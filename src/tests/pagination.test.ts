import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Item, ItemUnits, Unit } from '../types.js';
import { computeBatesMap, formatBates, PaginationResolver } from '../pagination.js';
import { PaginationDriftError } from '../errors.js';
import { createMemoryLogger, type MemoryLogger } from '../logger.js';
import { PdfPageCounter } from '../pdf-document.js';
import { scanItems } from '../scanner.js';
import { renderItemUnits } from '../unit-renderer.js';
import { fileItems } from '../sequencer.js';
import type { DriftPolicy } from '../config.js';
import { FakeFormatter, FakeRenderer, makeTempDir, writeDocx, writePdf, type FakeRendererOptions } from './support/fakes.js';

const { describe, it, beforeEach, afterEach } = test;

function unit(role: Unit['role'], pageCount: number, itemIndex?: string): Unit {
  return { role, itemIndex, path: `/work/${role}_${itemIndex ?? 'x'}.pdf`, pageCount };
}

describe('formatBates', () => {
  it('pads to three digits', () => {
    assert.strictEqual(formatBates(7), '007');
    assert.strictEqual(formatBates(42), '042');
    assert.strictEqual(formatBates(999), '999');
    assert.strictEqual(formatBates(1234), '1234');
  });
});

describe('computeBatesMap', () => {
  it('numbers each item from the first page of its cover', () => {
    const sequence = [unit('cover', 1, '1'), unit('content', 2, '1'), unit('cover', 1, '2'), unit('content', 3, '2')];
    const batesMap = computeBatesMap(sequence, 2, 1);
    assert.deepStrictEqual([...batesMap], [['1', 3], ['2', 6]]);
  });

  it('honors the starting number', () => {
    const sequence = [unit('cover', 1, '1'), unit('content', 4, '1'), unit('cover', 1, '1.1'), unit('content', 1, '1.1')];
    const batesMap = computeBatesMap(sequence, 1, 100);
    assert.deepStrictEqual([...batesMap], [['1', 101], ['1.1', 106]]);
  });

  it('lets zero-page units take no numbers', () => {
    const sequence = [unit('cover', 1, '1'), unit('content', 0, '1'), unit('cover', 1, '2'), unit('content', 1, '2')];
    const batesMap = computeBatesMap(sequence, 1, 1);
    assert.deepStrictEqual([...batesMap], [['1', 2], ['2', 3]]);
  });

  it('returns a map that cannot be changed', () => {
    const batesMap = computeBatesMap([unit('cover', 1, '1'), unit('content', 1, '1')], 1, 1);
    assert.ok(Object.isFrozen(batesMap));
    const writable = new Map(batesMap);
    writable.set('1', 99);
    assert.strictEqual(batesMap.get('1'), 2);
    const setter: unknown = Reflect.get(batesMap, 'set');
    assert.ok(typeof setter === 'function');
    assert.throws(() => Reflect.apply(setter, batesMap, ['1', 99]), TypeError);
    assert.strictEqual(batesMap.get('1'), 2);
  });
});

describe('PaginationResolver', () => {
  let root: string;
  let workDir: string;
  let logger: MemoryLogger;

  beforeEach(() => {
    root = makeTempDir('binder-pagination-');
    workDir = path.join(root, 'output');
    fs.mkdirSync(workDir);
    logger = createMemoryLogger('Pagination');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  async function prepare(rendererOptions: FakeRendererOptions = {}) {
    const formatter = new FakeFormatter();
    const renderer = new FakeRenderer(rendererOptions);
    const pageCounter = new PdfPageCounter(logger);
    const items: Item[] = scanItems({ rootDir: root, outputDir: workDir });
    const { unitsByIndex } = await renderItemUnits(
      { formatter, renderer, pageCounter, logger },
      fileItems(items),
      { workDir, concurrency: 1 }
    );
    const resolverFor = (start: number, onContentsDrift: DriftPolicy = 'warn') =>
      new PaginationResolver({ formatter, renderer, pageCounter, logger }, { workDir, start, onContentsDrift });
    return { formatter, items, unitsByIndex, resolverFor };
  }

  async function threeSinglePageFiles(): Promise<void> {
    await writePdf(path.join(root, 'a.pdf'), 1);
    await writePdf(path.join(root, 'b.pdf'), 1);
    await writePdf(path.join(root, 'c.pdf'), 1);
  }

  it('resolves a typical tree with a stable contents page count', async () => {
    await writePdf(path.join(root, 'a.pdf'), 1);
    writeDocx(path.join(root, 'b.docx'), 2);
    await writePdf(path.join(root, 'Sub', 'c.pdf'), 3);

    const { formatter, items, unitsByIndex, resolverFor } = await prepare();
    const resolution = await resolverFor(1).resolve(items, unitsByIndex);

    assert.strictEqual(resolution.dryPageCount, 1);
    assert.strictEqual(resolution.committedPageCount, 1);
    assert.strictEqual(resolution.drift, null);
    assert.deepStrictEqual([...resolution.batesMap], [['1', 2], ['2', 4], ['1.1', 7]]);
    assert.deepStrictEqual(resolution.contentsUnit, {
      role: 'contents',
      path: path.join(workDir, 'contents.pdf'),
      pageCount: 1
    });
    assert.deepStrictEqual(formatter.contentsRenders, [
      ['TABLE OF CONTENTS', '1 - a.pdf', '2 - b.docx', '1 - Sub', '    1.1 - c.pdf'],
      ['TABLE OF CONTENTS', '1 - a.pdf  002', '2 - b.docx  004', '1 - Sub', '    1.1 - c.pdf  007']
    ]);
    assert.deepStrictEqual(resolution.artifacts, [
      path.join(workDir, 'contents_dummy.txt'),
      path.join(workDir, 'contents_dummy.pdf'),
      path.join(workDir, 'contents.txt'),
      path.join(workDir, 'contents.pdf')
    ]);
    assert.deepStrictEqual(logger.messages('warn'), []);
  });

  it('counts a multi-page contents render before numbering', async () => {
    await threeSinglePageFiles();

    const { items, unitsByIndex, resolverFor } = await prepare({ linesPerPage: 2 });
    const resolution = await resolverFor(1).resolve(items, unitsByIndex);

    // Covers wrap onto a second page too
    assert.strictEqual(resolution.dryPageCount, 2);
    assert.deepStrictEqual([...resolution.batesMap], [['1', 3], ['2', 6], ['3', 9]]);
  });

  it('keeps three-digit numbers within the dry page count', async () => {
    await threeSinglePageFiles();

    const { items, unitsByIndex, resolverFor } = await prepare({ charsPerPage: 59 });
    const resolution = await resolverFor(1).resolve(items, unitsByIndex);

    assert.strictEqual(resolution.drift, null);
    assert.deepStrictEqual([...resolution.batesMap], [['1', 2], ['2', 4], ['3', 6]]);
  });

  it('reports drift when numbers cross into four digits', async () => {
    await threeSinglePageFiles();

    const { formatter, items, unitsByIndex, resolverFor } = await prepare({ charsPerPage: 59 });
    const resolution = await resolverFor(995).resolve(items, unitsByIndex);

    assert.deepStrictEqual(formatter.contentsRenders[1], [
      'TABLE OF CONTENTS',
      '1 - a.pdf  996',
      '2 - b.pdf  998',
      '3 - c.pdf  1000'
    ]);
    assert.deepStrictEqual(resolution.drift, { dryPageCount: 1, committedPageCount: 2, delta: 1 });
    assert.strictEqual(resolution.contentsUnit.pageCount, 2);
    assert.deepStrictEqual([...resolution.batesMap], [['1', 996], ['2', 998], ['3', 1000]]);
    assert.deepStrictEqual(logger.messages('warn'), [
      'Contents page count changed from 1 to 2 once numbers were filled in; committed Bates numbers are off by 1'
    ]);
  });

  it('fails on drift under the fail policy', async () => {
    await threeSinglePageFiles();

    const { items, unitsByIndex, resolverFor } = await prepare({ charsPerPage: 59 });
    await assert.rejects(
      resolverFor(995, 'fail').resolve(items, unitsByIndex),
      (err: unknown) =>
        err instanceof PaginationDriftError && err.dryPageCount === 1 && err.committedPageCount === 2 && err.fatal
    );
  });

  it('wraps a contents render failure', async () => {
    await writePdf(path.join(root, 'a.pdf'), 1);

    const { items, unitsByIndex, resolverFor } = await prepare({ failOn: ['contents_dummy.txt'] });
    await assert.rejects(resolverFor(1).resolve(items, unitsByIndex), {
      name: 'RenderFailure',
      message: 'Contents page render failed: cannot convert contents_dummy.txt'
    });
  });

  it('is deterministic across runs', async () => {
    await threeSinglePageFiles();
    writeDocx(path.join(root, 'D', 'd.docx'), 4);

    const first = await prepare();
    const second = await prepare();
    const a = await first.resolverFor(1).resolve(first.items, first.unitsByIndex);
    const b = await second.resolverFor(1).resolve(second.items, second.unitsByIndex);

    assert.deepStrictEqual([...a.batesMap], [...b.batesMap]);
    assert.deepStrictEqual([...a.batesMap], [['1', 2], ['2', 4], ['3', 6], ['1.1', 8]]);
  });

  it('rejects units missing from the map', async () => {
    await writePdf(path.join(root, 'a.pdf'), 1);
    const { items, resolverFor } = await prepare();

    await assert.rejects(resolverFor(1).resolve(items, new Map<string, ItemUnits>()), { name: 'AssemblyError' });
  });
});
