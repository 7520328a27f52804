import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { OfficeRenderer } from '../office-renderer.js';
import { RenderFailure } from '../errors.js';
import { createMemoryLogger } from '../logger.js';
import { makeTempDir } from './support/fakes.js';

const { describe, it, beforeEach, afterEach } = test;

// Stand-in for soffice: copies the source to {outdir}/{stem}.pdf
const CONVERTER = `#!/bin/sh
outdir=""
prev=""
for arg in "$@"; do
  if [ "$prev" = "--outdir" ]; then outdir="$arg"; fi
  prev="$arg"
done
src="$prev"
name=$(basename "$src")
cp "$src" "$outdir/\${name%.*}.pdf"
`;

const FAILING = `#!/bin/sh
echo "source file could not be loaded" >&2
exit 3
`;

const SILENT = `#!/bin/sh
exit 0
`;

const SLOW = `#!/bin/sh
exec sleep 5
`;

describe('OfficeRenderer', () => {
  let tempDir: string;
  let scratchRoot: string;

  beforeEach(() => {
    tempDir = makeTempDir('binder-office-');
    scratchRoot = path.join(tempDir, 'scratch');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function script(name: string, body: string): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, body, { mode: 0o755 });
    return file;
  }

  function source(): string {
    const file = path.join(tempDir, 'My Brief.docx');
    fs.writeFileSync(file, 'brief body');
    return file;
  }

  it('moves the converted file to the target and removes its scratch directory', async () => {
    const renderer = new OfficeRenderer({
      sofficePath: script('soffice', CONVERTER),
      scratchRoot,
      logger: createMemoryLogger('Render')
    });
    const target = path.join(tempDir, 'out', 'file_1.pdf');
    fs.mkdirSync(path.dirname(target));

    assert.strictEqual(await renderer.render(source(), target), target);
    assert.strictEqual(fs.readFileSync(target, 'utf8'), 'brief body');
    assert.deepStrictEqual(fs.readdirSync(scratchRoot), []);
  });

  it('passes a private profile and the output directory', async () => {
    const logger = createMemoryLogger('Render');
    const renderer = new OfficeRenderer({ sofficePath: script('soffice', CONVERTER), scratchRoot, logger });

    await renderer.render(source(), path.join(tempDir, 'x.pdf'));

    const [command] = logger.messages('debug');
    assert.match(command, / --headless -env:UserInstallation=file:\/\/\S+\/profile --convert-to pdf --outdir \S+\/out /);
    assert.ok(command.endsWith('My Brief.docx'));
  });

  it('fails on a non-zero exit with the error output', async () => {
    const renderer = new OfficeRenderer({
      sofficePath: script('soffice', FAILING),
      scratchRoot,
      logger: createMemoryLogger('Render')
    });
    const sofficePath = path.join(tempDir, 'soffice');

    await assert.rejects(renderer.render(source(), path.join(tempDir, 'x.pdf')), {
      name: 'RenderFailure',
      message: `${sofficePath} exited with code 3: source file could not be loaded`
    });
  });

  it('fails when no output appears', async () => {
    const renderer = new OfficeRenderer({
      sofficePath: script('soffice', SILENT),
      scratchRoot,
      logger: createMemoryLogger('Render')
    });

    await assert.rejects(renderer.render(source(), path.join(tempDir, 'x.pdf')), {
      message: 'Conversion failed: My Brief.pdf not created'
    });
    assert.strictEqual(fs.existsSync(path.join(tempDir, 'x.pdf')), false);
  });

  it('kills a conversion that runs past the timeout', async () => {
    const renderer = new OfficeRenderer({
      sofficePath: script('soffice', SLOW),
      timeoutMs: 100,
      scratchRoot,
      logger: createMemoryLogger('Render')
    });

    await assert.rejects(renderer.render(source(), path.join(tempDir, 'x.pdf')), {
      message: 'Conversion timed out after 100 ms'
    });
  });

  it('fails when the executable cannot be started', async () => {
    const renderer = new OfficeRenderer({
      sofficePath: path.join(tempDir, 'no-such-soffice'),
      scratchRoot,
      logger: createMemoryLogger('Render')
    });

    await assert.rejects(renderer.render(source(), path.join(tempDir, 'x.pdf')), RenderFailure);
  });

  it('fails on a missing source without running anything', async () => {
    const logger = createMemoryLogger('Render');
    const renderer = new OfficeRenderer({ sofficePath: script('soffice', CONVERTER), scratchRoot, logger });
    const missing = path.join(tempDir, 'gone.docx');

    await assert.rejects(renderer.render(missing, path.join(tempDir, 'x.pdf')), {
      message: `${missing} not found`
    });
    assert.deepStrictEqual(logger.messages('debug'), []);
  });
});
