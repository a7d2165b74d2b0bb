import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync, rmSync, realpathSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  bundleSelection,
  describeSummary,
  validateBasePath,
  BasePathError,
  DEFAULT_EXCLUDES,
} from '../../../src/context/index.js';
import type { BundleSummary } from '../../../src/context/index.js';

function createFixture(name: string): string {
  return realpathSync(mkdtempSync(join(tmpdir(), `ctxb-gather-${name}-`)));
}

function write(root: string, rel: string, content: string | Buffer): void {
  const full = join(root, rel);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content);
}

// ─── validateBasePath ───────────────────────────────────────────────────────

describe('validateBasePath', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('base');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('returns the absolute directory', async () => {
    expect(await validateBasePath(fixture)).toBe(fixture);
  });

  it('rejects a missing directory', async () => {
    await expect(validateBasePath(join(fixture, 'nope')))
      .rejects.toThrow(`Base path does not exist: ${join(fixture, 'nope')}`);
  });

  it('rejects a file', async () => {
    write(fixture, 'a.txt', 'a');
    await expect(validateBasePath(join(fixture, 'a.txt'))).rejects.toThrow(BasePathError);
    await expect(validateBasePath(join(fixture, 'a.txt'))).rejects.toThrow('Base path is not a directory');
  });
});

// ─── bundleSelection ────────────────────────────────────────────────────────

describe('bundleSelection', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = createFixture('bundle');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('bundles a tree and names .gitignore matches in the summary', async () => {
    write(fixture, '.gitignore', '*.log\n');
    write(fixture, 'a.py', 'print("a")\n');
    write(fixture, 'b.log', 'noise\n');
    write(fixture, 'sub/c.py', 'print("c")\n');

    const result = await bundleSelection(['.'], { basePath: fixture });

    expect(result.ok).toBe(true);
    expect(result.outputs).toHaveLength(1);
    // .gitignore is not ignored by its own rules, so it is bundled like any file
    expect(result.outputs[0].content).toBe(
      '## .gitignore\n\n```gitignore\n*.log\n```\n\n---\n\n' +
      '## a.py\n\n```python\nprint("a")\n```\n\n---\n\n' +
      '## sub/c.py\n\n```python\nprint("c")\n```\n'
    );
    expect(result.summary.includedFiles).toEqual(['.gitignore', 'a.py', 'sub/c.py']);
    expect(result.summary.skipped).toEqual([{ path: 'b.log', reason: 'ignored', detail: 'matched an ignore rule' }]);
    expect(result.summary.warnings).toEqual([]);
    expect(describeSummary(result.summary)).toEqual(['Included 3 of 3 file(s) (0.0KB)', 'Skipped b.log (ignored)']);
  });

  it('skips extra exclude matches the same way', async () => {
    write(fixture, 'a.py', 'print("a")\n');
    write(fixture, 'b.log', 'noise\n');

    const result = await bundleSelection(['.'], { basePath: fixture, exclude: ['*.log'] });

    expect(result.summary.includedFiles).toEqual(['a.py']);
    expect(result.summary.skipped).toEqual([{ path: 'b.log', reason: 'ignored', detail: 'matched an ignore rule' }]);
  });

  it('survives files and directories named only with dots', async () => {
    write(fixture, '...', 'dots\n');
    write(fixture, '..../b.py', 'print("b")\n');

    const result = await bundleSelection(['.'], { basePath: fixture });

    expect(result.ok).toBe(true);
    expect(result.summary.includedFiles).toEqual(['...', '..../b.py']);
  });

  it('reports a glob-pruned directory once', async () => {
    write(fixture, 'a.ts', 'export {};\n');
    write(fixture, 'node_modules/pkg0/lib/i.ts', 'x\n');
    write(fixture, 'node_modules/pkg1/lib/i.ts', 'x\n');

    const result = await bundleSelection(['**/*.ts'], { basePath: fixture });

    expect(result.summary.includedFiles).toEqual(['a.ts']);
    expect(result.summary.skipped).toEqual([
      { path: 'node_modules/', reason: 'ignored', detail: 'directory matched an ignore rule' },
    ]);
  });

  it('stops at maxTotalFiles and names the files left out', async () => {
    write(fixture, 'a.py', 'a\n');
    write(fixture, 'b.py', 'b\n');
    write(fixture, 'c.py', 'c\n');

    const result = await bundleSelection(['.'], { basePath: fixture, maxTotalFiles: 2 });

    expect(result.summary.includedFiles).toEqual(['a.py', 'b.py']);
    expect(result.summary.skipped).toEqual([{ path: 'c.py', reason: 'limit', detail: 'beyond the 2-file limit' }]);
    expect(describeSummary(result.summary)[1]).toBe('Skipped c.py (limit: beyond the 2-file limit)');
  });

  it('renders the project header and line numbers', async () => {
    write(fixture, 'a.py', 'x = 1\ny = 2\n');

    const result = await bundleSelection(['a.py'], {
      basePath: fixture,
      header: { name: 'demo', metadata: false },
      lineNumbers: true,
    });

    expect(result.outputs[0].content).toBe('# demo\n\n## Files Processed: 1\n\n## a.py\n\n```python\n1: x = 1\n2: y = 2\n```\n');
  });

  it('reports a missing selection as a warning without failing', async () => {
    const result = await bundleSelection(['missing.txt'], { basePath: fixture });

    expect(result.ok).toBe(false);
    expect(result.outputs[0].content).toBe('');
    expect(result.summary.fileCount).toBe(0);
    expect(result.summary.warnings).toEqual([
      { selection: 'missing.txt', kind: 'not-found', message: 'Selection not found: missing.txt' },
    ]);
    expect(result.summary.emptySelections).toEqual(['missing.txt']);
  });

  it('includes a zero-byte file as an empty block', async () => {
    write(fixture, 'empty.txt', '');

    const result = await bundleSelection(['empty.txt'], { basePath: fixture });

    expect(result.ok).toBe(true);
    expect(result.outputs[0].content).toBe('## empty.txt\n\n```\n```\n');
    expect(result.summary.skipped).toEqual([]);
  });

  it('skips binary files with a notice and no code block', async () => {
    write(fixture, 'img.bin', Buffer.from([0x00, 0x01, 0x02, 0x03]));
    write(fixture, 'main.go', 'package main\n');

    const result = await bundleSelection(['.'], { basePath: fixture });

    expect(result.summary.skipped).toEqual([{ path: 'img.bin', reason: 'binary', detail: 'binary content' }]);
    expect(result.outputs[0].content).toBe(
      '## img.bin\n\n> Skipped (binary): binary content\n\n---\n\n## main.go\n\n```go\npackage main\n```\n'
    );
    expect(result.summary.includedFiles).toEqual(['main.go']);
    expect(result.summary.fileCount).toBe(2);
  });

  it('returns zero files for a directory of ignored files', async () => {
    write(fixture, 'logs/a.log', 'a');
    write(fixture, 'logs/b.log', 'b');

    const result = await bundleSelection(['logs'], { basePath: fixture, exclude: ['*.log'] });

    expect(result.ok).toBe(false);
    expect(result.summary.fileCount).toBe(0);
    expect(result.summary.skipped.map(entry => entry.path)).toEqual(['logs/a.log', 'logs/b.log']);
  });

  it('prunes default-excluded directories', async () => {
    write(fixture, 'index.js', 'module.exports = 1;\n');
    write(fixture, 'node_modules/dep/index.js', 'dep\n');
    write(fixture, '.git/HEAD', 'ref: refs/heads/main\n');

    const result = await bundleSelection(['.'], { basePath: fixture });

    expect(result.summary.includedFiles).toEqual(['index.js']);
    expect(result.summary.skipped).toEqual([
      { path: '.git/', reason: 'ignored', detail: 'directory matched an ignore rule' },
      { path: 'node_modules/', reason: 'ignored', detail: 'directory matched an ignore rule' },
    ]);
  });

  it('can turn the default excludes off', async () => {
    write(fixture, 'node_modules/dep/index.js', 'dep\n');

    const result = await bundleSelection(['.'], { basePath: fixture, useDefaultExcludes: false });

    expect(result.summary.includedFiles).toEqual(['node_modules/dep/index.js']);
  });

  it('honors .gitignore in the base directory', async () => {
    write(fixture, '.gitignore', 'secret.env\n');
    write(fixture, 'secret.env', 'TOKEN=test-secret\n');
    write(fixture, 'app.ts', 'export {};\n');

    const result = await bundleSelection(['app.ts', 'secret.env'], { basePath: fixture });

    expect(result.summary.includedFiles).toEqual(['app.ts']);
    expect(result.summary.skipped).toEqual([{ path: 'secret.env', reason: 'ignored', detail: 'matched an ignore rule' }]);
  });

  it('produces byte-identical output for repeated runs', async () => {
    for (let i = 0; i < 12; i++) {
      write(fixture, `src/file${String(i).padStart(2, '0')}.ts`, `export const v${i} = ${i};\n`);
    }

    const first = await bundleSelection(['src'], { basePath: fixture, concurrency: 3 });
    const second = await bundleSelection(['src'], { basePath: fixture, concurrency: 7 });

    expect(second.outputs[0].content).toBe(first.outputs[0].content);
    expect(first.summary.includedFiles[0]).toBe('src/file00.ts');
    expect(first.summary.includedFiles[11]).toBe('src/file11.ts');
  });

  it('renders one output per selection in per-selection mode', async () => {
    write(fixture, 'src/a.ts', 'a\n');
    write(fixture, 'docs/b.md', 'b\n');

    const result = await bundleSelection(['src', 'docs', 'missing'], {
      basePath: fixture,
      mode: 'per-selection',
      format: 'txt',
    });

    expect(result.outputs.map(output => output.name)).toEqual(['src.txt', 'docs.txt']);
    expect(result.outputs[1].content).toBe(`${'='.repeat(50)}\ndocs/b.md (markdown)\n${'='.repeat(50)}\nb\n`);
    expect(result.documents.map(doc => doc.label)).toEqual(['src', 'docs', 'missing']);
  });

  it('rejects an invalid base path', async () => {
    await expect(bundleSelection(['.'], { basePath: join(fixture, 'absent') })).rejects.toThrow(BasePathError);
  });

  it('lists the default excludes', () => {
    expect(DEFAULT_EXCLUDES).toContain('node_modules/');
    expect(DEFAULT_EXCLUDES).toContain('.git/');
  });
});

// ─── describeSummary ────────────────────────────────────────────────────────

describe('describeSummary', () => {
  it('names every skipped file and warning', () => {
    const summary: BundleSummary = {
      fileCount: 3,
      includedFiles: ['a.py', 'b.py'],
      skipped: [
        { path: 'img.png', reason: 'binary', detail: 'binary content' },
        { path: 'b.log', reason: 'ignored', detail: 'matched an ignore rule' },
      ],
      warnings: [{ selection: 'x', kind: 'not-found', message: 'Selection not found: x' }],
      emptySelections: ['x'],
      totalSize: 2048,
    };

    expect(describeSummary(summary)).toEqual([
      'Included 2 of 3 file(s) (2.0KB)',
      'Skipped img.png (binary: binary content)',
      'Skipped b.log (ignored)',
      'Warning: Selection not found: x',
    ]);
  });
});
