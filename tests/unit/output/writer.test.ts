import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { OutputWriteError } from '../../../src/context/index.js';
import type { NamedOutput } from '../../../src/context/index.js';
import { writeOutputAtomic, writeOutputs } from '../../../src/output/writer.js';

function output(name: string, content: string): NamedOutput {
  return { name, label: name.replace(/\.md$/, ''), content, fileCount: 1 };
}

describe('writeOutputAtomic', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = mkdtempSync(join(tmpdir(), 'ctxb-write-'));
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('writes the content and leaves no temp file behind', async () => {
    const path = await writeOutputAtomic(join(fixture, 'context.md'), '# bundle\n');

    expect(path).toBe(join(fixture, 'context.md'));
    expect(readFileSync(path, 'utf-8')).toBe('# bundle\n');
    expect(readdirSync(fixture)).toEqual(['context.md']);
  });

  it('replaces an existing file', async () => {
    writeFileSync(join(fixture, 'context.md'), 'old');

    await writeOutputAtomic(join(fixture, 'context.md'), 'new');

    expect(readFileSync(join(fixture, 'context.md'), 'utf-8')).toBe('new');
  });

  it('throws OutputWriteError naming the target', async () => {
    const target = join(fixture, 'missing', 'context.md');

    await expect(writeOutputAtomic(target, 'x')).rejects.toMatchObject({ name: 'OutputWriteError', target });
  });

  it('cleans up the temp file when the rename fails', async () => {
    mkdirSync(join(fixture, 'context.md'));

    await expect(writeOutputAtomic(join(fixture, 'context.md'), 'x')).rejects.toThrow(OutputWriteError);
    expect(readdirSync(fixture)).toEqual(['context.md']);
  });
});

describe('writeOutputs', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = mkdtempSync(join(tmpdir(), 'ctxb-writeall-'));
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('creates the directory and writes every output', async () => {
    const dir = join(fixture, 'out', 'nested');

    const { written, failures } = await writeOutputs([output('src.md', 'a'), output('docs.md', 'bb')], dir);

    expect(failures).toEqual([]);
    expect(written).toEqual([
      { label: 'src', path: join(dir, 'src.md'), bytes: 1 },
      { label: 'docs', path: join(dir, 'docs.md'), bytes: 2 },
    ]);
    expect(readFileSync(join(dir, 'docs.md'), 'utf-8')).toBe('bb');
  });

  it('keeps writing after one target fails', async () => {
    mkdirSync(join(fixture, 'src.md'));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const { written, failures } = await writeOutputs([output('src.md', 'a'), output('docs.md', 'b')], fixture, logger);

    expect(written.map(entry => entry.label)).toEqual(['docs']);
    expect(failures).toHaveLength(1);
    expect(failures[0].target).toBe(join(fixture, 'src.md'));
    expect(logger.warn).toHaveBeenCalledWith(failures[0].message);
  });

  it('fails every output when the directory cannot be created', async () => {
    writeFileSync(join(fixture, 'blocker'), 'file');

    const { written, failures } = await writeOutputs([output('a.md', 'a'), output('b.md', 'b')], join(fixture, 'blocker'));

    expect(written).toEqual([]);
    expect(failures.map(failure => failure.target)).toEqual([join(fixture, 'blocker', 'a.md'), join(fixture, 'blocker', 'b.md')]);
  });
});
