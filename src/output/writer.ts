/**
 * Output targets: files (written atomically) and the clipboard.
 *
 * Every file write goes to a sibling temp file first and is renamed into
 * place, so an interrupted run never leaves a half-written output behind.
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import clipboardy from 'clipboardy';
import { nanoid } from 'nanoid';
import { OutputWriteError } from '../context/errors.js';
import type { NamedOutput } from '../context/types.js';
import { silentLogger, type Logger } from '../logger.js';

export interface WrittenOutput {
  label: string;
  path: string;
  bytes: number;
}

export interface WriteOutputsResult {
  written: WrittenOutput[];
  failures: OutputWriteError[];
}

function tempPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}.${nanoid(8)}.tmp`);
}

/**
 * Write `content` to `target` via temp file + rename.
 * Throws OutputWriteError; the temp file is removed on failure.
 */
export async function writeOutputAtomic(target: string, content: string): Promise<string> {
  const absolute = resolve(target);
  const temp = tempPathFor(absolute);

  try {
    await writeFile(temp, content, 'utf-8');
    await rename(temp, absolute);
  } catch (error) {
    await rm(temp, { force: true });
    throw new OutputWriteError(absolute, error);
  }

  return absolute;
}

/**
 * Write each output into `dir`. A failing target is recorded and the rest
 * are still written.
 */
export async function writeOutputs(
  outputs: readonly NamedOutput[],
  dir: string,
  logger: Logger = silentLogger
): Promise<WriteOutputsResult> {
  const absoluteDir = resolve(dir);
  const written: WrittenOutput[] = [];
  const failures: OutputWriteError[] = [];

  try {
    await mkdir(absoluteDir, { recursive: true });
  } catch (error) {
    return { written, failures: outputs.map(output => new OutputWriteError(join(absoluteDir, output.name), error)) };
  }

  for (const output of outputs) {
    try {
      const path = await writeOutputAtomic(join(absoluteDir, output.name), output.content);
      written.push({ label: output.label, path, bytes: Buffer.byteLength(output.content, 'utf-8') });
      logger.debug(`Wrote ${path}`);
    } catch (error) {
      if (!(error instanceof OutputWriteError)) throw error;
      failures.push(error);
      logger.warn(error.message);
    }
  }

  return { written, failures };
}

export async function copyToClipboard(text: string): Promise<void> {
  await clipboardy.write(text);
}
