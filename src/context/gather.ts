/**
 * Bundle pipeline:
 *
 * 1. Validate the base directory
 * 2. Compile ignore rules (.gitignore + default + caller excludes)
 * 3. Resolve the selection into grouped files (ignored dirs pruned),
 *    capped at maxTotalFiles
 * 4. Read every file through a bounded pool
 * 5. Group records into Documents and render them
 * 6. Summarize what was included, skipped and why
 *
 * The only filesystem access is reading; writing outputs is the caller's job.
 */

import { stat } from 'fs/promises';
import { resolve } from 'path';
import { BasePathError, isMissingPathError } from './errors.js';
import { formatDocuments, type DocumentHeader, type OutputFormat, type OutputMode } from './format.js';
import { compileIgnoreSpec } from './ignore-rules.js';
import { readFileRecords } from './reader.js';
import { resolveSelection } from './resolver.js';
import type { Document, NamedOutput, SelectionGroup, SelectionWarning, SkippedFile } from './types.js';
import { isTextRecord } from './types.js';
import { silentLogger, type Logger } from '../logger.js';

/** Applied after .gitignore unless useDefaultExcludes is false */
export const DEFAULT_EXCLUDES: readonly string[] = ['.git/', 'node_modules/', '__pycache__/', '*.pyc', '.DS_Store'];

export interface BundleOptions {
  /** Directory selections are resolved against (default: cwd) */
  basePath?: string;
  /** Extra gitignore-style patterns, applied after .gitignore */
  exclude?: string[];
  /** Prepend DEFAULT_EXCLUDES to `exclude` (default: true) */
  useDefaultExcludes?: boolean;
  format?: OutputFormat;
  mode?: OutputMode;
  extension?: string;
  /** Project title block above the records (default: none) */
  header?: DocumentHeader;
  lineNumbers?: boolean;
  /** Files past this count, in resolution order, are skipped with reason `limit` */
  maxTotalFiles?: number;
  concurrency?: number;
  readTimeoutMs?: number;
  maxFileSize?: number;
  /** Extension → language overrides */
  languages?: Readonly<Record<string, string>>;
  logger?: Logger;
}

export interface BundleSummary {
  /** Records produced (included + binary + unreadable) */
  fileCount: number;
  /** Paths with content in the output (text and empty files) */
  includedFiles: string[];
  /** Binary and unreadable records, then ignored files and pruned dirs, then files over the limit */
  skipped: SkippedFile[];
  warnings: SelectionWarning[];
  /** Selection entries that produced no files */
  emptySelections: string[];
  /** Bytes of included files on disk */
  totalSize: number;
}

export interface BundleResult {
  /** False when nothing readable was found */
  ok: boolean;
  basePath: string;
  documents: Document[];
  outputs: NamedOutput[];
  summary: BundleSummary;
  timing: {
    resolveMs: number;
    readMs: number;
    formatMs: number;
    totalMs: number;
  };
}

/**
 * Validate that the base path exists and is a directory. Returns it absolute.
 */
export async function validateBasePath(basePath: string): Promise<string> {
  const abs = resolve(basePath);

  try {
    const stats = await stat(abs);
    if (!stats.isDirectory()) {
      throw new BasePathError(abs, 'Base path is not a directory');
    }
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new BasePathError(abs, 'Base path does not exist');
    }
    throw error;
  }

  return abs;
}

/** Keep the first `limit` files in selection order and report the rest */
function applyFileLimit(groups: SelectionGroup[], limit: number | undefined): { groups: SelectionGroup[]; dropped: SkippedFile[] } {
  if (limit === undefined) return { groups, dropped: [] };

  let remaining = limit;
  const dropped: SkippedFile[] = [];
  const kept = groups.map(group => {
    const files = group.files.slice(0, remaining);
    remaining -= files.length;
    for (const file of group.files.slice(files.length)) {
      dropped.push({ path: file.relativePath, reason: 'limit', detail: `beyond the ${limit}-file limit` });
    }
    return { ...group, files };
  });

  return { groups: kept, dropped };
}

/**
 * Run the whole pipeline for one selection.
 * Per-file and per-selection problems land in `summary`; only an invalid base
 * path rejects.
 */
export async function bundleSelection(
  selection: readonly string[],
  options: BundleOptions = {}
): Promise<BundleResult> {
  const totalStart = Date.now();
  const logger = options.logger ?? silentLogger;
  const basePath = await validateBasePath(options.basePath ?? '.');

  // ── Step 1: Ignore rules + resolution ────────────────────────────────────
  const resolveStart = Date.now();
  const exclude = [
    ...(options.useDefaultExcludes === false ? [] : DEFAULT_EXCLUDES),
    ...(options.exclude ?? []),
  ];
  const spec = await compileIgnoreSpec(basePath, exclude, logger);
  const resolution = await resolveSelection(selection, basePath, spec, { logger });
  const resolveMs = Date.now() - resolveStart;

  const { groups, dropped } = applyFileLimit(resolution.groups, options.maxTotalFiles);
  if (dropped.length > 0) {
    logger.warn(`Selection exceeds ${options.maxTotalFiles} files; ${dropped.length} file(s) left out`);
  }

  const files = groups.flatMap(group => group.files);
  logger.debug(`Resolved ${files.length} file(s) from ${selection.length} selection(s) in ${resolveMs}ms`);

  // ── Step 2: Read ─────────────────────────────────────────────────────────
  const readStart = Date.now();
  const records = await readFileRecords(files, {
    concurrency: options.concurrency,
    timeoutMs: options.readTimeoutMs,
    maxFileSize: options.maxFileSize,
    languages: options.languages,
    logger,
  });
  const readMs = Date.now() - readStart;

  // Records come back in file order, so slicing by group size restores grouping
  const documents: Document[] = [];
  let offset = 0;
  for (const group of groups) {
    documents.push({ label: group.label, records: records.slice(offset, offset + group.files.length) });
    offset += group.files.length;
  }

  // ── Step 3: Format ───────────────────────────────────────────────────────
  const formatStart = Date.now();
  const outputs = formatDocuments(documents, {
    format: options.format,
    mode: options.mode,
    extension: options.extension,
    header: options.header,
    lineNumbers: options.lineNumbers,
  });
  const formatMs = Date.now() - formatStart;

  // ── Step 4: Summary ──────────────────────────────────────────────────────
  const included = records.filter(isTextRecord);
  const skipped: SkippedFile[] = [];
  for (const record of records) {
    if (!isTextRecord(record)) {
      skipped.push({ path: record.path, reason: record.status, detail: record.reason });
    }
  }
  for (const entry of resolution.ignored) {
    skipped.push({
      path: entry.isDirectory ? `${entry.path}/` : entry.path,
      reason: 'ignored',
      detail: entry.isDirectory ? 'directory matched an ignore rule' : 'matched an ignore rule',
    });
  }
  skipped.push(...dropped);

  const summary: BundleSummary = {
    fileCount: records.length,
    includedFiles: included.map(record => record.path),
    skipped,
    warnings: resolution.warnings,
    emptySelections: groups.filter(group => group.files.length === 0).map(group => group.label),
    totalSize: included.reduce((sum, record) => sum + record.size, 0),
  };

  const totalMs = Date.now() - totalStart;
  logger.debug(`Read ${records.length} file(s) in ${readMs}ms, formatted in ${formatMs}ms`);

  return {
    ok: included.length > 0,
    basePath,
    documents,
    outputs,
    summary,
    timing: { resolveMs, readMs, formatMs, totalMs },
  };
}

/**
 * Human-readable lines naming every skipped file and warning.
 */
export function describeSummary(summary: BundleSummary): string[] {
  const lines: string[] = [];

  lines.push(`Included ${summary.includedFiles.length} of ${summary.fileCount} file(s) (${(summary.totalSize / 1024).toFixed(1)}KB)`);

  for (const entry of summary.skipped) {
    lines.push(entry.reason === 'ignored'
      ? `Skipped ${entry.path} (ignored)`
      : `Skipped ${entry.path} (${entry.reason}: ${entry.detail})`);
  }

  for (const warning of summary.warnings) {
    lines.push(`Warning: ${warning.message}`);
  }

  return lines;
}
