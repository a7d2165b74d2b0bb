/**
 * Content Reader - turns each resolved file into a FileRecord.
 *
 * Nothing thrown while reading one file escapes the batch: binary content,
 * filesystem errors, oversize files, timeouts and malformed notebooks all
 * become annotated records so the caller can report them.
 */

import { readFile, stat } from 'fs/promises';
import { TextDecoder } from 'util';
import { MalformedNotebookError, ReadTimeoutError, errorMessage } from './errors.js';
import { classifyLanguage } from './language.js';
import { isNotebookPath, normalizeNotebook } from './notebook.js';
import { mapWithConcurrency } from './pool.js';
import type { FileRecord, ResolvedFile } from './types.js';
import { silentLogger, type Logger } from '../logger.js';

export interface ReadOptions {
    /** Per-file read timeout in ms (default: 10s) */
    timeoutMs?: number;
    /** Files above this size are not read (default: 10MB) */
    maxFileSize?: number;
    /** Max reads in flight (default: 8) */
    concurrency?: number;
    /** Extension → language overrides */
    languages?: Readonly<Record<string, string>>;
    logger?: Logger;
}

export const DEFAULT_READ_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;
export const DEFAULT_CONCURRENCY = 8;

/** Leading bytes inspected for binary detection */
const SAMPLE_SIZE = 8000;
/** Share of control bytes in the sample above which a file counts as binary */
const CONTROL_BYTE_RATIO = 0.3;

/**
 * NUL anywhere in the sample, or too many control bytes
 * (tab, newline, form feed, carriage return and ESC are allowed).
 */
export function looksBinary(bytes: Uint8Array): boolean {
    const sample = bytes.subarray(0, SAMPLE_SIZE);
    if (sample.length === 0) return false;

    let control = 0;
    for (const byte of sample) {
        if (byte === 0) return true;
        const allowed = byte === 9 || byte === 10 || byte === 12 || byte === 13 || byte === 27;
        if ((byte < 32 && !allowed) || byte === 127) control++;
    }
    return control / sample.length > CONTROL_BYTE_RATIO;
}

/** Strict UTF-8 decode with a leading BOM dropped; null when the bytes are not UTF-8 */
export function decodeUtf8(bytes: Uint8Array): string | null {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
        return null;
    }
}

async function loadBytes(path: string, maxFileSize: number, signal: AbortSignal): Promise<{ bytes: Buffer; size: number }> {
    const stats = await stat(path);
    if (stats.size > maxFileSize) {
        throw new Error(`File exceeds max size (${stats.size} > ${maxFileSize} bytes)`);
    }
    if (stats.size === 0) {
        return { bytes: Buffer.alloc(0), size: 0 };
    }
    const bytes = await readFile(path, { signal });
    return { bytes, size: stats.size };
}

function toRecord(file: ResolvedFile, language: string, bytes: Buffer, size: number): FileRecord {
    const base = { path: file.relativePath, absolutePath: file.absolutePath, language, size };

    if (bytes.length === 0) {
        return { ...base, status: 'empty', blocks: [{ language, content: '' }] };
    }

    if (looksBinary(bytes)) {
        return { ...base, status: 'binary', reason: 'binary content' };
    }

    const text = decodeUtf8(bytes);
    if (text === null) {
        return { ...base, status: 'binary', reason: 'not valid UTF-8 text' };
    }

    if (isNotebookPath(file.relativePath)) {
        try {
            const blocks = normalizeNotebook(text);
            return { ...base, status: blocks.length > 0 ? 'text' : 'empty', blocks };
        } catch (error) {
            if (error instanceof MalformedNotebookError) {
                return { ...base, status: 'unreadable', reason: error.message };
            }
            throw error;
        }
    }

    return { ...base, status: 'text', blocks: [{ language, content: text }] };
}

/**
 * Read one file. Never rejects: every failure is folded into the record.
 */
export async function readFileRecord(file: ResolvedFile, options: ReadOptions = {}): Promise<FileRecord> {
    const {
        timeoutMs = DEFAULT_READ_TIMEOUT_MS,
        maxFileSize = DEFAULT_MAX_FILE_SIZE,
        languages,
    } = options;
    const language = classifyLanguage(file.relativePath, languages);

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new ReadTimeoutError(file.relativePath, timeoutMs));
        }, timeoutMs);
    });

    try {
        const { bytes, size } = await Promise.race([
            loadBytes(file.absolutePath, maxFileSize, controller.signal),
            timeout,
        ]);
        return toRecord(file, language, bytes, size);
    } catch (error) {
        return {
            path: file.relativePath,
            absolutePath: file.absolutePath,
            language,
            size: 0,
            status: 'unreadable',
            reason: errorMessage(error),
        };
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Read a batch through a bounded pool. Records are returned in the order of
 * `files`, so output stays deterministic however reads interleave.
 */
export async function readFileRecords(files: readonly ResolvedFile[], options: ReadOptions = {}): Promise<FileRecord[]> {
    const logger = options.logger ?? silentLogger;
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

    return mapWithConcurrency(files, concurrency, async file => {
        const record = await readFileRecord(file, options);
        if (record.status === 'binary' || record.status === 'unreadable') {
            logger.debug(`Skipped ${record.path}: ${record.status} (${record.reason})`);
        } else {
            logger.debug(`Read ${record.path} (${record.size} bytes)`);
        }
        return record;
    });
}
