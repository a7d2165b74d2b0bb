/**
 * Data model shared by the resolver, reader, formatter and pipeline.
 * Everything here is built fresh per run and discarded afterwards.
 */

import type { SkipReason } from './errors.js';

/** A file that survived selection expansion and ignore filtering */
export interface ResolvedFile {
    absolutePath: string;
    /** POSIX path relative to the base dir (absolute POSIX path when outside it) */
    relativePath: string;
    /** The top-level selection entry that first produced this file */
    label: string;
}

export interface SelectionGroup {
    label: string;
    files: ResolvedFile[];
}

export interface SelectionWarning {
    selection: string;
    /** not-found: missing literal or glob without matches; access: fs error during resolution */
    kind: 'not-found' | 'access';
    message: string;
}

export interface IgnoredPath {
    path: string;
    isDirectory: boolean;
    label: string;
}

export interface Resolution {
    /** One group per selection entry, in selection order */
    groups: SelectionGroup[];
    warnings: SelectionWarning[];
    /** Ignored files and pruned directories met during resolution */
    ignored: IgnoredPath[];
}

export interface ContentBlock {
    language: string;
    content: string;
}

interface RecordBase {
    path: string;
    absolutePath: string;
    language: string;
    /** Size on disk in bytes (0 when unknown) */
    size: number;
}

export interface TextRecord extends RecordBase {
    status: 'text' | 'empty';
    blocks: ContentBlock[];
}

export interface SkippedRecord extends RecordBase {
    status: 'binary' | 'unreadable';
    reason: string;
}

export type FileRecord = TextRecord | SkippedRecord;

export type FileStatus = FileRecord['status'];

/** An ordered group of records destined for one rendered output */
export interface Document {
    label: string;
    records: FileRecord[];
}

export interface NamedOutput {
    /** File name (label sanitized + extension) */
    name: string;
    label: string;
    content: string;
    fileCount: number;
}

export interface SkippedFile {
    path: string;
    reason: SkipReason;
    detail: string;
}

export function isTextRecord(record: FileRecord): record is TextRecord {
    return record.status === 'text' || record.status === 'empty';
}
