/**
 * Formatter - renders Documents into named text outputs.
 *
 * Two renderers: markdown (fenced, language-tagged blocks) and plain text.
 * Skipped files render as a one-line notice so the output still shows what
 * was left out. An optional project header (title, description, totals)
 * goes above the records. Rendering is a pure function of the records: the
 * same tree always produces byte-identical output, so the header carries no
 * timestamp.
 */

import type { ContentBlock, Document, FileRecord, NamedOutput } from './types.js';
import { isTextRecord } from './types.js';

export type OutputFormat = 'markdown' | 'txt';
export type OutputMode = 'combined' | 'per-selection';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['markdown', 'txt'];

export const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
    markdown: '.md',
    txt: '.txt',
};

export const COMBINED_LABEL = 'combined';

const RECORD_SEPARATOR = '\n\n---\n\n';
const TXT_RULE = '='.repeat(50);

export interface DocumentHeader {
    /** Project name, rendered as the title */
    name: string;
    description?: string;
    /** Totals and a per-language breakdown under the title (default: true) */
    metadata?: boolean;
}

/** Options shared by both renderers */
export interface RenderOptions {
    header?: DocumentHeader;
    /** Prefix every content line with its number */
    lineNumbers?: boolean;
}

export interface FormatOptions extends RenderOptions {
    /** Renderer (default: markdown) */
    format?: OutputFormat;
    /** One combined output or one per selection (default: combined) */
    mode?: OutputMode;
    /** Output file extension, with or without the dot (default: per format) */
    extension?: string;
}

export interface DocumentStats {
    /** Records with content (text or empty) */
    files: number;
    /** Bytes across those records */
    size: number;
    lines: number;
    /** [language, file count], sorted by language; untagged files count as 'unknown' */
    languages: Array<[string, number]>;
}

export function isOutputFormat(value: string): value is OutputFormat {
    return value === 'markdown' || value === 'txt';
}

/** A backtick fence longer than any backtick run inside the content */
export function fenceFor(content: string): string {
    const runs = content.match(/`+/g) ?? [];
    const longest = runs.reduce((max, run) => Math.max(max, run.length), 0);
    return '`'.repeat(Math.max(3, longest + 1));
}

function countLines(content: string): number {
    if (content === '') return 0;
    const lines = content.split('\n').length;
    return content.endsWith('\n') ? lines - 1 : lines;
}

export function documentStats(document: Document): DocumentStats {
    const texts = document.records.filter(isTextRecord);
    const languages = new Map<string, number>();
    for (const record of texts) {
        const language = record.language || 'unknown';
        languages.set(language, (languages.get(language) ?? 0) + 1);
    }

    return {
        files: texts.length,
        size: texts.reduce((sum, record) => sum + record.size, 0),
        lines: texts.reduce((sum, record) => sum + record.blocks.reduce((n, block) => n + countLines(block.content), 0), 0),
        languages: [...languages.entries()].sort(([a], [b]) => a.localeCompare(b)),
    };
}

/** `512.0 B`, `1.5 KB`, `2.0 MB` */
export function formatSize(bytes: number): string {
    const units = ['B', 'KB', 'MB', 'GB'];
    let size = bytes;
    for (const unit of units) {
        if (size < 1024) return `${size.toFixed(1)} ${unit}`;
        size /= 1024;
    }
    return `${size.toFixed(1)} TB`;
}

/** `1: first`, right-aligned to the widest number; a trailing newline stays unnumbered */
export function addLineNumbers(content: string): string {
    if (content === '') return content;
    const trailing = content.endsWith('\n');
    const lines = (trailing ? content.slice(0, -1) : content).split('\n');
    const width = String(lines.length).length;
    const numbered = lines.map((line, i) => `${String(i + 1).padStart(width)}: ${line}`).join('\n');
    return trailing ? `${numbered}\n` : numbered;
}

function withLineNumbers(record: FileRecord, options: RenderOptions): FileRecord {
    if (!options.lineNumbers || !isTextRecord(record)) return record;
    return { ...record, blocks: record.blocks.map(block => ({ ...block, content: addLineNumbers(block.content) })) };
}

function markdownHeader(header: DocumentHeader, stats: DocumentStats): string {
    const sections = [`# ${header.name}`];
    if (header.description) sections.push(header.description);

    if (header.metadata !== false) {
        const lines = [
            '## Project Information',
            `- **Total Files:** ${stats.files}`,
            `- **Total Size:** ${formatSize(stats.size)}`,
            `- **Total Lines:** ${stats.lines.toLocaleString('en-US')}`,
        ];
        if (stats.languages.length > 0) {
            lines.push('- **Languages:**');
            for (const [language, count] of stats.languages) {
                lines.push(`  - ${language}: ${count} file${count === 1 ? '' : 's'}`);
            }
        }
        sections.push(lines.join('\n'));
    }

    sections.push(`## Files Processed: ${stats.files}`);
    return sections.join('\n\n');
}

function textHeader(header: DocumentHeader, stats: DocumentStats): string {
    const lines = [`PROJECT: ${header.name.toUpperCase()}`];
    if (header.description) lines.push(`DESCRIPTION: ${header.description}`);
    if (header.metadata !== false) {
        lines.push(`FILES: ${stats.files}`);
        lines.push(`SIZE: ${formatSize(stats.size)}`);
        lines.push(`LINES: ${stats.lines.toLocaleString('en-US')}`);
        if (stats.languages.length > 0) {
            lines.push(`LANGUAGES: ${stats.languages.map(([language, count]) => `${language} (${count})`).join(', ')}`);
        }
    }
    return lines.join('\n');
}

function markdownBlock(block: ContentBlock): string {
    const fence = fenceFor(block.content);
    const body = block.content === '' || block.content.endsWith('\n') ? block.content : `${block.content}\n`;
    return `${fence}${block.language}\n${body}${fence}`;
}

function markdownRecord(record: FileRecord): string {
    const label = `## ${record.path}`;
    if (!isTextRecord(record)) {
        return `${label}\n\n> Skipped (${record.status}): ${record.reason}`;
    }
    const blocks = record.blocks.length > 0 ? record.blocks : [{ language: '', content: '' }];
    return `${label}\n\n${blocks.map(markdownBlock).join('\n\n')}`;
}

function textRecord(record: FileRecord): string {
    const header = record.language ? `${record.path} (${record.language})` : record.path;
    const head = `${TXT_RULE}\n${header}\n${TXT_RULE}`;
    if (!isTextRecord(record)) {
        return `${head}\n[skipped: ${record.status}] ${record.reason}`;
    }
    const body = record.blocks.map(block => block.content.replace(/\n+$/, '')).join('\n\n');
    return `${head}\n${body}`;
}

export function renderMarkdown(document: Document, options: RenderOptions = {}): string {
    if (document.records.length === 0) return '';
    const body = document.records.map(record => markdownRecord(withLineNumbers(record, options))).join(RECORD_SEPARATOR);
    const head = options.header ? `${markdownHeader(options.header, documentStats(document))}\n\n` : '';
    return `${head}${body}\n`;
}

export function renderText(document: Document, options: RenderOptions = {}): string {
    if (document.records.length === 0) return '';
    const body = document.records.map(record => textRecord(withLineNumbers(record, options))).join('\n\n');
    const head = options.header ? `${textHeader(options.header, documentStats(document))}\n\n` : '';
    return `${head}${body}\n`;
}

export function renderDocument(document: Document, format: OutputFormat = 'markdown', options: RenderOptions = {}): string {
    return format === 'txt' ? renderText(document, options) : renderMarkdown(document, options);
}

/**
 * Turn a selection label into a safe file name stem:
 * `/` → `_`, `*` → `star`, `.` → `dot`, anything else unsafe → `_`.
 */
export function sanitizeLabel(label: string): string {
    const stem = label
        .replace(/[/\\]/g, '_')
        .replace(/\*/g, 'star')
        .replace(/\./g, 'dot')
        .replace(/[^A-Za-z0-9_-]/g, '_')
        .slice(0, 120);
    return stem || 'selection';
}

function normalizeExtension(extension: string): string {
    return extension.startsWith('.') ? extension : `.${extension}`;
}

/**
 * Render documents into outputs.
 *
 * combined: one output `context<ext>` holding every record in order.
 * per-selection: one output per non-empty document, named after its label.
 */
export function formatDocuments(documents: readonly Document[], options: FormatOptions = {}): NamedOutput[] {
    const { format = 'markdown', mode = 'combined' } = options;
    const render: RenderOptions = { header: options.header, lineNumbers: options.lineNumbers };
    const extension = normalizeExtension(options.extension ?? FORMAT_EXTENSIONS[format]);

    if (mode === 'combined') {
        const combined: Document = {
            label: COMBINED_LABEL,
            records: documents.flatMap(doc => doc.records),
        };
        return [{
            name: `context${extension}`,
            label: COMBINED_LABEL,
            content: renderDocument(combined, format, render),
            fileCount: combined.records.length,
        }];
    }

    const usedNames = new Set<string>();
    const outputs: NamedOutput[] = [];

    for (const document of documents) {
        if (document.records.length === 0) continue;

        const stem = sanitizeLabel(document.label);
        let name = `${stem}${extension}`;
        for (let n = 2; usedNames.has(name); n++) {
            name = `${stem}-${n}${extension}`;
        }
        usedNames.add(name);

        outputs.push({
            name,
            label: document.label,
            content: renderDocument(document, format, render),
            fileCount: document.records.length,
        });
    }

    return outputs;
}
