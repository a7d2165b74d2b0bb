/**
 * Notebook Normalizer - turns a Jupyter notebook into plain content blocks
 * so the formatter renders it like any other file.
 */

import { MalformedNotebookError } from './errors.js';
import { KNOWN_LANGUAGES } from './language.js';
import type { ContentBlock } from './types.js';

/** Tag for code cells when the kernel language is missing or unknown */
export const DEFAULT_NOTEBOOK_LANGUAGE = 'text';

const KERNEL_ALIASES: Record<string, string> = {
    python3: 'python',
    ipython: 'python',
    ipython3: 'python',
    'c++': 'cpp',
    'c#': 'csharp',
    js: 'javascript',
    ts: 'typescript',
};

export function isNotebookPath(path: string): boolean {
    return path.toLowerCase().endsWith('.ipynb');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: unknown, key: string): string | undefined {
    if (!isRecord(obj)) return undefined;
    const value = obj[key];
    return typeof value === 'string' ? value : undefined;
}

/** metadata.kernelspec.language, then metadata.language_info.name */
export function kernelLanguage(metadata: unknown): string {
    const declared =
        (isRecord(metadata) ? readString(metadata.kernelspec, 'language') : undefined) ??
        (isRecord(metadata) ? readString(metadata.language_info, 'name') : undefined);

    if (!declared) return DEFAULT_NOTEBOOK_LANGUAGE;

    const lower = declared.trim().toLowerCase();
    const tag = Object.hasOwn(KERNEL_ALIASES, lower) ? KERNEL_ALIASES[lower] : lower;
    return KNOWN_LANGUAGES.has(tag) ? tag : DEFAULT_NOTEBOOK_LANGUAGE;
}

function cellSource(cell: Record<string, unknown>, index: number): string {
    const { source } = cell;
    if (source === undefined) return '';
    if (typeof source === 'string') return source;
    if (Array.isArray(source) && source.every((line): line is string => typeof line === 'string')) {
        return source.join('');
    }
    throw new MalformedNotebookError(`cell ${index} has a non-text source`);
}

/**
 * Parse notebook JSON into one block per non-empty cell, in cell order.
 * Throws MalformedNotebookError when the document is not a notebook.
 */
export function normalizeNotebook(text: string): ContentBlock[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new MalformedNotebookError(error instanceof Error ? error.message : 'invalid JSON');
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.cells)) {
        throw new MalformedNotebookError('missing "cells" array');
    }

    const codeLanguage = kernelLanguage(parsed.metadata);
    const blocks: ContentBlock[] = [];

    parsed.cells.forEach((cell: unknown, index: number) => {
        if (!isRecord(cell)) {
            throw new MalformedNotebookError(`cell ${index} is not an object`);
        }

        const content = cellSource(cell, index).trim();
        if (!content) return;

        const cellType = typeof cell.cell_type === 'string' ? cell.cell_type : 'code';
        if (cellType === 'markdown') {
            blocks.push({ language: 'markdown', content });
        } else if (cellType === 'raw') {
            blocks.push({ language: '', content });
        } else {
            blocks.push({ language: codeLanguage, content });
        }
    });

    return blocks;
}
