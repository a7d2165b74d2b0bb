/**
 * Ignore rules - .gitignore plus extra exclude patterns, compiled once per run.
 *
 * Matching is delegated to the `ignore` package (full gitignore semantics:
 * `*`, `**`, trailing-slash dir rules, `!` negation, leading-slash anchoring).
 * `ignore` also tests every ancestor directory first, so a negation can never
 * re-include a path whose parent directory is ignored.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import ignore, { type Ignore } from 'ignore';
import { errorMessage, isMissingPathError } from './errors.js';
import { silentLogger, type Logger } from '../logger.js';

export interface IgnoreSpec {
    /** Rule lines in evaluation order (.gitignore first, then extras) */
    readonly patterns: readonly string[];
    /**
     * Test a base-relative path. Paths outside the base directory
     * (`../x`, absolute) never match.
     */
    matches(relativePath: string, isDirectory: boolean): boolean;
}

/** Split ignore-file text into rule lines, dropping blanks and comments */
export function parseIgnoreLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trimEnd())
        .filter(line => line.trim() !== '' && !line.startsWith('#'));
}

/**
 * Normalize to the POSIX, `./`-free form `ignore` expects. Returns null for the
 * base itself and for paths outside it.
 */
function toMatchablePath(relativePath: string): string | null {
    let p = relativePath.replace(/\\/g, '/');
    while (p.startsWith('./')) p = p.slice(2);
    p = p.replace(/\/+$/, '');
    if (p === '' || p === '.') return null;
    if (p.startsWith('/') || p === '..' || p.startsWith('../') || /^[A-Za-z]:/.test(p)) return null;
    return p;
}

export function createIgnoreSpec(patterns: readonly string[]): IgnoreSpec {
    const frozen = Object.freeze([...patterns]);
    const ig: Ignore = ignore.default().add([...frozen]);

    return {
        patterns: frozen,
        matches(relativePath, isDirectory) {
            const p = toMatchablePath(relativePath);
            if (p === null) return false;
            const candidate = isDirectory ? `${p}/` : p;
            // `ignore` throws when the first segment is all dots (`...`, `..../x`); such paths are never ignored
            if (!ignore.default.isPathValid(candidate)) return false;
            return ig.ignores(candidate);
        },
    };
}

/**
 * Build the IgnoreSpec for `baseDir`: its .gitignore (absent = no rules)
 * followed by `extraPatterns`, so extras can override .gitignore but not the
 * other way round.
 */
export async function compileIgnoreSpec(
    baseDir: string,
    extraPatterns: readonly string[] = [],
    logger: Logger = silentLogger
): Promise<IgnoreSpec> {
    const gitignorePath = join(baseDir, '.gitignore');
    let gitignoreLines: string[] = [];

    try {
        gitignoreLines = parseIgnoreLines(await readFile(gitignorePath, 'utf-8'));
        logger.debug(`Loaded ${gitignoreLines.length} rule(s) from ${gitignorePath}`);
    } catch (error) {
        if (isMissingPathError(error)) {
            logger.debug(`No .gitignore in ${baseDir}`);
        } else {
            logger.warn(`Could not read ${gitignorePath}: ${errorMessage(error)}`);
        }
    }

    const extras = extraPatterns.map(p => p.trim()).filter(p => p !== '');
    if (extras.length > 0) {
        logger.debug(`Extra exclude patterns: ${extras.join(', ')}`);
    }

    return createIgnoreSpec([...gitignoreLines, ...extras]);
}
