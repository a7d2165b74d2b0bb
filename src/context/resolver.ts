/**
 * Path Resolver - expands a selection (literal paths and globs) into the
 * ordered, deduplicated set of files to read.
 *
 * - Directories are walked depth-first with entries sorted by name.
 * - Every subdirectory is tested against the IgnoreSpec before descent;
 *   ignored directories are pruned and never listed. Glob expansion walks
 *   the same way, from the pattern's literal prefix.
 * - A file reached through several selection entries belongs to the first.
 * - Symlinks are followed; directories are keyed by dev:ino so a link cycle
 *   is entered once per pass.
 */

import { readdir, realpath, stat } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { Minimatch } from 'minimatch';
import { SelectionNotFoundError, errorMessage, isMissingPathError } from './errors.js';
import type { IgnoreSpec } from './ignore-rules.js';
import type { IgnoredPath, Resolution, SelectionGroup, SelectionWarning } from './types.js';
import { silentLogger, type Logger } from '../logger.js';

export interface ResolveOptions {
    logger?: Logger;
}

interface ResolveContext {
    baseDir: string;
    spec: IgnoreSpec;
    logger: Logger;
    /** Real paths of files already claimed by a selection */
    seenFiles: Set<string>;
    /** dev:ino of directories already walked */
    visitedDirs: Set<string>;
    warnings: SelectionWarning[];
    ignored: IgnoredPath[];
}

function toPosix(p: string): string {
    return sep === '/' ? p : p.split(sep).join('/');
}

/** Base-relative POSIX path, '.' for the base itself, absolute POSIX path when outside it */
export function toBaseRelative(baseDir: string, absolutePath: string): string {
    const rel = relative(baseDir, absolutePath);
    if (rel === '') return '.';
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return toPosix(absolutePath);
    return toPosix(rel);
}

function notFound(selection: string, message?: string): SelectionWarning {
    const error = new SelectionNotFoundError(selection, message);
    return { selection, kind: 'not-found', message: error.message };
}

async function addFile(absolutePath: string, group: SelectionGroup, ctx: ResolveContext): Promise<void> {
    const rel = toBaseRelative(ctx.baseDir, absolutePath);

    if (ctx.spec.matches(rel, false)) {
        ctx.ignored.push({ path: rel, isDirectory: false, label: group.label });
        ctx.logger.debug(`Ignored: ${rel}`);
        return;
    }

    let identity = absolutePath;
    try {
        identity = await realpath(absolutePath);
    } catch (error) {
        ctx.logger.debug(`realpath failed for ${rel}: ${errorMessage(error)}`);
    }

    if (ctx.seenFiles.has(identity)) {
        ctx.logger.debug(`Duplicate skipped: ${rel} (already claimed by an earlier selection)`);
        return;
    }

    ctx.seenFiles.add(identity);
    group.files.push({ absolutePath, relativePath: rel, label: group.label });
}

interface ListedEntry {
    fullPath: string;
    rel: string;
    /** Target stats when the entry is a symlink */
    stats: Stats | null;
    isDirectory: boolean;
    isFile: boolean;
}

/** Entries of `dirPath` sorted by name, symlinks followed. Null (with a warning) when it cannot be listed. */
async function listDir(dirPath: string, group: SelectionGroup, ctx: ResolveContext): Promise<ListedEntry[] | null> {
    let entries: Dirent[];
    try {
        entries = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
        ctx.warnings.push({
            selection: group.label,
            kind: 'access',
            message: `Cannot list directory ${toBaseRelative(ctx.baseDir, dirPath)}: ${errorMessage(error)}`,
        });
        return null;
    }

    // Sort for deterministic output
    entries.sort((a, b) => a.name.localeCompare(b.name));

    const listed: ListedEntry[] = [];
    for (const entry of entries) {
        const fullPath = join(dirPath, entry.name);
        const rel = toBaseRelative(ctx.baseDir, fullPath);

        let stats: Stats | null = null;
        if (entry.isSymbolicLink()) {
            try {
                stats = await stat(fullPath);
            } catch (error) {
                ctx.warnings.push({ selection: group.label, kind: 'access', message: `Broken symlink ${rel}: ${errorMessage(error)}` });
                continue;
            }
        }

        listed.push({
            fullPath,
            rel,
            stats,
            isDirectory: stats ? stats.isDirectory() : entry.isDirectory(),
            isFile: stats ? stats.isFile() : entry.isFile(),
        });
    }
    return listed;
}

/** Record and report an ignored directory. Ignored trees are never listed. */
function pruneDirectory(rel: string, group: SelectionGroup, ctx: ResolveContext): boolean {
    if (!ctx.spec.matches(rel, true)) return false;
    ctx.ignored.push({ path: rel, isDirectory: true, label: group.label });
    ctx.logger.debug(`Pruned: ${rel}/`);
    return true;
}

async function walkDir(dirPath: string, dirStats: Stats, group: SelectionGroup, ctx: ResolveContext): Promise<void> {
    const identity = `${dirStats.dev}:${dirStats.ino}`;
    if (ctx.visitedDirs.has(identity)) {
        ctx.logger.debug(`Already walked, skipping: ${toBaseRelative(ctx.baseDir, dirPath)}`);
        return;
    }
    ctx.visitedDirs.add(identity);

    const entries = await listDir(dirPath, group, ctx);
    if (!entries) return;

    for (const entry of entries) {
        if (entry.isDirectory) {
            if (pruneDirectory(entry.rel, group, ctx)) continue;
            try {
                await walkDir(entry.fullPath, entry.stats ?? (await stat(entry.fullPath)), group, ctx);
            } catch (error) {
                ctx.warnings.push({ selection: group.label, kind: 'access', message: `Cannot stat ${entry.rel}: ${errorMessage(error)}` });
            }
        } else if (entry.isFile) {
            await addFile(entry.fullPath, group, ctx);
        }
    }
}

async function visitPath(absolutePath: string, stats: Stats, group: SelectionGroup, ctx: ResolveContext): Promise<void> {
    if (stats.isDirectory()) {
        if (pruneDirectory(toBaseRelative(ctx.baseDir, absolutePath), group, ctx)) return;
        await walkDir(absolutePath, stats, group, ctx);
    } else if (stats.isFile()) {
        await addFile(absolutePath, group, ctx);
    } else {
        ctx.logger.debug(`Not a regular file, skipping: ${absolutePath}`);
    }
}

// ─── Globs ──────────────────────────────────────────────────────────────────

const GLOB_OPTIONS = { dot: true, nocomment: true, nonegate: true } as const;

function compileGlob(pattern: string): Minimatch {
    let normalized = pattern.replace(/\\/g, '/');
    while (normalized.startsWith('./')) normalized = normalized.slice(2);
    return new Minimatch(normalized, GLOB_OPTIONS);
}

interface GlobWalk {
    matcher: Minimatch;
    /** Absolute patterns test absolute paths; relative ones test base-relative paths */
    toCandidate(absolutePath: string): string;
    /** dev:ino of directories this expansion has listed */
    visited: Set<string>;
    matched: number;
}

/** Leading literal segments shared by every brace expansion of the pattern */
function staticPrefix(matcher: Minimatch): string[] {
    const [first, ...rest] = matcher.set;
    if (!first) return [];

    const prefix: string[] = [];
    for (let i = 0; i < first.length - 1; i++) {
        const part = first[i];
        if (typeof part !== 'string' || rest.some(parts => parts[i] !== part)) break;
        prefix.push(part);
    }
    return prefix;
}

/**
 * Descend only into directories the pattern can still match, pruning ignored
 * ones first. A directory the pattern matches outright is walked whole.
 */
async function walkGlob(dirPath: string, dirStats: Stats, group: SelectionGroup, ctx: ResolveContext, glob: GlobWalk): Promise<void> {
    const identity = `${dirStats.dev}:${dirStats.ino}`;
    if (glob.visited.has(identity)) return;
    glob.visited.add(identity);

    const entries = await listDir(dirPath, group, ctx);
    if (!entries) return;

    for (const entry of entries) {
        const candidate = glob.toCandidate(entry.fullPath);

        if (entry.isDirectory) {
            const whole = glob.matcher.match(candidate);
            if (!whole && !glob.matcher.match(candidate, true)) continue;
            if (pruneDirectory(entry.rel, group, ctx)) {
                glob.matched++;
                continue;
            }
            try {
                const stats = entry.stats ?? (await stat(entry.fullPath));
                if (whole) {
                    glob.matched++;
                    await walkDir(entry.fullPath, stats, group, ctx);
                } else {
                    await walkGlob(entry.fullPath, stats, group, ctx, glob);
                }
            } catch (error) {
                ctx.warnings.push({ selection: group.label, kind: 'access', message: `Cannot stat ${entry.rel}: ${errorMessage(error)}` });
            }
        } else if (entry.isFile && glob.matcher.match(candidate)) {
            glob.matched++;
            await addFile(entry.fullPath, group, ctx);
        }
    }
}

/**
 * Expand a glob into `group`. Returns the number of matched paths, ignored
 * ones included, or null when the walk root could not be read (already warned).
 */
async function expandGlob(matcher: Minimatch, group: SelectionGroup, ctx: ResolveContext): Promise<number | null> {
    const absolutePattern = matcher.pattern.startsWith('/');
    const prefix = staticPrefix(matcher).join('/');
    const root = absolutePattern ? resolve(prefix || '/') : resolve(ctx.baseDir, prefix);

    let rootStats: Stats;
    try {
        rootStats = await stat(root);
    } catch (error) {
        if (isMissingPathError(error)) return 0;
        ctx.warnings.push({ selection: group.label, kind: 'access', message: `Cannot access ${root}: ${errorMessage(error)}` });
        return null;
    }
    if (!rootStats.isDirectory()) return 0;
    if (pruneDirectory(toBaseRelative(ctx.baseDir, root), group, ctx)) return 1;

    const glob: GlobWalk = {
        matcher,
        toCandidate: absolutePath => toPosix(absolutePattern ? absolutePath : relative(ctx.baseDir, absolutePath)),
        visited: new Set(),
        matched: 0,
    };
    await walkGlob(root, rootStats, group, ctx, glob);
    return glob.matched;
}

/**
 * Resolve every selection entry against `baseDir`.
 *
 * Literal paths win over glob interpretation: an existing file named
 * `notes[1].md` is read as-is. Missing literals and globs without matches
 * become warnings; resolution always continues with the next entry.
 */
export async function resolveSelection(
    selection: readonly string[],
    baseDir: string,
    spec: IgnoreSpec,
    options: ResolveOptions = {}
): Promise<Resolution> {
    const ctx: ResolveContext = {
        baseDir: resolve(baseDir),
        spec,
        logger: options.logger ?? silentLogger,
        seenFiles: new Set(),
        visitedDirs: new Set(),
        warnings: [],
        ignored: [],
    };
    const groups: SelectionGroup[] = [];

    for (const entry of selection) {
        const group: SelectionGroup = { label: entry, files: [] };
        groups.push(group);

        const absolutePath = isAbsolute(entry) ? resolve(entry) : resolve(ctx.baseDir, entry);

        let stats: Stats | null = null;
        try {
            stats = await stat(absolutePath);
        } catch (error) {
            if (!isMissingPathError(error)) {
                ctx.warnings.push({ selection: entry, kind: 'access', message: `Cannot access ${entry}: ${errorMessage(error)}` });
                continue;
            }
        }

        if (stats) {
            await visitPath(absolutePath, stats, group, ctx);
        } else {
            const matcher = compileGlob(entry);
            if (!matcher.hasMagic()) {
                ctx.warnings.push(notFound(entry));
                continue;
            }
            const matched = await expandGlob(matcher, group, ctx);
            if (matched === 0) {
                ctx.warnings.push(notFound(entry, `No files match pattern: ${entry}`));
                continue;
            }
            if (matched !== null) ctx.logger.debug(`Pattern ${entry} matched ${matched} path(s)`);
        }

        ctx.logger.debug(`Selection ${entry}: ${group.files.length} file(s)`);
    }

    return { groups, warnings: ctx.warnings, ignored: ctx.ignored };
}
