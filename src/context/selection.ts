/**
 * SelectionSet - the user's checked paths, keyed by canonical absolute path.
 *
 * Kept apart from any tree widget: a front end toggles paths here and hands
 * `toSelection()` to the pipeline. Insertion order is preserved because it
 * decides per-selection grouping.
 */

import { isAbsolute, relative, resolve, sep } from 'path';

export class SelectionSet {
    private readonly basePath: string;
    /** canonical path → the form the user gave it */
    private readonly entries = new Map<string, string>();

    constructor(basePath: string = '.') {
        this.basePath = resolve(basePath);
    }

    canonical(path: string): string {
        return resolve(this.basePath, path);
    }

    has(path: string): boolean {
        return this.entries.has(this.canonical(path));
    }

    /** Returns false when the path was already selected */
    add(path: string): boolean {
        const key = this.canonical(path);
        if (this.entries.has(key)) return false;
        this.entries.set(key, path);
        return true;
    }

    delete(path: string): boolean {
        return this.entries.delete(this.canonical(path));
    }

    /** Flip membership; returns the new state */
    toggle(path: string): boolean {
        if (this.delete(path)) return false;
        this.add(path);
        return true;
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Selection entries in insertion order: base-relative POSIX paths for
     * anything inside the base, absolute paths otherwise.
     */
    toSelection(): string[] {
        return [...this.entries.keys()].map(key => {
            const rel = relative(this.basePath, key);
            if (rel === '') return '.';
            if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return key;
            return rel.split(sep).join('/');
        });
    }
}
