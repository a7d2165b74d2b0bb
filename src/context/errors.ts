/**
 * Error taxonomy for the bundling pipeline.
 *
 * Only BasePathError and ConfigError are thrown out of the pipeline. The rest
 * are created per file / per selection / per output target and collected into
 * the summary.
 */

/** Why a file shows up in the summary's skipped list */
export type SkipReason = 'ignored' | 'binary' | 'unreadable' | 'limit';

export class SelectionNotFoundError extends Error {
    readonly selection: string;

    constructor(selection: string, message?: string) {
        super(message ?? `Selection not found: ${selection}`);
        this.name = 'SelectionNotFoundError';
        this.selection = selection;
    }
}

export class ReadTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(path: string, timeoutMs: number) {
        super(`Read timed out after ${timeoutMs}ms: ${path}`);
        this.name = 'ReadTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class MalformedNotebookError extends Error {
    constructor(detail: string) {
        super(`Malformed notebook: ${detail}`);
        this.name = 'MalformedNotebookError';
    }
}

export class OutputWriteError extends Error {
    readonly target: string;

    constructor(target: string, cause: unknown) {
        super(`Failed to write ${target}: ${errorMessage(cause)}`);
        this.name = 'OutputWriteError';
        this.target = target;
    }
}

export class BasePathError extends Error {
    constructor(basePath: string, detail: string) {
        super(`${detail}: ${basePath}`);
        this.name = 'BasePathError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** ENOENT / ENOTDIR: the path (or one of its parents) does not exist */
export function isMissingPathError(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
