/**
 * Logger - injected into every pipeline component.
 *
 * Core modules never call console directly; the CLI passes a console-backed
 * logger, the HTTP transport and tests pass `silentLogger`.
 */

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface ConsoleLoggerOptions {
    /** Print debug lines (default: false) */
    verbose?: boolean;
    /** Prefix for every line, e.g. "  " for nested CLI output */
    indent?: string;
    /** Send debug/info to stderr too, e.g. when stdout carries the document */
    stderr?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const { verbose = false, indent = '', stderr = false } = options;
    const out = (line: string) => (stderr ? console.error(line) : console.log(line));
    return {
        debug(message) {
            if (verbose) out(`${indent}${message}`);
        },
        info(message) {
            out(`${indent}${message}`);
        },
        // Warnings and errors go to stderr so `--stdout` output stays clean
        warn(message) {
            console.error(`${indent}Warning: ${message}`);
        },
        error(message) {
            console.error(`${indent}Error: ${message}`);
        },
    };
}

const noop = (): void => {};

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
