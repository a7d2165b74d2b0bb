#!/usr/bin/env node

/**
 * context-bundle CLI
 *
 * Bundle selected files and directories into one Markdown or plain-text
 * document for pasting into an LLM conversation.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { bundleSelection, describeSummary, type BundleResult } from './context/gather.js';
import { errorMessage, OutputWriteError } from './context/errors.js';
import { FORMAT_EXTENSIONS, formatDocuments, OUTPUT_FORMATS, type OutputFormat, type RenderOptions } from './context/format.js';
import { SelectionSet } from './context/selection.js';
import {
    loadConfig,
    configFromEnv,
    mergeConfigs,
    documentHeader,
    getConfigValue,
    initConfigFile,
    updateConfigFile,
    CONFIG_DEFAULTS,
    DEFAULT_CONFIG_FILE,
    type CliConfig,
} from './config.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { copyToClipboard, writeOutputAtomic, writeOutputs } from './output/writer.js';
import { DEFAULT_HOST, DEFAULT_PORT, startServer } from './server.js';

function readVersion(): string {
    try {
        const parsed: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
            return parsed.version;
        }
    } catch {
        return '0.0.0';
    }
    return '0.0.0';
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

/** `-e a -e b,c` → ['a', 'b', 'c'] */
function collectPatterns(value: string, previous: string[]): string[] {
    return previous.concat(value.split(',').map(p => p.trim()).filter(p => p.length > 0));
}

interface BundleCommandOptions {
    basePath?: string;
    exclude: string[];
    output?: string;
    outputDir?: string;
    stdout?: boolean;
    defaultExcludes: boolean;
    concurrency?: number;
    timeout?: number;
    maxFiles?: number;
    header?: boolean;
    lineNumbers?: boolean;
    configPath?: string;
    verbose?: boolean;
}

/**
 * Layer config: environment < config file < explicit CLI flags.
 * Only flags the user actually passed override the file.
 */
function resolveBundleConfig(options: BundleCommandOptions, command: Command, logger: Logger): CliConfig {
    const fromCli = (key: string) => command.getOptionValueSource(key) === 'cli';

    const env = configFromEnv(process.env, logger);
    const file = options.configPath ? loadConfig(options.configPath, logger) : {};
    if (options.configPath) logger.debug(`Config loaded from: ${resolve(options.configPath)}`);

    const cli: CliConfig = {};
    if (fromCli('basePath')) cli.basePath = options.basePath;
    if (fromCli('exclude')) cli.exclude = [...(file.exclude ?? []), ...options.exclude];
    if (fromCli('output')) cli.output = options.output;
    if (fromCli('outputDir')) cli.outputDir = options.outputDir;
    if (fromCli('defaultExcludes')) cli.useDefaultExcludes = options.defaultExcludes;
    if (fromCli('concurrency')) cli.concurrency = options.concurrency;
    if (fromCli('timeout')) cli.readTimeoutMs = options.timeout;
    if (fromCli('maxFiles')) cli.maxTotalFiles = options.maxFiles;
    if (fromCli('lineNumbers')) cli.lineNumbers = options.lineNumbers;
    if (fromCli('verbose')) cli.verbose = options.verbose;

    return mergeConfigs(env, file, cli);
}

type TargetOutcome = { target: string; ok: true } | { target: string; ok: false; error: string };

async function deliver(
    result: BundleResult,
    format: OutputFormat,
    render: RenderOptions,
    config: CliConfig,
    options: BundleCommandOptions,
    print: (line: string) => void,
    logger: Logger
): Promise<TargetOutcome[]> {
    const outcomes: TargetOutcome[] = [];
    const combined = result.outputs[0]?.content ?? '';

    if (options.stdout) {
        process.stdout.write(combined);
        outcomes.push({ target: 'stdout', ok: true });
    }

    if (config.output) {
        try {
            const path = await writeOutputAtomic(config.output, combined);
            print(`Wrote ${path} (${(Buffer.byteLength(combined) / 1024).toFixed(1)}KB)`);
            outcomes.push({ target: path, ok: true });
        } catch (error) {
            if (!(error instanceof OutputWriteError)) throw error;
            outcomes.push({ target: error.target, ok: false, error: error.message });
        }
    }

    if (config.outputDir) {
        const perSelection = formatDocuments(result.documents, { ...render, format, mode: 'per-selection' });
        const { written, failures } = await writeOutputs(perSelection, config.outputDir, logger);
        for (const entry of written) {
            print(`Wrote ${entry.path} (${entry.label})`);
            outcomes.push({ target: entry.path, ok: true });
        }
        for (const failure of failures) {
            outcomes.push({ target: failure.target, ok: false, error: failure.message });
        }
    }

    // Clipboard is the fallback target
    if (!options.stdout && !config.output && !config.outputDir) {
        try {
            await copyToClipboard(combined);
            print(`Copied ${(Buffer.byteLength(combined) / 1024).toFixed(1)}KB to the clipboard`);
            outcomes.push({ target: 'clipboard', ok: true });
        } catch (error) {
            outcomes.push({ target: 'clipboard', ok: false, error: `Clipboard unavailable: ${errorMessage(error)}` });
        }
    }

    return outcomes;
}

const program = new Command();

program
    .name('ctxb')
    .description('Bundle files and folders into one Markdown or text document for LLM context')
    .version(readVersion());

function addBundleCommand(format: OutputFormat, description: string): void {
    program
        .command(format)
        .description(description)
        .argument('[paths...]', 'Files, directories or glob patterns (default: .)')
        .option('-p, --base-path <dir>', 'Directory selections are resolved against (default: cwd)')
        .option('-e, --exclude <pattern>', 'Gitignore-style exclude pattern (repeatable, comma-separated)', collectPatterns, [] as string[])
        .option('-o, --output <file>', 'Write the combined document to a file')
        .option('-d, --output-dir <dir>', `Write one ${FORMAT_EXTENSIONS[format]} file per selection into a directory`)
        .option('--stdout', 'Print the combined document to stdout')
        .option('--no-default-excludes', 'Do not apply the built-in excludes (.git/, node_modules/, ...)')
        .option('--concurrency <n>', 'Parallel file reads', parsePositiveInt)
        .option('--timeout <ms>', 'Per-file read timeout in milliseconds', parsePositiveInt)
        .option('--max-files <n>', 'Leave out files past this count', parsePositiveInt)
        .option('--header', 'Add a project title and totals above the files')
        .option('--line-numbers', 'Number every content line')
        .option('--config-path <path>', `Path to config JSON file (see "ctxb init")`)
        .option('--verbose', 'Verbose output')
        .action(async (paths: string[], options: BundleCommandOptions, command: Command) => {
            // Keep stdout clean for the document itself
            const print = options.stdout ? (line: string) => console.error(line) : (line: string) => console.log(line);

            try {
                const stderr = options.stdout === true;
                const bootstrap = createConsoleLogger({ verbose: options.verbose, stderr });
                const config = resolveBundleConfig(options, command, bootstrap);
                const logger = createConsoleLogger({ verbose: config.verbose, stderr });

                const selection = new SelectionSet(config.basePath ?? '.');
                for (const path of paths.length > 0 ? paths : ['.']) {
                    if (!selection.add(path)) logger.debug(`Duplicate selection ignored: ${path}`);
                }

                const render: RenderOptions = {
                    header: documentHeader(config, config.basePath ?? '.', options.header === true),
                    lineNumbers: config.lineNumbers,
                };

                const result = await bundleSelection(selection.toSelection(), {
                    basePath: config.basePath,
                    exclude: config.exclude,
                    useDefaultExcludes: config.useDefaultExcludes,
                    format,
                    mode: 'combined',
                    ...render,
                    maxTotalFiles: config.maxTotalFiles,
                    concurrency: config.concurrency,
                    readTimeoutMs: config.readTimeoutMs,
                    maxFileSize: config.maxFileSize,
                    languages: config.languages,
                    logger,
                });

                for (const line of describeSummary(result.summary)) print(line);
                logger.debug(`Timing: resolve ${result.timing.resolveMs}ms, read ${result.timing.readMs}ms, format ${result.timing.formatMs}ms`);

                if (!result.ok) {
                    console.error('Error: No readable files found in the selection.');
                    process.exitCode = 1;
                    return;
                }

                const outcomes = await deliver(result, format, render, config, options, print, logger);
                for (const outcome of outcomes) {
                    if (!outcome.ok) console.error(`Error: ${outcome.error}`);
                }
                if (!outcomes.some(outcome => outcome.ok)) {
                    process.exitCode = 1;
                }
            } catch (error) {
                console.error('Error:', error instanceof Error ? error.message : error);
                process.exit(1);
            }
        });
}

addBundleCommand('markdown', 'Bundle selections as Markdown with fenced, language-tagged code blocks');
addBundleCommand('txt', 'Bundle selections as plain text with ruled file headers');

/**
 * Serve command - HTTP transport over the same pipeline
 */
program
    .command('serve')
    .description('Start the HTTP service (/health, /process, /process-to-file)')
    .option('--host <host>', `Interface to bind (default: ${DEFAULT_HOST})`)
    .option('--port <port>', `Port to listen on (default: ${DEFAULT_PORT})`, parsePositiveInt)
    .option('-p, --base-path <dir>', 'Default base directory for requests without base_path')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action(async (options: { host?: string; port?: number; basePath?: string; configPath?: string; verbose?: boolean }) => {
        try {
            const bootstrap = createConsoleLogger({ verbose: options.verbose });
            const file = options.configPath ? loadConfig(options.configPath, bootstrap) : {};
            const config = mergeConfigs(configFromEnv(process.env, bootstrap), file);
            const logger = createConsoleLogger({ verbose: options.verbose ?? config.verbose });

            const server = await startServer({
                host: options.host ?? config.server?.host,
                port: options.port ?? config.server?.port,
                basePath: options.basePath ?? config.basePath,
                format: config.format,
                bundle: {
                    exclude: config.exclude,
                    useDefaultExcludes: config.useDefaultExcludes,
                    maxTotalFiles: config.maxTotalFiles,
                    lineNumbers: config.lineNumbers,
                    header: documentHeader(config, options.basePath ?? config.basePath ?? '.'),
                    concurrency: config.concurrency,
                    readTimeoutMs: config.readTimeoutMs,
                    maxFileSize: config.maxFileSize,
                    languages: config.languages,
                },
                logger,
            });

            const shutdown = () => {
                logger.info('Shutting down');
                server.close(error => {
                    if (error) logger.error(error.message);
                    process.exit(error ? 1 : 0);
                });
            };
            process.once('SIGINT', shutdown);
            process.once('SIGTERM', shutdown);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', DEFAULT_CONFIG_FILE)
    .action(async (outputPath: string) => {
        try {
            const absolutePath = await initConfigFile(outputPath);
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: ctxb markdown . --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

/**
 * Config commands - inspect and edit a config file
 */
const configCommand = program
    .command('config')
    .description('Show, read or change configuration values');

/** Defaults < environment < config file (when it exists) */
function effectiveConfig(configPath: string, logger: Logger): CliConfig {
    const file = existsSync(resolve(configPath)) ? loadConfig(configPath, logger) : {};
    return mergeConfigs(CONFIG_DEFAULTS, configFromEnv(process.env, logger), file);
}

configCommand
    .command('show')
    .description('Print the effective configuration')
    .option('--config-path <path>', 'Path to config JSON file', DEFAULT_CONFIG_FILE)
    .action((options: { configPath: string }) => {
        try {
            console.log(JSON.stringify(effectiveConfig(options.configPath, createConsoleLogger()), null, 2));
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

configCommand
    .command('get')
    .description('Print one effective value (e.g. format, server.port, project.name)')
    .argument('<key>', 'Dotted config key')
    .option('--config-path <path>', 'Path to config JSON file', DEFAULT_CONFIG_FILE)
    .action((key: string, options: { configPath: string }) => {
        try {
            const value = getConfigValue(effectiveConfig(options.configPath, createConsoleLogger()), key);
            if (value === undefined) {
                console.error(`Error: Configuration key '${key}' is not set.`);
                process.exit(1);
            }
            console.log(`${key}: ${JSON.stringify(value)}`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

configCommand
    .command('set')
    .description('Set one value in the config file (lists are comma-separated)')
    .argument('<key>', 'Dotted config key')
    .argument('<value>', 'New value')
    .option('--config-path <path>', 'Path to config JSON file', DEFAULT_CONFIG_FILE)
    .action(async (key: string, value: string, options: { configPath: string }) => {
        try {
            const stored = await updateConfigFile(options.configPath, key, value);
            console.log(`Set ${key} = ${JSON.stringify(stored)} in ${resolve(options.configPath)}`);
        } catch (error) {
            console.error('Error:', errorMessage(error));
            process.exit(1);
        }
    });

/**
 * Formats command - list output formats
 */
program
    .command('formats')
    .description('List supported output formats')
    .action(() => {
        console.log('Output formats:');
        for (const format of OUTPUT_FORMATS) {
            console.log(`  ${format.padEnd(10)} ${FORMAT_EXTENSIONS[format]}`);
        }
        console.log(`  ${'json'.padEnd(10)} per-file breakdown (HTTP /process only)`);
    });

// Parse arguments and run
program.parseAsync().catch((error: unknown) => {
    console.error('Error:', errorMessage(error));
    process.exit(1);
});
