/**
 * CLI Config File Support
 *
 * One JSON file controls the bundling defaults:
 * - Selection (basePath, exclude, useDefaultExcludes, maxTotalFiles)
 * - Output (format, output, outputDir, lineNumbers, includeMetadata, project)
 * - Reading (maxFileSize, concurrency, readTimeoutMs, languages)
 * - Service (server.host, server.port)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > env vars > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { basename, resolve, dirname, isAbsolute } from 'path';
import { ConfigError } from './context/errors.js';
import { isOutputFormat, type DocumentHeader, type OutputFormat } from './context/format.js';
import { DEFAULT_CONCURRENCY, DEFAULT_MAX_FILE_SIZE, DEFAULT_READ_TIMEOUT_MS } from './context/reader.js';
import { createConsoleLogger, silentLogger, type Logger } from './logger.js';
import { writeOutputAtomic } from './output/writer.js';

export const DEFAULT_CONFIG_FILE = 'ctxb.config.json';

// ── Nested option types ─────────────────────────────────────────────────────

export interface ServerConfig {
    host?: string;
    port?: number;
}

/** Title block of the rendered document */
export interface ProjectConfig {
    name?: string;
    description?: string;
}

// ── Main config interface ───────────────────────────────────────────────────

export interface CliConfig {
    // Selection
    basePath?: string;
    exclude?: string[];
    useDefaultExcludes?: boolean;
    /** Files past this count are left out and listed as skipped */
    maxTotalFiles?: number;

    // Output
    format?: OutputFormat;
    output?: string;
    outputDir?: string;
    lineNumbers?: boolean;
    /** Totals and language breakdown in the project header */
    includeMetadata?: boolean;
    /** Setting a name or description turns the project header on */
    project?: ProjectConfig;

    // Reading
    maxFileSize?: number;
    concurrency?: number;
    readTimeoutMs?: number;
    /** Extension → language tag overrides, e.g. { ".mdx": "markdown" } */
    languages?: Record<string, string>;

    // Service
    server?: ServerConfig;

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'basePath', 'exclude', 'useDefaultExcludes', 'maxTotalFiles',
    'format', 'output', 'outputDir', 'lineNumbers', 'includeMetadata', 'project',
    'maxFileSize', 'concurrency', 'readTimeoutMs', 'languages',
    'server',
    'verbose',
]);

const SERVER_KEYS = new Set<string>(['host', 'port']);
const PROJECT_KEYS = new Set<string>(['name', 'description']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigError(`Config "${key}" must be a boolean`);
    return val;
}

function assertPositiveInt(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number' || !Number.isInteger(val) || val <= 0) {
        throw new ConfigError(`Config "${key}" must be a positive integer`);
    }
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val) || !val.every((v): v is string => typeof v === 'string')) {
        throw new ConfigError(`Config "${key}" must be an array of strings`);
    }
    return val;
}

function parseFormat(obj: Record<string, unknown>, key: string): OutputFormat {
    const val = assertString(obj, key);
    if (!isOutputFormat(val)) throw new ConfigError(`Config "${key}" must be "markdown" or "txt"`);
    return val;
}

function parseLanguages(obj: unknown): Record<string, string> {
    if (!isPlainObject(obj)) {
        throw new ConfigError('Config "languages" must be an object');
    }

    const result: Record<string, string> = {};
    for (const [ext, tag] of Object.entries(obj)) {
        if (typeof tag !== 'string') {
            throw new ConfigError(`Config "languages.${ext}" must be a string`);
        }
        const key = (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase();
        result[key] = tag;
    }
    return result;
}

function parseServerConfig(obj: unknown, logger: Logger): ServerConfig {
    if (!isPlainObject(obj)) {
        throw new ConfigError('Config "server" must be an object');
    }

    const unknowns = Object.keys(obj).filter(k => !SERVER_KEYS.has(k));
    if (unknowns.length > 0) {
        logger.warn(`Unknown server keys ignored: ${unknowns.join(', ')}`);
    }

    const result: ServerConfig = {};
    if (obj.host !== undefined) result.host = assertString(obj, 'host');
    if (obj.port !== undefined) {
        const port = assertPositiveInt(obj, 'port');
        if (port > 65535) throw new ConfigError('Config "port" must be at most 65535');
        result.port = port;
    }
    return result;
}

function parseProjectConfig(obj: unknown, logger: Logger): ProjectConfig {
    if (!isPlainObject(obj)) {
        throw new ConfigError('Config "project" must be an object');
    }

    const unknowns = Object.keys(obj).filter(k => !PROJECT_KEYS.has(k));
    if (unknowns.length > 0) {
        logger.warn(`Unknown project keys ignored: ${unknowns.join(', ')}`);
    }

    const result: ProjectConfig = {};
    if (obj.name !== undefined) result.name = assertString(obj, 'name');
    if (obj.description !== undefined) result.description = assertString(obj, 'description');
    return result;
}

// ── Main loader ─────────────────────────────────────────────────────────────

function readConfigObject(absolutePath: string): Record<string, unknown> {
    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new ConfigError(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ConfigError(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
    }
    return parsed;
}

/**
 * Validate a parsed config object. Relative basePath / output / outputDir
 * resolve from `configDir`.
 */
export function parseConfig(obj: Record<string, unknown>, configDir: string, logger: Logger = silentLogger): CliConfig {
    // Warn about unknown keys
    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        logger.warn(`Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const fromConfigDir = (p: string) => isAbsolute(p) ? p : resolve(configDir, p);

    // Selection
    if (obj.basePath !== undefined) config.basePath = fromConfigDir(assertString(obj, 'basePath'));
    if (obj.exclude !== undefined) config.exclude = assertStringArray(obj, 'exclude');
    if (obj.useDefaultExcludes !== undefined) config.useDefaultExcludes = assertBoolean(obj, 'useDefaultExcludes');
    if (obj.maxTotalFiles !== undefined) config.maxTotalFiles = assertPositiveInt(obj, 'maxTotalFiles');

    // Output
    if (obj.format !== undefined) config.format = parseFormat(obj, 'format');
    if (obj.output !== undefined) config.output = fromConfigDir(assertString(obj, 'output'));
    if (obj.outputDir !== undefined) config.outputDir = fromConfigDir(assertString(obj, 'outputDir'));
    if (obj.lineNumbers !== undefined) config.lineNumbers = assertBoolean(obj, 'lineNumbers');
    if (obj.includeMetadata !== undefined) config.includeMetadata = assertBoolean(obj, 'includeMetadata');
    if (obj.project !== undefined) config.project = parseProjectConfig(obj.project, logger);

    // Reading
    if (obj.maxFileSize !== undefined) config.maxFileSize = assertPositiveInt(obj, 'maxFileSize');
    if (obj.concurrency !== undefined) config.concurrency = assertPositiveInt(obj, 'concurrency');
    if (obj.readTimeoutMs !== undefined) config.readTimeoutMs = assertPositiveInt(obj, 'readTimeoutMs');
    if (obj.languages !== undefined) config.languages = parseLanguages(obj.languages);

    // Service
    if (obj.server !== undefined) config.server = parseServerConfig(obj.server, logger);

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - Relative basePath / output / outputDir resolve from the config file's directory
 * - Throws ConfigError on missing file or invalid JSON
 */
export function loadConfig(configPath: string, logger: Logger = createConsoleLogger()): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`Config file not found: ${absolutePath}`);
    }

    return parseConfig(readConfigObject(absolutePath), dirname(absolutePath), logger);
}

// ── Environment ─────────────────────────────────────────────────────────────

const ENV_PREFIX = 'CTXB_';

function envPositiveInt(env: NodeJS.ProcessEnv, name: string, logger: Logger): number | undefined {
    const raw = env[`${ENV_PREFIX}${name}`]?.trim();
    if (!raw) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        logger.warn(`Invalid environment variable ${ENV_PREFIX}${name}=${raw} (expected a positive integer)`);
        return undefined;
    }
    return value;
}

/**
 * Config values from CTXB_* environment variables:
 * CTXB_MAX_FILE_SIZE, CTXB_MAX_TOTAL_FILES, CTXB_CONCURRENCY,
 * CTXB_READ_TIMEOUT_MS, CTXB_OUTPUT_FORMAT.
 * Invalid values are warned about and ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env, logger: Logger = createConsoleLogger()): CliConfig {
    const config: CliConfig = {};

    const maxFileSize = envPositiveInt(env, 'MAX_FILE_SIZE', logger);
    if (maxFileSize !== undefined) config.maxFileSize = maxFileSize;

    const maxTotalFiles = envPositiveInt(env, 'MAX_TOTAL_FILES', logger);
    if (maxTotalFiles !== undefined) config.maxTotalFiles = maxTotalFiles;

    const concurrency = envPositiveInt(env, 'CONCURRENCY', logger);
    if (concurrency !== undefined) config.concurrency = concurrency;

    const readTimeoutMs = envPositiveInt(env, 'READ_TIMEOUT_MS', logger);
    if (readTimeoutMs !== undefined) config.readTimeoutMs = readTimeoutMs;

    const format = env[`${ENV_PREFIX}OUTPUT_FORMAT`]?.trim();
    if (format) {
        if (isOutputFormat(format)) config.format = format;
        else logger.warn(`Invalid environment variable ${ENV_PREFIX}OUTPUT_FORMAT=${format} (expected markdown or txt)`);
    }

    return config;
}

/** Shallow merge, later layers win; `server` and `project` are merged key by key */
export function mergeConfigs(...layers: CliConfig[]): CliConfig {
    const merged: CliConfig = {};
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value === undefined || key === 'server' || key === 'project') continue;
            Object.assign(merged, { [key]: value });
        }
        if (layer.server) merged.server = { ...merged.server, ...layer.server };
        if (layer.project) merged.project = { ...merged.project, ...layer.project };
    }
    return merged;
}

/**
 * The project header for a run, or undefined when none is wanted.
 * A configured name or description turns it on; `force` (the --header flag)
 * does too, with the base directory's name as the title.
 */
export function documentHeader(config: CliConfig, basePath: string, force = false): DocumentHeader | undefined {
    const name = config.project?.name;
    const description = config.project?.description;
    if (!force && !name && !description) return undefined;

    return {
        name: name || basename(resolve(basePath)),
        description: description || undefined,
        metadata: config.includeMetadata ?? true,
    };
}

// ── Defaults ────────────────────────────────────────────────────────────────

/** What applies when neither flags, file nor environment set a value */
export const CONFIG_DEFAULTS: CliConfig = {
    useDefaultExcludes: true,
    format: 'markdown',
    lineNumbers: false,
    includeMetadata: true,
    maxFileSize: DEFAULT_MAX_FILE_SIZE,
    concurrency: DEFAULT_CONCURRENCY,
    readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
    server: {
        host: '127.0.0.1',
        port: 8000,
    },
    verbose: false,
};

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 * Shows every available option with sensible defaults.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    // Selection
    basePath: '.',
    exclude: ['dist/', 'coverage/', '*.lock'],
    useDefaultExcludes: true,
    maxTotalFiles: 1000,

    // Output
    format: 'markdown',
    lineNumbers: false,
    includeMetadata: true,
    project: {
        name: '',
        description: '',
    },

    // Reading
    maxFileSize: 10 * 1024 * 1024,
    concurrency: 8,
    readTimeoutMs: 10_000,
    languages: {},

    // Service
    server: {
        host: '127.0.0.1',
        port: 8000,
    },

    // Misc
    verbose: false,
};

/** Write CONFIG_TEMPLATE to a new file; an existing file is never replaced */
export async function initConfigFile(configPath: string = DEFAULT_CONFIG_FILE): Promise<string> {
    const absolutePath = resolve(configPath);
    if (existsSync(absolutePath)) {
        throw new ConfigError(`File already exists: ${absolutePath}`);
    }
    return writeOutputAtomic(absolutePath, `${JSON.stringify(CONFIG_TEMPLATE, null, 2)}\n`);
}

// ── config get / set ────────────────────────────────────────────────────────

type ValueKind = 'string' | 'boolean' | 'integer' | 'list';

/** Keys `config set` accepts, dotted for nested sections; `languages.<ext>` is also accepted */
const SETTABLE_KEYS: Record<string, ValueKind> = {
    basePath: 'string',
    exclude: 'list',
    useDefaultExcludes: 'boolean',
    maxTotalFiles: 'integer',
    format: 'string',
    output: 'string',
    outputDir: 'string',
    lineNumbers: 'boolean',
    includeMetadata: 'boolean',
    'project.name': 'string',
    'project.description': 'string',
    maxFileSize: 'integer',
    concurrency: 'integer',
    readTimeoutMs: 'integer',
    'server.host': 'string',
    'server.port': 'integer',
    verbose: 'boolean',
};

function convertValue(key: string, kind: ValueKind, value: string): string | boolean | number | string[] {
    switch (kind) {
        case 'boolean': {
            const lowered = value.trim().toLowerCase();
            if (['true', '1', 'yes', 'on'].includes(lowered)) return true;
            if (['false', '0', 'no', 'off'].includes(lowered)) return false;
            throw new ConfigError(`Config "${key}" must be a boolean (true/false)`);
        }
        case 'integer': {
            const parsed = Number(value.trim());
            if (!Number.isInteger(parsed) || parsed <= 0) {
                throw new ConfigError(`Config "${key}" must be a positive integer`);
            }
            return parsed;
        }
        case 'list':
            return value.split(',').map(item => item.trim()).filter(item => item !== '');
        case 'string':
            return value;
    }
}

/** Read a dotted key from a config: `format`, `server.port`, `languages.mdx` */
export function getConfigValue(config: CliConfig, key: string): unknown {
    const [section, ...rest] = key.split('.');
    const root: unknown = config;
    const value = isPlainObject(root) && Object.hasOwn(root, section) ? root[section] : undefined;
    if (rest.length === 0) return value;

    let field = rest.join('.');
    if (section === 'languages') field = (field.startsWith('.') ? field : `.${field}`).toLowerCase();
    return isPlainObject(value) && Object.hasOwn(value, field) ? value[field] : undefined;
}

/**
 * Return a copy of a raw config object with `key` set from its string form.
 * The converted value is returned alongside for reporting.
 */
export function setConfigValue(
    raw: Record<string, unknown>,
    key: string,
    value: string
): { config: Record<string, unknown>; value: unknown } {
    const [section, ...rest] = key.split('.');
    const field = rest.join('.');

    const kind: ValueKind | undefined = section === 'languages' && field !== ''
        ? 'string'
        : Object.hasOwn(SETTABLE_KEYS, key) ? SETTABLE_KEYS[key] : undefined;
    if (kind === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`);
    }
    const converted = convertValue(key, kind, value);

    if (field === '') {
        return { config: { ...raw, [section]: converted }, value: converted };
    }
    const existing = raw[section];
    const nested = isPlainObject(existing) ? { ...existing, [field]: converted } : { [field]: converted };
    return { config: { ...raw, [section]: nested }, value: converted };
}

/**
 * `config set`: update one key in a config file, creating the file when it
 * is missing. The result is validated before it is written.
 */
export async function updateConfigFile(configPath: string, key: string, value: string): Promise<unknown> {
    const absolutePath = resolve(configPath);
    const raw = existsSync(absolutePath) ? readConfigObject(absolutePath) : {};

    const updated = setConfigValue(raw, key, value);
    parseConfig(updated.config, dirname(absolutePath));
    await writeOutputAtomic(absolutePath, `${JSON.stringify(updated.config, null, 2)}\n`);
    return updated.value;
}
