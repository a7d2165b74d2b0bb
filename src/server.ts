/**
 * HTTP transport over node:http.
 *
 * Routing is a pure async function (`handleRequest`) so it can be exercised
 * without a socket; `createServer` only adapts it to IncomingMessage /
 * ServerResponse.
 */

import { createServer as createHttpServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { nanoid } from 'nanoid';
import { bundleSelection, type BundleOptions, type BundleResult } from './context/gather.js';
import { BasePathError, errorMessage } from './context/errors.js';
import { FORMAT_EXTENSIONS, isOutputFormat, type OutputFormat } from './context/format.js';
import type { FileRecord, SkippedFile } from './context/types.js';
import { isTextRecord } from './context/types.js';
import { silentLogger, type Logger } from './logger.js';
import { writeOutputAtomic } from './output/writer.js';

export const SERVICE_NAME = 'context-bundle';
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
const MAX_BODY_BYTES = 1024 * 1024;

type ResponseFormat = OutputFormat | 'json';

export interface ServerOptions {
    host?: string;
    port?: number;
    /** Base directory when a request omits base_path, and the anchor for a relative one (default: cwd) */
    basePath?: string;
    /** Reading and ignore options applied to every request */
    bundle?: Pick<
        BundleOptions,
        'useDefaultExcludes' | 'exclude' | 'concurrency' | 'readTimeoutMs' | 'maxFileSize' | 'languages' | 'maxTotalFiles' | 'lineNumbers' | 'header'
    >;
    /** Format when a request omits output_format (default: markdown) */
    format?: OutputFormat;
    /** Where /process-to-file writes (default: os.tmpdir()) */
    outputDir?: string;
    /** Request log; pipeline calls always run silent */
    logger?: Logger;
}

export interface HttpRequest {
    method: string;
    url: string;
    body: string;
}

export interface HttpResponse {
    status: number;
    body: Record<string, unknown>;
}

export interface ProcessRequest {
    paths: string[];
    basePath?: string;
    exclude: string[];
    /** Unset when the body omits output_format */
    format?: ResponseFormat;
}

export interface FileBreakdown {
    path: string;
    language: string;
    status: FileRecord['status'];
    size: number;
    content?: string;
    reason?: string;
}

class BadRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BadRequestError';
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitPatterns(value: string): string[] {
    return value.split(',').map(p => p.trim()).filter(p => p.length > 0);
}

/**
 * Validate a /process body. `exclude` may be a comma-separated string or an
 * array of patterns.
 */
export function parseProcessRequest(raw: string): ProcessRequest {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new BadRequestError('Request body must be valid JSON');
    }

    if (!isPlainObject(parsed)) {
        throw new BadRequestError('Request body must be a JSON object');
    }

    const { paths, base_path, exclude, output_format } = parsed;

    if (!Array.isArray(paths) || paths.length === 0 || !paths.every((p): p is string => typeof p === 'string')) {
        throw new BadRequestError('"paths" must be a non-empty array of strings');
    }

    if (base_path !== undefined && typeof base_path !== 'string') {
        throw new BadRequestError('"base_path" must be a string');
    }

    let patterns: string[] = [];
    if (typeof exclude === 'string') {
        patterns = splitPatterns(exclude);
    } else if (Array.isArray(exclude) && exclude.every((p): p is string => typeof p === 'string')) {
        patterns = exclude.flatMap(splitPatterns);
    } else if (exclude !== undefined && exclude !== null) {
        throw new BadRequestError('"exclude" must be a string or an array of strings');
    }

    let format: ResponseFormat | undefined;
    if (output_format === 'json' || (typeof output_format === 'string' && isOutputFormat(output_format))) {
        format = output_format;
    } else if (output_format !== undefined) {
        throw new BadRequestError('"output_format" must be one of markdown, txt, json');
    }

    return { paths, basePath: base_path, exclude: patterns, format };
}

export function toFileBreakdown(record: FileRecord): FileBreakdown {
    const entry: FileBreakdown = {
        path: record.path,
        language: record.language,
        status: record.status,
        size: record.size,
    };
    if (isTextRecord(record)) {
        entry.content = record.blocks.map(block => block.content).join('\n\n');
    } else {
        entry.reason = record.reason;
    }
    return entry;
}

function responseFormat(request: ProcessRequest, options: ServerOptions): ResponseFormat {
    return request.format ?? options.format ?? 'markdown';
}

async function runBundle(request: ProcessRequest, options: ServerOptions): Promise<BundleResult> {
    const format = responseFormat(request, options);
    return bundleSelection(request.paths, {
        ...options.bundle,
        basePath: request.basePath === undefined ? options.basePath : resolve(options.basePath ?? '.', request.basePath),
        exclude: [...(options.bundle?.exclude ?? []), ...request.exclude],
        format: format === 'json' ? 'markdown' : format,
        mode: 'combined',
        logger: silentLogger,
    });
}

function counts(result: BundleResult): { file_count: number; files_processed: string[]; skipped: SkippedFile[]; warnings: string[] } {
    return {
        file_count: result.summary.includedFiles.length,
        files_processed: result.summary.includedFiles,
        skipped: result.summary.skipped,
        warnings: result.summary.warnings.map(warning => warning.message),
    };
}

const NO_READABLE_FILES = 'No readable files found in the selection';

async function processRoute(body: string, options: ServerOptions): Promise<HttpResponse> {
    const request = parseProcessRequest(body);
    const result = await runBundle(request, options);

    const payload: Record<string, unknown> = { success: result.ok, ...counts(result) };
    if (responseFormat(request, options) === 'json') {
        payload.files = result.documents.flatMap(doc => doc.records).map(toFileBreakdown);
    } else {
        payload.content = result.outputs[0]?.content ?? '';
    }
    if (!result.ok) payload.error = NO_READABLE_FILES;

    return { status: 200, body: payload };
}

async function processToFileRoute(body: string, options: ServerOptions): Promise<HttpResponse> {
    const request = parseProcessRequest(body);
    const format = responseFormat(request, options);
    if (format === 'json') {
        throw new BadRequestError('"output_format" must be markdown or txt for /process-to-file');
    }

    const result = await runBundle(request, options);
    if (!result.ok) {
        return { status: 200, body: { success: false, ...counts(result), error: NO_READABLE_FILES } };
    }

    const target = join(options.outputDir ?? tmpdir(), `context-bundle-${nanoid(8)}${FORMAT_EXTENSIONS[format]}`);
    const filePath = await writeOutputAtomic(target, result.outputs[0]?.content ?? '');

    return {
        status: 200,
        body: {
            success: true,
            file_path: filePath,
            ...counts(result),
            message: `Wrote ${result.summary.includedFiles.length} file(s) to ${filePath}`,
        },
    };
}

/**
 * Route one request. Never rejects: failures map to a status code and a
 * `{ success: false, error }` body.
 */
export async function handleRequest(request: HttpRequest, options: ServerOptions = {}): Promise<HttpResponse> {
    const path = new URL(request.url, 'http://localhost').pathname;
    const method = request.method.toUpperCase();

    const routes: Record<string, { method: string; run: () => Promise<HttpResponse> | HttpResponse }> = {
        '/': {
            method: 'GET',
            run: () => ({ status: 200, body: { message: `${SERVICE_NAME} is running`, status: 'running' } }),
        },
        '/health': {
            method: 'GET',
            run: () => ({ status: 200, body: { status: 'healthy', service: SERVICE_NAME } }),
        },
        '/process': { method: 'POST', run: () => processRoute(request.body, options) },
        '/process-to-file': { method: 'POST', run: () => processToFileRoute(request.body, options) },
    };

    const route = Object.hasOwn(routes, path) ? routes[path] : undefined;
    if (!route) {
        return { status: 404, body: { success: false, error: `Not found: ${path}` } };
    }
    if (route.method !== method) {
        return { status: 405, body: { success: false, error: `Method ${method} not allowed on ${path}` } };
    }

    try {
        return await route.run();
    } catch (error) {
        if (error instanceof BadRequestError || error instanceof BasePathError) {
            return { status: 400, body: { success: false, error: error.message } };
        }
        return { status: 500, body: { success: false, error: errorMessage(error) } };
    }
}

function readBody(req: IncomingMessage): Promise<string | null> {
    return new Promise((resolveBody, rejectBody) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let tooLarge = false;

        req.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (size > MAX_BODY_BYTES) tooLarge = true;
            else chunks.push(chunk);
        });
        req.on('end', () => resolveBody(tooLarge ? null : Buffer.concat(chunks).toString('utf-8')));
        req.on('error', rejectBody);
    });
}

function sendJson(res: ServerResponse, response: HttpResponse): void {
    const payload = JSON.stringify(response.body);
    res.writeHead(response.status, {
        'Content-Type': 'application/json; charset=utf-8',
        'Content-Length': Buffer.byteLength(payload),
    });
    res.end(payload);
}

export function createServer(options: ServerOptions = {}): Server {
    const logger = options.logger ?? silentLogger;

    return createHttpServer((req, res) => {
        const started = Date.now();
        const method = req.method ?? 'GET';
        const url = req.url ?? '/';

        readBody(req)
            .then(async body => {
                const response = body === null
                    ? { status: 413, body: { success: false, error: `Request body exceeds ${MAX_BODY_BYTES} bytes` } }
                    : await handleRequest({ method, url, body }, options);
                sendJson(res, response);
                logger.info(`${method} ${url} ${response.status} (${Date.now() - started}ms)`);
            })
            .catch((error: unknown) => {
                logger.error(`${method} ${url}: ${errorMessage(error)}`);
                if (!res.headersSent) sendJson(res, { status: 500, body: { success: false, error: errorMessage(error) } });
                else res.end();
            });
    });
}

/** Start listening; resolves once the socket is bound */
export function startServer(options: ServerOptions = {}): Promise<Server> {
    const host = options.host ?? DEFAULT_HOST;
    const port = options.port ?? DEFAULT_PORT;
    const server = createServer(options);

    return new Promise((resolveServer, rejectServer) => {
        server.once('error', rejectServer);
        server.listen(port, host, () => {
            server.off('error', rejectServer);
            options.logger?.info(`${SERVICE_NAME} listening on http://${host}:${port}`);
            resolveServer(server);
        });
    });
}
