// Pipeline
export { bundleSelection, validateBasePath, describeSummary, DEFAULT_EXCLUDES } from './gather.js';
export type { BundleOptions, BundleResult, BundleSummary } from './gather.js';

// Ignore rules
export { compileIgnoreSpec, createIgnoreSpec, parseIgnoreLines } from './ignore-rules.js';
export type { IgnoreSpec } from './ignore-rules.js';

// Resolution
export { resolveSelection, toBaseRelative } from './resolver.js';
export type { ResolveOptions } from './resolver.js';

// Reading
export {
    readFileRecord,
    readFileRecords,
    looksBinary,
    decodeUtf8,
    DEFAULT_CONCURRENCY,
    DEFAULT_MAX_FILE_SIZE,
    DEFAULT_READ_TIMEOUT_MS,
} from './reader.js';
export type { ReadOptions } from './reader.js';
export { mapWithConcurrency } from './pool.js';

// Classification
export { classifyLanguage, KNOWN_LANGUAGES } from './language.js';
export { normalizeNotebook, kernelLanguage, isNotebookPath, DEFAULT_NOTEBOOK_LANGUAGE } from './notebook.js';

// Formatting
export {
    formatDocuments,
    renderDocument,
    renderMarkdown,
    renderText,
    documentStats,
    formatSize,
    addLineNumbers,
    sanitizeLabel,
    fenceFor,
    isOutputFormat,
    COMBINED_LABEL,
    FORMAT_EXTENSIONS,
    OUTPUT_FORMATS,
} from './format.js';
export type { DocumentHeader, DocumentStats, FormatOptions, OutputFormat, OutputMode, RenderOptions } from './format.js';

// Selection
export { SelectionSet } from './selection.js';

// Errors + model
export * from './errors.js';
export { isTextRecord } from './types.js';
export type * from './types.js';
