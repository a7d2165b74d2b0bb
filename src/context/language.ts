/**
 * Language Classifier - maps a path to the tag used on markdown code fences.
 * Unknown files get '' and are still included, just without highlighting.
 */

import { basename, extname } from 'path';

/** Exact filenames checked before the extension table */
const FILENAME_LANGUAGES: Record<string, string> = {
    'Dockerfile': 'dockerfile',
    'Containerfile': 'dockerfile',
    'Makefile': 'makefile',
    'GNUmakefile': 'makefile',
    'makefile': 'makefile',
    'CMakeLists.txt': 'cmake',
    'Jenkinsfile': 'groovy',
    'Gemfile': 'ruby',
    'Rakefile': 'ruby',
    'Vagrantfile': 'ruby',
    '.bashrc': 'bash',
    '.zshrc': 'bash',
    '.profile': 'bash',
    '.gitignore': 'gitignore',
    '.dockerignore': 'gitignore',
};

const EXTENSION_LANGUAGES: Record<string, string> = {
    '.ts': 'typescript', '.mts': 'typescript', '.cts': 'typescript', '.tsx': 'tsx',
    '.js': 'javascript', '.mjs': 'javascript', '.cjs': 'javascript', '.jsx': 'jsx',
    '.py': 'python', '.pyi': 'python',
    '.rs': 'rust',
    '.go': 'go',
    '.java': 'java',
    '.kt': 'kotlin', '.kts': 'kotlin',
    '.scala': 'scala',
    '.rb': 'ruby',
    '.php': 'php',
    '.cs': 'csharp',
    '.cpp': 'cpp', '.cc': 'cpp', '.cxx': 'cpp', '.hpp': 'cpp', '.c': 'c', '.h': 'c',
    '.swift': 'swift',
    '.lua': 'lua',
    '.r': 'r',
    '.sh': 'bash', '.bash': 'bash', '.zsh': 'bash', '.ps1': 'powershell',
    '.sql': 'sql',
    '.html': 'html', '.htm': 'html',
    '.css': 'css', '.scss': 'scss', '.sass': 'sass', '.less': 'less',
    '.json': 'json', '.ipynb': 'json',
    '.yaml': 'yaml', '.yml': 'yaml',
    '.toml': 'toml', '.ini': 'ini',
    '.xml': 'xml',
    '.md': 'markdown', '.markdown': 'markdown',
    '.graphql': 'graphql', '.gql': 'graphql',
    '.dockerfile': 'dockerfile',
    '.tf': 'hcl',
    '.proto': 'protobuf',
    '.vue': 'vue',
    '.svelte': 'svelte',
};

/** Every tag the classifier can produce, used to validate notebook kernel names */
export const KNOWN_LANGUAGES: ReadonlySet<string> = new Set([
    ...Object.values(FILENAME_LANGUAGES),
    ...Object.values(EXTENSION_LANGUAGES),
]);

/**
 * @param overrides extension → tag entries (e.g. from config `languages`),
 *   consulted before the built-in extension table
 */
export function classifyLanguage(path: string, overrides: Readonly<Record<string, string>> = {}): string {
    const name = basename(path.replace(/\\/g, '/'));

    if (Object.hasOwn(FILENAME_LANGUAGES, name)) return FILENAME_LANGUAGES[name];
    if (name.startsWith('Dockerfile.')) return 'dockerfile';

    const ext = extname(name).toLowerCase();
    if (!ext) return '';

    return overrides[ext] ?? EXTENSION_LANGUAGES[ext] ?? '';
}
