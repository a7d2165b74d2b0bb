import { describe, it, expect } from 'vitest';
import { classifyLanguage, KNOWN_LANGUAGES } from '../../../src/context/index.js';

describe('classifyLanguage', () => {
  it('maps common extensions', () => {
    expect(classifyLanguage('src/index.ts')).toBe('typescript');
    expect(classifyLanguage('app/view.tsx')).toBe('tsx');
    expect(classifyLanguage('main.py')).toBe('python');
    expect(classifyLanguage('README.md')).toBe('markdown');
    expect(classifyLanguage('deploy.sh')).toBe('bash');
  });

  it('ignores extension case', () => {
    expect(classifyLanguage('LEGACY.PY')).toBe('python');
  });

  it('checks exact filenames before extensions', () => {
    expect(classifyLanguage('Dockerfile')).toBe('dockerfile');
    expect(classifyLanguage('build/Makefile')).toBe('makefile');
    expect(classifyLanguage('CMakeLists.txt')).toBe('cmake');
    expect(classifyLanguage('.gitignore')).toBe('gitignore');
  });

  it('tags Dockerfile variants', () => {
    expect(classifyLanguage('Dockerfile.dev')).toBe('dockerfile');
  });

  it('returns an empty tag for unknown files', () => {
    expect(classifyLanguage('server.log')).toBe('');
    expect(classifyLanguage('LICENSE')).toBe('');
  });

  it('does not treat prototype keys as filenames', () => {
    expect(classifyLanguage('constructor')).toBe('');
    expect(classifyLanguage('toString')).toBe('');
  });

  it('lets overrides win over the built-in table', () => {
    expect(classifyLanguage('notes.mdx', { '.mdx': 'markdown' })).toBe('markdown');
    expect(classifyLanguage('types.ts', { '.ts': 'ts' })).toBe('ts');
  });

  it('handles Windows separators', () => {
    expect(classifyLanguage('src\\lib\\util.go')).toBe('go');
  });
});

describe('KNOWN_LANGUAGES', () => {
  it('contains every tag the classifier produces', () => {
    expect(KNOWN_LANGUAGES.has('python')).toBe(true);
    expect(KNOWN_LANGUAGES.has('dockerfile')).toBe(true);
    expect(KNOWN_LANGUAGES.has('text')).toBe(false);
  });
});
