import { describe, it, expect } from 'vitest';
import {
  addLineNumbers,
  documentStats,
  fenceFor,
  formatDocuments,
  formatSize,
  renderMarkdown,
  renderText,
  sanitizeLabel,
} from '../../../src/context/index.js';
import type { Document, FileRecord } from '../../../src/context/index.js';

const RULE = '='.repeat(50);

function text(path: string, language: string, content: string): FileRecord {
  return { path, absolutePath: `/work/${path}`, language, size: content.length, status: 'text', blocks: [{ language, content }] };
}

function skipped(path: string, status: 'binary' | 'unreadable', reason: string): FileRecord {
  return { path, absolutePath: `/work/${path}`, language: '', size: 0, status, reason };
}

function doc(label: string, records: FileRecord[]): Document {
  return { label, records };
}

describe('fenceFor', () => {
  it('uses three backticks by default', () => {
    expect(fenceFor('plain')).toBe('```');
  });

  it('outgrows the longest backtick run in the content', () => {
    expect(fenceFor('before\n```js\ncode\n```\nafter')).toBe('````');
    expect(fenceFor('a ````` b')).toBe('``````');
  });
});

describe('renderMarkdown', () => {
  it('renders a fenced, tagged block per file', () => {
    const output = renderMarkdown(doc('.', [text('src/a.ts', 'typescript', 'const a = 1;')]));
    expect(output).toBe('## src/a.ts\n\n```typescript\nconst a = 1;\n```\n');
  });

  it('separates files with a rule', () => {
    const output = renderMarkdown(doc('.', [text('a.py', 'python', 'a\n'), text('b.py', 'python', 'b\n')]));
    expect(output).toBe('## a.py\n\n```python\na\n```\n\n---\n\n## b.py\n\n```python\nb\n```\n');
  });

  it('renders an empty file as an empty block', () => {
    const record: FileRecord = { path: 'e.txt', absolutePath: '/work/e.txt', language: '', size: 0, status: 'empty', blocks: [{ language: '', content: '' }] };
    expect(renderMarkdown(doc('.', [record]))).toBe('## e.txt\n\n```\n```\n');
  });

  it('renders a skip notice instead of a block', () => {
    expect(renderMarkdown(doc('.', [skipped('img.png', 'binary', 'binary content')])))
      .toBe('## img.png\n\n> Skipped (binary): binary content\n');
  });

  it('keeps embedded fences intact', () => {
    const output = renderMarkdown(doc('.', [text('README.md', 'markdown', '```sh\nls\n```\n')]));
    expect(output).toBe('## README.md\n\n````markdown\n```sh\nls\n```\n````\n');
  });

  it('renders one block per notebook cell', () => {
    const record: FileRecord = {
      path: 'nb.ipynb', absolutePath: '/work/nb.ipynb', language: 'json', size: 10, status: 'text',
      blocks: [{ language: 'markdown', content: '# T' }, { language: 'python', content: 'x' }],
    };
    expect(renderMarkdown(doc('.', [record]))).toBe('## nb.ipynb\n\n```markdown\n# T\n```\n\n```python\nx\n```\n');
  });

  it('renders an empty document as an empty string', () => {
    expect(renderMarkdown(doc('.', []))).toBe('');
  });
});

describe('renderText', () => {
  it('uses ruled headers and strips trailing newlines from bodies', () => {
    const output = renderText(doc('.', [text('a.py', 'python', 'x = 1\n\n'), text('LICENSE', '', 'MIT\n')]));
    expect(output).toBe(`${RULE}\na.py (python)\n${RULE}\nx = 1\n\n${RULE}\nLICENSE\n${RULE}\nMIT\n`);
  });

  it('renders skipped files as a bracketed notice', () => {
    expect(renderText(doc('.', [skipped('data.bin', 'unreadable', 'EACCES')])))
      .toBe(`${RULE}\ndata.bin\n${RULE}\n[skipped: unreadable] EACCES\n`);
  });
});

describe('project header', () => {
  const records = [
    text('a.py', 'python', 'print("a")\n'),
    text('LICENSE', '', 'MIT\n'),
    skipped('img.png', 'binary', 'binary content'),
  ];

  it('renders a markdown title, description and metadata above the files', () => {
    const output = renderMarkdown(doc('.', records), { header: { name: 'demo', description: 'A demo project.' } });

    expect(output).toBe(
      '# demo\n\n' +
      'A demo project.\n\n' +
      '## Project Information\n' +
      '- **Total Files:** 2\n' +
      '- **Total Size:** 15.0 B\n' +
      '- **Total Lines:** 2\n' +
      '- **Languages:**\n' +
      '  - python: 1 file\n' +
      '  - unknown: 1 file\n\n' +
      '## Files Processed: 2\n\n' +
      '## a.py\n\n```python\nprint("a")\n```\n\n---\n\n' +
      '## LICENSE\n\n```\nMIT\n```\n\n---\n\n' +
      '## img.png\n\n> Skipped (binary): binary content\n'
    );
  });

  it('leaves the metadata out when asked', () => {
    const output = renderMarkdown(doc('.', [records[0]]), { header: { name: 'demo', metadata: false } });
    expect(output).toBe('# demo\n\n## Files Processed: 1\n\n## a.py\n\n```python\nprint("a")\n```\n');
  });

  it('renders a plain-text header', () => {
    const output = renderText(doc('.', [records[0]]), { header: { name: 'demo', description: 'A demo.' } });
    expect(output).toBe(
      'PROJECT: DEMO\nDESCRIPTION: A demo.\nFILES: 1\nSIZE: 11.0 B\nLINES: 1\nLANGUAGES: python (1)\n\n' +
      `${RULE}\na.py (python)\n${RULE}\nprint("a")\n`
    );
  });

  it('gives each per-selection output its own counts', () => {
    const outputs = formatDocuments(
      [doc('src', [text('src/a.ts', 'typescript', 'a\n'), text('src/b.ts', 'typescript', 'b\n')]), doc('docs', [text('docs/b.md', 'markdown', 'b\n')])],
      { mode: 'per-selection', header: { name: 'demo', metadata: false } }
    );
    expect(outputs[1].content).toBe('# demo\n\n## Files Processed: 1\n\n## docs/b.md\n\n```markdown\nb\n```\n');
    expect(outputs[0].content.startsWith('# demo\n\n## Files Processed: 2\n\n')).toBe(true);
  });
});

describe('documentStats', () => {
  it('counts only records with content', () => {
    const stats = documentStats(doc('.', [
      text('a.py', 'python', 'a\nb'),
      text('b.py', 'python', 'c\n'),
      text('e.txt', '', ''),
      skipped('img.png', 'binary', 'binary content'),
    ]));

    expect(stats).toEqual({ files: 3, size: 5, lines: 3, languages: [['python', 2], ['unknown', 1]] });
  });
});

describe('formatSize', () => {
  it('picks the largest unit below 1024', () => {
    expect(formatSize(512)).toBe('512.0 B');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(2 * 1024 * 1024)).toBe('2.0 MB');
  });
});

describe('line numbers', () => {
  it('numbers each line and keeps the trailing newline', () => {
    expect(addLineNumbers('a\nb\n')).toBe('1: a\n2: b\n');
    expect(addLineNumbers('')).toBe('');
  });

  it('right-aligns numbers to the widest one', () => {
    const content = Array.from({ length: 10 }, (_, i) => `l${i + 1}`).join('\n');
    const lines = addLineNumbers(content).split('\n');
    expect(lines[0]).toBe(' 1: l1');
    expect(lines[9]).toBe('10: l10');
  });

  it('applies to rendered blocks', () => {
    expect(renderMarkdown(doc('.', [text('a.py', 'python', 'a\nb\n')]), { lineNumbers: true }))
      .toBe('## a.py\n\n```python\n1: a\n2: b\n```\n');
    expect(formatDocuments([doc('.', [text('a.py', 'python', 'a\n')])], { format: 'txt', lineNumbers: true })[0].content)
      .toBe(`${RULE}\na.py (python)\n${RULE}\n1: a\n`);
  });
});

describe('sanitizeLabel', () => {
  it('replaces separators, stars and dots', () => {
    expect(sanitizeLabel('src/*.ts')).toBe('src_stardotts');
    expect(sanitizeLabel('.')).toBe('dot');
    expect(sanitizeLabel('./src')).toBe('dot_src');
  });

  it('replaces other unsafe characters', () => {
    expect(sanitizeLabel('my docs:v2')).toBe('my_docs_v2');
  });

  it('falls back for an empty label', () => {
    expect(sanitizeLabel('')).toBe('selection');
  });

  it('caps the length', () => {
    expect(sanitizeLabel('a'.repeat(300))).toHaveLength(120);
  });
});

describe('formatDocuments', () => {
  const documents = [
    doc('src', [text('src/a.ts', 'typescript', 'a\n')]),
    doc('missing.txt', []),
    doc('docs', [text('docs/b.md', 'markdown', 'b\n')]),
  ];

  it('combines every record into one output by default', () => {
    const outputs = formatDocuments(documents);

    expect(outputs).toHaveLength(1);
    expect(outputs[0].name).toBe('context.md');
    expect(outputs[0].label).toBe('combined');
    expect(outputs[0].fileCount).toBe(2);
    expect(outputs[0].content).toBe('## src/a.ts\n\n```typescript\na\n```\n\n---\n\n## docs/b.md\n\n```markdown\nb\n```\n');
  });

  it('writes one output per non-empty selection', () => {
    const outputs = formatDocuments(documents, { format: 'txt', mode: 'per-selection' });

    expect(outputs.map(output => [output.name, output.label, output.fileCount])).toEqual([
      ['src.txt', 'src', 1],
      ['docs.txt', 'docs', 1],
    ]);
    expect(outputs[0].content).toBe(`${RULE}\nsrc/a.ts (typescript)\n${RULE}\na\n`);
  });

  it('suffixes colliding names', () => {
    const outputs = formatDocuments(
      [doc('a/b', [text('a/b/x.ts', 'typescript', 'x')]), doc('a_b', [text('a_b/y.ts', 'typescript', 'y')])],
      { mode: 'per-selection' }
    );
    expect(outputs.map(output => output.name)).toEqual(['a_b.md', 'a_b-2.md']);
  });

  it('accepts a custom extension with or without the dot', () => {
    expect(formatDocuments(documents, { extension: 'markdown' })[0].name).toBe('context.markdown');
    expect(formatDocuments(documents, { extension: '.txt' })[0].name).toBe('context.txt');
  });

  it('is deterministic for the same documents', () => {
    expect(formatDocuments(documents)[0].content).toBe(formatDocuments(documents)[0].content);
  });
});
