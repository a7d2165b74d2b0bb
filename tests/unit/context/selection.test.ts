import { describe, it, expect } from 'vitest';
import { SelectionSet } from '../../../src/context/index.js';

describe('SelectionSet', () => {
  it('keeps insertion order and relative paths', () => {
    const selection = new SelectionSet('/work');
    selection.add('src');
    selection.add('README.md');
    selection.add('docs/guide');

    expect(selection.toSelection()).toEqual(['src', 'README.md', 'docs/guide']);
    expect(selection.size).toBe(3);
  });

  it('treats different spellings of one path as the same entry', () => {
    const selection = new SelectionSet('/work');

    expect(selection.add('src')).toBe(true);
    expect(selection.add('./src')).toBe(false);
    expect(selection.add('/work/src/')).toBe(false);
    expect(selection.has('src/../src')).toBe(true);
    expect(selection.size).toBe(1);
  });

  it('toggles membership', () => {
    const selection = new SelectionSet('/work');

    expect(selection.toggle('lib')).toBe(true);
    expect(selection.has('lib')).toBe(true);
    expect(selection.toggle('lib')).toBe(false);
    expect(selection.has('lib')).toBe(false);
  });

  it('maps the base to . and keeps outside paths absolute', () => {
    const selection = new SelectionSet('/work');
    selection.add('/work');
    selection.add('/elsewhere/notes.md');

    expect(selection.toSelection()).toEqual(['.', '/elsewhere/notes.md']);
  });

  it('deletes and clears entries', () => {
    const selection = new SelectionSet('/work');
    selection.add('a');
    selection.add('b');

    expect(selection.delete('./a')).toBe(true);
    expect(selection.delete('a')).toBe(false);
    expect(selection.toSelection()).toEqual(['b']);

    selection.clear();
    expect(selection.size).toBe(0);
    expect(selection.toSelection()).toEqual([]);
  });
});
