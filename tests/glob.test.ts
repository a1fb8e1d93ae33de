import { describe, it, expect } from 'vitest';
import { globMatch, hasWildcard, type EntryInfo } from '../src/index.js';
import { filterEntries } from '../src/glob.js';

describe('globMatch', () => {
  it('star matches within a segment', () => {
    expect(globMatch('*.txt', 'readme.txt')).toBe(true);
    expect(globMatch('*.txt', 'setup.py')).toBe(false);
  });

  it('star excludes dotfiles', () => {
    expect(globMatch('*', '.hidden')).toBe(false);
    expect(globMatch('.*', '.hidden')).toBe(true);
  });

  it('question mark matches one character', () => {
    expect(globMatch('?.md', 'a.md')).toBe(true);
    expect(globMatch('?.md', 'ab.md')).toBe(false);
  });

  it('character classes', () => {
    expect(globMatch('[ab].txt', 'a.txt')).toBe(true);
    expect(globMatch('[ab].txt', 'c.txt')).toBe(false);
    expect(globMatch('[!ab].txt', 'c.txt')).toBe(true);
  });

  it('escapes regex metacharacters', () => {
    expect(globMatch('a+b.txt', 'a+b.txt')).toBe(true);
    expect(globMatch('a.txt', 'abtxt')).toBe(false);
  });
});

describe('hasWildcard', () => {
  it('detects star and question mark', () => {
    expect(hasWildcard('a/*.txt')).toBe(true);
    expect(hasWildcard('a/?')).toBe(true);
    expect(hasWildcard('a/b.txt')).toBe(false);
  });
});

describe('filterEntries', () => {
  it('matches on the final segment and keys by path', () => {
    const entries: EntryInfo[] = [
      { name: 'dir/x.txt', type: 'file', size: 1 },
      { name: 'dir/y.csv', type: 'file', size: 2 },
      { name: 'dir/sub', type: 'directory', size: 0 },
    ];
    const result = filterEntries(entries, '*.txt');
    expect([...result.keys()]).toEqual(['dir/x.txt']);
    expect(result.get('dir/x.txt')?.size).toBe(1);
  });
});
