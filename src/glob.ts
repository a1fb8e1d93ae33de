/**
 * Glob matching for the final segment of a source path.
 *
 * fnmatch-style matching with dotfile-aware semantics:
 * `*` and `?` do not match a leading `.` unless the pattern itself starts with `.`.
 */

import type { EntryInfo } from './types.js';

const WILDCARD = /[*?]/;

/** True if path contains a wildcard marker. */
export function hasWildcard(path: string): boolean {
  return WILDCARD.test(path);
}

/**
 * Match a single filename against a glob pattern segment.
 *
 * Supports `*`, `?`, `[seq]`, and `[!seq]`. Does not match across `/`.
 */
export function globMatch(pattern: string, name: string): boolean {
  if (!pattern.startsWith('.') && name.startsWith('.')) {
    return false;
  }
  return globToRegex(pattern).test(name);
}

/**
 * Keep the entries whose final segment matches `pattern`, keyed by path.
 */
export function filterEntries(
  entries: Iterable<EntryInfo>,
  pattern: string,
): Map<string, EntryInfo> {
  const out = new Map<string, EntryInfo>();
  for (const entry of entries) {
    const name = entry.name.slice(entry.name.lastIndexOf('/') + 1);
    if (globMatch(pattern, name)) out.set(entry.name, entry);
  }
  return out;
}

function globToRegex(pattern: string): RegExp {
  let result = '^';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*') {
      result += '[^/]*';
    } else if (ch === '?') {
      result += '[^/]';
    } else if (ch === '[') {
      let j = i + 1;
      const negate = pattern[j] === '!';
      if (negate) j++;
      const end = pattern.indexOf(']', j);
      if (end < 0) {
        result += '\\[';
      } else {
        const chars = pattern.slice(j, end).replace(/[\\\]^]/g, '\\$&');
        result += negate ? `[^${chars}]` : `[${chars}]`;
        i = end;
      }
    } else if ('.+^${}()|\\'.includes(ch)) {
      result += '\\' + ch;
    } else {
      result += ch;
    }
    i++;
  }
  return new RegExp(result + '$');
}
