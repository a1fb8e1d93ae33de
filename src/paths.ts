/**
 * Path algebra shared by the walker, the resolver, and the backends.
 *
 * Backend paths always use forward slashes.
 */

import { InvalidGlobError, PathMismatchError } from './types.js';
import { hasWildcard } from './glob.js';

/**
 * Remove `prefix` from the start of `path`.
 *
 * `trimPrefix('a/b/c.txt', 'a/b')` is `'/c.txt'`.
 *
 * @throws {PathMismatchError} If path is shorter than prefix or does not start with it.
 */
export function trimPrefix(path: string, prefix: string): string {
  if (path.length < prefix.length || !path.startsWith(prefix)) {
    throw new PathMismatchError(path, prefix);
  }
  return path.slice(prefix.length);
}

/** Strip trailing slashes from any path except the root `/`. */
export function stripTrailingSlashes(path: string): string {
  if (path === '/') return path;
  return path.replace(/\/+$/, '');
}

/**
 * Join a relative path under root.
 */
export function joinPath(root: string, rel: string): string {
  rel = rel.replace(/^\/+/, '');
  if (root === '/') return `/${rel}`;
  if (!root) return rel;
  if (!rel) return root;
  return `${root}/${rel}`;
}

/** Everything before the final `/`, or `''` when there is none. */
export function parentPath(path: string): string {
  const idx = path.lastIndexOf('/');
  if (idx < 0) return '';
  if (idx === 0) return '/';
  return path.slice(0, idx);
}

/** The text after the final `/`. */
export function finalSegment(path: string): string {
  return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Accept wildcards only in the final path segment.
 *
 * @throws {InvalidGlobError} If an earlier segment holds a wildcard.
 */
export function validateGlob(path: string, source: string = path): void {
  if (hasWildcard(parentPath(path))) {
    throw new InvalidGlobError(
      `Invalid glob ${source}. Wildcards can only appear in the last position`,
    );
  }
}
