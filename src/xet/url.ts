/**
 * Path grammar of the repository backend: `owner/repo/branch/in/branch/path`.
 */

import { InvalidUriError, type RepositoryPath } from '../types.js';

/**
 * Split a backend path into owner, repository, branch and in-branch path.
 *
 * Leading and trailing slashes are ignored. Branch names cannot contain `/`.
 *
 * @throws {InvalidUriError} If owner or repository is missing, or a segment
 *   is `.` or `..`.
 */
export function parseRepositoryPath(path: string): RepositoryPath {
  const trimmed = path.replace(/^\/+|\/+$/g, '');
  const segments = trimmed ? trimmed.split('/') : [];
  if (segments.length < 2 || segments.slice(0, 2).some((s) => !s)) {
    throw new InvalidUriError(`Invalid repository path '${path}': expected owner/repo[/branch[/path]]`);
  }
  const [owner, repo, branch = '', ...rest] = segments;
  for (const seg of [owner, repo, branch, ...rest]) {
    if (seg === '.' || seg === '..') {
      throw new InvalidUriError(`Invalid path segment '${seg}' in '${path}'`);
    }
  }
  for (const seg of rest) {
    if (!seg) {
      throw new InvalidUriError(`Invalid path segment '${seg}' in '${path}'`);
    }
  }
  return { owner, repo, branch, path: rest.join('/') };
}

/** `owner/repo`, the key used for locks and messages. */
export function repositoryName(rp: Pick<RepositoryPath, 'owner' | 'repo'>): string {
  return `${rp.owner}/${rp.repo}`;
}
