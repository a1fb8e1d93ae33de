/**
 * Pre-flight checks run once before any transfer.
 */

import { hasWildcard } from './glob.js';
import { isTransactional, type Backend } from './types.js';

/**
 * Confirm that repository branches named by a copy exist.
 *
 * The destination branch may be missing when both sides name branch
 * roots: that copy creates it. A wildcard in the source branch segment
 * only needs the repository to exist; the glob picks the branches.
 *
 * @throws {BranchNotFoundError} If a required branch does not exist.
 * @throws {RepositoryNotFoundError} If a named repository does not exist.
 */
export async function validateCopy(
  src: Backend,
  srcPath: string,
  dst: Backend,
  dstPath: string,
): Promise<void> {
  if (isTransactional(src)) {
    const rp = src.parsePath(srcPath);
    if (hasWildcard(rp.branch)) await src.info(`${rp.owner}/${rp.repo}`);
    else await src.branchInfo(srcPath);
  }
  if (!isTransactional(dst)) return;

  if (isTransactional(src) && src.protocol === dst.protocol) {
    const from = src.parsePath(srcPath);
    const to = dst.parsePath(dstPath);
    if (from.path === '' && to.path === '') return;
  }
  await dst.branchInfo(dstPath);
}
