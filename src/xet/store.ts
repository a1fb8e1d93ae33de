/**
 * Repository storage: bare git repositories under a storage root,
 * one per `owner/repo`.
 */

import * as fs from 'node:fs';
import { join } from 'node:path';
import git from 'isomorphic-git';
import {
  ATTRIBUTES_MARKER,
  BranchNotFoundError,
  FileExistsError,
  RepositoryNotFoundError,
  type HistoryEntry,
  type RepositoryPath,
} from '../types.js';
import { MODE_BLOB } from './tree.js';
import { withRepoLock, LOCK_FILE } from './lock.js';
import { repositoryName } from './url.js';

/** Identity and storage context every repository handle is scoped to. */
export interface XetSession {
  storageRoot: string;
  user: string;
  email: string;
  host: string;
}

/** Author/committer identity. */
export interface Signature {
  name: string;
  email: string;
}

export interface Repo {
  fs: typeof fs;
  gitdir: string;
  name: string;
}

export interface BranchHead {
  commit: string;
  tree: string;
}

export const DEFAULT_BRANCH = 'main';

/** Contents of the attributes marker written into every new repository. */
export const DEFAULT_ATTRIBUTES = '* filter=xet diff=xet merge=xet -text\n';

export function repoDir(session: XetSession, rp: Pick<RepositoryPath, 'owner' | 'repo'>): string {
  return join(session.storageRoot, rp.owner, `${rp.repo}.git`);
}

export async function repoExists(gitdir: string): Promise<boolean> {
  try {
    await fs.promises.stat(join(gitdir, 'HEAD'));
    return true;
  } catch {
    return false;
  }
}

/**
 * Open an existing repository.
 *
 * @throws {RepositoryNotFoundError} If the repository does not exist.
 */
export async function openRepository(
  session: XetSession,
  rp: Pick<RepositoryPath, 'owner' | 'repo'>,
): Promise<Repo> {
  const gitdir = repoDir(session, rp);
  const name = repositoryName(rp);
  if (!(await repoExists(gitdir))) throw new RepositoryNotFoundError(name);
  return { fs, gitdir, name };
}

function stamp(sig: Signature) {
  const now = Math.floor(Date.now() / 1000);
  return { name: sig.name, email: sig.email, timestamp: now, timezoneOffset: 0 };
}

/**
 * Create a bare repository whose initial commit on `main` holds the
 * attributes marker.
 *
 * @throws {FileExistsError} If the repository already exists.
 */
export async function createRepository(
  session: XetSession,
  rp: Pick<RepositoryPath, 'owner' | 'repo'>,
  sig: Signature,
): Promise<Repo> {
  const gitdir = repoDir(session, rp);
  if (await repoExists(gitdir)) throw new FileExistsError(repositoryName(rp));
  await fs.promises.mkdir(gitdir, { recursive: true });
  await git.init({ fs, gitdir, bare: true, defaultBranch: DEFAULT_BRANCH });

  const blob = new TextEncoder().encode(DEFAULT_ATTRIBUTES);
  const blobOid = await git.writeBlob({ fs, gitdir, blob });
  const tree = await git.writeTree({
    fs,
    gitdir,
    tree: [{ mode: MODE_BLOB, path: ATTRIBUTES_MARKER, oid: blobOid, type: 'blob' }],
  });
  const commit = await git.writeCommit({
    fs,
    gitdir,
    commit: {
      message: `Initialize ${DEFAULT_BRANCH}\n`,
      tree,
      parent: [],
      author: stamp(sig),
      committer: stamp(sig),
    },
  });
  await git.writeRef({ fs, gitdir, ref: `refs/heads/${DEFAULT_BRANCH}`, value: commit, force: true });
  return { fs, gitdir, name: repositoryName(rp) };
}

/**
 * Copy a whole repository directory to a new owner/name.
 *
 * @throws {RepositoryNotFoundError} If the source does not exist.
 * @throws {FileExistsError} If the destination already exists.
 */
export async function copyRepository(
  session: XetSession,
  src: Pick<RepositoryPath, 'owner' | 'repo'>,
  dst: Pick<RepositoryPath, 'owner' | 'repo'>,
): Promise<Repo> {
  const from = await openRepository(session, src);
  const gitdir = repoDir(session, dst);
  if (await repoExists(gitdir)) throw new FileExistsError(repositoryName(dst));
  await withRepoLock(from.gitdir, async () => {
    await fs.promises.cp(from.gitdir, gitdir, {
      recursive: true,
      filter: (source) => !source.endsWith(`/${LOCK_FILE}`),
    });
  });
  return { fs, gitdir, name: repositoryName(dst) };
}

// ---------------------------------------------------------------------------
// Branches
// ---------------------------------------------------------------------------

export async function listBranches(repo: Repo): Promise<string[]> {
  const branches = await git.listBranches({ fs: repo.fs, gitdir: repo.gitdir });
  return branches.sort();
}

export async function hasBranch(repo: Repo, branch: string): Promise<boolean> {
  try {
    await git.resolveRef({ fs: repo.fs, gitdir: repo.gitdir, ref: `refs/heads/${branch}` });
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a branch to its commit and root tree.
 *
 * @throws {BranchNotFoundError} If the branch does not exist.
 */
export async function readBranch(repo: Repo, branch: string): Promise<BranchHead> {
  let commit: string;
  try {
    commit = await git.resolveRef({ fs: repo.fs, gitdir: repo.gitdir, ref: `refs/heads/${branch}` });
  } catch {
    throw new BranchNotFoundError(`Branch '${branch}' not found in ${repo.name}`);
  }
  const { commit: body } = await git.readCommit({ fs: repo.fs, gitdir: repo.gitdir, oid: commit });
  return { commit, tree: body.tree };
}

/** Point a branch at a commit, creating the branch if needed. Callers hold the repo lock. */
export async function pointBranch(repo: Repo, branch: string, commit: string): Promise<void> {
  await git.writeRef({
    fs: repo.fs,
    gitdir: repo.gitdir,
    ref: `refs/heads/${branch}`,
    value: commit,
    force: true,
  });
}

/**
 * Write a commit of `tree` on top of the branch tip (or a root commit if
 * the branch is new) and advance the branch. Callers hold the repo lock.
 */
export async function advanceBranch(
  repo: Repo,
  branch: string,
  tree: string,
  message: string,
  sig: Signature,
): Promise<string> {
  const parent = (await hasBranch(repo, branch)) ? [(await readBranch(repo, branch)).commit] : [];
  const commit = await git.writeCommit({
    fs: repo.fs,
    gitdir: repo.gitdir,
    commit: { message: `${message}\n`, tree, parent, author: stamp(sig), committer: stamp(sig) },
  });
  await pointBranch(repo, branch, commit);
  return commit;
}

/** Commits reachable from a branch tip, newest first. */
export async function branchHistory(repo: Repo, branch: string, depth?: number): Promise<HistoryEntry[]> {
  await readBranch(repo, branch);
  const entries = await git.log({ fs: repo.fs, gitdir: repo.gitdir, ref: `refs/heads/${branch}`, depth });
  return entries.map((e) => ({
    commit: e.oid,
    message: e.commit.message.replace(/\n$/, ''),
    author: `${e.commit.author.name} <${e.commit.author.email}>`,
  }));
}
