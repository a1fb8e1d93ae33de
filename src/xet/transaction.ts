/**
 * Staged mutations for the repository backend.
 *
 * A Transaction collects writes and removes per (repository, branch) and
 * turns each touched branch into a single commit carrying the
 * transaction message.
 */

import { rebuildTree, type TreeWrite } from './tree.js';
import { advanceBranch, hasBranch, pointBranch, readBranch, type Repo, type Signature } from './store.js';
import { withRepoLock } from './lock.js';

/**
 * Replace a branch's content before staged writes apply: point it at an
 * existing commit of the same repository, or commit a tree already
 * imported into it.
 */
export type BranchReset = { kind: 'commit'; oid: string } | { kind: 'tree'; oid: string };

export interface BranchChanges {
  repo: Repo;
  branch: string;
  reset?: BranchReset;
  writes: Map<string, TreeWrite>;
  removes: Set<string>;
}

export class Transaction {
  readonly message: string;
  private readonly _changes = new Map<string, BranchChanges>();

  constructor(message: string) {
    this.message = message;
  }

  /** The change set for one branch, created on first use. */
  changesFor(repo: Repo, branch: string): BranchChanges {
    const key = `${repo.gitdir}\0${branch}`;
    let changes = this._changes.get(key);
    if (!changes) {
      changes = { repo, branch, writes: new Map(), removes: new Set() };
      this._changes.set(key, changes);
    }
    return changes;
  }

  get branches(): BranchChanges[] {
    return [...this._changes.values()];
  }

  get empty(): boolean {
    return this.branches.every((c) => c.reset === undefined && c.writes.size === 0 && c.removes.size === 0);
  }

  stageWrite(repo: Repo, branch: string, path: string, write: TreeWrite): void {
    const changes = this.changesFor(repo, branch);
    changes.removes.delete(path);
    changes.writes.set(path, write);
  }

  /** Stage a removal. Pending writes at or below `path` are dropped. */
  stageRemove(repo: Repo, branch: string, path: string): void {
    const changes = this.changesFor(repo, branch);
    for (const key of [...changes.writes.keys()]) {
      if (key === path || key.startsWith(`${path}/`)) changes.writes.delete(key);
    }
    changes.removes.add(path);
  }

  /** Stage a whole-branch replacement. Earlier staged changes to the branch are dropped. */
  stageBranch(repo: Repo, branch: string, reset: BranchReset): void {
    const changes = this.changesFor(repo, branch);
    changes.writes.clear();
    changes.removes.clear();
    changes.reset = reset;
  }
}

/**
 * Apply one branch's change set on top of its current tip.
 *
 * The tip is re-read under the repository lock so that concurrent
 * committers never lose each other's updates. A staged reset is applied
 * first and the writes land on top of it. Returns the branch's new
 * commit, or null when nothing changed.
 */
export async function commitChanges(
  changes: BranchChanges,
  message: string,
  sig: Signature,
): Promise<string | null> {
  const { repo, branch, reset, writes, removes } = changes;
  if (!reset && writes.size === 0 && removes.size === 0) return null;

  return withRepoLock(repo.gitdir, async () => {
    if (reset?.kind === 'commit') await pointBranch(repo, branch, reset.oid);
    const tipTree = (await hasBranch(repo, branch)) ? (await readBranch(repo, branch)).tree : null;
    const baseTree = reset?.kind === 'tree' ? reset.oid : tipTree;
    const tree = await rebuildTree(repo, baseTree, writes, removes);
    if (tree === tipTree) return reset?.kind === 'commit' ? reset.oid : null;
    return advanceBranch(repo, branch, tree, message, sig);
  });
}
