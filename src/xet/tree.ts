/**
 * Tree helpers for the repository backend.
 *
 * Path-based lookup, walking, and recursive rebuild on top of
 * isomorphic-git's readTree/writeTree/writeBlob.
 */

import git from 'isomorphic-git';
import { FileNotFoundError, NotADirectoryError } from '../types.js';
import type { Repo } from './store.js';

// ---------------------------------------------------------------------------
// Git file modes
// ---------------------------------------------------------------------------

export const MODE_TREE = '040000';
export const MODE_BLOB = '100644';
export const MODE_COMMIT = '160000';

export type ObjectType = 'blob' | 'tree' | 'commit';

export function typeForMode(mode: string): ObjectType {
  if (mode === MODE_TREE) return 'tree';
  if (mode === MODE_COMMIT) return 'commit';
  return 'blob';
}

/** An object reference staged at a path. */
export interface TreeWrite {
  oid: string;
  mode: string;
}

export interface TreeEntry {
  name: string;
  oid: string;
  mode: string;
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

async function readEntries(repo: Repo, treeOid: string): Promise<TreeEntry[]> {
  const { tree } = await git.readTree({ fs: repo.fs, gitdir: repo.gitdir, oid: treeOid });
  return tree.map((e) => ({ name: e.path, oid: e.oid, mode: e.mode }));
}

/**
 * Return the entry at path, or null if any segment is missing.
 * The empty path names the tree itself.
 */
export async function entryAtPath(
  repo: Repo,
  treeOid: string,
  path: string,
): Promise<TreeWrite | null> {
  if (!path) return { oid: treeOid, mode: MODE_TREE };
  const segments = path.split('/');
  let current: TreeWrite = { oid: treeOid, mode: MODE_TREE };

  for (const segment of segments) {
    if (current.mode !== MODE_TREE) return null;
    const entries = await readEntries(repo, current.oid);
    const entry = entries.find((e) => e.name === segment);
    if (!entry) return null;
    current = { oid: entry.oid, mode: entry.mode };
  }
  return current;
}

/**
 * Like {@link entryAtPath} but throws for a missing path.
 *
 * @throws {FileNotFoundError} If path does not exist.
 */
export async function walkTo(repo: Repo, treeOid: string, path: string): Promise<TreeWrite> {
  const entry = await entryAtPath(repo, treeOid, path);
  if (entry === null) throw new FileNotFoundError(path);
  return entry;
}

/**
 * Immediate children of the tree at path.
 *
 * @throws {FileNotFoundError} If path does not exist.
 * @throws {NotADirectoryError} If path is a file.
 */
export async function listEntriesAtPath(
  repo: Repo,
  treeOid: string,
  path: string,
): Promise<TreeEntry[]> {
  const entry = await walkTo(repo, treeOid, path);
  if (entry.mode !== MODE_TREE) throw new NotADirectoryError(path);
  return readEntries(repo, entry.oid);
}

/**
 * Walk a tree depth-first, yielding every entry below it with its path
 * relative to the tree. A directory is yielded before its contents.
 */
export async function* walkTree(
  repo: Repo,
  treeOid: string,
  prefix = '',
): AsyncGenerator<{ path: string; entry: TreeEntry }> {
  const entries = await readEntries(repo, treeOid);
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name;
    yield { path, entry };
    if (entry.mode === MODE_TREE) {
      yield* walkTree(repo, entry.oid, path);
    }
  }
}

export async function blobSize(repo: Repo, oid: string): Promise<number> {
  const { blob } = await git.readBlob({ fs: repo.fs, gitdir: repo.gitdir, oid });
  return blob.length;
}

/** Every blob hash reachable from a tree. */
export async function collectBlobOids(repo: Repo, treeOid: string): Promise<Set<string>> {
  const oids = new Set<string>();
  for await (const { entry } of walkTree(repo, treeOid)) {
    if (entry.mode !== MODE_TREE) oids.add(entry.oid);
  }
  return oids;
}

// ---------------------------------------------------------------------------
// Cross-repository object import
// ---------------------------------------------------------------------------

/**
 * Copy the object graph rooted at `oid` from one repository into another.
 * Object hashes are content-derived, so the returned hash equals `oid`.
 */
export async function importObject(
  from: Repo,
  to: Repo,
  oid: string,
  mode: string,
): Promise<string> {
  if (mode !== MODE_TREE) {
    const { blob } = await git.readBlob({ fs: from.fs, gitdir: from.gitdir, oid });
    return git.writeBlob({ fs: to.fs, gitdir: to.gitdir, blob });
  }
  const entries = await readEntries(from, oid);
  const tree: Array<{ mode: string; path: string; oid: string; type: ObjectType }> = [];
  for (const e of entries) {
    tree.push({
      mode: e.mode,
      path: e.name,
      oid: await importObject(from, to, e.oid, e.mode),
      type: typeForMode(e.mode),
    });
  }
  return git.writeTree({ fs: to.fs, gitdir: to.gitdir, tree });
}

// ---------------------------------------------------------------------------
// Recursive tree rebuild
// ---------------------------------------------------------------------------

function splitFirst(path: string): [string, string | null] {
  const idx = path.indexOf('/');
  return idx < 0 ? [path, null] : [path.slice(0, idx), path.slice(idx + 1)];
}

/**
 * Rebuild a tree with writes and removes applied.
 *
 * Leaf writes and removes apply first, then changes below each
 * subdirectory. Only the ancestor chain of changed entries is rewritten;
 * sibling subtrees are shared by hash. Directories left empty are pruned.
 */
export async function rebuildTree(
  repo: Repo,
  baseTreeOid: string | null,
  writes: Map<string, TreeWrite>,
  removes: Set<string>,
): Promise<string> {
  const subWrites = new Map<string, Map<string, TreeWrite>>();
  const subRemoves = new Map<string, Set<string>>();
  const entryMap = new Map<string, TreeEntry>();

  if (baseTreeOid) {
    for (const e of await readEntries(repo, baseTreeOid)) entryMap.set(e.name, e);
  }

  for (const [path, write] of writes) {
    const [first, rest] = splitFirst(path);
    if (rest === null) {
      entryMap.set(first, { name: first, oid: write.oid, mode: write.mode });
    } else {
      const sub = subWrites.get(first) ?? new Map<string, TreeWrite>();
      sub.set(rest, write);
      subWrites.set(first, sub);
    }
  }

  for (const path of removes) {
    const [first, rest] = splitFirst(path);
    if (rest === null) {
      entryMap.delete(first);
    } else {
      const sub = subRemoves.get(first) ?? new Set<string>();
      sub.add(rest);
      subRemoves.set(first, sub);
    }
  }

  const subdirs = new Set([...subWrites.keys(), ...subRemoves.keys()]);
  for (const subdir of subdirs) {
    const existing = entryMap.get(subdir);
    const existingOid = existing && existing.mode === MODE_TREE ? existing.oid : null;
    const childWrites = subWrites.get(subdir) ?? new Map<string, TreeWrite>();

    // Removes under a missing directory change nothing
    if (existingOid === null && childWrites.size === 0) continue;

    const newOid = await rebuildTree(
      repo,
      existingOid,
      childWrites,
      subRemoves.get(subdir) ?? new Set<string>(),
    );
    const children = await readEntries(repo, newOid);
    if (children.length === 0) {
      entryMap.delete(subdir);
    } else {
      entryMap.set(subdir, { name: subdir, oid: newOid, mode: MODE_TREE });
    }
  }

  const tree = [...entryMap.values()].map((e) => ({
    mode: e.mode,
    path: e.name,
    oid: e.oid,
    type: typeForMode(e.mode),
  }));
  return git.writeTree({ fs: repo.fs, gitdir: repo.gitdir, tree });
}
