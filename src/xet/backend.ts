/**
 * Content-addressed repository backend.
 *
 * Paths take the form `owner/repo/branch/in/branch/path`. Repositories are
 * bare git repositories under the session's storage root. Objects are
 * addressed by hash, so copies inside the backend stage references
 * instead of moving data.
 *
 * Without an active transaction every mutation commits immediately under
 * an automatic message. Inside one, mutations are staged per branch and
 * committed by `endTransaction()` with the transaction's message.
 */

import git from 'isomorphic-git';
import {
  BranchNotFoundError,
  FileNotFoundError,
  InvalidGlobError,
  IsADirectoryError,
  NotADirectoryError,
  TransactionError,
  UnsupportedOperationError,
  isErrno,
  type AttributeValue,
  type BackendCapabilities,
  type BranchInfo,
  type EntryInfo,
  type HistoryEntry,
  type OpenMode,
  type OpenOptions,
  type ReadHandle,
  type RepositoryPath,
  type TransactionalBackend,
  type WriteHandle,
} from '../types.js';
import { finalSegment, joinPath, parentPath, stripTrailingSlashes, validateGlob } from '../paths.js';
import { filterEntries, globMatch, hasWildcard } from '../glob.js';
import { BufferReader, BufferWriter } from '../bytes.js';
import { NullLogger, type Logger } from '../logger.js';
import { parseRepositoryPath } from './url.js';
import {
  blobSize,
  collectBlobOids,
  entryAtPath,
  importObject,
  listEntriesAtPath,
  walkTree,
  MODE_BLOB,
  MODE_TREE,
  type TreeWrite,
} from './tree.js';
import {
  branchHistory,
  copyRepository,
  createRepository,
  hasBranch,
  listBranches,
  openRepository,
  readBranch,
  type BranchHead,
  type Repo,
  type Signature,
  type XetSession,
} from './store.js';
import { Transaction, commitChanges, type BranchReset } from './transaction.js';

/** Prefix of the git config section holding repository attributes. */
const ATTRIBUTE_SECTION = 'crossfs';

interface Located {
  rp: RepositoryPath;
  repo: Repo;
}

interface Resolved extends Located {
  head: BranchHead;
  entry: TreeWrite | null;
}

export class XetBackend implements TransactionalBackend {
  static readonly protocols = ['xet'] as const;

  protocol: string = 'xet';
  readonly capabilities: BackendCapabilities = { transactions: true };

  private readonly _session: XetSession;
  private readonly _logger: Logger;
  private _txn: Transaction | null = null;
  // Object hashes already present on a branch, keyed by gitdir and branch
  private readonly _manifests = new Map<string, Set<string>>();

  constructor(session: XetSession, opts: { logger?: Logger } = {}) {
    this._session = session;
    this._logger = (opts.logger ?? new NullLogger()).child('xet');
  }

  toString(): string {
    return `XetBackend('${this._session.storageRoot}')`;
  }

  get inTransaction(): boolean {
    return this._txn !== null;
  }

  currentUser(): string {
    return this._session.user;
  }

  domain(): string {
    return `https://${this._session.host}`;
  }

  parsePath(path: string): RepositoryPath {
    return parseRepositoryPath(path);
  }

  private get _signature(): Signature {
    return { name: this._session.user, email: this._session.email };
  }

  private async _locate(path: string): Promise<Located> {
    const rp = parseRepositoryPath(path);
    const repo = await openRepository(this._session, rp);
    return { rp, repo };
  }

  /** Locate a path inside an existing branch. */
  private async _resolve(path: string): Promise<Resolved> {
    const { rp, repo } = await this._locate(path);
    if (!rp.branch) throw new IsADirectoryError(path);
    const head = await readBranch(repo, rp.branch);
    const entry = await entryAtPath(repo, head.tree, rp.path);
    return { rp, repo, head, entry };
  }

  // -------------------------------------------------------------------------
  // Transactions
  // -------------------------------------------------------------------------

  beginTransaction(message: string): void {
    if (this._txn) {
      throw new TransactionError(`A transaction is already active: ${this._txn.message}`);
    }
    this._txn = new Transaction(message);
  }

  async endTransaction(): Promise<void> {
    const txn = this._txn;
    if (!txn) throw new TransactionError('No active transaction');
    try {
      for (const changes of txn.branches) {
        const commit = await commitChanges(changes, txn.message, this._signature);
        if (commit) {
          this._logger.debug(`committed ${changes.repo.name}/${changes.branch}`, { commit });
        }
      }
    } finally {
      this._txn = null;
    }
  }

  abortTransaction(): void {
    if (this._txn && !this._txn.empty) {
      this._logger.debug(`discarding staged changes: ${this._txn.message}`);
    }
    this._txn = null;
  }

  /**
   * Stage a mutation in the active transaction, or commit it at once
   * under `message` when there is none.
   */
  private async _mutate(message: string, stage: (txn: Transaction) => void): Promise<void> {
    if (this._txn) {
      stage(this._txn);
      return;
    }
    const txn = new Transaction(message);
    stage(txn);
    for (const changes of txn.branches) {
      await commitChanges(changes, txn.message, this._signature);
    }
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async info(path: string): Promise<EntryInfo> {
    const { rp, repo } = await this._locate(path);
    if (!rp.branch) return { name: path, type: 'directory', size: 0 };
    const head = await readBranch(repo, rp.branch);
    const entry = await entryAtPath(repo, head.tree, rp.path);
    if (entry === null) throw new FileNotFoundError(path);
    if (entry.mode === MODE_TREE) return { name: path, type: 'directory', size: 0, oid: entry.oid };
    return { name: path, type: 'file', size: await blobSize(repo, entry.oid), oid: entry.oid };
  }

  /** True for directories inside a branch. Branch roots answer false. */
  async isDirectory(path: string): Promise<boolean> {
    const rp = parseRepositoryPath(path);
    if (!rp.branch || !rp.path) return false;
    try {
      const { entry } = await this._resolve(path);
      return entry !== null && entry.mode === MODE_TREE;
    } catch {
      return false;
    }
  }

  async isDirectoryOrBranch(path: string): Promise<boolean> {
    const rp = parseRepositoryPath(path);
    if (rp.branch && !rp.path) {
      try {
        const { repo } = await this._locate(path);
        return await hasBranch(repo, rp.branch);
      } catch {
        return false;
      }
    }
    return this.isDirectory(path);
  }

  /**
   * @throws {BranchNotFoundError} If the path names no existing branch.
   */
  async branchInfo(path: string): Promise<BranchInfo> {
    const { rp, repo } = await this._locate(path);
    if (!rp.branch) throw new BranchNotFoundError(`No branch given in '${path}'`);
    const head = await readBranch(repo, rp.branch);
    return { owner: rp.owner, repo: rp.repo, branch: rp.branch, commit: head.commit };
  }

  /** Commits on the branch named by `path`, newest first. */
  async history(path: string, depth?: number): Promise<HistoryEntry[]> {
    const { rp, repo } = await this._locate(path);
    if (!rp.branch) throw new BranchNotFoundError(`No branch given in '${path}'`);
    return branchHistory(repo, rp.branch, depth);
  }

  async enumerate(path: string): Promise<Map<string, EntryInfo>> {
    const { repo, head, entry } = await this._resolve(path);
    if (entry === null) throw new FileNotFoundError(path);
    const result = new Map<string, EntryInfo>();
    if (entry.mode !== MODE_TREE) {
      result.set(path, { name: path, type: 'file', size: await blobSize(repo, entry.oid), oid: entry.oid });
      return result;
    }
    const base = stripTrailingSlashes(path);
    for await (const { path: rel, entry: child } of walkTree(repo, entry.oid)) {
      const name = joinPath(base, rel);
      result.set(
        name,
        child.mode === MODE_TREE
          ? { name, type: 'directory', size: 0, oid: child.oid }
          : { name, type: 'file', size: await blobSize(repo, child.oid), oid: child.oid },
      );
    }
    this._logger.debug(`enumerated ${result.size} entries`, { path, commit: head.commit });
    return result;
  }

  /** Children of a directory; for a repository path, its branches. */
  async list(path: string): Promise<EntryInfo[]> {
    const { rp, repo } = await this._locate(path);
    const base = stripTrailingSlashes(path);
    if (!rp.branch) {
      const branches = await listBranches(repo);
      return branches.map((b): EntryInfo => ({ name: joinPath(base, b), type: 'directory', size: 0 }));
    }
    const head = await readBranch(repo, rp.branch);
    const entries = await listEntriesAtPath(repo, head.tree, rp.path);
    const out: EntryInfo[] = [];
    for (const e of entries) {
      const name = joinPath(base, e.name);
      out.push(
        e.mode === MODE_TREE
          ? { name, type: 'directory', size: 0, oid: e.oid }
          : { name, type: 'file', size: await blobSize(repo, e.oid), oid: e.oid },
      );
    }
    return out.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Expand a wildcard in the final segment. A wildcard in the branch
   * segment matches branches of the repository.
   *
   * @throws {InvalidGlobError} For wildcards outside the final segment,
   *   or in the owner or repository segment.
   */
  async glob(pattern: string): Promise<Map<string, EntryInfo>> {
    validateGlob(pattern);
    const rp = parseRepositoryPath(pattern);
    if (hasWildcard(rp.owner) || hasWildcard(rp.repo)) {
      throw new InvalidGlobError(`Invalid glob ${pattern}. Owner and repository cannot contain wildcards`);
    }
    const dir = parentPath(stripTrailingSlashes(pattern));
    if (!rp.path) {
      const { repo } = await this._locate(pattern);
      const out = new Map<string, EntryInfo>();
      for (const branch of await listBranches(repo)) {
        if (!globMatch(rp.branch, branch)) continue;
        const name = joinPath(dir, branch);
        out.set(name, { name, type: 'directory', size: 0 });
      }
      return out;
    }
    try {
      return filterEntries(await this.list(dir), finalSegment(pattern));
    } catch (err) {
      if (isErrno(err, 'ENOENT') || err instanceof NotADirectoryError) return new Map();
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Streams
  // -------------------------------------------------------------------------

  open(path: string, mode: 'rb'): Promise<ReadHandle>;
  open(path: string, mode: 'wb', opts?: OpenOptions): Promise<WriteHandle>;
  async open(path: string, mode: OpenMode, _opts?: OpenOptions): Promise<ReadHandle | WriteHandle> {
    const { rp, repo, entry } = await this._resolve(path);
    if (mode === 'rb') {
      if (entry === null) throw new FileNotFoundError(path);
      if (entry.mode === MODE_TREE) throw new IsADirectoryError(path);
      const { blob } = await git.readBlob({ fs: repo.fs, gitdir: repo.gitdir, oid: entry.oid });
      return new BufferReader(blob);
    }

    // Directories are implicit, so autoMkdir needs no work here
    if (!rp.path || entry?.mode === MODE_TREE) throw new IsADirectoryError(path);
    return new BufferWriter(async (data) => {
      const oid = await this._storeBlob(repo, rp.branch, data);
      await this._mutate(`+ ${path}`, (txn) => {
        txn.stageWrite(repo, rp.branch, rp.path, { oid, mode: MODE_BLOB });
      });
    });
  }

  /** Write a blob unless the branch manifest says it is already stored. */
  private async _storeBlob(repo: Repo, branch: string, data: Uint8Array): Promise<string> {
    const manifest = this._manifests.get(`${repo.gitdir}\0${branch}`);
    if (manifest) {
      const { oid } = await git.hashBlob({ object: data });
      if (manifest.has(oid)) {
        this._logger.debug('reusing stored object', { oid });
        return oid;
      }
    }
    return git.writeBlob({ fs: repo.fs, gitdir: repo.gitdir, blob: data });
  }

  async prepareDeduplicationHints(path: string): Promise<void> {
    const { rp, repo } = await this._locate(path);
    if (!rp.branch) return;
    const key = `${repo.gitdir}\0${rp.branch}`;
    if (this._manifests.has(key) || !(await hasBranch(repo, rp.branch))) return;
    const head = await readBranch(repo, rp.branch);
    const oids = await collectBlobOids(repo, head.tree);
    this._manifests.set(key, oids);
    this._logger.debug(`loaded manifest of ${oids.size} objects`, { path });
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /** Directories exist through their files, so there is nothing to create. */
  async makeDirectories(path: string, _opts?: { existOk?: boolean }): Promise<void> {
    parseRepositoryPath(path);
  }

  /** Resolve a destination inside an existing branch. */
  private async _target(path: string): Promise<Located> {
    const located = await this._locate(path);
    if (!located.rp.branch) throw new IsADirectoryError(path);
    await readBranch(located.repo, located.rp.branch);
    return located;
  }

  /** The hash of `oid` in `to`, importing the object graph when repos differ. */
  private async _carry(from: Repo, to: Repo, oid: string, mode: string): Promise<string> {
    if (from.gitdir === to.gitdir) return oid;
    return importObject(from, to, oid, mode);
  }

  async move(srcPath: string, dstPath: string): Promise<void> {
    const src = await this._resolve(srcPath);
    if (!src.rp.path) throw new UnsupportedOperationError(`Cannot move a branch root: ${srcPath}`);
    const { entry } = src;
    if (entry === null) throw new FileNotFoundError(srcPath);
    const dst = await this._target(dstPath);
    if (!dst.rp.path) throw new IsADirectoryError(dstPath);

    const oid = await this._carry(src.repo, dst.repo, entry.oid, entry.mode);
    await this._mutate(`move ${srcPath} to ${dstPath}`, (txn) => {
      txn.stageRemove(src.repo, src.rp.branch, src.rp.path);
      txn.stageWrite(dst.repo, dst.rp.branch, dst.rp.path, { oid, mode: entry.mode });
    });
  }

  async remove(path: string, opts?: { recursive?: boolean }): Promise<void> {
    const rp = parseRepositoryPath(path);
    if (!rp.branch) throw new UnsupportedOperationError(`Cannot remove a repository: ${path}`);
    if (!rp.path) throw new UnsupportedOperationError(`Cannot remove a branch root: ${path}`);
    const { repo, entry } = await this._resolve(path);
    if (entry === null) throw new FileNotFoundError(path);
    if (entry.mode === MODE_TREE && !opts?.recursive) throw new IsADirectoryError(path);
    await this._mutate(`- ${path}`, (txn) => {
      txn.stageRemove(repo, rp.branch, rp.path);
    });
  }

  /** Reference copy of one file; objects are imported across repositories. */
  async copyFile(srcPath: string, dstPath: string): Promise<void> {
    const src = await this._resolve(srcPath);
    const { entry } = src;
    if (entry === null) throw new FileNotFoundError(srcPath);
    if (entry.mode === MODE_TREE) throw new IsADirectoryError(srcPath);
    const dst = await this._target(dstPath);
    if (!dst.rp.path) throw new IsADirectoryError(dstPath);

    const oid = await this._carry(src.repo, dst.repo, entry.oid, entry.mode);
    await this._mutate(`copy ${srcPath} to ${dstPath}`, (txn) => {
      txn.stageWrite(dst.repo, dst.rp.branch, dst.rp.path, { oid, mode: entry.mode });
    });
  }

  /**
   * Copy a whole tree. Between two branch roots this creates or replaces
   * the destination branch; otherwise every file below the source is
   * staged under the destination, merging with what is already there.
   * Both are staged like any other write, so an aborted transaction
   * leaves the destination branch as it was.
   */
  async copyDirectory(srcPath: string, dstPath: string): Promise<void> {
    const src = await this._resolve(srcPath);
    const dstRp = parseRepositoryPath(dstPath);
    const message = `copy ${srcPath} to ${dstPath}`;

    if (!src.rp.path && dstRp.branch && !dstRp.path) {
      const { repo } = await this._locate(dstPath);
      const reset: BranchReset =
        repo.gitdir === src.repo.gitdir
          ? { kind: 'commit', oid: src.head.commit }
          : { kind: 'tree', oid: await importObject(src.repo, repo, src.head.tree, MODE_TREE) };
      await this._mutate(message, (txn) => txn.stageBranch(repo, dstRp.branch, reset));
      this._logger.debug(`staged ${dstPath} from ${srcPath}`, { commit: src.head.commit });
      return;
    }

    const { entry } = src;
    if (entry === null) throw new FileNotFoundError(srcPath);
    if (entry.mode !== MODE_TREE) {
      await this.copyFile(srcPath, dstPath);
      return;
    }
    const dst = await this._target(dstPath);
    const staged: Array<{ path: string; write: TreeWrite }> = [];
    for await (const { path: rel, entry: child } of walkTree(src.repo, entry.oid)) {
      if (child.mode === MODE_TREE) continue;
      const oid = await this._carry(src.repo, dst.repo, child.oid, child.mode);
      staged.push({ path: joinPath(dst.rp.path, rel), write: { oid, mode: child.mode } });
    }
    await this._mutate(message, (txn) => {
      for (const { path, write } of staged) txn.stageWrite(dst.repo, dst.rp.branch, path, write);
    });
  }

  // -------------------------------------------------------------------------
  // Repositories
  // -------------------------------------------------------------------------

  async createRepository(path: string): Promise<void> {
    const rp = parseRepositoryPath(path);
    await createRepository(this._session, rp, this._signature);
    this._logger.info(`Created repository ${rp.owner}/${rp.repo}`);
  }

  async duplicateRepository(srcPath: string, dstPath: string): Promise<void> {
    await copyRepository(this._session, parseRepositoryPath(srcPath), parseRepositoryPath(dstPath));
  }

  async setRepositoryAttribute(path: string, attr: string, value: AttributeValue): Promise<void> {
    const { repo } = await this._locate(path);
    await git.setConfig({
      fs: repo.fs,
      gitdir: repo.gitdir,
      path: `${ATTRIBUTE_SECTION}.${attr}`,
      value: String(value),
    });
  }

  async getRepositoryAttribute(path: string, attr: string): Promise<AttributeValue | undefined> {
    const { repo } = await this._locate(path);
    const raw: unknown = await git.getConfig({
      fs: repo.fs,
      gitdir: repo.gitdir,
      path: `${ATTRIBUTE_SECTION}.${attr}`,
    });
    if (raw === undefined || raw === null) return undefined;
    if (typeof raw === 'boolean' || typeof raw === 'number') return raw;
    const text = String(raw);
    if (text === 'true') return true;
    if (text === 'false') return false;
    return text;
  }
}
