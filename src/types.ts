/**
 * Shared types, constants, capability interfaces, and error classes.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Backend metadata file that a generic copy must never overwrite. */
export const ATTRIBUTES_MARKER = '.gitattributes';

/** Sizes at or above this trigger deduplication hints on the destination. */
export const LARGE_OBJECT_THRESHOLD = 50_000_000;

export const DEFAULT_CHUNK_SIZE = 16 * 1024 * 1024;

export const MAX_CONCURRENT_COPIES = 32;

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class CrossFsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrossFsError';
  }
}

export class InvalidUriError extends CrossFsError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidUriError';
  }
}

export class BackendNotFoundError extends CrossFsError {
  constructor(protocol: string) {
    super(`No backend registered for protocol '${protocol}'`);
    this.name = 'BackendNotFoundError';
  }
}

export class PathMismatchError extends CrossFsError {
  constructor(path: string, prefix: string) {
    super(`Path ${path} not in directory ${prefix}`);
    this.name = 'PathMismatchError';
  }
}

export class InvalidGlobError extends CrossFsError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidGlobError';
  }
}

export class BranchNotFoundError extends CrossFsError {
  constructor(message: string) {
    super(message);
    this.name = 'BranchNotFoundError';
  }
}

export class RepositoryNotFoundError extends CrossFsError {
  constructor(repo: string) {
    super(`Repository not found: ${repo}`);
    this.name = 'RepositoryNotFoundError';
  }
}

export class UnsupportedOperationError extends CrossFsError {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedOperationError';
  }
}

export class TransactionError extends CrossFsError {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionError';
  }
}

export class ConfigError extends CrossFsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class FileNotFoundError extends CrossFsError {
  code = 'ENOENT';
  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class IsADirectoryError extends CrossFsError {
  code = 'EISDIR';
  constructor(path: string) {
    super(`Is a directory: ${path}`);
    this.name = 'IsADirectoryError';
  }
}

export class NotADirectoryError extends CrossFsError {
  code = 'ENOTDIR';
  constructor(path: string) {
    super(`Not a directory: ${path}`);
    this.name = 'NotADirectoryError';
  }
}

export class FileExistsError extends CrossFsError {
  code = 'EEXIST';
  constructor(path: string) {
    super(`File exists: ${path}`);
    this.name = 'FileExistsError';
  }
}

/** True if err is a Node system error with the given errno code. */
export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/** Render any thrown value as a one-line reason. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Entries and streams
// ---------------------------------------------------------------------------

export type EntryType = 'file' | 'directory';

export interface EntryInfo {
  /** Backend path of the entry. */
  name: string;
  type: EntryType;
  size: number;
  /** Content hash, for backends that address objects by content. */
  oid?: string;
}

export type OpenMode = 'rb' | 'wb';

export interface OpenOptions {
  /** Create missing parent directories before writing. */
  autoMkdir?: boolean;
}

/** Sequential reader. An empty chunk means the source is exhausted. */
export interface ReadHandle {
  read(size: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

/** Sequential writer. Data is durable once `close()` resolves. */
export interface WriteHandle {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
  /** Discard whatever was written so far. */
  abort(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Backend capability interfaces
// ---------------------------------------------------------------------------

export interface BackendCapabilities {
  /** Backend implements {@link TransactionalBackend}. */
  transactions: boolean;
}

/**
 * The minimal capability set every storage backend exposes.
 */
export interface Backend {
  /** Protocol tag this handle was resolved for. */
  protocol: string;
  readonly capabilities: BackendCapabilities;

  info(path: string): Promise<EntryInfo>;
  isDirectory(path: string): Promise<boolean>;
  open(path: string, mode: 'rb'): Promise<ReadHandle>;
  open(path: string, mode: 'wb', opts?: OpenOptions): Promise<WriteHandle>;
  /** Every descendant of path (files and directories), keyed by backend path. */
  enumerate(path: string): Promise<Map<string, EntryInfo>>;
  /** Entries matching a pattern whose wildcards sit in the final segment. */
  glob(pattern: string): Promise<Map<string, EntryInfo>>;
  /** Immediate children of a directory. */
  list(path: string): Promise<EntryInfo[]>;
  makeDirectories(path: string, opts?: { existOk?: boolean }): Promise<void>;
  move(srcPath: string, dstPath: string): Promise<void>;
  remove(path: string, opts?: { recursive?: boolean }): Promise<void>;
}

/** Location of a path inside a repository backend. */
export interface RepositoryPath {
  owner: string;
  repo: string;
  /** Empty when the path names the repository itself. */
  branch: string;
  /** In-branch path, empty for the branch root. */
  path: string;
}

export interface BranchInfo {
  owner: string;
  repo: string;
  branch: string;
  commit: string;
}

export type AttributeValue = string | number | boolean;

/** One commit on a branch, newest first in listings. */
export interface HistoryEntry {
  commit: string;
  message: string;
  author: string;
}

/**
 * Extended capabilities of content-addressed, branch-aware backends.
 */
export interface TransactionalBackend extends Backend {
  readonly inTransaction: boolean;
  beginTransaction(message: string): void;
  endTransaction(): Promise<void>;
  abortTransaction(): void;

  parsePath(path: string): RepositoryPath;
  branchInfo(path: string): Promise<BranchInfo>;
  isDirectoryOrBranch(path: string): Promise<boolean>;
  copyFile(srcPath: string, dstPath: string): Promise<void>;
  copyDirectory(srcPath: string, dstPath: string): Promise<void>;
  prepareDeduplicationHints(path: string): Promise<void>;
  history(path: string, depth?: number): Promise<HistoryEntry[]>;

  createRepository(path: string): Promise<void>;
  duplicateRepository(srcPath: string, dstPath: string): Promise<void>;
  setRepositoryAttribute(path: string, attr: string, value: AttributeValue): Promise<void>;
  getRepositoryAttribute(path: string, attr: string): Promise<AttributeValue | undefined>;

  currentUser(): string;
  domain(): string;
}

export function isTransactional(backend: Backend): backend is TransactionalBackend {
  return backend.capabilities.transactions;
}

// ---------------------------------------------------------------------------
// Work items and reports
// ---------------------------------------------------------------------------

export interface WorkItem {
  readonly src: Backend;
  readonly srcPath: string;
  readonly dst: Backend;
  readonly dstPath: string;
  readonly sizeHint?: number;
  readonly isDirectory: boolean;
}

export interface TransferEntry {
  src: string;
  dest: string;
}

export interface ChangeError {
  path: string;
  error: string;
}

export interface OperationReport {
  copied: TransferEntry[];
  skipped: TransferEntry[];
  moved: TransferEntry[];
  removed: string[];
  errors: ChangeError[];
  warnings: ChangeError[];
}

export function emptyReport(): OperationReport {
  return { copied: [], skipped: [], moved: [], removed: [], errors: [], warnings: [] };
}

export function reportOk(report: OperationReport): boolean {
  return report.errors.length === 0;
}
