/**
 * crossfs: copy, move and delete files and trees across storage backends
 * addressed by URIs.
 *
 * @example
 * ```ts
 * import { createEnvironment, loadConfig, rootCopy, ConsoleLogger } from 'crossfs';
 *
 * const config = await loadConfig();
 * const env = createEnvironment(config, { logger: new ConsoleLogger('info') });
 *
 * // Local directory into a repository branch, as one commit
 * const report = await rootCopy(env, './data', 'xet://alice/datasets/main', {
 *   recursive: true,
 *   message: 'add data',
 * });
 * if (report.errors.length) console.error(report.errors);
 * ```
 */

// Operations
export {
  createEnvironment,
  environmentFor,
  withTransaction,
  rootCopy,
  move,
  remove,
  duplicate,
  info,
  list,
  history,
  makeRepository,
  type Environment,
  type CopyRequest,
  type RemoveRequest,
  type DuplicateRequest,
} from './ops.js';
export { copyTree, createCopyContext, isDirectoryLike, type CopyContext, type CopyOptions } from './copy.js';
export { transferFile, type TransferContext } from './transfer.js';
export { validateCopy } from './validate.js';

// Resolution and paths
export { BackendRegistry, createDefaultRegistry, splitUri, type ResolvedUri } from './uri.js';
export {
  trimPrefix,
  stripTrailingSlashes,
  joinPath,
  parentPath,
  finalSegment,
  validateGlob,
} from './paths.js';
export { globMatch, hasWildcard } from './glob.js';

// Concurrency
export { Semaphore, runPool, defaultPoolSize } from './permits.js';

// Backends
export { LocalBackend } from './backends/local.js';
export { MemoryBackend, MemoryStore } from './backends/memory.js';
export { XetBackend } from './xet/backend.js';
export type { XetSession } from './xet/store.js';

// Configuration and logging
export {
  loadConfig,
  saveLoginConfig,
  toSession,
  configPath,
  type CrossFsConfig,
  type LoginSettings,
} from './config.js';
export {
  ConsoleLogger,
  MemoryLogger,
  NullLogger,
  StructuredLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from './logger.js';

// Types, constants and errors
export {
  ATTRIBUTES_MARKER,
  LARGE_OBJECT_THRESHOLD,
  DEFAULT_CHUNK_SIZE,
  MAX_CONCURRENT_COPIES,
  CrossFsError,
  InvalidUriError,
  BackendNotFoundError,
  PathMismatchError,
  InvalidGlobError,
  BranchNotFoundError,
  RepositoryNotFoundError,
  UnsupportedOperationError,
  TransactionError,
  ConfigError,
  FileNotFoundError,
  IsADirectoryError,
  NotADirectoryError,
  FileExistsError,
  isTransactional,
  emptyReport,
  reportOk,
  type Backend,
  type TransactionalBackend,
  type BackendCapabilities,
  type EntryInfo,
  type EntryType,
  type ReadHandle,
  type WriteHandle,
  type OpenOptions,
  type RepositoryPath,
  type BranchInfo,
  type HistoryEntry,
  type AttributeValue,
  type WorkItem,
  type OperationReport,
  type TransferEntry,
  type ChangeError,
} from './types.js';
