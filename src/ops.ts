/**
 * Top-level operations: copy, move, remove, duplicate and queries.
 *
 * Mutations against a transactional destination run inside exactly one
 * transaction, which is committed on success and aborted on failure.
 */

import {
  DEFAULT_CHUNK_SIZE,
  emptyReport,
  errorMessage,
  isTransactional,
  UnsupportedOperationError,
  type Backend,
  type EntryInfo,
  type HistoryEntry,
  type OperationReport,
  type TransactionalBackend,
} from './types.js';
import { finalSegment, joinPath, stripTrailingSlashes, validateGlob } from './paths.js';
import { hasWildcard } from './glob.js';
import { Semaphore, defaultPoolSize } from './permits.js';
import { NullLogger, type Logger } from './logger.js';
import { copyTree, isDirectoryLike, type CopyContext } from './copy.js';
import { validateCopy } from './validate.js';
import { createDefaultRegistry, type BackendRegistry } from './uri.js';
import { toSession, type CrossFsConfig } from './config.js';
import type { MemoryStore } from './backends/memory.js';

/** Everything an operation needs besides its arguments. */
export interface Environment {
  registry: BackendRegistry;
  logger: Logger;
  /** Bounds in-flight transfers across every operation sharing it. */
  permits: Semaphore;
  poolSize: number;
  chunkSize: number;
}

export function createEnvironment(
  config: CrossFsConfig,
  opts: { logger?: Logger; memoryStore?: MemoryStore } = {},
): Environment {
  const logger = opts.logger ?? new NullLogger();
  return {
    registry: createDefaultRegistry(toSession(config), { logger, memoryStore: opts.memoryStore }),
    logger,
    permits: new Semaphore(config.maxConcurrentCopies),
    poolSize: config.poolSize,
    chunkSize: config.chunkSize,
  };
}

/** Environment around an existing registry, with default tuning. */
export function environmentFor(
  registry: BackendRegistry,
  opts: Partial<Omit<Environment, 'registry'>> = {},
): Environment {
  return {
    registry,
    logger: opts.logger ?? new NullLogger(),
    permits: opts.permits ?? new Semaphore(),
    poolSize: opts.poolSize ?? defaultPoolSize(),
    chunkSize: opts.chunkSize ?? DEFAULT_CHUNK_SIZE,
  };
}

/**
 * Run `fn` inside a transaction on `backend` when it supports them.
 *
 * The transaction is ended when `fn` resolves and aborted when it throws,
 * so it is never left open.
 */
export async function withTransaction<T>(
  backend: Backend,
  message: string,
  fn: () => Promise<T>,
): Promise<T> {
  if (!isTransactional(backend)) return fn();
  backend.beginTransaction(message);
  let result: T;
  try {
    result = await fn();
  } catch (err) {
    backend.abortTransaction();
    throw err;
  }
  await backend.endTransaction();
  return result;
}

function fail(env: Environment, report: OperationReport, path: string, error: string): OperationReport {
  env.logger.error(error);
  report.errors.push({ path, error });
  return report;
}

function requireRepositoryBackend(backend: Backend, uri: string): TransactionalBackend {
  if (!isTransactional(backend)) {
    throw new UnsupportedOperationError(`${uri} is not a repository URI`);
  }
  return backend;
}

export interface CopyRequest {
  recursive?: boolean;
  message?: string;
}

/**
 * Copy `source` to `destination`.
 *
 * When the destination is an existing directory and the source has no
 * wildcard, the source's final segment is appended to the destination.
 * Per-file failures land in the returned report.
 *
 * @throws {InvalidGlobError} For a wildcard outside the final segment,
 *   before any backend call.
 * @throws {BranchNotFoundError} If a repository branch is missing.
 */
export async function rootCopy(
  env: Environment,
  source: string,
  destination: string,
  opts: CopyRequest = {},
): Promise<OperationReport> {
  const report = emptyReport();
  const ctx: CopyContext = {
    permits: env.permits,
    poolSize: env.poolSize,
    chunkSize: env.chunkSize,
    logger: env.logger,
    report,
  };

  const src = env.registry.resolve(source);
  const srcPath = stripTrailingSlashes(src.path);
  validateGlob(srcPath, source);
  const dst = env.registry.resolve(destination);
  let dstPath = stripTrailingSlashes(dst.path);

  await validateCopy(src.backend, srcPath, dst.backend, dstPath);

  if (!hasWildcard(source) && (await isDirectoryLike(dst.backend, dstPath))) {
    dstPath = joinPath(dstPath, finalSegment(source));
  }

  const message = opts.message || `copy ${source} to ${destination}`;
  await withTransaction(dst.backend, message, () =>
    copyTree(src.backend, srcPath, dst.backend, dstPath, ctx, { recursive: opts.recursive }),
  );
  return report;
}

/**
 * Move within one backend. A move across protocols is reported and
 * nothing is touched; aliases of one backend count as the same protocol.
 */
export async function move(
  env: Environment,
  source: string,
  target: string,
  opts: CopyRequest = {},
): Promise<OperationReport> {
  const report = emptyReport();
  const message =
    opts.message || (opts.recursive ? `move ${source} to ${target} recursively` : `move ${source} to ${target}`);
  const src = env.registry.resolve(source);
  const dst = env.registry.resolve(target);

  if (src.canonical !== dst.canonical) {
    return fail(
      env,
      report,
      source,
      `Unable to move between different protocols ${src.backend.protocol}, ${dst.backend.protocol}. You may want to copy instead`,
    );
  }

  const backend = dst.backend;
  try {
    await withTransaction(backend, message, () => backend.move(src.path, dst.path));
    report.moved.push({ src: source, dest: target });
  } catch (err) {
    fail(env, report, source, errorMessage(err));
  }
  return report;
}

export interface RemoveRequest {
  recursive?: boolean;
  message?: string;
}

/**
 * Remove every path in one transaction. All paths must share the first
 * path's protocol. Branch roots are refused.
 */
export async function remove(
  env: Environment,
  paths: string[],
  opts: RemoveRequest = {},
): Promise<OperationReport> {
  const report = emptyReport();
  if (paths.length === 0) return report;

  const message = opts.message || `delete ${paths.join(', ')}`;
  const { backend, canonical } = env.registry.resolve(paths[0]);
  const targets: Array<{ uri: string; path: string }> = [];
  for (const uri of paths) {
    const resolved = env.registry.resolve(uri);
    if (resolved.canonical !== canonical) {
      return fail(
        env,
        report,
        uri,
        `Cannot delete across protocols: ${uri} is not on ${backend.protocol}`,
      );
    }
    targets.push({ uri, path: resolved.path });
  }

  if (isTransactional(backend)) {
    for (const { uri, path } of targets) {
      const rp = backend.parsePath(path);
      if (rp.branch && !rp.path) {
        return fail(
          env,
          report,
          uri,
          `Cannot delete branch ${rp.branch} with rm: deleting a branch is irreversible and its history would be lost`,
        );
      }
    }
  }

  const removed: string[] = [];
  try {
    await withTransaction(backend, message, async () => {
      for (const { uri, path } of targets) {
        await backend.remove(path, { recursive: opts.recursive });
        removed.push(uri);
      }
    });
    report.removed.push(...removed);
  } catch (err) {
    fail(env, report, targets[removed.length]?.uri ?? paths[0], errorMessage(err));
  }
  return report;
}

export interface DuplicateRequest {
  private?: boolean;
  public?: boolean;
  verbose?: boolean;
}

/**
 * Copy a whole repository, by default to `<user>/<name>` of the source.
 *
 * A failed visibility change is a warning; the copy stays.
 */
export async function duplicate(
  env: Environment,
  source: string,
  dest?: string,
  opts: DuplicateRequest = {},
): Promise<OperationReport> {
  const report = emptyReport();
  const src = env.registry.resolve(source);
  const backend = requireRepositoryBackend(src.backend, source);
  const repoName = finalSegment(stripTrailingSlashes(src.path));

  const target = dest ?? `${backend.protocol}://${backend.currentUser()}/${repoName}`;
  if (dest === undefined && opts.verbose) env.logger.info(`Duplicating to ${target}`);
  const dst = env.registry.resolve(target);
  if (dst.backend.protocol !== backend.protocol) {
    throw new UnsupportedOperationError(`Cannot duplicate ${source} to another protocol: ${target}`);
  }

  await backend.duplicateRepository(src.path, dst.path);
  report.copied.push({ src: source, dest: target });

  try {
    if (opts.private || opts.public) {
      if (opts.verbose) env.logger.info('Duplicate Success. Changing permissions...');
      await backend.setRepositoryAttribute(dst.path, 'private', Boolean(opts.private));
      if (opts.verbose) env.logger.info('Repo permissions set successfully');
    }
  } catch (err) {
    const settings = `${backend.domain()}/${backend.currentUser()}/${repoName}/settings`;
    const warning = `Could not set repository permissions: ${errorMessage(err)}. Change them at ${settings}`;
    env.logger.warn(warning);
    report.warnings.push({ path: target, error: warning });
  }
  return report;
}

export async function info(env: Environment, uri: string): Promise<EntryInfo> {
  const { backend, path } = env.registry.resolve(uri);
  return backend.info(path);
}

export async function list(env: Environment, uri: string): Promise<EntryInfo[]> {
  const { backend, path } = env.registry.resolve(uri);
  return backend.list(path);
}

export async function history(env: Environment, uri: string, depth?: number): Promise<HistoryEntry[]> {
  const { backend, path } = env.registry.resolve(uri);
  return requireRepositoryBackend(backend, uri).history(path, depth);
}

/** Create a repository whose `main` branch holds the attributes marker. */
export async function makeRepository(env: Environment, uri: string): Promise<void> {
  const { backend, path } = env.registry.resolve(uri);
  await requireRepositoryBackend(backend, uri).createRepository(path);
}
