/**
 * Tree and glob walking: expands a source path into work items and
 * dispatches them through a bounded worker pool.
 */

import {
  DEFAULT_CHUNK_SIZE,
  emptyReport,
  errorMessage,
  isTransactional,
  type Backend,
  type OperationReport,
  type WorkItem,
} from './types.js';
import { joinPath, parentPath, stripTrailingSlashes, trimPrefix, validateGlob } from './paths.js';
import { hasWildcard } from './glob.js';
import { Semaphore, defaultPoolSize, runPool } from './permits.js';
import { NullLogger, type Logger } from './logger.js';
import { transferFile, type TransferContext } from './transfer.js';

export interface CopyContext extends TransferContext {
  /** Worker-pool width per enumeration level. */
  poolSize: number;
}

export interface CopyOptions {
  recursive?: boolean;
}

export function createCopyContext(
  opts: {
    permits?: Semaphore;
    poolSize?: number;
    chunkSize?: number;
    logger?: Logger;
    report?: OperationReport;
  } = {},
): CopyContext {
  return {
    permits: opts.permits ?? new Semaphore(),
    poolSize: opts.poolSize ?? defaultPoolSize(),
    chunkSize: opts.chunkSize ?? DEFAULT_CHUNK_SIZE,
    logger: opts.logger ?? new NullLogger(),
    report: opts.report ?? emptyReport(),
  };
}

/** Directory test that also counts branch roots on repository backends. */
export async function isDirectoryLike(backend: Backend, path: string): Promise<boolean> {
  return isTransactional(backend) ? backend.isDirectoryOrBranch(path) : backend.isDirectory(path);
}

/**
 * Copy `srcPath` on `src` to `dstPath` on `dst`.
 *
 * A wildcard in the final segment expands through `glob`, a directory
 * walks through `enumerate`, anything else is a single transfer. Returns
 * once every dispatched item has finished.
 *
 * @throws {InvalidGlobError} Before any backend call, for a wildcard
 *   outside the final segment.
 */
export async function copyTree(
  src: Backend,
  srcPath: string,
  dst: Backend,
  dstPath: string,
  ctx: CopyContext,
  opts: CopyOptions = {},
): Promise<void> {
  srcPath = stripTrailingSlashes(srcPath);
  dstPath = stripTrailingSlashes(dstPath);

  if (hasWildcard(srcPath)) {
    validateGlob(srcPath);
    await copyGlob(src, srcPath, dst, dstPath, ctx, opts);
    return;
  }
  if (await isDirectoryLike(src, srcPath)) {
    await copyDirectory(src, srcPath, dst, dstPath, ctx, opts);
    return;
  }
  await transferFile(src, srcPath, dst, dstPath, ctx);
}

async function ensureDirectories(dst: Backend, dirs: Iterable<string>): Promise<void> {
  for (const dir of [...new Set(dirs)].sort()) {
    if (dir) await dst.makeDirectories(dir, { existOk: true });
  }
}

async function dispatch(items: WorkItem[], ctx: CopyContext, opts: CopyOptions): Promise<void> {
  await runPool(items, ctx.poolSize, async (item) => {
    if (item.isDirectory) {
      // Nested matches reuse the resolved handles
      await copyTree(item.src, item.srcPath, item.dst, item.dstPath, ctx, opts);
    } else {
      await transferFile(item.src, item.srcPath, item.dst, item.dstPath, ctx, item.sizeHint);
    }
  });
}

async function copyGlob(
  src: Backend,
  pattern: string,
  dst: Backend,
  dstPath: string,
  ctx: CopyContext,
  opts: CopyOptions,
): Promise<void> {
  const root = parentPath(pattern);
  const matches = await src.glob(pattern);
  const items: WorkItem[] = [];

  for (const [path, info] of matches) {
    if (info.type === 'directory' && !opts.recursive) {
      omit(src, path, ctx);
      continue;
    }
    items.push({
      src,
      srcPath: path,
      dst,
      dstPath: joinPath(dstPath, trimPrefix(path, root)),
      sizeHint: info.size,
      isDirectory: info.type === 'directory',
    });
  }

  await ensureDirectories(dst, items.map((item) => parentPath(item.dstPath)));
  await dispatch(items, ctx, opts);
}

async function copyDirectory(
  src: Backend,
  srcPath: string,
  dst: Backend,
  dstPath: string,
  ctx: CopyContext,
  opts: CopyOptions,
): Promise<void> {
  if (!opts.recursive) {
    omit(src, srcPath, ctx);
    return;
  }

  if (isTransactional(src) && isTransactional(dst) && src.protocol === dst.protocol) {
    const entry = { src: `${src.protocol}://${srcPath}`, dest: `${dst.protocol}://${dstPath}` };
    ctx.logger.info(`Copying ${srcPath} to ${dstPath}...`);
    try {
      await dst.copyDirectory(srcPath, dstPath);
      ctx.report.copied.push(entry);
    } catch (err) {
      const message = `Failed to copy ${entry.src}: ${errorMessage(err)}`;
      ctx.logger.error(message);
      ctx.report.errors.push({ path: entry.src, error: message });
    }
    return;
  }

  const entries = await src.enumerate(srcPath);
  const dirs = [dstPath];
  const items: WorkItem[] = [];
  for (const [path, info] of entries) {
    const target = joinPath(dstPath, trimPrefix(path, srcPath));
    if (info.type === 'directory') {
      dirs.push(target);
      continue;
    }
    dirs.push(parentPath(target));
    items.push({ src, srcPath: path, dst, dstPath: target, sizeHint: info.size, isDirectory: false });
  }

  await ensureDirectories(dst, dirs);
  await dispatch(items, ctx, opts);
}

function omit(src: Backend, path: string, ctx: CopyContext): void {
  const where = `${src.protocol}://${path}`;
  ctx.logger.warn(`omitting directory ${where}`);
  ctx.report.warnings.push({ path: where, error: 'omitting directory' });
}
