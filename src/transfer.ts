/**
 * Single-item transfer between two backend handles.
 */

import {
  ATTRIBUTES_MARKER,
  LARGE_OBJECT_THRESHOLD,
  errorMessage,
  isTransactional,
  type Backend,
  type OperationReport,
} from './types.js';
import { finalSegment } from './paths.js';
import type { Semaphore } from './permits.js';
import type { Logger } from './logger.js';

/** Shared state threaded through every transfer of one operation. */
export interface TransferContext {
  permits: Semaphore;
  chunkSize: number;
  logger: Logger;
  report: OperationReport;
}

function uri(backend: Backend, path: string): string {
  return `${backend.protocol}://${path}`;
}

/**
 * Copy one file from `src` to `dst`.
 *
 * Never throws: a failure in any phase is logged and recorded in
 * `ctx.report.errors`, so sibling transfers keep going.
 *
 * @param sizeHint - Source size, if the caller already knows it.
 */
export async function transferFile(
  src: Backend,
  srcPath: string,
  dst: Backend,
  dstPath: string,
  ctx: TransferContext,
  sizeHint?: number,
): Promise<void> {
  const entry = { src: uri(src, srcPath), dest: uri(dst, dstPath) };

  if (finalSegment(dstPath) === ATTRIBUTES_MARKER) {
    ctx.logger.info(`Skipping ${entry.dest}: ${ATTRIBUTES_MARKER} is owned by the repository`);
    ctx.report.skipped.push(entry);
    return;
  }
  ctx.logger.info(`Copying ${srcPath} to ${dstPath}...`);

  try {
    if (isTransactional(src) && isTransactional(dst) && src.protocol === dst.protocol) {
      await dst.copyFile(srcPath, dstPath);
    } else {
      await ctx.permits.use(() => streamFile(src, srcPath, dst, dstPath, ctx.chunkSize, sizeHint));
    }
    ctx.report.copied.push(entry);
  } catch (err) {
    const message = `Failed to copy ${entry.src}: ${errorMessage(err)}`;
    ctx.logger.error(message);
    ctx.report.errors.push({ path: entry.src, error: message });
  }
}

async function streamFile(
  src: Backend,
  srcPath: string,
  dst: Backend,
  dstPath: string,
  chunkSize: number,
  sizeHint?: number,
): Promise<void> {
  if (isTransactional(dst)) {
    const size = sizeHint ?? (await src.info(srcPath)).size;
    if (size >= LARGE_OBJECT_THRESHOLD) {
      await dst.prepareDeduplicationHints(dstPath);
    }
  }

  const reader = await src.open(srcPath, 'rb');
  try {
    const writer = await dst.open(dstPath, 'wb', { autoMkdir: true });
    try {
      for (;;) {
        const chunk = await reader.read(chunkSize);
        if (chunk.length === 0) break;
        await writer.write(chunk);
      }
      await writer.close();
    } catch (err) {
      await writer.abort();
      throw err;
    }
  } finally {
    await reader.close();
  }
}
