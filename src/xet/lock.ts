/**
 * Advisory repository lock for serializing ref updates.
 *
 * Uses an atomic lockfile (`crossfs.lock`) for cross-process coordination
 * and an in-process promise chain (async operations interleave even on
 * one thread).
 */

import * as fs from 'node:fs';
import { isErrno } from '../types.js';

export const LOCK_FILE = 'crossfs.lock';

const MAX_ATTEMPTS = 100;

// Per-repo tails of the in-process promise chain, keyed by gitdir
const tails = new Map<string, Promise<void>>();

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function acquireLockfile(lockPath: string): Promise<void> {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    try {
      const handle = await fs.promises.open(lockPath, 'wx');
      await handle.close();
      return;
    } catch (err) {
      if (!isErrno(err, 'EEXIST')) throw err;
      await sleep(10 + Math.random() * 20);
    }
  }
  throw new Error(`Could not acquire lock after ${MAX_ATTEMPTS} attempts: ${lockPath}`);
}

/**
 * Run `fn` while holding the lock on `gitdir`.
 */
export async function withRepoLock<T>(gitdir: string, fn: () => Promise<T>): Promise<T> {
  const prev = tails.get(gitdir) ?? Promise.resolve();
  let release = () => {};
  const tail = new Promise<void>((resolve) => {
    release = resolve;
  });
  tails.set(gitdir, tail);

  await prev;
  const lockPath = `${gitdir}/${LOCK_FILE}`;
  try {
    await acquireLockfile(lockPath);
    try {
      return await fn();
    } finally {
      await fs.promises.rm(lockPath, { force: true });
    }
  } finally {
    if (tails.get(gitdir) === tail) tails.delete(gitdir);
    release();
  }
}
