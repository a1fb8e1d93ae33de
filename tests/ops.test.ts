import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'node:path';
import {
  BackendRegistry,
  BranchNotFoundError,
  InvalidGlobError,
  MemoryBackend,
  MemoryLogger,
  MemoryStore,
  RepositoryNotFoundError,
  UnsupportedOperationError,
  XetBackend,
  createDefaultRegistry,
  duplicate,
  environmentFor,
  history,
  info,
  list,
  makeRepository,
  move,
  remove,
  rootCopy,
  withTransaction,
  type Environment,
  type XetSession,
} from '../src/index.js';
import { freshRepo, fs, readText, rmTmpDir, writeText } from './helpers.js';

let backend: XetBackend;
let session: XetSession;
let tmpDir: string;
let store: MemoryStore;
let mem: MemoryBackend;
let logger: MemoryLogger;
let env: Environment;

beforeEach(async () => {
  ({ backend, session, tmpDir } = await freshRepo());
  store = new MemoryStore();
  mem = new MemoryBackend(store);
  logger = new MemoryLogger();
  env = environmentFor(createDefaultRegistry(session, { memoryStore: store }), { logger, poolSize: 2 });
});

afterEach(() => {
  vi.restoreAllMocks();
  rmTmpDir(tmpDir);
});

/** Environment whose repository URIs all resolve to `backend`, so spies see every call. */
function pinnedEnvironment(): Environment {
  const registry = new BackendRegistry();
  registry.register(MemoryBackend.protocols, () => new MemoryBackend(store));
  registry.register(XetBackend.protocols, () => backend);
  return environmentFor(registry, { logger, poolSize: 2 });
}

async function messages(path = 'tester/repo/main'): Promise<string[]> {
  return (await backend.history(path)).map((h) => h.message);
}

describe('rootCopy', () => {
  beforeEach(async () => {
    await writeText(mem, 'data/a.txt', 'A');
    await writeText(mem, 'data/sub/b.txt', 'B');
  });

  it('copies a tree into a branch as one commit, under the source name', async () => {
    const report = await rootCopy(env, 'memory://data', 'xet://tester/repo/main', { recursive: true });

    expect(report.errors).toEqual([]);
    expect(report.copied).toHaveLength(2);
    expect(await readText(backend, 'tester/repo/main/data/sub/b.txt')).toBe('B');
    expect(await messages()).toEqual([
      'copy memory://data to xet://tester/repo/main',
      'seed files',
      'Initialize main',
    ]);
  });

  it('a trailing slash copies the contents', async () => {
    await rootCopy(env, 'memory://data/', 'xet://tester/repo/main/dir', { recursive: true, message: 'sync' });
    expect(await readText(backend, 'tester/repo/main/dir/a.txt')).toBe('A');
    expect(await readText(backend, 'tester/repo/main/dir/sub/b.txt')).toBe('B');
    expect((await messages())[0]).toBe('sync');
  });

  it('copies a file to a new name', async () => {
    await rootCopy(env, 'memory://data/a.txt', 'xet://tester/repo/main/renamed.txt');
    expect(await readText(backend, 'tester/repo/main/renamed.txt')).toBe('A');
  });

  it('copies out of a repository', async () => {
    await rootCopy(env, 'xet://tester/repo/main/dir', 'memory://export', { recursive: true });
    expect(await readText(mem, 'export/sub/c.txt')).toBe('ccc');
  });

  it('expands a wildcard in the branch segment', async () => {
    const report = await rootCopy(env, 'xet://tester/repo/ma*', 'memory://out', { recursive: true });

    expect(report.errors).toEqual([]);
    expect(await readText(mem, 'out/main/data.txt')).toBe('data');
    expect(await readText(mem, 'out/main/dir/sub/c.txt')).toBe('ccc');
    expect(report.copied).toHaveLength(4);
    expect(report.skipped).toEqual([
      { src: 'xet://tester/repo/main/.gitattributes', dest: 'memory://out/main/.gitattributes' },
    ]);
    expect(store.files.has('out/main/.gitattributes')).toBe(false);
  });

  it('a branch wildcard still needs the repository', async () => {
    await expect(rootCopy(env, 'xet://tester/missing/ma*', 'memory://out', { recursive: true })).rejects.toThrow(
      RepositoryNotFoundError,
    );
  });

  it('between branch roots creates the destination branch', async () => {
    const report = await rootCopy(env, 'xet://tester/repo/main', 'xet://tester/repo/dev', { recursive: true });
    expect(report.errors).toEqual([]);
    const main = await backend.branchInfo('tester/repo/main');
    const dev = await backend.branchInfo('tester/repo/dev');
    expect(dev.commit).toBe(main.commit);
  });

  it('fails fast on a missing destination branch', async () => {
    await expect(rootCopy(env, 'memory://data', 'xet://tester/repo/nope/x', { recursive: true })).rejects.toThrow(
      BranchNotFoundError,
    );
    expect(await messages()).toEqual(['seed files', 'Initialize main']);
  });

  it('rejects a bad glob before any backend call', async () => {
    const calls = [
      vi.spyOn(MemoryBackend.prototype, 'info'),
      vi.spyOn(MemoryBackend.prototype, 'isDirectory'),
      vi.spyOn(MemoryBackend.prototype, 'glob'),
      vi.spyOn(MemoryBackend.prototype, 'enumerate'),
      vi.spyOn(MemoryBackend.prototype, 'list'),
    ];
    await expect(rootCopy(env, 'memory://data/*/a.txt', 'memory://out')).rejects.toThrow(
      'Invalid glob memory://data/*/a.txt. Wildcards can only appear in the last position',
    );
    await expect(rootCopy(env, 'memory://data/*/a.txt', 'memory://out')).rejects.toThrow(InvalidGlobError);
    for (const spy of calls) expect(spy).not.toHaveBeenCalled();
  });

  it('glob sources keep the destination as given', async () => {
    await rootCopy(env, 'memory://data/*.txt', 'xet://tester/repo/main/dir');
    expect(await readText(backend, 'tester/repo/main/dir/a.txt')).toBe('A');
  });
});

describe('withTransaction', () => {
  it('commits when the body succeeds', async () => {
    await withTransaction(backend, 'wrapped', () => writeText(backend, 'tester/repo/main/w.txt', 'w'));
    expect((await messages())[0]).toBe('wrapped');
    expect(backend.inTransaction).toBe(false);
  });

  it('aborts and rethrows when the body fails', async () => {
    const abort = vi.spyOn(backend, 'abortTransaction');
    const end = vi.spyOn(backend, 'endTransaction');
    await expect(
      withTransaction(backend, 'broken', async () => {
        await writeText(backend, 'tester/repo/main/w.txt', 'w');
        throw new Error('body failed');
      }),
    ).rejects.toThrow('body failed');

    expect(abort).toHaveBeenCalledTimes(1);
    expect(end).not.toHaveBeenCalled();
    expect(backend.inTransaction).toBe(false);
    expect(await messages()).toEqual(['seed files', 'Initialize main']);
  });

  it('just runs the body on plain backends', async () => {
    expect(await withTransaction(mem, 'ignored', async () => 42)).toBe(42);
  });
});

describe('move', () => {
  it('refuses to cross protocols and touches nothing', async () => {
    await writeText(mem, 'a.txt', 'a');
    const report = await move(env, 'memory://a.txt', 'xet://tester/repo/main/a.txt');

    const error = 'Unable to move between different protocols memory, xet. You may want to copy instead';
    expect(report.errors).toEqual([{ path: 'memory://a.txt', error }]);
    expect(logger.messages('error')).toEqual([error]);
    expect(await readText(mem, 'a.txt')).toBe('a');
    expect(await messages()).toEqual(['seed files', 'Initialize main']);
  });

  it('treats aliases of one backend as the same protocol', async () => {
    const from = path.join(tmpDir, 'a.txt');
    const to = path.join(tmpDir, 'b.txt');
    fs.writeFileSync(from, 'a');

    const report = await move(env, `file://${from}`, `local://${to}`);

    expect(report.errors).toEqual([]);
    expect(report.moved).toEqual([{ src: `file://${from}`, dest: `local://${to}` }]);
    expect(fs.existsSync(from)).toBe(false);
    expect(fs.readFileSync(to, 'utf8')).toBe('a');
  });

  it('moves inside a repository with a default message', async () => {
    const report = await move(env, 'xet://tester/repo/main/data.txt', 'xet://tester/repo/main/moved.txt');
    expect(report.moved).toEqual([
      { src: 'xet://tester/repo/main/data.txt', dest: 'xet://tester/repo/main/moved.txt' },
    ]);
    expect((await messages())[0]).toBe('move xet://tester/repo/main/data.txt to xet://tester/repo/main/moved.txt');
    expect(await readText(backend, 'tester/repo/main/moved.txt')).toBe('data');
  });

  it('notes recursive moves in the message', async () => {
    await move(env, 'xet://tester/repo/main/dir', 'xet://tester/repo/main/other', { recursive: true });
    expect((await messages())[0]).toBe('move xet://tester/repo/main/dir to xet://tester/repo/main/other recursively');
  });

  it('reports a failed move', async () => {
    const report = await move(env, 'xet://tester/repo/main/nope', 'xet://tester/repo/main/x');
    expect(report.errors).toEqual([
      { path: 'xet://tester/repo/main/nope', error: 'File not found: tester/repo/main/nope' },
    ]);
    expect(report.moved).toEqual([]);
  });
});

describe('remove', () => {
  it('removes every path in one transaction', async () => {
    const pinned = pinnedEnvironment();
    const begin = vi.spyOn(backend, 'beginTransaction');
    const end = vi.spyOn(backend, 'endTransaction');
    const paths = ['xet://tester/repo/main/data.txt', 'xet://tester/repo/main/dir'];

    const report = await remove(pinned, paths, { recursive: true });

    expect(begin).toHaveBeenCalledTimes(1);
    expect(end).toHaveBeenCalledTimes(1);
    expect(report.removed).toEqual(paths);
    expect(await messages()).toEqual([
      'delete xet://tester/repo/main/data.txt, xet://tester/repo/main/dir',
      'seed files',
      'Initialize main',
    ]);
    expect((await backend.list('tester/repo/main')).map((e) => e.name)).toEqual([
      'tester/repo/main/.gitattributes',
    ]);
  });

  it('refuses branch roots before opening a transaction', async () => {
    const pinned = pinnedEnvironment();
    const begin = vi.spyOn(backend, 'beginTransaction');
    const report = await remove(pinned, ['xet://tester/repo/main/data.txt', 'xet://tester/repo/main']);

    expect(begin).not.toHaveBeenCalled();
    expect(report.errors).toEqual([
      {
        path: 'xet://tester/repo/main',
        error: 'Cannot delete branch main with rm: deleting a branch is irreversible and its history would be lost',
      },
    ]);
    expect(await readText(backend, 'tester/repo/main/data.txt')).toBe('data');
  });

  it('accepts aliases of the first path\'s backend', async () => {
    await writeText(mem, 'one.txt', '1');
    await writeText(mem, 'two.txt', '2');
    const report = await remove(env, ['memory://one.txt', 'mem://two.txt']);
    expect(report.errors).toEqual([]);
    expect(report.removed).toEqual(['memory://one.txt', 'mem://two.txt']);
    expect(store.files.has('one.txt')).toBe(false);
    expect(store.files.has('two.txt')).toBe(false);
  });

  it('refuses mixed protocols', async () => {
    const report = await remove(env, ['xet://tester/repo/main/data.txt', 'memory://x']);
    expect(report.errors).toEqual([
      { path: 'memory://x', error: 'Cannot delete across protocols: memory://x is not on xet' },
    ]);
  });

  it('a failure rolls back the whole batch', async () => {
    const report = await remove(env, ['xet://tester/repo/main/data.txt', 'xet://tester/repo/main/nope']);
    expect(report.removed).toEqual([]);
    expect(report.errors).toEqual([
      { path: 'xet://tester/repo/main/nope', error: 'File not found: tester/repo/main/nope' },
    ]);
    expect(await readText(backend, 'tester/repo/main/data.txt')).toBe('data');
    expect(await messages()).toEqual(['seed files', 'Initialize main']);
  });

  it('works on plain backends', async () => {
    await writeText(mem, 'gone/one.txt', '1');
    const report = await remove(env, ['memory://gone'], { recursive: true });
    expect(report.removed).toEqual(['memory://gone']);
    expect(await mem.isDirectory('gone')).toBe(false);
  });

  it('an empty list does nothing', async () => {
    expect((await remove(env, [])).errors).toEqual([]);
  });
});

describe('duplicate', () => {
  beforeEach(async () => {
    await makeRepository(env, 'xet://alice/shared');
  });

  it('defaults the target to the current user and sets visibility', async () => {
    const report = await duplicate(env, 'xet://alice/shared', undefined, { private: true, verbose: true });

    expect(report.copied).toEqual([{ src: 'xet://alice/shared', dest: 'xet://tester/shared' }]);
    expect(await backend.getRepositoryAttribute('tester/shared', 'private')).toBe(true);
    expect(logger.messages('info')).toEqual([
      'Duplicating to xet://tester/shared',
      'Duplicate Success. Changing permissions...',
      'Repo permissions set successfully',
    ]);
  });

  it('public clears the private flag', async () => {
    await duplicate(env, 'xet://alice/shared', 'xet://bob/shared', { public: true });
    expect(await backend.getRepositoryAttribute('bob/shared', 'private')).toBe(false);
  });

  it('leaves visibility alone when neither flag is given', async () => {
    await duplicate(env, 'xet://alice/shared', 'xet://bob/shared');
    expect(await backend.getRepositoryAttribute('bob/shared', 'private')).toBeUndefined();
  });

  it('a visibility failure is a warning', async () => {
    const pinned = pinnedEnvironment();
    vi.spyOn(backend, 'setRepositoryAttribute').mockRejectedValue(new Error('denied'));
    const report = await duplicate(pinned, 'xet://alice/shared', undefined, { private: true });

    const warning =
      'Could not set repository permissions: denied. Change them at https://hub.test/tester/shared/settings';
    expect(report.warnings).toEqual([{ path: 'xet://tester/shared', error: warning }]);
    expect(report.copied).toHaveLength(1);
    expect(logger.messages('warn')).toEqual([warning]);
  });

  it('needs a repository URI', async () => {
    await expect(duplicate(env, 'memory://bucket')).rejects.toThrow(UnsupportedOperationError);
    await expect(duplicate(env, 'memory://bucket')).rejects.toThrow('memory://bucket is not a repository URI');
  });
});

describe('queries', () => {
  it('info and list resolve through the registry', async () => {
    expect((await info(env, 'xet://tester/repo/main/data.txt')).size).toBe(4);
    const names = (await list(env, 'xet://tester/repo/main')).map((e) => e.name);
    expect(names).toEqual([
      'tester/repo/main/.gitattributes',
      'tester/repo/main/data.txt',
      'tester/repo/main/dir',
    ]);
  });

  it('history needs a repository URI', async () => {
    expect((await history(env, 'xet://tester/repo/main', 1)).map((h) => h.message)).toEqual(['seed files']);
    await expect(history(env, 'memory://x')).rejects.toThrow('memory://x is not a repository URI');
  });
});
