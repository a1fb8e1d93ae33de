import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import {
  LocalBackend,
  MemoryBackend,
  MemoryStore,
  FileExistsError,
  FileNotFoundError,
  IsADirectoryError,
} from '../src/index.js';
import { fs, makeTmpDir, rmTmpDir, readText, writeText, toBytes } from './helpers.js';

describe('MemoryBackend', () => {
  let mem: MemoryBackend;

  beforeEach(async () => {
    mem = new MemoryBackend(new MemoryStore());
    await writeText(mem, 'a/x.txt', 'xx');
    await writeText(mem, 'a/sub/y.txt', 'yyy');
  });

  it('info for files and implicit directories', async () => {
    expect(await mem.info('a/x.txt')).toEqual({ name: 'a/x.txt', type: 'file', size: 2 });
    expect(await mem.info('a/sub')).toEqual({ name: 'a/sub', type: 'directory', size: 0 });
    await expect(mem.info('a/nope')).rejects.toThrow(FileNotFoundError);
  });

  it('enumerate lists descendants keyed by the caller path form', async () => {
    const result = await mem.enumerate('/a');
    expect([...result.keys()]).toEqual(['/a/sub', '/a/sub/y.txt', '/a/x.txt']);
    expect(result.get('/a/sub/y.txt')?.size).toBe(3);
  });

  it('list gives immediate children', async () => {
    const names = (await mem.list('a')).map((e) => e.name);
    expect(names).toEqual(['a/sub', 'a/x.txt']);
  });

  it('glob expands the final segment', async () => {
    const result = await mem.glob('a/*.txt');
    expect([...result.keys()]).toEqual(['a/x.txt']);
    expect((await mem.glob('missing/*')).size).toBe(0);
  });

  it('write without autoMkdir needs the parent', async () => {
    await expect(mem.open('b/z.txt', 'wb')).rejects.toThrow(FileNotFoundError);
    await mem.makeDirectories('b');
    const writer = await mem.open('b/z.txt', 'wb');
    await writer.write(toBytes('z'));
    await writer.close();
    expect(await readText(mem, 'b/z.txt')).toBe('z');
  });

  it('aborted writes leave nothing', async () => {
    const writer = await mem.open('a/partial.txt', 'wb');
    await writer.write(toBytes('half'));
    await writer.abort();
    await expect(mem.info('a/partial.txt')).rejects.toThrow(FileNotFoundError);
  });

  it('makeDirectories existOk=false on an existing directory', async () => {
    await expect(mem.makeDirectories('a', { existOk: false })).rejects.toThrow(FileExistsError);
  });

  it('move renames a directory prefix', async () => {
    await mem.move('a', 'c');
    expect(await readText(mem, 'c/sub/y.txt')).toBe('yyy');
    expect(await mem.isDirectory('a')).toBe(false);
  });

  it('remove needs recursive for directories', async () => {
    await expect(mem.remove('a')).rejects.toThrow(IsADirectoryError);
    await mem.remove('a', { recursive: true });
    expect(await mem.isDirectory('a')).toBe(false);
  });
});

describe('LocalBackend', () => {
  let tmpDir: string;
  let local: LocalBackend;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    local = new LocalBackend();
    fs.mkdirSync(path.join(tmpDir, 'a', 'sub'), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, 'a', 'x.txt'), 'xx');
    fs.writeFileSync(path.join(tmpDir, 'a', 'sub', 'y.txt'), 'yyy');
  });

  afterEach(() => rmTmpDir(tmpDir));

  it('info', async () => {
    const p = path.join(tmpDir, 'a', 'x.txt');
    expect(await local.info(p)).toEqual({ name: p, type: 'file', size: 2 });
    await expect(local.info(path.join(tmpDir, 'nope'))).rejects.toThrow(FileNotFoundError);
  });

  it('enumerate walks the tree in order', async () => {
    const root = path.join(tmpDir, 'a');
    const result = await local.enumerate(root);
    expect([...result.keys()]).toEqual([`${root}/sub`, `${root}/sub/y.txt`, `${root}/x.txt`]);
    expect(result.get(`${root}/sub`)?.type).toBe('directory');
  });

  it('glob on a missing directory is empty', async () => {
    expect((await local.glob(path.join(tmpDir, 'missing', '*'))).size).toBe(0);
  });

  it('write with autoMkdir creates parents', async () => {
    const p = path.join(tmpDir, 'new', 'deep', 'f.txt');
    await writeText(local, p, 'hello');
    expect(fs.readFileSync(p, 'utf8')).toBe('hello');
  });

  it('abort removes the partial file', async () => {
    const p = path.join(tmpDir, 'partial.txt');
    const writer = await local.open(p, 'wb');
    await writer.write(toBytes('half'));
    await writer.abort();
    expect(fs.existsSync(p)).toBe(false);
  });

  it('reading a directory fails', async () => {
    await expect(local.open(path.join(tmpDir, 'a'), 'rb')).rejects.toThrow(IsADirectoryError);
  });

  it('move and remove', async () => {
    const from = path.join(tmpDir, 'a', 'x.txt');
    const to = path.join(tmpDir, 'b', 'x.txt');
    await local.move(from, to);
    expect(fs.readFileSync(to, 'utf8')).toBe('xx');
    await expect(local.remove(path.join(tmpDir, 'a'))).rejects.toThrow(IsADirectoryError);
    await local.remove(path.join(tmpDir, 'a'), { recursive: true });
    expect(fs.existsSync(path.join(tmpDir, 'a'))).toBe(false);
  });
});
