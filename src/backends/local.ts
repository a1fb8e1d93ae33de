/**
 * Local disk backend on top of `node:fs`.
 */

import * as fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import {
  FileExistsError,
  FileNotFoundError,
  IsADirectoryError,
  isErrno,
  type Backend,
  type BackendCapabilities,
  type EntryInfo,
  type OpenMode,
  type OpenOptions,
  type ReadHandle,
  type WriteHandle,
} from '../types.js';
import { parentPath, finalSegment } from '../paths.js';
import { filterEntries } from '../glob.js';

class LocalReader implements ReadHandle {
  constructor(private readonly _handle: FileHandle) {}

  async read(size: number): Promise<Uint8Array> {
    const buffer = Buffer.alloc(size);
    const { bytesRead } = await this._handle.read(buffer, 0, size, null);
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    await this._handle.close();
  }
}

class LocalWriter implements WriteHandle {
  private _closed = false;

  constructor(
    private readonly _handle: FileHandle,
    private readonly _path: string,
  ) {}

  async write(chunk: Uint8Array): Promise<void> {
    if (this._closed) throw new Error('I/O operation on closed writer.');
    await this._handle.write(chunk);
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    await this._handle.close();
  }

  async abort(): Promise<void> {
    if (!this._closed) {
      this._closed = true;
      await this._handle.close();
    }
    await fs.promises.rm(this._path, { force: true });
  }
}

/**
 * Backend for `file://` URIs and bare paths. Paths are absolute OS paths.
 */
export class LocalBackend implements Backend {
  static readonly protocols = ['file', 'local'] as const;

  protocol: string = 'file';
  readonly capabilities: BackendCapabilities = { transactions: false };

  toString(): string {
    return `LocalBackend('${this.protocol}')`;
  }

  private async _stat(path: string): Promise<fs.Stats> {
    try {
      return await fs.promises.stat(path);
    } catch (err) {
      if (isErrno(err, 'ENOENT')) throw new FileNotFoundError(path);
      throw err;
    }
  }

  private _entry(path: string, stat: fs.Stats): EntryInfo {
    return stat.isDirectory()
      ? { name: path, type: 'directory', size: 0 }
      : { name: path, type: 'file', size: stat.size };
  }

  async info(path: string): Promise<EntryInfo> {
    return this._entry(path, await this._stat(path));
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await fs.promises.stat(path)).isDirectory();
    } catch {
      return false;
    }
  }

  open(path: string, mode: 'rb'): Promise<ReadHandle>;
  open(path: string, mode: 'wb', opts?: OpenOptions): Promise<WriteHandle>;
  async open(path: string, mode: OpenMode, opts?: OpenOptions): Promise<ReadHandle | WriteHandle> {
    if (mode === 'rb') {
      const stat = await this._stat(path);
      if (stat.isDirectory()) throw new IsADirectoryError(path);
      return new LocalReader(await fs.promises.open(path, 'r'));
    }
    if (opts?.autoMkdir) {
      const parent = parentPath(path);
      if (parent) await fs.promises.mkdir(parent, { recursive: true });
    }
    return new LocalWriter(await fs.promises.open(path, 'w'), path);
  }

  async enumerate(path: string): Promise<Map<string, EntryInfo>> {
    const result = new Map<string, EntryInfo>();
    const stat = await this._stat(path);
    if (!stat.isDirectory()) {
      result.set(path, this._entry(path, stat));
      return result;
    }

    const recurse = async (dir: string): Promise<void> => {
      const names = (await fs.promises.readdir(dir)).sort();
      for (const name of names) {
        const full = dir === '/' ? `/${name}` : `${dir}/${name}`;
        let entryStat: fs.Stats;
        try {
          entryStat = await fs.promises.stat(full);
        } catch {
          continue; // dangling symlink or raced delete
        }
        result.set(full, this._entry(full, entryStat));
        if (entryStat.isDirectory()) await recurse(full);
      }
    };
    await recurse(path);
    return result;
  }

  async list(path: string): Promise<EntryInfo[]> {
    const names = (await fs.promises.readdir(path)).sort();
    const entries: EntryInfo[] = [];
    for (const name of names) {
      const full = join(path, name);
      try {
        entries.push(this._entry(full, await fs.promises.stat(full)));
      } catch {
        continue;
      }
    }
    return entries;
  }

  async glob(pattern: string): Promise<Map<string, EntryInfo>> {
    const dir = parentPath(pattern) || '.';
    let entries: EntryInfo[];
    try {
      entries = await this.list(dir);
    } catch (err) {
      if (isErrno(err, 'ENOENT') || isErrno(err, 'ENOTDIR')) return new Map();
      throw err;
    }
    return filterEntries(entries, finalSegment(pattern));
  }

  async makeDirectories(path: string, opts?: { existOk?: boolean }): Promise<void> {
    if (!path) return;
    const existOk = opts?.existOk ?? true;
    if (!existOk && (await this.isDirectory(path))) {
      throw new FileExistsError(path);
    }
    await fs.promises.mkdir(path, { recursive: true });
  }

  async move(srcPath: string, dstPath: string): Promise<void> {
    await this._stat(srcPath);
    const parent = parentPath(dstPath);
    if (parent) await fs.promises.mkdir(parent, { recursive: true });
    await fs.promises.rename(srcPath, dstPath);
  }

  async remove(path: string, opts?: { recursive?: boolean }): Promise<void> {
    const stat = await this._stat(path);
    if (stat.isDirectory() && !opts?.recursive) throw new IsADirectoryError(path);
    await fs.promises.rm(path, { recursive: opts?.recursive ?? false });
  }
}
