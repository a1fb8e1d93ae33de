/**
 * In-process object store backend.
 *
 * Objects live in a flat key space; directories are implicit prefixes
 * plus any markers created with `makeDirectories`. A `MemoryStore` can be
 * shared by several handles so that a source and a destination resolved
 * separately see the same data.
 */

import {
  FileExistsError,
  FileNotFoundError,
  IsADirectoryError,
  NotADirectoryError,
  type Backend,
  type BackendCapabilities,
  type EntryInfo,
  type OpenMode,
  type OpenOptions,
  type ReadHandle,
  type WriteHandle,
} from '../types.js';
import { joinPath, parentPath, finalSegment } from '../paths.js';
import { filterEntries } from '../glob.js';
import { BufferReader, BufferWriter } from '../bytes.js';

export class MemoryStore {
  readonly files = new Map<string, Uint8Array>();
  readonly dirs = new Set<string>();
}

/** Canonical key: no leading or trailing slashes, `''` for the root. */
function toKey(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}

function ancestors(key: string): string[] {
  const out: string[] = [];
  let parent = parentPath(key);
  while (parent && parent !== '/') {
    out.push(parent);
    parent = parentPath(parent);
  }
  return out;
}

export class MemoryBackend implements Backend {
  static readonly protocols = ['memory', 'mem'] as const;

  protocol: string = 'memory';
  readonly capabilities: BackendCapabilities = { transactions: false };
  readonly store: MemoryStore;

  constructor(store: MemoryStore = new MemoryStore()) {
    this.store = store;
  }

  toString(): string {
    return `MemoryBackend('${this.protocol}')`;
  }

  private _isDirKey(key: string): boolean {
    if (key === '' || this.store.dirs.has(key)) return true;
    const prefix = `${key}/`;
    for (const file of this.store.files.keys()) {
      if (file.startsWith(prefix)) return true;
    }
    return false;
  }

  /** Keys strictly below `key`, files and directories, sorted. */
  private _descendants(key: string): { files: string[]; dirs: string[] } {
    const under = (k: string) => (key === '' ? k !== '' : k.startsWith(`${key}/`));
    const dirs = new Set<string>();
    const files: string[] = [];
    for (const file of this.store.files.keys()) {
      if (!under(file)) continue;
      files.push(file);
      for (const dir of ancestors(file)) {
        if (under(dir)) dirs.add(dir);
      }
    }
    for (const dir of this.store.dirs) {
      if (under(dir)) dirs.add(dir);
    }
    return { files: files.sort(), dirs: [...dirs].sort() };
  }

  private _relName(key: string, baseKey: string, basePath: string): string {
    const rel = baseKey === '' ? key : key.slice(baseKey.length + 1);
    return joinPath(basePath, rel);
  }

  async info(path: string): Promise<EntryInfo> {
    const key = toKey(path);
    const data = this.store.files.get(key);
    if (data) return { name: path, type: 'file', size: data.length };
    if (this._isDirKey(key)) return { name: path, type: 'directory', size: 0 };
    throw new FileNotFoundError(path);
  }

  async isDirectory(path: string): Promise<boolean> {
    return this._isDirKey(toKey(path));
  }

  open(path: string, mode: 'rb'): Promise<ReadHandle>;
  open(path: string, mode: 'wb', opts?: OpenOptions): Promise<WriteHandle>;
  async open(path: string, mode: OpenMode, opts?: OpenOptions): Promise<ReadHandle | WriteHandle> {
    const key = toKey(path);
    if (mode === 'rb') {
      const data = this.store.files.get(key);
      if (data) return new BufferReader(data);
      if (this._isDirKey(key)) throw new IsADirectoryError(path);
      throw new FileNotFoundError(path);
    }

    if (this._isDirKey(key)) throw new IsADirectoryError(path);
    const parent = parentPath(key);
    if (parent) {
      if (this.store.files.has(parent)) throw new NotADirectoryError(parent);
      if (opts?.autoMkdir) {
        await this.makeDirectories(parent);
      } else if (!this._isDirKey(parent)) {
        throw new FileNotFoundError(parent);
      }
    }
    return new BufferWriter(async (data) => {
      this.store.files.set(key, data);
    });
  }

  async enumerate(path: string): Promise<Map<string, EntryInfo>> {
    const key = toKey(path);
    const result = new Map<string, EntryInfo>();
    const data = this.store.files.get(key);
    if (data) {
      result.set(path, { name: path, type: 'file', size: data.length });
      return result;
    }
    if (!this._isDirKey(key)) throw new FileNotFoundError(path);

    const { files, dirs } = this._descendants(key);
    const entries: EntryInfo[] = [
      ...dirs.map((d): EntryInfo => ({
        name: this._relName(d, key, path),
        type: 'directory',
        size: 0,
      })),
      ...files.map((f): EntryInfo => ({
        name: this._relName(f, key, path),
        type: 'file',
        size: this.store.files.get(f)?.length ?? 0,
      })),
    ];
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) result.set(entry.name, entry);
    return result;
  }

  async list(path: string): Promise<EntryInfo[]> {
    const key = toKey(path);
    if (this.store.files.has(key)) throw new NotADirectoryError(path);
    if (!this._isDirKey(key)) throw new FileNotFoundError(path);
    const all = await this.enumerate(path);
    const depth = (name: string) => name.split('/').length;
    const base = depth(joinPath(path, 'x'));
    return [...all.values()].filter((e) => depth(e.name) === base);
  }

  async glob(pattern: string): Promise<Map<string, EntryInfo>> {
    const dir = parentPath(pattern);
    const key = toKey(dir);
    if (!this._isDirKey(key) || this.store.files.has(key)) return new Map();
    return filterEntries(await this.list(dir), finalSegment(pattern));
  }

  async makeDirectories(path: string, opts?: { existOk?: boolean }): Promise<void> {
    const key = toKey(path);
    if (key === '') return;
    if (this.store.files.has(key)) throw new FileExistsError(path);
    if (opts?.existOk === false && this._isDirKey(key)) throw new FileExistsError(path);
    for (const dir of [key, ...ancestors(key)]) {
      if (this.store.files.has(dir)) throw new NotADirectoryError(dir);
      this.store.dirs.add(dir);
    }
  }

  async move(srcPath: string, dstPath: string): Promise<void> {
    const src = toKey(srcPath);
    const dst = toKey(dstPath);
    const data = this.store.files.get(src);
    if (data) {
      this.store.files.delete(src);
      this.store.files.set(dst, data);
      return;
    }
    if (!this._isDirKey(src) || src === '') throw new FileNotFoundError(srcPath);

    const { files, dirs } = this._descendants(src);
    for (const file of files) {
      const moved = this.store.files.get(file);
      this.store.files.delete(file);
      if (moved) this.store.files.set(`${dst}${file.slice(src.length)}`, moved);
    }
    for (const dir of [src, ...dirs]) {
      if (this.store.dirs.delete(dir)) this.store.dirs.add(`${dst}${dir.slice(src.length)}`);
    }
  }

  async remove(path: string, opts?: { recursive?: boolean }): Promise<void> {
    const key = toKey(path);
    if (this.store.files.delete(key)) return;
    if (!this._isDirKey(key)) throw new FileNotFoundError(path);
    if (!opts?.recursive) throw new IsADirectoryError(path);

    const { files, dirs } = this._descendants(key);
    for (const file of files) this.store.files.delete(file);
    for (const dir of dirs) this.store.dirs.delete(dir);
    this.store.dirs.delete(key);
  }
}
