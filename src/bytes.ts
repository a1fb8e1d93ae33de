/**
 * Byte helpers shared by buffered writers.
 */

export function concatChunks(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 0) return new Uint8Array(0);
  if (chunks.length === 1) return chunks[0];
  const total = chunks.reduce((n, c) => n + c.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}

/**
 * Sequential reader over an in-memory buffer.
 */
export class BufferReader {
  private _offset = 0;

  constructor(private readonly _data: Uint8Array) {}

  async read(size: number): Promise<Uint8Array> {
    const chunk = this._data.subarray(this._offset, this._offset + size);
    this._offset += chunk.length;
    return chunk;
  }

  async close(): Promise<void> {}
}

/**
 * Buffered writer: accumulates chunks and hands the whole payload to
 * `commit` on close.
 */
export class BufferWriter {
  private _chunks: Uint8Array[] = [];
  private _closed = false;

  constructor(private readonly _commit: (data: Uint8Array) => Promise<void>) {}

  async write(chunk: Uint8Array): Promise<void> {
    if (this._closed) throw new Error('I/O operation on closed writer.');
    this._chunks.push(chunk);
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    const data = concatChunks(this._chunks);
    this._chunks = [];
    await this._commit(data);
  }

  async abort(): Promise<void> {
    this._closed = true;
    this._chunks = [];
  }
}
