import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { XetBackend, type Backend, type XetSession } from '../src/index.js';
import { createRepository } from '../src/xet/store.js';

const enc = new TextEncoder();
const dec = new TextDecoder();

export function toBytes(s: string): Uint8Array {
  return enc.encode(s);
}

export function fromBytes(b: Uint8Array): string {
  return dec.decode(b);
}

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'crossfs-test-'));
}

export function rmTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testSession(storageRoot: string): XetSession {
  return { storageRoot, user: 'tester', email: 'tester@example.com', host: 'hub.test' };
}

/** Read a whole file through a backend handle. */
export async function readAll(backend: Backend, p: string): Promise<Uint8Array> {
  const reader = await backend.open(p, 'rb');
  const chunks: Uint8Array[] = [];
  for (;;) {
    const chunk = await reader.read(64 * 1024);
    if (chunk.length === 0) break;
    chunks.push(chunk);
  }
  await reader.close();
  return Buffer.concat(chunks);
}

export async function readText(backend: Backend, p: string): Promise<string> {
  return fromBytes(await readAll(backend, p));
}

export async function writeText(backend: Backend, p: string, text: string): Promise<void> {
  const writer = await backend.open(p, 'wb', { autoMkdir: true });
  await writer.write(toBytes(text));
  await writer.close();
}

/**
 * A storage root holding `tester/repo` with files committed on `main`:
 *   data.txt, dir/a.txt, dir/b.txt, dir/sub/c.txt
 */
export async function freshRepo(): Promise<{
  backend: XetBackend;
  session: XetSession;
  tmpDir: string;
}> {
  const tmpDir = makeTmpDir();
  const session = testSession(tmpDir);
  await createRepository(session, { owner: 'tester', repo: 'repo' }, { name: 'tester', email: 'tester@example.com' });
  const backend = new XetBackend(session);
  backend.beginTransaction('seed files');
  await writeText(backend, 'tester/repo/main/data.txt', 'data');
  await writeText(backend, 'tester/repo/main/dir/a.txt', 'aaa');
  await writeText(backend, 'tester/repo/main/dir/b.txt', 'bbb');
  await writeText(backend, 'tester/repo/main/dir/sub/c.txt', 'ccc');
  await backend.endTransaction();
  return { backend, session, tmpDir };
}

export { fs };
