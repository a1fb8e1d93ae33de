/**
 * URI resolution: `tag://path` or a bare local path to a backend handle
 * plus a backend-relative path.
 */

import { resolve as resolveLocal } from 'node:path';
import { BackendNotFoundError, type Backend } from './types.js';
import { LocalBackend } from './backends/local.js';
import { MemoryBackend, MemoryStore } from './backends/memory.js';
import { XetBackend } from './xet/backend.js';
import type { XetSession } from './xet/store.js';
import { NullLogger, type Logger } from './logger.js';

export const SEPARATOR = '://';

export interface ResolvedUri {
  backend: Backend;
  path: string;
  /** First alias of the backend's registration, whichever alias was typed. */
  canonical: string;
}

export type BackendFactory = () => Backend;

interface Registration {
  protocols: readonly string[];
  create: BackendFactory;
}

/**
 * Split a URI on its first separator. A bare path has tag `null`.
 *
 * More than one separator is reported through `logger`; everything after
 * the first one is kept as the path.
 */
export function splitUri(
  uri: string,
  logger: Logger = new NullLogger(),
): { tag: string | null; path: string } {
  const idx = uri.indexOf(SEPARATOR);
  if (idx < 0) return { tag: null, path: uri };
  const tag = uri.slice(0, idx);
  const path = uri.slice(idx + SEPARATOR.length);
  if (path.includes(SEPARATOR)) {
    logger.error(`Invalid URL: ${uri}`);
  }
  return { tag, path };
}

/**
 * Maps protocol tags (and their aliases) to backend factories.
 */
export class BackendRegistry {
  private readonly _byTag = new Map<string, Registration>();
  private readonly _logger: Logger;

  constructor(opts: { logger?: Logger } = {}) {
    this._logger = opts.logger ?? new NullLogger();
  }

  /**
   * Register a factory under every alias it answers to. The first alias
   * is the canonical protocol.
   */
  register(protocols: readonly string[], create: BackendFactory): void {
    const registration: Registration = { protocols, create };
    for (const tag of protocols) this._byTag.set(tag, registration);
  }

  has(tag: string): boolean {
    return this._byTag.has(tag);
  }

  get protocols(): string[] {
    return [...this._byTag.keys()].sort();
  }

  /**
   * Build a fresh handle for `tag`.
   *
   * When the backend answers to several aliases, the handle's protocol is
   * set to the tag that was asked for. Compare {@link canonicalProtocol}
   * to tell whether two handles reach the same backend.
   *
   * @throws {BackendNotFoundError} If no backend answers to `tag`.
   */
  backend(tag: string): Backend {
    const registration = this._byTag.get(tag);
    if (!registration) throw new BackendNotFoundError(tag);
    const backend = registration.create();
    if (backend.protocol !== tag && registration.protocols.includes(tag)) {
      backend.protocol = tag;
    }
    return backend;
  }

  /**
   * The first alias registered alongside `tag`.
   *
   * @throws {BackendNotFoundError} If no backend answers to `tag`.
   */
  canonicalProtocol(tag: string): string {
    const registration = this._byTag.get(tag);
    if (!registration) throw new BackendNotFoundError(tag);
    return registration.protocols[0] ?? tag;
  }

  /**
   * Resolve a URI into a handle and a backend-relative path.
   *
   * A URI without a separator is a local path, made absolute against the
   * working directory and bound to the `file` backend.
   */
  resolve(uri: string): ResolvedUri {
    const { tag, path } = splitUri(uri, this._logger);
    if (tag === null) {
      return { backend: this.backend('file'), path: resolveLocal(path), canonical: this.canonicalProtocol('file') };
    }
    return { backend: this.backend(tag), path, canonical: this.canonicalProtocol(tag) };
  }
}

/**
 * Registry with the built-in backends: local disk, an in-process object
 * store shared by every handle from this registry, and the repository
 * backend bound to `session`.
 */
export function createDefaultRegistry(
  session: XetSession,
  opts: { logger?: Logger; memoryStore?: MemoryStore } = {},
): BackendRegistry {
  const registry = new BackendRegistry({ logger: opts.logger });
  const memoryStore = opts.memoryStore ?? new MemoryStore();
  registry.register(LocalBackend.protocols, () => new LocalBackend());
  registry.register(MemoryBackend.protocols, () => new MemoryBackend(memoryStore));
  registry.register(XetBackend.protocols, () => new XetBackend(session, { logger: opts.logger }));
  return registry;
}
