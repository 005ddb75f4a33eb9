/**
 * Temporary file store
 *
 * Files are named `<prefix><uuid><suffix>` and created with the exclusive flag,
 * so concurrent requests never collide in the shared directory. Resources are
 * handed out through a TempScope; closing the scope releases everything it
 * allocated exactly once.
 */
import { randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from '../utils/logger';

const logger = createLogger('TEMP');

export interface TempResource {
  readonly path: string;
  readonly suffix: string;
}

export interface TempFileStoreOptions {
  baseDir?: string;
  prefix?: string;
}

export class TempFileStore {
  readonly baseDir: string;
  readonly prefix: string;

  constructor(options: TempFileStoreOptions = {}) {
    this.baseDir = options.baseDir || os.tmpdir();
    this.prefix = options.prefix || 'convert_';
  }

  async allocate(suffixHint = ''): Promise<TempResource> {
    await fs.mkdir(this.baseDir, { recursive: true });

    const suffix = sanitizeSuffix(suffixHint);
    const filePath = path.join(this.baseDir, `${this.prefix}${randomUUID()}${suffix}`);
    const handle = await fs.open(filePath, 'wx');
    await handle.close();

    logger.debug('Allocated temp file', { path: filePath });
    return { path: filePath, suffix };
  }

  async write(resource: TempResource, bytes: Uint8Array): Promise<void> {
    await fs.writeFile(resource.path, bytes);
  }

  /**
   * Open the resource for sequential writes, truncating existing contents
   */
  async openForWrite(resource: TempResource): Promise<fs.FileHandle> {
    return fs.open(resource.path, 'w');
  }

  async release(resource: TempResource): Promise<void> {
    await fs.rm(resource.path, { force: true });
    logger.debug('Released temp file', { path: resource.path });
  }

  /**
   * Number of files in the base directory carrying this store's prefix
   */
  async count(): Promise<number> {
    try {
      const entries = await fs.readdir(this.baseDir);
      return entries.filter(name => name.startsWith(this.prefix)).length;
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }
  }

  scope(): TempScope {
    return new TempScope(this);
  }

  /**
   * Run `fn` with a fresh scope and release everything it allocated afterwards,
   * whether `fn` resolved or threw.
   */
  async withScope<T>(fn: (scope: TempScope) => Promise<T>): Promise<T> {
    const scope = this.scope();
    try {
      return await fn(scope);
    } finally {
      await scope.close();
    }
  }
}

/**
 * Request-scoped owner of temp resources
 */
export class TempScope {
  private readonly resources: TempResource[] = [];
  private closed = false;

  constructor(private readonly store: TempFileStore) {}

  async allocate(suffixHint = ''): Promise<TempResource> {
    if (this.closed) {
      throw new Error('Temp scope already closed');
    }
    const resource = await this.store.allocate(suffixHint);
    this.resources.push(resource);
    return resource;
  }

  write(resource: TempResource, bytes: Uint8Array): Promise<void> {
    return this.store.write(resource, bytes);
  }

  openForWrite(resource: TempResource): Promise<fs.FileHandle> {
    return this.store.openForWrite(resource);
  }

  get size(): number {
    return this.resources.length;
  }

  /**
   * Release every resource once. Removal failures are logged rather than thrown
   * so they never mask the request's own outcome.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const pending = this.resources.splice(0);
    const results = await Promise.allSettled(pending.map(resource => this.store.release(resource)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.warn('Failed to remove temp file', {
          path: pending[index].path,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason)
        });
      }
    });
  }
}

function sanitizeSuffix(suffix: string): string {
  const trimmed = suffix.trim();
  if (!trimmed) return '';
  const withDot = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
  return /^\.[A-Za-z0-9]{1,16}$/.test(withDot) ? withDot.toLowerCase() : '';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
