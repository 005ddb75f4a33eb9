/**
 * Bounded fetcher
 *
 * Streams a remote document (or an in-memory upload) into a scoped temp file,
 * failing as soon as the byte ceiling is crossed. The temp file belongs to the
 * caller's TempScope, which removes it on every exit path.
 */
import * as path from 'path';
import { FetchError, OversizeError, ValidationError, errorMessage } from '../errors';
import { guessSuffix } from '../utils/formatSniffer';
import { createLogger } from '../utils/logger';
import { TempResource, TempScope } from './TempFileStore';

const logger = createLogger('FETCH');

export const DEFAULT_CHUNK_SIZE = 256 * 1024;

const GENERIC_SUFFIX = '.bin';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface BoundedFetcherOptions {
  fetchImpl?: FetchFn;
  /** Largest slice handed to disk in one write */
  chunkSize?: number;
  /** Budget for receiving response headers; capped by the request's total timeout */
  connectTimeoutSeconds?: number;
}

export interface FetchLimits {
  maxBytes: number;
  timeoutSeconds: number;
}

export interface FetchedFile {
  resource: TempResource;
  bytesWritten: number;
  contentType: string | null;
  status: number;
}

export class BoundedFetcher {
  private readonly fetchImpl: FetchFn;
  private readonly chunkSize: number;
  private readonly connectTimeoutSeconds: number;

  constructor(options: BoundedFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl || ((input, init) => fetch(input, init));
    this.chunkSize = options.chunkSize || DEFAULT_CHUNK_SIZE;
    this.connectTimeoutSeconds = options.connectTimeoutSeconds || 10;
  }

  async fetch(url: string, scope: TempScope, limits: FetchLimits): Promise<FetchedFile> {
    assertHttpUrl(url);

    const controller = new AbortController();
    let timedOut: string | null = null;
    const abortAfter = (seconds: number, phase: string): NodeJS.Timeout =>
      setTimeout(() => {
        timedOut = `${phase} timeout after ${seconds}s`;
        controller.abort();
      }, seconds * 1000);

    const connectSeconds = Math.min(this.connectTimeoutSeconds, limits.timeoutSeconds);
    const connectTimer = abortAfter(connectSeconds, 'connect');
    const totalTimer = abortAfter(limits.timeoutSeconds, 'total');

    const asFetchError = (error: unknown): unknown => {
      if (error instanceof FetchError || error instanceof OversizeError) return error;
      if (timedOut) return new FetchError(`download of ${url} failed: ${timedOut}`);
      return new FetchError(`download of ${url} failed: ${errorMessage(error)}`);
    };

    try {
      logger.info('Starting download', { url, maxBytes: limits.maxBytes, timeoutSeconds: limits.timeoutSeconds });

      let response: Response;
      try {
        response = await this.fetchImpl(url, { redirect: 'follow', signal: controller.signal });
      } catch (error) {
        throw asFetchError(error);
      } finally {
        clearTimeout(connectTimer);
      }

      if (!response.ok) {
        await discardBody(response);
        throw new FetchError(`download of ${url} failed with HTTP ${response.status}`, response.status);
      }

      const declaredLength = parseInt(response.headers.get('content-length') || '', 10);
      if (!isNaN(declaredLength) && declaredLength > limits.maxBytes) {
        await discardBody(response);
        throw new OversizeError(limits.maxBytes, declaredLength);
      }

      const contentType = response.headers.get('content-type');
      const suffix = guessSuffix({ url: response.url || url, contentType }) || GENERIC_SUFFIX;
      const resource = await scope.allocate(suffix);

      let bytesWritten: number;
      try {
        bytesWritten = await this.streamToFile(response, resource, scope, limits.maxBytes);
      } catch (error) {
        throw asFetchError(error);
      }

      logger.info('Download complete', { url, bytes: bytesWritten, contentType });
      return { resource, bytesWritten, contentType, status: response.status };
    } finally {
      clearTimeout(connectTimer);
      clearTimeout(totalTimer);
    }
  }

  /**
   * Persist an uploaded file under a scoped temp path. Directory components of
   * the client-supplied name are dropped; only its extension is kept.
   */
  async saveUpload(bytes: Uint8Array, filename: string, scope: TempScope): Promise<TempResource> {
    const safeName = path.basename(filename.replace(/\\/g, '/')) || 'upload.bin';
    const resource = await scope.allocate(path.extname(safeName));
    await scope.write(resource, bytes);
    return resource;
  }

  private async streamToFile(
    response: Response,
    resource: TempResource,
    scope: TempScope,
    maxBytes: number
  ): Promise<number> {
    const handle = await scope.openForWrite(resource);
    let total = 0;

    try {
      if (!response.body) return 0;
      const reader = response.body.getReader();

      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          if (!value || value.byteLength === 0) continue;

          for (let offset = 0; offset < value.byteLength; offset += this.chunkSize) {
            const chunk = value.subarray(offset, offset + this.chunkSize);
            total += chunk.byteLength;
            // A body of exactly maxBytes is accepted; only the first byte past it fails
            if (total > maxBytes) {
              throw new OversizeError(maxBytes, total);
            }
            await handle.write(chunk);
          }
        }
      } catch (error) {
        await reader.cancel().catch(cancelError => {
          logger.debug('Failed to cancel response body', { error: errorMessage(cancelError) });
        });
        throw error;
      }
    } finally {
      await handle.close();
    }

    return total;
  }
}

function assertHttpUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Only http and https URLs are supported: ${url}`);
  }
}

async function discardBody(response: Response): Promise<void> {
  if (!response.body) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug('Failed to discard response body', { error: errorMessage(error) });
  }
}
