/**
 * Byte transfers between the local filesystem and the object-storage staging area.
 *
 * These requests go to presigned staging URLs, not to the FirecREST API, so
 * they carry no bearer token and are not rate limited.
 */

import { constants, openAsBlob } from 'fs';
import { access, open, stat, type FileHandle } from 'fs/promises';
import { basename } from 'path';
import { LocalIoError, NetworkError, RequestFailureError } from '../errors/categories.js';
import type { Logger } from '../observability/logging.js';

/**
 * Presigned form returned by FirecREST once an upload reaches status 111
 */
export interface StagingForm {
  method: string;
  url: string;
  data: Record<string, string | number>;
  headers: Record<string, string>;
  params: Record<string, string | number>;
}

export interface ObjectStorageTransfer {
  /** Fails with LocalIoError unless `localPath` is a readable regular file */
  assertReadable(localPath: string): Promise<void>;
  uploadFile(localPath: string, form: StagingForm, signal?: AbortSignal): Promise<void>;
  downloadToFile(url: string, localPath: string, signal?: AbortSignal): Promise<number>;
}

export class FetchObjectStorageTransfer implements ObjectStorageTransfer {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly logger: Logger,
    fetchImpl?: typeof fetch
  ) {
    this.fetchImpl = fetchImpl ?? globalThis.fetch;
  }

  async assertReadable(localPath: string): Promise<void> {
    try {
      await access(localPath, constants.R_OK);
      const info = await stat(localPath);
      if (!info.isFile()) {
        throw new LocalIoError(`${localPath} is not a regular file`, localPath);
      }
    } catch (error) {
      if (error instanceof LocalIoError) {
        throw error;
      }
      throw new LocalIoError(`Cannot read local file ${localPath}`, localPath, error);
    }
  }

  async uploadFile(localPath: string, form: StagingForm, signal?: AbortSignal): Promise<void> {
    let file: Blob;
    try {
      file = await openAsBlob(localPath);
    } catch (error) {
      throw new LocalIoError(`Cannot read local file ${localPath}`, localPath, error);
    }

    const body = new FormData();
    for (const [key, value] of Object.entries(form.data)) {
      body.append(key, String(value));
    }
    body.append('file', file, basename(localPath));

    const url = withParams(form.url, form.params);
    this.logger.info('Uploading file to the staging area', { localPath, url: form.url, size: file.size });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: form.method,
        headers: form.headers,
        body,
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw new NetworkError(`Upload to the staging area ${form.url} failed`, error);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new RequestFailureError(`Upload to the staging area failed with status ${response.status}`, {
        status: response.status,
        responseBody: text,
        isRetryable: false,
      });
    }
  }

  /**
   * Streams the staging object into `localPath`, replacing its contents. Returns the bytes written.
   */
  async downloadToFile(url: string, localPath: string, signal?: AbortSignal): Promise<number> {
    this.logger.info('Downloading file from the staging area', { url, localPath });

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', signal });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw new NetworkError(`Download from the staging area ${url} failed`, error);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new RequestFailureError(`Download from the staging area failed with status ${response.status}`, {
        status: response.status,
        responseBody: text,
        isRetryable: response.status >= 500,
      });
    }

    let handle: FileHandle;
    try {
      handle = await open(localPath, 'w');
    } catch (error) {
      throw new LocalIoError(`Cannot open ${localPath} for writing`, localPath, error);
    }

    let written = 0;
    try {
      if (response.body) {
        const iterator = response.body[Symbol.asyncIterator]();
        for (;;) {
          let chunk: IteratorResult<Uint8Array>;
          try {
            chunk = await iterator.next();
          } catch (error) {
            throw new NetworkError(`Reading the staging object ${url} failed`, error);
          }
          if (chunk.done) {
            break;
          }
          try {
            await handle.write(chunk.value);
          } catch (error) {
            throw new LocalIoError(`Cannot write to ${localPath}`, localPath, error);
          }
          written += chunk.value.byteLength;
        }
      }
    } finally {
      await handle.close();
    }

    this.logger.debug('Staging object saved', { localPath, bytes: written });
    return written;
  }
}

function withParams(url: string, params: Record<string, string | number>): string {
  const entries = Object.entries(params);
  if (entries.length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of entries) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}
