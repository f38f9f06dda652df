/**
 * HTTP Media Fetcher - direct streamed download of a single resource
 *
 * Uses the runtime's fetch. Progress comes from content-length when the
 * server sends one. A failed transfer removes its partial file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { toTransferFailure } from '../types/errors.js';
import type { MediaFetcher, TransferOptions, TransferResult } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface HttpMediaFetcherOptions {
  /** Replaces the global fetch */
  fetch?: typeof fetch;
}

export class HttpMediaFetcher implements MediaFetcher {
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpMediaFetcherOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetch(
    url: string,
    headers: Record<string, string>,
    destination: string,
    options: TransferOptions
  ): Promise<TransferResult> {
    const { signal, onProgress } = options;
    const startTime = Date.now();

    let response: Response;
    try {
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      response = await this.fetchImpl(url, { headers, signal, redirect: 'follow' });
    } catch (error) {
      return { bytesWritten: 0, error: toTransferFailure(error) };
    }

    if (!response.ok) {
      await response.body?.cancel();
      return {
        bytesWritten: 0,
        error: { message: `HTTP ${response.status} ${response.statusText}`.trim(), status: response.status },
      };
    }
    if (!response.body) {
      return { bytesWritten: 0, error: { message: 'Response has no body' } };
    }

    const total = Number(response.headers.get('content-length') ?? 0);
    let bytesWritten = 0;

    try {
      const file = await fs.promises.open(destination, 'w');
      try {
        const reader = response.body.getReader();
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          await file.write(value);
          bytesWritten += value.byteLength;
          if (total > 0) {
            onProgress?.(Math.min(bytesWritten / total, 1));
          }
        }
      } finally {
        await file.close();
      }
    } catch (error) {
      await fs.promises.rm(destination, { force: true });
      return { bytesWritten, error: toTransferFailure(error) };
    }

    onProgress?.(1);
    logger.transfer.timed('Fetched', startTime, { url, destination, bytesWritten });
    return { bytesWritten };
  }
}
