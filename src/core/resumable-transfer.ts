/**
 * Resumable Chunked Transfer
 * Pushes chunks through a resumable session, resubmitting the same chunk
 * after transient failures with randomized exponential backoff.
 */

import {
  AuthenticationError,
  PublishingError,
  RateLimitError,
  UploadError,
  ValidationError,
  errorMessage,
  isTransportError
} from './errors.js';
import { getLogger } from './logger.js';
import { createUploadProgress } from './media.js';
import { defaultSleep, type Sleep } from './retry.js';
import type { ProgressCallback, UploadProgress } from './types.js';

const log = getLogger({ module: 'ResumableTransfer' });

export const DEFAULT_MAX_RESUMABLE_RETRIES = 10;

export interface ChunkOutcome<TResponse> {
  /** Bytes committed so far; set on a partial chunk */
  bytesSent?: number;
  /** Set once the server returns the final response */
  response?: TResponse;
}

export interface ResumableSession<TResponse> {
  readonly totalBytes: number;
  nextChunk(signal?: AbortSignal): Promise<ChunkOutcome<TResponse>>;
}

/**
 * HTTP failure reported by a session for one chunk
 */
export class ChunkHttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ChunkHttpError';
    this.statusCode = statusCode;
  }
}

export function isServerError(statusCode: number): boolean {
  return statusCode >= 500 && statusCode <= 599;
}

function isRetryableChunkError(error: unknown): boolean {
  if (error instanceof ChunkHttpError) {
    return isServerError(error.statusCode);
  }
  return isTransportError(error);
}

/**
 * Map a non-retryable chunk failure onto the error taxonomy
 */
export function mapHttpError(error: ChunkHttpError, platform: string): PublishingError {
  const { statusCode, message } = error;

  switch (statusCode) {
    case 401:
      return new AuthenticationError(`Authentication failed: ${message}`, { platform, cause: error });
    case 403:
      if (message.toLowerCase().includes('quota')) {
        return new RateLimitError(`Quota exceeded: ${message}`, { platform, quotaExceeded: true, cause: error });
      }
      return new AuthenticationError(`Access forbidden: ${message}`, { platform, cause: error });
    case 429:
      return new RateLimitError(`Rate limit exceeded: ${message}`, { platform, cause: error });
    case 400:
    case 422:
      return new ValidationError(`Request rejected: ${message}`, { platform, cause: error });
    default:
      return new UploadError(`Upload failed (${statusCode}): ${message}`, { platform, cause: error });
  }
}

export interface ResumableTransferOptions {
  platform: string;
  maxRetries?: number;
  onProgress?: ProgressCallback<UploadProgress>;
  sleep?: Sleep;
  /** [0, 1) jitter source */
  random?: () => number;
  signal?: AbortSignal;
}

export async function performResumableTransfer<TResponse>(
  session: ResumableSession<TResponse>,
  options: ResumableTransferOptions
): Promise<TResponse> {
  const { platform, onProgress, signal } = options;
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RESUMABLE_RETRIES;
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const total = session.totalBytes;
  let retry = 0;

  for (;;) {
    signal?.throwIfAborted();
    let outcome: ChunkOutcome<TResponse>;

    try {
      log.debug({ platform }, 'Uploading chunk');
      outcome = await session.nextChunk(signal);
    } catch (error) {
      signal?.throwIfAborted();
      if (!isRetryableChunkError(error)) {
        if (error instanceof ChunkHttpError) {
          throw mapHttpError(error, platform);
        }
        if (error instanceof PublishingError) {
          throw error;
        }
        throw new UploadError(`Upload failed: ${errorMessage(error)}`, { platform, cause: error });
      }

      retry++;
      if (retry > maxRetries) {
        throw new UploadError(`Upload failed after ${maxRetries} retries: ${errorMessage(error)}`, {
          platform,
          cause: error
        });
      }

      const delayMs = random() * 2 ** retry * 1000;
      log.warn({ platform, retry, maxRetries, delayMs }, `Chunk failed, retrying: ${errorMessage(error)}`);
      await sleep(delayMs, signal);
      continue;
    }

    // An abandoned attempt reports nothing more
    signal?.throwIfAborted();

    if (outcome.response !== undefined) {
      onProgress?.(createUploadProgress(total, total, 'completed'));
      log.info({ platform, totalBytes: total }, 'Resumable transfer completed');
      return outcome.response;
    }

    if (outcome.bytesSent !== undefined) {
      onProgress?.(createUploadProgress(Math.min(Math.max(outcome.bytesSent, 0), total), total));
    }
  }
}
