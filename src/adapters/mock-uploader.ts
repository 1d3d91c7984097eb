/**
 * Mock Uploader
 * In-memory upload adapter driving a scripted resumable session, with
 * configurable failures and a call log for verification.
 */

import { randomUUID } from 'crypto';
import type { PlatformConfig } from '../core/config.js';
import { AuthenticationError, ValidationError } from '../core/errors.js';
import type { ExecuteOptions, UploadAdapter } from '../core/executor.js';
import { validateMediaMetadata } from '../core/media.js';
import {
  ChunkHttpError,
  DEFAULT_MAX_RESUMABLE_RETRIES,
  performResumableTransfer,
  type ChunkOutcome,
  type ResumableSession
} from '../core/resumable-transfer.js';
import type { Sleep } from '../core/retry.js';
import type { MediaMetadata, UploadProgress, UploadResult } from '../core/types.js';
import { CallLog, createMockError, delay, type CallRecord, type MockErrorType } from './mock-support.js';

export interface MockUploaderConfig {
  authSuccess: boolean;
  authError?: string;
  uploadSuccess: boolean;
  uploadError?: string;
  errorType: MockErrorType;
  /** Executions that fail with errorType before one goes through */
  failuresBeforeSuccess: number;
  totalBytes: number;
  chunkCount: number;
  /** HTTP statuses returned by successive chunk requests before they succeed */
  chunkFailures: number[];
  chunkDelayMs: number;
  maxResumableRetries: number;
  /** Backoff between chunk retries; resolves immediately by default */
  sleep: Sleep;
  random: () => number;
  metadataRequirements: (keyof MediaMetadata)[];
}

const DEFAULT_CONFIG: MockUploaderConfig = {
  authSuccess: true,
  uploadSuccess: true,
  errorType: 'operation',
  failuresBeforeSuccess: 0,
  totalBytes: 1_000_000,
  chunkCount: 5,
  chunkFailures: [],
  chunkDelayMs: 0,
  maxResumableRetries: DEFAULT_MAX_RESUMABLE_RETRIES,
  sleep: () => Promise.resolve(),
  random: Math.random,
  metadataRequirements: []
};

interface MockUploadResponse {
  id: string;
  chunks: number;
}

class ScriptedSession implements ResumableSession<MockUploadResponse> {
  readonly totalBytes: number;
  private readonly chunkSize: number;
  private readonly failures: number[];
  private readonly chunkDelayMs: number;
  private readonly uploadId: string;
  private sent = 0;
  private chunks = 0;

  constructor(config: MockUploaderConfig, uploadId: string) {
    this.totalBytes = config.totalBytes;
    this.chunkSize = Math.max(1, Math.ceil(config.totalBytes / Math.max(1, config.chunkCount)));
    this.failures = [...config.chunkFailures];
    this.chunkDelayMs = config.chunkDelayMs;
    this.uploadId = uploadId;
  }

  async nextChunk(signal?: AbortSignal): Promise<ChunkOutcome<MockUploadResponse>> {
    await delay(this.chunkDelayMs, signal);

    const status = this.failures.shift();
    if (status !== undefined) {
      throw new ChunkHttpError(status, `Mock chunk request failed with status ${status}`);
    }

    this.chunks++;
    this.sent = Math.min(this.totalBytes, this.sent + this.chunkSize);
    if (this.sent >= this.totalBytes) {
      return { response: { id: this.uploadId, chunks: this.chunks } };
    }
    return { bytesSent: this.sent };
  }
}

export class MockUploader implements UploadAdapter {
  readonly platformName: string;
  readonly platformConfig?: PlatformConfig;
  private readonly config: MockUploaderConfig;
  private readonly calls = new CallLog();
  private isAuthenticated = false;
  private executions = 0;

  constructor(platformName = 'mock', config: Partial<MockUploaderConfig> = {}, platformConfig?: PlatformConfig) {
    if (!platformName.trim()) {
      throw new ValidationError('Platform name cannot be empty', { fieldName: 'platformName' });
    }
    this.platformName = platformName.trim();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.platformConfig = platformConfig;
  }

  get authenticated(): boolean {
    return this.isAuthenticated;
  }

  async authenticate(): Promise<boolean> {
    this.calls.record('authenticate', {}, this.config.authSuccess);

    if (!this.config.authSuccess) {
      throw new AuthenticationError(this.config.authError ?? 'Mock authentication failed', {
        platform: this.platformName
      });
    }

    this.isAuthenticated = true;
    return true;
  }

  validate(filePath: string, metadata: MediaMetadata): void {
    this.calls.record('validate', { filePath });

    if (!filePath.trim()) {
      throw new ValidationError('File path cannot be empty', { platform: this.platformName, fieldName: 'filePath' });
    }
    validateMediaMetadata(metadata, this.platformName);

    for (const field of this.config.metadataRequirements) {
      const value = metadata[field];
      if (value === undefined || value === '' || (Array.isArray(value) && value.length === 0)) {
        throw new ValidationError(`Missing required metadata field: ${field}`, {
          platform: this.platformName,
          fieldName: field
        });
      }
    }
  }

  async execute(
    filePath: string,
    metadata: MediaMetadata,
    options: ExecuteOptions<UploadProgress>
  ): Promise<UploadResult> {
    this.executions++;
    const failing = !this.config.uploadSuccess || this.executions <= this.config.failuresBeforeSuccess;
    this.calls.record('execute', { filePath, metadata: { ...metadata } }, !failing);

    if (failing) {
      throw createMockError(
        this.config.errorType,
        this.config.uploadError ?? 'Mock upload failed',
        this.platformName,
        'upload'
      );
    }

    const uploadId = `mock_upload_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
    const response = await performResumableTransfer(new ScriptedSession(this.config, uploadId), {
      platform: this.platformName,
      maxRetries: this.config.maxResumableRetries,
      onProgress: options.onProgress,
      sleep: this.config.sleep,
      random: this.config.random,
      signal: options.signal
    });

    return {
      platform: this.platformName,
      uploadId: response.id,
      success: true,
      mediaUrl: `https://mock-platform.example/media/${response.id}`,
      metadata: {
        title: metadata.title,
        description: metadata.description,
        tags: [...metadata.tags],
        totalBytes: this.config.totalBytes,
        chunks: response.chunks
      },
      timestamp: new Date()
    };
  }

  async cleanup(): Promise<void> {
    this.calls.record('cleanup');
  }

  healthCheck(): boolean {
    return this.isAuthenticated;
  }

  wasCalled(method: string): boolean {
    return this.calls.wasCalled(method);
  }

  getCallCount(method: string): number {
    return this.calls.getCallCount(method);
  }

  getCalls(method: string): CallRecord[] {
    return this.calls.getCalls(method);
  }

  clearCallLog(): void {
    this.calls.clear();
  }
}
