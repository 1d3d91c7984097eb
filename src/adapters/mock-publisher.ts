/**
 * Mock Publisher
 * In-memory publish adapter reporting step progress, with configurable
 * failures and a call log for verification.
 */

import { randomUUID } from 'crypto';
import type { PlatformConfig } from '../core/config.js';
import { AuthenticationError, ValidationError } from '../core/errors.js';
import type { ExecuteOptions, PublishAdapter } from '../core/executor.js';
import { createPublishProgress } from '../core/media.js';
import type { PublishProgress, PublishResult, TemplateVariables } from '../core/types.js';
import { CallLog, createMockError, delay, type CallRecord, type MockErrorType } from './mock-support.js';

export interface MockPublisherConfig {
  authSuccess: boolean;
  authError?: string;
  publishSuccess: boolean;
  publishError?: string;
  errorType: MockErrorType;
  /** Executions that fail with errorType before one goes through */
  failuresBeforeSuccess: number;
  simulateProgress: boolean;
  stepDelayMs: number;
  /** Metadata keys that must be present and non-empty */
  contentRequirements: string[];
  maxContentLength: number;
}

const DEFAULT_CONFIG: MockPublisherConfig = {
  authSuccess: true,
  publishSuccess: true,
  errorType: 'operation',
  failuresBeforeSuccess: 0,
  simulateProgress: true,
  stepDelayMs: 0,
  contentRequirements: [],
  maxContentLength: 5000
};

const PUBLISH_STEPS: readonly (readonly [step: string, message: string])[] = [
  ['validating', 'Validating post content'],
  ['processing', 'Processing post data'],
  ['publishing', 'Publishing to platform']
];

export class MockPublisher implements PublishAdapter {
  readonly platformName: string;
  readonly platformConfig?: PlatformConfig;
  private readonly config: MockPublisherConfig;
  private readonly calls = new CallLog();
  private isAuthenticated = false;
  private executions = 0;

  constructor(platformName = 'mock', config: Partial<MockPublisherConfig> = {}, platformConfig?: PlatformConfig) {
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

  validate(content: string, metadata: TemplateVariables): void {
    this.calls.record('validate', { content });

    if (content.length > this.config.maxContentLength) {
      throw new ValidationError(
        `Content too long: ${content.length} characters (max ${this.config.maxContentLength})`,
        { platform: this.platformName, fieldName: 'content', validationRule: 'max_length' }
      );
    }

    for (const field of this.config.contentRequirements) {
      if (!metadata[field]) {
        throw new ValidationError(`Missing required content field: ${field}`, {
          platform: this.platformName,
          fieldName: field
        });
      }
    }
  }

  async execute(
    content: string,
    metadata: TemplateVariables,
    options: ExecuteOptions<PublishProgress>
  ): Promise<PublishResult> {
    this.executions++;
    const failing = !this.config.publishSuccess || this.executions <= this.config.failuresBeforeSuccess;
    this.calls.record('execute', { content, metadata: { ...metadata } }, !failing);

    if (failing) {
      throw createMockError(
        this.config.errorType,
        this.config.publishError ?? 'Mock publishing failed',
        this.platformName,
        'publish'
      );
    }

    const { onProgress, signal } = options;
    if (this.config.simulateProgress && onProgress) {
      for (const [index, [step, message]] of PUBLISH_STEPS.entries()) {
        onProgress(createPublishProgress(step, index, PUBLISH_STEPS.length, message));
        await delay(this.config.stepDelayMs, signal);
      }
      onProgress(
        createPublishProgress(
          'completed',
          PUBLISH_STEPS.length,
          PUBLISH_STEPS.length,
          'Post published successfully',
          'completed'
        )
      );
    } else {
      await delay(this.config.stepDelayMs, signal);
    }

    const postId = `mock_post_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
    return {
      platform: this.platformName,
      postId,
      success: true,
      postUrl: `https://mock-platform.example/post/${postId}`,
      metadata: {
        contentLength: content.length,
        publishedAt: new Date().toISOString()
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
