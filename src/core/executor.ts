/**
 * Resilient Executor
 * Drives any platform adapter through authentication check, template
 * substitution (publish mode), validation and a bounded retry loop.
 */

import type { PlatformConfig } from './config.js';
import { AuthenticationError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import { classifyError, computeBackoffMs, defaultSleep, withTimeout, type Sleep } from './retry.js';
import { TemplateSubstitution } from './template.js';
import type {
  MediaMetadata,
  ProgressCallback,
  PublishProgress,
  PublishResult,
  TemplateVariables,
  UploadProgress,
  UploadResult
} from './types.js';

const log = getLogger({ module: 'ResilientExecutor' });

export interface ExecuteOptions<TProgress> {
  onProgress?: ProgressCallback<TProgress>;
  signal: AbortSignal;
}

/**
 * What a concrete platform integration provides
 */
export interface PlatformAdapter<TMetadata, TResult, TProgress> {
  readonly platformName: string;
  readonly authenticated: boolean;
  authenticate(): Promise<boolean>;
  /** Throws on invalid input */
  validate(content: string, metadata: TMetadata): void;
  execute(content: string, metadata: TMetadata, options: ExecuteOptions<TProgress>): Promise<TResult>;
  cleanup?(): Promise<void>;
  healthCheck?(): boolean | Promise<boolean>;
}

export type UploadAdapter = PlatformAdapter<MediaMetadata, UploadResult, UploadProgress>;
export type PublishAdapter = PlatformAdapter<TemplateVariables, PublishResult, PublishProgress>;

export type ExecutionMode = 'upload' | 'publish';

export interface ExecutorConfig<TMetadata> {
  mode: ExecutionMode;
  retryAttempts: number;
  /** Per attempt; 0 disables the limit */
  timeoutMs: number;
  sleep: Sleep;
  /** Publish mode only: variables used to fill content templates */
  templateVariables?: (metadata: TMetadata) => TemplateVariables;
}

const DEFAULT_TIMEOUT_SECONDS = 30;

export class ResilientExecutor<TMetadata, TResult, TProgress> {
  private readonly adapter: PlatformAdapter<TMetadata, TResult, TProgress>;
  private readonly config: ExecutorConfig<TMetadata>;

  constructor(adapter: PlatformAdapter<TMetadata, TResult, TProgress>, config: Partial<ExecutorConfig<TMetadata>> = {}) {
    this.adapter = adapter;
    this.config = {
      mode: 'upload',
      retryAttempts: 3,
      timeoutMs: DEFAULT_TIMEOUT_SECONDS * 1000,
      sleep: defaultSleep,
      ...config
    };
  }

  get platformName(): string {
    return this.adapter.platformName;
  }

  get mode(): ExecutionMode {
    return this.config.mode;
  }

  /**
   * Authenticate the adapter
   */
  async connect(): Promise<boolean> {
    const ok = await this.adapter.authenticate();
    log.info({ platform: this.platformName, authenticated: ok }, 'Adapter authentication finished');
    return ok;
  }

  /**
   * Release adapter resources
   */
  async close(): Promise<void> {
    await this.adapter.cleanup?.();
    log.debug({ platform: this.platformName }, 'Adapter closed');
  }

  /**
   * connect, run the callback, then close whatever happens
   */
  async withConnection<T>(fn: (executor: this) => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await fn(this);
    } finally {
      await this.close();
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.adapter.healthCheck) {
      return this.adapter.authenticated;
    }
    try {
      return await this.adapter.healthCheck();
    } catch (error) {
      log.error({ err: error, platform: this.platformName }, 'Health check failed');
      return false;
    }
  }

  /**
   * Execute with validation and retries; the last error is rethrown
   */
  async run(content: string, metadata: TMetadata, onProgress?: ProgressCallback<TProgress>): Promise<TResult> {
    const platform = this.platformName;
    const action = this.config.mode === 'publish' ? 'publishing' : 'uploading';

    if (!this.adapter.authenticated) {
      throw new AuthenticationError(`Authentication required before ${action}`, { platform });
    }

    const prepared = this.config.mode === 'publish' ? this.processTemplate(content, metadata) : content;
    this.adapter.validate(prepared, metadata);

    const maxAttempts = this.config.retryAttempts + 1;

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await withTimeout(
          signal => this.adapter.execute(prepared, metadata, { onProgress, signal }),
          this.config.timeoutMs,
          platform
        );
        log.info({ platform, attempt: attempt + 1, maxAttempts }, `${action} succeeded`);
        return result;
      } catch (error) {
        const retryable = classifyError(error) === 'retryable';

        if (!retryable || attempt + 1 >= maxAttempts) {
          log.error(
            { platform, attempt: attempt + 1, maxAttempts, retryable },
            `${action} failed: ${errorMessage(error)}`
          );
          throw error;
        }

        const delayMs = computeBackoffMs(attempt, error);
        log.warn({ platform, attempt: attempt + 1, maxAttempts, delayMs }, `${action} attempt failed, retrying`);
        await this.config.sleep(delayMs);
      }
    }
  }

  private processTemplate(content: string, metadata: TMetadata): string {
    if (!content.includes('{') || !content.includes('}')) {
      return content;
    }
    const variables = this.config.templateVariables ? this.config.templateVariables(metadata) : {};
    return TemplateSubstitution.substitute(content, variables);
  }
}

export interface ExecutorOptions {
  sleep?: Sleep;
  /** Used when the platform config sets no timeout */
  defaultTimeoutSeconds?: number;
}

function timeoutMsFor(config: PlatformConfig, options: ExecutorOptions): number {
  return (config.timeout ?? options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
}

export function createUploadExecutor(
  adapter: UploadAdapter,
  config: PlatformConfig,
  options: ExecutorOptions = {}
): ResilientExecutor<MediaMetadata, UploadResult, UploadProgress> {
  return new ResilientExecutor(adapter, {
    mode: 'upload',
    retryAttempts: config.retryAttempts,
    timeoutMs: timeoutMsFor(config, options),
    sleep: options.sleep ?? defaultSleep
  });
}

/**
 * Publish executors fill content templates from the metadata map
 */
export function createPublishExecutor(
  adapter: PublishAdapter,
  config: PlatformConfig,
  options: ExecutorOptions = {}
): ResilientExecutor<TemplateVariables, PublishResult, PublishProgress> {
  return new ResilientExecutor(adapter, {
    mode: 'publish',
    retryAttempts: config.retryAttempts,
    timeoutMs: timeoutMsFor(config, options),
    sleep: options.sleep ?? defaultSleep,
    templateVariables: metadata => metadata
  });
}
