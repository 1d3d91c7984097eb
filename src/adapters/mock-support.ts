/**
 * Shared pieces for the in-memory mock adapters
 */

import {
  AuthenticationError,
  NetworkError,
  OperationTimeoutError,
  PublishError,
  PublishingError,
  RateLimitError,
  TemplateError,
  UploadError,
  ValidationError
} from '../core/errors.js';

export type MockErrorType = 'operation' | 'network' | 'rate_limit' | 'auth' | 'validation' | 'template' | 'timeout';

export interface CallRecord {
  method: string;
  timestamp: Date;
  success?: boolean;
  args: Record<string, unknown>;
}

export class CallLog {
  private readonly calls: CallRecord[] = [];

  record(method: string, args: Record<string, unknown> = {}, success?: boolean): void {
    this.calls.push({ method, timestamp: new Date(), success, args });
  }

  wasCalled(method: string): boolean {
    return this.calls.some(call => call.method === method);
  }

  getCallCount(method: string): number {
    return this.calls.filter(call => call.method === method).length;
  }

  getCalls(method: string): CallRecord[] {
    return this.calls.filter(call => call.method === method).map(call => ({ ...call, args: { ...call.args } }));
  }

  clear(): void {
    this.calls.length = 0;
  }
}

/**
 * Build the configured failure; 'operation' means the adapter's own kind
 */
export function createMockError(
  type: MockErrorType,
  message: string,
  platform: string,
  operation: 'upload' | 'publish'
): PublishingError {
  switch (type) {
    case 'network':
      return new NetworkError(message, { platform });
    case 'rate_limit':
      return new RateLimitError(message, { platform });
    case 'auth':
      return new AuthenticationError(message, { platform });
    case 'validation':
      return new ValidationError(message, { platform });
    case 'template':
      return new TemplateError(message, { platform });
    case 'timeout':
      return new OperationTimeoutError(message, { platform, timeoutMs: 0 });
    case 'operation':
      return operation === 'upload' ? new UploadError(message, { platform }) : new PublishError(message, { platform });
  }
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
