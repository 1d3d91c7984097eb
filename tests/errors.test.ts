import { describe, it, expect } from 'vitest';

import {
  AuthenticationError,
  ConfigError,
  NetworkError,
  PublishError,
  PublishingError,
  RateLimitError,
  TaskStatusError,
  UploadError,
  ValidationError,
  createErrorChain,
  isTransportError,
  translateApiError
} from '../src/core/errors.js';

describe('PublishingError', () => {
  it('should default the error code to the upper-cased class name', () => {
    const error = new PublishingError('boom');

    expect(error.name).toBe('PublishingError');
    expect(error.errorCode).toBe('PUBLISHINGERROR');
    expect(error.toString()).toBe('boom');
  });

  it('should prefix platform and code in toString', () => {
    const error = new UploadError('chunk rejected', { platform: 'youtube' });

    expect(error.toString()).toBe('[YOUTUBE] (UPLOAD_ERROR) chunk rejected');
    expect(error.getUserMessage()).toBe('Youtube error: chunk rejected');
  });

  it('should describe the original error in details', () => {
    const cause = new TypeError('bad socket');
    const error = new NetworkError('request failed', { platform: 'x', statusCode: 503, cause });
    const details = error.getErrorDetails();

    expect(details.errorType).toBe('NetworkError');
    expect(details.errorCode).toBe('NETWORK_ERROR');
    expect(details.context).toEqual({ statusCode: 503 });
    expect(details.originalError?.type).toBe('TypeError');
    expect(details.originalError?.message).toBe('bad socket');
  });

  it('should keep subclass fields in context', () => {
    const config = new ConfigError('invalid', { missingFields: ['token'], invalidFields: [] });
    const rate = new RateLimitError('slow down', { retryAfter: 5 });
    const post = new PublishError('rejected', { postContent: 'a'.repeat(120) });

    expect(config.context).toEqual({ missingFields: ['token'] });
    expect(rate.context).toEqual({ retryAfter: 5, quotaExceeded: false });
    expect(post.context.postContent).toBe(`${'a'.repeat(100)}...`);
  });

  it('should prefix task status messages with the task id', () => {
    const error = new TaskStatusError('Task not found', 'task-1');

    expect(error.message).toBe('Task task-1: Task not found');
    expect(error.taskId).toBe('task-1');
  });
});

describe('translateApiError', () => {
  it('should map status codes in the message to error types', () => {
    expect(translateApiError(new Error('HTTP 401'), 'p', 'upload')).toBeInstanceOf(AuthenticationError);
    expect(translateApiError(new Error('Forbidden'), 'p', 'upload').message).toBe(
      'Access forbidden during upload - check permissions'
    );
    expect(translateApiError(new Error('429 Too Many'), 'p')).toBeInstanceOf(RateLimitError);
    expect(translateApiError(new Error('422 bad field'), 'p')).toBeInstanceOf(ValidationError);
    expect(translateApiError(new Error('502 gateway'), 'p')).toBeInstanceOf(NetworkError);
  });

  it('should fall back by operation', () => {
    const upload = translateApiError(new Error('weird'), 'p', 'upload');
    const publish = translateApiError(new Error('weird'), 'p', 'post');
    const other = translateApiError('weird', 'p', 'sync');

    expect(upload).toBeInstanceOf(UploadError);
    expect(upload.message).toBe('Upload failed: weird');
    expect(publish).toBeInstanceOf(PublishError);
    expect(other.message).toBe('Sync failed: weird');
    expect(other.platform).toBe('p');
  });

  it('should treat socket error codes as network errors', () => {
    const socketError = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });

    expect(isTransportError(socketError)).toBe(true);
    expect(isTransportError(new Error('plain'))).toBe(false);
    expect(translateApiError(socketError, 'p', 'upload')).toBeInstanceOf(NetworkError);
  });
});

describe('createErrorChain', () => {
  it('should keep the first error and list the rest', () => {
    const primary = new UploadError('first');
    const chained = createErrorChain(primary, new Error('second'), 'third');

    expect(chained).toBe(primary);
    expect(chained.context.errorChain).toEqual([
      { type: 'Error', message: 'second' },
      { type: 'string', message: 'third' }
    ]);
  });

  it('should wrap a non-taxonomy primary and handle no errors', () => {
    expect(createErrorChain(new Error('plain')).message).toBe('plain');
    expect(createErrorChain().message).toBe('Unknown error occurred');
  });
});
