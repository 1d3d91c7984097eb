/**
 * Error taxonomy for the publishing core
 * Every error carries a code, the platform it came from and structured context
 */

export type ErrorContext = Record<string, unknown>;

export interface PublishingErrorOptions {
  errorCode?: string;
  platform?: string;
  context?: ErrorContext;
  cause?: unknown;
}

export interface ErrorDetails {
  errorType: string;
  errorCode: string;
  message: string;
  timestamp: string;
  platform?: string;
  context: ErrorContext;
  originalError?: {
    type: string;
    message: string;
    stack?: string;
  };
}

function truncate(value: string, max = 100): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

function capitalize(value: string): string {
  return value.length > 0 ? value[0].toUpperCase() + value.slice(1) : value;
}

export class PublishingError extends Error {
  readonly errorCode: string;
  readonly platform?: string;
  readonly context: ErrorContext;
  readonly timestamp: Date;

  constructor(message: string, options: PublishingErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.errorCode = options.errorCode ?? new.target.name.toUpperCase();
    this.platform = options.platform;
    this.context = { ...(options.context ?? {}) };
    this.timestamp = new Date();
  }

  /**
   * Full error description for logs
   */
  getErrorDetails(): ErrorDetails {
    const details: ErrorDetails = {
      errorType: this.name,
      errorCode: this.errorCode,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      platform: this.platform,
      context: this.context
    };

    if (this.cause !== undefined) {
      const original = this.cause instanceof Error ? this.cause : new Error(String(this.cause));
      details.originalError = {
        type: original.name,
        message: original.message,
        stack: original.stack
      };
    }

    return details;
  }

  /**
   * Message without technical details, prefixed with the platform when known
   */
  getUserMessage(): string {
    if (this.platform) {
      return `${capitalize(this.platform)} error: ${this.message}`;
    }
    return this.message;
  }

  override toString(): string {
    const parts: string[] = [];
    if (this.platform) {
      parts.push(`[${this.platform.toUpperCase()}]`);
    }
    if (this.errorCode !== 'PUBLISHINGERROR') {
      parts.push(`(${this.errorCode})`);
    }
    parts.push(this.message);
    return parts.join(' ');
  }
}

export class ConfigError extends PublishingError {
  readonly configFile?: string;
  readonly missingFields: string[];
  readonly invalidFields: string[];

  constructor(
    message: string,
    options: { configFile?: string; missingFields?: string[]; invalidFields?: string[]; cause?: unknown } = {}
  ) {
    const context: ErrorContext = {};
    if (options.configFile) context.configFile = options.configFile;
    if (options.missingFields?.length) context.missingFields = options.missingFields;
    if (options.invalidFields?.length) context.invalidFields = options.invalidFields;

    super(message, { errorCode: 'CONFIG_ERROR', context, cause: options.cause });
    this.configFile = options.configFile;
    this.missingFields = options.missingFields ?? [];
    this.invalidFields = options.invalidFields ?? [];
  }
}

export class UploadError extends PublishingError {
  readonly mediaFile?: string;
  readonly uploadId?: string;
  readonly progress?: number;

  constructor(
    message: string,
    options: { platform?: string; mediaFile?: string; uploadId?: string; progress?: number; cause?: unknown } = {}
  ) {
    const context: ErrorContext = {};
    if (options.mediaFile) context.mediaFile = options.mediaFile;
    if (options.uploadId) context.uploadId = options.uploadId;
    if (options.progress !== undefined) context.progress = options.progress;

    super(message, { errorCode: 'UPLOAD_ERROR', platform: options.platform, context, cause: options.cause });
    this.mediaFile = options.mediaFile;
    this.uploadId = options.uploadId;
    this.progress = options.progress;
  }
}

export class PublishError extends PublishingError {
  readonly postContent?: string;
  readonly postId?: string;

  constructor(
    message: string,
    options: { platform?: string; postContent?: string; postId?: string; cause?: unknown } = {}
  ) {
    const context: ErrorContext = {};
    if (options.postContent) context.postContent = truncate(options.postContent);
    if (options.postId) context.postId = options.postId;

    super(message, { errorCode: 'PUBLISH_ERROR', platform: options.platform, context, cause: options.cause });
    this.postContent = options.postContent;
    this.postId = options.postId;
  }
}

export class TaskError extends PublishingError {
  readonly taskId?: string;
  readonly taskStatus?: string;
  readonly failedPlatform?: string;

  constructor(
    message: string,
    options: { taskId?: string; taskStatus?: string; failedPlatform?: string; cause?: unknown } = {}
  ) {
    const context: ErrorContext = {};
    if (options.taskId) context.taskId = options.taskId;
    if (options.taskStatus) context.taskStatus = options.taskStatus;
    if (options.failedPlatform) context.failedPlatform = options.failedPlatform;

    super(message, {
      errorCode: 'TASK_ERROR',
      platform: options.failedPlatform,
      context,
      cause: options.cause
    });
    this.taskId = options.taskId;
    this.taskStatus = options.taskStatus;
    this.failedPlatform = options.failedPlatform;
  }
}

export class AuthenticationError extends PublishingError {
  readonly authType?: string;
  readonly tokenExpired: boolean;

  constructor(
    message: string,
    options: { platform?: string; authType?: string; tokenExpired?: boolean; cause?: unknown } = {}
  ) {
    const tokenExpired = options.tokenExpired ?? false;
    super(message, {
      errorCode: 'AUTH_ERROR',
      platform: options.platform,
      context: { authType: options.authType, tokenExpired },
      cause: options.cause
    });
    this.authType = options.authType;
    this.tokenExpired = tokenExpired;
  }
}

export class ValidationError extends PublishingError {
  readonly fieldName?: string;
  readonly fieldValue?: unknown;
  readonly validationRule?: string;

  constructor(
    message: string,
    options: {
      platform?: string;
      fieldName?: string;
      fieldValue?: unknown;
      validationRule?: string;
      cause?: unknown;
    } = {}
  ) {
    const context: ErrorContext = {};
    if (options.fieldName) context.fieldName = options.fieldName;
    if (options.fieldValue !== undefined && options.fieldValue !== null) {
      context.fieldValue = String(options.fieldValue).slice(0, 100);
    }
    if (options.validationRule) context.validationRule = options.validationRule;

    super(message, { errorCode: 'VALIDATION_ERROR', platform: options.platform, context, cause: options.cause });
    this.fieldName = options.fieldName;
    this.fieldValue = options.fieldValue;
    this.validationRule = options.validationRule;
  }
}

export class RateLimitError extends PublishingError {
  /** Seconds the platform asked us to wait, when it said so */
  readonly retryAfter?: number;
  readonly quotaExceeded: boolean;

  constructor(
    message: string,
    options: { platform?: string; retryAfter?: number; quotaExceeded?: boolean; cause?: unknown } = {}
  ) {
    const quotaExceeded = options.quotaExceeded ?? false;
    super(message, {
      errorCode: 'RATE_LIMIT_ERROR',
      platform: options.platform,
      context: { retryAfter: options.retryAfter, quotaExceeded },
      cause: options.cause
    });
    this.retryAfter = options.retryAfter;
    this.quotaExceeded = quotaExceeded;
  }
}

export class NetworkError extends PublishingError {
  readonly statusCode?: number;
  readonly endpoint?: string;

  constructor(
    message: string,
    options: { platform?: string; statusCode?: number; endpoint?: string; cause?: unknown } = {}
  ) {
    const context: ErrorContext = {};
    if (options.statusCode) context.statusCode = options.statusCode;
    if (options.endpoint) context.endpoint = options.endpoint;

    super(message, { errorCode: 'NETWORK_ERROR', platform: options.platform, context, cause: options.cause });
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
  }
}

export class TemplateError extends PublishingError {
  readonly template?: string;
  readonly variableName?: string;

  constructor(
    message: string,
    options: { platform?: string; template?: string; variableName?: string; cause?: unknown } = {}
  ) {
    const context: ErrorContext = {};
    if (options.template) context.template = truncate(options.template);
    if (options.variableName) context.variableName = options.variableName;

    super(message, { errorCode: 'TEMPLATE_ERROR', platform: options.platform, context, cause: options.cause });
    this.template = options.template;
    this.variableName = options.variableName;
  }
}

export class OperationTimeoutError extends PublishingError {
  readonly timeoutMs: number;

  constructor(message: string, options: { platform?: string; timeoutMs: number }) {
    super(message, {
      errorCode: 'TIMEOUT_ERROR',
      platform: options.platform,
      context: { timeoutMs: options.timeoutMs }
    });
    this.timeoutMs = options.timeoutMs;
  }
}

// Store and state errors signal caller misuse and are never retried

export class TaskStoreError extends PublishingError {
  constructor(message: string, options: { taskId?: string } = {}) {
    super(message, {
      errorCode: 'TASK_STORE_ERROR',
      context: options.taskId ? { taskId: options.taskId } : {}
    });
  }
}

export class TaskStatusError extends PublishingError {
  readonly taskId?: string;

  constructor(message: string, taskId?: string) {
    super(taskId ? `Task ${taskId}: ${message}` : message, {
      errorCode: 'TASK_STATUS_ERROR',
      context: taskId ? { taskId } : {}
    });
    this.taskId = taskId;
  }
}

export class StateTransitionError extends PublishingError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { errorCode: 'STATE_TRANSITION_ERROR', context });
  }
}

export class InvalidStateError extends PublishingError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { errorCode: 'INVALID_STATE_ERROR', context });
  }
}

export class RegistryError extends PublishingError {
  readonly platformName?: string;

  constructor(message: string, platformName?: string, cause?: unknown) {
    super(message, {
      errorCode: 'REGISTRY_ERROR',
      context: platformName ? { platformName } : {},
      cause
    });
    this.platformName = platformName;
  }
}

// ============================================================
// Translation helpers
// ============================================================

const TRANSPORT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ECONNABORTED',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT'
]);

/**
 * Node surfaces socket failures as errors with a `code` property
 */
export function isTransportError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  const code = error.code;
  return typeof code === 'string' && TRANSPORT_ERROR_CODES.has(code);
}

/**
 * Map a foreign API error onto the taxonomy by its message and transport code
 */
export function translateApiError(error: unknown, platform: string, operation = 'unknown'): PublishingError {
  const original = error instanceof Error ? error : new Error(String(error));
  const message = original.message;
  const lower = message.toLowerCase();

  if (message.includes('401') || lower.includes('unauthorized')) {
    return new AuthenticationError(`Authentication failed during ${operation}`, { platform, cause: original });
  }

  if (message.includes('403') || lower.includes('forbidden')) {
    return new AuthenticationError(`Access forbidden during ${operation} - check permissions`, {
      platform,
      cause: original
    });
  }

  if (message.includes('429') || lower.includes('rate limit')) {
    return new RateLimitError(`Rate limit exceeded during ${operation}`, { platform, cause: original });
  }

  if (message.includes('400') || message.includes('422') || lower.includes('validation')) {
    return new ValidationError(`Validation failed during ${operation}: ${message}`, { platform, cause: original });
  }

  if (['500', '502', '503', '504'].some(code => message.includes(code)) || isTransportError(original)) {
    return new NetworkError(`Network error during ${operation}: ${message}`, { platform, cause: original });
  }

  if (operation === 'upload' || operation === 'uploading') {
    return new UploadError(`Upload failed: ${message}`, { platform, cause: original });
  }

  if (operation === 'publish' || operation === 'publishing' || operation === 'post') {
    return new PublishError(`Publishing failed: ${message}`, { platform, cause: original });
  }

  return new PublishingError(`${capitalize(operation)} failed: ${message}`, { platform, cause: original });
}

/**
 * Fold several errors into one, keeping the rest under context.errorChain
 */
export function createErrorChain(...errors: unknown[]): PublishingError {
  if (errors.length === 0) {
    return new PublishingError('Unknown error occurred');
  }

  const [primary, ...rest] = errors;
  const base =
    primary instanceof PublishingError
      ? primary
      : new PublishingError(primary instanceof Error ? primary.message : String(primary), { cause: primary });

  if (rest.length > 0) {
    base.context.errorChain = rest.map(err => ({
      type: err instanceof Error ? err.name : typeof err,
      message: err instanceof Error ? err.message : String(err)
    }));
  }

  return base;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
