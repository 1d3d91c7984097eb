/**
 * Media helpers
 * Progress and result constructors plus metadata validation/sanitizing.
 */

import { ValidationError } from './errors.js';
import {
  MediaMetadataSchema,
  type MediaMetadata,
  type MediaMetadataInput,
  type PublishProgress,
  type PublishProgressStatus,
  type PublishResult,
  type UploadProgress,
  type UploadProgressStatus,
  type UploadResult
} from './types.js';

function percentageOf(current: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((current / total) * 100 * 100) / 100;
}

function assertWithinTotal(current: number, total: number, currentField: string, totalField: string): void {
  if (!Number.isFinite(current) || current < 0) {
    throw new ValidationError(`${currentField} cannot be negative`, {
      fieldName: currentField,
      fieldValue: current,
      validationRule: 'non_negative'
    });
  }
  if (!Number.isFinite(total) || total < 0) {
    throw new ValidationError(`${totalField} cannot be negative`, {
      fieldName: totalField,
      fieldValue: total,
      validationRule: 'non_negative'
    });
  }
  if (current > total) {
    throw new ValidationError(`${currentField} cannot exceed ${totalField}`, {
      fieldName: currentField,
      fieldValue: current,
      validationRule: 'max_total'
    });
  }
}

// ============================================================
// Progress
// ============================================================

export function createUploadProgress(
  bytesUploaded: number,
  totalBytes: number,
  status: UploadProgressStatus = 'uploading'
): UploadProgress {
  assertWithinTotal(bytesUploaded, totalBytes, 'bytesUploaded', 'totalBytes');
  return {
    bytesUploaded,
    totalBytes,
    percentage: percentageOf(bytesUploaded, totalBytes),
    status,
    timestamp: new Date()
  };
}

export function createPublishProgress(
  step: string,
  currentStep: number,
  totalSteps: number,
  message?: string,
  status: PublishProgressStatus = 'in_progress'
): PublishProgress {
  assertWithinTotal(currentStep, totalSteps, 'currentStep', 'totalSteps');
  return {
    step,
    currentStep,
    totalSteps,
    message,
    percentage: percentageOf(currentStep, totalSteps),
    status,
    timestamp: new Date()
  };
}

// ============================================================
// Results
// ============================================================

function assertResult(platform: string, success: boolean, error: string | undefined): void {
  if (!platform.trim()) {
    throw new ValidationError('Platform cannot be empty', { fieldName: 'platform', validationRule: 'required' });
  }
  if (!success && !error) {
    throw new ValidationError('Failed results must include an error', {
      platform,
      fieldName: 'error',
      validationRule: 'required_when_failed'
    });
  }
}

export function createUploadResult(input: Omit<UploadResult, 'timestamp'> & { timestamp?: Date }): UploadResult {
  assertResult(input.platform, input.success, input.error);
  return { ...input, timestamp: input.timestamp ?? new Date() };
}

export function createPublishResult(input: Omit<PublishResult, 'timestamp'> & { timestamp?: Date }): PublishResult {
  assertResult(input.platform, input.success, input.error);
  return { ...input, timestamp: input.timestamp ?? new Date() };
}

// ============================================================
// Metadata
// ============================================================

export function validateMediaMetadata(input: unknown, platform?: string): MediaMetadata {
  const parsed = MediaMetadataSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid media metadata', {
      platform,
      fieldName: issue?.path.join('.'),
      validationRule: issue?.code
    });
  }
  return parsed.data;
}

function sanitizeTag(tag: string): string {
  return tag
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_]/gu, '');
}

/**
 * Normalize tags and trim text fields, then validate
 */
export function sanitizeMediaMetadata(input: MediaMetadataInput, platform?: string): MediaMetadata {
  const tags = (input.tags ?? []).map(sanitizeTag).filter(tag => tag.length > 0);
  return validateMediaMetadata(
    {
      ...input,
      title: input.title?.trim(),
      description: input.description?.trim(),
      tags: [...new Set(tags)]
    },
    platform
  );
}
