/**
 * Core types for the publishing core
 * Complete type definitions with Zod validation
 */

import { z } from 'zod';

// ============================================================
// Task State
// ============================================================

export const TaskStateSchema = z.enum([
  'pending',
  'in_progress',
  'completed',
  'failed',
  'cancelled'
]);
export type TaskState = z.infer<typeof TaskStateSchema>;

export const TASK_STATES: readonly TaskState[] = TaskStateSchema.options;

export function emptyStateCounts(): Record<TaskState, number> {
  return { pending: 0, in_progress: 0, completed: 0, failed: 0, cancelled: 0 };
}

// ============================================================
// Task Record (Task Store)
// ============================================================

export const TaskRecordSchema = z.object({
  taskId: z.string().trim().min(1, 'Task ID cannot be empty'),
  status: TaskStateSchema,
  message: z.string().optional(),
  error: z.string().optional(),
  failedPlatform: z.string().optional(),
  results: z.record(z.unknown()),
  createdAt: z.date(),
  updatedAt: z.date()
});
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

/**
 * Wire form of a task record (snake_case keys, ISO timestamps)
 */
export const TaskRecordJSONSchema = z.object({
  task_id: z.string(),
  status: TaskStateSchema,
  message: z.string().nullable().optional(),
  error: z.string().nullable().optional(),
  failed_platform: z.string().nullable().optional(),
  results: z.record(z.unknown()).default({}),
  created_at: z.string().datetime({ offset: true }),
  updated_at: z.string().datetime({ offset: true })
});
export type TaskRecordJSON = z.infer<typeof TaskRecordJSONSchema>;

// ============================================================
// State Transition wire form
// ============================================================

export const StateTransitionJSONSchema = z.object({
  from_state: TaskStateSchema.nullable(),
  to_state: TaskStateSchema,
  timestamp: z.string().datetime({ offset: true }),
  message: z.string().nullable().optional(),
  is_rollback: z.boolean().default(false)
});
export type StateTransitionJSON = z.infer<typeof StateTransitionJSONSchema>;

// ============================================================
// Media Metadata
// ============================================================

export const PrivacySchema = z.enum(['public', 'unlisted', 'private']);
export type Privacy = z.infer<typeof PrivacySchema>;

export const MEDIA_LIMITS = {
  maxTitleLength: 100,
  maxDescriptionLength: 5000,
  maxTags: 50,
  maxTagLength: 50
} as const;

export const MediaMetadataSchema = z.object({
  title: z.string().max(MEDIA_LIMITS.maxTitleLength, `Title too long (max ${MEDIA_LIMITS.maxTitleLength} characters)`).optional(),
  description: z
    .string()
    .max(MEDIA_LIMITS.maxDescriptionLength, `Description too long (max ${MEDIA_LIMITS.maxDescriptionLength} characters)`)
    .optional(),
  tags: z
    .array(z.string().max(MEDIA_LIMITS.maxTagLength, `Tag too long (max ${MEDIA_LIMITS.maxTagLength} characters)`))
    .max(MEDIA_LIMITS.maxTags, `Too many tags (max ${MEDIA_LIMITS.maxTags})`)
    .default([]),
  privacy: PrivacySchema.optional(),
  thumbnailUrl: z.string().optional(),
  thumbnailPath: z.string().optional(),
  duration: z.number().int().nonnegative().optional(),
  fileSize: z.number().int().nonnegative().optional(),
  category: z.string().optional(),
  language: z.string().optional(),
  scheduledPublishTime: z.date().optional(),
  madeForKids: z.boolean().optional()
});
export type MediaMetadata = z.infer<typeof MediaMetadataSchema>;
export type MediaMetadataInput = z.input<typeof MediaMetadataSchema>;

// ============================================================
// Progress & Results
// ============================================================

export type UploadProgressStatus = 'uploading' | 'completed';

export interface UploadProgress {
  bytesUploaded: number;
  totalBytes: number;
  /** 0-100, two decimals */
  percentage: number;
  status: UploadProgressStatus;
  timestamp: Date;
}

export type PublishProgressStatus = 'in_progress' | 'completed';

export interface PublishProgress {
  step: string;
  currentStep: number;
  totalSteps: number;
  message?: string;
  percentage: number;
  status: PublishProgressStatus;
  timestamp: Date;
}

export interface UploadResult {
  platform: string;
  uploadId: string;
  success: boolean;
  mediaUrl?: string;
  metadata?: Record<string, unknown>;
  error?: string;
  timestamp: Date;
}

export interface PublishResult {
  platform: string;
  postId: string;
  success: boolean;
  postUrl?: string;
  metadata?: Record<string, unknown>;
  error?: string;
  timestamp: Date;
}

export type TemplateVariables = Record<string, unknown>;

export type ProgressCallback<TProgress> = (progress: TProgress) => void;
