/**
 * Configuration
 * Platform configuration handed to adapters, plus the core's own settings
 * resolved from defaults, environment and explicit overrides.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// ============================================================
// Platform Configuration
// ============================================================

export const PlatformConfigSchema = z.object({
  platformName: z.string().min(1),
  enabled: z.boolean().default(true),
  credentials: z.record(z.string()).default({}),
  metadata: z.record(z.unknown()).default({}),
  /** Requests per minute */
  rateLimit: z.number().int().positive().optional(),
  retryAttempts: z.number().int().nonnegative().default(3),
  /** Seconds */
  timeout: z.number().positive().optional()
});
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;
export type PlatformConfigInput = z.input<typeof PlatformConfigSchema>;

function issuePaths(error: z.ZodError): string[] {
  return [...new Set(error.issues.map(issue => issue.path.join('.') || '(root)'))];
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validate a platform configuration, filling defaults
 */
export function parsePlatformConfig(input: unknown): PlatformConfig {
  const parsed = PlatformConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid platform configuration: ${describeIssues(parsed.error)}`, {
      invalidFields: issuePaths(parsed.error),
      cause: parsed.error
    });
  }
  return parsed.data;
}

export function isPlatformConfigured(config: PlatformConfig): boolean {
  return config.enabled && Object.keys(config.credentials).length > 0;
}

// ============================================================
// Core Configuration
// ============================================================

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const CoreConfigSchema = z.object({
  taskStore: z
    .object({
      maxTaskAgeHours: z.number().positive().default(24),
      cleanupIntervalMinutes: z.number().positive().default(60),
      cleanupEnabled: z.boolean().default(true)
    })
    .default({}),
  status: z
    .object({
      defaultIncludeHistory: z.boolean().default(false),
      defaultIncludeProgress: z.boolean().default(false),
      maxQueryLimit: z.number().int().positive().default(1000)
    })
    .default({}),
  transfer: z
    .object({
      maxResumableRetries: z.number().int().nonnegative().default(10)
    })
    .default({}),
  execution: z
    .object({
      defaultTimeoutSeconds: z.number().positive().default(30)
    })
    .default({}),
  logLevel: LogLevelSchema.default('info')
});
export type CoreConfig = z.infer<typeof CoreConfigSchema>;

export interface CoreConfigOverrides {
  taskStore?: Partial<CoreConfig['taskStore']>;
  status?: Partial<CoreConfig['status']>;
  transfer?: Partial<CoreConfig['transfer']>;
  execution?: Partial<CoreConfig['execution']>;
  logLevel?: CoreConfig['logLevel'];
}

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | string | undefined {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  // Non-numeric strings fall through so the schema reports them
  return Number.isNaN(value) ? raw : value;
}

function envBoolean(env: Env, key: string): boolean | string | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return raw;
}

function envString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim().toLowerCase();
  return raw === undefined || raw === '' ? undefined : raw;
}

function compact(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Resolve core settings: defaults, then environment, then overrides
 */
export function loadCoreConfig(overrides: CoreConfigOverrides = {}, env: Env = process.env): CoreConfig {
  const fromEnv = {
    taskStore: compact({
      maxTaskAgeHours: envNumber(env, 'TASK_MAX_AGE_HOURS'),
      cleanupIntervalMinutes: envNumber(env, 'TASK_CLEANUP_INTERVAL_MINUTES'),
      cleanupEnabled: envBoolean(env, 'TASK_CLEANUP_ENABLED')
    }),
    status: compact({
      maxQueryLimit: envNumber(env, 'STATUS_MAX_QUERY_LIMIT')
    }),
    transfer: compact({
      maxResumableRetries: envNumber(env, 'TRANSFER_MAX_RESUMABLE_RETRIES')
    }),
    execution: compact({
      defaultTimeoutSeconds: envNumber(env, 'EXECUTION_TIMEOUT_SECONDS')
    }),
    logLevel: envString(env, 'LOG_LEVEL')
  };

  const merged = {
    taskStore: { ...fromEnv.taskStore, ...overrides.taskStore },
    status: { ...fromEnv.status, ...overrides.status },
    transfer: { ...fromEnv.transfer, ...overrides.transfer },
    execution: { ...fromEnv.execution, ...overrides.execution },
    logLevel: overrides.logLevel ?? fromEnv.logLevel
  };

  const parsed = CoreConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid core configuration: ${describeIssues(parsed.error)}`, {
      invalidFields: issuePaths(parsed.error),
      cause: parsed.error
    });
  }
  return parsed.data;
}
