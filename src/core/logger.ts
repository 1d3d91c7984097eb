/**
 * Logger
 * Thin wrapper around pino; modules take a child bound to their name.
 *
 * Configure via env:
 * - LOG_LEVEL: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent' (default: 'info')
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some(level => level === value);
}

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLevel(normalized) ? normalized : 'info';
}

export type { Logger };

export const logger: Logger = pino({
  name: 'media-publish-core',
  level: resolveLogLevel(process.env.LOG_LEVEL)
});

export function getLogger(bindings?: Record<string, unknown>): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return logger.child(bindings);
  }
  return logger;
}

