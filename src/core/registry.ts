/**
 * Platform Registry
 * Explicit catalogue of adapter factories; constructed once by the
 * composition root and passed to whatever needs it.
 */

import { z } from 'zod';
import type { PlatformConfig } from './config.js';
import { RegistryError, ValidationError, errorMessage } from './errors.js';
import type { PublishAdapter, UploadAdapter } from './executor.js';
import { getLogger } from './logger.js';

const log = getLogger({ module: 'PlatformRegistry' });

export const PlatformCapabilitySchema = z.enum([
  'VIDEO_UPLOAD',
  'AUDIO_UPLOAD',
  'IMAGE_UPLOAD',
  'TEXT_PUBLISHING',
  'LINK_PUBLISHING',
  'METADATA_SUPPORT',
  'PROGRESS_TRACKING',
  'SCHEDULING',
  'THUMBNAIL_UPLOAD',
  'BATCH_OPERATIONS'
]);
export type PlatformCapability = z.infer<typeof PlatformCapabilitySchema>;

export type PlatformKind = 'uploader' | 'publisher';

const PLATFORM_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

interface PlatformInfoBase {
  name: string;
  displayName: string;
  capabilities?: PlatformCapability[];
  version?: string;
  description?: string;
  metadata?: Record<string, unknown>;
}

export type UploaderFactory = (platformName: string, config: PlatformConfig) => UploadAdapter;
export type PublisherFactory = (platformName: string, config: PlatformConfig) => PublishAdapter;

export type PlatformInfoInput =
  | (PlatformInfoBase & { kind: 'uploader'; factory: UploaderFactory })
  | (PlatformInfoBase & { kind: 'publisher'; factory: PublisherFactory });

export type PlatformInfo = PlatformInfoInput &
  Required<Pick<PlatformInfoBase, 'capabilities' | 'version' | 'description' | 'metadata'>> & {
    createdAt: Date;
  };

export interface PlatformInfoJSON {
  name: string;
  display_name: string;
  platform_type: PlatformKind;
  capabilities: PlatformCapability[];
  version: string;
  description: string;
  metadata: Record<string, unknown>;
  created_at: string;
}

export interface RegistryStats {
  totalPlatforms: number;
  uploaders: number;
  publishers: number;
  capabilities: Partial<Record<PlatformCapability, number>>;
}

function validatePlatformInfo(info: PlatformInfoInput): void {
  if (!info.name || !info.name.trim()) {
    throw new ValidationError('Platform name cannot be empty', { fieldName: 'name', validationRule: 'required' });
  }
  if (!PLATFORM_NAME_PATTERN.test(info.name)) {
    throw new ValidationError('Platform name must contain only alphanumeric characters and underscores', {
      fieldName: 'name',
      fieldValue: info.name,
      validationRule: 'pattern'
    });
  }
  if (typeof info.factory !== 'function') {
    throw new ValidationError('Platform factory must be a function', { fieldName: 'factory' });
  }
}

export function platformInfoToJSON(info: PlatformInfo): PlatformInfoJSON {
  return {
    name: info.name,
    display_name: info.displayName,
    platform_type: info.kind,
    capabilities: [...info.capabilities],
    version: info.version,
    description: info.description,
    metadata: { ...info.metadata },
    created_at: info.createdAt.toISOString()
  };
}

export class PlatformRegistry {
  private readonly platforms = new Map<string, PlatformInfo>();

  register(input: PlatformInfoInput, options: { force?: boolean } = {}): PlatformInfo {
    validatePlatformInfo(input);

    if (this.platforms.has(input.name) && !options.force) {
      throw new RegistryError(`Platform '${input.name}' is already registered`, input.name);
    }

    const info: PlatformInfo = {
      ...input,
      capabilities: [...(input.capabilities ?? [])],
      version: input.version ?? '1.0.0',
      description: input.description ?? '',
      metadata: { ...(input.metadata ?? {}) },
      createdAt: new Date()
    };
    this.platforms.set(info.name, info);

    log.info({ platform: info.name, kind: info.kind, version: info.version }, 'Platform registered');
    return info;
  }

  unregister(name: string): boolean {
    const removed = this.platforms.delete(name);
    if (removed) {
      log.info({ platform: name }, 'Platform unregistered');
    }
    return removed;
  }

  getInfo(name: string): PlatformInfo | undefined {
    return this.platforms.get(name);
  }

  isRegistered(name: string): boolean {
    return this.platforms.has(name);
  }

  list(filter: { kind?: PlatformKind; capability?: PlatformCapability } = {}): PlatformInfo[] {
    return [...this.platforms.values()].filter(
      info =>
        (filter.kind === undefined || info.kind === filter.kind) &&
        (filter.capability === undefined || info.capabilities.includes(filter.capability))
    );
  }

  createInstance(name: string, config: PlatformConfig): UploadAdapter | PublishAdapter {
    const info = this.requireInfo(name);
    try {
      const instance = info.factory(name, config);
      log.debug({ platform: name }, 'Platform instance created');
      return instance;
    } catch (error) {
      throw new RegistryError(`Failed to create platform instance for '${name}': ${errorMessage(error)}`, name, error);
    }
  }

  createUploader(name: string, config: PlatformConfig): UploadAdapter {
    const info = this.requireInfo(name);
    if (info.kind !== 'uploader') {
      throw new RegistryError(`Platform '${name}' is not an uploader`, name);
    }
    return this.build(info.factory, name, config);
  }

  createPublisher(name: string, config: PlatformConfig): PublishAdapter {
    const info = this.requireInfo(name);
    if (info.kind !== 'publisher') {
      throw new RegistryError(`Platform '${name}' is not a publisher`, name);
    }
    return this.build(info.factory, name, config);
  }

  /**
   * Build an instance and ask it for its health; failures count as unhealthy
   */
  async checkHealth(name: string, config: PlatformConfig): Promise<boolean> {
    this.requireInfo(name);
    try {
      const instance = this.createInstance(name, config);
      return instance.healthCheck ? await instance.healthCheck() : true;
    } catch (error) {
      log.warn({ platform: name, err: error }, 'Platform health check failed');
      return false;
    }
  }

  getStats(): RegistryStats {
    const capabilities: Partial<Record<PlatformCapability, number>> = {};
    let uploaders = 0;
    let publishers = 0;

    for (const info of this.platforms.values()) {
      if (info.kind === 'uploader') uploaders++;
      else publishers++;
      for (const capability of info.capabilities) {
        capabilities[capability] = (capabilities[capability] ?? 0) + 1;
      }
    }

    return { totalPlatforms: this.platforms.size, uploaders, publishers, capabilities };
  }

  exportConfig(): { platforms: PlatformInfoJSON[]; exportedAt: string } {
    return {
      platforms: [...this.platforms.values()].map(platformInfoToJSON),
      exportedAt: new Date().toISOString()
    };
  }

  clear(): void {
    this.platforms.clear();
    log.info('Registry cleared');
  }

  private requireInfo(name: string): PlatformInfo {
    const info = this.platforms.get(name);
    if (!info) {
      throw new RegistryError(`Platform '${name}' is not registered`, name);
    }
    return info;
  }

  private build<T>(factory: (platformName: string, config: PlatformConfig) => T, name: string, config: PlatformConfig): T {
    try {
      return factory(name, config);
    } catch (error) {
      throw new RegistryError(`Failed to create platform instance for '${name}': ${errorMessage(error)}`, name, error);
    }
  }
}
