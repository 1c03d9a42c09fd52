/**
 * Storage Module
 *
 * Responsibilities:
 * - Implement the ProfileStore interface (upsert, get, list)
 * - S3ProfileStore using AWS SDK v3
 * - MemoryProfileStore for tests and local runs
 *
 * Upserts replace the stored record wholesale; created_at and updated_at are
 * both stamped at write time.
 *
 * Storage layout:
 * - {prefix}/{encoded user_id}/profile.json
 *
 * Usage:
 * const store = createProfileStore(config.storage);
 * await store.upsert(profile.user_id, profile);
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { z } from 'zod';
import {
  MEDIA_KINDS,
  SOURCE_KINDS,
  type Profile,
  type ProfileStore,
  type ProfileSummary,
  type StoredProfile,
  type UserId,
} from '../types/index.js';
import type { StorageConfig } from '../config/index.js';
import { ImageAnalysisSchema } from '../ai/index.js';
import { createLogger, errorMessage, type Logger } from '../observability/index.js';

export type { ProfileStore };

/** Number of skills carried in a listing entry */
export const SUMMARY_SKILL_COUNT = 5;

const PROFILE_FILE_NAME = 'profile.json';

/**
 * S3 configuration for the profile store
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'profiles') */
  prefix?: string;
  /** Custom endpoint for S3-compatible services such as MinIO */
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  forcePathStyle?: boolean;
}

/**
 * Shape of a persisted profile document
 */
export const StoredProfileSchema = z.object({
  user_id: z.string().min(1),
  name: z.string().nullable(),
  bio: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  location: z.string().nullable(),
  profession: z.string().nullable(),
  skills: z.array(z.string()),
  social_links: z.object({
    social: z.string().optional(),
    website: z.string().optional(),
  }),
  portfolio_items: z.array(
    z.object({
      title: z.string(),
      description: z.string(),
      media_kind: z.enum(MEDIA_KINDS),
      media_url: z.string().nullable(),
      tags: z.array(z.string()),
      source_kind: z.enum(SOURCE_KINDS),
      ai_analysis: ImageAnalysisSchema.nullable(),
    })
  ),
  created_at: z.string(),
  updated_at: z.string(),
});

/**
 * Stamp a profile for storage
 */
export function toStoredProfile(profile: Profile, now: string): StoredProfile {
  return {
    user_id: profile.user_id,
    name: profile.name,
    bio: profile.bio,
    email: profile.email,
    phone: profile.phone,
    location: profile.location,
    profession: profile.profession,
    skills: [...profile.skills],
    social_links: { ...profile.social_links },
    portfolio_items: profile.portfolio_items.map((item) => ({
      ...item,
      tags: [...item.tags],
      ai_analysis: item.ai_analysis
        ? { ...item.ai_analysis, subjects: [...item.ai_analysis.subjects], tags: [...item.ai_analysis.tags] }
        : null,
    })),
    created_at: now,
    updated_at: now,
  };
}

/**
 * Listing entry for a stored profile
 */
export function summarizeProfile(profile: StoredProfile): ProfileSummary {
  return {
    user_id: profile.user_id,
    name: profile.name,
    profession: profile.profession,
    skills: profile.skills.slice(0, SUMMARY_SKILL_COUNT),
    created_at: profile.created_at,
  };
}

/**
 * Sort summaries newest first
 */
function byCreatedAtDesc(a: ProfileSummary, b: ProfileSummary): number {
  return b.created_at.localeCompare(a.created_at);
}

/**
 * Raised when a stored object does not decode to a StoredProfile
 */
export class MalformedProfileError extends Error {
  constructor(
    readonly userId: UserId,
    reason: string
  ) {
    super(`Stored profile for ${userId} is malformed: ${reason}`);
    this.name = 'MalformedProfileError';
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.message.includes('404') ||
      error.message.includes('Not Found'))
  );
}

/**
 * S3 implementation of ProfileStore using AWS SDK v3
 */
export class S3ProfileStore implements ProfileStore {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(
    config: S3Config,
    client?: S3Client,
    private readonly logger: Logger = createLogger('storage')
  ) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'profiles';

    if (client) {
      this.client = client;
      return;
    }

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  private getKey(userId: UserId): string {
    return `${this.prefix}/${encodeURIComponent(userId)}/${PROFILE_FILE_NAME}`;
  }

  async upsert(userId: UserId, profile: Profile): Promise<StoredProfile> {
    const stored = toStoredProfile(profile, new Date().toISOString());

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(userId),
        Body: JSON.stringify(stored),
        ContentType: 'application/json',
        Metadata: {
          'user-id': encodeURIComponent(userId),
          'updated-at': stored.updated_at,
        },
      })
    );

    return stored;
  }

  async get(userId: UserId): Promise<StoredProfile | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(userId),
        })
      );

      if (!response.Body) {
        return null;
      }

      const content = await response.Body.transformToString();
      let payload: unknown;
      try {
        payload = JSON.parse(content);
      } catch (error) {
        throw new MalformedProfileError(userId, errorMessage(error));
      }
      const parsed = StoredProfileSchema.safeParse(payload);
      if (!parsed.success) {
        throw new MalformedProfileError(userId, parsed.error.message);
      }
      return parsed.data;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async list(): Promise<ProfileSummary[]> {
    const summaries: ProfileSummary[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: `${this.prefix}/`,
          ContinuationToken: continuationToken,
        })
      );

      for (const object of response.Contents ?? []) {
        const key = object.Key ?? '';
        if (!key.endsWith(`/${PROFILE_FILE_NAME}`)) {
          continue;
        }
        const encodedId = key.slice(this.prefix.length + 1, -(PROFILE_FILE_NAME.length + 1));
        const profile = await this.readForListing(decodeURIComponent(encodedId));
        if (profile) {
          summaries.push(summarizeProfile(profile));
        }
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return summaries.sort(byCreatedAtDesc);
  }

  private async readForListing(userId: UserId): Promise<StoredProfile | null> {
    try {
      return await this.get(userId);
    } catch (error: unknown) {
      if (error instanceof MalformedProfileError) {
        this.logger.warn('Skipping malformed stored profile', { userId, error: error.message });
        return null;
      }
      throw error;
    }
  }
}

/**
 * In-memory profile store for tests and local development
 */
export class MemoryProfileStore implements ProfileStore {
  private store: Map<UserId, StoredProfile> = new Map();

  /**
   * @param clock - Timestamp source, replaceable for deterministic tests
   */
  constructor(private readonly clock: () => Date = () => new Date()) {}

  async upsert(userId: UserId, profile: Profile): Promise<StoredProfile> {
    const stored = toStoredProfile(profile, this.clock().toISOString());
    this.store.set(userId, stored);
    return toStoredProfile(stored, stored.created_at);
  }

  async get(userId: UserId): Promise<StoredProfile | null> {
    const stored = this.store.get(userId);
    return stored ? toStoredProfile(stored, stored.created_at) : null;
  }

  async list(): Promise<ProfileSummary[]> {
    return Array.from(this.store.values(), summarizeProfile).sort(byCreatedAtDesc);
  }

  /**
   * Clear all stored profiles (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get the number of stored profiles (useful for testing)
   */
  size(): number {
    return this.store.size;
  }
}

/**
 * Create the profile store for a storage configuration
 */
export function createProfileStore(config: StorageConfig): ProfileStore {
  if (config.backend === 'memory') {
    return new MemoryProfileStore();
  }
  const s3Config: S3Config = {
    bucket: config.bucket,
    region: config.region,
    prefix: config.prefix,
    forcePathStyle: config.forcePathStyle,
  };
  if (config.endpoint) {
    s3Config.endpoint = config.endpoint;
  }
  return new S3ProfileStore(s3Config);
}
