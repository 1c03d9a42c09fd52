/**
 * Configuration Module
 *
 * Reads the runtime configuration from environment variables and validates
 * it with zod. Every other module receives plain config objects; only this
 * module touches process.env.
 *
 * Usage:
 * ```typescript
 * const result = loadConfig();
 * if (!result.success) throw new Error(result.error.message);
 * const deps = createProfileBuilderFromConfig(result.data);
 * ```
 */

import { z } from 'zod';
import type { ModuleResult } from '../types/index.js';
import type { LogLevel } from '../observability/index.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

/**
 * Zod schema for the raw environment
 */
const EnvSchema = z
  .object({
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: optionalString,
    ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    SOURCE_API_URL: optionalString.pipe(z.string().url().optional()),
    SOURCE_API_KEY: optionalString,
    SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    STORAGE_BACKEND: z.enum(['memory', 's3']).default('memory'),
    S3_BUCKET: optionalString,
    AWS_REGION: optionalString,
    S3_PREFIX: optionalString,
    S3_ENDPOINT: optionalString,
    S3_FORCE_PATH_STYLE: booleanFlag,
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 's3' && !env.S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET'],
        message: 'S3_BUCKET is required when STORAGE_BACKEND is s3',
      });
    }
  });

export interface AIConfig {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeout: number;
}

export interface SourceApiConfig {
  apiUrl?: string;
  apiKey?: string;
  timeout: number;
}

export type StorageConfig =
  | { backend: 'memory' }
  | {
      backend: 's3';
      bucket: string;
      region: string;
      prefix: string;
      endpoint?: string;
      forcePathStyle: boolean;
    };

/**
 * Resolved application configuration
 */
export interface AppConfig {
  ai: AIConfig;
  sources: SourceApiConfig;
  storage: StorageConfig;
  logLevel: LogLevel;
}

/**
 * Load and validate configuration from an environment record
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns ModuleResult with the resolved configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ModuleResult<AppConfig> {
  const timestamp = new Date().toISOString();
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'INVALID_REQUEST',
        message: 'Invalid configuration',
        details: errors,
      },
      metadata: { runId: '', module: 'config', timestamp },
    };
  }

  const raw = parsed.data;

  let storage: StorageConfig = { backend: 'memory' };
  if (raw.STORAGE_BACKEND === 's3' && raw.S3_BUCKET) {
    const s3: Extract<StorageConfig, { backend: 's3' }> = {
      backend: 's3',
      bucket: raw.S3_BUCKET,
      region: raw.AWS_REGION ?? 'us-east-1',
      prefix: raw.S3_PREFIX ?? 'profiles',
      forcePathStyle: raw.S3_FORCE_PATH_STYLE,
    };
    if (raw.S3_ENDPOINT) {
      s3.endpoint = raw.S3_ENDPOINT;
    }
    storage = s3;
  }

  const ai: AIConfig = {
    model: raw.ANTHROPIC_MODEL ?? DEFAULT_MODEL,
    maxTokens: raw.ANTHROPIC_MAX_TOKENS,
    timeout: raw.AI_TIMEOUT_MS,
  };
  if (raw.ANTHROPIC_API_KEY) {
    ai.apiKey = raw.ANTHROPIC_API_KEY;
  }

  const sources: SourceApiConfig = { timeout: raw.SOURCE_TIMEOUT_MS };
  if (raw.SOURCE_API_URL) {
    sources.apiUrl = raw.SOURCE_API_URL;
  }
  if (raw.SOURCE_API_KEY) {
    sources.apiKey = raw.SOURCE_API_KEY;
  }

  return {
    success: true,
    data: { ai, sources, storage, logLevel: raw.LOG_LEVEL },
    metadata: { runId: '', module: 'config', timestamp },
  };
}
