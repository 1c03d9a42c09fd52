/**
 * Sources Module
 *
 * Source adapters fetch one source identifier and shape the response into a
 * RawSourceData payload. A failed fetch is returned as a FETCH_FAILURE result,
 * never thrown, so one bad source cannot stop an aggregation run.
 *
 * Adapters:
 * - WebsiteSourceAdapter: portfolio website over HTTP (title, description, images, text)
 * - SocialSourceAdapter / CareerSourceAdapter: configured profile provider API
 * - DocumentSourceAdapter: plain-text résumés on disk
 *
 * Also exports HttpMediaFetcher, which downloads portfolio images for analysis.
 *
 * Usage:
 * ```typescript
 * const adapters = createSourceAdapters(config.sources);
 * const result = await adapters.website.fetch('https://jane.example');
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import { readFile } from 'fs/promises';
import { parse, type HTMLElement } from 'node-html-parser';
import { extname } from 'path';
import { z } from 'zod';
import {
  MEDIA_KINDS,
  type ErrorCode,
  type ModuleResult,
  type RawCareerData,
  type RawSocialData,
  type RawSourceData,
  type RawWebsiteData,
  type RawDocumentData,
  type SourceKind,
} from '../types/index.js';
import type { SourceApiConfig } from '../config/index.js';
import { IMAGE_MEDIA_TYPES, type ImageInput, type ImageMediaType } from '../ai/index.js';
import {
  createLogger,
  errorMessage,
  noopMetrics,
  type Logger,
  type Metrics,
} from '../observability/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Fetch-and-shape capability for one source kind
 */
export interface SourceAdapter<T extends RawSourceData = RawSourceData> {
  readonly kind: SourceKind;
  fetch(identifier: string, options?: FetchOptions): Promise<ModuleResult<T>>;
}

/**
 * One adapter per source kind
 */
export type SourceAdapterRegistry = Record<SourceKind, SourceAdapter>;

/**
 * Downloads image bytes for portfolio media analysis
 */
export interface MediaFetcher {
  fetchImage(url: string, options?: FetchOptions): Promise<ModuleResult<ImageInput>>;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_TIMEOUT_MS = 10000;

/** Largest image accepted for analysis */
export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

/** Document formats that need a parser this system does not ship */
const BINARY_DOCUMENT_EXTENSIONS = new Set(['.pdf', '.doc', '.docx', '.odt', '.rtf']);

const USER_AGENT = 'talent-profile-aggregator/1.0';

// ============================================================================
// Result helpers
// ============================================================================

function succeed<T>(data: T, startTime: number): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: {
      runId: '',
      module: 'sources',
      timestamp: new Date(startTime).toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function fail<T>(message: string, startTime: number, details?: unknown, code: ErrorCode = 'FETCH_FAILURE'): ModuleResult<T> {
  return {
    success: false,
    error: { code, message, details },
    metadata: {
      runId: '',
      module: 'sources',
      timestamp: new Date(startTime).toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return errorMessage(error);
}

// ============================================================================
// HTML extraction
// ============================================================================

/**
 * Parse a page, dropping comments and the content of script, noscript and style
 */
export function parseHtml(html: string): HTMLElement {
  const root = parse(html, {
    comment: false,
    blockTextElements: {
      script: false,
      noscript: false,
      style: false,
    },
  });
  for (const el of root.querySelectorAll('script, noscript, style')) {
    el.remove();
  }
  return root;
}

/**
 * Extract the <title> text
 */
export function extractTitle(root: HTMLElement): string | null {
  const title = root.querySelector('title')?.text.trim();
  return title ? title : null;
}

/**
 * Extract the meta description content
 */
export function extractDescription(root: HTMLElement): string {
  const meta = root
    .querySelectorAll('meta')
    .find((el) => (el.getAttribute('name') ?? '').toLowerCase() === 'description');
  return meta?.getAttribute('content')?.trim() ?? '';
}

/**
 * Extract absolute image URLs from <img src> attributes
 *
 * Absolute http(s) URLs are kept, root-relative and protocol-relative paths are
 * resolved against the page URL, anything else (data URIs, bare relative paths)
 * is dropped.
 */
export function extractImages(root: HTMLElement, pageUrl: string): string[] {
  const images: string[] = [];
  for (const img of root.querySelectorAll('img')) {
    const src = img.getAttribute('src')?.trim();
    if (!src) {
      continue;
    }
    if (/^https?:\/\//i.test(src)) {
      images.push(src);
    } else if (src.startsWith('/') && URL.canParse(src, pageUrl)) {
      images.push(new URL(src, pageUrl).toString());
    }
  }
  return images;
}

/**
 * Reduce a parsed page to its visible text, entities decoded
 */
export function extractText(root: HTMLElement): string {
  return root.text.replace(/\s+/g, ' ').trim();
}

// ============================================================================
// Website adapter
// ============================================================================

/**
 * Fetches a portfolio website and extracts its content
 */
export class WebsiteSourceAdapter implements SourceAdapter<RawWebsiteData> {
  readonly kind = 'website' as const;
  private readonly client: AxiosInstance;

  constructor(
    config: { timeout?: number; client?: AxiosInstance } = {},
    private readonly logger: Logger = createLogger('sources'),
    private readonly metrics: Metrics = noopMetrics
  ) {
    this.client =
      config.client ??
      axios.create({
        timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
        headers: { 'User-Agent': USER_AGENT },
      });
  }

  async fetch(identifier: string, options: FetchOptions = {}): Promise<ModuleResult<RawWebsiteData>> {
    const startTime = Date.now();
    this.logger.info('Fetching website', { url: identifier });

    try {
      const response = await this.client.get<string>(identifier, {
        responseType: 'text',
        signal: options.signal,
      });
      const html = typeof response.data === 'string' ? response.data : String(response.data);
      const root = parseHtml(html);

      const data: RawWebsiteData = {
        kind: 'website',
        title: extractTitle(root),
        description: extractDescription(root),
        images: extractImages(root, identifier),
        content: extractText(root),
      };

      this.metrics.increment('sources.fetch.success', { kind: this.kind });
      this.logger.info('Website fetched', { url: identifier, images: data.images.length });
      return succeed(data, startTime);
    } catch (error) {
      const message = describeHttpError(error);
      this.metrics.increment('sources.fetch.failure', { kind: this.kind });
      this.logger.warn('Website fetch failed', { url: identifier, error: message });
      return fail(`Failed to fetch website ${identifier}: ${message}`, startTime);
    }
  }
}

// ============================================================================
// Profile provider adapters (social, career)
// ============================================================================

const SocialProfileResponseSchema = z.object({
  display_name: z.string(),
  bio: z.string().nullish().transform((value) => value ?? ''),
  follower_count: z.number().int().nonnegative().default(0),
  posts: z
    .array(
      z.object({
        url: z.string().nullish().transform((value) => value ?? null),
        caption: z.string().nullish().transform((value) => value ?? ''),
        likes: z.number().int().nonnegative().default(0),
        type: z.enum(MEDIA_KINDS).catch('image'),
      })
    )
    .default([]),
});

const CareerProfileResponseSchema = z.object({
  name: z.string().nullish().transform((value) => value ?? null),
  headline: z.string().nullish().transform((value) => value ?? null),
  location: z.string().nullish().transform((value) => value ?? null),
  experience: z
    .array(
      z.object({
        title: z.string(),
        company: z.string(),
        duration: z.string().nullish().transform((value) => value ?? null),
        description: z.string().nullish().transform((value) => value ?? ''),
      })
    )
    .default([]),
  education: z
    .array(
      z.object({
        degree: z.string(),
        school: z.string(),
        year: z.string().nullish().transform((value) => value ?? null),
      })
    )
    .default([]),
  skills: z.array(z.string()).default([]),
});

/**
 * Username from a handle or profile URL: the last non-empty path segment
 */
export function extractUsername(identifier: string): string {
  const segments = identifier.trim().split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? identifier.trim();
}

/**
 * HTTP client for the profile provider API
 *
 * @returns null when no provider URL is configured
 */
export function createProviderClient(config: SourceApiConfig): AxiosInstance | null {
  if (!config.apiUrl) {
    return null;
  }
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
  };
  if (config.apiKey) {
    headers.Authorization = `Bearer ${config.apiKey}`;
  }
  return axios.create({
    baseURL: config.apiUrl,
    timeout: config.timeout,
    headers,
  });
}

/**
 * Shared HTTP plumbing for the profile provider API
 */
abstract class ProfileApiSourceAdapter<T extends RawSourceData> implements SourceAdapter<T> {
  abstract readonly kind: T['kind'];
  protected readonly client: AxiosInstance | null;

  constructor(
    config: SourceApiConfig & { client?: AxiosInstance },
    protected readonly logger: Logger = createLogger('sources'),
    protected readonly metrics: Metrics = noopMetrics
  ) {
    this.client = config.client ?? createProviderClient(config);
  }

  protected abstract request(client: AxiosInstance, identifier: string, options: FetchOptions): Promise<unknown>;

  protected abstract shape(payload: unknown): T | null;

  async fetch(identifier: string, options: FetchOptions = {}): Promise<ModuleResult<T>> {
    const startTime = Date.now();

    if (!this.client) {
      this.logger.warn('Profile provider not configured, skipping source', { kind: this.kind, identifier });
      return fail('SOURCE_API_URL is not configured', startTime, { kind: this.kind });
    }

    try {
      const payload = await this.request(this.client, identifier, options);
      const data = this.shape(payload);

      if (!data) {
        this.metrics.increment('sources.fetch.invalid', { kind: this.kind });
        this.logger.warn('Profile provider returned an unexpected payload', { kind: this.kind, identifier });
        return fail(`Unexpected ${this.kind} payload for ${identifier}`, startTime);
      }

      this.metrics.increment('sources.fetch.success', { kind: this.kind });
      return succeed(data, startTime);
    } catch (error) {
      const message = describeHttpError(error);
      this.metrics.increment('sources.fetch.failure', { kind: this.kind });
      this.logger.warn('Profile provider request failed', { kind: this.kind, identifier, error: message });
      return fail(`Failed to fetch ${this.kind} profile ${identifier}: ${message}`, startTime);
    }
  }
}

/**
 * Social-network profile (display name, bio, recent posts)
 */
export class SocialSourceAdapter extends ProfileApiSourceAdapter<RawSocialData> {
  readonly kind = 'social' as const;

  protected async request(client: AxiosInstance, identifier: string, options: FetchOptions): Promise<unknown> {
    const username = extractUsername(identifier);
    const response = await client.get<unknown>(`/v1/social/profiles/${encodeURIComponent(username)}`, {
      signal: options.signal,
    });
    return response.data;
  }

  protected shape(payload: unknown): RawSocialData | null {
    const parsed = SocialProfileResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    return {
      kind: 'social',
      display_name: parsed.data.display_name,
      bio: parsed.data.bio,
      follower_count: parsed.data.follower_count,
      posts: parsed.data.posts.map((post) => ({
        url: post.url,
        caption: post.caption,
        likes: post.likes,
        media_kind: post.type,
      })),
    };
  }
}

/**
 * Career-site profile (headline, location, experience, skills)
 */
export class CareerSourceAdapter extends ProfileApiSourceAdapter<RawCareerData> {
  readonly kind = 'career' as const;

  protected async request(client: AxiosInstance, identifier: string, options: FetchOptions): Promise<unknown> {
    const response = await client.get<unknown>('/v1/career/profiles', {
      params: { url: identifier },
      signal: options.signal,
    });
    return response.data;
  }

  protected shape(payload: unknown): RawCareerData | null {
    const parsed = CareerProfileResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    return { kind: 'career', ...parsed.data };
  }
}

// ============================================================================
// Document adapter
// ============================================================================

/**
 * Reads plain-text résumés from the local filesystem
 */
export class DocumentSourceAdapter implements SourceAdapter<RawDocumentData> {
  readonly kind = 'document' as const;

  constructor(
    private readonly logger: Logger = createLogger('sources'),
    private readonly metrics: Metrics = noopMetrics
  ) {}

  async fetch(identifier: string, _options: FetchOptions = {}): Promise<ModuleResult<RawDocumentData>> {
    const startTime = Date.now();
    const extension = extname(identifier).toLowerCase();

    if (BINARY_DOCUMENT_EXTENSIONS.has(extension)) {
      this.logger.warn('Binary document formats are not parsed', { path: identifier, extension });
      this.metrics.increment('sources.fetch.failure', { kind: this.kind });
      return fail(`Unsupported document format: ${extension}`, startTime, { extension });
    }

    try {
      const text = await readFile(identifier, 'utf-8');
      this.metrics.increment('sources.fetch.success', { kind: this.kind });
      return succeed({ kind: 'document', text }, startTime);
    } catch (error) {
      const message = errorMessage(error);
      this.metrics.increment('sources.fetch.failure', { kind: this.kind });
      this.logger.warn('Document read failed', { path: identifier, error: message });
      return fail(`Failed to read document ${identifier}: ${message}`, startTime);
    }
  }
}

// ============================================================================
// Media fetcher
// ============================================================================

function toImageMediaType(contentType: string): ImageMediaType | undefined {
  const base = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  const normalized = base === 'image/jpg' ? 'image/jpeg' : base;
  return IMAGE_MEDIA_TYPES.find((type) => type === normalized);
}

/**
 * Downloads portfolio images over HTTP
 */
export class HttpMediaFetcher implements MediaFetcher {
  private readonly client: AxiosInstance;

  constructor(
    config: { timeout?: number; client?: AxiosInstance } = {},
    private readonly logger: Logger = createLogger('sources')
  ) {
    this.client =
      config.client ??
      axios.create({
        timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
        headers: { 'User-Agent': USER_AGENT },
      });
  }

  async fetchImage(url: string, options: FetchOptions = {}): Promise<ModuleResult<ImageInput>> {
    const startTime = Date.now();

    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        maxContentLength: MAX_IMAGE_BYTES,
        signal: options.signal,
      });

      const mediaType = toImageMediaType(String(response.headers['content-type'] ?? ''));
      if (!mediaType) {
        return fail(`Unsupported image content type for ${url}`, startTime, {
          contentType: response.headers['content-type'],
        });
      }

      const data = Buffer.from(response.data);
      if (data.length === 0 || data.length > MAX_IMAGE_BYTES) {
        return fail(`Image size out of range for ${url}`, startTime, { size: data.length });
      }

      return succeed({ data, mediaType }, startTime);
    } catch (error) {
      const message = describeHttpError(error);
      this.logger.warn('Image download failed', { url, error: message });
      return fail(`Failed to download image ${url}: ${message}`, startTime);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create one adapter per source kind from configuration
 */
export function createSourceAdapters(
  config: SourceApiConfig,
  logger: Logger = createLogger('sources'),
  metrics: Metrics = noopMetrics
): SourceAdapterRegistry {
  return {
    social: new SocialSourceAdapter(config, logger, metrics),
    career: new CareerSourceAdapter(config, logger, metrics),
    website: new WebsiteSourceAdapter({ timeout: config.timeout }, logger, metrics),
    document: new DocumentSourceAdapter(logger, metrics),
  };
}
