/**
 * AI Module
 *
 * The generative-AI capability consumed by skill extraction, bio generation
 * and media tagging. Two operations, both single-attempt and both returning an
 * explicit failure variant instead of throwing:
 * - generateText(prompt)
 * - analyzeImage(image)
 *
 * Features:
 * - Claude API integration with @anthropic-ai/sdk
 * - JSON payload extraction (code fences tolerated)
 * - zod validation of structured image analysis
 * - NullAICapability when no API key is configured
 *
 * Usage:
 * ```typescript
 * const ai = createAICapability(config.ai, logger);
 * const result = await ai.generateText('Summarize ...');
 * ```
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming, MessageParam } from '@anthropic-ai/sdk/resources/messages';
import { z } from 'zod';
import type { ErrorCode, ImageAnalysis, ModuleResult } from '../types/index.js';
import type { AIConfig } from '../config/index.js';
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

export const IMAGE_MEDIA_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;

export type ImageMediaType = (typeof IMAGE_MEDIA_TYPES)[number];

/**
 * Image bytes handed to analyzeImage
 */
export interface ImageInput {
  data: Buffer;
  mediaType: ImageMediaType;
}

export interface AIRequestOptions {
  signal?: AbortSignal;
}

/**
 * Generative-AI capability: "given a prompt or image, return text/JSON, fallibly"
 */
export interface AICapability {
  readonly name: string;
  generateText(prompt: string, options?: AIRequestOptions): Promise<ModuleResult<string>>;
  analyzeImage(image: ImageInput, options?: AIRequestOptions): Promise<ModuleResult<ImageAnalysis>>;
}

// ============================================================================
// Prompts
// ============================================================================

export const IMAGE_ANALYSIS_PROMPT = `Analyze this image and provide:
1. Content type (portrait, landscape, product, artwork, etc.)
2. Main subjects or themes
3. Technical quality assessment
4. Relevant tags/keywords
5. Professional category (photography, design, art, etc.)

Return as JSON format with keys: content_type, subjects, quality, tags, category`;

const SYSTEM_PROMPT =
  'You help build professional profiles for creative talent. When asked for JSON, output only raw JSON with no markdown code fences and no explanatory text.';

// ============================================================================
// Parsing
// ============================================================================

export const ImageAnalysisSchema = z.object({
  content_type: z.string(),
  subjects: z.array(z.string()).default([]),
  quality: z.string(),
  tags: z.array(z.string()).default([]),
  category: z.string(),
});

/**
 * Remove a surrounding markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```json')) {
    cleaned = cleaned.slice(7);
  } else if (cleaned.startsWith('```')) {
    cleaned = cleaned.slice(3);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Parse a JSON payload from model output
 *
 * @returns The parsed value, or undefined when the text is not JSON
 */
export function parseJsonPayload(text: string): unknown {
  try {
    return JSON.parse(stripCodeFence(text));
  } catch {
    return undefined;
  }
}

/**
 * Validate model output against the image analysis schema
 */
export function parseImageAnalysis(text: string): ImageAnalysis | null {
  const parsed = ImageAnalysisSchema.safeParse(parseJsonPayload(text));
  return parsed.success ? parsed.data : null;
}

// ============================================================================
// Result helpers
// ============================================================================

function succeed<T>(data: T, startTime: number): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: {
      runId: '',
      module: 'ai',
      timestamp: new Date(startTime).toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function fail<T>(code: ErrorCode, message: string, startTime: number, details?: unknown): ModuleResult<T> {
  return {
    success: false,
    error: { code, message, details },
    metadata: {
      runId: '',
      module: 'ai',
      timestamp: new Date(startTime).toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

// ============================================================================
// Capabilities
// ============================================================================

/**
 * Capability used when no provider is configured; every call fails
 * with AI_NOT_CONFIGURED so consumers fall back to their degraded values.
 */
export class NullAICapability implements AICapability {
  readonly name = 'null';

  async generateText(_prompt: string): Promise<ModuleResult<string>> {
    return fail('AI_NOT_CONFIGURED', 'No AI provider configured', Date.now());
  }

  async analyzeImage(_image: ImageInput): Promise<ModuleResult<ImageAnalysis>> {
    return fail('AI_NOT_CONFIGURED', 'No AI provider configured', Date.now());
  }
}

type MessageContent = MessageParam['content'];

/**
 * The slice of a Messages API response this module reads
 */
export interface CompletionResponse {
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
  stop_reason: string | null;
}

/**
 * Messages API surface used by AnthropicCapability; an Anthropic client satisfies it
 */
export interface MessagesClient {
  messages: {
    create(
      body: MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<CompletionResponse>;
  };
}

/**
 * Claude-backed capability
 *
 * Each call is a single attempt: rate limits and transport errors surface as
 * AI_REQUEST_FAILED and the caller degrades.
 */
export class AnthropicCapability implements AICapability {
  readonly name = 'anthropic';
  private readonly client: MessagesClient;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(
    config: Required<Pick<AIConfig, 'apiKey'>> & Omit<AIConfig, 'apiKey'>,
    private readonly logger: Logger = createLogger('ai'),
    private readonly metrics: Metrics = noopMetrics,
    client?: MessagesClient
  ) {
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.client =
      client ??
      new Anthropic({
        apiKey: config.apiKey,
        timeout: config.timeout,
        maxRetries: 0,
      });
  }

  async generateText(prompt: string, options: AIRequestOptions = {}): Promise<ModuleResult<string>> {
    return this.complete(prompt, 'generate_text', options);
  }

  async analyzeImage(image: ImageInput, options: AIRequestOptions = {}): Promise<ModuleResult<ImageAnalysis>> {
    const startTime = Date.now();
    const content: MessageContent = [
      {
        type: 'image',
        source: {
          type: 'base64',
          media_type: image.mediaType,
          data: image.data.toString('base64'),
        },
      },
      { type: 'text', text: IMAGE_ANALYSIS_PROMPT },
    ];

    const response = await this.complete(content, 'analyze_image', options);
    if (!response.success) {
      return response;
    }

    const analysis = parseImageAnalysis(response.data);
    if (!analysis) {
      this.logger.warn('Image analysis response did not match schema', {
        responsePreview: response.data.substring(0, 200),
      });
      this.metrics.increment('ai.invalid_response', { operation: 'analyze_image' });
      return fail('AI_RESPONSE_INVALID', 'Image analysis response is not valid JSON analysis', startTime, {
        responsePreview: response.data.substring(0, 500),
      });
    }

    return succeed(analysis, startTime);
  }

  /**
   * Send one message and return its text content
   */
  private async complete(
    content: MessageContent,
    operation: string,
    options: AIRequestOptions
  ): Promise<ModuleResult<string>> {
    const startTime = Date.now();

    this.logger.debug('Calling Claude API', { model: this.model, operation });
    this.metrics.increment('ai.calls', { model: this.model, operation });

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: 'user', content }],
        },
        { signal: options.signal }
      );

      const text = response.content.find((block) => block.type === 'text')?.text;
      if (text === undefined || text.trim().length === 0) {
        this.metrics.increment('ai.empty_response', { operation });
        return fail('AI_EMPTY_RESPONSE', 'No text content in Claude response', startTime);
      }

      this.logger.debug('Claude API response received', {
        operation,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason,
      });
      this.metrics.timing('ai.duration', Date.now() - startTime, { operation });

      return succeed(text, startTime);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Claude API call failed', { operation, error: message });
      this.metrics.increment('ai.errors', { operation });
      return fail('AI_REQUEST_FAILED', message, startTime);
    }
  }
}

/**
 * Create the AI capability for a configuration
 *
 * @returns AnthropicCapability when an API key is present, NullAICapability otherwise
 */
export function createAICapability(
  config: AIConfig,
  logger: Logger = createLogger('ai'),
  metrics: Metrics = noopMetrics
): AICapability {
  if (!config.apiKey) {
    logger.warn('ANTHROPIC_API_KEY not set, AI enrichment will use fallback values');
    return new NullAICapability();
  }

  return new AnthropicCapability(
    {
      apiKey: config.apiKey,
      model: config.model,
      maxTokens: config.maxTokens,
      timeout: config.timeout,
    },
    logger,
    metrics
  );
}
