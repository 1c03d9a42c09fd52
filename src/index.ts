/**
 * Talent Profile Aggregator - Main Entry Point
 *
 * Builds one canonical talent profile from heterogeneous sources (social
 * profiles, career sites, portfolio websites, résumés) and enriches it with
 * generative AI.
 *
 * Architecture:
 * - Source adapters fetch raw payloads concurrently
 * - The normalizer maps each payload to a ProfileDelta
 * - The aggregator folds deltas in request order
 * - The enrichment pass dedupes skills, backfills the bio and tags media
 * - The run manager drives the run states and persists the result
 */

// Core Types
export type * from './types/index.js';
export { SOURCE_KINDS, MEDIA_KINDS, SCALAR_FIELDS } from './types/index.js';

// Configuration
export {
  loadConfig,
  DEFAULT_MODEL,
  type AppConfig,
  type AIConfig,
  type SourceApiConfig,
  type StorageConfig,
} from './config/index.js';

// Observability
export {
  createLogger,
  noopMetrics,
  type Logger,
  type Metrics,
  type LogLevel,
  type Observability,
} from './observability/index.js';

// Normalizer Module - raw payloads to profile deltas
export {
  normalize,
  normalizeSource,
  parseSourceKind,
  emptyDelta,
  extractHashtags,
  trimString,
  MAX_WEBSITE_IMAGES,
  WEBSITE_SKILL_TEXT_LENGTH,
} from './normalizer/index.js';

// Aggregator Module - ordered fold with conflict rules
export { createProfile, foldDelta, foldDeltas } from './aggregator/index.js';

// AI Module
export {
  AnthropicCapability,
  NullAICapability,
  createAICapability,
  IMAGE_MEDIA_TYPES,
  type AICapability,
  type AIRequestOptions,
  type ImageInput,
  type ImageMediaType,
  type MessagesClient,
  type CompletionResponse,
} from './ai/index.js';

// Enrichment Module
export {
  extractSkills,
  generateBio,
  resolveDeltaSignals,
  enrichProfile,
  dedupeSkills,
  summarizePortfolio,
  BIO_FALLBACK,
  type BioInput,
  type BioOutcome,
  type EnrichmentReport,
  type EnrichmentDeps,
} from './enrichment/index.js';

// Sources Module
export {
  WebsiteSourceAdapter,
  SocialSourceAdapter,
  CareerSourceAdapter,
  DocumentSourceAdapter,
  HttpMediaFetcher,
  createProviderClient,
  createSourceAdapters,
  type SourceAdapter,
  type SourceAdapterRegistry,
  type MediaFetcher,
  type FetchOptions,
} from './sources/index.js';

// Storage Module - profile persistence
export {
  S3ProfileStore,
  MemoryProfileStore,
  MalformedProfileError,
  createProfileStore,
  type S3Config,
} from './storage/index.js';

// Run Manager Module - run lifecycle
export {
  buildProfile,
  getProfile,
  listProfiles,
  analyzeImage,
  initializeRunManager,
  resetRunManager,
  createProfileBuilderFromConfig,
  advanceRunState,
  canTransition,
  createRunTracker,
  BuildProfileRequestSchema,
  type BuildProfileRequest,
  type BuildProfileOptions,
  type AggregationRun,
  type RunState,
  type RunTransition,
  type RunTracker,
  type SourceReport,
  type SourceStatus,
  type RunManagerDeps,
} from './run-manager/index.js';
