/**
 * Core type definitions for the talent profile aggregator
 *
 * This module exports all shared types used across the system.
 */

/**
 * Unique identifier for one aggregation run
 * Format: run_<uuid>
 */
export type RunId = string;

/**
 * Identifier of the user a profile belongs to
 */
export type UserId = string;

// ============================================================================
// Sources
// ============================================================================

/**
 * Closed set of source kinds the normalizer understands
 */
export const SOURCE_KINDS = ['social', 'career', 'website', 'document'] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

/**
 * Media kinds a portfolio entry can carry
 */
export const MEDIA_KINDS = ['image', 'video', 'document'] as const;

export type MediaKind = (typeof MEDIA_KINDS)[number];

/**
 * Link kinds written into profile.social_links
 */
export type SocialLinkKind = 'social' | 'website';

export type SocialLinks = Partial<Record<SocialLinkKind, string>>;

/**
 * Post-like item returned by a social source
 */
export interface RawSocialPost {
  url: string | null;
  caption: string;
  likes: number;
  media_kind: MediaKind;
}

export interface RawSocialData {
  kind: 'social';
  display_name: string;
  bio: string;
  follower_count: number;
  posts: RawSocialPost[];
}

export interface RawCareerExperience {
  title: string;
  company: string;
  duration: string | null;
  description: string;
}

export interface RawCareerEducation {
  degree: string;
  school: string;
  year: string | null;
}

export interface RawCareerData {
  kind: 'career';
  name: string | null;
  headline: string | null;
  location: string | null;
  experience: RawCareerExperience[];
  education: RawCareerEducation[];
  skills: string[];
}

export interface RawWebsiteData {
  kind: 'website';
  title: string | null;
  description: string;
  images: string[];
  content: string;
}

export interface RawDocumentData {
  kind: 'document';
  text: string;
}

/**
 * Already-shaped, source-specific payload returned by a source adapter
 */
export type RawSourceData = RawSocialData | RawCareerData | RawWebsiteData | RawDocumentData;

// ============================================================================
// Profile model
// ============================================================================

/**
 * Scalar identity fields resolved first-non-empty-wins
 */
export const SCALAR_FIELDS = ['name', 'bio', 'email', 'phone', 'location', 'profession'] as const;

export type ScalarField = (typeof SCALAR_FIELDS)[number];

export type ProfileFields = Partial<Record<ScalarField, string>>;

/**
 * Portfolio entry proposed by a source, not yet AI-analyzed
 */
export interface PortfolioCandidate {
  title: string;
  description: string;
  media_kind: MediaKind;
  media_url: string | null;
  tags: string[];
  source_kind: SourceKind;
}

/**
 * Structured result of an image analysis
 */
export interface ImageAnalysis {
  content_type: string;
  subjects: string[];
  quality: string;
  tags: string[];
  category: string;
}

export interface PortfolioItem extends PortfolioCandidate {
  ai_analysis: ImageAnalysis | null;
}

/**
 * Text a delta hands to AI extraction before it is folded
 */
export interface PendingSignals {
  /** Free text skills are extracted from */
  skill_text: string | null;
  /** Experience text a career bio is generated from */
  bio_seed: string | null;
}

/**
 * Partial profile contribution derived from one source
 */
export interface ProfileDelta {
  readonly source_kind: SourceKind;
  readonly source_identifier: string;
  readonly fields: Readonly<ProfileFields>;
  readonly skills: readonly string[];
  readonly social_links: Readonly<SocialLinks>;
  readonly portfolio: readonly PortfolioCandidate[];
  readonly pending: Readonly<PendingSignals>;
}

/**
 * Canonical profile assembled by one aggregation run
 */
export interface Profile {
  readonly user_id: UserId;
  name: string | null;
  bio: string | null;
  email: string | null;
  phone: string | null;
  location: string | null;
  profession: string | null;
  skills: string[];
  social_links: SocialLinks;
  portfolio_items: PortfolioItem[];
}

/**
 * Profile as persisted by the profile store
 */
export interface StoredProfile extends Profile {
  created_at: string;
  updated_at: string;
}

/**
 * Listing entry returned by ProfileStore.list()
 */
export interface ProfileSummary {
  user_id: UserId;
  name: string | null;
  profession: string | null;
  skills: string[];
  created_at: string;
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * Key-value profile store keyed by user identifier
 * Upserts replace the stored record wholesale.
 */
export interface ProfileStore {
  upsert(userId: UserId, profile: Profile): Promise<StoredProfile>;
  get(userId: UserId): Promise<StoredProfile | null>;
  list(): Promise<ProfileSummary[]>;
}

// ============================================================================
// Results
// ============================================================================

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNSUPPORTED_SOURCE_KIND'
  | 'FETCH_FAILURE'
  | 'AI_NOT_CONFIGURED'
  | 'AI_REQUEST_FAILED'
  | 'AI_EMPTY_RESPONSE'
  | 'AI_RESPONSE_INVALID'
  | 'NOT_FOUND'
  | 'PERSISTENCE_ERROR'
  | 'STORAGE_ERROR'
  | 'RUN_CANCELLED';

export interface ModuleError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

export interface ResultMetadata {
  runId: RunId;
  module: string;
  timestamp: string;
  duration?: number;
}

/**
 * Module result wrapper shared by every component
 */
export type ModuleResult<T> =
  | { success: true; data: T; metadata: ResultMetadata }
  | { success: false; error: ModuleError; metadata: ResultMetadata };
