/**
 * Enrichment Module
 *
 * AI-backed steps of an aggregation run:
 * - Skill extraction from the free text a source contributed
 * - Career bio generation from experience entries
 * - The final enrichment pass: skill dedup, bio backfill, media tagging
 *
 * Key behaviors:
 * - Enrichment is NON-BLOCKING: every AI failure degrades to a defined value
 * - Nothing here throws on provider errors
 * - Media items are analyzed concurrently and independently
 */

import type { ImageAnalysis, PortfolioItem, Profile, ProfileDelta, ModuleResult } from '../types/index.js';
import { parseJsonPayload, type AICapability, type AIRequestOptions } from '../ai/index.js';
import type { MediaFetcher } from '../sources/index.js';
import { createLogger, errorMessage, noopMetrics, type Logger, type Metrics, type Observability } from '../observability/index.js';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Inputs for bio generation
 */
export interface BioInput {
  name?: string | null;
  profession?: string | null;
  skills: readonly string[];
  portfolioSummary?: string | null;
}

export type BioOutcome = 'existing' | 'not_needed' | 'generated' | 'fallback';

/**
 * What the enrichment pass did to a profile
 */
export interface EnrichmentReport {
  skills_before: number;
  skills_after: number;
  bio: BioOutcome;
  media: {
    analyzed: number;
    failed: number;
    skipped: number;
  };
}

export interface EnrichmentDeps extends Observability {
  ai: AICapability;
  media?: MediaFetcher;
  signal?: AbortSignal;
}

type SignalOptions = AIRequestOptions & Observability;

// =============================================================================
// Constants
// =============================================================================

/** Bio written when generation fails during the enrichment pass */
export const BIO_FALLBACK = 'Creative professional with diverse skills and experience.';

const DEFAULT_NAME = 'Unknown';
const DEFAULT_PROFESSION = 'Creative Professional';
const DEFAULT_PORTFOLIO_SUMMARY = 'Various creative works';

/** Distinct item titles quoted in a portfolio summary */
const PORTFOLIO_SUMMARY_TITLES = 5;

// =============================================================================
// Prompts
// =============================================================================

export function buildSkillPrompt(text: string): string {
  return `Extract professional skills and competencies from this text:

${text}

Return only a JSON array of skills, focusing on:
- Technical skills
- Creative skills
- Software proficiency
- Industry expertise

Example: ["Photography", "Adobe Photoshop", "Portrait Photography", "Digital Marketing"]`;
}

export function buildBioPrompt(input: BioInput): string {
  return `Create a professional bio for a creative professional based on this information:

Name: ${input.name ?? DEFAULT_NAME}
Profession: ${input.profession ?? DEFAULT_PROFESSION}
Skills: ${input.skills.join(', ')}
Portfolio highlights: ${input.portfolioSummary ?? DEFAULT_PORTFOLIO_SUMMARY}

Make it engaging, professional, and 2-3 sentences long. Focus on their creative expertise and unique value.`;
}

// =============================================================================
// Skill extraction
// =============================================================================

/**
 * Interpret a skill extraction response
 *
 * A JSON string array is returned as is; text that is not JSON is read as a
 * comma-separated list; any other JSON value yields no skills.
 */
export function parseSkillResponse(text: string): string[] {
  const parsed = parseJsonPayload(text);

  if (parsed === undefined) {
    return text
      .split(',')
      .map((skill) => skill.trim())
      .filter((skill) => skill.length > 0);
  }

  if (Array.isArray(parsed) && parsed.every((skill): skill is string => typeof skill === 'string')) {
    return parsed;
  }

  return [];
}

/**
 * Ask the AI capability for the skills named in a text
 *
 * @returns Extracted skills, or an empty list on any failure
 */
export async function extractSkills(
  text: string,
  ai: AICapability,
  options: SignalOptions = {}
): Promise<string[]> {
  const logger = options.logger ?? createLogger('enrichment');
  const metrics = options.metrics ?? noopMetrics;

  if (text.trim().length === 0) {
    return [];
  }

  let response: ModuleResult<string>;
  try {
    response = await ai.generateText(buildSkillPrompt(text), { signal: options.signal });
  } catch (error) {
    logger.warn('Skill extraction failed', { code: 'AI_REQUEST_FAILED', error: errorMessage(error) });
    metrics.increment('enrichment.skills.failure', { code: 'AI_REQUEST_FAILED' });
    return [];
  }
  if (!response.success) {
    logger.warn('Skill extraction failed', { code: response.error.code, error: response.error.message });
    metrics.increment('enrichment.skills.failure', { code: response.error.code });
    return [];
  }

  const skills = parseSkillResponse(response.data);
  metrics.gauge('enrichment.skills.extracted', skills.length);
  return skills;
}

// =============================================================================
// Bio generation
// =============================================================================

/**
 * Generate a short professional bio
 *
 * Returns the capability's failure unchanged, and a thrown error as
 * AI_REQUEST_FAILED; callers pick their own fallback.
 */
export async function generateBio(
  input: BioInput,
  ai: AICapability,
  options: AIRequestOptions = {}
): Promise<ModuleResult<string>> {
  const startTime = Date.now();
  let response: ModuleResult<string>;
  try {
    response = await ai.generateText(buildBioPrompt(input), options);
  } catch (error) {
    return {
      success: false,
      error: { code: 'AI_REQUEST_FAILED', message: `Bio generation failed: ${errorMessage(error)}` },
      metadata: {
        runId: '',
        module: 'enrichment',
        timestamp: new Date().toISOString(),
        duration: Date.now() - startTime,
      },
    };
  }
  if (!response.success) {
    return response;
  }
  return { ...response, data: response.data.trim() };
}

/**
 * One-line description of the portfolio for the bio prompt
 *
 * @returns null when the profile has no portfolio items
 */
export function summarizePortfolio(items: readonly PortfolioItem[]): string | null {
  if (items.length === 0) {
    return null;
  }
  const titles = Array.from(new Set(items.map((item) => item.title))).slice(0, PORTFOLIO_SUMMARY_TITLES);
  const noun = items.length === 1 ? 'item' : 'items';
  return `${items.length} portfolio ${noun} including ${titles.join(', ')}`;
}

// =============================================================================
// Per-delta signals
// =============================================================================

/**
 * Resolve the AI work a source deferred in delta.pending
 *
 * Skills extracted from pending.skill_text are appended to the delta's skills.
 * A career delta with experience text and no bio gets a generated bio; if
 * generation fails the bio stays unset for the enrichment pass to backfill.
 *
 * @returns A new delta; the input is not modified
 */
export async function resolveDeltaSignals(
  delta: ProfileDelta,
  ai: AICapability,
  options: SignalOptions = {}
): Promise<ProfileDelta> {
  const logger = options.logger ?? createLogger('enrichment');

  let skills = [...delta.skills];
  if (delta.pending.skill_text) {
    const extracted = await extractSkills(delta.pending.skill_text, ai, options);
    skills = [...skills, ...extracted];
  }

  let fields = { ...delta.fields };
  if (delta.source_kind === 'career' && delta.pending.bio_seed && !fields.bio) {
    const bio = await generateBio(
      {
        name: fields.name,
        profession: fields.profession,
        skills,
        portfolioSummary: delta.pending.bio_seed,
      },
      ai,
      { signal: options.signal }
    );
    if (bio.success && bio.data.length > 0) {
      fields = { ...fields, bio: bio.data };
    } else {
      logger.warn('Career bio generation failed, leaving bio for backfill', {
        source: delta.source_identifier,
        code: bio.success ? 'AI_EMPTY_RESPONSE' : bio.error.code,
      });
    }
  }

  return {
    ...delta,
    fields,
    skills,
    pending: { skill_text: null, bio_seed: null },
  };
}

// =============================================================================
// Enrichment pass
// =============================================================================

/**
 * Remove duplicate skills, keeping the first occurrence of each
 */
export function dedupeSkills(skills: readonly string[]): string[] {
  return Array.from(new Set(skills));
}

function isAnalyzable(item: PortfolioItem): boolean {
  return item.media_kind === 'image' && item.media_url !== null && item.ai_analysis === null;
}

async function tagItem(
  item: PortfolioItem,
  ai: AICapability,
  media: MediaFetcher,
  signal: AbortSignal | undefined,
  logger: Logger,
  metrics: Metrics
): Promise<boolean> {
  if (item.media_url === null) {
    return false;
  }

  const url = item.media_url;
  let analysis: ModuleResult<ImageAnalysis>;
  try {
    const image = await media.fetchImage(url, { signal });
    if (!image.success) {
      logger.warn('Media fetch failed, item left untagged', { url, error: image.error.message });
      metrics.increment('enrichment.media.failure', { stage: 'fetch' });
      return false;
    }
    analysis = await ai.analyzeImage(image.data, { signal });
  } catch (error) {
    logger.warn('Media tagging threw, item left untagged', { url, error: errorMessage(error) });
    metrics.increment('enrichment.media.failure', { stage: 'exception' });
    return false;
  }

  if (!analysis.success) {
    logger.warn('Image analysis failed, item left untagged', { url, code: analysis.error.code });
    metrics.increment('enrichment.media.failure', { stage: 'analyze' });
    return false;
  }

  item.ai_analysis = analysis.data;
  item.tags.push(...analysis.data.tags);
  metrics.increment('enrichment.media.analyzed');
  return true;
}

/**
 * Run the enrichment pass over a folded profile
 *
 * 1. Deduplicate skills
 * 2. Backfill the bio when it is unset and skills exist (fallback on failure)
 * 3. Analyze image items that have a URL and no analysis yet
 *
 * The profile is mutated in place.
 */
export async function enrichProfile(profile: Profile, deps: EnrichmentDeps): Promise<EnrichmentReport> {
  const logger = deps.logger ?? createLogger('enrichment');
  const metrics = deps.metrics ?? noopMetrics;
  const startTime = Date.now();

  // 1. Skill dedup
  const skillsBefore = profile.skills.length;
  profile.skills = dedupeSkills(profile.skills);

  // 2. Bio backfill
  let bioOutcome: BioOutcome = 'existing';
  if (profile.bio === null) {
    if (profile.skills.length === 0) {
      bioOutcome = 'not_needed';
    } else {
      const bio = await generateBio(
        {
          name: profile.name,
          profession: profile.profession,
          skills: profile.skills,
          portfolioSummary: summarizePortfolio(profile.portfolio_items),
        },
        deps.ai,
        { signal: deps.signal }
      );
      if (bio.success && bio.data.length > 0) {
        profile.bio = bio.data;
        bioOutcome = 'generated';
      } else {
        profile.bio = BIO_FALLBACK;
        bioOutcome = 'fallback';
        logger.warn('Bio generation failed, using fallback bio', {
          userId: profile.user_id,
          code: bio.success ? 'AI_EMPTY_RESPONSE' : bio.error.code,
        });
      }
    }
  }

  // 3. Media tagging
  const candidates = profile.portfolio_items.filter(isAnalyzable);
  let skipped = profile.portfolio_items.length - candidates.length;
  let analyzed = 0;
  let failed = 0;

  const { media } = deps;
  if (!media) {
    skipped += candidates.length;
  } else {
    const outcomes = await Promise.all(
      candidates.map((item) => tagItem(item, deps.ai, media, deps.signal, logger, metrics))
    );
    analyzed = outcomes.filter((ok) => ok).length;
    failed = outcomes.length - analyzed;
  }

  const report: EnrichmentReport = {
    skills_before: skillsBefore,
    skills_after: profile.skills.length,
    bio: bioOutcome,
    media: { analyzed, failed, skipped },
  };

  metrics.timing('enrichment.duration', Date.now() - startTime);
  logger.info('Enrichment complete', { userId: profile.user_id, ...report });

  return report;
}
