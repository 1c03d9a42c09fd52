/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Map each source kind's raw payload into a ProfileDelta
 * - Resolve source kind tags (including platform aliases) to the closed SourceKind set
 * - Defer free text to AI skill extraction through delta.pending
 *
 * Every function here is pure. AI work happens later in the enrichment module.
 *
 * Usage:
 * const result = normalizeSource('social', '@jane', raw);
 * if (result.success) foldDelta(profile, result.data);
 */

import { z } from 'zod';
import {
  SCALAR_FIELDS,
  SOURCE_KINDS,
  type ModuleResult,
  type PortfolioCandidate,
  type ProfileDelta,
  type ProfileFields,
  type RawCareerData,
  type RawDocumentData,
  type RawSocialData,
  type RawSourceData,
  type RawWebsiteData,
  type ScalarField,
  type SourceKind,
} from '../types/index.js';

/** Maximum number of website images turned into portfolio items */
export const MAX_WEBSITE_IMAGES = 10;

/** Number of page text characters handed to skill extraction */
export const WEBSITE_SKILL_TEXT_LENGTH = 1000;

/**
 * Platform tags accepted in place of the canonical source kinds
 */
const SOURCE_KIND_ALIASES: Record<string, SourceKind> = {
  instagram: 'social',
  linkedin: 'career',
  portfolio: 'website',
  resume: 'document',
};

const SourceKindSchema = z.enum(SOURCE_KINDS);

const HASHTAG_PATTERN = /#(\w+)/g;
const EMAIL_PATTERN = /Email:\s*(\S+)/;
const PHONE_PATTERN = /Phone:\s*([^\n]+)/;

/**
 * Trim whitespace from string value, mapping empty strings to null
 */
export function trimString(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Resolve a source kind tag to a SourceKind
 *
 * @param tag - Kind tag from the request, case-insensitive
 * @returns The matching kind, or null for unknown tags
 */
export function parseSourceKind(tag: string): SourceKind | null {
  const normalized = tag.trim().toLowerCase();
  const parsed = SourceKindSchema.safeParse(normalized);
  if (parsed.success) {
    return parsed.data;
  }
  return SOURCE_KIND_ALIASES[normalized] ?? null;
}

/**
 * Extract hashtag values (without the leading '#') in order of appearance
 */
export function extractHashtags(text: string): string[] {
  return Array.from(text.matchAll(HASHTAG_PATTERN), (match) => match[1] ?? '').filter(
    (tag) => tag.length > 0
  );
}

/**
 * Strip platform handle prefixes such as a leading '@'
 */
export function stripHandlePrefix(displayName: string): string {
  return displayName.trim().replace(/^@+/, '');
}

/**
 * Extract a labeled value from résumé text, e.g. "Email: jane@example.com"
 */
export function extractLabeledField(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  return trimString(match?.[1]);
}

/**
 * Delta that contributes nothing, used when a source fetch failed
 */
export function emptyDelta(kind: SourceKind, identifier: string): ProfileDelta {
  return {
    source_kind: kind,
    source_identifier: identifier,
    fields: {},
    skills: [],
    social_links: {},
    portfolio: [],
    pending: { skill_text: null, bio_seed: null },
  };
}

/**
 * Copy only the non-empty scalar values into a fields record
 */
function compactFields(fields: Partial<Record<ScalarField, string | null>>): ProfileFields {
  const result: ProfileFields = {};
  for (const key of SCALAR_FIELDS) {
    const trimmed = trimString(fields[key]);
    if (trimmed) {
      result[key] = trimmed;
    }
  }
  return result;
}

// ============================================================================
// Per-kind normalizers
// ============================================================================

function normalizeSocial(identifier: string, raw: RawSocialData): ProfileDelta {
  const portfolio: PortfolioCandidate[] = raw.posts.map((post): PortfolioCandidate => ({
    title: `Social Post - ${post.likes} likes`,
    description: post.caption,
    media_kind: post.media_kind,
    media_url: trimString(post.url),
    tags: extractHashtags(post.caption),
    source_kind: 'social',
  }));

  const captions = raw.posts.map((post) => post.caption).join(' ');

  return {
    source_kind: 'social',
    source_identifier: identifier,
    fields: compactFields({
      name: stripHandlePrefix(raw.display_name),
    }),
    skills: [],
    social_links: { social: identifier },
    portfolio,
    pending: {
      skill_text: trimString(`${raw.bio} ${captions}`),
      bio_seed: null,
    },
  };
}

function normalizeCareer(identifier: string, raw: RawCareerData): ProfileDelta {
  const experienceText = raw.experience
    .map((entry) => `${entry.title} at ${entry.company}: ${entry.description}`)
    .join(' ');

  return {
    source_kind: 'career',
    source_identifier: identifier,
    fields: compactFields({
      name: raw.name,
      location: raw.location,
      profession: raw.headline,
    }),
    skills: [...raw.skills],
    social_links: {},
    portfolio: [],
    pending: {
      skill_text: null,
      bio_seed: trimString(experienceText),
    },
  };
}

function normalizeWebsite(identifier: string, raw: RawWebsiteData): ProfileDelta {
  const portfolio: PortfolioCandidate[] = raw.images.slice(0, MAX_WEBSITE_IMAGES).map((imageUrl): PortfolioCandidate => ({
    title: 'Website Image',
    description: raw.description,
    media_kind: 'image',
    media_url: imageUrl,
    tags: [],
    source_kind: 'website',
  }));

  return {
    source_kind: 'website',
    source_identifier: identifier,
    fields: {},
    skills: [],
    social_links: { website: identifier },
    portfolio,
    pending: {
      skill_text: trimString(raw.content.slice(0, WEBSITE_SKILL_TEXT_LENGTH)),
      bio_seed: null,
    },
  };
}

function normalizeDocument(identifier: string, raw: RawDocumentData): ProfileDelta {
  return {
    source_kind: 'document',
    source_identifier: identifier,
    fields: compactFields({
      email: extractLabeledField(raw.text, EMAIL_PATTERN),
      phone: extractLabeledField(raw.text, PHONE_PATTERN),
    }),
    skills: [],
    social_links: {},
    portfolio: [],
    pending: {
      skill_text: trimString(raw.text),
      bio_seed: null,
    },
  };
}

/**
 * Map a raw source payload into a ProfileDelta
 *
 * The payload's own kind drives the mapping; the switch is exhaustive over
 * RawSourceData so a new source kind fails to compile until it is handled.
 *
 * @param identifier - The source identifier the payload was fetched from
 * @param raw - Payload returned by the source adapter
 */
export function normalize(identifier: string, raw: RawSourceData): ProfileDelta {
  switch (raw.kind) {
    case 'social':
      return normalizeSocial(identifier, raw);
    case 'career':
      return normalizeCareer(identifier, raw);
    case 'website':
      return normalizeWebsite(identifier, raw);
    case 'document':
      return normalizeDocument(identifier, raw);
    default: {
      const unreachable: never = raw;
      throw new Error(`Unhandled source payload: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Normalize a payload for a kind tag taken from a request
 *
 * @param kindTag - Source kind tag as supplied by the caller
 * @param identifier - Source identifier
 * @param raw - Payload returned by the source adapter
 * @returns ModuleResult with the delta, or UNSUPPORTED_SOURCE_KIND
 */
export function normalizeSource(
  kindTag: string,
  identifier: string,
  raw: RawSourceData
): ModuleResult<ProfileDelta> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const kind = parseSourceKind(kindTag);

  if (!kind || kind !== raw.kind) {
    return {
      success: false,
      error: {
        code: 'UNSUPPORTED_SOURCE_KIND',
        message: kind
          ? `Payload of kind "${raw.kind}" cannot be normalized as "${kind}"`
          : `Unsupported source kind: ${kindTag}`,
        details: { kindTag, identifier },
      },
      metadata: {
        runId: '',
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  return {
    success: true,
    data: normalize(identifier, raw),
    metadata: {
      runId: '',
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
