/**
 * Aggregator Module
 *
 * Folds ProfileDeltas into a Profile in strict input order.
 *
 * Conflict rules:
 * - Scalar identity fields: first non-empty value wins, later values are discarded
 * - social_links: last write wins per key
 * - skills: appended as proposed, deduplicated later by the enrichment pass
 * - portfolio_items: appended in arrival order, never removed
 *
 * The profile under construction is owned by a single aggregation run, so
 * foldDelta mutates it in place and returns it.
 */

import {
  SCALAR_FIELDS,
  type PortfolioCandidate,
  type PortfolioItem,
  type Profile,
  type ProfileDelta,
  type SocialLinkKind,
  type UserId,
} from '../types/index.js';

/**
 * Create an empty profile for one aggregation run
 *
 * @param userId - Owner of the profile, must be non-empty
 * @throws Error if userId is empty or whitespace
 */
export function createProfile(userId: UserId): Profile {
  if (userId.trim().length === 0) {
    throw new Error('Cannot create profile: user_id must be non-empty');
  }

  return {
    user_id: userId,
    name: null,
    bio: null,
    email: null,
    phone: null,
    location: null,
    profession: null,
    skills: [],
    social_links: {},
    portfolio_items: [],
  };
}

/**
 * Turn a candidate into a portfolio item awaiting analysis
 */
export function toPortfolioItem(candidate: PortfolioCandidate): PortfolioItem {
  return {
    ...candidate,
    tags: [...candidate.tags],
    ai_analysis: null,
  };
}

/**
 * Fold one delta into the profile
 *
 * @param profile - Profile under construction (mutated in place)
 * @param delta - Contribution of one source
 * @returns The same profile instance
 */
export function foldDelta(profile: Profile, delta: ProfileDelta): Profile {
  // 1. First non-empty value wins for scalar identity fields
  for (const field of SCALAR_FIELDS) {
    const proposed = delta.fields[field];
    if (profile[field] === null && proposed !== undefined && proposed.trim().length > 0) {
      profile[field] = proposed;
    }
  }

  // 2. Last write wins per link kind
  for (const [kind, url] of Object.entries(delta.social_links) as [SocialLinkKind, string | undefined][]) {
    if (url) {
      profile.social_links[kind] = url;
    }
  }

  // 3. Skills are deduplicated by the enrichment pass
  profile.skills.push(...delta.skills);

  // 4. Portfolio keeps arrival order across sources
  profile.portfolio_items.push(...delta.portfolio.map(toPortfolioItem));

  return profile;
}

/**
 * Fold a sequence of deltas in order
 */
export function foldDeltas(profile: Profile, deltas: readonly ProfileDelta[]): Profile {
  return deltas.reduce(foldDelta, profile);
}
