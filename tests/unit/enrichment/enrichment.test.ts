/**
 * Unit Tests for Enrichment Module
 *
 * Covers skill extraction, bio generation, per-delta AI signals and the
 * enrichment pass. AI and media access go through in-process fakes.
 */

import { describe, it, expect } from '@jest/globals';
import {
  BIO_FALLBACK,
  buildBioPrompt,
  dedupeSkills,
  enrichProfile,
  extractSkills,
  generateBio,
  parseSkillResponse,
  resolveDeltaSignals,
  summarizePortfolio,
} from '../../../src/enrichment/index.js';
import { createProfile, toPortfolioItem } from '../../../src/aggregator/index.js';
import { normalize } from '../../../src/normalizer/index.js';
import type { PortfolioItem, Profile } from '../../../src/types/index.js';
import {
  FakeAICapability,
  FakeMediaFetcher,
  careerData,
  createRecordingLogger,
  expectFailure,
  expectSuccess,
  ok,
  sampleAnalysis,
  scriptedAI,
  socialData,
} from '../../helpers/fakes.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const imageItem = (url: string | null, overrides: Partial<PortfolioItem> = {}): PortfolioItem => ({
  ...toPortfolioItem({
    title: 'Website Image',
    description: '',
    media_kind: 'image',
    media_url: url,
    tags: ['original'],
    source_kind: 'website',
  }),
  ...overrides,
});

const profileWith = (overrides: Partial<Omit<Profile, 'user_id'>>): Profile => ({
  ...createProfile('user-1'),
  ...overrides,
});

// =============================================================================
// Skill extraction
// =============================================================================

describe('parseSkillResponse', () => {
  it('should return a JSON string array verbatim', () => {
    expect(parseSkillResponse('["Photography", " Lighting"]')).toEqual(['Photography', ' Lighting']);
  });

  it('should accept a fenced JSON array', () => {
    expect(parseSkillResponse('```json\n["Retouching"]\n```')).toEqual(['Retouching']);
  });

  it('should split text that is not JSON on commas', () => {
    expect(parseSkillResponse('Photography, Lighting , ,Retouching')).toEqual([
      'Photography',
      'Lighting',
      'Retouching',
    ]);
  });

  it('should return no skills for JSON that is not a string array', () => {
    expect(parseSkillResponse('{"skills": ["Photography"]}')).toEqual([]);
    expect(parseSkillResponse('[1, "Photography"]')).toEqual([]);
    expect(parseSkillResponse('42')).toEqual([]);
  });
});

describe('extractSkills', () => {
  it('should send the text in the extraction prompt', async () => {
    const ai = scriptedAI({ skills: () => '["Photography"]' });

    const skills = await extractSkills('I shoot portraits', ai);

    expect(skills).toEqual(['Photography']);
    expect(ai.skillPrompts).toHaveLength(1);
    expect(ai.skillPrompts[0]).toContain('\nI shoot portraits\n');
  });

  it('should return no skills when the capability fails', async () => {
    const logger = createRecordingLogger();

    const skills = await extractSkills('I shoot portraits', scriptedAI({}), { logger });

    expect(skills).toEqual([]);
    expect(logger.entries.map((entry) => entry.message)).toEqual(['Skill extraction failed']);
  });

  it('should not call the capability for blank text', async () => {
    const ai = scriptedAI({ skills: () => '["Photography"]' });

    expect(await extractSkills('   ', ai)).toEqual([]);
    expect(ai.prompts).toHaveLength(0);
  });

  it('should return no skills when the capability throws', async () => {
    const logger = createRecordingLogger();
    const ai = new FakeAICapability(() => {
      throw new Error('connection reset');
    });

    const skills = await extractSkills('I shoot portraits', ai, { logger });

    expect(skills).toEqual([]);
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'Skill extraction failed',
        context: { code: 'AI_REQUEST_FAILED', error: 'connection reset' },
      },
    ]);
  });
});

// =============================================================================
// Bio generation
// =============================================================================

describe('buildBioPrompt', () => {
  it('should fill defaults for missing values', () => {
    const prompt = buildBioPrompt({ skills: ['Photography', 'Lighting'] });

    expect(prompt.split('\n').slice(2, 6)).toEqual([
      'Name: Unknown',
      'Profession: Creative Professional',
      'Skills: Photography, Lighting',
      'Portfolio highlights: Various creative works',
    ]);
  });
});

describe('generateBio', () => {
  it('should trim the generated text', async () => {
    const ai = scriptedAI({ bio: '  Jane photographs people.  ' });

    const bio = await generateBio({ name: 'Jane Doe', skills: ['Photography'] }, ai);

    expect(expectSuccess(bio)).toBe('Jane photographs people.');
  });

  it('should turn a thrown error into AI_REQUEST_FAILED', async () => {
    const ai = new FakeAICapability(() => {
      throw new Error('connection reset');
    });

    const error = expectFailure(await generateBio({ skills: ['Photography'] }, ai));

    expect(error.code).toBe('AI_REQUEST_FAILED');
    expect(error.message).toBe('Bio generation failed: connection reset');
  });
});

describe('summarizePortfolio', () => {
  it('should return null for an empty portfolio', () => {
    expect(summarizePortfolio([])).toBeNull();
  });

  it('should count items and list distinct titles', () => {
    const items = [
      imageItem('https://jane.example/a.jpg'),
      imageItem('https://jane.example/b.jpg'),
      imageItem(null, { title: 'Social Post - 120 likes' }),
    ];

    expect(summarizePortfolio(items)).toBe('3 portfolio items including Website Image, Social Post - 120 likes');
    expect(summarizePortfolio(items.slice(0, 1))).toBe('1 portfolio item including Website Image');
  });
});

// =============================================================================
// Per-delta signals
// =============================================================================

describe('resolveDeltaSignals', () => {
  it('should append extracted skills and clear pending text', async () => {
    const delta = normalize('@jane', socialData());
    const ai = scriptedAI({ skills: () => '["Portrait Photography"]' });

    const resolved = await resolveDeltaSignals(delta, ai);

    expect(resolved.skills).toEqual(['Portrait Photography']);
    expect(resolved.pending).toEqual({ skill_text: null, bio_seed: null });
    expect(delta.skills).toEqual([]);
    expect(delta.pending.skill_text).not.toBeNull();
  });

  it('should generate a career bio from experience', async () => {
    const ai = scriptedAI({ bio: 'Jane leads editorial shoots.' });

    const resolved = await resolveDeltaSignals(normalize('jane', careerData()), ai);

    expect(resolved.fields.bio).toBe('Jane leads editorial shoots.');
    expect(resolved.skills).toEqual(['Photography', 'Lighting']);
    expect(ai.skillPrompts).toHaveLength(0);
    expect(ai.bioPrompts[0]?.split('\n').slice(2, 6)).toEqual([
      'Name: Jane Doe',
      'Profession: Portrait Photographer',
      'Skills: Photography, Lighting',
      'Portfolio highlights: Lead Photographer at Northlight Studio: Editorial shoots',
    ]);
  });

  it('should keep the delta when the capability throws', async () => {
    const ai = new FakeAICapability(() => {
      throw new Error('connection reset');
    });

    const resolved = await resolveDeltaSignals(normalize('jane', careerData()), ai);

    expect(resolved.fields.name).toBe('Jane Doe');
    expect(resolved.fields.bio).toBeUndefined();
    expect(resolved.skills).toEqual(['Photography', 'Lighting']);
  });

  it('should leave the bio unset when career bio generation fails', async () => {
    const resolved = await resolveDeltaSignals(normalize('jane', careerData()), scriptedAI({}));

    expect(resolved.fields.bio).toBeUndefined();
    expect(resolved.fields.name).toBe('Jane Doe');
  });

  it('should not generate a bio for a career without experience', async () => {
    const ai = scriptedAI({ bio: 'unused' });

    await resolveDeltaSignals(normalize('jane', careerData({ experience: [] })), ai);

    expect(ai.prompts).toHaveLength(0);
  });
});

// =============================================================================
// Enrichment pass
// =============================================================================

describe('dedupeSkills', () => {
  it('should keep the first occurrence and be case-sensitive', () => {
    expect(dedupeSkills(['Photography', 'Lighting', 'Photography', 'photography'])).toEqual([
      'Photography',
      'Lighting',
      'photography',
    ]);
  });
});

describe('enrichProfile', () => {
  it('should deduplicate skills and keep an existing bio', async () => {
    const ai = scriptedAI({ bio: 'unused' });
    const profile = profileWith({ bio: 'Existing bio', skills: ['A', 'B', 'A'] });

    const report = await enrichProfile(profile, { ai });

    expect(profile.skills).toEqual(['A', 'B']);
    expect(profile.bio).toBe('Existing bio');
    expect(report.skills_before).toBe(3);
    expect(report.skills_after).toBe(2);
    expect(report.bio).toBe('existing');
    expect(ai.bioPrompts).toHaveLength(0);
  });

  it('should leave the bio unset when there are no skills', async () => {
    const profile = profileWith({});

    const report = await enrichProfile(profile, { ai: scriptedAI({ bio: 'unused' }) });

    expect(profile.bio).toBeNull();
    expect(report.bio).toBe('not_needed');
  });

  it('should backfill a generated bio', async () => {
    const ai = scriptedAI({ bio: 'Jane is a photographer.' });
    const profile = profileWith({ name: 'Jane Doe', skills: ['Photography'] });

    const report = await enrichProfile(profile, { ai });

    expect(profile.bio).toBe('Jane is a photographer.');
    expect(report.bio).toBe('generated');
    expect(ai.bioPrompts[0]).toContain('Portfolio highlights: Various creative works');
  });

  it('should fall back to the fixed bio when generation fails', async () => {
    const profile = profileWith({ skills: ['Photography'] });

    const report = await enrichProfile(profile, { ai: scriptedAI({}) });

    expect(profile.bio).toBe(BIO_FALLBACK);
    expect(profile.bio).toBe('Creative professional with diverse skills and experience.');
    expect(report.bio).toBe('fallback');
  });

  it('should analyze eligible image items and count the rest', async () => {
    const analyzed = imageItem('https://jane.example/a.jpg');
    const failing = imageItem('https://jane.example/broken.jpg');
    const noUrl = imageItem(null);
    const video = imageItem('https://jane.example/v.mp4', { media_kind: 'video' });
    const done = imageItem('https://jane.example/done.jpg', { ai_analysis: sampleAnalysis() });
    const profile = profileWith({ bio: 'Bio', portfolio_items: [analyzed, failing, noUrl, video, done] });
    const media = new FakeMediaFetcher(new Set(['https://jane.example/broken.jpg']));
    const ai = scriptedAI({ analysis: sampleAnalysis() });

    const report = await enrichProfile(profile, { ai, media });

    expect(report.media).toEqual({ analyzed: 1, failed: 1, skipped: 3 });
    expect(analyzed.ai_analysis).toEqual(sampleAnalysis());
    expect(analyzed.tags).toEqual(['original', 'portrait', 'studio']);
    expect(failing.ai_analysis).toBeNull();
    expect(failing.tags).toEqual(['original']);
    expect(done.tags).toEqual(['original']);
    expect(media.urls.sort()).toEqual(['https://jane.example/a.jpg', 'https://jane.example/broken.jpg']);
    expect(ai.images).toHaveLength(1);
  });

  it('should leave items untouched when analysis fails', async () => {
    const item = imageItem('https://jane.example/a.jpg');
    const profile = profileWith({ bio: 'Bio', portfolio_items: [item] });

    const report = await enrichProfile(profile, { ai: scriptedAI({}), media: new FakeMediaFetcher() });

    expect(item.ai_analysis).toBeNull();
    expect(item.tags).toEqual(['original']);
    expect(report.media).toEqual({ analyzed: 0, failed: 1, skipped: 0 });
  });

  it('should isolate an item whose analysis throws', async () => {
    const good = imageItem('https://jane.example/a.jpg');
    const bad = imageItem('https://jane.example/bad.jpg');
    const profile = profileWith({ bio: 'Bio', portfolio_items: [good, bad] });
    const ai = new FakeAICapability(undefined, (image) => {
      if (image.data.toString() === 'https://jane.example/bad.jpg') {
        throw new Error('model overloaded');
      }
      return ok(sampleAnalysis());
    });

    const report = await enrichProfile(profile, { ai, media: new FakeMediaFetcher() });

    expect(report.media).toEqual({ analyzed: 1, failed: 1, skipped: 0 });
    expect(good.ai_analysis).toEqual(sampleAnalysis());
    expect(bad.ai_analysis).toBeNull();
    expect(bad.tags).toEqual(['original']);
  });

  it('should isolate an item whose download throws', async () => {
    const good = imageItem('https://jane.example/a.jpg');
    const bad = imageItem('https://jane.example/bad.jpg');
    const profile = profileWith({ bio: 'Bio', portfolio_items: [good, bad] });
    const media = new FakeMediaFetcher(new Set(), new Set(['https://jane.example/bad.jpg']));

    const report = await enrichProfile(profile, { ai: scriptedAI({ analysis: sampleAnalysis() }), media });

    expect(report.media).toEqual({ analyzed: 1, failed: 1, skipped: 0 });
    expect(good.tags).toEqual(['original', 'portrait', 'studio']);
    expect(bad.ai_analysis).toBeNull();
  });

  it('should fall back to the fixed bio when generation throws', async () => {
    const profile = profileWith({ skills: ['Photography'] });
    const ai = new FakeAICapability(() => {
      throw new Error('connection reset');
    });

    const report = await enrichProfile(profile, { ai });

    expect(profile.bio).toBe(BIO_FALLBACK);
    expect(report.bio).toBe('fallback');
  });

  it('should skip media tagging without a media fetcher', async () => {
    const profile = profileWith({ bio: 'Bio', portfolio_items: [imageItem('https://jane.example/a.jpg')] });

    const report = await enrichProfile(profile, { ai: scriptedAI({ analysis: sampleAnalysis() }) });

    expect(report.media).toEqual({ analyzed: 0, failed: 0, skipped: 1 });
  });

  it('should pass the abort signal to AI calls', async () => {
    const controller = new AbortController();
    const ai = new FakeAICapability(() => ok('Bio text'));

    await enrichProfile(profileWith({ skills: ['Photography'] }), { ai, signal: controller.signal });

    expect(ai.signals).toEqual([controller.signal]);
  });
});
