/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Validate aggregation requests
 * - Drive one aggregation run through its states
 * - Record per-source outcomes without failing the run
 * - Expose the read operations (get, list, analyze image)
 *
 * Run states:
 *   created -> normalizing -> folding -> enriching -> persisted
 * Any non-terminal state may move to cancelled when the caller aborts.
 *
 * Sources are fetched, normalized and their AI signals resolved concurrently;
 * the fold into the profile is strictly sequential in request order.
 *
 * Usage:
 * initializeRunManager(createProfileBuilderFromConfig(config));
 * const result = await buildProfile({ user_id, sources, source_kinds });
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type {
  ErrorCode,
  ImageAnalysis,
  ModuleError,
  ModuleResult,
  ProfileDelta,
  ProfileStore,
  ProfileSummary,
  RunId,
  SourceKind,
  StoredProfile,
  UserId,
} from '../types/index.js';
import type { AppConfig } from '../config/index.js';
import { emptyDelta, normalizeSource, parseSourceKind } from '../normalizer/index.js';
import { createProfile, foldDeltas } from '../aggregator/index.js';
import { enrichProfile, resolveDeltaSignals, type EnrichmentReport } from '../enrichment/index.js';
import { createAICapability, type AICapability, type ImageInput } from '../ai/index.js';
import {
  HttpMediaFetcher,
  createSourceAdapters,
  type MediaFetcher,
  type SourceAdapterRegistry,
} from '../sources/index.js';
import { createProfileStore } from '../storage/index.js';
import {
  createLogger,
  errorMessage,
  noopMetrics,
  type Logger,
  type Metrics,
  type Observability,
} from '../observability/index.js';

// ============================================================================
// Types
// ============================================================================

export type RunState = 'created' | 'normalizing' | 'folding' | 'enriching' | 'persisted' | 'cancelled';

export interface RunTransition {
  from: RunState;
  to: RunState;
  at: string;
}

/**
 * Mutable state of one run
 */
export interface RunTracker {
  readonly run_id: RunId;
  state: RunState;
  transitions: RunTransition[];
}

export type SourceStatus = 'folded' | 'fetch_failed' | 'unsupported' | 'failed';

/**
 * Outcome of one (source, kind) pair
 */
export interface SourceReport {
  index: number;
  kind: string;
  identifier: string;
  status: SourceStatus;
  error?: ModuleError;
}

/**
 * Result of a completed aggregation run
 */
export interface AggregationRun {
  run_id: RunId;
  user_id: UserId;
  state: RunState;
  transitions: RunTransition[];
  profile: StoredProfile;
  sources: SourceReport[];
  enrichment: EnrichmentReport;
  started_at: string;
  completed_at: string;
}

/**
 * Collaborators of the run manager
 */
export interface RunManagerDeps extends Observability {
  adapters: SourceAdapterRegistry;
  ai: AICapability;
  store: ProfileStore;
  media?: MediaFetcher;
}

export interface BuildProfileOptions {
  signal?: AbortSignal;
}

// ============================================================================
// Request validation
// ============================================================================

export const BuildProfileRequestSchema = z
  .object({
    user_id: z.string().refine((value) => value.trim().length > 0, { message: 'user_id must be non-empty' }),
    sources: z.array(z.string()),
    source_kinds: z.array(z.string()),
  })
  .refine((request) => request.sources.length === request.source_kinds.length, {
    message: 'sources and source_kinds must have the same length',
    path: ['source_kinds'],
  });

export type BuildProfileRequest = z.infer<typeof BuildProfileRequestSchema>;

// ============================================================================
// State machine
// ============================================================================

const ALLOWED_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  created: ['normalizing', 'cancelled'],
  normalizing: ['folding', 'cancelled'],
  folding: ['enriching', 'cancelled'],
  enriching: ['persisted', 'cancelled'],
  persisted: [],
  cancelled: [],
};

export function canTransition(from: RunState, to: RunState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Create the tracker for a new run in the created state
 */
export function createRunTracker(runId: RunId = `run_${randomUUID()}`): RunTracker {
  return { run_id: runId, state: 'created', transitions: [] };
}

/**
 * Move a run to its next state
 *
 * @throws Error on a transition the state machine does not allow
 */
export function advanceRunState(tracker: RunTracker, to: RunState, now: Date = new Date()): void {
  if (!canTransition(tracker.state, to)) {
    throw new Error(`Illegal run state transition: ${tracker.state} -> ${to}`);
  }
  tracker.transitions.push({ from: tracker.state, to, at: now.toISOString() });
  tracker.state = to;
}

// ============================================================================
// Module-level dependencies
// ============================================================================

let _deps: RunManagerDeps | null = null;

/**
 * Register the collaborators used when a call passes no overrides
 */
export function initializeRunManager(deps: RunManagerDeps): void {
  _deps = deps;
}

/**
 * Forget the registered collaborators (test cleanup)
 */
export function resetRunManager(): void {
  _deps = null;
}

function notInitialized(): Error {
  return new Error('Run manager not initialized. Call initializeRunManager() first.');
}

function resolveDeps(overrides: Partial<RunManagerDeps> = {}): RunManagerDeps {
  const adapters = overrides.adapters ?? _deps?.adapters;
  const ai = overrides.ai ?? _deps?.ai;
  const store = overrides.store ?? _deps?.store;
  if (!adapters || !ai || !store) {
    throw notInitialized();
  }
  return {
    adapters,
    ai,
    store,
    media: overrides.media ?? _deps?.media,
    logger: overrides.logger ?? _deps?.logger,
    metrics: overrides.metrics ?? _deps?.metrics,
  };
}

/**
 * Wire every collaborator from a loaded configuration
 */
export function createProfileBuilderFromConfig(
  config: AppConfig,
  logger: Logger = createLogger('run-manager', config.logLevel),
  metrics: Metrics = noopMetrics
): RunManagerDeps {
  return {
    adapters: createSourceAdapters(config.sources, createLogger('sources', config.logLevel), metrics),
    ai: createAICapability(config.ai, createLogger('ai', config.logLevel), metrics),
    store: createProfileStore(config.storage),
    media: new HttpMediaFetcher({ timeout: config.sources.timeout }, createLogger('sources', config.logLevel)),
    logger,
    metrics,
  };
}

// ============================================================================
// Result helpers
// ============================================================================

function succeed<T>(data: T, runId: RunId, startTime: number): ModuleResult<T> {
  return {
    success: true,
    data,
    metadata: {
      runId,
      module: 'run-manager',
      timestamp: new Date(startTime).toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

function fail<T>(
  code: ErrorCode,
  message: string,
  runId: RunId,
  startTime: number,
  details?: unknown
): ModuleResult<T> {
  return {
    success: false,
    error: { code, message, details },
    metadata: {
      runId,
      module: 'run-manager',
      timestamp: new Date(startTime).toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

// ============================================================================
// Source processing
// ============================================================================

interface SourceOutcome {
  report: SourceReport;
  delta: ProfileDelta | null;
}

async function processSource(
  index: number,
  identifier: string,
  kindTag: string,
  deps: RunManagerDeps,
  logger: Logger,
  signal: AbortSignal | undefined
): Promise<SourceOutcome> {
  const kind: SourceKind | null = parseSourceKind(kindTag);
  const base = { index, kind: kindTag, identifier };

  if (!kind) {
    logger.warn('Skipping source with unsupported kind', { index, kind: kindTag, identifier });
    return {
      report: {
        ...base,
        status: 'unsupported',
        error: { code: 'UNSUPPORTED_SOURCE_KIND', message: `Unsupported source kind: ${kindTag}` },
      },
      delta: null,
    };
  }

  try {
    const fetched = await deps.adapters[kind].fetch(identifier, { signal });
    if (!fetched.success) {
      logger.warn('Source fetch failed, contributing nothing', { index, kind, identifier, error: fetched.error.message });
      return { report: { ...base, status: 'fetch_failed', error: fetched.error }, delta: emptyDelta(kind, identifier) };
    }

    const normalized = normalizeSource(kindTag, identifier, fetched.data);
    if (!normalized.success) {
      logger.warn('Source payload could not be normalized', { index, kind, identifier, error: normalized.error.message });
      return { report: { ...base, status: 'failed', error: normalized.error }, delta: null };
    }

    const delta = await resolveDeltaSignals(normalized.data, deps.ai, { signal, logger, metrics: deps.metrics });
    return { report: { ...base, status: 'folded' }, delta };
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Source processing failed', { index, kind, identifier, error: message });
    return {
      report: { ...base, status: 'failed', error: { code: 'FETCH_FAILURE', message } },
      delta: null,
    };
  }
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Build, enrich and persist a profile from an ordered list of sources
 *
 * Only an invalid request, a cancellation or a persistence failure ends the run
 * without a stored profile; source and AI failures degrade.
 *
 * @param request - user_id with parallel sources and source_kinds lists
 * @param overrides - Collaborators replacing the registered ones
 * @param options - AbortSignal that cancels the run
 */
export async function buildProfile(
  request: BuildProfileRequest,
  overrides?: Partial<RunManagerDeps>,
  options: BuildProfileOptions = {}
): Promise<ModuleResult<AggregationRun>> {
  const startTime = Date.now();
  const startedAt = new Date(startTime).toISOString();

  const parsed = BuildProfileRequestSchema.safeParse(request);
  if (!parsed.success) {
    const errors = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return fail('INVALID_REQUEST', `Invalid request: ${errors.join('; ')}`, '', startTime, errors);
  }

  const deps = resolveDeps(overrides);
  const logger = deps.logger ?? createLogger('run-manager');
  const metrics = deps.metrics ?? noopMetrics;
  const { signal } = options;
  const { user_id: userId, sources, source_kinds: sourceKinds } = parsed.data;

  const tracker = createRunTracker();
  const runLogger: Logger = {
    info: (message, context) => logger.info(message, { runId: tracker.run_id, ...context }),
    warn: (message, context) => logger.warn(message, { runId: tracker.run_id, ...context }),
    error: (message, context) => logger.error(message, { runId: tracker.run_id, ...context }),
    debug: (message, context) => logger.debug(message, { runId: tracker.run_id, ...context }),
  };

  const cancel = (): ModuleResult<AggregationRun> => {
    const cancelledIn = tracker.state;
    advanceRunState(tracker, 'cancelled');
    runLogger.warn('Run cancelled', { state: cancelledIn });
    metrics.increment('runs.cancelled');
    return fail('RUN_CANCELLED', `Run cancelled during ${cancelledIn}`, tracker.run_id, startTime, {
      state: cancelledIn,
      transitions: tracker.transitions,
    });
  };

  runLogger.info('Run started', { userId, sources: sources.length });
  metrics.increment('runs.started');

  if (signal?.aborted) {
    return cancel();
  }

  // Normalizing: fetch + normalize + resolve AI signals, concurrently per source
  advanceRunState(tracker, 'normalizing');
  const outcomes = await Promise.all(
    sources.map((identifier, index) =>
      processSource(index, identifier, sourceKinds[index] ?? '', deps, runLogger, signal)
    )
  );
  if (signal?.aborted) {
    return cancel();
  }

  // Folding: strictly in request order
  advanceRunState(tracker, 'folding');
  const deltas = outcomes.flatMap((outcome) => (outcome.delta ? [outcome.delta] : []));
  const profile = foldDeltas(createProfile(userId), deltas);
  if (signal?.aborted) {
    return cancel();
  }

  // Enriching
  advanceRunState(tracker, 'enriching');
  const enrichment = await enrichProfile(profile, {
    ai: deps.ai,
    media: deps.media,
    signal,
    logger: runLogger,
    metrics,
  });
  if (signal?.aborted) {
    return cancel();
  }

  // Persisting
  let stored: StoredProfile;
  try {
    stored = await deps.store.upsert(userId, profile);
  } catch (error) {
    const message = errorMessage(error);
    runLogger.error('Profile persistence failed', { userId, error: message });
    metrics.increment('runs.persistence_failed');
    return fail('PERSISTENCE_ERROR', `Failed to persist profile: ${message}`, tracker.run_id, startTime, {
      state: tracker.state,
      transitions: tracker.transitions,
    });
  }
  advanceRunState(tracker, 'persisted');

  const reports = outcomes.map((outcome) => outcome.report);
  const folded = reports.filter((report) => report.status === 'folded').length;
  runLogger.info('Run persisted', { userId, folded, total: reports.length });
  metrics.increment('runs.persisted');
  metrics.timing('runs.duration', Date.now() - startTime);

  return succeed(
    {
      run_id: tracker.run_id,
      user_id: userId,
      state: tracker.state,
      transitions: tracker.transitions,
      profile: stored,
      sources: reports,
      enrichment,
      started_at: startedAt,
      completed_at: new Date().toISOString(),
    },
    tracker.run_id,
    startTime
  );
}

/**
 * Load a stored profile
 *
 * @returns NOT_FOUND when no profile exists for the user
 */
export async function getProfile(userId: UserId, store?: ProfileStore): Promise<ModuleResult<StoredProfile>> {
  const startTime = Date.now();
  const profileStore = store ?? _deps?.store;
  if (!profileStore) {
    throw notInitialized();
  }

  try {
    const profile = await profileStore.get(userId);
    if (!profile) {
      return fail('NOT_FOUND', `Profile not found: ${userId}`, '', startTime, { userId });
    }
    return succeed(profile, '', startTime);
  } catch (error) {
    return fail('STORAGE_ERROR', `Failed to load profile: ${errorMessage(error)}`, '', startTime, { userId });
  }
}

/**
 * List stored profiles, newest first
 */
export async function listProfiles(store?: ProfileStore): Promise<ModuleResult<ProfileSummary[]>> {
  const startTime = Date.now();
  const profileStore = store ?? _deps?.store;
  if (!profileStore) {
    throw notInitialized();
  }

  try {
    return succeed(await profileStore.list(), '', startTime);
  } catch (error) {
    return fail('STORAGE_ERROR', `Failed to list profiles: ${errorMessage(error)}`, '', startTime);
  }
}

/**
 * Analyze a single image with the configured AI capability
 */
export async function analyzeImage(
  image: ImageInput,
  ai?: AICapability,
  options: BuildProfileOptions = {}
): Promise<ModuleResult<ImageAnalysis>> {
  const capability = ai ?? _deps?.ai;
  if (!capability) {
    throw notInitialized();
  }
  return capability.analyzeImage(image, { signal: options.signal });
}
