/**
 * Reverse Screening
 *
 * Screens every chemical against every successfully built pharmacophore
 * model. Each chemical x target pair is an independent task in a bounded
 * pool; a failed pair only ever affects its own row.
 */

import { callWithTimeout, checkAborted, elapsedSince, withConcurrencyLimit } from './concurrency';
import {
  CollaboratorFailure,
  CollaboratorTimeoutError,
  MalformedInputError,
  errorMessage,
  isAbortError,
} from './errors';
import { assertConfig } from './validations/config';
import type { ScreeningConfig } from './validations/config';
import type { ResultStore } from './storage/resultStore';
import { pairKey, SCREENING_FAILURE_REASONS } from './screening-types';
import type {
  Chemical,
  ModelArtifact,
  ModelArtifactSuccess,
  PairKey,
  ProgressCallback,
  ScreeningFailureReason,
  ScreeningResult,
  ScreeningScorer,
} from './screening-types';

export interface ScoreSummary {
  min: number;
  max: number;
  mean: number;
  median: number;
  /** Sample standard deviation, 0 for a single score */
  std: number;
}

export interface ScreeningStatistics {
  /** chemicals x modeled targets */
  totalPairs: number;
  /** totalPairs minus explicitly skipped pairs */
  attempted: number;
  invoked: number;
  reused: number;
  success: number;
  failure: number;
  skipped: number;
  failuresByReason: Record<ScreeningFailureReason, number>;
  /** Percent of attempted pairs */
  successRate: number;
  scoreSummary: ScoreSummary | null;
  totalChemicals: number;
  totalTargets: number;
}

/** Three views over one row set */
export interface ScreeningViews {
  /** chemicalId asc, targetId asc */
  master: ScreeningResult[];
  /** Rows per chemical, best score first, unscored rows last */
  byChemical: Map<string, ScreeningResult[]>;
  /** Rows per target, best score first, unscored rows last */
  byTarget: Map<string, ScreeningResult[]>;
}

export interface ScreeningOutcome {
  results: ScreeningResult[];
  views: ScreeningViews;
  statistics: ScreeningStatistics;
  issues: MalformedInputError[];
}

export interface ScreeningOptions {
  config: ScreeningConfig;
  scorer: ScreeningScorer;
  store: ResultStore;
  /** Pairs to leave out; they are reported as skipped rows */
  skipPairs?: PairKey[];
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function emptyReasonCounts(): Record<ScreeningFailureReason, number> {
  return { invalid_smiles: 0, scoring_timeout: 0, scoring_error: 0 };
}

function isScreeningFailureReason(value: string): value is ScreeningFailureReason {
  return SCREENING_FAILURE_REASONS.some((reason) => reason === value);
}

function classifyScoringError(err: unknown): { reason: ScreeningFailureReason; message: string } {
  if (err instanceof CollaboratorTimeoutError) {
    return { reason: 'scoring_timeout', message: err.message };
  }
  if (err instanceof CollaboratorFailure && isScreeningFailureReason(err.reason)) {
    return { reason: err.reason, message: err.message };
  }
  return { reason: 'scoring_error', message: errorMessage(err) };
}

/** Score desc; rows without a score sink to the end. */
function compareByScore(a: ScreeningResult, b: ScreeningResult): number {
  if (a.screeningScore === null && b.screeningScore === null) return 0;
  if (a.screeningScore === null) return 1;
  if (b.screeningScore === null) return -1;
  return b.screeningScore - a.screeningScore;
}

function groupRows(
  rows: ScreeningResult[],
  keyOf: (row: ScreeningResult) => string,
  tieBreak: (row: ScreeningResult) => string,
): Map<string, ScreeningResult[]> {
  const groups = new Map<string, ScreeningResult[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const bucket = groups.get(key) ?? [];
    bucket.push(row);
    groups.set(key, bucket);
  }
  for (const bucket of groups.values()) {
    bucket.sort((a, b) => compareByScore(a, b) || compareIds(tieBreak(a), tieBreak(b)));
  }
  return groups;
}

/** Derive master, per-chemical and per-target views from the same rows. */
export function buildScreeningViews(results: ScreeningResult[]): ScreeningViews {
  const master = [...results].sort(
    (a, b) => compareIds(a.chemicalId, b.chemicalId) || compareIds(a.targetId, b.targetId),
  );
  return {
    master,
    byChemical: groupRows(master, (r) => r.chemicalId, (r) => r.targetId),
    byTarget: groupRows(master, (r) => r.targetId, (r) => r.chemicalId),
  };
}

export function summarizeScores(scores: number[]): ScoreSummary | null {
  if (scores.length === 0) return null;
  const sorted = [...scores].sort((a, b) => a - b);
  const n = sorted.length;
  const mean = sorted.reduce((sum, s) => sum + s, 0) / n;
  const mid = Math.floor(n / 2);
  const median = n % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  const variance = n > 1 ? sorted.reduce((sum, s) => sum + (s - mean) ** 2, 0) / (n - 1) : 0;
  return { min: sorted[0], max: sorted[n - 1], mean, median, std: Math.sqrt(variance) };
}

async function screenPair(
  chemical: Chemical,
  artifact: ModelArtifactSuccess,
  options: ScreeningOptions,
): Promise<{ result: ScreeningResult; reused: boolean }> {
  const { config, scorer, store, signal } = options;
  const chemicalId = chemical.id;
  const targetId = artifact.targetId;

  if (!config.forceRescreen) {
    const existing = await store.loadScreeningResult(chemicalId, targetId);
    if (existing?.status === 'success') {
      return { result: existing, reused: true };
    }
  }

  checkAborted(signal);
  const startMs = Date.now();

  let result: ScreeningResult;
  try {
    const output = await callWithTimeout(
      (callSignal) => scorer.score(chemical, artifact, { signal: callSignal }),
      {
        timeoutMs: config.screeningTimeoutMs,
        signal,
        onTimeout: () =>
          new CollaboratorTimeoutError('scoring_timeout', config.screeningTimeoutMs, {
            stage: 'screening',
            identifier: `${chemicalId}::${targetId}`,
          }),
      },
    );

    if (!output.ok) {
      result = {
        chemicalId,
        targetId,
        status: 'failure',
        screeningScore: null,
        failureReason: output.reason,
        failureMessage: output.message,
        elapsedMs: elapsedSince(startMs),
      };
    } else if (!Number.isFinite(output.score)) {
      result = {
        chemicalId,
        targetId,
        status: 'failure',
        screeningScore: null,
        failureReason: 'scoring_error',
        failureMessage: `Non-finite score: ${output.score}`,
        elapsedMs: elapsedSince(startMs),
      };
    } else {
      result = {
        chemicalId,
        targetId,
        status: 'success',
        screeningScore: output.score,
        failureReason: null,
        elapsedMs: elapsedSince(startMs),
      };
    }
  } catch (err) {
    if (isAbortError(err)) throw err;
    const { reason, message } = classifyScoringError(err);
    result = {
      chemicalId,
      targetId,
      status: 'failure',
      screeningScore: null,
      failureReason: reason,
      failureMessage: message,
      elapsedMs: elapsedSince(startMs),
    };
  }

  checkAborted(signal);
  await store.saveScreeningResult(result);

  if (result.status === 'failure') {
    console.warn(`[Screening] ${chemicalId} vs ${targetId}: ${result.failureReason} - ${result.failureMessage}`);
  }

  return { result, reused: false };
}

function dedupeChemicals(chemicals: Chemical[]): { unique: Chemical[]; issues: MalformedInputError[] } {
  const seen = new Set<string>();
  const unique: Chemical[] = [];
  const issues: MalformedInputError[] = [];
  for (const chemical of chemicals) {
    if (seen.has(chemical.id)) {
      const issue = new MalformedInputError(`Duplicate chemical "${chemical.id}" ignored`, {
        stage: 'screening',
        identifier: chemical.id,
      });
      console.warn(`[Screening] ${issue.message}`);
      issues.push(issue);
      continue;
    }
    seen.add(chemical.id);
    unique.push(chemical);
  }
  return { unique: unique.sort((a, b) => compareIds(a.id, b.id)), issues };
}

/**
 * Screen the chemical x successfully-modeled-target cross product.
 *
 * Failure artifacts are ignored. Pairs with an existing success row are
 * reused unless `forceRescreen` is set. Rejects only on cancellation or a
 * store error.
 */
export async function runScreening(
  chemicals: Chemical[],
  artifacts: ModelArtifact[],
  options: ScreeningOptions,
): Promise<ScreeningOutcome> {
  const config = assertConfig(options.config);
  const { unique, issues } = dedupeChemicals(chemicals);

  const models = new Map<string, ModelArtifactSuccess>();
  for (const artifact of artifacts) {
    if (artifact.status === 'success') models.set(artifact.targetId, artifact);
  }
  const targetIds = [...models.keys()].sort(compareIds);

  const skip = new Set((options.skipPairs ?? []).map((p) => pairKey(p.chemicalId, p.targetId)));

  const totalPairs = unique.length * targetIds.length;
  console.log(
    `[Screening] ${unique.length} chemicals x ${targetIds.length} models = ${totalPairs} pairs ` +
      `(${config.cpuWorkers} workers)`,
  );

  const skippedRows: ScreeningResult[] = [];
  const tasks: Array<() => Promise<{ result: ScreeningResult; reused: boolean }>> = [];
  for (const chemical of unique) {
    for (const targetId of targetIds) {
      if (skip.has(pairKey(chemical.id, targetId))) {
        skippedRows.push({
          chemicalId: chemical.id,
          targetId,
          status: 'skipped',
          screeningScore: null,
          failureReason: 'skipped',
          elapsedMs: 0,
        });
        continue;
      }
      const artifact = models.get(targetId);
      if (artifact) tasks.push(() => screenPair(chemical, artifact, { ...options, config }));
    }
  }

  let done = 0;
  const tracked = tasks.map((task) => async () => {
    const outcome = await task();
    done++;
    if (options.onProgress && (done % 25 === 0 || done === tasks.length)) {
      options.onProgress(Math.round((done / tasks.length) * 100), `Screened ${done}/${tasks.length} pairs`);
    }
    return outcome;
  });

  const outcomes = await withConcurrencyLimit(tracked, config.cpuWorkers, options.signal);

  const results = [...outcomes.map((o) => o.result), ...skippedRows];
  const views = buildScreeningViews(results);

  const failuresByReason = emptyReasonCounts();
  const scores: number[] = [];
  let reused = 0;
  for (const { result, reused: wasReused } of outcomes) {
    if (wasReused) reused++;
    if (result.status === 'success' && result.screeningScore !== null) {
      scores.push(result.screeningScore);
    } else if (result.status === 'failure' && result.failureReason && result.failureReason !== 'skipped') {
      failuresByReason[result.failureReason]++;
    }
  }

  const attempted = outcomes.length;
  const failure = Object.values(failuresByReason).reduce((sum, n) => sum + n, 0);
  const statistics: ScreeningStatistics = {
    totalPairs,
    attempted,
    invoked: attempted - reused,
    reused,
    success: scores.length,
    failure,
    skipped: skippedRows.length,
    failuresByReason,
    successRate: attempted > 0 ? (scores.length / attempted) * 100 : 0,
    scoreSummary: summarizeScores(scores),
    totalChemicals: unique.length,
    totalTargets: targetIds.length,
  };

  await options.store.saveScreeningTables({ results: views.master, views, statistics, issues });

  console.log(
    `[Screening] Done: ${statistics.success}/${attempted} succeeded, ${failure} failed, ` +
      `${statistics.skipped} skipped, ${reused} reused`,
  );

  return { results: views.master, views, statistics, issues };
}
