/**
 * Batch Pharmacophore Modeling
 *
 * Splits the unique target worklist into deterministic, resumable batches and
 * builds one model per target through the external model-building
 * collaborator. Within a batch slot, targets run with bounded parallelism;
 * every target owns its own output record so a failure stays local.
 */

import { callWithTimeout, checkAborted, elapsedSince, withConcurrencyLimit } from './concurrency';
import {
  CollaboratorFailure,
  CollaboratorTimeoutError,
  ConfigError,
  errorMessage,
  isAbortError,
} from './errors';
import { assertConfig } from './validations/config';
import type { ScreeningConfig } from './validations/config';
import type { ResultStore } from './storage/resultStore';
import { MODEL_FAILURE_REASONS } from './screening-types';
import type {
  ModelArtifact,
  ModelBuilder,
  ModelFailureReason,
  ProgressCallback,
  UniqueTarget,
} from './screening-types';

export interface TargetBatch {
  /** 1-based */
  batchNumber: number;
  targetIds: string[];
}

export interface BatchSummary {
  batchNumber: number;
  totalBatches: number;
  total: number;
  /** Collaborator invocations made in this run */
  built: number;
  /** Targets whose existing success artifact was kept */
  reused: number;
  success: number;
  failure: number;
  failuresByReason: Record<ModelFailureReason, number>;
  failedTargetIds: string[];
  elapsedMs: number;
  startedAt: string;
  completedAt: string;
}

export interface ModelBatchResult {
  batch: TargetBatch;
  /** One per target in the batch, sorted by targetId */
  artifacts: ModelArtifact[];
  summary: BatchSummary;
}

export interface ModelBatchOptions {
  config: ScreeningConfig;
  builder: ModelBuilder;
  store: ResultStore;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  /** Used for log and summary context only */
  totalBatches?: number;
}

export interface ModelingOutcome {
  /** Every artifact across the selected batches, sorted by targetId */
  artifacts: ModelArtifact[];
  summaries: BatchSummary[];
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Range-partition target ids (sorted) into exactly `batchCount` contiguous
 * batches whose sizes differ by at most one. Same worklist and batch count
 * always give the same assignment.
 */
export function partitionWorklist(
  worklist: ReadonlyArray<UniqueTarget | string>,
  batchCount: number,
): TargetBatch[] {
  if (!Number.isInteger(batchCount) || batchCount < 1) {
    throw new ConfigError('Invalid screening configuration', [
      `batchCount: must be a positive integer (got ${batchCount})`,
    ]);
  }

  const ids = [...new Set(worklist.map((t) => (typeof t === 'string' ? t : t.targetId)))].sort(compareIds);
  const baseSize = Math.floor(ids.length / batchCount);
  const remainder = ids.length % batchCount;

  const batches: TargetBatch[] = [];
  let start = 0;
  for (let i = 0; i < batchCount; i++) {
    const size = baseSize + (i < remainder ? 1 : 0);
    batches.push({ batchNumber: i + 1, targetIds: ids.slice(start, start + size) });
    start += size;
  }
  return batches;
}

function emptyReasonCounts(): Record<ModelFailureReason, number> {
  return { download_failed: 0, build_timeout: 0, build_error: 0, invalid_structure: 0 };
}

function isModelFailureReason(value: string): value is ModelFailureReason {
  return MODEL_FAILURE_REASONS.some((reason) => reason === value);
}

/** Map a thrown collaborator error onto a failure reason. */
function classifyBuildError(err: unknown): { reason: ModelFailureReason; message: string } {
  if (err instanceof CollaboratorTimeoutError) {
    return { reason: 'build_timeout', message: err.message };
  }
  if (err instanceof CollaboratorFailure && isModelFailureReason(err.reason)) {
    return { reason: err.reason, message: err.message };
  }
  return { reason: 'build_error', message: errorMessage(err) };
}

async function modelTarget(
  targetId: string,
  batchNumber: number,
  options: ModelBatchOptions,
): Promise<{ artifact: ModelArtifact; reused: boolean }> {
  const { config, builder, store, signal } = options;

  if (!config.forceRebuild) {
    const existing = await store.loadModelArtifact(targetId);
    if (existing?.status === 'success') {
      return { artifact: existing, reused: true };
    }
  }

  checkAborted(signal);
  const startMs = Date.now();
  const startedAt = new Date(startMs).toISOString();

  let artifact: ModelArtifact;
  try {
    const output = await callWithTimeout((callSignal) => builder.build(targetId, { signal: callSignal }), {
      timeoutMs: config.modelTimeoutMs,
      signal,
      onTimeout: () =>
        new CollaboratorTimeoutError('build_timeout', config.modelTimeoutMs, {
          stage: 'modeling',
          identifier: targetId,
        }),
    });

    const base = {
      targetId,
      batchNumber,
      startedAt,
      completedAt: new Date().toISOString(),
      elapsedMs: elapsedSince(startMs),
    };

    if (!output.ok) {
      artifact = { ...base, status: 'failure', failureReason: output.reason, failureMessage: output.message };
    } else if (output.artifactPaths.length === 0) {
      artifact = { ...base, status: 'failure', failureReason: 'build_error', failureMessage: 'No model artifact produced' };
    } else {
      artifact = { ...base, status: 'success', artifactPaths: [...output.artifactPaths] };
    }
  } catch (err) {
    if (isAbortError(err)) throw err;
    const { reason, message } = classifyBuildError(err);
    artifact = {
      targetId,
      batchNumber,
      startedAt,
      completedAt: new Date().toISOString(),
      elapsedMs: elapsedSince(startMs),
      status: 'failure',
      failureReason: reason,
      failureMessage: message,
    };
  }

  // Abandon in-flight results once the stage is cancelled
  checkAborted(signal);
  await store.saveModelArtifact(artifact);

  if (artifact.status === 'success') {
    console.log(`[ModelBatch] ${targetId}: model saved (${artifact.elapsedMs}ms)`);
  } else {
    console.warn(`[ModelBatch] ${targetId}: ${artifact.failureReason} - ${artifact.failureMessage}`);
  }

  return { artifact, reused: false };
}

/**
 * Model every target in one batch. Per-target failures become failure
 * artifacts; the batch itself only rejects on cancellation or a store error.
 */
export async function runModelBatch(batch: TargetBatch, options: ModelBatchOptions): Promise<ModelBatchResult> {
  const config = assertConfig(options.config);
  const totalBatches = options.totalBatches ?? batch.batchNumber;
  const startMs = Date.now();
  const startedAt = new Date(startMs).toISOString();

  console.log(
    `[ModelBatch] Batch ${batch.batchNumber}/${totalBatches}: ${batch.targetIds.length} targets ` +
      `(${config.modelConcurrency} lanes)`,
  );

  let done = 0;
  const tasks = batch.targetIds.map((targetId) => async () => {
    const outcome = await modelTarget(targetId, batch.batchNumber, { ...options, config });
    done++;
    options.onProgress?.(
      Math.round((done / batch.targetIds.length) * 100),
      `Batch ${batch.batchNumber}: ${done}/${batch.targetIds.length} targets`,
    );
    return outcome;
  });

  const outcomes = await withConcurrencyLimit(tasks, config.modelConcurrency, options.signal);

  // Single-pass reduction after the barrier
  const failuresByReason = emptyReasonCounts();
  const failedTargetIds: string[] = [];
  let success = 0;
  let reused = 0;
  for (const { artifact, reused: wasReused } of outcomes) {
    if (wasReused) reused++;
    if (artifact.status === 'success') {
      success++;
    } else {
      failuresByReason[artifact.failureReason]++;
      failedTargetIds.push(artifact.targetId);
    }
  }

  const summary: BatchSummary = {
    batchNumber: batch.batchNumber,
    totalBatches,
    total: batch.targetIds.length,
    built: outcomes.length - reused,
    reused,
    success,
    failure: failedTargetIds.length,
    failuresByReason,
    failedTargetIds: failedTargetIds.sort(compareIds),
    elapsedMs: elapsedSince(startMs),
    startedAt,
    completedAt: new Date().toISOString(),
  };

  await options.store.saveBatchSummary(summary);

  console.log(
    `[ModelBatch] Batch ${batch.batchNumber} done: ${success}/${summary.total} succeeded, ` +
      `${summary.failure} failed, ${reused} reused (${summary.elapsedMs}ms)`,
  );

  const artifacts = outcomes.map((o) => o.artifact).sort((a, b) => compareIds(a.targetId, b.targetId));
  return { batch, artifacts, summary };
}

/**
 * Partition the worklist with `batchCount` and run the selected batch slots
 * (all by default). Slots are independent and run side by side.
 */
export async function runModelBatches(
  worklist: ReadonlyArray<UniqueTarget | string>,
  options: ModelBatchOptions & { batchNumbers?: number[] },
): Promise<ModelingOutcome> {
  const config = assertConfig(options.config);
  const batches = partitionWorklist(worklist, config.batchCount);

  const unknown = (options.batchNumbers ?? []).filter((n) => !batches.some((b) => b.batchNumber === n));
  if (unknown.length > 0) {
    throw new ConfigError('Invalid screening configuration', [
      `batchNumbers: must be between 1 and ${batches.length} (got ${unknown.join(', ')})`,
    ]);
  }
  const wanted = options.batchNumbers ? new Set(options.batchNumbers) : null;
  const selected = wanted ? batches.filter((b) => wanted.has(b.batchNumber)) : batches;

  const totalTargets = selected.reduce((sum, b) => sum + b.targetIds.length, 0);
  const progressByBatch = new Map<number, number>();
  const onBatchProgress = (batchNumber: number, size: number): ProgressCallback => (percent, message) => {
    progressByBatch.set(batchNumber, (percent / 100) * size);
    const doneTargets = [...progressByBatch.values()].reduce((sum, n) => sum + n, 0);
    options.onProgress?.(totalTargets > 0 ? Math.round((doneTargets / totalTargets) * 100) : 100, message);
  };

  const results = await Promise.all(
    selected.map((batch) =>
      runModelBatch(batch, {
        ...options,
        config,
        totalBatches: batches.length,
        onProgress: onBatchProgress(batch.batchNumber, batch.targetIds.length),
      }),
    ),
  );

  return {
    artifacts: results.flatMap((r) => r.artifacts).sort((a, b) => compareIds(a.targetId, b.targetId)),
    summaries: results.map((r) => r.summary),
  };
}
