/**
 * Virtual Screening Pipeline
 *
 * Similarity search -> target extraction -> batch modeling -> reverse
 * screening -> aggregation. Each stage runs to completion before the next
 * starts; unit failures stay inside their stage's tables, and a fatal stage
 * error is rethrown as a StageError naming the stage.
 */

import type { PipelineDefinition, StageExecutionContext } from '@/lib/pipeline-types';
import { createPipelineStore } from '@/lib/store';
import type { PipelineStore } from '@/lib/store';
import { callWithTimeout, checkAborted, withConcurrencyLimit } from '@/lib/concurrency';
import {
  CollaboratorTimeoutError,
  ConfigError,
  MalformedInputError,
  StageError,
  errorMessage,
  isAbortError,
} from '@/lib/errors';
import type { PipelineStage } from '@/lib/errors';
import { assertConfig } from '@/lib/validations/config';
import type { ScreeningConfig } from '@/lib/validations/config';
import { extractTargets } from '@/lib/targetExtractor';
import type { TargetExtraction } from '@/lib/targetExtractor';
import { runModelBatches } from '@/lib/modelBatchDispatcher';
import type { BatchSummary } from '@/lib/modelBatchDispatcher';
import { runScreening } from '@/lib/screeningDispatcher';
import type { ScreeningOutcome } from '@/lib/screeningDispatcher';
import { aggregateResults } from '@/lib/resultAggregator';
import type { AggregationReport } from '@/lib/resultAggregator';
import { renderTextReport } from '@/lib/reportExport';
import { MemoryResultStore } from '@/lib/storage/resultStore';
import type { ResultStore } from '@/lib/storage/resultStore';
import type {
  CandidateList,
  Chemical,
  ModelArtifact,
  ModelBuilder,
  PairKey,
  ScreeningScorer,
  SimilaritySearch,
} from '@/lib/screening-types';

export const virtualScreeningPipeline: PipelineDefinition = {
  id: 'virtual-screening',
  name: 'Reverse Virtual Screening',
  description: 'Find candidate targets by similarity, model them, cross-screen, and rank combined hits',
  stages: [
    { id: 'search', name: 'Similarity Search', description: 'Candidate targets per chemical' },
    { id: 'extract', name: 'Target Extraction', description: 'Top-N per chemical, unique worklist with provenance' },
    { id: 'modeling', name: 'Pharmacophore Modeling', description: 'One model per unique target, in batches' },
    { id: 'screening', name: 'Reverse Screening', description: 'Every chemical against every built model' },
    { id: 'aggregate', name: 'Integration', description: 'Combined ranking and final report' },
  ],
};

export interface VirtualScreeningInput {
  chemicals: Chemical[];
  /** Precomputed search results; when given, the search stage is skipped */
  candidateLists?: CandidateList[];
}

export interface VirtualScreeningOptions {
  config: ScreeningConfig;
  search?: SimilaritySearch;
  builder: ModelBuilder;
  scorer: ScreeningScorer;
  /** Defaults to an in-memory store */
  store?: ResultStore;
  /** Run-state store; one is created when omitted */
  runState?: PipelineStore;
  signal?: AbortSignal;
  skipPairs?: PairKey[];
  /** Batch slots to run (all by default) */
  batchNumbers?: number[];
  /** Report timestamp, defaults to now */
  generatedAt?: Date;
}

export interface VirtualScreeningResult {
  sessionId: string;
  extraction: TargetExtraction;
  artifacts: ModelArtifact[];
  batchSummaries: BatchSummary[];
  screening: ScreeningOutcome;
  report: AggregationReport;
  reportText: string;
  /** Every recorded bad input record across stages */
  issues: MalformedInputError[];
}

/**
 * Run one stage body with run-state bookkeeping. Cancellation passes through
 * as an AbortError; anything else becomes a StageError.
 */
async function runStage<T>(
  stageId: PipelineStage,
  runState: PipelineStore,
  ctx: StageExecutionContext,
  body: () => Promise<{ value: T; summary: string }>,
): Promise<T> {
  checkAborted(ctx.abortSignal);
  runState.getState().stageStart(stageId);
  console.log(`[Pipeline] Stage "${stageId}" started`);

  try {
    const { value, summary } = await body();
    checkAborted(ctx.abortSignal);
    runState.getState().stageComplete(stageId, summary);
    console.log(`[Pipeline] Stage "${stageId}" completed: ${summary}`);
    return value;
  } catch (err) {
    if (ctx.abortSignal.aborted || isAbortError(err)) {
      runState.getState().cancel();
      console.warn(`[Pipeline] Stage "${stageId}" cancelled`);
      throw err;
    }
    const stageError = new StageError(stageId, err);
    runState.getState().stageFail(stageId, stageError.message);
    console.error(`[Pipeline] ${stageError.message}`);
    throw stageError;
  }
}

async function searchCandidates(
  chemicals: Chemical[],
  search: SimilaritySearch,
  ctx: StageExecutionContext,
): Promise<CandidateList[]> {
  const { config } = ctx;
  let done = 0;

  const tasks = chemicals.map((chemical) => async (): Promise<CandidateList> => {
    let candidates: CandidateList['candidates'] = [];
    try {
      candidates = await callWithTimeout(
        (signal) => search.search(chemical, config.topNPerChemical, { signal }),
        {
          timeoutMs: config.screeningTimeoutMs,
          signal: ctx.abortSignal,
          onTimeout: () =>
            new CollaboratorTimeoutError('search_timeout', config.screeningTimeoutMs, {
              stage: 'search',
              identifier: chemical.id,
            }),
        },
      );
    } catch (err) {
      if (isAbortError(err)) throw err;
      // An empty list makes extraction report and exclude the chemical
      console.warn(`[Pipeline] Similarity search failed for ${chemical.id}: ${errorMessage(err)}`);
    }
    done++;
    ctx.onProgress(Math.round((done / chemicals.length) * 100), `Searched ${done}/${chemicals.length} chemicals`);
    return { chemicalId: chemical.id, candidates };
  });

  return withConcurrencyLimit(tasks, config.cpuWorkers, ctx.abortSignal);
}

/**
 * Drop lists for chemicals outside the library so every join key resolves,
 * and give each library chemical without a list an empty one so extraction
 * reports and excludes it.
 */
function keepKnownChemicals(
  lists: CandidateList[],
  chemicalIds: Set<string>,
): { lists: CandidateList[]; issues: MalformedInputError[] } {
  const issues: MalformedInputError[] = [];
  const kept = lists.filter((list) => {
    if (chemicalIds.has(list.chemicalId)) return true;
    const issue = new MalformedInputError(`Candidate list for unknown chemical "${list.chemicalId}" ignored`, {
      stage: 'extract',
      identifier: list.chemicalId,
    });
    console.warn(`[Pipeline] ${issue.message}`);
    issues.push(issue);
    return false;
  });
  const covered = new Set(kept.map((list) => list.chemicalId));
  for (const chemicalId of chemicalIds) {
    if (!covered.has(chemicalId)) kept.push({ chemicalId, candidates: [] });
  }
  return { lists: kept, issues };
}

/**
 * Run the whole pipeline. Rejects with an AbortError on cancellation and a
 * StageError on a fatal stage error; everything persisted before either
 * stays in the store for the next run to reuse.
 */
export async function runVirtualScreening(
  input: VirtualScreeningInput,
  options: VirtualScreeningOptions,
): Promise<VirtualScreeningResult> {
  const config = assertConfig(options.config);
  const store = options.store ?? new MemoryResultStore();
  const runState = options.runState ?? createPipelineStore();
  const abortSignal = options.signal ?? new AbortController().signal;

  runState.getState().init(virtualScreeningPipeline);
  const { sessionId } = runState.getState();
  console.log(`[Pipeline] Session ${sessionId}: ${input.chemicals.length} chemicals`);

  const contextFor = (stageId: PipelineStage): StageExecutionContext => ({
    config,
    abortSignal,
    onProgress: (percent, message) => runState.getState().stageProgress(stageId, percent, message),
  });

  const issues: MalformedInputError[] = [];
  const chemicalIds = new Set(input.chemicals.map((chemical) => chemical.id));

  // ---- Similarity search ----
  let candidateLists: CandidateList[];
  if (input.candidateLists) {
    candidateLists = input.candidateLists;
    runState.getState().stageSkip('search', `${candidateLists.length} candidate lists supplied`);
  } else {
    const search = options.search;
    candidateLists = await runStage('search', runState, contextFor('search'), async () => {
      if (!search) {
        throw new ConfigError('Invalid pipeline options', ['search: required when candidateLists are not supplied']);
      }
      const lists = await searchCandidates(input.chemicals, search, contextFor('search'));
      const hits = lists.reduce((sum, list) => sum + list.candidates.length, 0);
      return { value: lists, summary: `${hits} hits for ${lists.length} chemicals` };
    });
  }

  // ---- Target extraction ----
  const extraction = await runStage('extract', runState, contextFor('extract'), async () => {
    const known = keepKnownChemicals(candidateLists, chemicalIds);
    issues.push(...known.issues);
    const result = extractTargets(known.lists, config);
    issues.push(...result.issues);
    await store.saveProvenance(result.selected);
    return {
      value: result,
      summary: `${result.statistics.uniqueTargets} unique targets from ${result.statistics.totalEntries} entries`,
    };
  });

  // ---- Modeling ----
  const worklistIds = new Set(extraction.worklist.map((target) => target.targetId));
  const modeling = await runStage('modeling', runState, contextFor('modeling'), async () => {
    const outcome = await runModelBatches(extraction.worklist, {
      config,
      builder: options.builder,
      store,
      signal: abortSignal,
      onProgress: contextFor('modeling').onProgress,
      batchNumbers: options.batchNumbers,
    });
    // Slots finished by earlier runs count too
    const artifacts = (await store.listModelArtifacts()).filter((artifact) => worklistIds.has(artifact.targetId));
    const built = artifacts.filter((artifact) => artifact.status === 'success').length;
    return {
      value: { artifacts, summaries: outcome.summaries },
      summary: `${built}/${worklistIds.size} models available`,
    };
  });

  // ---- Screening ----
  const screening = await runStage('screening', runState, contextFor('screening'), async () => {
    const outcome = await runScreening(input.chemicals, modeling.artifacts, {
      config,
      scorer: options.scorer,
      store,
      skipPairs: options.skipPairs,
      signal: abortSignal,
      onProgress: contextFor('screening').onProgress,
    });
    issues.push(...outcome.issues);
    return {
      value: outcome,
      summary: `${outcome.statistics.success}/${outcome.statistics.attempted} pairs scored`,
    };
  });

  // ---- Aggregation ----
  const { report, reportText } = await runStage('aggregate', runState, contextFor('aggregate'), async () => {
    const aggregated = aggregateResults(
      {
        chemicalIds: [...chemicalIds],
        targetIds: [...worklistIds],
        candidates: extraction.selected,
        artifacts: modeling.artifacts,
        screeningResults: screening.results,
      },
      config,
    );
    const text = renderTextReport(aggregated, { generatedAt: options.generatedAt });
    await store.saveReport(aggregated, text);
    return {
      value: { report: aggregated, reportText: text },
      summary: `${aggregated.statistics.combinedHits} combined hits`,
    };
  });

  console.log(`[Pipeline] Session ${sessionId} completed`);

  return {
    sessionId,
    extraction,
    artifacts: modeling.artifacts,
    batchSummaries: modeling.summaries,
    screening,
    report,
    reportText,
    issues,
  };
}
