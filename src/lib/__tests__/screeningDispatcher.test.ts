import { describe, it, expect } from 'vitest';
import { buildScreeningViews, runScreening, summarizeScores } from '../screeningDispatcher';
import { resolveConfig } from '../validations/config';
import { CollaboratorFailure, MalformedInputError, isAbortError } from '../errors';
import { MemoryResultStore } from '../storage/resultStore';
import type { ModelArtifact } from '../screening-types';
import { chemical, FakeScorer, successArtifact } from './fakes';

const failedArtifact = (targetId: string): ModelArtifact => ({
  targetId,
  batchNumber: 1,
  status: 'failure',
  failureReason: 'build_error',
  failureMessage: 'no ligand in structure',
  startedAt: '2024-01-01T00:00:00.000Z',
  completedAt: '2024-01-01T00:00:01.000Z',
  elapsedMs: 1000,
});

const chemicals = [chemical('A'), chemical('B'), chemical('C')];
const artifacts = [successArtifact('T1'), successArtifact('T2'), failedArtifact('T3')];

describe('runScreening', () => {
  it('should produce one row per chemical x successfully modeled target', async () => {
    const scorer = new FakeScorer();

    const outcome = await runScreening(chemicals, artifacts, {
      config: resolveConfig(),
      scorer,
      store: new MemoryResultStore(),
    });

    expect(outcome.results.map((r) => `${r.chemicalId}::${r.targetId}`)).toEqual([
      'A::T1',
      'A::T2',
      'B::T1',
      'B::T2',
      'C::T1',
      'C::T2',
    ]);
    expect(scorer.calls).toHaveLength(6);
    expect(scorer.calls.some((key) => key.endsWith('::T3'))).toBe(false);
    expect(outcome.statistics).toMatchObject({ totalPairs: 6, totalChemicals: 3, totalTargets: 2 });
  });

  it('should keep a failing pair from affecting any other pair', async () => {
    const scorer = new FakeScorer({
      'A::T1': { throws: new Error('segfault in scorer') },
      'A::T2': 'hang',
      'B::T2': { ok: false, reason: 'invalid_smiles', message: 'cannot parse structure' },
      'C::T2': { throws: new CollaboratorFailure('invalid_smiles', 'bad ring closure') },
    });

    const outcome = await runScreening(chemicals, artifacts, {
      config: resolveConfig({ screeningTimeoutMs: 20 }),
      scorer,
      store: new MemoryResultStore(),
    });

    expect(outcome.results.map((r) => [r.chemicalId, r.targetId, r.status, r.failureReason])).toEqual([
      ['A', 'T1', 'failure', 'scoring_error'],
      ['A', 'T2', 'failure', 'scoring_timeout'],
      ['B', 'T1', 'success', null],
      ['B', 'T2', 'failure', 'invalid_smiles'],
      ['C', 'T1', 'success', null],
      ['C', 'T2', 'failure', 'invalid_smiles'],
    ]);
    expect(outcome.results[0].failureMessage).toBe('segfault in scorer');
    expect(outcome.statistics).toMatchObject({
      attempted: 6,
      success: 2,
      failure: 4,
      failuresByReason: { invalid_smiles: 2, scoring_timeout: 1, scoring_error: 1 },
    });
    expect(outcome.statistics.successRate).toBeCloseTo(33.333, 2);
  });

  it('should record a non-finite score as a scoring error', async () => {
    const scorer = new FakeScorer({ 'A::T1': { ok: true, score: Number.NaN } });

    const outcome = await runScreening([chemical('A')], [successArtifact('T1')], {
      config: resolveConfig(),
      scorer,
      store: new MemoryResultStore(),
    });

    expect(outcome.results[0]).toMatchObject({
      status: 'failure',
      screeningScore: null,
      failureReason: 'scoring_error',
      failureMessage: 'Non-finite score: NaN',
    });
  });

  it('should report skipped pairs without scoring them', async () => {
    const scorer = new FakeScorer();

    const outcome = await runScreening([chemical('A'), chemical('B')], artifacts, {
      config: resolveConfig(),
      scorer,
      store: new MemoryResultStore(),
      skipPairs: [{ chemicalId: 'A', targetId: 'T1' }],
    });

    expect(scorer.calls).not.toContain('A::T1');
    expect(outcome.results[0]).toEqual({
      chemicalId: 'A',
      targetId: 'T1',
      status: 'skipped',
      screeningScore: null,
      failureReason: 'skipped',
      elapsedMs: 0,
    });
    expect(outcome.statistics).toMatchObject({ totalPairs: 4, attempted: 3, skipped: 1, success: 3, failure: 0 });
  });

  it('should keep pairs apart when an id contains the key separator', async () => {
    const store = new MemoryResultStore();

    const outcome = await runScreening([chemical('X::Y'), chemical('X')], [successArtifact('T'), successArtifact('Y::T')], {
      config: resolveConfig(),
      scorer: new FakeScorer(),
      store,
      skipPairs: [{ chemicalId: 'X::Y', targetId: 'T' }],
    });

    expect(outcome.statistics).toMatchObject({ totalPairs: 4, attempted: 3, skipped: 1, success: 3 });
    expect(await store.loadScreeningResult('X', 'Y::T')).toMatchObject({ status: 'success', screeningScore: 1 });
  });

  it('should reuse successful rows on rerun', async () => {
    const store = new MemoryResultStore();
    const config = resolveConfig();
    const first = await runScreening(chemicals, artifacts, { config, scorer: new FakeScorer(), store });

    const scorer = new FakeScorer();
    const second = await runScreening(chemicals, artifacts, { config, scorer, store });

    expect(scorer.calls).toEqual([]);
    expect(second.results).toEqual(first.results);
    expect(second.statistics).toMatchObject({ reused: 6, invoked: 0 });
  });

  it('should retry failed rows on rerun', async () => {
    const store = new MemoryResultStore();
    const config = resolveConfig();
    await runScreening(chemicals, artifacts, {
      config,
      scorer: new FakeScorer({ 'B::T2': { ok: false, reason: 'invalid_smiles', message: 'bad input' } }),
      store,
    });

    const scorer = new FakeScorer();
    const second = await runScreening(chemicals, artifacts, { config, scorer, store });

    expect(scorer.calls).toEqual(['B::T2']);
    expect(second.statistics.success).toBe(6);
  });

  it('should rescore every pair when forceRescreen is set', async () => {
    const store = new MemoryResultStore();
    await runScreening(chemicals, artifacts, { config: resolveConfig(), scorer: new FakeScorer(), store });

    const scorer = new FakeScorer();
    await runScreening(chemicals, artifacts, { config: resolveConfig({ forceRescreen: true }), scorer, store });

    expect(scorer.calls).toHaveLength(6);
  });

  it('should screen a duplicated chemical once and report it', async () => {
    const scorer = new FakeScorer();

    const outcome = await runScreening([chemical('A'), chemical('A', 'CCN')], [successArtifact('T1')], {
      config: resolveConfig(),
      scorer,
      store: new MemoryResultStore(),
    });

    expect(scorer.calls).toEqual(['A::T1']);
    expect(outcome.issues).toHaveLength(1);
    expect(outcome.issues[0]).toBeInstanceOf(MalformedInputError);
    expect(outcome.statistics.totalChemicals).toBe(1);
  });

  it('should reject on cancellation and persist nothing in flight', async () => {
    const store = new MemoryResultStore();
    const controller = new AbortController();
    const scorer = new FakeScorer({ 'A::T1': 'hang', 'A::T2': 'hang' });
    setTimeout(() => controller.abort(), 10);

    const err = await runScreening([chemical('A')], artifacts, {
      config: resolveConfig({ cpuWorkers: 2 }),
      scorer,
      store,
      signal: controller.signal,
    }).catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
    expect(await store.listScreeningResults()).toEqual([]);
    expect(store.screeningTables).toBeNull();
  });

  it('should hand the finished tables to the store', async () => {
    const store = new MemoryResultStore();

    const outcome = await runScreening(chemicals, artifacts, { config: resolveConfig(), scorer: new FakeScorer(), store });

    expect(store.screeningTables?.statistics).toEqual(outcome.statistics);
    expect(store.screeningTables?.results).toHaveLength(6);
  });
});

describe('buildScreeningViews', () => {
  it('should order each view by score with unscored rows last', async () => {
    const scorer = new FakeScorer({
      'A::T1': { ok: true, score: 5 },
      'A::T2': { ok: true, score: 9 },
      'B::T1': { ok: true, score: 7 },
      'B::T2': { ok: false, reason: 'invalid_smiles', message: 'bad input' },
    });
    const { results, statistics } = await runScreening([chemical('B'), chemical('A')], artifacts, {
      config: resolveConfig(),
      scorer,
      store: new MemoryResultStore(),
    });

    const views = buildScreeningViews(results);

    expect(views.master.map((r) => `${r.chemicalId}::${r.targetId}`)).toEqual(['A::T1', 'A::T2', 'B::T1', 'B::T2']);
    expect(views.byChemical.get('A')?.map((r) => r.targetId)).toEqual(['T2', 'T1']);
    expect(views.byTarget.get('T1')?.map((r) => r.chemicalId)).toEqual(['B', 'A']);
    expect(views.byTarget.get('T2')?.map((r) => r.chemicalId)).toEqual(['A', 'B']);
    expect(statistics.scoreSummary).toEqual({ min: 5, max: 9, mean: 7, median: 7, std: 2 });
  });
});

describe('summarizeScores', () => {
  it('should return null for no scores', () => {
    expect(summarizeScores([])).toBeNull();
  });

  it('should give a zero spread for a single score', () => {
    expect(summarizeScores([4])).toEqual({ min: 4, max: 4, mean: 4, median: 4, std: 0 });
  });

  it('should average the middle pair for an even count', () => {
    const summary = summarizeScores([4, 1, 3, 2]);

    expect(summary?.median).toBe(2.5);
    expect(summary?.mean).toBe(2.5);
    expect(summary?.std).toBeCloseTo(1.291, 3);
  });
});
