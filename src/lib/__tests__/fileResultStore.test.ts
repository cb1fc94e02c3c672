import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { FileResultStore, slotName } from '../storage/fileResultStore';
import { runScreening } from '../screeningDispatcher';
import { aggregateResults } from '../resultAggregator';
import { resolveConfig } from '../validations/config';
import type { ScreeningResult } from '../screening-types';
import { candidate, chemical, FakeScorer, successArtifact } from './fakes';

let rootDir: string;
let store: FileResultStore;

beforeEach(async () => {
  rootDir = await mkdtemp(path.join(tmpdir(), 'screening-store-'));
  store = new FileResultStore(rootDir);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(rootDir, { recursive: true, force: true });
});

describe('slotName', () => {
  it('should keep plain ids and escape path characters', () => {
    expect(slotName('1ABC')).toBe('1ABC');
    expect(slotName('beta-carotene')).toBe('beta-carotene');
    expect(slotName('a/b')).toBe('a%2Fb');
    expect(slotName('..')).toBe('%2E%2E');
  });
});

describe('FileResultStore', () => {
  it('should return null for a slot never written', async () => {
    expect(await store.loadModelArtifact('T1')).toBeNull();
    expect(await store.listModelArtifacts()).toEqual([]);
    expect(await store.listScreeningResults()).toEqual([]);
  });

  it('should round-trip model artifacts and list them sorted', async () => {
    await store.saveModelArtifact(successArtifact('T2'));
    await store.saveModelArtifact(successArtifact('T1'));

    expect(await store.loadModelArtifact('T2')).toEqual(successArtifact('T2'));
    expect((await store.listModelArtifacts()).map((a) => a.targetId)).toEqual(['T1', 'T2']);
  });

  it('should store pair slots under escaped chemical names', async () => {
    const row: ScreeningResult = {
      chemicalId: 'acid/base',
      targetId: 'T1',
      status: 'failure',
      screeningScore: null,
      failureReason: 'invalid_smiles',
      failureMessage: 'cannot parse structure',
      elapsedMs: 3,
    };

    await store.saveScreeningResult(row);

    expect(await store.loadScreeningResult('acid/base', 'T1')).toEqual(row);
    const onDisk = await readFile(path.join(rootDir, 'screening', 'pairs', 'acid%2Fbase', 'T1.json'), 'utf8');
    expect(JSON.parse(onDisk)).toEqual(row);
  });

  it('should treat a corrupt or invalid slot as absent', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    await mkdir(path.join(rootDir, 'models'), { recursive: true });
    await writeFile(path.join(rootDir, 'models', 'T8.json'), '{"targetId": "T8",', 'utf8');
    await writeFile(path.join(rootDir, 'models', 'T9.json'), JSON.stringify({ targetId: 'T9', status: 'done' }), 'utf8');

    expect(await store.loadModelArtifact('T8')).toBeNull();
    expect(await store.loadModelArtifact('T9')).toBeNull();
    expect(await store.listModelArtifacts()).toEqual([]);
    expect(warn).toHaveBeenCalled();
  });

  it('should ignore a slot whose record belongs to another id', async () => {
    await mkdir(path.join(rootDir, 'models'), { recursive: true });
    await writeFile(path.join(rootDir, 'models', 'T1.json'), JSON.stringify(successArtifact('T7')), 'utf8');

    expect(await store.loadModelArtifact('T1')).toBeNull();
  });

  it('should write provenance as CSV and JSON', async () => {
    const rows = [candidate('A', 'T1', 0.9), candidate('B', 'T1', 0.5, 3)];

    await store.saveProvenance(rows);

    expect(await store.loadProvenance()).toEqual(rows);
    const csv = await readFile(path.join(rootDir, 'provenance', 'chemical_target_mapping.csv'), 'utf8');
    expect(csv.split('\n')).toEqual([
      'chemical_id,target_id,similarity_score,source_rank,organism',
      'A,T1,0.9000,1,',
      'B,T1,0.5000,3,',
    ]);
  });

  it('should write screening tables and the report', async () => {
    const config = resolveConfig();
    const artifacts = [successArtifact('T1'), successArtifact('T2')];
    for (const artifact of artifacts) await store.saveModelArtifact(artifact);

    const scorer = new FakeScorer({ 'A::T1': { ok: true, score: 3 }, 'A::T2': { ok: true, score: 7 } });
    const screening = await runScreening([chemical('A')], artifacts, { config, scorer, store });

    const perChemical = await readFile(path.join(rootDir, 'screening', 'per_chemical', 'A.csv'), 'utf8');
    expect(perChemical.split('\n').slice(1).map((line) => line.split(',').slice(0, 4).join(','))).toEqual([
      'A,T2,success,7.0000',
      'A,T1,success,3.0000',
    ]);
    const statistics = JSON.parse(
      await readFile(path.join(rootDir, 'screening', 'screening_statistics.json'), 'utf8'),
    );
    expect(statistics.totalPairs).toBe(2);

    const report = aggregateResults(
      {
        chemicalIds: ['A'],
        targetIds: ['T1', 'T2'],
        candidates: [candidate('A', 'T1', 0.8)],
        artifacts,
        screeningResults: screening.results,
      },
      config,
    );
    await store.saveReport(report, 'report body');

    expect(await readFile(path.join(rootDir, 'report', 'FINAL_INTEGRATED_REPORT.txt'), 'utf8')).toBe('report body');
    const topHits = await readFile(path.join(rootDir, 'report', 'top_hits.csv'), 'utf8');
    expect(topHits.split('\n')[1]).toBe('1,A,T1,0.8000,3.0000,0.0000,0.4000,1,');
  });

  it('should list batch summaries in batch order', async () => {
    const summary = {
      batchNumber: 2,
      totalBatches: 2,
      total: 1,
      built: 1,
      reused: 0,
      success: 1,
      failure: 0,
      failuresByReason: { download_failed: 0, build_timeout: 0, build_error: 0, invalid_structure: 0 },
      failedTargetIds: [],
      elapsedMs: 10,
      startedAt: '2024-01-01T00:00:00.000Z',
      completedAt: '2024-01-01T00:00:00.010Z',
    };

    await store.saveBatchSummary(summary);
    await store.saveBatchSummary({ ...summary, batchNumber: 1 });

    expect((await store.listBatchSummaries()).map((s) => s.batchNumber)).toEqual([1, 2]);
  });
});
