import { describe, it, expect } from 'vitest';
import { partitionWorklist, runModelBatch, runModelBatches } from '../modelBatchDispatcher';
import { resolveConfig } from '../validations/config';
import { CollaboratorFailure, ConfigError, isAbortError } from '../errors';
import { MemoryResultStore } from '../storage/resultStore';
import type { ModelBuilder, ModelBuildOutput } from '../screening-types';
import { FakeBuilder } from './fakes';

describe('partitionWorklist', () => {
  const ids = ['T1', 'T2', 'T3', 'T4', 'T5', 'T6', 'T7'];

  it('should split sorted ids into balanced contiguous batches', () => {
    const batches = partitionWorklist(ids, 3);

    expect(batches).toEqual([
      { batchNumber: 1, targetIds: ['T1', 'T2', 'T3'] },
      { batchNumber: 2, targetIds: ['T4', 'T5'] },
      { batchNumber: 3, targetIds: ['T6', 'T7'] },
    ]);
  });

  it('should assign the same batches for shuffled and duplicated input', () => {
    const shuffled = ['T5', 'T1', 'T7', 'T3', 'T2', 'T6', 'T4', 'T1'];

    expect(partitionWorklist(shuffled, 3)).toEqual(partitionWorklist(ids, 3));
  });

  it('should accept unique targets as well as ids', () => {
    const worklist = [
      { targetId: 'T2', chemicalIds: ['A'] },
      { targetId: 'T1', chemicalIds: ['A', 'B'] },
    ];

    expect(partitionWorklist(worklist, 1)).toEqual([{ batchNumber: 1, targetIds: ['T1', 'T2'] }]);
  });

  it('should return empty trailing batches when there are more batches than targets', () => {
    const batches = partitionWorklist(['T1', 'T2'], 4);

    expect(batches.map((b) => b.targetIds)).toEqual([['T1'], ['T2'], [], []]);
  });

  it('should reject a non-positive batch count', () => {
    expect(() => partitionWorklist(ids, 0)).toThrow(ConfigError);
    expect(() => partitionWorklist(ids, 1.5)).toThrow(ConfigError);
  });
});

describe('runModelBatch', () => {
  const batch = { batchNumber: 1, targetIds: ['T1', 'T2', 'T3', 'T4'] };

  it('should classify every target outcome without failing the batch', async () => {
    const store = new MemoryResultStore();
    const builder = new FakeBuilder({
      T2: { ok: false, reason: 'download_failed', message: 'PDB entry not found' },
      T3: { throws: new Error('boom') },
      T4: { ok: true, artifactPaths: [] },
    });

    const result = await runModelBatch(batch, { config: resolveConfig({ modelConcurrency: 2 }), builder, store });

    expect(result.artifacts.map((a) => [a.targetId, a.status])).toEqual([
      ['T1', 'success'],
      ['T2', 'failure'],
      ['T3', 'failure'],
      ['T4', 'failure'],
    ]);
    expect(result.artifacts[2]).toMatchObject({ failureReason: 'build_error', failureMessage: 'boom' });
    expect(result.artifacts[3]).toMatchObject({
      failureReason: 'build_error',
      failureMessage: 'No model artifact produced',
    });
    expect(result.summary).toMatchObject({
      batchNumber: 1,
      total: 4,
      built: 4,
      reused: 0,
      success: 1,
      failure: 3,
      failuresByReason: { download_failed: 1, build_timeout: 0, build_error: 2, invalid_structure: 0 },
      failedTargetIds: ['T2', 'T3', 'T4'],
    });
    expect(await store.listModelArtifacts()).toEqual(result.artifacts);
    expect(await store.listBatchSummaries()).toEqual([result.summary]);
  });

  it('should keep the reason of a thrown collaborator failure', async () => {
    const builder = new FakeBuilder({ T1: { throws: new CollaboratorFailure('invalid_structure', 'no ligand chain') } });

    const result = await runModelBatch(
      { batchNumber: 1, targetIds: ['T1'] },
      { config: resolveConfig(), builder, store: new MemoryResultStore() },
    );

    expect(result.artifacts[0]).toMatchObject({
      status: 'failure',
      failureReason: 'invalid_structure',
      failureMessage: 'no ligand chain',
    });
  });

  it('should mark a target that exceeds its budget as build_timeout', async () => {
    const builder = new FakeBuilder({ T1: 'hang' });

    const result = await runModelBatch(
      { batchNumber: 1, targetIds: ['T1', 'T2'] },
      { config: resolveConfig({ modelTimeoutMs: 20 }), builder, store: new MemoryResultStore() },
    );

    expect(result.artifacts[0]).toMatchObject({
      targetId: 'T1',
      status: 'failure',
      failureReason: 'build_timeout',
      failureMessage: 'Collaborator exceeded 20ms budget',
    });
    expect(result.artifacts[1].status).toBe('success');
  });

  it('should not invoke the builder again for targets already built', async () => {
    const store = new MemoryResultStore();
    const config = resolveConfig();
    const first = await runModelBatch(batch, { config, builder: new FakeBuilder(), store });

    const builder = new FakeBuilder();
    const second = await runModelBatch(batch, { config, builder, store });

    expect(builder.calls).toEqual([]);
    expect(second.artifacts).toEqual(first.artifacts);
    expect(second.summary.reused).toBe(4);
    expect(second.summary.built).toBe(0);
  });

  it('should retry failed targets on rerun', async () => {
    const store = new MemoryResultStore();
    const config = resolveConfig();
    await runModelBatch(batch, { config, builder: new FakeBuilder({ T3: { throws: new Error('boom') } }), store });

    const builder = new FakeBuilder();
    const second = await runModelBatch(batch, { config, builder, store });

    expect(builder.calls).toEqual(['T3']);
    expect(second.summary.success).toBe(4);
  });

  it('should rebuild everything when forceRebuild is set', async () => {
    const store = new MemoryResultStore();
    await runModelBatch(batch, { config: resolveConfig(), builder: new FakeBuilder(), store });

    const builder = new FakeBuilder();
    await runModelBatch(batch, { config: resolveConfig({ forceRebuild: true }), builder, store });

    expect([...builder.calls].sort()).toEqual(['T1', 'T2', 'T3', 'T4']);
  });

  it('should stop on cancellation and keep artifacts saved before it', async () => {
    const store = new MemoryResultStore();
    const controller = new AbortController();
    const builder: ModelBuilder = {
      async build(targetId) {
        if (targetId === 'T2') {
          controller.abort();
          return new Promise<ModelBuildOutput>(() => undefined);
        }
        return { ok: true, artifactPaths: [`models/${targetId}.pml`] };
      },
    };

    const err = await runModelBatch(
      { batchNumber: 1, targetIds: ['T1', 'T2', 'T3'] },
      { config: resolveConfig({ modelConcurrency: 1 }), builder, store, signal: controller.signal },
    ).catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
    expect((await store.listModelArtifacts()).map((a) => a.targetId)).toEqual(['T1']);
    expect(await store.listBatchSummaries()).toEqual([]);

    const resumed = new FakeBuilder();
    const result = await runModelBatch(
      { batchNumber: 1, targetIds: ['T1', 'T2', 'T3'] },
      { config: resolveConfig({ modelConcurrency: 1 }), builder: resumed, store },
    );
    expect(resumed.calls).toEqual(['T2', 'T3']);
    expect(result.summary.reused).toBe(1);
  });

  it('should report progress per target', async () => {
    const updates: number[] = [];

    await runModelBatch(batch, {
      config: resolveConfig({ modelConcurrency: 1 }),
      builder: new FakeBuilder(),
      store: new MemoryResultStore(),
      onProgress: (percent) => updates.push(percent),
    });

    expect(updates).toEqual([25, 50, 75, 100]);
  });
});

describe('runModelBatches', () => {
  const worklist = ['T1', 'T2', 'T3', 'T4', 'T5'];

  it('should run only the selected batch slots', async () => {
    const builder = new FakeBuilder();

    const outcome = await runModelBatches(worklist, {
      config: resolveConfig({ batchCount: 2 }),
      builder,
      store: new MemoryResultStore(),
      batchNumbers: [2],
    });

    expect([...builder.calls].sort()).toEqual(['T4', 'T5']);
    expect(outcome.artifacts.map((a) => a.targetId)).toEqual(['T4', 'T5']);
    expect(outcome.summaries).toHaveLength(1);
    expect(outcome.summaries[0]).toMatchObject({ batchNumber: 2, totalBatches: 2, total: 2 });
  });

  it('should reject a batch number outside the partition', async () => {
    const builder = new FakeBuilder();

    const err = await runModelBatches(worklist, {
      config: resolveConfig({ batchCount: 2 }),
      builder,
      store: new MemoryResultStore(),
      batchNumbers: [1, 3],
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigError);
    expect(err instanceof ConfigError && err.issues).toEqual(['batchNumbers: must be between 1 and 2 (got 3)']);
    expect(builder.calls).toEqual([]);
  });

  it('should model every target once across all batches', async () => {
    const builder = new FakeBuilder();

    const outcome = await runModelBatches(worklist, {
      config: resolveConfig({ batchCount: 3 }),
      builder,
      store: new MemoryResultStore(),
    });

    expect([...builder.calls].sort()).toEqual(worklist);
    expect(outcome.artifacts.map((a) => a.batchNumber)).toEqual([1, 1, 2, 2, 3]);
    expect(outcome.summaries.map((s) => s.batchNumber)).toEqual([1, 2, 3]);
  });
});
