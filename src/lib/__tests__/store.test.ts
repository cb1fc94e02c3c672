import { describe, it, expect, beforeEach } from 'vitest';
import { createPipelineStore } from '../store';
import type { PipelineStore } from '../store';
import type { PipelineDefinition } from '../pipeline-types';

const definition: PipelineDefinition = {
  id: 'two-step',
  name: 'Two Step',
  description: 'Extraction then modeling',
  stages: [
    { id: 'extract', name: 'Extract', description: 'Build the worklist' },
    { id: 'modeling', name: 'Model', description: 'Build the models' },
  ],
};

describe('createPipelineStore', () => {
  let store: PipelineStore;

  beforeEach(() => {
    store = createPipelineStore();
    store.getState().init(definition, 'session-1');
  });

  it('should start with every stage pending', () => {
    const state = store.getState();

    expect(state.pipelineId).toBe('two-step');
    expect(state.sessionId).toBe('session-1');
    expect(state.status).toBe('idle');
    expect(state.stages.map((s) => [s.stageId, s.status, s.progress])).toEqual([
      ['extract', 'pending', 0],
      ['modeling', 'pending', 0],
    ]);
  });

  it('should derive a session id from the pipeline id when none is given', () => {
    store.getState().init(definition);

    expect(store.getState().sessionId).toMatch(/^two-step-\d+$/);
  });

  it('should track the active stage and clamp progress', () => {
    store.getState().stageStart('modeling');
    store.getState().stageProgress('modeling', 150, 'almost');

    const state = store.getState();
    expect(state.status).toBe('running');
    expect(state.activeStageIndex).toBe(1);
    expect(state.getStage('modeling')).toMatchObject({ status: 'running', progress: 100, progressMessage: 'almost' });

    store.getState().stageProgress('modeling', -5);
    expect(store.getState().getStage('modeling')?.progress).toBe(0);
  });

  it('should complete the run once every stage is completed or skipped', () => {
    store.getState().stageSkip('extract', 'worklist supplied');
    expect(store.getState().status).toBe('idle');

    store.getState().stageStart('modeling');
    store.getState().stageComplete('modeling', '3/3 models available');

    const state = store.getState();
    expect(state.status).toBe('completed');
    expect(state.completedAt).toBeTypeOf('number');
    expect(state.getStage('modeling')).toMatchObject({ status: 'completed', progress: 100, summary: '3/3 models available' });
  });

  it('should record a stage failure on the run', () => {
    store.getState().stageStart('extract');
    store.getState().stageFail('extract', 'Stage "extract" failed: boom');

    expect(store.getState().status).toBe('failed');
    expect(store.getState().getStage('extract')?.error).toBe('Stage "extract" failed: boom');
  });

  it('should cancel only the running stage', () => {
    store.getState().stageStart('extract');
    store.getState().stageComplete('extract', 'done');
    store.getState().stageStart('modeling');
    store.getState().cancel();

    const state = store.getState();
    expect(state.status).toBe('cancelled');
    expect(state.stages.map((s) => s.status)).toEqual(['completed', 'cancelled']);
  });

  it('should clear everything on reset', () => {
    store.getState().stageStart('extract');
    store.getState().reset();

    expect(store.getState()).toMatchObject({ pipelineId: '', sessionId: '', status: 'idle', stages: [] });
  });
});
