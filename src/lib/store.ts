/**
 * Zustand store for pipeline run state.
 *
 * One store per run. Stage transitions mirror the runner: start, progress,
 * complete / skip / fail, and a run-level cancel. Subscribers (loggers, a
 * status endpoint) read snapshots without touching the runner.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { PipelineStage } from './errors';
import type {
  PipelineDefinition,
  PipelineRuntimeState,
  StageRuntimeState,
} from './pipeline-types';

export interface PipelineStoreState extends PipelineRuntimeState {
  init: (definition: PipelineDefinition, sessionId?: string) => void;
  stageStart: (stageId: PipelineStage) => void;
  stageProgress: (stageId: PipelineStage, progress: number, message?: string) => void;
  stageComplete: (stageId: PipelineStage, summary: string) => void;
  stageSkip: (stageId: PipelineStage, reason: string) => void;
  stageFail: (stageId: PipelineStage, error: string) => void;
  cancel: () => void;
  reset: () => void;
  getStage: (stageId: PipelineStage) => StageRuntimeState | undefined;
}

export type PipelineStore = StoreApi<PipelineStoreState>;

const INITIAL_STATE: PipelineRuntimeState = {
  pipelineId: '',
  sessionId: '',
  status: 'idle',
  activeStageIndex: 0,
  stages: [],
};

const isDone = (stage: StageRuntimeState) => stage.status === 'completed' || stage.status === 'skipped';

export function createPipelineStore(): PipelineStore {
  return createStore<PipelineStoreState>()((set, get) => {
    const updateStage = (stageId: PipelineStage, patch: (stage: StageRuntimeState) => StageRuntimeState) =>
      get().stages.map((stage) => (stage.stageId === stageId ? patch(stage) : stage));

    const indexOf = (stageId: PipelineStage) => get().stages.findIndex((stage) => stage.stageId === stageId);

    return {
      ...INITIAL_STATE,

      init: (definition, sessionId) =>
        set({
          pipelineId: definition.id,
          sessionId: sessionId ?? `${definition.id}-${Date.now()}`,
          status: 'idle',
          activeStageIndex: 0,
          stages: definition.stages.map((stage): StageRuntimeState => ({ stageId: stage.id, status: 'pending', progress: 0 })),
          startedAt: Date.now(),
          completedAt: undefined,
        }),

      stageStart: (stageId) =>
        set({
          status: 'running',
          activeStageIndex: indexOf(stageId),
          stages: updateStage(stageId, (stage) => ({
            ...stage,
            status: 'running',
            progress: 0,
            progressMessage: undefined,
            error: undefined,
            startedAt: Date.now(),
          })),
        }),

      stageProgress: (stageId, progress, message) =>
        set({
          stages: updateStage(stageId, (stage) => ({
            ...stage,
            progress: Math.max(0, Math.min(100, progress)),
            progressMessage: message,
          })),
        }),

      stageComplete: (stageId, summary) => {
        const stages = updateStage(stageId, (stage) => ({
          ...stage,
          status: 'completed',
          progress: 100,
          summary,
          completedAt: Date.now(),
        }));
        const allDone = stages.every(isDone);
        set({ stages, status: allDone ? 'completed' : 'running', completedAt: allDone ? Date.now() : undefined });
      },

      stageSkip: (stageId, reason) => {
        const stages = updateStage(stageId, (stage) => ({
          ...stage,
          status: 'skipped',
          summary: reason,
          completedAt: Date.now(),
        }));
        const allDone = stages.every(isDone);
        set({ stages, status: allDone ? 'completed' : get().status, completedAt: allDone ? Date.now() : undefined });
      },

      stageFail: (stageId, error) =>
        set({
          status: 'failed',
          completedAt: Date.now(),
          stages: updateStage(stageId, (stage) => ({ ...stage, status: 'failed', error, completedAt: Date.now() })),
        }),

      cancel: () =>
        set({
          status: 'cancelled',
          completedAt: Date.now(),
          stages: get().stages.map((stage): StageRuntimeState =>
            stage.status === 'running' ? { ...stage, status: 'cancelled', completedAt: Date.now() } : stage,
          ),
        }),

      reset: () => set({ ...INITIAL_STATE, startedAt: undefined, completedAt: undefined }),

      getStage: (stageId) => get().stages.find((stage) => stage.stageId === stageId),
    };
  });
}
