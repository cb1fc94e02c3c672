import type { PipelineStage } from './errors';
import type { ScreeningConfig } from './validations/config';

// ---- Stage Status ----

export type StageStatus =
  | 'pending'     // Not yet started
  | 'running'     // Currently executing
  | 'completed'   // Done
  | 'failed'      // Error occurred
  | 'skipped'     // Inputs supplied by the caller
  | 'cancelled';  // Aborted while running

// ---- Stage Execution ----

/** Context passed into every stage body */
export interface StageExecutionContext {
  config: ScreeningConfig;
  /** Signal for cancellation */
  abortSignal: AbortSignal;
  /** Callback for granular progress within a stage (0-100) */
  onProgress: (percent: number, message?: string) => void;
}

// ---- Stage Definition ----

/** Static description of a single pipeline stage */
export interface PipelineStageDefinition {
  id: PipelineStage;
  /** Display name */
  name: string;
  description: string;
}

/** Complete static definition of a pipeline */
export interface PipelineDefinition {
  id: string;
  name: string;
  description: string;
  /** Ordered array of stages */
  stages: PipelineStageDefinition[];
}

// ---- Runtime State ----

/** Runtime state for one stage */
export interface StageRuntimeState {
  stageId: PipelineStage;
  status: StageStatus;
  /** Progress within the stage (0-100) */
  progress: number;
  /** Current sub-status message */
  progressMessage?: string;
  /** One-line outcome once completed */
  summary?: string;
  /** Error message if failed */
  error?: string;
  startedAt?: number;
  completedAt?: number;
}

/** Overall pipeline status */
export type PipelineStatus = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

/** Full runtime state of a pipeline execution */
export interface PipelineRuntimeState {
  pipelineId: string;
  /** Unique execution session ID */
  sessionId: string;
  status: PipelineStatus;
  /** Index of the currently active stage */
  activeStageIndex: number;
  stages: StageRuntimeState[];
  startedAt?: number;
  completedAt?: number;
}
