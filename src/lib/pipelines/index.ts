/**
 * Pipeline registry: single import point for pipeline definitions.
 */

import type { PipelineDefinition } from '@/lib/pipeline-types';
import { virtualScreeningPipeline } from './virtual-screening';

/** All available pipeline definitions, keyed by ID. */
export const pipelines: Record<string, PipelineDefinition> = {
  'virtual-screening': virtualScreeningPipeline,
};

/** Get a pipeline definition by ID. */
export function getPipeline(id: string): PipelineDefinition | undefined {
  return pipelines[id];
}

export { virtualScreeningPipeline, runVirtualScreening } from './virtual-screening';
export type {
  VirtualScreeningInput,
  VirtualScreeningOptions,
  VirtualScreeningResult,
} from './virtual-screening';
