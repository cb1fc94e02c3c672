/**
 * Persisted pipeline state.
 *
 * Every task owns exactly one slot (a model artifact per target, a screening
 * row per chemical x target pair), so writes from concurrent lanes never
 * touch the same record. The tables are derived views written once per stage.
 */

import { pairKey } from '../screening-types';
import type { CandidateTarget, ModelArtifact, ScreeningResult } from '../screening-types';
import type { BatchSummary } from '../modelBatchDispatcher';
import type { ScreeningOutcome } from '../screeningDispatcher';
import type { AggregationReport } from '../resultAggregator';

export interface ResultStore {
  /** Chemical -> target mapping table (the kept candidate rows) */
  saveProvenance(rows: CandidateTarget[]): Promise<void>;
  loadProvenance(): Promise<CandidateTarget[]>;

  loadModelArtifact(targetId: string): Promise<ModelArtifact | null>;
  saveModelArtifact(artifact: ModelArtifact): Promise<void>;
  /** Sorted by targetId */
  listModelArtifacts(): Promise<ModelArtifact[]>;

  saveBatchSummary(summary: BatchSummary): Promise<void>;
  /** Sorted by batch number */
  listBatchSummaries(): Promise<BatchSummary[]>;

  loadScreeningResult(chemicalId: string, targetId: string): Promise<ScreeningResult | null>;
  saveScreeningResult(result: ScreeningResult): Promise<void>;
  /** Sorted by chemicalId, then targetId */
  listScreeningResults(): Promise<ScreeningResult[]>;

  /** Master, per-chemical and per-target tables plus statistics */
  saveScreeningTables(outcome: ScreeningOutcome): Promise<void>;

  saveReport(report: AggregationReport, text: string): Promise<void>;
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function sortArtifacts(artifacts: ModelArtifact[]): ModelArtifact[] {
  return [...artifacts].sort((a, b) => compareIds(a.targetId, b.targetId));
}

export function sortScreeningRows(rows: ScreeningResult[]): ScreeningResult[] {
  return [...rows].sort(
    (a, b) => compareIds(a.chemicalId, b.chemicalId) || compareIds(a.targetId, b.targetId),
  );
}

/** In-process store; the default for tests and single-shot runs. */
export class MemoryResultStore implements ResultStore {
  private provenance: CandidateTarget[] = [];
  private readonly artifacts = new Map<string, ModelArtifact>();
  private readonly batches = new Map<number, BatchSummary>();
  private readonly screening = new Map<string, ScreeningResult>();

  screeningTables: ScreeningOutcome | null = null;
  report: { report: AggregationReport; text: string } | null = null;

  async saveProvenance(rows: CandidateTarget[]): Promise<void> {
    this.provenance = rows.map((row) => ({ ...row }));
  }

  async loadProvenance(): Promise<CandidateTarget[]> {
    return this.provenance.map((row) => ({ ...row }));
  }

  async loadModelArtifact(targetId: string): Promise<ModelArtifact | null> {
    return this.artifacts.get(targetId) ?? null;
  }

  async saveModelArtifact(artifact: ModelArtifact): Promise<void> {
    this.artifacts.set(artifact.targetId, artifact);
  }

  async listModelArtifacts(): Promise<ModelArtifact[]> {
    return sortArtifacts([...this.artifacts.values()]);
  }

  async saveBatchSummary(summary: BatchSummary): Promise<void> {
    this.batches.set(summary.batchNumber, summary);
  }

  async listBatchSummaries(): Promise<BatchSummary[]> {
    return [...this.batches.values()].sort((a, b) => a.batchNumber - b.batchNumber);
  }

  async loadScreeningResult(chemicalId: string, targetId: string): Promise<ScreeningResult | null> {
    return this.screening.get(pairKey(chemicalId, targetId)) ?? null;
  }

  async saveScreeningResult(result: ScreeningResult): Promise<void> {
    this.screening.set(pairKey(result.chemicalId, result.targetId), result);
  }

  async listScreeningResults(): Promise<ScreeningResult[]> {
    return sortScreeningRows([...this.screening.values()]);
  }

  async saveScreeningTables(outcome: ScreeningOutcome): Promise<void> {
    this.screeningTables = outcome;
  }

  async saveReport(report: AggregationReport, text: string): Promise<void> {
    this.report = { report, text };
  }
}
