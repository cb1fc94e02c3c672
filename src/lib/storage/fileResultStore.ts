/**
 * Filesystem Result Store
 *
 * Layout under the root directory:
 *
 * ```
 * provenance/chemical_target_mapping.csv   provenance/candidates.json
 * models/<target>.json                     one slot per target
 * batches/batch_<n>.json
 * screening/pairs/<chemical>/<target>.json one slot per pair
 * screening/master_screening_results.csv
 * screening/per_chemical/<chemical>.csv    screening/per_target/<target>.csv
 * screening/screening_statistics.json
 * report/integrated_summary.csv            report/top_hits.csv
 * report/incomplete_pairs.csv              report/FINAL_INTEGRATED_REPORT.txt
 * ```
 *
 * The slot files are a cache: an unreadable or invalid slot is logged and
 * treated as absent, so the unit is simply redone.
 */

import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';
import {
  batchSummarySchema,
  candidateTargetSchema,
  modelArtifactSchema,
  screeningResultSchema,
} from '../validations/records';
import {
  exportCombinedCSV,
  exportIncompleteCSV,
  exportProvenanceCSV,
  exportScreeningCSV,
  exportScreeningStatistics,
  exportToJSON,
} from '../reportExport';
import { errorMessage } from '../errors';
import { sortArtifacts, sortScreeningRows } from './resultStore';
import type { ResultStore } from './resultStore';
import type { CandidateTarget, ModelArtifact, ScreeningResult } from '../screening-types';
import type { BatchSummary } from '../modelBatchDispatcher';
import type { ScreeningOutcome } from '../screeningDispatcher';
import type { AggregationReport } from '../resultAggregator';

/**
 * Encode an identifier as a single path segment.
 *
 * Examples:
 * - "1ABC" -> 1ABC
 * - "beta-carotene" -> beta-carotene
 * - "a/b" -> a%2Fb
 * - ".." -> %2E%2E
 */
export function slotName(id: string): string {
  return encodeURIComponent(id).replace(/\./g, '%2E');
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

let tmpCounter = 0;

/** Write via a sibling temp file so readers never see a half-written slot. */
async function writeFileAtomic(file: string, content: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.${++tmpCounter}.tmp`;
  await writeFile(tmp, content, 'utf8');
  await rename(tmp, file);
}

export class FileResultStore implements ResultStore {
  constructor(readonly rootDir: string) {}

  private file(...segments: string[]): string {
    return path.join(this.rootDir, ...segments);
  }

  private async readSlot<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      console.warn(`[FileStore] Ignoring unreadable slot ${file}: ${errorMessage(err)}`);
      return null;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[FileStore] Ignoring invalid slot ${file}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
      return null;
    }
    return parsed.data;
  }

  private async listDir(dir: string): Promise<string[]> {
    try {
      return (await readdir(dir)).sort();
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }

  private async readSlots<T>(dir: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Awaited<T>[]> {
    const names = (await this.listDir(dir)).filter((name) => name.endsWith('.json'));
    const slots = await Promise.all(names.map((name) => this.readSlot(path.join(dir, name), schema)));
    return slots.filter((slot): slot is Awaited<T> => slot !== null);
  }

  // ---- Provenance ----

  async saveProvenance(rows: CandidateTarget[]): Promise<void> {
    await writeFileAtomic(this.file('provenance', 'chemical_target_mapping.csv'), exportProvenanceCSV(rows));
    await writeFileAtomic(this.file('provenance', 'candidates.json'), exportToJSON(rows));
  }

  async loadProvenance(): Promise<CandidateTarget[]> {
    const rows = await this.readSlot(this.file('provenance', 'candidates.json'), candidateTargetSchema.array());
    return rows ?? [];
  }

  // ---- Models ----

  async loadModelArtifact(targetId: string): Promise<ModelArtifact | null> {
    const artifact = await this.readSlot(this.file('models', `${slotName(targetId)}.json`), modelArtifactSchema);
    return artifact?.targetId === targetId ? artifact : null;
  }

  async saveModelArtifact(artifact: ModelArtifact): Promise<void> {
    await writeFileAtomic(this.file('models', `${slotName(artifact.targetId)}.json`), exportToJSON(artifact));
  }

  async listModelArtifacts(): Promise<ModelArtifact[]> {
    return sortArtifacts(await this.readSlots(this.file('models'), modelArtifactSchema));
  }

  async saveBatchSummary(summary: BatchSummary): Promise<void> {
    await writeFileAtomic(this.file('batches', `batch_${summary.batchNumber}.json`), exportToJSON(summary));
  }

  async listBatchSummaries(): Promise<BatchSummary[]> {
    const summaries = await this.readSlots(this.file('batches'), batchSummarySchema);
    return summaries.sort((a, b) => a.batchNumber - b.batchNumber);
  }

  // ---- Screening ----

  private pairFile(chemicalId: string, targetId: string): string {
    return this.file('screening', 'pairs', slotName(chemicalId), `${slotName(targetId)}.json`);
  }

  async loadScreeningResult(chemicalId: string, targetId: string): Promise<ScreeningResult | null> {
    const row = await this.readSlot(this.pairFile(chemicalId, targetId), screeningResultSchema);
    return row?.chemicalId === chemicalId && row.targetId === targetId ? row : null;
  }

  async saveScreeningResult(result: ScreeningResult): Promise<void> {
    await writeFileAtomic(this.pairFile(result.chemicalId, result.targetId), exportToJSON(result));
  }

  async listScreeningResults(): Promise<ScreeningResult[]> {
    const pairsDir = this.file('screening', 'pairs');
    const chemicalDirs = await this.listDir(pairsDir);
    const rows = await Promise.all(
      chemicalDirs.map((dir) => this.readSlots(path.join(pairsDir, dir), screeningResultSchema)),
    );
    return sortScreeningRows(rows.flat());
  }

  async saveScreeningTables(outcome: ScreeningOutcome): Promise<void> {
    const { views, statistics } = outcome;
    await writeFileAtomic(this.file('screening', 'master_screening_results.csv'), exportScreeningCSV(views.master));

    for (const [chemicalId, rows] of views.byChemical) {
      await writeFileAtomic(this.file('screening', 'per_chemical', `${slotName(chemicalId)}.csv`), exportScreeningCSV(rows));
    }
    for (const [targetId, rows] of views.byTarget) {
      await writeFileAtomic(this.file('screening', 'per_target', `${slotName(targetId)}.csv`), exportScreeningCSV(rows));
    }

    await writeFileAtomic(this.file('screening', 'screening_statistics.json'), exportScreeningStatistics(statistics));
    console.log(
      `[FileStore] Wrote screening tables (${views.master.length} rows, ` +
        `${views.byChemical.size} chemicals, ${views.byTarget.size} targets)`,
    );
  }

  // ---- Report ----

  async saveReport(report: AggregationReport, text: string): Promise<void> {
    await writeFileAtomic(this.file('report', 'integrated_summary.csv'), exportCombinedCSV(report.ranked));
    await writeFileAtomic(this.file('report', 'top_hits.csv'), exportCombinedCSV(report.topHits));
    await writeFileAtomic(this.file('report', 'incomplete_pairs.csv'), exportIncompleteCSV(report.incomplete));
    await writeFileAtomic(this.file('report', 'FINAL_INTEGRATED_REPORT.txt'), text);
    console.log(`[FileStore] Wrote report to ${this.file('report')}`);
  }
}
