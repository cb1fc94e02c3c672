/**
 * Supabase Result Store
 *
 * Keeps the pipeline tables in Postgres so a run can resume from another
 * machine. Every slot is upserted by its natural key.
 *
 * SQL Schema:
 * ```sql
 * CREATE TABLE screening_provenance (
 *   run_id TEXT NOT NULL,
 *   chemical_id TEXT NOT NULL,
 *   target_id TEXT NOT NULL,
 *   similarity_score DOUBLE PRECISION NOT NULL,
 *   source_rank INTEGER NOT NULL,
 *   organism TEXT,
 *   PRIMARY KEY (run_id, chemical_id, target_id)
 * );
 *
 * CREATE TABLE model_artifacts (
 *   run_id TEXT NOT NULL,
 *   target_id TEXT NOT NULL,
 *   status TEXT NOT NULL,
 *   record JSONB NOT NULL,
 *   PRIMARY KEY (run_id, target_id)
 * );
 *
 * CREATE TABLE batch_summaries (
 *   run_id TEXT NOT NULL,
 *   batch_number INTEGER NOT NULL,
 *   record JSONB NOT NULL,
 *   PRIMARY KEY (run_id, batch_number)
 * );
 *
 * CREATE TABLE screening_results (
 *   run_id TEXT NOT NULL,
 *   chemical_id TEXT NOT NULL,
 *   target_id TEXT NOT NULL,
 *   status TEXT NOT NULL,
 *   screening_score DOUBLE PRECISION,
 *   failure_reason TEXT,
 *   record JSONB NOT NULL,
 *   PRIMARY KEY (run_id, chemical_id, target_id)
 * );
 *
 * CREATE TABLE screening_reports (
 *   run_id TEXT PRIMARY KEY,
 *   screening_statistics JSONB,
 *   report JSONB,
 *   report_text TEXT,
 *   updated_at TIMESTAMPTZ DEFAULT NOW()
 * );
 * ```
 */

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { z } from 'zod';
import {
  batchSummarySchema,
  candidateTargetSchema,
  modelArtifactSchema,
  screeningResultSchema,
} from '../validations/records';
import { sortArtifacts, sortScreeningRows } from './resultStore';
import type { ResultStore } from './resultStore';
import type { CandidateTarget, ModelArtifact, ScreeningResult } from '../screening-types';
import type { BatchSummary } from '../modelBatchDispatcher';
import type { ScreeningOutcome } from '../screeningDispatcher';
import type { AggregationReport } from '../resultAggregator';

export const SUPABASE_TABLES = {
  provenance: 'screening_provenance',
  models: 'model_artifacts',
  batches: 'batch_summaries',
  screening: 'screening_results',
  reports: 'screening_reports',
} as const;

export interface SupabaseStoreOptions {
  url: string;
  key: string;
  /** Partitions every table; rows from other runs are never read */
  runId: string;
  /** Injected into the client, mainly for tests */
  fetch?: typeof fetch;
}

type Env = Record<string, string | undefined>;

/**
 * Check if Supabase is configured
 */
export function isSupabaseConfigured(env: Env = process.env): boolean {
  return !!(env.SUPABASE_URL && env.SUPABASE_ANON_KEY);
}

/**
 * Build a store from SUPABASE_URL / SUPABASE_ANON_KEY, or null when unset.
 */
export function createSupabaseResultStore(runId: string, env: Env = process.env): SupabaseResultStore | null {
  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_ANON_KEY;
  if (!url || !key) {
    console.warn('[Supabase] Not configured. Results will not persist remotely.');
    return null;
  }
  return new SupabaseResultStore({ url, key, runId });
}

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

function storeError(action: string, error: PostgrestErrorLike): Error {
  console.error(`[Supabase] Error ${action}:`, error);
  return new Error(`Supabase ${action} failed: ${error.message}`, { cause: error });
}

/** Validate JSON records read back from a table; invalid ones are dropped. */
function parseRecords<T>(rows: unknown[] | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>, table: string): T[] {
  const records: T[] = [];
  for (const row of rows ?? []) {
    const record = typeof row === 'object' && row !== null && 'record' in row ? row.record : row;
    const parsed = schema.safeParse(record);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      console.warn(`[Supabase] Ignoring invalid ${table} row: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
  }
  return records;
}

export class SupabaseResultStore implements ResultStore {
  private readonly client: SupabaseClient;
  readonly runId: string;

  constructor(options: SupabaseStoreOptions) {
    this.runId = options.runId;
    this.client = createClient(options.url, options.key, {
      auth: { persistSession: false, autoRefreshToken: false },
      ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
    });
  }

  // ---- Provenance ----

  async saveProvenance(rows: CandidateTarget[]): Promise<void> {
    if (rows.length === 0) return;
    const { error } = await this.client.from(SUPABASE_TABLES.provenance).upsert(
      rows.map((row) => ({
        run_id: this.runId,
        chemical_id: row.chemicalId,
        target_id: row.targetId,
        similarity_score: row.similarityScore,
        source_rank: row.sourceRank,
        organism: row.organism ?? null,
      })),
      { onConflict: 'run_id,chemical_id,target_id' },
    );
    if (error) throw storeError('saving provenance', error);
  }

  async loadProvenance(): Promise<CandidateTarget[]> {
    const { data, error } = await this.client
      .from(SUPABASE_TABLES.provenance)
      .select('chemical_id, target_id, similarity_score, source_rank, organism')
      .eq('run_id', this.runId);
    if (error) throw storeError('loading provenance', error);

    const rows: unknown[] = (data ?? []).map((row) => ({
      chemicalId: row.chemical_id,
      targetId: row.target_id,
      similarityScore: row.similarity_score,
      sourceRank: row.source_rank,
      organism: row.organism ?? undefined,
    }));
    return parseRecords(rows, candidateTargetSchema, SUPABASE_TABLES.provenance);
  }

  // ---- Models ----

  async loadModelArtifact(targetId: string): Promise<ModelArtifact | null> {
    const { data, error } = await this.client
      .from(SUPABASE_TABLES.models)
      .select('record')
      .eq('run_id', this.runId)
      .eq('target_id', targetId)
      .limit(1);
    if (error) throw storeError('loading model artifact', error);
    return parseRecords(data, modelArtifactSchema, SUPABASE_TABLES.models)[0] ?? null;
  }

  async saveModelArtifact(artifact: ModelArtifact): Promise<void> {
    const { error } = await this.client.from(SUPABASE_TABLES.models).upsert(
      { run_id: this.runId, target_id: artifact.targetId, status: artifact.status, record: artifact },
      { onConflict: 'run_id,target_id' },
    );
    if (error) throw storeError('saving model artifact', error);
  }

  async listModelArtifacts(): Promise<ModelArtifact[]> {
    const { data, error } = await this.client.from(SUPABASE_TABLES.models).select('record').eq('run_id', this.runId);
    if (error) throw storeError('listing model artifacts', error);
    return sortArtifacts(parseRecords(data, modelArtifactSchema, SUPABASE_TABLES.models));
  }

  async saveBatchSummary(summary: BatchSummary): Promise<void> {
    const { error } = await this.client.from(SUPABASE_TABLES.batches).upsert(
      { run_id: this.runId, batch_number: summary.batchNumber, record: summary },
      { onConflict: 'run_id,batch_number' },
    );
    if (error) throw storeError('saving batch summary', error);
  }

  async listBatchSummaries(): Promise<BatchSummary[]> {
    const { data, error } = await this.client
      .from(SUPABASE_TABLES.batches)
      .select('record')
      .eq('run_id', this.runId)
      .order('batch_number', { ascending: true });
    if (error) throw storeError('listing batch summaries', error);
    return parseRecords(data, batchSummarySchema, SUPABASE_TABLES.batches);
  }

  // ---- Screening ----

  async loadScreeningResult(chemicalId: string, targetId: string): Promise<ScreeningResult | null> {
    const { data, error } = await this.client
      .from(SUPABASE_TABLES.screening)
      .select('record')
      .eq('run_id', this.runId)
      .eq('chemical_id', chemicalId)
      .eq('target_id', targetId)
      .limit(1);
    if (error) throw storeError('loading screening result', error);
    return parseRecords(data, screeningResultSchema, SUPABASE_TABLES.screening)[0] ?? null;
  }

  async saveScreeningResult(result: ScreeningResult): Promise<void> {
    const { error } = await this.client.from(SUPABASE_TABLES.screening).upsert(
      {
        run_id: this.runId,
        chemical_id: result.chemicalId,
        target_id: result.targetId,
        status: result.status,
        screening_score: result.screeningScore,
        failure_reason: result.failureReason,
        record: result,
      },
      { onConflict: 'run_id,chemical_id,target_id' },
    );
    if (error) throw storeError('saving screening result', error);
  }

  async listScreeningResults(): Promise<ScreeningResult[]> {
    const { data, error } = await this.client.from(SUPABASE_TABLES.screening).select('record').eq('run_id', this.runId);
    if (error) throw storeError('listing screening results', error);
    return sortScreeningRows(parseRecords(data, screeningResultSchema, SUPABASE_TABLES.screening));
  }

  /** Per-pair rows are already in `screening_results`; only the statistics are added. */
  async saveScreeningTables(outcome: ScreeningOutcome): Promise<void> {
    const { error } = await this.client.from(SUPABASE_TABLES.reports).upsert(
      { run_id: this.runId, screening_statistics: outcome.statistics, updated_at: new Date().toISOString() },
      { onConflict: 'run_id' },
    );
    if (error) throw storeError('saving screening statistics', error);
  }

  async saveReport(report: AggregationReport, text: string): Promise<void> {
    const { error } = await this.client.from(SUPABASE_TABLES.reports).upsert(
      { run_id: this.runId, report, report_text: text, updated_at: new Date().toISOString() },
      { onConflict: 'run_id' },
    );
    if (error) throw storeError('saving report', error);
    console.log(`[Supabase] Saved report for run ${this.runId}`);
  }
}
