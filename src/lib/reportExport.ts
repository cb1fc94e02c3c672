/**
 * Report Export Utilities
 *
 * Renders the pipeline tables as CSV and the final integrated report as
 * plain text:
 * - provenance (chemical -> target mapping)
 * - screening rows (master / per-chemical / per-target)
 * - combined ranking and top hits
 * - statistics as JSON
 */

import type { CandidateTarget, CombinedHit, IncompletePair, ScreeningResult } from './screening-types';
import type { AggregationReport } from './resultAggregator';
import type { ScreeningStatistics } from './screeningDispatcher';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

/**
 * Quote a CSV field when it contains a delimiter, quote or newline.
 *
 * Examples:
 * - "caffeine" -> caffeine
 * - "Homo sapiens, liver" -> "Homo sapiens, liver"
 * - 'say "hi"' -> "say ""hi"""
 */
export function csvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function toCSV(headers: string[], rows: Array<Array<string | number | null | undefined>>): string {
  const lines: string[] = [headers.join(',')];
  for (const row of rows) {
    lines.push(row.map(csvField).join(','));
  }
  return lines.join('\n');
}

const score = (value: number | null): string => (value === null ? '' : value.toFixed(4));

export function exportToJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Chemical -> target mapping table
 *
 * Headers: chemical_id,target_id,similarity_score,source_rank,organism
 */
export function exportProvenanceCSV(rows: CandidateTarget[]): string {
  return toCSV(
    ['chemical_id', 'target_id', 'similarity_score', 'source_rank', 'organism'],
    rows.map((row) => [row.chemicalId, row.targetId, score(row.similarityScore), row.sourceRank, row.organism]),
  );
}

/**
 * Screening rows, in the order given
 *
 * Headers: chemical_id,target_id,status,screening_score,failure_reason,failure_message,elapsed_ms
 */
export function exportScreeningCSV(rows: ScreeningResult[]): string {
  return toCSV(
    ['chemical_id', 'target_id', 'status', 'screening_score', 'failure_reason', 'failure_message', 'elapsed_ms'],
    rows.map((row) => [
      row.chemicalId,
      row.targetId,
      row.status,
      score(row.screeningScore),
      row.failureReason,
      row.failureMessage,
      row.elapsedMs,
    ]),
  );
}

/**
 * Combined ranking (integrated summary and top hits)
 *
 * Headers: combined_rank,chemical_id,target_id,similarity_score,screening_score,
 * normalized_screening_score,combined_score,source_rank,organism
 */
export function exportCombinedCSV(hits: CombinedHit[]): string {
  return toCSV(
    [
      'combined_rank',
      'chemical_id',
      'target_id',
      'similarity_score',
      'screening_score',
      'normalized_screening_score',
      'combined_score',
      'source_rank',
      'organism',
    ],
    hits.map((hit) => [
      hit.combinedRank,
      hit.chemicalId,
      hit.targetId,
      score(hit.similarityScore),
      score(hit.screeningScore),
      score(hit.normalizedScreeningScore),
      score(hit.combinedScore),
      hit.sourceRank,
      hit.organism,
    ]),
  );
}

/**
 * Candidate pairs that produced no combined hit
 *
 * Headers: chemical_id,target_id,similarity_score,stage,reason
 */
export function exportIncompleteCSV(pairs: IncompletePair[]): string {
  return toCSV(
    ['chemical_id', 'target_id', 'similarity_score', 'stage', 'reason'],
    pairs.map((pair) => [pair.chemicalId, pair.targetId, score(pair.similarityScore), pair.stage, pair.reason]),
  );
}

/** Screening statistics in the shape written to screening_statistics.json */
export function exportScreeningStatistics(statistics: ScreeningStatistics): string {
  return exportToJSON(statistics);
}

export function formatHitLine(hit: CombinedHit): string {
  return (
    `#${hit.combinedRank} ${hit.chemicalId} -> ${hit.targetId}  ` +
    `similarity=${hit.similarityScore.toFixed(4)}  ` +
    `screening=${hit.screeningScore.toFixed(4)}  ` +
    `combined=${hit.combinedScore.toFixed(4)}`
  );
}

export interface TextReportOptions {
  /** Defaults to now */
  generatedAt?: Date;
}

/**
 * Final integrated report: overview, coverage, top hits, then every chemical
 * with its ranked targets and the pairs that dropped out.
 */
export function renderTextReport(report: AggregationReport, options: TextReportOptions = {}): string {
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  const { statistics, weights } = report;

  const lines: string[] = [
    RULE,
    'INTEGRATED VIRTUAL SCREENING REPORT',
    RULE,
    `Generated: ${generatedAt}`,
    '',
    'PIPELINE OVERVIEW',
    THIN_RULE,
    '1. Similarity search: candidate targets per chemical',
    '2. Target extraction: unique target worklist with provenance',
    '3. Pharmacophore modeling: one model per unique target',
    '4. Reverse screening: every chemical against every model',
    '5. Integration: similarity and normalized screening score combined',
    `Weights: similarity=${weights.similarity.toFixed(2)}, screening=${weights.screening.toFixed(2)}`,
    '',
    'COVERAGE',
    THIN_RULE,
    `Chemicals: ${statistics.totalChemicals}`,
    `Candidate pairs: ${statistics.candidatePairs}`,
    `Modeled targets: ${statistics.modeledTargets} (${statistics.failedTargets} failed)`,
    `Screening rows: ${statistics.screeningRows} (${statistics.screeningSuccess} successful)`,
    `Combined hits: ${statistics.combinedHits}`,
    `Incomplete pairs: ${statistics.incompletePairs}`,
    '',
    `TOP ${report.topHits.length} HITS`,
    THIN_RULE,
  ];

  if (report.topHits.length === 0) {
    lines.push('(no combined hits)');
  }
  for (const hit of report.topHits) {
    lines.push(formatHitLine(hit));
  }

  lines.push('', 'PER-CHEMICAL RESULTS', THIN_RULE);

  for (const summary of report.chemicalSummaries) {
    const best = summary.bestHit ? `${summary.bestHit.targetId} (#${summary.bestHit.combinedRank})` : 'none';
    lines.push(`${summary.chemicalId}: ${summary.hitCount} hits, ${summary.incompleteCount} incomplete, best=${best}`);

    for (const hit of report.ranked) {
      if (hit.chemicalId === summary.chemicalId) {
        lines.push(`  ${formatHitLine(hit)}`);
      }
    }
    for (const pair of report.incomplete) {
      if (pair.chemicalId === summary.chemicalId) {
        lines.push(`  - ${pair.targetId}: ${pair.stage} ${pair.reason}`);
      }
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}
