/**
 * Target Extraction
 *
 * Selects the top-N similarity hits per chemical and collapses them into the
 * unique target worklist, keeping both directions of the chemical <-> target
 * relation as flat id-keyed maps.
 */

import { ConfigError, MalformedInputError } from './errors';
import { isTopN, TOP_N_OPTIONS } from './validations/config';
import type { ScreeningConfig } from './validations/config';
import type {
  CandidateList,
  CandidateTarget,
  ProvenanceEntry,
  UniqueTarget,
} from './screening-types';

export interface ExtractionStatistics {
  totalChemicals: number;
  excludedChemicals: number;
  totalEntries: number;
  uniqueTargets: number;
  meanScore: number;
  minScore: number;
  maxScore: number;
}

export interface TargetExtraction {
  /** Sorted by targetId */
  worklist: UniqueTarget[];
  /** target -> owning chemicals, similarity desc then chemicalId asc */
  provenance: Map<string, ProvenanceEntry[]>;
  /** chemical -> selected targets in rank order */
  chemicalTargets: Map<string, string[]>;
  /** Kept candidate rows, chemicalId asc then rank */
  selected: CandidateTarget[];
  excludedChemicals: string[];
  issues: MalformedInputError[];
  statistics: ExtractionStatistics;
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Similarity desc, ties broken by target id asc */
export function compareCandidates(a: CandidateTarget, b: CandidateTarget): number {
  if (a.similarityScore !== b.similarityScore) {
    return b.similarityScore - a.similarityScore;
  }
  return compareIds(a.targetId, b.targetId);
}

function validateRow(row: CandidateTarget, chemicalId: string): string | null {
  if (row.chemicalId !== chemicalId) {
    return `row belongs to "${row.chemicalId}" but was listed under "${chemicalId}"`;
  }
  if (row.targetId.length === 0) {
    return 'empty target id';
  }
  if (!Number.isFinite(row.similarityScore) || row.similarityScore < 0 || row.similarityScore > 1) {
    return `similarity score ${row.similarityScore} outside [0, 1]`;
  }
  return null;
}

/** Keep one row per target: higher score wins, then the better source rank. */
function dedupeRows(rows: CandidateTarget[]): CandidateTarget[] {
  const byTarget = new Map<string, CandidateTarget>();
  for (const row of rows) {
    const existing = byTarget.get(row.targetId);
    if (
      !existing ||
      row.similarityScore > existing.similarityScore ||
      (row.similarityScore === existing.similarityScore && row.sourceRank < existing.sourceRank)
    ) {
      byTarget.set(row.targetId, row);
    }
  }
  return [...byTarget.values()];
}

/**
 * Build the unique target worklist from per-chemical candidate lists.
 *
 * Throws ConfigError when top_n is not an allowed value. Bad rows and
 * chemicals left with no candidates are recorded in `issues` and skipped.
 * Output does not depend on the order of `lists` or of rows within them.
 */
export function extractTargets(lists: CandidateList[], config: ScreeningConfig): TargetExtraction {
  const topN = config.topNPerChemical;
  if (!isTopN(topN)) {
    throw new ConfigError('Invalid screening configuration', [
      `topNPerChemical: must be one of ${TOP_N_OPTIONS.join(', ')} (got ${topN})`,
    ]);
  }

  const issues: MalformedInputError[] = [];

  // Merge lists that share a chemical id
  const rowsByChemical = new Map<string, CandidateTarget[]>();
  for (const list of lists) {
    const bucket = rowsByChemical.get(list.chemicalId) ?? [];
    for (const row of list.candidates) {
      const problem = validateRow(row, list.chemicalId);
      if (problem) {
        const issue = new MalformedInputError(`Skipping candidate row: ${problem}`, {
          stage: 'extract',
          identifier: `${list.chemicalId}::${row.targetId}`,
        });
        console.warn(`[Extract] ${issue.message} (${issue.identifier})`);
        issues.push(issue);
        continue;
      }
      bucket.push(row);
    }
    rowsByChemical.set(list.chemicalId, bucket);
  }

  const chemicalIds = [...rowsByChemical.keys()].sort(compareIds);
  const selected: CandidateTarget[] = [];
  const chemicalTargets = new Map<string, string[]>();
  const excludedChemicals: string[] = [];

  for (const chemicalId of chemicalIds) {
    const rows = dedupeRows(rowsByChemical.get(chemicalId) ?? []);
    if (rows.length === 0) {
      const issue = new MalformedInputError(`Chemical "${chemicalId}" has no candidate targets`, {
        stage: 'extract',
        identifier: chemicalId,
      });
      console.warn(`[Extract] ${issue.message}; excluded`);
      issues.push(issue);
      excludedChemicals.push(chemicalId);
      continue;
    }

    const top = [...rows].sort(compareCandidates).slice(0, topN);
    selected.push(...top);
    chemicalTargets.set(chemicalId, top.map((row) => row.targetId));
  }

  const provenance = new Map<string, ProvenanceEntry[]>();
  for (const row of selected) {
    const entries = provenance.get(row.targetId) ?? [];
    entries.push({
      chemicalId: row.chemicalId,
      similarityScore: row.similarityScore,
      sourceRank: row.sourceRank,
    });
    provenance.set(row.targetId, entries);
  }

  // Rebuild in target order so map iteration is deterministic too
  const sortedProvenance = new Map<string, ProvenanceEntry[]>();
  const worklist: UniqueTarget[] = [];
  for (const targetId of [...provenance.keys()].sort(compareIds)) {
    const entries = (provenance.get(targetId) ?? []).sort(
      (a, b) => b.similarityScore - a.similarityScore || compareIds(a.chemicalId, b.chemicalId),
    );
    sortedProvenance.set(targetId, entries);
    worklist.push({
      targetId,
      chemicalIds: entries.map((e) => e.chemicalId).sort(compareIds),
    });
  }

  const scores = selected.map((row) => row.similarityScore);
  let minScore = scores.length > 0 ? scores[0] : 0;
  let maxScore = minScore;
  for (const score of scores) {
    if (score < minScore) minScore = score;
    if (score > maxScore) maxScore = score;
  }
  const statistics: ExtractionStatistics = {
    totalChemicals: chemicalIds.length,
    excludedChemicals: excludedChemicals.length,
    totalEntries: selected.length,
    uniqueTargets: worklist.length,
    meanScore: scores.length > 0 ? scores.reduce((sum, s) => sum + s, 0) / scores.length : 0,
    minScore,
    maxScore,
  };

  console.log(
    `[Extract] ${statistics.totalChemicals} chemicals -> ${statistics.totalEntries} entries, ` +
      `${statistics.uniqueTargets} unique targets (top_n=${topN})`,
  );

  return {
    worklist,
    provenance: sortedProvenance,
    chemicalTargets,
    selected,
    excludedChemicals,
    issues,
    statistics,
  };
}
