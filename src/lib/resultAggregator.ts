/**
 * Result Aggregation
 *
 * Joins the similarity rows with the screening rows on (chemical, target),
 * normalizes the screening score, and produces one total order over every
 * pair that has both signals. Pairs missing either side are reported with
 * the reason they dropped out.
 */

import { AggregationInconsistency } from './errors';
import { assertConfig } from './validations/config';
import type { CombinationWeights, ScreeningConfig } from './validations/config';
import { pairKey } from './screening-types';
import type {
  CandidateTarget,
  CombinedHit,
  IncompletePair,
  ModelArtifact,
  ScreeningResult,
} from './screening-types';

export interface AggregationInput {
  /** Base chemical table */
  chemicalIds: string[];
  /** Base target table (the extraction worklist) */
  targetIds: string[];
  /** Candidate rows kept by extraction */
  candidates: CandidateTarget[];
  artifacts: ModelArtifact[];
  screeningResults: ScreeningResult[];
}

export interface ChemicalSummary {
  chemicalId: string;
  hitCount: number;
  incompleteCount: number;
  bestHit: CombinedHit | null;
  meanCombinedScore: number | null;
  /** Over every successful screening row for the chemical, not only its candidate targets */
  meanScreeningScore: number | null;
}

export interface AggregationStatistics {
  totalChemicals: number;
  candidatePairs: number;
  combinedHits: number;
  incompletePairs: number;
  modeledTargets: number;
  failedTargets: number;
  screeningRows: number;
  screeningSuccess: number;
}

export interface AggregationReport {
  /** Every combined hit, combinedRank 1..n */
  ranked: CombinedHit[];
  /** First `topKReport` rows of `ranked` */
  topHits: CombinedHit[];
  chemicalSummaries: ChemicalSummary[];
  incomplete: IncompletePair[];
  statistics: AggregationStatistics;
  weights: CombinationWeights;
  /** Screening score range used for normalization, null without successful rows */
  screeningRange: { min: number; max: number } | null;
}

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Total order over combined hits: combined desc, screening desc,
 * similarity desc, chemical asc, target asc.
 */
export function compareHits(
  a: Omit<CombinedHit, 'combinedRank'>,
  b: Omit<CombinedHit, 'combinedRank'>,
): number {
  return (
    b.combinedScore - a.combinedScore ||
    b.screeningScore - a.screeningScore ||
    b.similarityScore - a.similarityScore ||
    compareIds(a.chemicalId, b.chemicalId) ||
    compareIds(a.targetId, b.targetId)
  );
}

/** Min-max normalizer; every value maps to 0.5 when the range is degenerate. */
export function createNormalizer(scores: number[]): {
  normalize: (score: number) => number;
  range: { min: number; max: number } | null;
} {
  if (scores.length === 0) {
    return { normalize: () => 0.5, range: null };
  }
  let min = scores[0];
  let max = scores[0];
  for (const score of scores) {
    if (score < min) min = score;
    if (score > max) max = score;
  }
  const span = max - min;
  return {
    normalize: (score) => (span > 0 ? (score - min) / span : 0.5),
    range: { min, max },
  };
}

function mean(values: number[]): number | null {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : null;
}

function checkConsistency(input: AggregationInput): {
  screeningByPair: Map<string, ScreeningResult>;
  artifactByTarget: Map<string, ModelArtifact>;
} {
  const chemicals = new Set(input.chemicalIds);
  const targets = new Set(input.targetIds);

  const artifactByTarget = new Map<string, ModelArtifact>();
  for (const artifact of input.artifacts) {
    if (artifactByTarget.has(artifact.targetId)) {
      throw new AggregationInconsistency(`Duplicate model artifact for target "${artifact.targetId}"`, artifact.targetId);
    }
    artifactByTarget.set(artifact.targetId, artifact);
  }

  const candidateKeys = new Set<string>();
  for (const row of input.candidates) {
    const key = pairKey(row.chemicalId, row.targetId);
    if (!chemicals.has(row.chemicalId)) {
      throw new AggregationInconsistency(`Candidate row references unknown chemical "${row.chemicalId}"`, key);
    }
    if (!targets.has(row.targetId)) {
      throw new AggregationInconsistency(`Candidate row references unknown target "${row.targetId}"`, key);
    }
    if (candidateKeys.has(key)) {
      throw new AggregationInconsistency(`Duplicate candidate row for ${key}`, key);
    }
    candidateKeys.add(key);
  }

  const screeningByPair = new Map<string, ScreeningResult>();
  for (const row of input.screeningResults) {
    const key = pairKey(row.chemicalId, row.targetId);
    if (!chemicals.has(row.chemicalId)) {
      throw new AggregationInconsistency(`Screening row references unknown chemical "${row.chemicalId}"`, key);
    }
    if (!targets.has(row.targetId)) {
      throw new AggregationInconsistency(`Screening row references unknown target "${row.targetId}"`, key);
    }
    if (artifactByTarget.get(row.targetId)?.status !== 'success') {
      throw new AggregationInconsistency(`Screening row for ${key} has no successful model`, key);
    }
    if (screeningByPair.has(key)) {
      throw new AggregationInconsistency(`Duplicate screening row for ${key}`, key);
    }
    screeningByPair.set(key, row);
  }

  return { screeningByPair, artifactByTarget };
}

/**
 * Merge similarity and screening signals into the ranked report.
 * Throws AggregationInconsistency when the inputs do not join cleanly.
 */
export function aggregateResults(input: AggregationInput, config: ScreeningConfig): AggregationReport {
  const { topKReport, combinationWeights: weights } = assertConfig(config);
  const { screeningByPair, artifactByTarget } = checkConsistency(input);

  const successRows = input.screeningResults.filter(
    (row): row is ScreeningResult & { screeningScore: number } =>
      row.status === 'success' && row.screeningScore !== null,
  );
  const { normalize, range } = createNormalizer(successRows.map((row) => row.screeningScore));

  const unranked: Array<Omit<CombinedHit, 'combinedRank'>> = [];
  const incomplete: IncompletePair[] = [];

  for (const candidate of input.candidates) {
    const { chemicalId, targetId, similarityScore } = candidate;
    const artifact = artifactByTarget.get(targetId);

    if (!artifact) {
      incomplete.push({ chemicalId, targetId, similarityScore, stage: 'modeling', reason: 'not_modeled' });
      continue;
    }
    if (artifact.status === 'failure') {
      incomplete.push({ chemicalId, targetId, similarityScore, stage: 'modeling', reason: artifact.failureReason });
      continue;
    }

    const row = screeningByPair.get(pairKey(chemicalId, targetId));
    if (!row) {
      incomplete.push({ chemicalId, targetId, similarityScore, stage: 'screening', reason: 'not_screened' });
      continue;
    }
    if (row.status !== 'success' || row.screeningScore === null) {
      incomplete.push({
        chemicalId,
        targetId,
        similarityScore,
        stage: 'screening',
        reason: row.failureReason ?? 'scoring_error',
      });
      continue;
    }

    const normalizedScreeningScore = normalize(row.screeningScore);
    unranked.push({
      chemicalId,
      targetId,
      similarityScore,
      screeningScore: row.screeningScore,
      normalizedScreeningScore,
      combinedScore: weights.similarity * similarityScore + weights.screening * normalizedScreeningScore,
      sourceRank: candidate.sourceRank,
      ...(candidate.organism !== undefined ? { organism: candidate.organism } : {}),
    });
  }

  const ranked: CombinedHit[] = unranked
    .sort(compareHits)
    .map((hit, index) => ({ ...hit, combinedRank: index + 1 }));

  incomplete.sort((a, b) => compareIds(a.chemicalId, b.chemicalId) || compareIds(a.targetId, b.targetId));

  const chemicalSummaries = summarizeChemicals(input, ranked, incomplete, successRows);

  const statistics: AggregationStatistics = {
    totalChemicals: chemicalSummaries.length,
    candidatePairs: input.candidates.length,
    combinedHits: ranked.length,
    incompletePairs: incomplete.length,
    modeledTargets: input.artifacts.filter((a) => a.status === 'success').length,
    failedTargets: input.artifacts.filter((a) => a.status === 'failure').length,
    screeningRows: input.screeningResults.length,
    screeningSuccess: successRows.length,
  };

  console.log(
    `[Aggregate] ${ranked.length} combined hits, ${incomplete.length} incomplete pairs ` +
      `(${statistics.candidatePairs} candidate pairs)`,
  );

  return {
    ranked,
    topHits: ranked.slice(0, topKReport),
    chemicalSummaries,
    incomplete,
    statistics,
    weights: { ...weights },
    screeningRange: range,
  };
}

function summarizeChemicals(
  input: AggregationInput,
  ranked: CombinedHit[],
  incomplete: IncompletePair[],
  successRows: Array<ScreeningResult & { screeningScore: number }>,
): ChemicalSummary[] {
  const chemicalIds = [...new Set(input.candidates.map((row) => row.chemicalId))].sort(compareIds);

  return chemicalIds.map((chemicalId) => {
    // `ranked` is already in total order, so the first match is the best hit
    const hits = ranked.filter((hit) => hit.chemicalId === chemicalId);
    return {
      chemicalId,
      hitCount: hits.length,
      incompleteCount: incomplete.filter((pair) => pair.chemicalId === chemicalId).length,
      bestHit: hits[0] ?? null,
      meanCombinedScore: mean(hits.map((hit) => hit.combinedScore)),
      meanScreeningScore: mean(
        successRows.filter((row) => row.chemicalId === chemicalId).map((row) => row.screeningScore),
      ),
    };
  });
}
