// ---- Input Records ----

/** A small molecule from the input library */
export interface Chemical {
  /** Unique name, reused verbatim as the join key */
  id: string;
  /** Opaque structure descriptor (SMILES) */
  structure: string;
  metadata?: {
    source?: string;
    category?: string;
  };
}

/** One similarity-search hit: chemical -> candidate protein target */
export interface CandidateTarget {
  chemicalId: string;
  targetId: string;
  /** Similarity in [0, 1] */
  similarityScore: number;
  /** Rank reported by the similarity search (1-based) */
  sourceRank: number;
  organism?: string;
}

/** Candidate rows for one chemical, as returned by the similarity search */
export interface CandidateList {
  chemicalId: string;
  candidates: CandidateTarget[];
}

// ---- Target Extraction ----

export interface UniqueTarget {
  targetId: string;
  /** Owning chemicals, sorted ascending, never empty */
  chemicalIds: string[];
}

export interface ProvenanceEntry {
  chemicalId: string;
  similarityScore: number;
  sourceRank: number;
}

// ---- Modeling ----

export const MODEL_FAILURE_REASONS = [
  'download_failed',
  'build_timeout',
  'build_error',
  'invalid_structure',
] as const;

export type ModelFailureReason = typeof MODEL_FAILURE_REASONS[number];

interface ModelArtifactBase {
  targetId: string;
  batchNumber: number;
  startedAt: string;
  completedAt: string;
  elapsedMs: number;
}

export interface ModelArtifactSuccess extends ModelArtifactBase {
  status: 'success';
  /** Pharmacophore model first, optional visualization files after */
  artifactPaths: string[];
}

export interface ModelArtifactFailure extends ModelArtifactBase {
  status: 'failure';
  failureReason: ModelFailureReason;
  failureMessage: string;
}

export type ModelArtifact = ModelArtifactSuccess | ModelArtifactFailure;

// ---- Screening ----

export const SCREENING_FAILURE_REASONS = [
  'invalid_smiles',
  'scoring_timeout',
  'scoring_error',
] as const;

export type ScreeningFailureReason = typeof SCREENING_FAILURE_REASONS[number];

export type ScreeningStatus = 'success' | 'failure' | 'skipped';

export interface ScreeningResult {
  chemicalId: string;
  targetId: string;
  status: ScreeningStatus;
  /** Numeric score on success, null otherwise */
  screeningScore: number | null;
  /** null on success, 'skipped' on skipped rows */
  failureReason: ScreeningFailureReason | 'skipped' | null;
  failureMessage?: string;
  elapsedMs: number;
}

/** Explicitly excluded chemical x target pair */
export interface PairKey {
  chemicalId: string;
  targetId: string;
}

/** Map key for a pair; distinct for any two id pairs, whatever characters the ids hold. */
export function pairKey(chemicalId: string, targetId: string): string {
  return JSON.stringify([chemicalId, targetId]);
}

// ---- Aggregation ----

export interface CombinedHit {
  chemicalId: string;
  targetId: string;
  similarityScore: number;
  screeningScore: number;
  /** Screening score min-max normalized over the run's successful rows */
  normalizedScreeningScore: number;
  combinedScore: number;
  /** 1-based position in the run-wide total order */
  combinedRank: number;
  sourceRank: number;
  organism?: string;
}

export type IncompleteStage = 'modeling' | 'screening';

export type IncompleteReason =
  | ModelFailureReason
  | ScreeningFailureReason
  | 'not_modeled'
  | 'not_screened'
  | 'skipped';

export interface IncompletePair {
  chemicalId: string;
  targetId: string;
  similarityScore: number;
  stage: IncompleteStage;
  reason: IncompleteReason;
}

// ---- External Collaborators ----

export interface CollaboratorCallOptions {
  /** Aborted when the call's time budget runs out or the stage is cancelled */
  signal: AbortSignal;
}

export interface SimilaritySearch {
  search(chemical: Chemical, topN: number, options: CollaboratorCallOptions): Promise<CandidateTarget[]>;
}

export type ModelBuildOutput =
  | { ok: true; artifactPaths: string[] }
  | { ok: false; reason: ModelFailureReason; message: string };

export interface ModelBuilder {
  build(targetId: string, options: CollaboratorCallOptions): Promise<ModelBuildOutput>;
}

export type ScoreOutput =
  | { ok: true; score: number }
  | { ok: false; reason: ScreeningFailureReason; message: string };

export interface ScreeningScorer {
  score(chemical: Chemical, artifact: ModelArtifactSuccess, options: CollaboratorCallOptions): Promise<ScoreOutput>;
}

/** Progress callback shared by the dispatchers (0-100) */
export type ProgressCallback = (percent: number, message?: string) => void;
