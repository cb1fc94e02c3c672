import { z } from 'zod';
import { MODEL_FAILURE_REASONS, SCREENING_FAILURE_REASONS } from '../screening-types';

// Persisted slot records are re-validated on load; the on-disk layout is a
// cache and may be stale or hand-edited.

const timing = {
  targetId: z.string().min(1),
  batchNumber: z.number().int().positive(),
  startedAt: z.string(),
  completedAt: z.string(),
  elapsedMs: z.number().min(0),
};

export const modelArtifactSchema = z.discriminatedUnion('status', [
  z.object({
    ...timing,
    status: z.literal('success'),
    artifactPaths: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    ...timing,
    status: z.literal('failure'),
    failureReason: z.enum(MODEL_FAILURE_REASONS),
    failureMessage: z.string(),
  }),
]);

const SCREENING_ROW_REASONS = [...SCREENING_FAILURE_REASONS, 'skipped'] as const;

export const screeningResultSchema = z.object({
  chemicalId: z.string().min(1),
  targetId: z.string().min(1),
  status: z.enum(['success', 'failure', 'skipped']),
  screeningScore: z.number().finite().nullable(),
  failureReason: z.enum(SCREENING_ROW_REASONS).nullable(),
  failureMessage: z.string().optional(),
  elapsedMs: z.number().min(0),
}).superRefine((row, ctx) => {
  if (row.status === 'success' && row.screeningScore === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'success rows need a score' });
  }
  if (row.status !== 'success' && row.failureReason === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'non-success rows need a reason' });
  }
});

export const candidateTargetSchema = z.object({
  chemicalId: z.string().min(1),
  targetId: z.string().min(1),
  similarityScore: z.number().min(0).max(1),
  sourceRank: z.number().int().positive(),
  organism: z.string().optional(),
});

/** Chemical library row after header mapping (Name, SMILES, Plant, Category) */
export const chemicalRowSchema = z.object({
  Name: z.string().trim().min(1, 'Name is required'),
  SMILES: z.string().trim().min(1, 'SMILES is required'),
  Plant: z.string().trim().optional(),
  Category: z.string().trim().optional(),
});

export type ChemicalRow = z.infer<typeof chemicalRowSchema>;

const count = z.number().int().min(0);

export const batchSummarySchema = z.object({
  batchNumber: z.number().int().positive(),
  totalBatches: z.number().int().positive(),
  total: count,
  built: count,
  reused: count,
  success: count,
  failure: count,
  failuresByReason: z.object({
    download_failed: count,
    build_timeout: count,
    build_error: count,
    invalid_structure: count,
  }),
  failedTargetIds: z.array(z.string()),
  elapsedMs: z.number().min(0),
  startedAt: z.string(),
  completedAt: z.string(),
});
