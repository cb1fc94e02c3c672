import { z } from 'zod';
import { ConfigError } from '../errors';

// Allowed per-chemical candidate depths
export const TOP_N_OPTIONS = [5, 10, 15, 20] as const;
export type TopN = typeof TOP_N_OPTIONS[number];

const WEIGHT_SUM_TOLERANCE = 1e-9;

const positiveInt = z.number().int().positive();

export const combinationWeightsSchema = z
  .object({
    similarity: z.number().min(0),
    screening: z.number().min(0),
  })
  .refine(
    (w) => Math.abs(w.similarity + w.screening - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: 'Weights must sum to 1.0' },
  );

export type CombinationWeights = z.infer<typeof combinationWeightsSchema>;

export const screeningConfigSchema = z.object({
  topNPerChemical: z.union([z.literal(5), z.literal(10), z.literal(15), z.literal(20)]),
  // External job slots (partition / resume granularity)
  batchCount: positiveInt,
  // In-process lanes within one batch slot
  modelConcurrency: positiveInt,
  // In-process lanes for screening
  cpuWorkers: positiveInt,
  forceRebuild: z.boolean(),
  forceRescreen: z.boolean(),
  topKReport: positiveInt,
  combinationWeights: combinationWeightsSchema,
  modelTimeoutMs: positiveInt,
  screeningTimeoutMs: positiveInt,
});

export type ScreeningConfig = Readonly<z.infer<typeof screeningConfigSchema>>;

/** Raw, unvalidated options as they arrive from callers or the environment */
export interface ScreeningConfigInput {
  topNPerChemical?: number;
  batchCount?: number;
  modelConcurrency?: number;
  cpuWorkers?: number;
  forceRebuild?: boolean;
  forceRescreen?: boolean;
  topKReport?: number;
  combinationWeights?: Partial<CombinationWeights>;
  modelTimeoutMs?: number;
  screeningTimeoutMs?: number;
}

export const screeningConfigDefaults: ScreeningConfig = {
  topNPerChemical: 10,
  batchCount: 1,
  modelConcurrency: 2,
  cpuWorkers: 4,
  forceRebuild: false,
  forceRescreen: false,
  topKReport: 50,
  combinationWeights: { similarity: 0.5, screening: 0.5 },
  modelTimeoutMs: 10 * 60 * 1000,
  screeningTimeoutMs: 2 * 60 * 1000,
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Merge overrides onto the defaults and validate.
 * Returns a frozen value; throws ConfigError listing every invalid option.
 */
export function resolveConfig(overrides: ScreeningConfigInput = {}): ScreeningConfig {
  // Explicit undefined means "use the default"
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const merged = {
    ...screeningConfigDefaults,
    ...defined,
    combinationWeights: {
      ...screeningConfigDefaults.combinationWeights,
      ...overrides.combinationWeights,
    },
  };

  const parsed = screeningConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid screening configuration', formatIssues(parsed.error));
  }

  return Object.freeze({
    ...parsed.data,
    combinationWeights: Object.freeze({ ...parsed.data.combinationWeights }),
  });
}

/** Re-validate a config value at a component entry point. */
export function assertConfig(config: ScreeningConfig): ScreeningConfig {
  const parsed = screeningConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError('Invalid screening configuration', formatIssues(parsed.error));
  }
  return config;
}

export function isTopN(value: number): value is TopN {
  return TOP_N_OPTIONS.some((option) => option === value);
}

// ---- Environment ----

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError('Invalid screening configuration', [`${key}: "${raw}" is not a number`]);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigError('Invalid screening configuration', [`${key}: "${env[key]}" is not a boolean`]);
}

/**
 * Build a config from SCREENING_* environment variables.
 * Unset variables fall back to the defaults.
 */
export function loadConfigFromEnv(env: Env = process.env): ScreeningConfig {
  const overrides: ScreeningConfigInput = {
    topNPerChemical: readNumber(env, 'SCREENING_TOP_N'),
    batchCount: readNumber(env, 'SCREENING_BATCH_COUNT'),
    modelConcurrency: readNumber(env, 'SCREENING_MODEL_CONCURRENCY'),
    cpuWorkers: readNumber(env, 'SCREENING_CPU_WORKERS'),
    forceRebuild: readBoolean(env, 'SCREENING_FORCE_REBUILD'),
    forceRescreen: readBoolean(env, 'SCREENING_FORCE_RESCREEN'),
    topKReport: readNumber(env, 'SCREENING_TOP_K'),
    modelTimeoutMs: readNumber(env, 'SCREENING_MODEL_TIMEOUT_MS'),
    screeningTimeoutMs: readNumber(env, 'SCREENING_TIMEOUT_MS'),
  };

  const similarity = readNumber(env, 'SCREENING_WEIGHT_SIMILARITY');
  const screening = readNumber(env, 'SCREENING_WEIGHT_SCREENING');
  if (similarity !== undefined || screening !== undefined) {
    // A single weight implies its complement
    overrides.combinationWeights = {
      similarity: similarity ?? 1 - (screening ?? 0),
      screening: screening ?? 1 - (similarity ?? 0),
    };
  }

  return resolveConfig(overrides);
}
