/**
 * Backend client for a remote modeling / scoring service.
 *
 * Jobs are submitted with `POST {baseUrl}/jobs` and polled with
 * `GET {baseUrl}/jobs/{id}` until they complete or fail. The remote adapters
 * expose the service as the ModelBuilder and ScreeningScorer collaborators.
 */

import { z } from 'zod';
import { abortError } from './concurrency';
import { isAbortError } from './errors';
import { MODEL_FAILURE_REASONS, SCREENING_FAILURE_REASONS } from './screening-types';
import type {
  ModelBuilder,
  ModelBuildOutput,
  ModelFailureReason,
  ScoreOutput,
  ScreeningFailureReason,
  ScreeningScorer,
} from './screening-types';

export type JobType = 'pharmacophore_model' | 'screening_score';

const jobSubmitResponseSchema = z.object({
  job_id: z.string().min(1),
});

export const jobStatusSchema = z.object({
  job_id: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  result: z.unknown().optional(),
  error: z.string().optional(),
  /** Classified failure reason, when the service provides one */
  failure_reason: z.string().optional(),
});

export type JobStatus = z.infer<typeof jobStatusSchema>;

const modelJobResultSchema = z.object({
  artifact_paths: z.array(z.string()),
});

const scoreJobResultSchema = z.object({
  score: z.number(),
});

export interface BackendClientOptions {
  baseUrl: string;
  fetch?: typeof fetch;
  /** Base poll interval; doubles after each failed poll */
  pollIntervalMs?: number;
  maxBackoffMs?: number;
  maxPollDurationMs?: number;
  maxConsecutiveErrors?: number;
}

export interface WaitOptions {
  signal?: AbortSignal;
  onStatusChange?: (status: JobStatus) => void;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError('Job polling cancelled'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError('Job polling cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class BackendClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly pollIntervalMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxPollDurationMs: number;
  private readonly maxConsecutiveErrors: number;

  constructor(options: BackendClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
    this.maxBackoffMs = options.maxBackoffMs ?? 32000;
    this.maxPollDurationMs = options.maxPollDurationMs ?? 30 * 60 * 1000;
    this.maxConsecutiveErrors = options.maxConsecutiveErrors ?? 5;
  }

  async submitJob(type: JobType, input: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/jobs`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ type, input }),
      signal,
    });
    if (!response.ok) {
      const errText = await response.text().catch(() => response.statusText);
      throw new Error(`Job submit failed (${response.status}): ${errText}`);
    }

    const parsed = jobSubmitResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Job submit returned no job_id');
    }
    console.log(`[API] Job submitted: ${parsed.data.job_id} | type: ${type}`);
    return parsed.data.job_id;
  }

  async getJobStatus(jobId: string, signal?: AbortSignal): Promise<JobStatus> {
    const response = await this.fetchImpl(`${this.baseUrl}/jobs/${encodeURIComponent(jobId)}`, { signal });
    if (!response.ok) {
      throw new Error(`Failed to get job status (${response.status}): ${response.statusText}`);
    }
    const parsed = jobStatusSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Malformed job status for ${jobId}`);
    }
    return parsed.data;
  }

  // Poll job status until completion with retry and exponential backoff
  async waitForJob(jobId: string, options: WaitOptions = {}): Promise<JobStatus> {
    const { signal, onStatusChange } = options;
    const startTime = Date.now();
    let pollCount = 0;
    let consecutiveErrors = 0;

    while (true) {
      const elapsed = Date.now() - startTime;
      if (elapsed > this.maxPollDurationMs) {
        throw new Error(`Job polling timed out after ${Math.round(elapsed / 1000)}s`);
      }

      pollCount++;

      try {
        const status = await this.getJobStatus(jobId, signal);
        consecutiveErrors = 0;

        // Log every 10th poll
        if (pollCount % 10 === 1) {
          console.log(`[API] Job ${jobId} status: ${status.status} (poll #${pollCount}, ${Math.round(elapsed / 1000)}s elapsed)`);
        }

        onStatusChange?.(status);

        if (status.status === 'completed' || status.status === 'failed') {
          console.log(`[API] Job ${jobId} finished with status: ${status.status} (${pollCount} polls)`);
          return status;
        }
      } catch (err) {
        if (isAbortError(err)) throw err;
        consecutiveErrors++;
        const errMsg = err instanceof Error ? err.message : String(err);
        console.warn(`[API] Poll error for job ${jobId} (${consecutiveErrors}/${this.maxConsecutiveErrors}): ${errMsg}`);

        if (consecutiveErrors >= this.maxConsecutiveErrors) {
          throw new Error(
            `Lost connection to backend after ${this.maxConsecutiveErrors} consecutive poll failures: ${errMsg}`,
          );
        }
      }

      const backoff = Math.min(this.pollIntervalMs * Math.pow(2, consecutiveErrors), this.maxBackoffMs);
      await sleep(backoff, signal);
    }
  }

  async runJob(type: JobType, input: Record<string, unknown>, options: WaitOptions = {}): Promise<JobStatus> {
    const jobId = await this.submitJob(type, input, options.signal);
    return this.waitForJob(jobId, options);
  }
}

function pickReason<R extends string>(allowed: readonly R[], value: string | undefined, fallback: R): R {
  const match = allowed.find((reason) => reason === value);
  return match ?? fallback;
}

/** Model builder backed by remote `pharmacophore_model` jobs. */
export function createRemoteModelBuilder(client: BackendClient): ModelBuilder {
  return {
    async build(targetId, { signal }): Promise<ModelBuildOutput> {
      const status = await client.runJob('pharmacophore_model', { target_id: targetId }, { signal });

      if (status.status === 'failed') {
        const reason: ModelFailureReason = pickReason(MODEL_FAILURE_REASONS, status.failure_reason, 'build_error');
        return { ok: false, reason, message: status.error ?? 'Model job failed' };
      }

      const result = modelJobResultSchema.safeParse(status.result);
      if (!result.success) {
        return { ok: false, reason: 'build_error', message: 'Model job returned no artifact paths' };
      }
      return { ok: true, artifactPaths: result.data.artifact_paths };
    },
  };
}

/** Screening scorer backed by remote `screening_score` jobs. */
export function createRemoteScorer(client: BackendClient): ScreeningScorer {
  return {
    async score(chemical, artifact, { signal }): Promise<ScoreOutput> {
      const status = await client.runJob(
        'screening_score',
        {
          chemical_id: chemical.id,
          smiles: chemical.structure,
          target_id: artifact.targetId,
          model_path: artifact.artifactPaths[0],
        },
        { signal },
      );

      if (status.status === 'failed') {
        const reason: ScreeningFailureReason = pickReason(
          SCREENING_FAILURE_REASONS,
          status.failure_reason,
          'scoring_error',
        );
        return { ok: false, reason, message: status.error ?? 'Scoring job failed' };
      }

      const result = scoreJobResultSchema.safeParse(status.result);
      if (!result.success) {
        return { ok: false, reason: 'scoring_error', message: 'Scoring job returned no score' };
      }
      return { ok: true, score: result.data.score };
    },
  };
}
