/**
 * Error taxonomy for the screening pipeline.
 *
 * Unit-level failures (one target, one chemical x target pair) are recorded
 * as failure rows and never thrown out of a dispatcher. Stage-level errors
 * (bad config, corrupted intermediate state) abort only the stage they occur in.
 */

export type PipelineStage = 'search' | 'extract' | 'modeling' | 'screening' | 'aggregate';

export type ErrorCode =
  | 'config_error'
  | 'malformed_input'
  | 'collaborator_failure'
  | 'collaborator_timeout'
  | 'aggregation_inconsistency'
  | 'stage_failed';

export interface PipelineErrorContext {
  stage?: PipelineStage;
  /** Chemical id, target id, or "chemical::target" pair key the error concerns */
  identifier?: string;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly stage?: PipelineStage;
  readonly identifier?: string;

  constructor(code: ErrorCode, message: string, context: PipelineErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.stage = context.stage;
    this.identifier = context.identifier;
  }
}

export class ConfigError extends PipelineError {
  /** One line per invalid option, e.g. "topNPerChemical: must be one of 5, 10, 15, 20" */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('config_error', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class MalformedInputError extends PipelineError {
  /** 1-based line number in the source file, when the record came from text input */
  readonly line?: number;

  constructor(message: string, context: PipelineErrorContext & { line?: number } = {}) {
    super('malformed_input', message, context);
    this.line = context.line;
  }
}

export class CollaboratorFailure<R extends string = string> extends PipelineError {
  readonly reason: R;

  constructor(reason: R, message: string, context: PipelineErrorContext = {}) {
    super('collaborator_failure', message, context);
    this.reason = reason;
  }
}

export class CollaboratorTimeoutError<R extends string = string> extends CollaboratorFailure<R> {
  readonly timeoutMs: number;

  constructor(reason: R, timeoutMs: number, context: PipelineErrorContext = {}) {
    super(reason, `Collaborator exceeded ${timeoutMs}ms budget`, context);
    this.timeoutMs = timeoutMs;
  }
}

export class AggregationInconsistency extends PipelineError {
  constructor(message: string, identifier: string) {
    super('aggregation_inconsistency', message, { stage: 'aggregate', identifier });
  }
}

export class StageError extends PipelineError {
  constructor(stage: PipelineStage, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const identifier = cause instanceof PipelineError ? cause.identifier : undefined;
    super('stage_failed', `Stage "${stage}" failed: ${detail}`, { stage, identifier, cause });
  }
}

export function isAbortError(err: unknown): boolean {
  return (
    (err instanceof DOMException && err.name === 'AbortError') ||
    (err instanceof Error && err.name === 'AbortError')
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
