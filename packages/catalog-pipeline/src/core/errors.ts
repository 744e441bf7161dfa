/**
 * Catalog Pipeline Error Types
 *
 * A run either completes, ends with a non-error outcome (no data, no new
 * data, cancelled), or fails with one of these. Degraded data such as a
 * failed geocoding lookup is never an error.
 */

/**
 * Pipeline stages, in execution order
 */
export type PipelineStage =
  | 'identity'
  | 'fetch'
  | 'ingestion'
  | 'archive'
  | 'enrichment'
  | 'transformation'
  | 'quality'
  | 'persistence';

/**
 * Unexpected failure inside a stage. Fatal for the run.
 *
 * Thrown by PipelineRunner with the failing stage so the CLI can report
 * where the run stopped. Nothing is persisted after it is thrown.
 */
export class PipelineStageError extends Error {
  public readonly name = 'PipelineStageError' as const;

  constructor(
    public readonly stage: PipelineStage,
    public readonly category: string,
    public readonly cause: unknown
  ) {
    super(
      `Pipeline failed during ${stage} for category "${category}": ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
    Object.setPrototypeOf(this, PipelineStageError.prototype);
  }

  /**
   * Multi-line description for logs
   */
  toLogString(): string {
    const parts = [`PipelineStageError: ${this.message}`, `  Stage: ${this.stage}`];
    if (this.cause instanceof Error && this.cause.stack) {
      parts.push(`  Cause: ${this.cause.stack}`);
    }
    return parts.join('\n');
  }
}

/**
 * Run aborted through its AbortSignal
 */
export class PipelineCancelledError extends Error {
  public readonly name = 'PipelineCancelledError' as const;

  constructor(public readonly stage: PipelineStage) {
    super(`Pipeline cancelled before ${stage}`);
    Object.setPrototypeOf(this, PipelineCancelledError.prototype);
  }
}

/**
 * Configuration file or override failed validation
 */
export class ConfigValidationError extends Error {
  public readonly name = 'ConfigValidationError' as const;

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

export function isPipelineStageError(error: unknown): error is PipelineStageError {
  return error instanceof PipelineStageError;
}

export function isPipelineCancelledError(error: unknown): error is PipelineCancelledError {
  return error instanceof PipelineCancelledError;
}

export function isConfigValidationError(error: unknown): error is ConfigValidationError {
  return error instanceof ConfigValidationError;
}
