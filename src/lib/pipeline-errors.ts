
export type PipelineErrorKind =
  | 'MISSING_FILE'
  | 'MISSING_SHEET'
  | 'EMPTY_RESULT'
  | 'NEGATIVE_TOTAL'
  | 'INVALID_CONFIG';

/**
 * Raised by any pipeline stage. Nothing inside the pipeline catches it; the
 * first one aborts the run before a report is written.
 */
export class PipelineError extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly details: Readonly<Record<string, unknown>> = {}
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
