import { PipelineError } from '../lib/pipeline-errors';

/** Runs `fn` and returns the PipelineError it throws. Anything else fails the test. */
export function catchPipelineError(fn: () => unknown): PipelineError {
  try {
    fn();
  } catch (error) {
    if (error instanceof PipelineError) return error;
    throw error;
  }
  throw new Error('Expected a PipelineError to be thrown');
}
