import { PipelineError } from './pipeline-errors';

/**
 * Checks that the aggregated totals can be reported: at least one category,
 * and no negative total.
 * @param totals The aggregate map. It is only read.
 */
export function validateAggregates(totals: ReadonlyMap<string, number>): void {
  if (totals.size === 0) {
    throw new PipelineError(
      'EMPTY_RESULT',
      'No categories were aggregated. Check the input sheet and the row filters.'
    );
  }

  for (const [category, total] of totals) {
    if (total < 0) {
      throw new PipelineError('NEGATIVE_TOTAL', `Negative total for "${category}": ${total}`, { category, total });
    }
  }
}
