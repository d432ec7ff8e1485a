import type { AggregateMap, RawRecord } from './excel-types';

/**
 * Sums the measure of each record by its category.
 * @param records The accepted rows, in sheet order.
 * @returns A map of category to total. Keys keep the order in which each category was first seen.
 */
export function aggregateByCategory(records: Iterable<RawRecord>): AggregateMap {
  const totals: AggregateMap = new Map();
  for (const { category, measure } of records) {
    totals.set(category, (totals.get(category) ?? 0) + measure);
  }
  return totals;
}
