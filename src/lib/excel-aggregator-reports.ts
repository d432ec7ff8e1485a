import * as fs from 'fs';
import * as path from 'path';
import type { RankedEntry } from './excel-types';

export const DEFAULT_TOP_N = 10;
export const REPORT_TITLE = 'SBA Disaster Home Loans: Total Verified Loss by State';

const totalFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: true,
});

/**
 * Ranks categories by total, highest first, and keeps the first `topN`.
 * Equal totals keep the map's iteration order (first-seen category first),
 * since Array.prototype.sort is stable.
 * @param totals The aggregate map.
 * @param topN Maximum number of entries to return.
 */
export function rankAggregates(totals: ReadonlyMap<string, number>, topN: number = DEFAULT_TOP_N): RankedEntry[] {
  return [...totals.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, topN))
    .map(([category, total], index) => ({ rank: index + 1, category, total }));
}

export function formatReportRow(entry: RankedEntry): string {
  return [
    String(entry.rank).padStart(4),
    entry.category.padEnd(5),
    totalFormatter.format(entry.total).padStart(18),
  ].join(' | ');
}

/**
 * Builds the full text of the report.
 * @param totals The aggregate map.
 * @param sheetName Sheet the data came from, shown in the header.
 * @param topN Maximum number of ranked rows.
 * @returns The report, ending in a newline.
 */
export function formatLossReport(totals: ReadonlyMap<string, number>, sheetName: string, topN: number = DEFAULT_TOP_N): string {
  const lines = [
    REPORT_TITLE,
    '='.repeat(48),
    `Sheet: ${sheetName}`,
    `States counted: ${totals.size}`,
    `Top N: ${topN}`,
    '',
    'Rank | State | Total Verified Loss',
    '-'.repeat(40),
    ...rankAggregates(totals, topN).map(formatReportRow),
  ];
  return lines.join('\n') + '\n';
}

/**
 * Writes the report to `outputPath`, replacing any previous report there.
 * The destination directory is created if needed. The file descriptor is
 * closed whether or not formatting and writing succeed.
 */
export function writeLossReport(
  totals: ReadonlyMap<string, number>,
  outputPath: string,
  sheetName: string,
  topN: number = DEFAULT_TOP_N
): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });

  const fd = fs.openSync(outputPath, 'w');
  try {
    fs.writeSync(fd, formatLossReport(totals, sheetName, topN), null, 'utf-8');
  } finally {
    fs.closeSync(fd);
  }
}
