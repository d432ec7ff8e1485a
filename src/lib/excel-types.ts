
/**
 * A worksheet cell as seen by the extractor. Booleans and dates arrive as
 * numbers; error cells arrive as their displayed text.
 */
export type CellValue =
  | { kind: 'empty' }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string };

/** One accepted data row: a state code and its verified loss. */
export interface RawRecord {
  category: string;
  measure: number;
}

/** Category -> summed measure, iterated in first-seen order. */
export type AggregateMap = Map<string, number>;

export interface RankedEntry {
  rank: number;
  category: string;
  total: number;
}

export interface SheetLayout {
  /** 1-indexed row where data starts. */
  dataStartRow: number;
  categoryColumn: string;
  measureColumn: string;
}

export type SkipReason = 'emptyCategory' | 'blankCategory' | 'blankMeasure';

export interface ExtractionSummary {
  sheetName: string;
  rowsScanned: number;
  rowsAccepted: number;
  rowsSkipped: Record<SkipReason, number>;
  // Accepted rows whose measure text did not parse and became 0.
  measuresCoercedToZero: number;
}

export interface ExtractionResult {
  records: RawRecord[];
  summary: ExtractionSummary;
}

export interface PipelineResult {
  outputPath: string;
  categoriesCounted: number;
  ranked: RankedEntry[];
  extraction: ExtractionSummary;
}
