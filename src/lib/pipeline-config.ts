import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_SHEET_LAYOUT } from './excel-data-extractor';
import { DEFAULT_TOP_N } from './excel-aggregator-reports';
import { PipelineError } from './pipeline-errors';

export const DEFAULT_INPUT_FILE = 'sba_disaster_home_loans_fy22.xlsx';
export const DEFAULT_SHEET_NAME = 'FY22 Home';
export const DEFAULT_OUTPUT_FILE = 'verified_loss_by_state.txt';

const ColumnIdentifierSchema = z
  .string()
  .trim()
  .regex(/^([A-Za-z]+|[1-9]\d*)$/, 'Column must be a letter (e.g. "H") or a 1-indexed number');

const SheetLayoutSchema = z.object({
  dataStartRow: z.number().int().positive().default(DEFAULT_SHEET_LAYOUT.dataStartRow),
  categoryColumn: ColumnIdentifierSchema.default(DEFAULT_SHEET_LAYOUT.categoryColumn),
  measureColumn: ColumnIdentifierSchema.default(DEFAULT_SHEET_LAYOUT.measureColumn),
});

export const PipelineConfigSchema = z.object({
  inputPath: z.string().min(1),
  sheetName: z.string().min(1),
  outputPath: z.string().min(1),
  topN: z.number().int().positive().default(DEFAULT_TOP_N),
  layout: SheetLayoutSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Validates a configuration and fills in defaults.
 * @throws PipelineError of kind INVALID_CONFIG listing every problem found.
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PipelineError('INVALID_CONFIG', `Invalid pipeline configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * The standard run: input under data/raw, report under data/processed, both
 * relative to `rootDir`.
 */
export function defaultPipelineConfig(rootDir: string = process.cwd()): PipelineConfig {
  const dataDir = path.join(rootDir, 'data');
  return parsePipelineConfig({
    inputPath: path.join(dataDir, 'raw', DEFAULT_INPUT_FILE),
    sheetName: DEFAULT_SHEET_NAME,
    outputPath: path.join(dataDir, 'processed', DEFAULT_OUTPUT_FILE),
  });
}
