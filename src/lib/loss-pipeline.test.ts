import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { runPipeline } from './loss-pipeline';
import { parsePipelineConfig, type PipelineConfig } from './pipeline-config';
import { buildLoanWorkbook, makeTempDir, writeWorkbookFile, type FixtureRow } from '../test/loan-workbook';
import { catchPipelineError } from '../test/catch-pipeline-error';
import { RecordingLogger } from '../test/recording-logger';

describe('runPipeline', () => {
  let tempDir: string;
  let config: PipelineConfig;
  let logger: RecordingLogger;

  function writeInput(rows: readonly FixtureRow[]): void {
    writeWorkbookFile(buildLoanWorkbook(rows), config.inputPath);
  }

  beforeEach(() => {
    tempDir = makeTempDir();
    config = parsePipelineConfig({
      inputPath: path.join(tempDir, 'data', 'raw', 'loans.xlsx'),
      sheetName: 'FY22 Home',
      outputPath: path.join(tempDir, 'data', 'processed', 'loss.txt'),
      topN: 2,
    });
    logger = new RecordingLogger();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('extracts, aggregates, validates and writes the ranked report', () => {
    writeInput([
      ['UT', 100],
      ['CA', 500],
      [null, 999],
      ['UT', 200],
      ['TX', 100],
    ]);

    const result = runPipeline(config, logger);

    expect(result.outputPath).toBe(config.outputPath);
    expect(result.categoriesCounted).toBe(3);
    expect(result.ranked).toEqual([
      { rank: 1, category: 'CA', total: 500 },
      { rank: 2, category: 'UT', total: 300 },
    ]);
    expect(result.extraction.rowsSkipped.emptyCategory).toBe(1);
    expect(fs.readFileSync(config.outputPath, 'utf-8').split('\n').slice(3)).toEqual([
      'States counted: 3',
      'Top N: 2',
      '',
      'Rank | State | Total Verified Loss',
      '----------------------------------------',
      '   1 | CA    |             500.00',
      '   2 | UT    |             300.00',
      '',
    ]);
  });

  it('logs start, the output path and end', () => {
    writeInput([['UT', 1]]);

    runPipeline(config, logger);

    const messages = logger.messages('info');
    expect(messages[0]).toBe('START run_pipeline()');
    expect(messages).toContain(`Wrote report to ${config.outputPath}`);
    expect(messages[messages.length - 1]).toBe('END run_pipeline()');
  });

  it('writes the same bytes on a rerun with unchanged input', () => {
    writeInput([['UT', 100.1], ['CA', 200.2], ['NV', 100.1]]);

    runPipeline(config, logger);
    const first = fs.readFileSync(config.outputPath);
    runPipeline(config, logger);
    const second = fs.readFileSync(config.outputPath);

    expect(second.equals(first)).toBe(true);
  });

  it('stops before writing when a total is negative', () => {
    writeInput([['UT', 10], ['UT', '-15']]);

    const error = catchPipelineError(() => runPipeline(config, logger));

    expect(error.kind).toBe('NEGATIVE_TOTAL');
    expect(error.details).toEqual({ category: 'UT', total: -5 });
    expect(fs.existsSync(config.outputPath)).toBe(false);
  });

  it('stops before writing when no rows survive extraction', () => {
    writeInput([['TX', '  '], [null, 4]]);

    const error = catchPipelineError(() => runPipeline(config, logger));

    expect(error.kind).toBe('EMPTY_RESULT');
    expect(fs.existsSync(config.outputPath)).toBe(false);
  });

  it('propagates a missing input file unchanged', () => {
    const error = catchPipelineError(() => runPipeline(config, logger));

    expect(error.kind).toBe('MISSING_FILE');
    expect(logger.messages('info')).not.toContain('END run_pipeline()');
  });
});
