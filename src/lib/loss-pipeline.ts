import type { PipelineResult } from './excel-types';
import type { Logger } from './logger';
import type { PipelineConfig } from './pipeline-config';
import { extractLossRecords } from './excel-data-extractor';
import { aggregateByCategory } from './excel-aggregator-core';
import { validateAggregates } from './excel-validator';
import { rankAggregates, writeLossReport } from './excel-aggregator-reports';

/**
 * Runs Extract, Transform, Verify and Load in order. Errors from any stage
 * propagate unchanged, so a failed run never reaches the report write.
 * @param config A parsed pipeline configuration.
 * @param logger Receives progress lines.
 * @returns What was written and where.
 */
export function runPipeline(config: PipelineConfig, logger: Logger): PipelineResult {
  logger.info('START run_pipeline()', { inputPath: config.inputPath, sheetName: config.sheetName });

  logger.info(`Extracting rows from sheet "${config.sheetName}"`);
  const { records, summary } = extractLossRecords(config.inputPath, config.sheetName, config.layout);
  logger.debug('Extraction summary', { ...summary });

  const totals = aggregateByCategory(records);
  logger.info(`Aggregated ${summary.rowsAccepted} rows into ${totals.size} categories`);

  validateAggregates(totals);
  logger.info('Validation passed');

  writeLossReport(totals, config.outputPath, config.sheetName, config.topN);
  logger.info(`Wrote report to ${config.outputPath}`);

  logger.info('END run_pipeline()');
  return {
    outputPath: config.outputPath,
    categoriesCounted: totals.size,
    ranked: rankAggregates(totals, config.topN),
    extraction: summary,
  };
}
