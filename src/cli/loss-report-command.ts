/**
 * Loss report command
 *
 * Usage:
 *   loss-report [options]
 *
 * Options:
 *   --root <dir>         Project root holding data/raw and data/processed (default: cwd)
 *   --input <path>       Workbook to read (default: <root>/data/raw/sba_disaster_home_loans_fy22.xlsx)
 *   --sheet <name>       Sheet to read (default: "FY22 Home")
 *   --output <path>      Report to write (default: <root>/data/processed/verified_loss_by_state.txt)
 *   --top <n>            Number of ranked states in the report (default: 10)
 *   --log-level <level>  debug|info|warn|error (default: LOG_LEVEL or info)
 *   --json               Log one JSON object per line
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  ConsoleLogger,
  defaultPipelineConfig,
  isLogLevel,
  isPipelineError,
  logHeader,
  logLevelFromEnv,
  parsePipelineConfig,
  runPipeline,
  type LogLevel,
  type Logger,
  type PipelineConfig,
} from '../lib/excel-utils';

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

interface LossReportOptions {
  readonly root?: string;
  readonly input?: string;
  readonly sheet?: string;
  readonly output?: string;
  readonly top?: number;
  readonly logLevel?: LogLevel;
  readonly json?: boolean;
}

function parseTopN(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error.');
  }
  return level;
}

export function buildPipelineConfig(options: LossReportOptions): PipelineConfig {
  const defaults = defaultPipelineConfig(options.root);
  return parsePipelineConfig({
    ...defaults,
    inputPath: options.input ?? defaults.inputPath,
    sheetName: options.sheet ?? defaults.sheetName,
    outputPath: options.output ?? defaults.outputPath,
    topN: options.top ?? defaults.topN,
  });
}

/**
 * Runs the ETVL pipeline once with the given options. Any failure is logged
 * here, at the top, and turned into a non-zero exit code.
 */
export function runLossReport(options: LossReportOptions, logger?: Logger): number {
  const log = logger ?? new ConsoleLogger({
    level: options.logLevel ?? logLevelFromEnv(),
    pretty: !options.json,
  });

  logHeader(log, 'Pipelines: Read, Process, Verify, Write (ETVL)');
  log.info('START main()');

  try {
    runPipeline(buildPipelineConfig(options), log);
  } catch (error) {
    log.error('Pipeline failed', {
      error: error instanceof Error ? error.message : String(error),
      kind: isPipelineError(error) ? error.kind : undefined,
    });
    return EXIT_CODES.FAILURE;
  }

  log.info('END main()');
  return EXIT_CODES.SUCCESS;
}

export function createProgram(onExitCode: (code: number) => void, logger?: Logger): Command {
  const program = new Command();

  program
    .name('loss-report')
    .description('Rank states by total verified disaster-loan loss and write a text report')
    .option('--root <dir>', 'Project root holding data/raw and data/processed')
    .option('--input <path>', 'Workbook to read')
    .option('--sheet <name>', 'Sheet to read')
    .option('--output <path>', 'Report file to write')
    .option('--top <n>', 'Number of ranked states in the report', parseTopN)
    .option('--log-level <level>', 'debug|info|warn|error', parseLogLevel)
    .option('--json', 'Log one JSON object per line')
    .action(() => {
      onExitCode(runLossReport(program.opts<LossReportOptions>(), logger));
    });

  return program;
}
