/**
 * Console logging for the pipeline.
 *
 * Stages never import a logger; the runner receives one. `ConsoleLogger` is
 * the implementation the CLI hands it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface ConsoleLoggerConfig {
  readonly level: LogLevel;
  readonly name: string;
  /** Human-readable lines instead of one JSON object per line. */
  readonly pretty: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

export class ConsoleLogger implements Logger {
  private readonly config: ConsoleLoggerConfig;

  constructor(config: Partial<ConsoleLoggerConfig> = {}) {
    this.config = {
      level: config.level ?? logLevelFromEnv(),
      name: config.name ?? 'loss-report',
      pretty: config.pretty ?? true,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  formatMessage(level: LogLevel, message: string, metadata?: LogMetadata, now: Date = new Date()): string {
    const timestamp = now.toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.name}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      name: this.config.name,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const HEADER_RULE = '='.repeat(64);

/**
 * Logs a section header: a rule, the title, and another rule.
 */
export function logHeader(logger: Logger, title: string): void {
  logger.info(HEADER_RULE);
  logger.info(title);
  logger.info(HEADER_RULE);
}
