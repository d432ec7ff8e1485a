import type { LogLevel, LogMetadata, Logger } from '../lib/logger';

export interface RecordedLine {
  level: LogLevel;
  message: string;
  metadata?: LogMetadata;
}

/** Logger double that keeps every line in memory. */
export class RecordingLogger implements Logger {
  readonly lines: RecordedLine[] = [];

  debug(message: string, metadata?: LogMetadata): void {
    this.lines.push({ level: 'debug', message, metadata });
  }

  info(message: string, metadata?: LogMetadata): void {
    this.lines.push({ level: 'info', message, metadata });
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.lines.push({ level: 'warn', message, metadata });
  }

  error(message: string, metadata?: LogMetadata): void {
    this.lines.push({ level: 'error', message, metadata });
  }

  messages(level?: LogLevel): string[] {
    return this.lines.filter(line => level === undefined || line.level === level).map(line => line.message);
  }
}
