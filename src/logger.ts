/**
 * Structured logging: one JSON object per line on stderr, so stdout stays
 * free for tree output.
 */

import { ConfigService, LogLevel } from './config.js';

export { LogLevel };

export interface LogMetadata {
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = line => {
  console.error(line);
};

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink,
  ) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? { error: error.message, errorName: error.name, ...meta }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.minLevel) return;
    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };
    this.sink(JSON.stringify(entry));
  }
}

/** Logger for a component at the configured minimum level. */
export function createLogger(component: string, sink?: LogSink): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel, sink);
}
