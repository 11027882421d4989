/**
 * Environment-backed settings, read once on first use.
 *
 * - `LOG_LEVEL`: minimum log level (DEBUG, INFO, WARN, ERROR; default INFO)
 * - `TREEBANK_ROOT_LABEL`: label used by `add-root` when none is given (default ROOT)
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export const DEFAULT_ROOT_LABEL = 'ROOT';

export class ConfigService {
  private static instance: ConfigService | null = null;

  readonly logLevel: LogLevel;
  readonly rootLabel: string;

  private constructor() {
    this.logLevel = ConfigService.parseLogLevel(process.env.LOG_LEVEL);
    this.rootLabel = process.env.TREEBANK_ROOT_LABEL?.trim() || DEFAULT_ROOT_LABEL;
  }

  private static parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.trim().toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /** Drop the cached instance so the next getInstance() re-reads the environment. Tests only. */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
