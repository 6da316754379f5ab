// Logging for the validation engine

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Destination for formatted log lines
 */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[fieldcheck]',
  timestamps: false
};

/**
 * Levelled logger writing one line per entry
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Replace the shared logger used by the default validator
   */
  static configure(config: Partial<LoggerConfig>): void {
    Logger.instance = new Logger(config);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return this.config.level <= level;
  }

  /**
   * Logger sharing this configuration with an extra prefix segment
   */
  child(scope: string): Logger {
    const prefix = this.config.prefix ? `${this.config.prefix} [${scope}]` : `[${scope}]`;
    return new Logger({ ...this.config, prefix });
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private get sink(): LogSink {
    return this.config.sink ?? console;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      this.sink.debug(this.format('DEBUG', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled(LogLevel.INFO)) {
      this.sink.info(this.format('INFO', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled(LogLevel.WARN)) {
      this.sink.warn(this.format('WARN', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      this.sink.error(this.format('ERROR', message, context));
    }
  }
}

export const logger = Logger.getInstance();
