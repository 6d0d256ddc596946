/**
 * Log levels, lowest to highest. NONE silences a logger entirely.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

/**
 * Console logger with a level threshold and an optional context tag.
 *
 * Lines are written as `[<iso timestamp>] [<context>] <message>`.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: string | undefined;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context;
  }

  /**
   * Create a logger. Every call returns an independent instance.
   */
  public static create(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  private formatMessage(message: string): string {
    const timestamp = new Date().toISOString();
    return this.context
      ? `[${timestamp}] [${this.context}] ${message}`
      : `[${timestamp}] ${message}`;
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a logger sharing this one's level, tagged with a new context.
   */
  public child(context: string): Logger {
    return Logger.create({ level: this.level, context });
  }
}
