export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  /** Route every line to stderr (stdio MCP transport owns stdout) */
  useStderr?: boolean;
  scope?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function defaultLogLevel(): LogLevel {
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export class Logger {
  private readonly level: LogLevel;
  private readonly useStderr: boolean;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? defaultLogLevel();
    this.useStderr = options.useStderr ?? false;
    this.scope = options.scope;
  }

  /**
   * Logger sharing this one's settings with a scope prefix
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      useStderr: this.useStderr,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private logInternal(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const prefix = this.scope ? `[${this.scope}] ` : '';
    const logMessage = `[${level.toUpperCase()}] ${new Date().toISOString()} - ${prefix}${message}`;
    const metaData = meta === undefined ? '' : meta;

    if (this.useStderr) {
      console.error(logMessage, metaData);
      return;
    }

    const consoleMethod = level === 'info' ? console.log :
                          level === 'error' ? console.error :
                          level === 'warn' ? console.warn : console.debug;
    consoleMethod(logMessage, metaData);
  }

  info(message: string, meta?: unknown): void {
    this.logInternal('info', message, meta);
  }

  error(message: string, error?: unknown): void {
    this.logInternal('error', message, error);
  }

  warn(message: string, meta?: unknown): void {
    this.logInternal('warn', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.logInternal('debug', message, meta);
  }
}
