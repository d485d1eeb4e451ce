export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  private level: number;
  private scope?: string;

  constructor(level: LogLevel = 'info', scope?: string) {
    this.level = LEVELS[level];
    this.scope = scope;
  }

  /**
   * Derive a logger that prefixes every line with a component name.
   * Nested scopes are joined with a dot: `pipeline.controller`.
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}.${scope}` : scope;
    const child = new Logger('info', nested);
    child.level = this.level;
    return child;
  }

  mute(): void {
    this.level = Number.POSITIVE_INFINITY;
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVELS[level] < this.level) {
      return;
    }
    const prefix = this.scope ? ` [${this.scope}]` : '';
    const line = `[${new Date().toISOString()}] ${level.toUpperCase()}${prefix}: ${message}`;
    if (meta !== undefined) {
      console.log(line, meta);
    } else {
      console.log(line);
    }
  }
}

/** Logger that drops everything; handy as a default collaborator in tests. */
export function silentLogger(): Logger {
  const logger = new Logger('error');
  logger.mute();
  return logger;
}
