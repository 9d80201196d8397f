/**
 * Structured console logging
 *
 * One line per entry: JSON in production, `[time] LEVEL service: message {meta}`
 * everywhere else. The level comes from LOG_LEVEL when the logger is built.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const ROOT_SERVICE = 'food-gap-atlas';

function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level === 'debug' || level === 'info' || level === 'warn' || level === 'error' ? level : 'info';
}

function prettyFromEnv(): boolean {
  return process.env.NODE_ENV !== 'production';
}

export class Logger {
  constructor(
    private readonly service: string,
    private readonly minimum: LogLevel = levelFromEnv(),
    private readonly pretty: boolean = prettyFromEnv()
  ) {}

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  private write(level: LogLevel, message: string, metadata: LogMetadata | undefined): void {
    if (SEVERITY[level] < SEVERITY[this.minimum]) {
      return;
    }
    const line = this.format(level, message, metadata);
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  private format(level: LogLevel, message: string, metadata: LogMetadata | undefined): string {
    const timestamp = new Date().toISOString();
    const meta = metadata !== undefined && Object.keys(metadata).length > 0 ? metadata : undefined;

    if (this.pretty) {
      const suffix = meta ? ` ${JSON.stringify(meta)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${suffix}`;
    }
    return JSON.stringify({ timestamp, level, service: this.service, message, ...meta });
  }
}

export const logger = new Logger(ROOT_SERVICE);

/**
 * Logger whose service name is `food-gap-atlas:<module>`
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(`${ROOT_SERVICE}:${context.module}`);
}

/**
 * Log fields for a caught value
 */
export function errorMetadata(error: unknown): LogMetadata {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
