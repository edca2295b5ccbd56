import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  format?: LogFormat;
  /** Write records here instead of stdout; disables the pretty transport */
  destination?: pino.DestinationStream;
}

/**
 * Logger wrapper for the variable exporter
 */
export class Logger {
  private pino: pino.Logger;

  constructor(options: LoggerOptions = {}) {
    const { name = 'varexport', level = 'info', format = 'json', destination } = options;
    const base: pino.LoggerOptions = { name, level };

    if (destination) {
      this.pino = pino(base, destination);
    } else if (format === 'pretty') {
      this.pino = pino({
        ...base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      });
    } else {
      this.pino = pino(base);
    }
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return this.pino.isLevelEnabled(level);
  }

  debug(message: string, data?: unknown): void {
    if (data) {
      this.pino.debug(data, message);
    } else {
      this.pino.debug(message);
    }
  }

  info(message: string, data?: unknown): void {
    if (data) {
      this.pino.info(data, message);
    } else {
      this.pino.info(message);
    }
  }

  warn(message: string, data?: unknown): void {
    if (data instanceof Error) {
      this.pino.warn({ err: data }, message);
    } else if (data) {
      this.pino.warn(data, message);
    } else {
      this.pino.warn(message);
    }
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, message);
    } else if (error) {
      this.pino.error(error, message);
    } else {
      this.pino.error(message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({ level: 'silent' });
    child.pino = this.pino.child(bindings);
    return child;
  }
}

// Default logger instance
export const logger = new Logger();
