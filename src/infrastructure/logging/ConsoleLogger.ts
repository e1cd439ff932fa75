import { LogContext, LoggerPort, LogLevel } from '../../application/ports/LoggerPort.js';

export type LogThreshold = LogLevel | 'silent';

const severity: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const isLogThreshold = (value: string): value is LogThreshold => value in severity;

const serializeError = (error: unknown): unknown =>
  error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : String(error);

/** One JSON object per line on stdout/stderr. */
export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly threshold: LogThreshold = 'info',
    private readonly bindings: LogContext = {},
  ) {}

  child(bindings: LogContext): ConsoleLogger {
    return new ConsoleLogger(this.threshold, { ...this.bindings, ...bindings });
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('error', message, error === undefined ? context : { ...context, error: serializeError(error) });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (severity[level] < severity[this.threshold]) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      message,
      ...this.bindings,
      ...context,
    });

    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }
}
