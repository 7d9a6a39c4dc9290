/**
 * Structured logging.
 *
 * Every line goes to stderr: stdout carries the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

/**
 * Create a logger printing `[timestamp] LEVEL message {context}` lines.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info', sink: LogSink = (line) => console.error(line)): StructuredLogger {
  const minValue = LOG_LEVEL_VALUES[minLevel];

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_VALUES[level] < minValue) return;
    const timestamp = new Date().toISOString();
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    sink(`[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`);
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

export function createNullLogger(): StructuredLogger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  // The Diffusion client rejects with plain error reports, not Error instances.
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
