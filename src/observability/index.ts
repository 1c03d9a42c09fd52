/**
 * Observability Module
 *
 * Structured JSON logging and metrics hooks shared by every module.
 * Each log line is a single JSON object carrying level, module, message,
 * the caller's context and a timestamp.
 */

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Create a console logger that writes one JSON line per entry
 *
 * @param module - Module name stamped on every line
 * @param level - Minimum level to emit (defaults to LOG_LEVEL, then info)
 */
export function createLogger(module: string, level?: LogLevel): Logger {
  const threshold = LEVEL_ORDER[resolveLevel(level)];

  const write = (
    entryLevel: Exclude<LogLevel, 'silent'>,
    sink: (line: string) => void,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    sink(JSON.stringify({ level: entryLevel, module, message, ...context, timestamp: new Date().toISOString() }));
  };

  return {
    info: (message, context) => write('info', console.log, message, context),
    warn: (message, context) => write('warn', console.warn, message, context),
    error: (message, context) => write('error', console.error, message, context),
    debug: (message, context) => write('debug', console.debug, message, context),
  };
}

/**
 * Default no-op metrics implementation
 */
export const noopMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};

/**
 * Logger and metrics pair accepted by every module
 */
export interface Observability {
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Normalize an unknown thrown value into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
