/**
 * Newswire Relay — Logger
 *
 * Levelled structured logging with per-component child loggers.
 * JSON lines in production, one readable line per entry otherwise.
 * Context values under credential-like keys are masked before output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(defaultContext: LogContext): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CREDENTIAL_KEY = /token|secret|password|credential|api_?key|authorization/i;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function thresholdFromEnv(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(configured) ? LOG_LEVELS[configured] : LOG_LEVELS.info;
}

const threshold = thresholdFromEnv();

// ============================================================
// SECRETS
// ============================================================

/**
 * Mask a credential down to its last four characters.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 4) return '****';
  return `****${secret.slice(-4)}`;
}

/**
 * Copy of a context with credential-like string values masked and errors
 * reduced to their message.
 */
export function redactContext(context: LogContext): LogContext {
  const redacted: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'string' && CREDENTIAL_KEY.test(key)) {
      redacted[key] = maskSecret(value);
    } else if (value instanceof Error) {
      redacted[key] = value.message;
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

// ============================================================
// OUTPUT
// ============================================================

export function formatEntry(entry: LogEntry, json = process.env.NODE_ENV === 'production'): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;
  let output = `${time} ${level.toUpperCase().padEnd(5)} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < threshold) return;

  const formatted = formatEntry({
    timestamp: new Date().toISOString(),
    level,
    message,
    context: context ? redactContext(context) : undefined,
  });

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export function createLogger(defaultContext: LogContext = {}): Logger {
  const hasDefaults = Object.keys(defaultContext).length > 0;
  const merge = (context?: LogContext): LogContext | undefined =>
    hasDefaults ? { ...defaultContext, ...context } : context;

  return {
    debug: (message, context) => write('debug', message, merge(context)),
    info: (message, context) => write('info', message, merge(context)),
    warn: (message, context) => write('warn', message, merge(context)),
    error: (message, context) => write('error', message, merge(context)),
    child: childContext => createLogger({ ...defaultContext, ...childContext }),
  };
}

export const logger: Logger = createLogger({ service: 'newswire-relay' });

// ============================================================
// HELPERS
// ============================================================

/**
 * Render an error for a log context.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run an async operation and log its duration at debug level.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<T> {
  const start = performance.now();
  try {
    return await operation();
  } finally {
    log.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}
