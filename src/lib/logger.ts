/**
 * Structured Logger
 * Writes one JSON line per entry to the console.
 */

const SENSITIVE_KEYS = [
  'authorization',
  'password',
  'pass',
  'token',
  'secret',
  'cookie',
  'key',
];

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((s) => lowerKey.includes(s));
}

/**
 * Recursively masks values stored under sensitive keys
 */
function sanitizeRecord(
  record: object,
  depth: number
): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    sanitized[key] = isSensitiveKey(key)
      ? '[REDACTED]'
      : sanitize(value, depth + 1);
  }
  return sanitized;
}

function sanitize(value: unknown, depth: number): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item, depth + 1));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    return sanitizeRecord(value, depth);
  }
  return value;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: unknown): void;
}

/**
 * Create a logger that drops entries below `minLevel`
 */
export function createLogger(minLevel: LogLevel = 'info'): Logger {
  function write(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (context !== undefined) {
      const { requestId, ...rest } = context;
      if (requestId !== undefined) {
        entry.requestId = requestId;
      }
      if (Object.keys(rest).length > 0) {
        entry.context = sanitizeRecord(rest, 0);
      }
    }

    if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message };
      if (error.stack !== undefined) {
        entry.error.stack = error.stack;
      }
    } else if (error !== undefined) {
      entry.error = { name: 'NonError', message: String(error) };
    }

    const line = JSON.stringify(entry);
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context, error) => write('error', message, context, error),
  };
}

export const logger = createLogger(
  process.env.LOG_LEVEL === 'debug' ? 'debug' : 'info'
);
