/**
 * Signal Digest — Logger
 *
 * Structured logging. JSON lines in production, one readable line per
 * entry otherwise. Components take a child logger carrying their context.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function resolveThreshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  if (configured === 'silent') return Number.POSITIVE_INFINITY;
  return isLogLevel(configured) ? LOG_LEVELS[configured] : LOG_LEVELS.info;
}

const threshold = resolveThreshold();

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
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
    context,
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

function createLogger(baseContext: LogContext = {}): Logger {
  const merge = (context?: LogContext): LogContext | undefined => {
    if (Object.keys(baseContext).length === 0) return context;
    return { ...baseContext, ...context };
  };

  return {
    debug: (message, context) => write('debug', message, merge(context)),
    info: (message, context) => write('info', message, merge(context)),
    warn: (message, context) => write('warn', message, merge(context)),
    error: (message, context) => write('error', message, merge(context)),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

export const logger: Logger = createLogger();

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
