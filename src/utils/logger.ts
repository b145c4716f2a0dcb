export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void;
  /** Same sink and level, different tag. */
  child(tag: string): Logger;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const lower = value?.toLowerCase();
  if (lower === 'debug' || lower === 'info' || lower === 'warn' || lower === 'error') {
    return lower;
  }
  return 'info';
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatLine(tag: string, message: string, metadata?: Record<string, unknown>): string {
  const meta = metadata && Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `[${tag}] ${message}${meta}`;
}

/**
 * Console-backed logger writing `[Tag] message {metadata}` lines.
 */
export function createLogger(tag: string, level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const enabled = (wanted: LogLevel) => LEVEL_ORDER[wanted] >= LEVEL_ORDER[level];

  return {
    debug(message, metadata) {
      if (enabled('debug')) console.log(formatLine(tag, message, metadata));
    },
    info(message, metadata) {
      if (enabled('info')) console.log(formatLine(tag, message, metadata));
    },
    warn(message, metadata) {
      if (enabled('warn')) console.warn(formatLine(tag, message, metadata));
    },
    error(message, error, metadata) {
      if (!enabled('error')) return;
      const detail = error === undefined ? '' : `: ${describeError(error)}`;
      console.error(formatLine(tag, `${message}${detail}`, metadata));
    },
    child(childTag) {
      return createLogger(childTag, level);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
