/**
 * Leveled structured logging with redaction of credentials in metadata.
 * @module
 */

/** Log levels, from most to least verbose. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured metadata attached to a log line. */
export type LogMetadata = Record<string, unknown>;

/** Logger accepted by the client. */
export interface Logger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata): void;
}

/** Receives every formatted line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

/** Options for {@link createLogger}. */
export interface LoggerOptions {
  /** Prefix identifying the component, rendered as `[name]`. */
  name?: string;
  /**
   * Lowest level that is written.
   * @default 'info'
   */
  level?: LogLevel;
  /** Destination of the formatted lines. Defaults to the console. */
  sink?: LogSink;
  /** Clock used for timestamps. */
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Keys whose values never reach the sink, compared case-insensitively. */
const SENSITIVE_KEYS = new Set([
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'password',
  'token',
  'apikey',
  'api_key',
  'secret',
]);

const REDACTED = '[REDACTED]';

/**
 * Deep copy of `value` with sensitive keys replaced by `[REDACTED]`.
 * `Headers` instances are redacted as plain objects.
 */
export function redact(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redact(item, seen));
  }

  const entries = value instanceof Headers ? [...value.entries()] : Object.entries(value);
  const redacted: Record<string, unknown> = {};
  for (const [key, val] of entries) {
    redacted[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redact(val, seen);
  }

  return redacted;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'warn' || level === 'error') {
    console.error(line);
    return;
  }

  console.log(line);
};

/**
 * Creates a logger writing lines shaped as
 * `[2024-01-01T00:00:00.000Z] [INFO] [name] message {"meta":"json"}`.
 */
export function createLogger({ name, level = 'info', sink = consoleSink, now = () => new Date() }: LoggerOptions = {}): Logger {
  const prefix = name ? ` [${name}]` : '';
  const threshold = LEVEL_ORDER[level];

  const write = (lineLevel: LogLevel, message: string, meta?: LogMetadata) => {
    if (LEVEL_ORDER[lineLevel] < threshold) {
      return;
    }

    let line = `[${now().toISOString()}] [${lineLevel.toUpperCase()}]${prefix} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(redact(meta))}`;
    }

    sink(lineLevel, line);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

/** Logger that discards everything; the client's default. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
