import pino from 'pino';
import { type LogLevel, type LogConfig, getLogLevel, LOG_LEVEL_PRIORITY } from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'stream:manager') */
  name: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Custom log config (default: DEFAULT_LOG_CONFIG) */
  config?: LogConfig;
  /** Set false to drop everything (tests, embedded use) */
  enabled?: boolean;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger interface
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
}

/**
 * Wrap a pino instance in the Logger interface
 */
function wrap(instance: pino.Logger): Logger {
  function method(fn: pino.LogFn): LogMethod {
    return (obj, msg) => {
      if (typeof obj === 'string') {
        fn.call(instance, obj);
      } else {
        fn.call(instance, obj, msg);
      }
    };
  }

  return {
    trace: method(instance.trace),
    debug: method(instance.debug),
    info: method(instance.info),
    warn: method(instance.warn),
    error: method(instance.error),
    fatal: method(instance.fatal),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/**
 * Create a structured logger instance
 *
 * Console output with pino-pretty in development, JSON lines otherwise.
 * Child loggers carry their bindings on every line.
 *
 * @param options - Logger configuration options (or just a name string)
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions =
    typeof options === 'string' ? { name: options } : options;

  const level = opts.level || getLogLevel(opts.name, opts.config);
  const isDevelopment = process.env.NODE_ENV === 'development';

  const instance = pino({
    name: opts.name,
    level,
    enabled: opts.enabled ?? true,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return wrap(instance);
}

/**
 * Logger that drops every line
 */
export function createSilentLogger(name = 'silent'): Logger {
  return createLogger({ name, enabled: false });
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('streamgate');

// Re-export types for convenience
export type { LogLevel, LogConfig };
export { LOG_LEVEL_PRIORITY };
