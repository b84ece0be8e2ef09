/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level priority (lower number = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'stream:manager', 'stream:heartbeat'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
}

/**
 * Default log configuration
 *
 * Dispatch logging is per-frame and stays quiet unless asked for.
 * To debug, set LOG_LEVEL=debug or LOG_LEVEL_STREAM_DISPATCH=trace env var
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    // Connection lifecycle (standard level)
    stream: 'info',
    'stream:manager': 'info',
    'stream:heartbeat': 'info',
    'stream:credentials': 'info',

    // Per-frame paths (warn-only, high message volume)
    'stream:dispatch': 'warn',
    'stream:transport': 'warn',

    // Venue clients (standard level)
    binance: 'info',
    bybit: 'info',
    hyperliquid: 'info',

    // Apps
    tap: 'info',
  },
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_STREAM_MANAGER=trace)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config
 * 4. Parent service config (e.g., 'stream' for 'stream:manager')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = process.env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  const globalEnvLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = getServiceFromName(serviceName);
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Check if a log level should be logged given the minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}
