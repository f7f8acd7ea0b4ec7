/**
 * Log levels understood by the backend, ordered from most to least severe.
 * Mirrors winston's npm levels without `silly`.
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  HTTP = 'http',
  VERBOSE = 'verbose',
  DEBUG = 'debug',
}

export const LOG_LEVEL_PRIORITIES: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.HTTP]: 3,
  [LogLevel.VERBOSE]: 4,
  [LogLevel.DEBUG]: 5,
};

const LEVEL_ALIASES = new Map<string, LogLevel>([
  ['warning', LogLevel.WARN],
  ['critical', LogLevel.ERROR],
  ['fatal', LogLevel.ERROR],
]);

/**
 * Parse a level written by an operator ("INFO", "warning", "debug").
 * Returns undefined for anything that is not a known level.
 */
export function parseLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  return (
    LEVEL_ALIASES.get(normalized) ??
    Object.values(LogLevel).find((level) => level === normalized)
  );
}

/**
 * Format templates generated from the registered log contexts.
 */
export enum LogFormatType {
  STANDARD = 'STANDARD',
  ACCESS = 'ACCESS',
}

/**
 * Error codes raised while assembling the logging setup.
 * All of them surface during bootstrap; none is raised per request.
 */
export enum LogContextErrorCode {
  INVALID_CONFIG_FILE = 'INVALID_CONFIG_FILE',
  INVALID_LOG_CONFIG = 'INVALID_LOG_CONFIG',
  INVALID_SETTINGS = 'INVALID_SETTINGS',
  BUILTIN_NOT_FOUND = 'BUILTIN_NOT_FOUND',
  BUILTIN_AMBIGUOUS = 'BUILTIN_AMBIGUOUS',
}

/** Loggers of the host framework itself */
export const FRAMEWORK_LOGGER = 'nest';
export const FRAMEWORK_ERROR_LOGGER = 'nest.error';
export const FRAMEWORK_ACCESS_LOGGER = 'nest.access';
