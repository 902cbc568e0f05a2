/**
 * Leveled console logger
 * Everything goes to stderr so CLI output on stdout stays clean
 */

const LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
} as const;

export type LogLevel = keyof typeof LEVELS;

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function createLogger(scope: string, level: LogLevel = "warn"): Logger {
  const prefix = `[tempdeck:${scope}]`;
  const enabled = (msgLevel: Exclude<LogLevel, "silent">) => LEVELS[msgLevel] >= LEVELS[level];

  return {
    debug: (...args) => {
      if (enabled("debug")) console.error(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.error(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}

/**
 * Logger that drops everything (tests, embedding)
 */
export const silentLogger: Logger = createLogger("silent", "silent");
