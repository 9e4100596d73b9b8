import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.NAMEGEN_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return DEFAULT_LOG_LEVEL;
}

/**
 * Scoped console logger. Every line is prefixed with `[scope]`; lines below
 * the level taken from `NAMEGEN_LOG_LEVEL` are dropped.
 */
export function createLogger(scope: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const threshold = LEVEL_ORDER[resolveLogLevel(env)];
  const prefix = `[${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.error(chalk.dim(`${prefix} ${message}`), ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.error(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(chalk.yellow(`${prefix} ${message}`), ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(chalk.red(`${prefix} ${message}`), ...details);
    },
  };
}
