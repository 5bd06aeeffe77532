/**
 * Logging for the ex command core.
 *
 * Level selection, in priority order:
 * 1. VIM_EX_LOG_LEVEL env var (error|warn|info|debug)
 * 2. VIM_EX_DEBUG=1 → debug
 * 3. warn
 *
 * Use log.setLevel() to override programmatically.
 */

import chalk from "chalk";
import { readEnvConfig, type LogLevel } from "./config";

export type { LogLevel };

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  setLevel: (level: LogLevel) => void;
  getLevel: () => LogLevel;
  isDebugMode: () => boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const PREFIX = "[VimEngine]";

function getDefaultLogLevel(): LogLevel {
  const env = readEnvConfig();
  if (env.logLevel) {
    return env.logLevel;
  }
  return env.debug ? "debug" : "warn";
}

let currentLogLevel: LogLevel = getDefaultLogLevel();

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLogLevel];
}

function supportsColor(): boolean {
  return process.stderr.isTTY ?? false;
}

function formatPrefix(level: LogLevel): string {
  const tag = level.toUpperCase();
  if (!supportsColor()) {
    return `${PREFIX} ${tag}`;
  }

  switch (level) {
    case "error":
      return `${chalk.dim(PREFIX)} ${chalk.red(tag)}`;
    case "warn":
      return `${chalk.dim(PREFIX)} ${chalk.yellow(tag)}`;
    case "debug":
      return `${chalk.dim(PREFIX)} ${chalk.gray(tag)}`;
    default:
      return `${chalk.dim(PREFIX)} ${chalk.cyan(tag)}`;
  }
}

function isBrokenPipe(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EPIPE";
}

function write(level: LogLevel, args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }

  const prefix = formatPrefix(level);
  try {
    if (level === "error") {
      console.error(prefix, ...args);
    } else if (level === "warn") {
      console.warn(prefix, ...args);
    } else if (level === "info") {
      console.info(prefix, ...args);
    } else {
      console.debug(prefix, ...args);
    }
  } catch (error) {
    // The reader of a piped stderr went away; nothing left to tell.
    if (isBrokenPipe(error)) {
      return;
    }
    throw error;
  }
}

export const log: Logger = {
  error: (...args) => write("error", args),
  warn: (...args) => write("warn", args),
  info: (...args) => write("info", args),
  debug: (...args) => write("debug", args),
  setLevel: (level) => {
    currentLogLevel = level;
  },
  getLevel: () => currentLogLevel,
  isDebugMode: () => currentLogLevel === "debug",
};
