/**
 * Console logger for the CLI.
 *
 * Levels: debug < info < warn < error; LOG_LEVEL=silent turns it off.
 * Everything goes to stderr so stdout carries only command output.
 */

import type { Logger } from "@movecraft/engine";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ANSI color codes for terminal
const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
};

const LEVEL_STYLE: Record<Exclude<LogLevel, "silent">, { label: string; color: string }> = {
  debug: { label: "DEBUG", color: colors.magenta },
  info: { label: "INFO", color: colors.cyan },
  warn: { label: "WARN", color: colors.yellow },
  error: { label: "ERROR", color: colors.red },
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/** Unset or unknown values fall back to info. */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

function timestamp(): string {
  return new Date().toISOString().split("T")[1].slice(0, 12);
}

function formatData(data: unknown): string {
  if (typeof data === "string") return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  color?: boolean;
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVELS[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const color = options.color ?? Boolean(process.stderr.isTTY);
  const write = options.write ?? ((line: string) => console.error(line));

  const paint = (code: string, text: string) => (color ? `${code}${text}${colors.reset}` : text);

  const log =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, data?: unknown): void => {
      if (LEVELS[level] < threshold) return;
      const { label, color: code } = LEVEL_STYLE[level];
      const suffix = data !== undefined ? ` ${paint(colors.dim, formatData(data))}` : "";
      write(`${paint(colors.dim, timestamp())} ${paint(code, `[${label}]`)} ${message}${suffix}`);
    };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}
