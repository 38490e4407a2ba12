import type { LogLevel } from "./logger";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export function parseLogLevel(value: string, fallback: LogLevel = "info"): LogLevel {
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export const env = {
  LOG_LEVEL: parseLogLevel(optional("SCREENFLOW_LOG_LEVEL", "info")),
} as const;
