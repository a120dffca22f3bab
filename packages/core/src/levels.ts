import type { LogLevel } from "@logbind/types";

/** Every level, in ascending order of severity. */
export const LOG_LEVELS: readonly LogLevel[] = ["none", "debug", "info", "warning", "error"];

const RANK: Record<LogLevel, number> = {
  none: 0,
  debug: 1,
  info: 2,
  warning: 3,
  error: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(RANK, value);
}

export function compareLevels(a: LogLevel, b: LogLevel): number {
  return RANK[a] - RANK[b];
}

/**
 * Whether a record at `level` passes a `minimum` threshold.
 * `none` never passes, and a `none` threshold lets nothing through.
 */
export function isLevelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  if (level === "none" || minimum === "none") return false;
  return RANK[level] >= RANK[minimum];
}
