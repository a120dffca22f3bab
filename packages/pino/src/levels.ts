import type { LogLevel } from "@logbind/types";
import type pino from "pino";

const PINO_LEVELS: Record<LogLevel, pino.LevelWithSilent> = {
  none: "silent",
  debug: "debug",
  info: "info",
  warning: "warn",
  error: "error",
};

/** Maps a trace level onto pino's scale. `none` maps to `silent`, which never writes. */
export function toPinoLevel(level: LogLevel): pino.LevelWithSilent {
  return PINO_LEVELS[level];
}
