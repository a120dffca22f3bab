export type PinoLevelName = "debug" | "info" | "warn" | "error";

export type LogbindConfig = {
  enabled: boolean;
  logLevel: PinoLevelName;
  logFormat: "json" | "human" | "auto";
  logFilePath: string | null;
  otelLogsEnabled: boolean;
  redactKeys: string[];
};

const VALID_LOG_LEVELS = new Set<string>(["debug", "info", "warn", "error"]);
const VALID_LOG_FORMATS = new Set<string>(["json", "human", "auto"]);

function isPinoLevelName(value: string | undefined): value is PinoLevelName {
  return value !== undefined && VALID_LOG_LEVELS.has(value);
}

function isLogFormat(value: string | undefined): value is LogbindConfig["logFormat"] {
  return value !== undefined && VALID_LOG_FORMATS.has(value);
}

export function readLogbindEnv(): LogbindConfig {
  const rawLevel = process.env.LOGBIND_LOG_LEVEL;
  const rawFormat = process.env.LOGBIND_LOG_FORMAT;
  const rawRedact = process.env.LOGBIND_LOG_REDACT_KEYS;

  return {
    enabled: process.env.LOGBIND_ENABLED !== "false",
    logLevel: isPinoLevelName(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: process.env.LOGBIND_LOG_FILE_PATH || null,
    otelLogsEnabled: process.env.LOGBIND_OTEL_LOGS_ENABLED === "true",
    redactKeys: rawRedact
      ? rawRedact
          .split(",")
          .map((k) => k.trim())
          .filter(Boolean)
      : [],
  };
}
