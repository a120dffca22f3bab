import pino from "pino";
import type { LogbindConfig } from "./env";
import { createOTelStream } from "./otel-transport";
import { CONTEXT_KEY } from "./sink";

export function isLocalPlatform(): boolean {
  const platform = process.env.LOGBIND_PLATFORM;
  return !platform || platform === "local";
}

export function usesHumanFormat(config: LogbindConfig): boolean {
  return config.logFormat === "human" || (config.logFormat === "auto" && isLocalPlatform());
}

/** Redaction for the named context fields of every trace record. */
export function contextRedaction(keys: readonly string[]): pino.LoggerOptions["redact"] {
  if (keys.length === 0) return undefined;
  return { paths: keys.map((key) => `${CONTEXT_KEY}.${key}`), censor: "[REDACTED]" };
}

function consoleDestination(config: LogbindConfig): pino.DestinationStream {
  if (!usesHumanFormat(config)) return pino.destination(1);
  // Worker-thread transport; prints `[owner] message` with the context below it.
  return pino.transport({
    target: "pino-pretty",
    options: { destination: 1, messageFormat: "[{name}] {msg}", ignore: "pid,hostname,name" },
  });
}

/** The console, then the optional file and OTel Logs bridge, all at the configured level. */
export function traceDestinations(config: LogbindConfig): pino.StreamEntry[] {
  const destinations = [consoleDestination(config)];
  if (config.logFilePath) destinations.push(pino.destination(config.logFilePath));
  if (config.otelLogsEnabled) destinations.push(createOTelStream());

  return destinations.map((stream) => ({ level: config.logLevel, stream }));
}

/**
 * Creates the root pino logger trace records are written to. Owners get
 * child loggers of it, see {@link PinoTraceSink}.
 */
export function createRootLogger(config: LogbindConfig): pino.Logger {
  return pino(
    {
      level: config.logLevel,
      redact: contextRedaction(config.redactKeys),
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(traceDestinations(config)),
  );
}
