import type pino from "pino";
import type { LogLevel, SinkFactory, TraceContext, TraceSink } from "@logbind/types";
import { toPinoLevel } from "./levels";
import type { PinoLevelName } from "./env";

/** Record key the trace context is nested under, clear of pino's own fields. */
export const CONTEXT_KEY = "context";

type TraceFields = { [CONTEXT_KEY]?: TraceContext; err?: Error };

/**
 * Writes trace records to pino. Each owner gets a child logger carrying its
 * name; the context goes under `context` and the exception under pino's
 * standard `err` key, so parameter names never shadow `name`, `level` or `msg`.
 */
export class PinoTraceSink implements TraceSink {
  private children = new Map<string, pino.Logger>();

  constructor(private rootLogger: pino.Logger) {}

  emit(
    loggerName: string,
    level: LogLevel,
    message: string,
    context: TraceContext,
    exception?: Error,
  ): void {
    const pinoLevel = toPinoLevel(level);
    if (pinoLevel === "silent") return;

    const fields: TraceFields = {};
    // Copied: redaction rewrites fields in place.
    if (Object.keys(context).length > 0) fields[CONTEXT_KEY] = { ...context };
    if (exception) fields.err = exception;

    const logger = this.loggerFor(loggerName);
    logger[pinoLevel](fields, message);
  }

  /** Update the minimum level at runtime, for the root and every owner. */
  setLevel(level: PinoLevelName): void {
    this.rootLogger.level = level;
    for (const child of this.children.values()) child.level = level;
  }

  factory(): SinkFactory {
    return () => this;
  }

  private loggerFor(name: string): pino.Logger {
    let child = this.children.get(name);
    if (!child) {
      child = this.rootLogger.child({ name });
      this.children.set(name, child);
    }
    return child;
  }
}
