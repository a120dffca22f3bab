import type { LogLevel } from "./level";

export type ContextValue = string | number | boolean | bigint;

/** Structured key/value fields attached to a record. */
export type TraceContext = Readonly<Record<string, ContextValue>>;

export type FormattedRecord = {
  readonly message: string;
  readonly context: TraceContext;
  readonly level: LogLevel;
  readonly exception?: Error;
};
