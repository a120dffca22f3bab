import type { LogLevel } from "./level";
import type { TraceContext } from "./record";

/** Backend that persists or forwards a formatted record. */
export interface TraceSink {
  emit(
    loggerName: string,
    level: LogLevel,
    message: string,
    context: TraceContext,
    exception?: Error,
  ): void;
}

/** Creates the sink a bound contract writes to, given its owner name. */
export type SinkFactory = (ownerName: string) => TraceSink;

/** Monotonic milliseconds, used to time activities. */
export type Clock = () => number;
