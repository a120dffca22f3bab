import createDebug from "debug";
import type { SinkFactory, TraceSink } from "@logbind/types";

export const NOOP_SINK: TraceSink = {
  emit() {},
};

export const noopSinkFactory: SinkFactory = () => NOOP_SINK;

/**
 * Fallback used until a real backend is configured: writes through `debug`
 * under `logbind:trace:<owner>`, so output appears only when that namespace is enabled.
 */
export const debugSinkFactory: SinkFactory = (ownerName) => {
  const log = createDebug(`logbind:trace:${ownerName}`);
  return {
    emit(_loggerName, level, message, context, exception) {
      if (exception) log("%s %s %o %O", level, message, context, exception);
      else log("%s %s %o", level, message, context);
    },
  };
};
