import createDebug from "debug";
import { tracer as processTracer, type Tracer } from "@logbind/core";
import { readLogbindEnv, type LogbindConfig } from "./env";
import { createRootLogger, usesHumanFormat } from "./logger";
import { PinoTraceSink } from "./sink";

const debug = createDebug("logbind:pino");

/**
 * Points a tracer (the process-wide one by default) at pino, or disables it
 * when `LOGBIND_ENABLED=false`. Returns the sink, or null when disabled.
 */
export function configureTracer(
  target: Tracer = processTracer,
  config: LogbindConfig = readLogbindEnv(),
): PinoTraceSink | null {
  if (!config.enabled) {
    debug("configureTracer: disabled");
    target.disable();
    return null;
  }

  debug(
    "configureTracer: level=%s human=%s file=%s otel=%s",
    config.logLevel,
    usesHumanFormat(config),
    config.logFilePath ?? "-",
    config.otelLogsEnabled,
  );
  const sink = new PinoTraceSink(createRootLogger(config));
  target.init(sink.factory());
  return sink;
}
