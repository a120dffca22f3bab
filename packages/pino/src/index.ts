export { PinoTraceSink, CONTEXT_KEY } from "./sink";
export { toPinoLevel } from "./levels";
export {
  createRootLogger,
  traceDestinations,
  contextRedaction,
  usesHumanFormat,
  isLocalPlatform,
} from "./logger";
export { readLogbindEnv } from "./env";
export type { LogbindConfig, PinoLevelName } from "./env";
export { createOTelStream, toOTelRecord } from "./otel-transport";
export { configureTracer } from "./configure";
