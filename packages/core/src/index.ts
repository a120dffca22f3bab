// Declaration
export { param, op, defineContract, isContract, toContractSpec, CONTRACT_BRAND } from "./contract/define";
export type {
  Contract,
  OperationDecl,
  OperationMethod,
  ArgumentsOf,
  TraceOf,
  UntypedTrace,
} from "./contract/define";

// Compilation
export { validateTemplate } from "./template/validate";
export type { ValidatedTemplate } from "./template/validate";
export { classifyParameters, isContextKind } from "./template/classify";
export type { Classification } from "./template/classify";
export {
  formatRecord,
  renderValue,
  renderTemplate,
  buildContext,
  makeContext,
  toException,
} from "./template/format";
export { compileContract, CompiledContract, CompiledOperation } from "./contract/compile";
export { ContractRegistry } from "./contract/registry";
export type { ContractCompiler } from "./contract/registry";

// Activities
export { Activity, formatElapsed, systemClock } from "./activity/activity";
export type { RecordEmitter } from "./activity/activity";

// Tracer
export { Tracer, tracer } from "./tracer/tracer";
export type { TraceOwner, TracerOptions } from "./tracer/tracer";
export { BoundTrace } from "./tracer/bound-trace";
export { NOOP_SINK, noopSinkFactory, debugSinkFactory } from "./tracer/sinks";

// Levels
export { LOG_LEVELS, isLogLevel, compareLevels, isLevelEnabled } from "./levels";

// Errors
export {
  TraceError,
  ContractError,
  TemplateError,
  ClassificationError,
  FormatError,
} from "./errors/trace-errors";
export type { ContractSite } from "./errors/trace-errors";

// Testing
export { RecordingSink, ManualClock, createTestTracer } from "./testing/recording-sink";
export type { RecordedEntry, TestTracer } from "./testing/recording-sink";

export type {
  LogLevel,
  ParameterKind,
  ParameterSpec,
  ReturnKind,
  OperationSpec,
  ContractSpec,
  ContextValue,
  TraceContext,
  FormattedRecord,
  TraceSink,
  SinkFactory,
  Clock,
} from "@logbind/types";
