export type { LogLevel } from "./level";

export type {
  ParameterKind,
  ParameterSpec,
  ReturnKind,
  OperationSpec,
  ContractSpec,
} from "./contract";

export type { ContextValue, TraceContext, FormattedRecord } from "./record";

export type { TraceSink, SinkFactory, Clock } from "./sink";
