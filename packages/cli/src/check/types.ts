import type { ContractSpec, LogLevel, ParameterKind, ReturnKind } from "@logbind/types";

/** A contract found in a module export or a JSON contract file. */
export type ContractSource = {
  spec: ContractSpec;
  source: string;
  exportName?: string;
};

export type ParameterEntry = {
  name: string;
  kind: ParameterKind;
  position: number;
  inContext: boolean;
  isException: boolean;
};

export type OperationEntry = {
  name: string;
  level: LogLevel;
  returns: ReturnKind;
  template: string;
  positionalTemplate: string;
  parameters: ParameterEntry[];
};

export type ContractEntry = {
  name: string;
  source: string;
  exportName?: string;
  operations: OperationEntry[];
};

export type ContractDiagnostic = {
  contract: string;
  source: string;
  operation?: string;
  /** Error class name, e.g. `TemplateError`. */
  error: string;
  message: string;
};

export type ContractManifest = {
  version: "1.0.0";
  contracts: ContractEntry[];
  errors: ContractDiagnostic[];
};
