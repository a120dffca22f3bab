export { parseArgs } from "./check/args";
export type { CliArgs } from "./check/args";
export { findContracts } from "./check/discovery";
export { parseContractFile } from "./check/spec-file";
export { loadContracts, loadModuleContracts, loadSpecFileContracts } from "./check/load";
export { checkContracts, MANIFEST_VERSION } from "./check/manifest";
export type {
  ContractSource,
  ContractManifest,
  ContractEntry,
  OperationEntry,
  ParameterEntry,
  ContractDiagnostic,
} from "./check/types";
