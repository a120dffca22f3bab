import { ContractError, compileContract, type CompiledContract } from "@logbind/core";
import type { ContractSpec } from "@logbind/types";
import type {
  ContractDiagnostic,
  ContractEntry,
  ContractManifest,
  ContractSource,
  OperationEntry,
} from "./types";

export const MANIFEST_VERSION = "1.0.0";

function serializeOperations(compiled: CompiledContract, spec: ContractSpec): OperationEntry[] {
  const entries: OperationEntry[] = [];
  for (const declared of spec.operations) {
    const operation = compiled.operation(declared.name);
    if (!operation) continue;

    const { exceptionIndex, contextIndices } = operation.classification;
    entries.push({
      name: operation.name,
      level: operation.level,
      returns: operation.returns,
      template: operation.template.source,
      positionalTemplate: operation.template.positional,
      parameters: declared.parameters.map((parameter, position) => ({
        name: parameter.name,
        kind: parameter.kind,
        position,
        inContext: contextIndices.includes(position),
        isException: exceptionIndex === position,
      })),
    });
  }
  return entries;
}

function toDiagnostic(error: unknown, source: ContractSource): ContractDiagnostic {
  const contract = source.spec.name || "<anonymous>";
  if (error instanceof ContractError) {
    return {
      contract,
      source: source.source,
      ...(error.operation !== undefined && { operation: error.operation }),
      error: error.name,
      message: error.message,
    };
  }
  return {
    contract,
    source: source.source,
    error: error instanceof Error ? error.name : "Error",
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Compiles each contract on its own and reports what it declares.
 * A contract that fails to compile is listed under `errors` and nowhere else.
 */
export function checkContracts(sources: readonly ContractSource[]): ContractManifest {
  const contracts: ContractEntry[] = [];
  const errors: ContractDiagnostic[] = [];

  for (const source of sources) {
    let compiled: CompiledContract;
    try {
      compiled = compileContract(source.spec);
    } catch (error) {
      errors.push(toDiagnostic(error, source));
      continue;
    }

    contracts.push({
      name: compiled.name,
      source: source.source,
      ...(source.exportName !== undefined && { exportName: source.exportName }),
      operations: serializeOperations(compiled, source.spec),
    });
  }

  return { version: MANIFEST_VERSION, contracts, errors };
}
