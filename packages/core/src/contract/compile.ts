import createDebug from "debug";
import type { ContractSpec, FormattedRecord, LogLevel, OperationSpec, ReturnKind } from "@logbind/types";
import { Activity } from "../activity/activity";
import { ContractError, type ContractSite } from "../errors/trace-errors";
import { isLogLevel } from "../levels";
import { classifyParameters, type Classification } from "../template/classify";
import { formatRecord } from "../template/format";
import { validateTemplate, type ValidatedTemplate } from "../template/validate";
import type { BoundTrace } from "../tracer/bound-trace";
import type { UntypedTrace } from "./define";

const debug = createDebug("logbind:core:compile");

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function isIdentifier(name: unknown): name is string {
  return typeof name === "string" && IDENTIFIER.test(name);
}

// Raw specs are checked at run time whatever their static type says.
function isList(value: unknown): boolean {
  return Array.isArray(value);
}

const RETURN_KINDS: ReadonlySet<string> = new Set<ReturnKind>(["message", "activity"]);

export class CompiledOperation {
  constructor(
    readonly name: string,
    readonly level: LogLevel,
    readonly returns: ReturnKind,
    readonly template: ValidatedTemplate,
    readonly classification: Classification,
  ) {}

  format(values: readonly unknown[]): FormattedRecord {
    return formatRecord(this.template, values, this.classification, this.level, this.name);
  }

  /** The method a bound implementation exposes for this operation. */
  dispatcher(trace: BoundTrace): (...args: unknown[]) => Activity | void {
    if (this.returns === "activity") {
      return (...args) => {
        const record = this.format(args);
        return Activity.start(record.message, record.context, record.level, trace, trace.clock);
      };
    }
    return (...args) => {
      trace.emit(this.format(args));
    };
  }
}

/** A contract's dispatch table, shared by every owner the contract is bound to. */
export class CompiledContract {
  constructor(
    readonly spec: ContractSpec,
    private readonly operations: ReadonlyMap<string, CompiledOperation>,
  ) {}

  get name(): string {
    return this.spec.name;
  }

  get operationNames(): string[] {
    return [...this.operations.keys()];
  }

  operation(name: string): CompiledOperation | undefined {
    return this.operations.get(name);
  }

  instantiate(trace: BoundTrace): UntypedTrace {
    const methods = [...this.operations.values()].map(
      (operation) => [operation.name, operation.dispatcher(trace)] as const,
    );
    return Object.freeze(Object.fromEntries(methods));
  }
}

function compileOperation(operation: OperationSpec, contract: string): CompiledOperation {
  const site: ContractSite = { contract, operation: operation.name };

  if (!isLogLevel(operation.level)) {
    throw new ContractError(
      operation.level === undefined
        ? "Operation must declare a log level"
        : `Unknown log level '${String(operation.level)}'`,
      site,
    );
  }
  if (!RETURN_KINDS.has(operation.returns)) {
    throw new ContractError(
      `Return type '${String(operation.returns)}' not supported, expected message or activity`,
      site,
    );
  }
  if (typeof operation.template !== "string") {
    throw new ContractError("Operation template must be a string", site);
  }
  if (!isList(operation.parameters)) {
    throw new ContractError("Operation parameters must be a list", site);
  }
  for (const parameter of operation.parameters) {
    if (!isIdentifier(parameter.name)) {
      throw new ContractError(`Parameter name '${String(parameter.name)}' is not an identifier`, site);
    }
  }

  const names = operation.parameters.map((parameter) => parameter.name);
  const template = validateTemplate(operation.template, names, site);
  const classification = classifyParameters(operation.parameters, operation.returns, site);

  return new CompiledOperation(
    operation.name,
    operation.level,
    operation.returns,
    template,
    classification,
  );
}

/**
 * Validates every operation of a contract and builds its dispatch table.
 * Throws on the first invalid operation; nothing is returned for a partly valid contract.
 */
export function compileContract(spec: ContractSpec): CompiledContract {
  if (typeof spec.name !== "string" || spec.name.length === 0) {
    throw new ContractError("Contract must have a name", { contract: "<anonymous>" });
  }

  if (!isList(spec.operations)) {
    throw new ContractError("Contract operations must be a list", { contract: spec.name });
  }

  const operations = new Map<string, CompiledOperation>();
  for (const operation of spec.operations) {
    if (!isIdentifier(operation.name)) {
      throw new ContractError(`Operation name '${String(operation.name)}' is not an identifier`, {
        contract: spec.name,
      });
    }
    if (operations.has(operation.name)) {
      throw new ContractError("Duplicate operation name", {
        contract: spec.name,
        operation: operation.name,
      });
    }
    operations.set(operation.name, compileOperation(operation, spec.name));
  }

  debug("compiled %s (%d operations)", spec.name, operations.size);
  return new CompiledContract(spec, operations);
}
