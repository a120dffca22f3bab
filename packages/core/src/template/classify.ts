import type { ParameterKind, ParameterSpec, ReturnKind } from "@logbind/types";
import { ClassificationError, ContractError, type ContractSite } from "../errors/trace-errors";

export type Classification = {
  /** Position of the exception payload, if the operation has one. */
  readonly exceptionIndex: number | undefined;
  /** Positions copied into the structured context, in declared order. */
  readonly contextIndices: readonly number[];
  /** Every position, all of which are available to the template. */
  readonly allIndices: readonly number[];
  readonly names: readonly string[];
};

const CONTEXT_KINDS: ReadonlySet<ParameterKind> = new Set(["string", "number", "boolean", "bigint"]);
const KNOWN_KINDS: ReadonlySet<string> = new Set<ParameterKind>([
  ...CONTEXT_KINDS,
  "error",
  "value",
]);

export function isContextKind(kind: ParameterKind): boolean {
  return CONTEXT_KINDS.has(kind);
}

export function classifyParameters(
  parameters: readonly ParameterSpec[],
  returns: ReturnKind,
  site: ContractSite,
): Classification {
  let exceptionIndex: number | undefined;
  const contextIndices: number[] = [];

  parameters.forEach((parameter, index) => {
    if (!KNOWN_KINDS.has(parameter.kind)) {
      throw new ContractError(
        `Parameter '${parameter.name}' has unsupported type '${String(parameter.kind)}'`,
        site,
      );
    }

    if (parameter.kind === "error") {
      if (returns === "activity") {
        throw new ClassificationError(
          `Exception parameter '${parameter.name}' is not allowed on a timed activity`,
          parameter.name,
          site,
        );
      }
      if (exceptionIndex !== undefined) {
        throw new ClassificationError(
          `Exception parameter '${parameter.name}' is a second exception payload; only one is allowed`,
          parameter.name,
          site,
        );
      }
      exceptionIndex = index;
    } else if (isContextKind(parameter.kind)) {
      contextIndices.push(index);
    }
  });

  return {
    exceptionIndex,
    contextIndices,
    allIndices: parameters.map((_, index) => index),
    names: parameters.map((parameter) => parameter.name),
  };
}
