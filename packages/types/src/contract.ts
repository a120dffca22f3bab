import type { LogLevel } from "./level";

/**
 * Declared type of an operation parameter.
 *
 * - `string`, `number`, `boolean` and `bigint` are primitives: they are interpolated
 *   into the message and copied into the structured context.
 * - `error` marks the exception payload of a message operation.
 * - `value` is interpolated into the message only.
 */
export type ParameterKind = "string" | "number" | "boolean" | "bigint" | "error" | "value";

export type ParameterSpec<N extends string = string, K extends ParameterKind = ParameterKind> = {
  readonly name: N;
  readonly kind: K;
};

/** `message` fires a single record, `activity` returns a timed span. */
export type ReturnKind = "message" | "activity";

export type OperationSpec = {
  readonly name: string;
  /** Absent only in hand-written or deserialized specs; the compiler rejects it. */
  readonly level?: LogLevel;
  readonly template: string;
  readonly parameters: readonly ParameterSpec[];
  readonly returns: ReturnKind;
};

export type ContractSpec = {
  /** Logical owner of the operations, used in error reports and manifests. */
  readonly name: string;
  readonly operations: readonly OperationSpec[];
};
