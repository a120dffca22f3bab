import type {
  ContractSpec,
  LogLevel,
  OperationSpec,
  ParameterKind,
  ParameterSpec,
  ReturnKind,
} from "@logbind/types";
import type { Activity } from "../activity/activity";

type KindTypes = {
  string: string;
  number: number;
  boolean: boolean;
  bigint: bigint;
  error: Error;
  value: unknown;
};

/** Argument tuple a bound method accepts for a parameter list. */
export type ArgumentsOf<P extends readonly ParameterSpec[]> = {
  -readonly [I in keyof P]: P[I] extends ParameterSpec<string, infer K> ? KindTypes[K] : never;
};

export type OperationDecl<
  P extends readonly ParameterSpec[] = readonly ParameterSpec[],
  R extends ReturnKind = ReturnKind,
> = {
  readonly level: LogLevel;
  readonly template: string;
  readonly parameters: P;
  readonly returns: R;
};

export type OperationMethod<D> =
  D extends OperationDecl<infer P extends readonly ParameterSpec[], infer R>
    ? (...args: ArgumentsOf<P>) => R extends "activity" ? Activity : void
    : never;

export const CONTRACT_BRAND: unique symbol = Symbol.for("logbind.contract");

export type Contract<O extends Record<string, OperationDecl> = Record<string, OperationDecl>> = {
  readonly [CONTRACT_BRAND]: true;
  readonly spec: ContractSpec;
  readonly operations: O;
};

/** The implementation type `tracer.bind` returns for a contract. */
export type TraceOf<C> =
  C extends Contract<infer O> ? { readonly [K in keyof O]: OperationMethod<O[K]> } : never;

/** Implementation of a contract known only as data. */
export type UntypedTrace = Readonly<Record<string, (...args: unknown[]) => Activity | void>>;

function parameter<K extends ParameterKind>(kind: K) {
  return <const N extends string>(name: N): ParameterSpec<N, K> => ({ name, kind });
}

export const param = {
  string: parameter("string"),
  number: parameter("number"),
  boolean: parameter("boolean"),
  bigint: parameter("bigint"),
  /** The exception payload; at most one per message operation, none on activities. */
  error: parameter("error"),
  /** Rendered into the message only, never into the context. */
  value: parameter("value"),
};

function message(level: LogLevel) {
  return <const P extends readonly ParameterSpec[]>(
    template: string,
    ...parameters: P
  ): OperationDecl<P, "message"> => ({ level, template, parameters, returns: "message" });
}

export const op = {
  debug: message("debug"),
  info: message("info"),
  warning: message("warning"),
  error: message("error"),
  /** Declares an operation that never emits. */
  ignore: <const P extends readonly ParameterSpec[]>(
    template = "ignored",
    ...parameters: P
  ): OperationDecl<P, "message"> => ({ level: "none", template, parameters, returns: "message" }),
  /** Turns a message operation into a timed activity. */
  timed: <P extends readonly ParameterSpec[]>(
    decl: OperationDecl<P, "message">,
  ): OperationDecl<P, "activity"> => ({ ...decl, returns: "activity" }),
};

/**
 * Declares a trace contract. Operations keep the order of the object's keys.
 *
 * @example
 * const CheckoutTrace = defineContract("CheckoutTrace", {
 *   orderPlaced: op.info("Order {orderId} placed", param.number("orderId")),
 *   settle: op.timed(op.debug("Settling {batch}", param.string("batch"))),
 * });
 */
export function defineContract<const O extends Record<string, OperationDecl>>(
  name: string,
  operations: O,
): Contract<O> {
  const specs: OperationSpec[] = Object.entries(operations).map(([operationName, decl]) => ({
    name: operationName,
    level: decl.level,
    template: decl.template,
    parameters: decl.parameters,
    returns: decl.returns,
  }));

  return Object.freeze({
    [CONTRACT_BRAND]: true as const,
    spec: Object.freeze({ name, operations: Object.freeze(specs) }),
    operations,
  });
}

export function isContract(value: unknown): value is Contract {
  return typeof value === "object" && value !== null && CONTRACT_BRAND in value;
}

export function toContractSpec(contract: Contract | ContractSpec): ContractSpec {
  return isContract(contract) ? contract.spec : contract;
}
