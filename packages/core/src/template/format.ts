import type { ContextValue, FormattedRecord, LogLevel, TraceContext } from "@logbind/types";
import { FormatError } from "../errors/trace-errors";
import type { Classification } from "./classify";
import type { ValidatedTemplate } from "./validate";

const EMPTY_CONTEXT: TraceContext = Object.freeze({});

/** Renders one argument the way string interpolation would; `null` and `undefined` render empty. */
export function renderValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  return String(value);
}

export function renderTemplate(
  template: ValidatedTemplate,
  values: readonly unknown[],
  classification: Classification,
  operation: string,
): string {
  let message = "";
  for (const segment of template.segments) {
    if (typeof segment === "string") {
      message += segment;
      continue;
    }
    try {
      message += renderValue(values[segment]);
    } catch (error) {
      throw new FormatError(operation, classification.names[segment] ?? String(segment), error);
    }
  }
  return message;
}

/**
 * Builds the structured context from alternating key/value entries.
 * A repeated key keeps its first value.
 */
export function makeContext(entries: readonly (readonly [string, ContextValue])[]): TraceContext {
  if (entries.length === 0) return EMPTY_CONTEXT;

  const context: Record<string, ContextValue> = {};
  for (const [key, value] of entries) {
    if (Object.hasOwn(context, key)) continue;
    // Defined, not assigned: `__proto__` is a valid parameter name.
    Object.defineProperty(context, key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return context;
}

function isContextValue(value: unknown): value is ContextValue {
  const type = typeof value;
  return type === "string" || type === "number" || type === "boolean" || type === "bigint";
}

export function buildContext(
  values: readonly unknown[],
  classification: Classification,
): TraceContext {
  const entries: [string, ContextValue][] = [];
  for (const index of classification.contextIndices) {
    const name = classification.names[index];
    const value = values[index];
    // Values that do not match their declared primitive type stay out of the context.
    if (name !== undefined && isContextValue(value)) entries.push([name, value]);
  }
  return makeContext(entries);
}

function describeThrown(value: unknown): string {
  if (typeof value === "object" && value !== null && "message" in value) {
    if (typeof value.message === "string") return value.message;
  }
  return renderValue(value);
}

/**
 * The exception payload of a call. Anything thrown that is not an `Error` of this
 * realm is wrapped, with the original kept as `cause`.
 */
export function toException(value: unknown, operation: string, parameter: string): Error | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Error) return value;
  try {
    return new Error(describeThrown(value), { cause: value });
  } catch (error) {
    throw new FormatError(operation, parameter, error);
  }
}

/** Pure: turns one call's arguments into the record handed to the sink. */
export function formatRecord(
  template: ValidatedTemplate,
  values: readonly unknown[],
  classification: Classification,
  level: LogLevel,
  operation: string,
): FormattedRecord {
  const message = renderTemplate(template, values, classification, operation);
  const context = buildContext(values, classification);

  const exceptionIndex = classification.exceptionIndex;
  const exception =
    exceptionIndex === undefined
      ? undefined
      : toException(values[exceptionIndex], operation, classification.names[exceptionIndex] ?? "");
  if (exception) {
    return { message, context, level, exception };
  }
  return { message, context, level };
}
