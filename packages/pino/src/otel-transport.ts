import { Writable } from "node:stream";
import { logs, SeverityNumber, type AnyValueMap } from "@opentelemetry/api-logs";

const LEVEL_MAP: Record<number, SeverityNumber> = {
  10: SeverityNumber.TRACE,
  20: SeverityNumber.DEBUG,
  30: SeverityNumber.INFO,
  40: SeverityNumber.WARN,
  50: SeverityNumber.ERROR,
  60: SeverityNumber.FATAL,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function copyPrimitives(from: Record<string, unknown>, to: AnyValueMap): void {
  for (const [key, val] of Object.entries(from)) {
    if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
      to[key] = val;
    }
  }
}

/**
 * Turns one trace record written by {@link PinoTraceSink} into OTel log record
 * fields: the owner becomes `logger.name`, context fields become attributes and
 * `err` becomes the `exception.*` attributes. Returns null for anything unparseable.
 */
export function toOTelRecord(line: string): {
  severityNumber: SeverityNumber;
  body: string;
  attributes: AnyValueMap;
} | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { level, msg, name, err, context, time: _time, ...rest } = parsed;
  const attributes: AnyValueMap = {};
  if (typeof name === "string") attributes["logger.name"] = name;
  copyPrimitives(rest, attributes);
  // Context field names are identifiers, so they never meet the dotted keys.
  if (isRecord(context)) copyPrimitives(context, attributes);
  if (isRecord(err)) {
    if (typeof err.type === "string") attributes["exception.type"] = err.type;
    if (typeof err.message === "string") attributes["exception.message"] = err.message;
    if (typeof err.stack === "string") attributes["exception.stacktrace"] = err.stack;
  }

  return {
    severityNumber: (typeof level === "number" && LEVEL_MAP[level]) || SeverityNumber.INFO,
    body: typeof msg === "string" ? msg : "",
    attributes,
  };
}

/**
 * Creates a main-thread writable stream that bridges pino log records
 * to the OTel Logs API.
 *
 * Runs in the main thread (NOT a pino worker-thread transport) so it can
 * read traceId/spanId from the active OTel context.
 */
export function createOTelStream(): Writable {
  const otelLogger = logs.getLogger("logbind");

  return new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      const record = toOTelRecord(typeof chunk === "string" ? chunk : chunk.toString());
      // Malformed lines are skipped
      if (record) otelLogger.emit(record);
      callback();
    },
  });
}
