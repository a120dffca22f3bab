/** Severity of a trace operation, from least to most important. `none` never emits. */
export type LogLevel = "none" | "debug" | "info" | "warning" | "error";
