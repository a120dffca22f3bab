// Early initialization entry point for: node --import @logbind/pino/setup app.js
// Routes the process-wide tracer to pino, configured from LOGBIND_* variables.
import { configureTracer } from "./configure";

configureTracer();
