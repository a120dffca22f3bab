import { resolve } from "node:path";

export interface CliArgs {
  modules: string[];
  specFiles: string[];
}

/** Reads `--module` and `--spec`, each of which may be repeated. `argv` is `process.argv`. */
export function parseArgs(argv: string[]): CliArgs {
  const modules: string[] = [];
  const specFiles: string[] = [];

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === "--module" && value !== undefined) {
      modules.push(resolve(value));
      i++;
    } else if (arg === "--spec" && value !== undefined) {
      specFiles.push(resolve(value));
      i++;
    } else {
      throw new Error(`Unknown or incomplete argument: ${arg ?? ""}`);
    }
  }

  if (modules.length === 0 && specFiles.length === 0) {
    throw new Error("Missing required argument: --module <path> or --spec <file.json>");
  }

  return { modules, specFiles };
}
