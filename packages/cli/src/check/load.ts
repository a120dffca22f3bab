import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import createDebug from "debug";
import type { CliArgs } from "./args";
import { findContracts } from "./discovery";
import { parseContractFile } from "./spec-file";
import type { ContractSource } from "./types";

const debug = createDebug("logbind:cli");

function isModuleNamespace(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export async function loadModuleContracts(modulePath: string): Promise<ContractSource[]> {
  const imported: unknown = await import(pathToFileURL(modulePath).href);
  if (!isModuleNamespace(imported)) {
    throw new Error(`Could not import "${modulePath}"`);
  }

  const found = findContracts(imported, modulePath);
  debug("load: %d contracts exported by %s", found.length, modulePath);
  if (found.length === 0) {
    process.stderr.write(`Warning: No contracts exported by module "${modulePath}"\n`);
  }
  return found;
}

export async function loadSpecFileContracts(filePath: string): Promise<ContractSource[]> {
  const text = await readFile(filePath, "utf8");
  const found = parseContractFile(text, filePath);
  debug("load: %d contracts declared in %s", found.length, filePath);
  return found;
}

/** Loads modules and contract files in argument order. */
export async function loadContracts(args: CliArgs): Promise<ContractSource[]> {
  const sources: ContractSource[] = [];
  for (const modulePath of args.modules) {
    sources.push(...(await loadModuleContracts(modulePath)));
  }
  for (const filePath of args.specFiles) {
    sources.push(...(await loadSpecFileContracts(filePath)));
  }
  return sources;
}
