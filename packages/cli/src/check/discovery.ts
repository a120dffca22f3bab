import { isContract } from "@logbind/core";
import type { ContractSource } from "./types";

function byExportName(a: string, b: string): number {
  if (a === "default" || b === "default") return Number(a === "default") - Number(b === "default");
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Collects every contract a module exports, by export name with `default` last.
 * A contract re-exported under several names is listed once, under the first of them.
 */
export function findContracts(imported: Record<string, unknown>, source: string): ContractSource[] {
  const found = new Map<object, ContractSource>();
  const keys = Object.keys(imported).sort(byExportName);

  for (const key of keys) {
    const value = imported[key];
    if (!isContract(value) || found.has(value.spec)) continue;
    found.set(value.spec, { spec: value.spec, source, exportName: key });
  }
  return [...found.values()];
}
