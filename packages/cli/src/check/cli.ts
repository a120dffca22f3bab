#!/usr/bin/env -S node --import tsx/esm

import createDebug from "debug";
import { parseArgs } from "./args";
import { loadContracts } from "./load";
import { checkContracts } from "./manifest";

const debug = createDebug("logbind:cli");

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  debug("check: modules=%o specs=%o", args.modules, args.specFiles);

  const sources = await loadContracts(args);
  const manifest = checkContracts(sources);
  debug("check: %d valid, %d invalid", manifest.contracts.length, manifest.errors.length);

  process.stdout.write(JSON.stringify(manifest, null, 2) + "\n");
  if (manifest.errors.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(JSON.stringify({ error: message }) + "\n");
  process.exitCode = 1;
});
