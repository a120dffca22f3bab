import { resolve } from "node:path";
import { describe, it, expect } from "vitest";
import { parseArgs } from "../../src/check/args";

const argv = (...args: string[]) => ["node", "logbind-contracts", ...args];

describe("parseArgs", () => {
  it("should collect repeated --module and --spec arguments as absolute paths", () => {
    const args = parseArgs(
      argv("--module", "src/a.ts", "--spec", "contracts/b.json", "--module", "/abs/c.ts"),
    );

    expect(args).toEqual({
      modules: [resolve("src/a.ts"), "/abs/c.ts"],
      specFiles: [resolve("contracts/b.json")],
    });
  });

  it("should require at least one source", () => {
    expect(() => parseArgs(argv())).toThrow(
      "Missing required argument: --module <path> or --spec <file.json>",
    );
  });

  it("should reject an unknown flag", () => {
    expect(() => parseArgs(argv("--watch"))).toThrow("Unknown or incomplete argument: --watch");
  });

  it("should reject a flag without a value", () => {
    expect(() => parseArgs(argv("--module", "a.ts", "--spec"))).toThrow(
      "Unknown or incomplete argument: --spec",
    );
  });
});
