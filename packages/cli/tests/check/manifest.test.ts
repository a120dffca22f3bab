import { describe, it, expect } from "vitest";
import type { ContractSpec } from "@logbind/types";
import { checkContracts } from "../../src/check/manifest";
import { BrokenTrace, CheckoutTrace } from "./fixtures/contracts.module";

describe("checkContracts", () => {
  it("should describe every operation of a valid contract", () => {
    const manifest = checkContracts([
      { spec: CheckoutTrace.spec, source: "/project/checkout.ts", exportName: "CheckoutTrace" },
    ]);

    expect(manifest.version).toBe("1.0.0");
    expect(manifest.errors).toEqual([]);
    expect(manifest.contracts).toEqual([
      {
        name: "CheckoutTrace",
        source: "/project/checkout.ts",
        exportName: "CheckoutTrace",
        operations: [
          {
            name: "placed",
            level: "info",
            returns: "message",
            template: "Order {orderId} placed for {total}",
            positionalTemplate: "Order {0} placed for {1}",
            parameters: [
              { name: "orderId", kind: "string", position: 0, inContext: true, isException: false },
              { name: "total", kind: "number", position: 1, inContext: true, isException: false },
            ],
          },
          {
            name: "rejected",
            level: "error",
            returns: "message",
            template: "Order {orderId} rejected",
            positionalTemplate: "Order {1} rejected",
            parameters: [
              { name: "ex", kind: "error", position: 0, inContext: false, isException: true },
              { name: "orderId", kind: "string", position: 1, inContext: true, isException: false },
            ],
          },
          {
            name: "settling",
            level: "debug",
            returns: "activity",
            template: "Settling {orderId}",
            positionalTemplate: "Settling {0}",
            parameters: [
              { name: "orderId", kind: "string", position: 0, inContext: true, isException: false },
            ],
          },
        ],
      },
    ]);
  });

  it("should report a failing contract without affecting the others", () => {
    const manifest = checkContracts([
      { spec: BrokenTrace.spec, source: "/project/a.ts", exportName: "BrokenTrace" },
      { spec: CheckoutTrace.spec, source: "/project/a.ts", exportName: "CheckoutTrace" },
    ]);

    expect(manifest.contracts.map((contract) => contract.name)).toEqual(["CheckoutTrace"]);
    expect(manifest.errors).toEqual([
      {
        contract: "BrokenTrace",
        source: "/project/a.ts",
        operation: "lost",
        error: "TemplateError",
        message: `Invalid format argument '{parcel}' in template "Lost {parcel}" (in BrokenTrace.lost)`,
      },
    ]);
  });

  it("should report a contract-level failure without an operation", () => {
    const spec: ContractSpec = {
      name: "DupTrace",
      operations: [
        { name: "a", level: "info", template: "a", parameters: [], returns: "message" },
        { name: "a", level: "info", template: "b", parameters: [], returns: "message" },
      ],
    };

    expect(checkContracts([{ spec, source: "dup.json" }]).errors).toEqual([
      {
        contract: "DupTrace",
        source: "dup.json",
        operation: "a",
        error: "ContractError",
        message: "Duplicate operation name (in DupTrace.a)",
      },
    ]);
  });

  it("should name an anonymous contract", () => {
    const spec: ContractSpec = { name: "", operations: [] };

    expect(checkContracts([{ spec, source: "anon.json" }]).errors).toEqual([
      {
        contract: "<anonymous>",
        source: "anon.json",
        error: "ContractError",
        message: "Contract must have a name (in <anonymous>)",
      },
    ]);
  });
});
