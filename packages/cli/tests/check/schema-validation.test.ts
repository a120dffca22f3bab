import { describe, it, expect, beforeAll } from "vitest";
import Ajv2020 from "ajv/dist/2020.js";
import { checkContracts } from "../../src/check/manifest";
import { parseContractFile } from "../../src/check/spec-file";
import { BrokenTrace, CheckoutTrace } from "./fixtures/contracts.module";
import schema from "../../schemas/contract-manifest.v1.schema.json" with { type: "json" };

let validate: ReturnType<InstanceType<typeof Ajv2020>["compile"]>;

beforeAll(() => {
  const ajv = new Ajv2020({ strict: true });
  validate = ajv.compile(schema);
});

describe("contract manifest JSON schema validation", () => {
  it("should validate a manifest with valid and invalid contracts", () => {
    const manifest = checkContracts([
      { spec: CheckoutTrace.spec, source: "/project/a.ts", exportName: "CheckoutTrace" },
      { spec: BrokenTrace.spec, source: "/project/a.ts", exportName: "BrokenTrace" },
      ...parseContractFile(
        JSON.stringify({ name: "EmptyTrace", operations: [] }),
        "/project/empty.json",
      ),
    ]);

    expect(validate(manifest)).toBe(true);
    expect(validate.errors).toBeNull();
  });

  it("should validate an empty manifest", () => {
    expect(validate(checkContracts([]))).toBe(true);
  });

  it("should reject a manifest with an unknown version", () => {
    expect(validate({ version: "2.0.0", contracts: [], errors: [] })).toBe(false);
  });

  it("should reject a parameter without its position", () => {
    const manifest = {
      version: "1.0.0",
      contracts: [
        {
          name: "T",
          source: "t.ts",
          operations: [
            {
              name: "x",
              level: "info",
              returns: "message",
              template: "{a}",
              positionalTemplate: "{0}",
              parameters: [{ name: "a", kind: "string", inContext: true, isException: false }],
            },
          ],
        },
      ],
      errors: [],
    };

    expect(validate(manifest)).toBe(false);
  });
});
