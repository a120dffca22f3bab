import { describe, it, expect } from "vitest";
import type { ParameterSpec } from "@logbind/types";
import { classifyParameters, isContextKind } from "../../src/template/classify";
import { ClassificationError, ContractError } from "../../src/errors/trace-errors";
import { param } from "../../src/contract/define";

const SITE = { contract: "OrderTrace", operation: "failed" };

describe("classifyParameters", () => {
  it("should partition exception, context and template-only parameters", () => {
    const classification = classifyParameters(
      [
        param.string("order"),
        param.error("ex"),
        param.number("attempt"),
        param.value("payload"),
        param.boolean("retried"),
        param.bigint("ticks"),
      ],
      "message",
      SITE,
    );

    expect(classification.exceptionIndex).toBe(1);
    expect(classification.contextIndices).toEqual([0, 2, 4, 5]);
    expect(classification.allIndices).toEqual([0, 1, 2, 3, 4, 5]);
    expect(classification.names).toEqual(["order", "ex", "attempt", "payload", "retried", "ticks"]);
  });

  it("should have no exception slot when no parameter is an error", () => {
    const classification = classifyParameters([param.string("name")], "message", SITE);

    expect(classification.exceptionIndex).toBeUndefined();
    expect(classification.contextIndices).toEqual([0]);
  });

  it("should handle an empty parameter list", () => {
    const classification = classifyParameters([], "message", SITE);

    expect(classification.allIndices).toEqual([]);
    expect(classification.contextIndices).toEqual([]);
  });

  it("should reject a second exception parameter", () => {
    expect(() =>
      classifyParameters([param.error("first"), param.error("second")], "message", SITE),
    ).toThrow(
      new ClassificationError(
        "Exception parameter 'second' is a second exception payload; only one is allowed",
        "second",
        SITE,
      ),
    );
  });

  it("should reject an exception parameter on an activity", () => {
    let caught: unknown;
    try {
      classifyParameters([param.string("batch"), param.error("ex")], "activity", SITE);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ClassificationError);
    expect((caught as ClassificationError).parameter).toBe("ex");
    expect((caught as ClassificationError).message).toBe(
      "Exception parameter 'ex' is not allowed on a timed activity (in OrderTrace.failed)",
    );
  });

  it("should reject an unknown parameter type", () => {
    const parameters: ParameterSpec[] = JSON.parse('[{ "name": "when", "kind": "date" }]');

    expect(() => classifyParameters(parameters, "message", SITE)).toThrow(ContractError);
    expect(() => classifyParameters(parameters, "message", SITE)).toThrow(
      "Parameter 'when' has unsupported type 'date' (in OrderTrace.failed)",
    );
  });
});

describe("isContextKind", () => {
  it("should accept primitives only", () => {
    expect(isContextKind("string")).toBe(true);
    expect(isContextKind("number")).toBe(true);
    expect(isContextKind("boolean")).toBe(true);
    expect(isContextKind("bigint")).toBe(true);
    expect(isContextKind("error")).toBe(false);
    expect(isContextKind("value")).toBe(false);
  });
});
