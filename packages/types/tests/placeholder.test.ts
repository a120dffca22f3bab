import { describe, it, expect } from "vitest";

describe("@logbind/types", () => {
  it("should be importable", async () => {
    const mod = await import("../src/index");
    expect(mod).toBeDefined();
  });
});
