import { describe, expect, it } from "vitest";
import { TestUnit, fullNameOf } from "./unit.js";

function unit(): TestUnit {
  return new TestUnit({ group: "Parser", name: "reads numbers", fn: () => undefined, tags: ["fast"] });
}

describe("TestUnit", () => {
  it("is named by group and name", () => {
    expect(fullNameOf("Parser", "reads numbers")).toBe("Parser::reads numbers");
    expect(unit().fullName).toBe("Parser::reads numbers");
  });

  it("moves from pending through running to a final status", () => {
    const u = unit();
    expect(u.status).toBe("pending");
    u.transition("running");
    u.transition("inconclusive");
    expect(u.status).toBe("inconclusive");
  });

  it("refuses to skip or leave a final status", () => {
    const u = unit();
    expect(() => u.transition("passed")).toThrow(
      "Illegal status transition for Parser::reads numbers: pending -> passed"
    );
    u.transition("running");
    u.transition("failed");
    expect(() => u.transition("running")).toThrow("failed -> running");
  });

  it("serialises its identity", () => {
    expect(JSON.parse(JSON.stringify(unit()))).toEqual({
      group: "Parser",
      name: "reads numbers",
      fullName: "Parser::reads numbers",
      tags: ["fast"],
    });
  });
});
