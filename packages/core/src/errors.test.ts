import { describe, expect, it } from "vitest";
import { DiscoveryError, FixtureFault, describeValue, toFaultRecord } from "./errors.js";

describe("toFaultRecord", () => {
  it("snapshots an Error", () => {
    const record = toFaultRecord("uncaught", new RangeError("too big"));
    expect(record).toMatchObject({ kind: "uncaught", name: "RangeError", message: "too big" });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("handles thrown values that are not errors", () => {
    expect(toFaultRecord("uncaught", 42)).toEqual({ kind: "uncaught", name: "number", message: "42" });
  });

  it("keeps the stack of the hook behind a fixture fault", () => {
    const cause = new Error("no db");
    const record = toFaultRecord("fixture", new FixtureFault("setUp", cause), "setUp");

    expect(record.message).toBe("setUp failed: no db");
    expect(record.stack).toBe(cause.stack);
    expect(record.phase).toBe("setUp");
  });
});

describe("DiscoveryError", () => {
  it("lists every problem", () => {
    const error = new DiscoveryError(["one", "two"]);
    expect(error.message).toBe("Discovery failed:\n  one\n  two");
    expect(error.problems).toEqual(["one", "two"]);
  });
});

describe("describeValue", () => {
  it("renders values for failure messages", () => {
    expect(describeValue("a")).toBe('"a"');
    expect(describeValue(10n)).toBe("10n");
    expect(describeValue(function total() {})).toBe("[Function total]");
    expect(describeValue(new TypeError("bad"))).toBe("TypeError: bad");
    expect(describeValue(new Date(0))).toBe("Date(1970-01-01T00:00:00.000Z)");
    expect(describeValue(new Date(Number.NaN))).toBe("Invalid Date");
    expect(describeValue(new Map([[1, 2]]))).toBe("Map(1)");
    expect(describeValue({ a: [1] })).toBe('{"a":[1]}');
    expect(describeValue(undefined)).toBe("undefined");
  });
});
