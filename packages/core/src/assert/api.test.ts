import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { runInContext } from "../context.js";
import { AssertionFailed } from "../errors.js";
import { assert, check, createAssertions } from "./api.js";
import { AssertionCollector } from "./collector.js";

function failureOf(fn: () => unknown): AssertionFailed {
  try {
    fn();
  } catch (e) {
    if (e instanceof AssertionFailed) return e;
    throw e;
  }
  throw new Error("expected an assertion failure");
}

describe("createAssertions", () => {
  it("counts every evaluated assertion", () => {
    const collector = new AssertionCollector();
    const a = createAssertions(collector);

    a.assertEqual({ id: 1 }, { id: 1 });
    a.assertTrue(true);
    a.assertNull(undefined);

    expect(collector.count).toBe(3);
    expect(collector.getFailures()).toEqual([]);
  });

  it("records the failure and throws on the first failing assertion", () => {
    const collector = new AssertionCollector();
    const a = createAssertions(collector);
    const reached: string[] = [];

    expect(() => {
      a.assertEqual(1, 2);
      reached.push("after");
    }).toThrow(AssertionFailed);

    expect(reached).toEqual([]);
    expect(collector.count).toBe(1);
    const [failure] = collector.getFailures();
    expect(failure.kind).toBe("assertEqual");
    expect(failure.message).toBe("expected 1, got 2");
    expect(failure.expected).toBe(1);
    expect(failure.actual).toBe(2);
  });

  it("prefixes a custom message", () => {
    const a = createAssertions();
    expect(failureOf(() => a.assertEqual(1, 2, "totals")).message).toBe("totals: expected 1, got 2");
  });

  it("only accepts the booleans themselves", () => {
    const a = createAssertions();
    expect(failureOf(() => a.assertTrue(1)).message).toBe("expected true, got 1");
    expect(failureOf(() => a.assertFalse("")).message).toBe('expected false, got ""');
  });

  it("treats null and undefined as absent", () => {
    const a = createAssertions();
    a.assertNull(null);
    a.assertNotNull(0);
    expect(failureOf(() => a.assertNull(0)).message).toBe("expected null, got 0");
    expect(failureOf(() => a.assertNotNull(null)).message).toBe("expected a value, got null");
  });

  it("fails assertNotEqual on structurally equal values", () => {
    const a = createAssertions();
    a.assertNotEqual([1], [2]);
    expect(failureOf(() => a.assertNotEqual([1], [1])).message).toBe(
      "expected values to differ, both were [1]"
    );
  });

  it("returns the fault from assertThrows when the kind matches exactly", () => {
    const a = createAssertions();
    const fault = a.assertThrows(RangeError, () => {
      throw new RangeError("out of range");
    });
    expect(fault.message).toBe("out of range");
  });

  it("fails assertThrows on another kind of fault or on no fault", () => {
    const a = createAssertions();
    expect(
      failureOf(() =>
        a.assertThrows(Error, () => {
          throw new RangeError("x");
        })
      ).message
    ).toBe("expected fault Error, got fault RangeError");
    expect(failureOf(() => a.assertThrows(RangeError, () => undefined)).message).toBe(
      "expected fault RangeError, no fault raised"
    );
  });

  it("fails assertThrows on an async function and points to assertRejects", async () => {
    const collector = new AssertionCollector();
    const a = createAssertions(collector);
    let settled = false;

    const failure = failureOf(() =>
      a.assertThrows(TypeError, async () => {
        await Promise.resolve();
        settled = true;
        throw new TypeError("late");
      })
    );

    expect(failure.message).toBe(
      "expected fault TypeError, but the function returned a promise; use assertRejects"
    );
    expect(collector.getFailures()).toHaveLength(1);
    await new Promise<void>((resolve) => setTimeout(resolve, 0));
    expect(settled).toBe(true);
  });

  it("checks rejections of async functions", async () => {
    const collector = new AssertionCollector();
    const a = createAssertions(collector);

    const fault = await a.assertRejects(TypeError, async () => {
      throw new TypeError("bad input");
    });
    expect(fault.message).toBe("bad input");

    await expect(a.assertRejects(TypeError, async () => "fine")).rejects.toThrow(
      "expected fault TypeError, no fault raised"
    );
    expect(collector.count).toBe(2);
  });

  it("returns the parsed value from assertMatches", () => {
    const a = createAssertions();
    const schema = z.object({ id: z.number() });

    expect(a.assertMatches(schema, { id: 7 })).toEqual({ id: 7 });
    expect(failureOf(() => a.assertMatches(schema, { id: "7" })).message).toBe(
      "value does not match schema (id: Expected number, received string)"
    );
  });

  it("fails unconditionally with fail()", () => {
    const failure = failureOf(() => createAssertions().fail("not reachable")).failure;
    expect(failure.kind).toBe("fail");
    expect(failure.message).toBe("not reachable");
  });

  it("locates the failing call in the calling file", () => {
    const failure = failureOf(() => createAssertions().assertTrue(false)).failure;
    expect(failure.location?.file).toBe(fileURLToPath(import.meta.url));
    expect(failure.location?.line).toBeGreaterThan(0);
  });
});

describe("assert", () => {
  it("refuses to run outside a test", () => {
    expect(() => assert.assertTrue(true)).toThrow("assert.* can only be used inside a running test");
  });

  it("records on the collector of the current test", () => {
    const collector = new AssertionCollector();
    runInContext({ unit: "G::a", collector }, () => {
      assert.assertEqual("x", "x");
      expect(() => assert.assertFalse(true)).toThrow(AssertionFailed);
    });
    expect(collector.count).toBe(2);
    expect(collector.getFailures().map((f) => f.message)).toEqual(["expected false, got true"]);
  });
});

describe("check", () => {
  it("counts a held check on the current test", () => {
    const collector = new AssertionCollector();
    runInContext({ collector }, () => check("verify", true, () => "unused"));
    expect(collector.count).toBe(1);
  });

  it("throws without a test when the condition fails", () => {
    expect(() => check("verify", false, () => "did not hold")).toThrow("did not hold");
  });
});
