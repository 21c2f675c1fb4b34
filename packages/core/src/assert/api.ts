import type { ZodType } from "zod";
import { currentContext } from "../context.js";
import { AssertionFailed, describeValue } from "../errors.js";
import type { AssertionCollector } from "./collector.js";
import { compare } from "./equality.js";
import { locateCaller } from "./location.js";
import type { AssertionFailure, AssertionKind } from "./types.js";

/** An Error subclass, used as the expected kind of a fault. */
export type ErrorClass<E extends Error = Error> = new (...args: never[]) => E;

export interface Assert {
  assertEqual(expected: unknown, actual: unknown, message?: string): void;
  assertNotEqual(expected: unknown, actual: unknown, message?: string): void;
  assertTrue(predicate: unknown, message?: string): void;
  assertFalse(predicate: unknown, message?: string): void;
  /** Holds for `null` and `undefined`. */
  assertNull(value: unknown, message?: string): void;
  assertNotNull(value: unknown, message?: string): void;
  /** Holds only when `fn` throws an instance of exactly `expected`; returns it. */
  assertThrows<E extends Error>(expected: ErrorClass<E>, fn: () => unknown, message?: string): E;
  assertRejects<E extends Error>(
    expected: ErrorClass<E>,
    fn: () => Promise<unknown>,
    message?: string
  ): Promise<E>;
  assertMatches<T>(schema: ZodType<T>, value: unknown, message?: string): T;
  fail(message: string): never;
}

function withMessage(message: string | undefined, detail: string): string {
  return message ? `${message}: ${detail}` : detail;
}

function faultName(e: unknown): string {
  if (e instanceof Error) return e.constructor.name;
  return e === null ? "null" : typeof e;
}

interface FailureDetail {
  expected?: unknown;
  actual?: unknown;
}

function raise(
  collector: AssertionCollector | undefined,
  kind: AssertionKind,
  message: string,
  detail: FailureDetail = {}
): never {
  const failure: AssertionFailure = Object.freeze({
    kind,
    message,
    ...detail,
    location: locateCaller(),
  });
  collector?.fail(failure);
  throw new AssertionFailed(failure);
}

/**
 * Evaluates a condition as an assertion of the test running in the current
 * async context. Used by engine parts that assert on the caller's behalf.
 */
export function check(
  kind: AssertionKind,
  held: boolean,
  message: () => string,
  detail?: FailureDetail
): void {
  const collector = currentContext()?.collector;
  if (held) {
    collector?.pass();
    return;
  }
  raise(collector, kind, message(), detail);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

/**
 * Assertions that record on `collector` and throw {@link AssertionFailed} on
 * the first failure. Without a collector they only throw.
 */
export function createAssertions(collector?: AssertionCollector): Assert {
  function failWith(kind: AssertionKind, message: string, detail?: FailureDetail): never {
    return raise(collector, kind, message, detail);
  }

  function pass(): void {
    collector?.pass();
  }

  function checkFault<E extends Error>(
    kind: "assertThrows" | "assertRejects",
    expected: ErrorClass<E>,
    outcome: { threw: false } | { threw: true; fault: unknown },
    message: string | undefined
  ): E {
    if (!outcome.threw) {
      return failWith(kind, withMessage(message, `expected fault ${expected.name}, no fault raised`), {
        expected: expected.name,
      });
    }
    const { fault } = outcome;
    if (fault instanceof expected && fault.constructor === expected) {
      pass();
      return fault;
    }
    return failWith(
      kind,
      withMessage(message, `expected fault ${expected.name}, got fault ${faultName(fault)}`),
      { expected: expected.name, actual: faultName(fault) }
    );
  }

  return {
    assertEqual(expected, actual, message) {
      const result = compare(expected, actual);
      if (result.equal) return pass();
      failWith("assertEqual", withMessage(message, result.reason), { expected, actual });
    },

    assertNotEqual(expected, actual, message) {
      if (!compare(expected, actual).equal) return pass();
      failWith(
        "assertNotEqual",
        withMessage(message, `expected values to differ, both were ${describeValue(actual)}`),
        { expected, actual }
      );
    },

    assertTrue(predicate, message) {
      if (predicate === true) return pass();
      failWith("assertTrue", withMessage(message, `expected true, got ${describeValue(predicate)}`), {
        expected: true,
        actual: predicate,
      });
    },

    assertFalse(predicate, message) {
      if (predicate === false) return pass();
      failWith("assertFalse", withMessage(message, `expected false, got ${describeValue(predicate)}`), {
        expected: false,
        actual: predicate,
      });
    },

    assertNull(value, message) {
      if (value === null || value === undefined) return pass();
      failWith("assertNull", withMessage(message, `expected null, got ${describeValue(value)}`), {
        expected: null,
        actual: value,
      });
    },

    assertNotNull(value, message) {
      if (value !== null && value !== undefined) return pass();
      failWith("assertNotNull", withMessage(message, `expected a value, got ${describeValue(value)}`), {
        actual: value,
      });
    },

    assertThrows(expected, fn, message) {
      let returned: unknown;
      try {
        returned = fn();
      } catch (fault) {
        return checkFault("assertThrows", expected, { threw: true, fault }, message);
      }
      if (isPromiseLike(returned)) {
        // Keeps a later rejection from going unhandled; the failure reports the misuse.
        Promise.resolve(returned).catch(() => undefined);
        return failWith(
          "assertThrows",
          withMessage(message, `expected fault ${expected.name}, but the function returned a promise; use assertRejects`),
          { expected: expected.name }
        );
      }
      return checkFault("assertThrows", expected, { threw: false }, message);
    },

    async assertRejects(expected, fn, message) {
      try {
        await fn();
      } catch (fault) {
        return checkFault("assertRejects", expected, { threw: true, fault }, message);
      }
      return checkFault("assertRejects", expected, { threw: false }, message);
    },

    assertMatches(schema, value, message) {
      const result = schema.safeParse(value);
      if (result.success) {
        pass();
        return result.data;
      }
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "$"}: ${issue.message}`)
        .join("; ");
      return failWith("assertMatches", withMessage(message, `value does not match schema (${issues})`), {
        actual: value,
      });
    },

    fail(message) {
      return failWith("fail", message);
    },
  };
}

function getBound(): Assert {
  const context = currentContext();
  if (!context) {
    throw new Error("assert.* can only be used inside a running test");
  }
  return createAssertions(context.collector);
}

/** Assertions bound to whichever test is executing in the current async context. */
export const assert: Assert = {
  assertEqual: (...args) => getBound().assertEqual(...args),
  assertNotEqual: (...args) => getBound().assertNotEqual(...args),
  assertTrue: (...args) => getBound().assertTrue(...args),
  assertFalse: (...args) => getBound().assertFalse(...args),
  assertNull: (...args) => getBound().assertNull(...args),
  assertNotNull: (...args) => getBound().assertNotNull(...args),
  assertThrows: (expected, fn, message) => getBound().assertThrows(expected, fn, message),
  assertRejects: (expected, fn, message) => getBound().assertRejects(expected, fn, message),
  assertMatches: (schema, value, message) => getBound().assertMatches(schema, value, message),
  fail: (message) => getBound().fail(message),
};
