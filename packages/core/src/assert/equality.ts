import { describeValue } from "../errors.js";

export type Comparison = { equal: true } | { equal: false; reason: string };

const EQUAL: Comparison = { equal: true };

/**
 * The comparable kind of a value. Plain objects are "object", class
 * instances their constructor name.
 */
export function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Map) return "Map";
  if (value instanceof Set) return "Set";
  if (value instanceof Date) return "Date";
  if (value instanceof RegExp) return "RegExp";
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return "object";
    return value.constructor?.name || "object";
  }
  return typeof value;
}

function at(path: string): string {
  return path === "$" ? "" : ` at ${path}`;
}

function differ(path: string, expected: unknown, actual: unknown): Comparison {
  return {
    equal: false,
    reason: `expected ${describeValue(expected)}, got ${describeValue(actual)}${at(path)}`,
  };
}

/**
 * Structural comparison: composite values field by field, primitives by
 * value (NaN equals NaN, +0 equals -0). Values of different kinds are never
 * equal and never coerced.
 */
export function compare(expected: unknown, actual: unknown): Comparison {
  return compareAt(expected, actual, "$", new WeakMap());
}

export function deepEqual(expected: unknown, actual: unknown): boolean {
  return compare(expected, actual).equal;
}

function compareAt(
  expected: unknown,
  actual: unknown,
  path: string,
  seen: WeakMap<object, object>
): Comparison {
  const expectedKind = kindOf(expected);
  const actualKind = kindOf(actual);
  if (expectedKind !== actualKind) {
    return { equal: false, reason: `kind mismatch${at(path)}: ${expectedKind} vs ${actualKind}` };
  }

  if (typeof expected !== "object" || expected === null || typeof actual !== "object" || actual === null) {
    if (expected === actual) return EQUAL;
    if (Number.isNaN(expected) && Number.isNaN(actual)) return EQUAL;
    return differ(path, expected, actual);
  }

  if (Object.getPrototypeOf(expected) !== Object.getPrototypeOf(actual)) {
    return { equal: false, reason: `kind mismatch${at(path)}: different prototypes of ${expectedKind}` };
  }

  if (seen.get(expected) === actual) return EQUAL;
  seen.set(expected, actual);

  if (expected instanceof Date && actual instanceof Date) {
    const [e, a] = [expected.getTime(), actual.getTime()];
    return e === a || (Number.isNaN(e) && Number.isNaN(a)) ? EQUAL : differ(path, expected, actual);
  }

  if (expected instanceof RegExp && actual instanceof RegExp) {
    return expected.source === actual.source && expected.flags === actual.flags
      ? EQUAL
      : differ(path, expected, actual);
  }

  if (Array.isArray(expected) && Array.isArray(actual)) {
    if (expected.length !== actual.length) {
      return {
        equal: false,
        reason: `expected length ${expected.length}, got ${actual.length}${at(path)}`,
      };
    }
    for (let i = 0; i < expected.length; i++) {
      const result = compareAt(expected[i], actual[i], `${path}[${i}]`, seen);
      if (!result.equal) return result;
    }
    return EQUAL;
  }

  if (expected instanceof Map && actual instanceof Map) {
    if (expected.size !== actual.size) {
      return { equal: false, reason: `expected size ${expected.size}, got ${actual.size}${at(path)}` };
    }
    for (const [key, value] of expected) {
      const keyPath = `${path}.get(${describeValue(key)})`;
      if (!actual.has(key)) return { equal: false, reason: `missing key${at(keyPath)}` };
      const result = compareAt(value, actual.get(key), keyPath, seen);
      if (!result.equal) return result;
    }
    return EQUAL;
  }

  if (expected instanceof Set && actual instanceof Set) {
    if (expected.size !== actual.size) {
      return { equal: false, reason: `expected size ${expected.size}, got ${actual.size}${at(path)}` };
    }
    for (const item of expected) {
      if (actual.has(item)) continue;
      const found = [...actual].some((candidate) => compareAt(item, candidate, path, seen).equal);
      if (!found) {
        return { equal: false, reason: `missing element ${describeValue(item)}${at(path)}` };
      }
    }
    return EQUAL;
  }

  const expectedKeys = Object.keys(expected);
  const actualKeys = new Set(Object.keys(actual));
  for (const key of expectedKeys) {
    if (!actualKeys.has(key)) return { equal: false, reason: `missing field${at(`${path}.${key}`)}` };
  }
  for (const key of actualKeys) {
    if (!expectedKeys.includes(key)) {
      return { equal: false, reason: `unexpected field${at(`${path}.${key}`)}` };
    }
  }
  for (const key of expectedKeys) {
    const result = compareAt(
      Reflect.get(expected, key),
      Reflect.get(actual, key),
      `${path}.${key}`,
      seen
    );
    if (!result.equal) return result;
  }
  return EQUAL;
}
