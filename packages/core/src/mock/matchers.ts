import { deepEqual } from "../assert/equality.js";
import { describeValue } from "../errors.js";

const MATCHER = Symbol("probity.argMatcher");

export interface ArgMatcher {
  readonly [MATCHER]: true;
  readonly description: string;
  matches(value: unknown): boolean;
}

export interface MemberMatcher<M extends string = string> {
  readonly member: M;
  /** Per-position matchers; absent means any argument list. */
  readonly args?: readonly ArgMatcher[];
  matches(member: string, args: readonly unknown[]): boolean;
  describe(): string;
}

function isArgMatcher(value: unknown): value is ArgMatcher {
  return typeof value === "object" && value !== null && MATCHER in value;
}

/** Wildcard for one argument position. */
export function any(): ArgMatcher {
  return { [MATCHER]: true, description: "<any>", matches: () => true };
}

export function where(predicate: (value: unknown) => boolean, description = "<where>"): ArgMatcher {
  return { [MATCHER]: true, description, matches: predicate };
}

export function equals(expected: unknown): ArgMatcher {
  return {
    [MATCHER]: true,
    description: describeValue(expected),
    matches: (value) => deepEqual(expected, value),
  };
}

/**
 * Matches calls of `member`. Each argument is an exact value (compared
 * structurally) or an {@link ArgMatcher}; positions are checked left to
 * right and all must match. With no arguments, any argument list matches.
 */
export function on<M extends string>(member: M, ...args: unknown[]): MemberMatcher<M> {
  const positions = args.length > 0 ? args.map((a) => (isArgMatcher(a) ? a : equals(a))) : undefined;
  return {
    member,
    args: positions,
    matches(calledMember, calledArgs) {
      if (calledMember !== member) return false;
      if (!positions) return true;
      const length = Math.max(positions.length, calledArgs.length);
      for (let i = 0; i < length; i++) {
        const matcher = positions[i];
        const held = matcher ? matcher.matches(calledArgs[i]) : calledArgs[i] === undefined;
        if (!held) return false;
      }
      return true;
    },
    describe() {
      if (!positions) return `${member}(*)`;
      return `${member}(${positions.map((p) => p.description).join(", ")})`;
    },
  };
}
