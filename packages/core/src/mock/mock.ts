import { check } from "../assert/api.js";
import { locateCaller } from "../assert/location.js";
import { currentContext } from "../context.js";
import { MockOwnershipFault, UnconfiguredInvocation, describeValue } from "../errors.js";
import {
  defaultValue,
  type CapabilitySpec,
  type MemberResult,
  type MemberSpec,
  type Members,
} from "./capability.js";
import { InvocationLog, type Invocation } from "./log.js";
import type { MemberMatcher } from "./matchers.js";

export type MockMode = "strict" | "lenient";

export interface MockOptions {
  /** `strict` (default) faults on unmatched calls, `lenient` answers with defaults. */
  mode?: MockMode;
  /** Allow invocation from more than one test; meant for group fixtures. */
  shared?: boolean;
}

/** Error constructor a mock instantiates when an expectation raises. */
export type FaultFactory = new (message?: string) => Error;

export type Behavior =
  | { kind: "returns"; value: unknown }
  | { kind: "raises"; fault: Error | FaultFactory }
  | { kind: "calls"; implementation: (...args: unknown[]) => unknown }
  | { kind: "default" };

export class Expectation {
  readonly id: number;
  readonly matcher: MemberMatcher;
  private behavior: Behavior = { kind: "default" };
  private readonly log: InvocationLog;

  constructor(id: number, matcher: MemberMatcher, log: InvocationLog) {
    this.id = id;
    this.matcher = matcher;
    this.log = log;
  }

  /** Calls this expectation answered, recomputed from the invocation log. */
  get count(): number {
    return this.log.count((invocation) => invocation.expectationId === this.id);
  }

  /** @internal */
  respond(behavior: Behavior): this {
    this.behavior = behavior;
    return this;
  }

  /** @internal */
  answer(capability: string, spec: MemberSpec, args: readonly unknown[]): unknown {
    const behavior = this.behavior;
    switch (behavior.kind) {
      case "default":
        return defaultValue(spec);
      case "returns":
        return spec.async ? Promise.resolve(behavior.value) : behavior.value;
      case "calls": {
        if (!spec.async) return behavior.implementation(...args);
        try {
          return Promise.resolve(behavior.implementation(...args));
        } catch (e) {
          return Promise.reject(e);
        }
      }
      case "raises": {
        const fault =
          behavior.fault instanceof Error
            ? behavior.fault
            : new behavior.fault(`${capability}.${this.matcher.member} raised`);
        if (spec.async) return Promise.reject(fault);
        throw fault;
      }
    }
  }
}

export interface ExpectationBuilder<R> {
  returns(value: R): Expectation;
  raises(fault: Error | FaultFactory): Expectation;
  calls(implementation: (...args: unknown[]) => R | Promise<R>): Expectation;
}

/**
 * Substitute implementation of a capability. Never forwards to a real
 * implementation: every call is answered by the first matching expectation,
 * by a default value (lenient), or by {@link UnconfiguredInvocation} (strict).
 */
export class Mock<T> {
  readonly capability: CapabilitySpec<T>;
  readonly mode: MockMode;
  readonly shared: boolean;
  /** The substitute to hand to the code under test. */
  readonly object: T;

  private readonly specs: Map<string, MemberSpec>;
  private readonly expectations: Expectation[] = [];
  private readonly log = new InvocationLog();
  private nextExpectationId = 1;
  private owner: string | undefined;

  constructor(capability: CapabilitySpec<T>, options: MockOptions = {}) {
    this.capability = capability;
    this.mode = options.mode ?? "strict";
    this.shared = options.shared ?? false;
    this.owner = currentContext()?.unit;
    this.specs = new Map<string, MemberSpec>(Object.entries<MemberSpec>(capability.members));

    const substitute: Record<string, (...args: unknown[]) => unknown> = {};
    for (const member of this.specs.keys()) {
      substitute[member] = (...args: unknown[]) => this.invoke(member, args);
    }
    // Every callable member of T is present, as the capability spec lists them all.
    this.object = substitute as T;
  }

  invocations(): Invocation[] {
    return this.log.all();
  }

  expectationList(): readonly Expectation[] {
    return [...this.expectations];
  }

  /** @internal */
  addExpectation(matcher: MemberMatcher): Expectation {
    if (!this.specs.has(matcher.member)) {
      throw new Error(`${this.capability.name} has no member "${matcher.member}"`);
    }
    const expectation = new Expectation(this.nextExpectationId++, matcher, this.log);
    this.expectations.push(expectation);
    return expectation;
  }

  /** Drops every expectation and the invocation log. */
  reset(): void {
    this.expectations.length = 0;
    this.log.clear();
  }

  private invoke(member: string, args: unknown[]): unknown {
    const spec = this.specs.get(member);
    if (!spec) throw new Error(`${this.capability.name} has no member "${member}"`);

    const caller = currentContext()?.unit;
    this.claim(caller);

    const expectation = this.expectations.find((e) => e.matcher.matches(member, args));
    this.log.append({ member, args, unit: caller, expectationId: expectation?.id });

    if (expectation) return expectation.answer(this.capability.name, spec, args);
    if (this.mode === "lenient") return defaultValue(spec);

    const fault = new UnconfiguredInvocation(this.capability.name, member, args, locateCaller());
    currentContext()?.collector.recordFailure(fault.failure);
    if (spec.async) return Promise.reject(fault);
    throw fault;
  }

  private claim(caller: string | undefined): void {
    if (this.shared || caller === undefined) return;
    if (this.owner === undefined) {
      this.owner = caller;
      return;
    }
    if (this.owner !== caller) {
      throw new MockOwnershipFault(this.capability.name, this.owner, caller);
    }
  }
}

export function createMock<T>(capability: CapabilitySpec<T>, options?: MockOptions): Mock<T> {
  return new Mock(capability, options);
}

/**
 * Registers an expectation on `mock`. Expectations answer in registration
 * order: the first one whose matcher accepts a call wins.
 */
export function setup<T, K extends Members<T>>(
  mock: Mock<T>,
  matcher: MemberMatcher<K>
): ExpectationBuilder<MemberResult<T, K>> {
  const expectation = mock.addExpectation(matcher);
  return {
    returns: (value) => expectation.respond({ kind: "returns", value }),
    raises: (fault) => expectation.respond({ kind: "raises", fault }),
    calls: (implementation) => expectation.respond({ kind: "calls", implementation }),
  };
}

/**
 * Asserts that exactly `times` logged invocations match `matcher`. The count
 * is derived from the invocation log, not from any expectation.
 */
export function verify<T, K extends Members<T>>(
  mock: Mock<T>,
  matcher: MemberMatcher<K>,
  times: number
): void {
  const actual = mock.invocations().filter((i) => matcher.matches(i.member, i.args)).length;
  check(
    "verify",
    actual === times,
    () =>
      `expected ${mock.capability.name}.${matcher.describe()} to be called ${times} time(s), but was called ${actual} time(s)`,
    { expected: times, actual }
  );
}

/** Asserts that every logged invocation was answered by an expectation. */
export function verifyNoOtherCalls<T>(mock: Mock<T>): void {
  const unexpected = mock.invocations().filter((i) => i.expectationId === undefined);
  check(
    "verifyNoOtherCalls",
    unexpected.length === 0,
    () =>
      `unexpected calls on ${mock.capability.name}: ${unexpected
        .map((i) => `${i.member}(${i.args.map(describeValue).join(", ")})`)
        .join(", ")}`,
    { expected: [], actual: unexpected.map((i) => i.member) }
  );
}

export function resetMock<T>(mock: Mock<T>): void {
  mock.reset();
}
