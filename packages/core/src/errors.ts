import type { AssertionFailure } from "./assert/types.js";
import type { SourceLocation } from "./assert/location.js";

export type FaultKind = "uncaught" | "timeout" | "fixture";

/** Serialisable snapshot of a thrown value, attached to a TestResult. */
export interface FaultRecord {
  kind: FaultKind;
  name: string;
  message: string;
  stack?: string;
  /** Which lifecycle phase raised it, for fixture faults. */
  phase?: "setUp" | "tearDown" | "group setUp" | "group tearDown";
}

/** Raised by every failing assertion; carries the structured failure. */
export class AssertionFailed extends Error {
  readonly failure: AssertionFailure;

  constructor(failure: AssertionFailure) {
    super(failure.message);
    this.name = "AssertionFailed";
    this.failure = failure;
  }
}

/**
 * A strict mock received a call that no expectation matches. Surfaces the
 * same way as an assertion failure.
 */
export class UnconfiguredInvocation extends AssertionFailed {
  readonly capability: string;
  readonly member: string;
  readonly args: readonly unknown[];

  constructor(
    capability: string,
    member: string,
    args: readonly unknown[],
    location?: SourceLocation
  ) {
    super(
      Object.freeze({
        kind: "unconfiguredInvocation",
        message: `Unconfigured invocation: ${capability}.${member}(${args.map(describeValue).join(", ")})`,
        actual: args,
        location,
      })
    );
    this.name = "UnconfiguredInvocation";
    this.capability = capability;
    this.member = member;
    this.args = args;
  }
}

export class FixtureFault extends Error {
  readonly phase: NonNullable<FaultRecord["phase"]>;

  constructor(phase: NonNullable<FaultRecord["phase"]>, cause: unknown) {
    super(`${phase} failed: ${errorMessage(cause)}`, { cause });
    this.name = "FixtureFault";
    this.phase = phase;
  }
}

export class TimeoutFault extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "TimeoutFault";
    this.timeoutMs = timeoutMs;
  }
}

/** A non-shared mock was invoked from a test that does not own it. */
export class MockOwnershipFault extends Error {
  constructor(capability: string, owner: string, caller: string) {
    super(
      `Mock of ${capability} is owned by "${owner}" but was invoked from "${caller}". Create it with { shared: true } to share it across tests.`
    );
    this.name = "MockOwnershipFault";
  }
}

export class DiscoveryError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Discovery failed:\n  ${problems.join("\n  ")}`);
    this.name = "DiscoveryError";
    this.problems = problems;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function toFaultRecord(
  kind: FaultKind,
  e: unknown,
  phase?: FaultRecord["phase"]
): FaultRecord {
  // A fixture fault's own stack points into the runner; keep the hook's.
  const origin = e instanceof FixtureFault && e.cause instanceof Error ? e.cause : e;
  const record: FaultRecord =
    e instanceof Error
      ? { kind, name: e.name, message: e.message, stack: origin instanceof Error ? origin.stack : e.stack }
      : { kind, name: typeof e, message: String(e) };
  if (phase) record.phase = phase;
  return Object.freeze(record);
}

export function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : `Date(${value.toISOString()})`;
  }
  if (value instanceof Map) return `Map(${value.size})`;
  if (value instanceof Set) return `Set(${value.size})`;
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value);
    } catch {
      return Object.prototype.toString.call(value);
    }
  }
  return String(value);
}
