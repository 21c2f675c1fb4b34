import type { Assert } from "../assert/api.js";
import type { AssertionFailure } from "../assert/types.js";
import type { FaultRecord } from "../errors.js";
import type { GroupContext, GroupFixture } from "../fixture/group.js";
import type { TestUnit } from "./unit.js";

export type TestStatus = "pending" | "running" | "passed" | "failed" | "inconclusive";

export type FinalStatus = Extract<TestStatus, "passed" | "failed" | "inconclusive">;

export interface UnitIdentity {
  readonly group: string;
  readonly name: string;
  readonly fullName: string;
}

/** Handed to a unit's setUp, body and tearDown; the same object for all three. */
export interface TestContext {
  readonly unit: UnitIdentity;
  readonly assert: Assert;
  readonly group: GroupContext;
  /** Aborted when the unit's deadline fires. */
  readonly signal: AbortSignal;
}

export type TestFn = (ctx: TestContext) => unknown;

/** A resolved test candidate, as supplied by a discovery collaborator. */
export interface TestSource {
  group: string;
  name: string;
  fn: TestFn;
  setUp?: TestFn;
  tearDown?: TestFn;
  /** Opt-in fixture shared by every unit of the group. */
  groupFixture?: GroupFixture;
  tags?: string[];
  /** Per-unit timeout in ms, overriding the runner's. */
  timeout?: number;
  filePath?: string;
}

export interface TestResult {
  readonly unit: TestUnit;
  readonly status: FinalStatus;
  /** Milliseconds from start of the unit to its result. */
  readonly duration: number;
  readonly assertionCount: number;
  readonly failures: readonly AssertionFailure[];
  /** Uncaught or timeout fault of the unit, the primary failure when present. */
  readonly fault?: FaultRecord;
  readonly fixtureFaults: readonly FaultRecord[];
}
