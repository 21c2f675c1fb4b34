import { z } from "zod";
import { createAssertions } from "./assert/api.js";
import { AssertionCollector } from "./assert/collector.js";
import type { AssertionFailure } from "./assert/types.js";
import { runInContext } from "./context.js";
import {
  AssertionFailed,
  DiscoveryError,
  FixtureFault,
  TimeoutFault,
  errorMessage,
  toFaultRecord,
  type FaultRecord,
} from "./errors.js";
import { DEFAULT_GRACE_MS, runWithFixture, type FixtureOutcome } from "./fixture/fixture.js";
import { GroupFixtureScope, type GroupContext } from "./fixture/group.js";
import type { FinalStatus, TestContext, TestResult, TestSource } from "./suite/types.js";
import { TestUnit } from "./suite/unit.js";
import { validateSource } from "./suite/validator.js";
import { withDeadline } from "./util/deadline.js";
import { pool } from "./util/pool.js";

export interface RunnerOptions {
  /** Units in flight at once; 1 runs sequentially. */
  concurrency?: number;
  /** Per-unit timeout in ms, covering setUp and body. */
  timeout?: number;
  /** Time tearDown may take after a timeout. */
  grace?: number;
  /** Budget in ms for the whole run. */
  deadline?: number;
  /**
   * Called as each unit finishes, in completion order. A fault it raises is
   * printed as a warning and does not stop the run.
   */
  onResult?: (result: TestResult) => void;
}

export const DEFAULT_TIMEOUT_MS = 5000;

const runnerOptionsSchema = z.object({
  concurrency: z.number().int().positive().optional(),
  timeout: z.number().positive().optional(),
  grace: z.number().nonnegative().optional(),
  deadline: z.number().positive().optional(),
  onResult: z.custom<(result: TestResult) => void>((v) => typeof v === "function").optional(),
});

interface RunState {
  deadlineAt?: number;
  groups: Map<string, GroupContext>;
  scopes: Map<string, GroupFixtureScope>;
}

export class TestRunner {
  private options: RunnerOptions;

  constructor(options?: RunnerOptions) {
    this.options = runnerOptionsSchema.parse(options ?? {});
  }

  /**
   * Turns resolved test sources into units, in input order. Every invalid
   * source and every duplicate fully-qualified name is reported at once.
   */
  discover(sources: readonly TestSource[]): TestUnit[] {
    const problems: string[] = [];
    const units: TestUnit[] = [];

    sources.forEach((source, index) => {
      const result = validateSource(source);
      if (!result.valid) {
        const label = typeof source?.name === "string" ? `"${source.name}"` : `#${index}`;
        problems.push(`test ${label}: ${result.errors.join(", ")}`);
        return;
      }
      units.push(new TestUnit(source));
    });

    problems.push(...checkUnits(units));
    if (problems.length > 0) throw new DiscoveryError(problems);
    return units;
  }

  /**
   * Executes `units` with at most `concurrency` in flight. Results come back
   * in input order whatever the execution order, one per unit.
   */
  async run(units: readonly TestUnit[], concurrency?: number): Promise<TestResult[]> {
    const problems = checkUnits(units);
    if (problems.length > 0) throw new DiscoveryError(problems);

    const state = this.prepare(units);
    for (const unit of units) unit.reset();

    return pool(
      units,
      async (unit) => {
        const result = await this.execute(unit, state);
        try {
          this.options.onResult?.(result);
        } catch (e) {
          console.warn(`Warning: onResult failed for ${unit.fullName}: ${errorMessage(e)}`);
        }
        return result;
      },
      concurrency ?? this.options.concurrency ?? 1
    );
  }

  private prepare(units: readonly TestUnit[]): RunState {
    const groups = new Map<string, GroupContext>();
    const counts = new Map<string, number>();
    for (const unit of units) {
      if (!groups.has(unit.group)) groups.set(unit.group, Object.freeze({ name: unit.group }));
      counts.set(unit.group, (counts.get(unit.group) ?? 0) + 1);
    }

    const scopes = new Map<string, GroupFixtureScope>();
    for (const unit of units) {
      const group = groups.get(unit.group);
      if (unit.groupFixture && group && !scopes.has(unit.group)) {
        scopes.set(
          unit.group,
          new GroupFixtureScope(group, unit.groupFixture, counts.get(unit.group) ?? 0)
        );
      }
    }

    const deadlineAt =
      this.options.deadline !== undefined ? performance.now() + this.options.deadline : undefined;
    return { deadlineAt, groups, scopes };
  }

  private async execute(unit: TestUnit, state: RunState): Promise<TestResult> {
    const start = performance.now();
    unit.transition("running");

    const collector = new AssertionCollector();
    const fixtureFaults: FaultRecord[] = [];
    const scope = state.scopes.get(unit.group);
    let fault: FaultRecord | undefined;

    const finish = (): TestResult => {
      const failures = collector.getFailures();
      const status: FinalStatus =
        fault || failures.length > 0 || fixtureFaults.length > 0
          ? "failed"
          : collector.count === 0
            ? "inconclusive"
            : "passed";
      unit.transition(status);
      return Object.freeze({
        unit,
        status,
        duration: performance.now() - start,
        assertionCount: collector.count,
        failures: Object.freeze(failures),
        fault,
        fixtureFaults: Object.freeze([...fixtureFaults]),
      });
    };

    const releaseGroup = async (): Promise<void> => {
      if (!scope) return;
      const grace = this.options.grace ?? DEFAULT_GRACE_MS;
      const released = await withDeadline(scope.release(), Math.max(grace, limitFor(unit, this.options)));
      if (!released.done) {
        fixtureFaults.push(
          fixtureFault(
            "group tearDown",
            new TimeoutFault(`Shared fixture of ${unit.group} did not tear down in time`, grace)
          )
        );
      } else if (released.value?.status === "faulted") {
        fixtureFaults.push(fixtureFault("group tearDown", released.value.fault));
      }
    };

    const remaining = state.deadlineAt === undefined ? undefined : state.deadlineAt - performance.now();
    if (remaining !== undefined && remaining <= 0) {
      fault = toFaultRecord(
        "timeout",
        new TimeoutFault("Run deadline passed before the test started", this.options.deadline ?? 0)
      );
      await releaseGroup();
      return finish();
    }

    const limit = Math.min(limitFor(unit, this.options), remaining ?? Infinity);

    if (scope) {
      const acquired = await withDeadline(scope.acquire(), limit);
      if (!acquired.done) {
        fault = toFaultRecord(
          "timeout",
          new TimeoutFault(`Shared fixture of ${unit.group} did not set up within ${limit}ms`, limit)
        );
      } else if (acquired.value.status === "faulted") {
        fixtureFaults.push(fixtureFault("group setUp", acquired.value.fault));
      }
      if (fault || fixtureFaults.length > 0) {
        await releaseGroup();
        return finish();
      }
    }

    const group = state.groups.get(unit.group) ?? Object.freeze({ name: unit.group });
    const controller = new AbortController();
    const ctx: TestContext = {
      unit: { group: unit.group, name: unit.name, fullName: unit.fullName },
      assert: createAssertions(collector),
      group,
      signal: controller.signal,
    };
    const budget = Math.max(0, limit - (performance.now() - start));
    const timeoutFault = new TimeoutFault(`${unit.fullName} exceeded its ${Math.round(limit)}ms timeout`, limit);

    const setUp = unit.setUp;
    const tearDown = unit.tearDown;
    const outcome = await runInContext({ unit: unit.fullName, collector }, () =>
      runWithFixture(
        setUp && (() => setUp(ctx)),
        tearDown && (() => tearDown(ctx)),
        () => unit.fn(ctx),
        {
          timeout: budget,
          grace: this.options.grace ?? DEFAULT_GRACE_MS,
          deadlineAt: state.deadlineAt,
          onTimeout: () => controller.abort(timeoutFault),
        }
      )
    );

    fault = this.interpret(outcome, collector, fixtureFaults) ?? (outcome.timedOut
      ? toFaultRecord("timeout", timeoutFault)
      : undefined);

    await releaseGroup();
    return finish();
  }

  /** Sorts the faults of a fixture outcome; returns the body's uncaught fault, if any. */
  private interpret(
    outcome: FixtureOutcome,
    collector: AssertionCollector,
    fixtureFaults: FaultRecord[]
  ): FaultRecord | undefined {
    let fault: FaultRecord | undefined;

    if (outcome.setUp.status === "faulted") {
      fixtureFaults.push(fixtureFault("setUp", outcome.setUp.fault));
    }

    if (outcome.body.status === "faulted") {
      const thrown = outcome.body.fault;
      if (thrown instanceof AssertionFailed) {
        if (!collector.hasFailure(thrown.failure)) collector.recordFailure(thrown.failure);
      } else {
        fault = toFaultRecord("uncaught", thrown);
      }
    }

    if (outcome.tearDown.status === "faulted") {
      fixtureFaults.push(fixtureFault("tearDown", outcome.tearDown.fault));
    }

    return fault;
  }
}

function fixtureFault(phase: NonNullable<FaultRecord["phase"]>, cause: unknown): FaultRecord {
  return toFaultRecord("fixture", new FixtureFault(phase, cause), phase);
}

function limitFor(unit: TestUnit, options: RunnerOptions): number {
  return unit.timeout ?? options.timeout ?? DEFAULT_TIMEOUT_MS;
}

function checkUnits(units: readonly TestUnit[]): string[] {
  const problems: string[] = [];
  const seen = new Set<string>();
  const fixtures = new Map<string, unknown>();

  for (const unit of units) {
    if (seen.has(unit.fullName)) {
      problems.push(`duplicate test name "${unit.fullName}"`);
    }
    seen.add(unit.fullName);

    if (unit.groupFixture) {
      const known = fixtures.get(unit.group);
      if (known !== undefined && known !== unit.groupFixture) {
        problems.push(`group "${unit.group}" declares more than one shared fixture`);
      }
      fixtures.set(unit.group, unit.groupFixture);
    }
  }
  return problems;
}

export function discover(sources: readonly TestSource[]): TestUnit[] {
  return new TestRunner().discover(sources);
}

export function run(units: readonly TestUnit[], options?: RunnerOptions): Promise<TestResult[]> {
  return new TestRunner(options).run(units);
}

export interface FailureDetail {
  fullName: string;
  failures: readonly AssertionFailure[];
  fault?: FaultRecord;
  fixtureFaults: readonly FaultRecord[];
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  inconclusive: number;
  /** Sum of unit durations in ms. */
  duration: number;
  failures: FailureDetail[];
}

export function summarize(results: readonly TestResult[]): RunSummary {
  const count = (status: FinalStatus) => results.filter((r) => r.status === status).length;
  return {
    total: results.length,
    passed: count("passed"),
    failed: count("failed"),
    inconclusive: count("inconclusive"),
    duration: results.reduce((sum, r) => sum + r.duration, 0),
    failures: results
      .filter((r) => r.status === "failed")
      .map((r) => ({
        fullName: r.unit.fullName,
        failures: r.failures,
        fault: r.fault,
        fixtureFaults: r.fixtureFaults,
      })),
  };
}

export interface UnitFilter {
  /** Case-insensitive substring of the fully-qualified name or file path. */
  pattern?: string;
  tag?: string;
}

export function filterUnits(units: readonly TestUnit[], filter: UnitFilter): TestUnit[] {
  const pattern = filter.pattern?.toLowerCase();
  return units.filter((unit) => {
    if (filter.tag && !unit.tags.includes(filter.tag)) return false;
    if (!pattern) return true;
    return (
      unit.fullName.toLowerCase().includes(pattern) ||
      (unit.filePath?.toLowerCase().includes(pattern) ?? false)
    );
  });
}
