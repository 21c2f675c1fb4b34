import { runInContext, type ExecutionContext } from "../context.js";
import { AssertionCollector } from "../assert/collector.js";
import type { PhaseResult } from "./fixture.js";

/** Identity of one group (class-like grouping) within one run. */
export interface GroupContext {
  readonly name: string;
}

/** A fixture shared by every unit of a group. Opt-in; never the default. */
export interface GroupFixture {
  setUp(group: GroupContext): unknown;
  tearDown?(group: GroupContext): unknown;
}

async function attempt(context: ExecutionContext, hook: () => unknown): Promise<PhaseResult> {
  try {
    await runInContext(context, hook);
    return { status: "ok" };
  } catch (fault) {
    return { status: "faulted", fault };
  }
}

/**
 * Runs a group fixture once per group per run: set up by the first unit that
 * acquires it, torn down by the last unit that releases it.
 */
export class GroupFixtureScope {
  readonly group: GroupContext;
  private readonly fixture: GroupFixture;
  private remaining: number;
  private setUpResult?: Promise<PhaseResult>;
  // Group hooks run outside any unit, so their assertions count nowhere.
  private readonly context: ExecutionContext = { collector: new AssertionCollector() };

  constructor(group: GroupContext, fixture: GroupFixture, units: number) {
    this.group = group;
    this.fixture = fixture;
    this.remaining = units;
  }

  acquire(): Promise<PhaseResult> {
    this.setUpResult ??= attempt(this.context, () => this.fixture.setUp(this.group));
    return this.setUpResult;
  }

  /**
   * Marks one unit as done. Returns the tear-down result when this was the
   * last unit and set-up had been attempted, otherwise `undefined`.
   */
  async release(): Promise<PhaseResult | undefined> {
    this.remaining--;
    if (this.remaining > 0 || !this.setUpResult) return undefined;
    await this.setUpResult;
    const tearDown = this.fixture.tearDown;
    if (!tearDown) return undefined;
    return attempt(this.context, () => tearDown.call(this.fixture, this.group));
  }
}
