import { TimeoutFault } from "../errors.js";
import { withDeadline } from "../util/deadline.js";

export type Hook = () => unknown;

export type PhaseResult =
  | { status: "ok" }
  | { status: "skipped" }
  | { status: "faulted"; fault: unknown }
  | { status: "timed out" };

export interface FixtureOutcome {
  setUp: PhaseResult;
  body: PhaseResult;
  tearDown: PhaseResult;
  /** The deadline fired before setUp and body finished. */
  timedOut: boolean;
}

export interface FixtureOptions {
  /** Milliseconds allowed for setUp plus body. */
  timeout?: number;
  /** Milliseconds tearDown may take. */
  grace?: number;
  /** `performance.now()` time past which tearDown is cut short, whatever the grace left. */
  deadlineAt?: number;
  /** Called as soon as the deadline fires, before tearDown starts. */
  onTimeout?: () => void;
}

export const DEFAULT_GRACE_MS = 1000;

const OK: PhaseResult = { status: "ok" };
const SKIPPED: PhaseResult = { status: "skipped" };
const TIMED_OUT: PhaseResult = { status: "timed out" };

async function attempt(hook: Hook): Promise<PhaseResult> {
  try {
    await hook();
    return OK;
  } catch (fault) {
    return { status: "faulted", fault };
  }
}

/**
 * Runs `body` between `setUp` and `tearDown`. Never throws: every fault is
 * reported in the outcome.
 *
 * - `setUp` completes before `body` starts; when it faults `body` is skipped.
 * - `tearDown` runs exactly once on every path, including a faulted setUp
 *   and an expired deadline. It gets `grace` ms, capped by `deadlineAt`.
 * - Once the deadline fires, a setUp that finishes late never starts `body`.
 */
export async function runWithFixture(
  setUp: Hook | undefined,
  tearDown: Hook | undefined,
  body: Hook,
  options: FixtureOptions = {}
): Promise<FixtureOutcome> {
  const progress: { phase: "setUp" | "body"; cancelled: boolean } = { phase: "setUp", cancelled: false };

  const main = async (): Promise<Pick<FixtureOutcome, "setUp" | "body">> => {
    const setUpResult = setUp ? await attempt(setUp) : SKIPPED;
    if (setUpResult.status === "faulted" || progress.cancelled) return { setUp: setUpResult, body: SKIPPED };
    progress.phase = "body";
    return { setUp: setUpResult, body: await attempt(body) };
  };

  const race = await withDeadline(main(), options.timeout);
  const timedOut = !race.done;
  let outcome: Pick<FixtureOutcome, "setUp" | "body">;
  if (race.done) {
    outcome = race.value;
  } else {
    progress.cancelled = true;
    options.onTimeout?.();
    outcome =
      progress.phase === "setUp"
        ? { setUp: TIMED_OUT, body: SKIPPED }
        : { setUp: setUp ? OK : SKIPPED, body: TIMED_OUT };
  }

  if (!tearDown) return { ...outcome, tearDown: SKIPPED, timedOut };

  const grace = options.grace ?? DEFAULT_GRACE_MS;
  const limit =
    options.deadlineAt === undefined
      ? grace
      : Math.max(0, Math.min(grace, options.deadlineAt - performance.now()));
  const bounded = await withDeadline(attempt(tearDown), limit);
  const tearDownResult: PhaseResult = bounded.done
    ? bounded.value
    : {
        status: "faulted",
        fault: new TimeoutFault(
          timedOut
            ? `tearDown did not finish within the ${Math.round(limit)}ms grace period`
            : `tearDown did not finish within ${Math.round(limit)}ms`,
          limit
        ),
      };
  return { ...outcome, tearDown: tearDownResult, timedOut };
}

/** A set-up/tear-down pair that hands an explicit handle to the test. */
export interface Fixture<H> {
  readonly name?: string;
  setUp(): H | Promise<H>;
  /** Receives `undefined` when setUp faulted. */
  tearDown?(handle: H | undefined): unknown;
}

export function defineFixture<H>(fixture: Fixture<H>): Fixture<H> {
  return fixture;
}

/**
 * Runs `body` with the handle produced by `fixture`, with the guarantees of
 * {@link runWithFixture}.
 */
export function useFixture<H>(
  fixture: Fixture<H>,
  body: (handle: H) => unknown,
  options?: FixtureOptions
): Promise<FixtureOutcome> {
  let acquired: { handle: H } | undefined;
  return runWithFixture(
    async () => {
      acquired = { handle: await fixture.setUp() };
    },
    fixture.tearDown ? () => fixture.tearDown?.(acquired?.handle) : undefined,
    () => {
      if (!acquired) throw new Error(`fixture ${fixture.name ?? "(unnamed)"} produced no handle`);
      return body(acquired.handle);
    },
    options
  );
}

async function tearDownInReverse(steps: readonly (() => unknown)[]): Promise<void> {
  const faults: unknown[] = [];
  for (const step of [...steps].reverse()) {
    try {
      await step();
    } catch (fault) {
      faults.push(fault);
    }
  }
  if (faults.length === 1) throw faults[0];
  if (faults.length > 1) throw new AggregateError(faults, `${faults.length} tear-downs failed`);
}

/**
 * Combines two fixtures into one whose handle is the pair of handles. Nest
 * calls to combine more. `first` is set up before `second` and torn down
 * after it. When a set-up faults, every tear-down paired with a set-up that
 * started runs before the fault propagates, and the composite's own
 * tear-down becomes a no-op.
 */
export function composeFixtures<A, B>(first: Fixture<A>, second: Fixture<B>): Fixture<[A, B]> {
  const name = `${first.name ?? "fixture"}+${second.name ?? "fixture"}`;
  return {
    name,
    async setUp() {
      let a: A;
      try {
        a = await first.setUp();
      } catch (fault) {
        await tearDownInReverse([() => first.tearDown?.(undefined)]).catch((tearDownFault: unknown) => {
          throw new AggregateError([fault, tearDownFault], `set-up of ${name} failed, and so did its tear-down`);
        });
        throw fault;
      }
      try {
        return [a, await second.setUp()];
      } catch (fault) {
        try {
          await tearDownInReverse([() => first.tearDown?.(a), () => second.tearDown?.(undefined)]);
        } catch (tearDownFault) {
          throw new AggregateError([fault, tearDownFault], `set-up of ${name} failed, and so did its tear-down`);
        }
        throw fault;
      }
    },
    async tearDown(handles) {
      if (!handles) return;
      const [a, b] = handles;
      await tearDownInReverse([() => first.tearDown?.(a), () => second.tearDown?.(b)]);
    },
  };
}
