import type { GroupContext, GroupFixture } from "../fixture/group.js";
import type { TestContext, TestSource } from "./types.js";

/** Test context of a suite: the unit's fixture handle and the group's shared handle. */
export interface SuiteContext<F, S> extends TestContext {
  readonly fixture: F;
  readonly shared: S;
}

export type SuiteTestFn<F, S> = (ctx: SuiteContext<F, S>) => unknown;

export type SuiteTest<F, S> =
  | SuiteTestFn<F, S>
  | { fn: SuiteTestFn<F, S>; tags?: string[]; timeout?: number };

export interface SharedFixture<S> {
  setUp(group: GroupContext): S | Promise<S>;
  /** Receives `undefined` when setUp faulted. */
  tearDown?(handle: S | undefined, group: GroupContext): unknown;
}

export interface SuiteDefinition<F, S> {
  /** Runs before every test; its result is `ctx.fixture`. */
  setUp?: (ctx: TestContext) => F | Promise<F>;
  tearDown?: (ctx: SuiteContext<F | undefined, S>) => unknown;
  /** Runs once for the whole group instead of once per test; its result is `ctx.shared`. */
  shared?: SharedFixture<S>;
  tags?: string[];
  timeout?: number;
  tests: Record<string, SuiteTest<F, S>>;
}

/**
 * Declares the tests of one group. Fixture handles are passed explicitly:
 * whatever `setUp` returns is `ctx.fixture` in the test and its tear-down.
 *
 * @example
 * ```ts
 * export default suite("Counter", {
 *   setUp: () => ({ count: 1 }),
 *   tests: {
 *     "starts at one": ({ assert, fixture }) => assert.assertEqual(1, fixture.count),
 *   },
 * });
 * ```
 */
export function suite<F = undefined, S = undefined>(
  group: string,
  definition: SuiteDefinition<F, S>
): TestSource[] {
  const fixtures = new WeakMap<TestContext, { value: F }>();
  const sharedHandles = new WeakMap<GroupContext, { value: S }>();
  const sharedDefinition = definition.shared;

  const groupFixture: GroupFixture | undefined = sharedDefinition && {
    async setUp(groupContext) {
      sharedHandles.set(groupContext, { value: await sharedDefinition.setUp(groupContext) });
    },
    tearDown: (groupContext) =>
      sharedDefinition.tearDown?.(sharedHandles.get(groupContext)?.value, groupContext),
  };

  function sharedOf(ctx: TestContext): S {
    const box = sharedHandles.get(ctx.group);
    if (!box) throw new Error(`suite "${group}" declares no shared fixture`);
    return box.value;
  }

  function contextFor(ctx: TestContext): SuiteContext<F, S> {
    return {
      ...ctx,
      get fixture(): F {
        const box = fixtures.get(ctx);
        if (!box) throw new Error(`suite "${group}" declares no setUp`);
        return box.value;
      },
      get shared(): S {
        return sharedOf(ctx);
      },
    };
  }

  const setUp = definition.setUp;
  const tearDown = definition.tearDown;

  return Object.entries(definition.tests).map(([name, test]): TestSource => {
    const { fn, tags, timeout } = typeof test === "function" ? { fn: test, tags: [], timeout: undefined } : test;
    return {
      group,
      name,
      fn: (ctx) => fn(contextFor(ctx)),
      setUp: setUp
        ? async (ctx: TestContext) => {
            fixtures.set(ctx, { value: await setUp(ctx) });
          }
        : undefined,
      tearDown: tearDown
        ? (ctx: TestContext) =>
            tearDown({
              ...ctx,
              fixture: fixtures.get(ctx)?.value,
              get shared(): S {
                return sharedOf(ctx);
              },
            })
        : undefined,
      groupFixture,
      tags: [...(definition.tags ?? []), ...(tags ?? [])],
      timeout: timeout ?? definition.timeout,
    };
  });
}
