import { describe, expect, it } from "vitest";
import { discover, run } from "../runner.js";
import { suite } from "./api.js";

describe("suite", () => {
  it("declares one source per test, named by group and test", () => {
    const sources = suite("Counter", {
      tests: {
        "starts at zero": () => undefined,
        "counts up": () => undefined,
      },
    });

    expect(sources.map((s) => `${s.group}::${s.name}`)).toEqual(["Counter::starts at zero", "Counter::counts up"]);
  });

  it("hands the setUp result to the test and to tearDown", async () => {
    const torn: (number | undefined)[] = [];
    const sources = suite<{ count: number }>("Counter", {
      setUp: () => ({ count: 1 }),
      tearDown: ({ fixture }) => {
        torn.push(fixture?.count);
      },
      tests: {
        "starts at one": ({ assert, fixture }) => assert.assertEqual(1, fixture.count),
        "gets a fresh fixture": ({ assert, fixture }) => {
          fixture.count++;
          assert.assertEqual(2, fixture.count);
        },
      },
    });

    const results = await run(discover(sources));

    expect(results.map((r) => r.status)).toEqual(["passed", "passed"]);
    expect(torn).toEqual([1, 2]);
  });

  it("shares one group handle across the group's tests", async () => {
    const opened: string[] = [];
    const closed: (string | undefined)[] = [];
    const sources = suite<undefined, { conn: string }>("Orders", {
      shared: {
        setUp: (group) => {
          opened.push(group.name);
          return { conn: `conn-${opened.length}` };
        },
        tearDown: (handle) => {
          closed.push(handle?.conn);
        },
      },
      tests: {
        first: ({ assert, shared }) => assert.assertEqual("conn-1", shared.conn),
        second: ({ assert, shared }) => assert.assertEqual("conn-1", shared.conn),
      },
    });

    const results = await run(discover(sources), { concurrency: 2 });

    expect(results.map((r) => r.status)).toEqual(["passed", "passed"]);
    expect(opened).toEqual(["Orders"]);
    expect(closed).toEqual(["conn-1"]);
  });

  it("merges suite and test tags and lets a test override the timeout", () => {
    const [slow, quick] = suite("Tagged", {
      tags: ["db"],
      timeout: 500,
      tests: {
        slow: { fn: () => undefined, tags: ["slow"], timeout: 2000 },
        quick: () => undefined,
      },
    });

    expect(slow.tags).toEqual(["db", "slow"]);
    expect(slow.timeout).toBe(2000);
    expect(quick.tags).toEqual(["db"]);
    expect(quick.timeout).toBe(500);
  });

  it("faults a test that reads a fixture its suite never sets up", async () => {
    const sources = suite<{ id: number }>("Bare", {
      tests: {
        reads: ({ fixture }) => fixture.id,
      },
    });

    const [result] = await run(discover(sources));

    expect(result.fault).toMatchObject({ kind: "uncaught", message: 'suite "Bare" declares no setUp' });
  });
});
