import { describe, expect, it, vi } from "vitest";
import { AssertionFailed, TimeoutFault } from "../errors.js";
import { composeFixtures, defineFixture, runWithFixture, useFixture } from "./fixture.js";

const never = () => new Promise<never>(() => undefined);
const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runWithFixture", () => {
  it("runs setUp, body and tearDown in order", async () => {
    const events: string[] = [];
    const outcome = await runWithFixture(
      async () => {
        await Promise.resolve();
        events.push("setUp");
      },
      () => events.push("tearDown"),
      () => events.push("body")
    );

    expect(events).toEqual(["setUp", "body", "tearDown"]);
    expect(outcome).toEqual({
      setUp: { status: "ok" },
      body: { status: "ok" },
      tearDown: { status: "ok" },
      timedOut: false,
    });
  });

  it("skips the body but still tears down when setUp faults", async () => {
    const fault = new Error("no connection");
    const body = vi.fn();
    const tearDown = vi.fn();

    const outcome = await runWithFixture(
      () => {
        throw fault;
      },
      tearDown,
      body
    );

    expect(body).not.toHaveBeenCalled();
    expect(tearDown).toHaveBeenCalledTimes(1);
    expect(outcome.setUp).toEqual({ status: "faulted", fault });
    expect(outcome.body).toEqual({ status: "skipped" });
  });

  it("keeps both the body fault and the tearDown fault", async () => {
    const bodyFault = new Error("body");
    const tearDownFault = new Error("tearDown");

    const outcome = await runWithFixture(
      undefined,
      () => {
        throw tearDownFault;
      },
      () => {
        throw bodyFault;
      }
    );

    expect(outcome.setUp).toEqual({ status: "skipped" });
    expect(outcome.body).toEqual({ status: "faulted", fault: bodyFault });
    expect(outcome.tearDown).toEqual({ status: "faulted", fault: tearDownFault });
  });

  it("tears down exactly once whatever the body does", async () => {
    const bodies: (() => unknown)[] = [
      () => undefined,
      () => {
        throw new AssertionFailed({ kind: "fail", message: "failed" });
      },
      () => {
        throw new TypeError("fault");
      },
      never,
    ];

    for (const body of bodies) {
      let tornDown = 0;
      await runWithFixture(
        () => undefined,
        () => {
          tornDown++;
        },
        body,
        { timeout: 20 }
      );
      expect(tornDown).toBe(1);
    }
  });

  it("times out a hanging body, then tears down", async () => {
    const onTimeout = vi.fn();
    const tearDown = vi.fn();

    const outcome = await runWithFixture(undefined, tearDown, never, { timeout: 20, onTimeout });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.body).toEqual({ status: "timed out" });
    expect(outcome.tearDown).toEqual({ status: "ok" });
    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(tearDown).toHaveBeenCalledTimes(1);
  });

  it("times out a hanging setUp and skips the body", async () => {
    const body = vi.fn();
    const tearDown = vi.fn();

    const outcome = await runWithFixture(never, tearDown, body, { timeout: 20 });

    expect(outcome.setUp).toEqual({ status: "timed out" });
    expect(outcome.body).toEqual({ status: "skipped" });
    expect(body).not.toHaveBeenCalled();
    expect(tearDown).toHaveBeenCalledTimes(1);
  });

  it("never starts the body once a slow setUp has timed out", async () => {
    const order: string[] = [];

    const outcome = await runWithFixture(
      async () => {
        await sleep(60);
        order.push("setUp");
      },
      () => {
        order.push("tearDown");
      },
      () => {
        order.push("body");
      },
      { timeout: 20 }
    );
    await sleep(80);

    expect(outcome.setUp).toEqual({ status: "timed out" });
    expect(outcome.body).toEqual({ status: "skipped" });
    expect(order).toEqual(["tearDown", "setUp"]);
  });

  it("bounds tearDown by the grace period when nothing timed out", async () => {
    const outcome = await runWithFixture(undefined, never, () => undefined, { grace: 10 });

    expect(outcome.timedOut).toBe(false);
    expect(outcome.body).toEqual({ status: "ok" });
    const fault = outcome.tearDown.status === "faulted" ? outcome.tearDown.fault : undefined;
    expect(fault).toBeInstanceOf(TimeoutFault);
    expect(fault).toHaveProperty("message", "tearDown did not finish within 10ms");
  });

  it("cuts tearDown short at the deadline even with grace left", async () => {
    const started = performance.now();
    const outcome = await runWithFixture(undefined, never, () => undefined, {
      grace: 5000,
      deadlineAt: performance.now() + 20,
    });

    expect(outcome.tearDown.status).toBe("faulted");
    expect(performance.now() - started).toBeLessThan(1000);
  });

  it("bounds tearDown by the grace period after a timeout", async () => {
    const outcome = await runWithFixture(undefined, never, never, { timeout: 10, grace: 10 });

    expect(outcome.tearDown.status).toBe("faulted");
    const fault = outcome.tearDown.status === "faulted" ? outcome.tearDown.fault : undefined;
    expect(fault).toBeInstanceOf(TimeoutFault);
    expect(fault).toHaveProperty("message", "tearDown did not finish within the 10ms grace period");
  });
});

describe("useFixture", () => {
  it("hands the set-up handle to the body and the tearDown", async () => {
    const closed: string[] = [];
    const connection = defineFixture({
      name: "connection",
      setUp: () => ({ url: "memory://test" }),
      tearDown: (handle) => {
        closed.push(handle?.url ?? "none");
      },
    });

    let seen = "";
    await useFixture(connection, (handle) => {
      seen = handle.url;
    });

    expect(seen).toBe("memory://test");
    expect(closed).toEqual(["memory://test"]);
  });

  it("passes undefined to tearDown when setUp faulted", async () => {
    const handles: unknown[] = [];
    const broken = defineFixture<number>({
      setUp: () => {
        throw new Error("nope");
      },
      tearDown: (handle) => {
        handles.push(handle);
      },
    });

    const outcome = await useFixture(broken, () => undefined);

    expect(outcome.setUp.status).toBe("faulted");
    expect(handles).toEqual([undefined]);
  });
});

describe("composeFixtures", () => {
  function tracked(name: string, events: string[], failSetUp = false) {
    return defineFixture<string>({
      name,
      setUp: () => {
        events.push(`setUp ${name}`);
        if (failSetUp) throw new Error(`${name} failed`);
        return name;
      },
      tearDown: (handle) => {
        events.push(`tearDown ${name}:${handle ?? "none"}`);
      },
    });
  }

  it("sets up in order and tears down in reverse", async () => {
    const events: string[] = [];
    const both = composeFixtures(tracked("db", events), tracked("cache", events));

    await useFixture(both, ([db, cache]) => {
      events.push(`body ${db}+${cache}`);
    });

    expect(both.name).toBe("db+cache");
    expect(events).toEqual([
      "setUp db",
      "setUp cache",
      "body db+cache",
      "tearDown cache:cache",
      "tearDown db:db",
    ]);
  });

  it("tears down what was set up when a later setUp faults", async () => {
    const events: string[] = [];
    const both = composeFixtures(tracked("db", events), tracked("cache", events, true));

    const outcome = await useFixture(both, () => {
      events.push("body");
    });

    expect(outcome.setUp.status).toBe("faulted");
    expect(outcome.tearDown).toEqual({ status: "ok" });
    expect(events).toEqual(["setUp db", "setUp cache", "tearDown cache:none", "tearDown db:db"]);
  });
});
