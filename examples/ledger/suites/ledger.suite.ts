import type Database from "better-sqlite3";
import {
  any,
  createMock,
  defineCapability,
  on,
  setup,
  suite,
  verify,
  verifyNoOtherCalls,
  type Mock,
} from "@probity/core";
import { memoryDatabase } from "../src/database.js";
import { Ledger, SCHEMA, type Clock, type RateProvider } from "../src/ledger.js";

const ClockSpec = defineCapability<Clock>("Clock", {
  now: { arity: 0, returns: "number" },
});

const RatesSpec = defineCapability<RateProvider>("RateProvider", {
  rate: { arity: 2, returns: "number", async: true },
});

const database = memoryDatabase({ schema: SCHEMA });

interface LedgerFixture {
  db: Database.Database;
  clock: Mock<Clock>;
  rates: Mock<RateProvider>;
  ledger: Ledger;
}

export default suite<LedgerFixture>("Ledger", {
  tags: ["example"],
  setUp: () => {
    const db = database.open();
    const clock = createMock(ClockSpec);
    const rates = createMock(RatesSpec);
    setup(clock, on("now")).returns(1_700_000_000);
    return { db, clock, rates, ledger: new Ledger(db, clock.object, rates.object) };
  },
  tearDown: ({ fixture }) => database.close(fixture?.db),
  tests: {
    "records an entry stamped by the clock": ({ assert, fixture }) => {
      const entry = fixture.ledger.record("alice", 25, "EUR");
      assert.assertEqual({ account: "alice", amount: 25, currency: "EUR", at: 1_700_000_000 }, entry);
      verify(fixture.clock, on("now"), 1);
    },

    "rejects a zero amount": ({ assert, fixture }) => {
      assert.assertThrows(RangeError, () => fixture.ledger.record("alice", 0, "EUR"));
      verify(fixture.clock, on("now"), 0);
    },

    "converts foreign entries at the provider's rate": async ({ assert, fixture }) => {
      setup(fixture.rates, on("rate", "USD", "EUR")).returns(0.5);
      fixture.ledger.record("bob", 10, "EUR");
      fixture.ledger.record("bob", 8, "USD");
      assert.assertEqual(14, await fixture.ledger.balance("bob", "EUR"));
      verify(fixture.rates, on("rate", any(), "EUR"), 1);
      verifyNoOtherCalls(fixture.rates);
    },
  },
});
