import type Database from "better-sqlite3";

export interface Clock {
  now(): number;
}

export interface RateProvider {
  rate(from: string, to: string): Promise<number>;
}

export interface Entry {
  account: string;
  amount: number;
  currency: string;
  at: number;
}

export const SCHEMA = `
  CREATE TABLE entries (
    id       INTEGER PRIMARY KEY AUTOINCREMENT,
    account  TEXT NOT NULL,
    amount   REAL NOT NULL,
    currency TEXT NOT NULL,
    at       INTEGER NOT NULL
  );
`;

export class Ledger {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: Clock,
    private readonly rates: RateProvider
  ) {}

  record(account: string, amount: number, currency: string): Entry {
    if (amount === 0) throw new RangeError("amount must not be zero");
    const entry: Entry = { account, amount, currency, at: this.clock.now() };
    this.db
      .prepare("INSERT INTO entries (account, amount, currency, at) VALUES (@account, @amount, @currency, @at)")
      .run(entry);
    return entry;
  }

  async balance(account: string, currency: string): Promise<number> {
    const rows = this.db
      .prepare("SELECT amount, currency FROM entries WHERE account = ? ORDER BY id")
      .all(account);
    let total = 0;
    for (const row of rows) {
      if (!isAmountRow(row)) continue;
      total += row.currency === currency ? row.amount : row.amount * (await this.rates.rate(row.currency, currency));
    }
    return total;
  }
}

function isAmountRow(row: unknown): row is { amount: number; currency: string } {
  return (
    typeof row === "object" &&
    row !== null &&
    "amount" in row &&
    typeof row.amount === "number" &&
    "currency" in row &&
    typeof row.currency === "string"
  );
}
