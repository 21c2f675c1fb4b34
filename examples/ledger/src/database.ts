import Database from "better-sqlite3";
import type { Fixture } from "@probity/core";

export interface MemoryDatabaseOptions {
  /** SQL run against every fresh database before the test sees it. */
  schema?: string;
  /** Rows to insert after the schema, keyed by table name. */
  seed?: Record<string, readonly Record<string, unknown>[]>;
}

export interface MemoryDatabase extends Fixture<Database.Database> {
  open(): Database.Database;
  close(handle: Database.Database | undefined): void;
}

function insertRows(
  db: Database.Database,
  table: string,
  rows: readonly Record<string, unknown>[]
): void {
  for (const row of rows) {
    const columns = Object.keys(row);
    const statement = db.prepare(
      `INSERT INTO "${table}" (${columns.map((c) => `"${c}"`).join(", ")}) VALUES (${columns
        .map((c) => `@${c}`)
        .join(", ")})`
    );
    statement.run(row);
  }
}

/**
 * An in-memory SQLite database per test, for integration-style suites.
 * Each `open()` returns a fresh database; `close()` discards it.
 *
 * @example
 * ```ts
 * const db = memoryDatabase({ schema: "CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT)" });
 * export default suite("Users", { setUp: () => db.open(), tearDown: ({ fixture }) => db.close(fixture), tests: {} });
 * ```
 */
export function memoryDatabase(options: MemoryDatabaseOptions = {}): MemoryDatabase {
  const open = (): Database.Database => {
    const db = new Database(":memory:");
    db.pragma("foreign_keys = ON");
    if (options.schema) db.exec(options.schema);
    const seed = options.seed;
    if (seed) {
      db.transaction(() => {
        for (const [table, rows] of Object.entries(seed)) insertRows(db, table, rows);
      })();
    }
    return db;
  };

  const close = (handle: Database.Database | undefined): void => {
    if (handle?.open) handle.close();
  };

  return { name: "memoryDatabase", open, close, setUp: open, tearDown: close };
}
