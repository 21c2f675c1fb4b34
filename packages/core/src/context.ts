import { AsyncLocalStorage } from "node:async_hooks";
import type { AssertionCollector } from "./assert/collector.js";

/** What the engine knows about the test currently executing. */
export interface ExecutionContext {
  /** Fully-qualified name of the running unit; absent inside group fixtures. */
  unit?: string;
  collector: AssertionCollector;
}

const storage = new AsyncLocalStorage<ExecutionContext>();

export function runInContext<T>(context: ExecutionContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function currentContext(): ExecutionContext | undefined {
  return storage.getStore();
}
