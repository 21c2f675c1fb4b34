import type { AssertionFailure } from "./types.js";

/** Counts evaluated assertions and keeps the failures of one test execution. */
export class AssertionCollector {
  private evaluated = 0;
  private failures: AssertionFailure[] = [];

  pass(): void {
    this.evaluated++;
  }

  fail(failure: AssertionFailure): void {
    this.evaluated++;
    this.failures.push(failure);
  }

  /** Records a failure that is not counted as an evaluated assertion. */
  recordFailure(failure: AssertionFailure): void {
    this.failures.push(failure);
  }

  get count(): number {
    return this.evaluated;
  }

  hasFailure(failure: AssertionFailure): boolean {
    return this.failures.includes(failure);
  }

  getFailures(): AssertionFailure[] {
    return [...this.failures];
  }

  clear(): void {
    this.evaluated = 0;
    this.failures = [];
  }
}
