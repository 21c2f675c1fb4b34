export interface Invocation {
  /** Monotonic per log; equals call order. */
  readonly sequence: number;
  readonly member: string;
  readonly args: readonly unknown[];
  /** `performance.now()` at the time of the call. */
  readonly timestamp: number;
  /** Fully-qualified name of the test that made the call. */
  readonly unit?: string;
  /** Expectation that answered the call, if any. */
  readonly expectationId?: number;
}

/**
 * Append-only record of a mock's invocations. Appends are synchronous, so a
 * single event loop is the only writer and entries land in call order even
 * when tests sharing the mock run concurrently.
 */
export class InvocationLog {
  private entries: Invocation[] = [];
  private sequence = 0;

  append(entry: Omit<Invocation, "sequence" | "timestamp">): Invocation {
    const invocation: Invocation = Object.freeze({
      ...entry,
      args: Object.freeze([...entry.args]),
      sequence: ++this.sequence,
      timestamp: performance.now(),
    });
    this.entries.push(invocation);
    return invocation;
  }

  all(): Invocation[] {
    return [...this.entries];
  }

  count(predicate: (invocation: Invocation) => boolean): number {
    return this.entries.filter(predicate).length;
  }

  clear(): void {
    this.entries = [];
  }
}
