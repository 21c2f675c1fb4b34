import type { GroupFixture } from "../fixture/group.js";
import type { FinalStatus, TestFn, TestSource, TestStatus, UnitIdentity } from "./types.js";

const TRANSITIONS: Record<TestStatus, readonly TestStatus[]> = {
  pending: ["running"],
  running: ["passed", "failed", "inconclusive"],
  passed: [],
  failed: [],
  inconclusive: [],
};

export function fullNameOf(group: string, name: string): string {
  return `${group}::${name}`;
}

/** One discoverable, independently executable test case. */
export class TestUnit implements UnitIdentity {
  readonly group: string;
  readonly name: string;
  readonly fullName: string;
  readonly fn: TestFn;
  readonly setUp?: TestFn;
  readonly tearDown?: TestFn;
  readonly groupFixture?: GroupFixture;
  readonly tags: readonly string[];
  readonly timeout?: number;
  readonly filePath?: string;
  private current: TestStatus = "pending";

  constructor(source: TestSource) {
    this.group = source.group;
    this.name = source.name;
    this.fullName = fullNameOf(source.group, source.name);
    this.fn = source.fn;
    this.setUp = source.setUp;
    this.tearDown = source.tearDown;
    this.groupFixture = source.groupFixture;
    this.tags = Object.freeze([...(source.tags ?? [])]);
    this.timeout = source.timeout;
    this.filePath = source.filePath;
  }

  get status(): TestStatus {
    return this.current;
  }

  /** @internal Moves along pending → running → final; anything else is a runner defect. */
  transition(next: "running" | FinalStatus): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal status transition for ${this.fullName}: ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  /** @internal Returns the unit to `pending` before a new run. */
  reset(): void {
    this.current = "pending";
  }

  toJSON(): UnitIdentity & { tags: readonly string[]; filePath?: string } {
    return {
      group: this.group,
      name: this.name,
      fullName: this.fullName,
      tags: this.tags,
      filePath: this.filePath,
    };
  }
}
