import type { AssertionFailure } from "../assert/types.js";
import { describeValue, type FaultRecord } from "../errors.js";
import { summarize, type RunSummary } from "../runner.js";
import type { FinalStatus, TestResult } from "../suite/types.js";

export const REPORT_VERSION = "1";

export interface JsonFailure {
  kind: string;
  message: string;
  expected?: string;
  actual?: string;
  location?: AssertionFailure["location"];
}

export interface JsonResult {
  test: string;
  group: string;
  name: string;
  file?: string;
  tags: readonly string[];
  status: FinalStatus;
  duration: number;
  assertionCount: number;
  failures: JsonFailure[];
  fault?: FaultRecord;
  fixtureFaults: readonly FaultRecord[];
}

export interface JsonReport {
  reportVersion: string;
  createdAt: string;
  label?: string;
  summary: Omit<RunSummary, "failures">;
  results: JsonResult[];
}

function toJsonFailure(failure: AssertionFailure): JsonFailure {
  return {
    kind: failure.kind,
    message: failure.message,
    expected: "expected" in failure ? describeValue(failure.expected) : undefined,
    actual: "actual" in failure ? describeValue(failure.actual) : undefined,
    location: failure.location,
  };
}

export function buildJsonReport(
  results: readonly TestResult[],
  options?: { label?: string; createdAt?: Date }
): JsonReport {
  const { failures: _failures, ...summary } = summarize(results);

  return {
    reportVersion: REPORT_VERSION,
    createdAt: (options?.createdAt ?? new Date()).toISOString(),
    label: options?.label,
    summary: { ...summary, duration: Math.round(summary.duration) },
    results: results.map((r) => ({
      test: r.unit.fullName,
      group: r.unit.group,
      name: r.unit.name,
      file: r.unit.filePath,
      tags: r.unit.tags,
      status: r.status,
      duration: Math.round(r.duration),
      assertionCount: r.assertionCount,
      failures: r.failures.map(toJsonFailure),
      fault: r.fault,
      fixtureFaults: r.fixtureFaults,
    })),
  };
}

export function generateJsonReport(
  results: readonly TestResult[],
  options?: { label?: string; createdAt?: Date }
): string {
  return JSON.stringify(buildJsonReport(results, options), null, 2);
}
