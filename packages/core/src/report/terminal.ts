import chalk from "chalk";
import Table from "cli-table3";
import type { AssertionFailure } from "../assert/types.js";
import type { FaultRecord } from "../errors.js";
import { summarize } from "../runner.js";
import type { FinalStatus, TestResult } from "../suite/types.js";

const STATUS_LABEL: Record<FinalStatus, string> = {
  passed: chalk.green("PASS"),
  failed: chalk.red("FAIL"),
  inconclusive: chalk.yellow("NONE"),
};

export function printTerminalReport(results: readonly TestResult[]): void {
  console.log();
  console.log(chalk.bold("  Probity — Test Results"));
  console.log(chalk.dim("  " + "─".repeat(50)));
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Test"),
      chalk.bold("Result"),
      chalk.bold("Assertions"),
      chalk.bold("Duration"),
    ],
    style: { head: [], border: [] },
    colWidths: [48, 10, 14, 12],
  });

  for (const result of results) {
    const assertionText =
      result.failures.length === 0
        ? chalk.green(`${result.assertionCount}`)
        : chalk.yellow(`${result.failures.length} of ${result.assertionCount} failed`);

    table.push([
      truncate(result.unit.fullName, 46),
      STATUS_LABEL[result.status],
      assertionText,
      formatDuration(result.duration),
    ]);
  }

  console.log(table.toString());
  console.log();

  const summary = summarize(results);

  if (summary.failures.length > 0) {
    console.log(chalk.red.bold("  Failures:"));
    console.log();

    for (const detail of summary.failures) {
      console.log(chalk.red(`  ✗ ${detail.fullName}`));
      if (detail.fault) {
        console.log(chalk.dim(`    ${describeFault(detail.fault)}`));
      }
      for (const failure of detail.failures) {
        console.log(chalk.dim(`    [${failure.kind}] ${failure.message}${formatLocation(failure)}`));
      }
      for (const fixtureFault of detail.fixtureFaults) {
        console.log(chalk.dim(`    ${describeFault(fixtureFault)}`));
      }
      console.log();
    }
  }

  const inconclusive = results.filter((r) => r.status === "inconclusive");
  if (inconclusive.length > 0) {
    console.log(chalk.yellow.bold("  Inconclusive (no assertions ran):"));
    for (const result of inconclusive) {
      console.log(chalk.yellow(`  ? ${result.unit.fullName}`));
    }
    console.log();
  }

  const line = [
    chalk.bold(`  ${summary.total} tests`),
    chalk.green(`${summary.passed} passed`),
    summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : null,
    summary.inconclusive > 0 ? chalk.yellow(`${summary.inconclusive} inconclusive`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(line);
  console.log(chalk.dim(`  Completed in ${formatDuration(summary.duration)}`));
  console.log();
}

export function describeFault(fault: FaultRecord): string {
  if (fault.kind === "fixture") return `Fixture fault: ${fault.message}`;
  if (fault.kind === "timeout") return `Timeout: ${fault.message}`;
  return `Uncaught fault: ${fault.name}: ${fault.message}`;
}

function formatLocation(failure: AssertionFailure): string {
  if (!failure.location) return "";
  return ` (${failure.location.file}:${failure.location.line})`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + "…";
}
