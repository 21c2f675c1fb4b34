import { resolve } from "node:path";
import { writeFile } from "node:fs/promises";
import chalk from "chalk";
import {
  TestRunner,
  filterUnits,
  generateJsonReport,
  loadSuiteFiles,
  printTerminalReport,
  type TestResult,
} from "@probity/core";
import { loadConfig, type ProbityConfig } from "../config.js";

export interface RunOptions {
  test?: string;
  tag?: string;
  parallel?: number;
  timeout?: number;
  format?: "terminal" | "json";
  output?: string;
  label?: string;
}

/** Exit code for a finished run: 1 when any test failed or was inconclusive. */
export function exitCodeFor(results: readonly TestResult[]): number {
  return results.some((r) => r.status !== "passed") ? 1 : 0;
}

export async function runRun(options: RunOptions, config?: ProbityConfig): Promise<TestResult[]> {
  const resolved = config ?? (await loadConfig());
  const format = options.format ?? resolved.report.format;
  const outputPath = options.output ?? resolved.report.output;
  // JSON on stdout must stay parseable.
  const quiet = format === "json" && !outputPath;
  const log = (line = ""): void => {
    if (!quiet) console.log(line);
  };

  log();
  log(chalk.bold("  Probity — Running tests"));
  log(chalk.dim("  " + "─".repeat(40)));
  log();

  const suitesDir = resolve(resolved.suites);
  log(chalk.dim(`  Loading suites from ${suitesDir}...`));

  const sources = await loadSuiteFiles(suitesDir);

  if (sources.length === 0) {
    log(chalk.yellow("  No suite files found."));
    log(chalk.dim("  Run `probity init` to create an example suite."));
    log();
    return [];
  }

  const runner = new TestRunner({
    concurrency: options.parallel ?? resolved.run.concurrency,
    timeout: options.timeout ?? resolved.run.timeout,
    grace: resolved.run.grace,
    deadline: resolved.run.deadline,
  });

  const units = filterUnits(runner.discover(sources), { pattern: options.test, tag: options.tag });

  log(chalk.dim(`  Found ${units.length} tests`));
  log();

  const results = await runner.run(units);

  if (format === "json") {
    const report = generateJsonReport(results, { label: options.label });
    if (outputPath) {
      const target = resolve(outputPath);
      await writeFile(target, report, "utf-8");
      log(chalk.dim(`  JSON report → ${target}`));
      log();
    } else {
      console.log(report);
    }
  } else {
    printTerminalReport(results);
  }

  return results;
}
