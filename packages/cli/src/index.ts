#!/usr/bin/env -S node --import tsx
import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import chalk from "chalk";
import { runInit } from "./commands/init.js";
import { exitCodeFor, runRun } from "./commands/run.js";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../package.json");
const packageVersion =
  process.env.PROBITY_CLI_VERSION ??
  (typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0");

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

function reportFormat(value: string): "terminal" | "json" {
  if (value !== "terminal" && value !== "json") {
    throw new InvalidArgumentError('must be "terminal" or "json"');
  }
  return value;
}

function fail(error: unknown): void {
  console.error(chalk.red(`  ${error instanceof Error ? error.message : String(error)}`));
  process.exitCode = 1;
}

const program = new Command();

program
  .name("probity")
  .description("Test execution engine: assertions, mocks, fixtures and a concurrent runner")
  .version(packageVersion);

program
  .command("init")
  .description("Create probity.config.ts and an example suite")
  .action(async () => {
    try {
      await runInit();
    } catch (error) {
      fail(error);
    }
  });

program
  .command("run")
  .description("Run all discovered suites")
  .option("--test <pattern>", "Filter by test name or file")
  .option("--tag <tag>", "Filter by tag")
  .option("--parallel <n>", "Tests in flight at once", positiveInt)
  .option("--timeout <ms>", "Per-test timeout", positiveInt)
  .option("--format <type>", "Output format: terminal, json", reportFormat)
  .option("--output <file>", "Write report to file")
  .option("--label <label>", "Label recorded in the JSON report")
  .action(
    async (options: {
      test?: string;
      tag?: string;
      parallel?: number;
      timeout?: number;
      format?: "terminal" | "json";
      output?: string;
      label?: string;
    }) => {
      try {
        const results = await runRun(options);
        process.exitCode = exitCodeFor(results);
      } catch (error) {
        fail(error);
      }
    }
  );

await program.parseAsync();
