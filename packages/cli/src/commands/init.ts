import { mkdir, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";

export const DEFAULT_CONFIG = `import { defineConfig } from "@probity/cli";

export default defineConfig({
  suites: "./suites",
  run: {
    concurrency: 1,
    timeout: 5000,
  },
  report: {
    format: "terminal",
  },
});
`;

export const EXAMPLE_SUITE = `import { createMock, defineCapability, on, setup, suite, verify } from "@probity/core";

interface Clock {
  now(): number;
}

const ClockSpec = defineCapability<Clock>("Clock", {
  now: { arity: 0, returns: "number" },
});

export default suite("Example", {
  setUp: () => createMock(ClockSpec),
  tests: {
    "reads the clock once": ({ assert, fixture: clock }) => {
      setup(clock, on("now")).returns(42);
      assert.assertEqual(42, clock.object.now());
      verify(clock, on("now"), 1);
    },
  },
});
`;

export interface InitResult {
  created: string[];
  skipped: string[];
}

export async function runInit(cwd: string = process.cwd()): Promise<InitResult> {
  const result: InitResult = { created: [], skipped: [] };

  console.log();
  console.log(chalk.bold("  Probity — Initializing project"));
  console.log(chalk.dim("  " + "─".repeat(40)));
  console.log();

  const configPath = join(cwd, "probity.config.ts");
  if (existsSync(configPath)) {
    console.log(chalk.yellow("  probity.config.ts already exists, skipping"));
    result.skipped.push(configPath);
  } else {
    await writeFile(configPath, DEFAULT_CONFIG, "utf-8");
    console.log(chalk.green("  Created probity.config.ts"));
    result.created.push(configPath);
  }

  const suitesDir = join(cwd, "suites");
  await mkdir(suitesDir, { recursive: true });

  const examplePath = join(suitesDir, "example.suite.ts");
  if (existsSync(examplePath)) {
    console.log(chalk.yellow("  suites/example.suite.ts already exists, skipping"));
    result.skipped.push(examplePath);
  } else {
    await writeFile(examplePath, EXAMPLE_SUITE, "utf-8");
    console.log(chalk.green("  Created suites/example.suite.ts"));
    result.created.push(examplePath);
  }

  console.log();
  console.log(chalk.bold("  Next steps:"));
  console.log(chalk.dim("  1. Add suites under suites/ as *.suite.ts files"));
  console.log(chalk.dim("  2. Run: probity run"));
  console.log();

  return result;
}
