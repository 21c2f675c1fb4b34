import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { interpolateEnvVars, loadConfig, parseConfig } from "./config.js";

describe("parseConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      suites: "./suites",
      run: {},
      report: { format: "terminal" },
    });
  });

  it("interpolates environment variables before validating", () => {
    vi.stubEnv("PROBITY_TEST_SUITES", "./specs");
    vi.stubEnv("PROBITY_TEST_CONCURRENCY", "4");

    const config = parseConfig({
      suites: "${env.PROBITY_TEST_SUITES}",
      run: { concurrency: "${env.PROBITY_TEST_CONCURRENCY}" },
    });

    expect(config.suites).toBe("./specs");
    expect(config.run.concurrency).toBe(4);
  });

  it("names the invalid field", () => {
    expect(() => parseConfig({ report: { format: "html" } }, "probity.config.json")).toThrow(
      /^Invalid probity\.config\.json:\n {2}report\.format: /
    );
  });
});

describe("interpolateEnvVars", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("walks arrays and objects and blanks unknown variables", () => {
    vi.stubEnv("PROBITY_TEST_NAME", "ci");
    expect(
      interpolateEnvVars({ list: ["${env.PROBITY_TEST_NAME}-a"], missing: "${env.PROBITY_TEST_UNSET_VAR}", n: 1 })
    ).toEqual({ list: ["ci-a"], missing: "", n: 1 });
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("reads and validates a JSON rc file", async () => {
    dir = await mkdtemp(join(tmpdir(), "probity-config-"));
    await writeFile(join(dir, ".probityrc.json"), JSON.stringify({ suites: "./checks", run: { timeout: 100 } }));

    const config = await loadConfig(dir);

    expect(config.suites).toBe("./checks");
    expect(config.run.timeout).toBe(100);
  });

  it("explains how to create a missing config", async () => {
    dir = await mkdtemp(join(tmpdir(), "probity-config-"));
    await expect(loadConfig(dir)).rejects.toThrow("No probity.config.ts found. Run `probity init` to create one.");
  });
});
