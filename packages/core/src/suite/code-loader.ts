import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { TestSource } from "./types.js";
import { isTestSource, validateSource } from "./validator.js";

export const SUITE_FILE_PATTERN = /\.suite\.[cm]?[jt]s$/;

/**
 * Imports every suite file under `dir` and collects the test sources they
 * export, in file order then export order. A file that fails to load is
 * reported and skipped.
 */
export async function loadSuiteFiles(dir: string, filter?: string): Promise<TestSource[]> {
  const absDir = resolve(dir);
  const sources: TestSource[] = [];

  const files = (await scanDir(absDir)).sort();
  const suiteFiles = files.filter((f) => SUITE_FILE_PATTERN.test(f));

  const needle = filter?.toLowerCase();
  const filtered = needle
    ? suiteFiles.filter((f) => f.replace(/\\/g, "/").toLowerCase().includes(needle))
    : suiteFiles;

  for (const file of filtered) {
    let mod: Record<string, unknown>;
    try {
      mod = await import(pathToFileURL(file).href);
    } catch (e) {
      console.warn(
        `Warning: Failed to load suite file ${file}: ${e instanceof Error ? e.message : String(e)}`
      );
      continue;
    }

    for (const candidate of collectCandidates(mod)) {
      const result = validateSource(candidate);
      if (!result.valid || !isTestSource(candidate)) {
        console.warn(`Warning: Skipping invalid test in ${file}: ${result.errors.join(", ")}`);
        continue;
      }
      for (const w of result.warnings) {
        console.warn(`Warning: ${file}: ${w}`);
      }
      sources.push({ ...candidate, filePath: file });
    }
  }

  return sources;
}

// Default export first, then named exports; a source exported twice counts once.
function collectCandidates(mod: Record<string, unknown>): unknown[] {
  const { default: defaultExport, ...named } = mod;
  const candidates = new Set<unknown>();
  for (const value of [defaultExport, ...Object.values(named)]) {
    if (Array.isArray(value)) {
      for (const item of value) if (looksLikeSource(item)) candidates.add(item);
    } else if (looksLikeSource(value)) {
      candidates.add(value);
    }
  }
  return [...candidates];
}

function looksLikeSource(value: unknown): boolean {
  return typeof value === "object" && value !== null && "fn" in value;
}

async function scanDir(dir: string): Promise<string[]> {
  const files: string[] = [];
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e)) return files;
    throw e;
  }
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === "node_modules") continue;
      files.push(...(await scanDir(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
