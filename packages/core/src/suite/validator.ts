import { z } from "zod";
import type { TestSource } from "./types.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const callable = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === "function",
  "must be a function"
);

const nonEmpty = z.string().trim().min(1, "must be a non-empty string");

export const testSourceSchema = z.object({
  group: nonEmpty,
  name: nonEmpty,
  fn: callable,
  setUp: callable.optional(),
  tearDown: callable.optional(),
  groupFixture: z
    .object({ setUp: callable, tearDown: callable.optional() })
    .passthrough()
    .optional(),
  tags: z.array(z.string(), { invalid_type_error: "must be an array of strings" }).optional(),
  timeout: z.number().positive("must be a positive number of milliseconds").optional(),
  filePath: z.string().optional(),
});

export function validateSource(obj: unknown): ValidationResult {
  const warnings: string[] = [];

  if (!obj || typeof obj !== "object") {
    return { valid: false, errors: ["Test source must be an object"], warnings };
  }

  const parsed = testSourceSchema.safeParse(obj);
  const errors = parsed.success
    ? []
    : parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);

  if (parsed.success) {
    const tags = parsed.data.tags ?? [];
    if (new Set(tags).size !== tags.length) {
      warnings.push("Duplicate tags will be collapsed");
    }
    if (parsed.data.tearDown && !parsed.data.setUp) {
      warnings.push("tearDown without setUp runs after every test");
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

export function isTestSource(obj: unknown): obj is TestSource {
  return (
    typeof obj === "object" &&
    obj !== null &&
    "group" in obj &&
    "name" in obj &&
    "fn" in obj &&
    typeof obj.group === "string" &&
    typeof obj.name === "string" &&
    typeof obj.fn === "function"
  );
}
