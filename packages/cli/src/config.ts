import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";

const configSchema = z.object({
  suites: z.string().min(1).default("./suites"),
  run: z
    .object({
      concurrency: z.coerce.number().int().positive().optional(),
      timeout: z.coerce.number().positive().optional(),
      grace: z.coerce.number().nonnegative().optional(),
      deadline: z.coerce.number().positive().optional(),
    })
    .default({}),
  report: z
    .object({
      format: z.enum(["terminal", "json"]).default("terminal"),
      output: z.string().optional(),
    })
    .default({}),
});

export type ProbityConfig = z.output<typeof configSchema>;
export type ProbityConfigInput = z.input<typeof configSchema>;

export function defineConfig(config: ProbityConfigInput): ProbityConfigInput {
  return config;
}

export const CONFIG_FILES = [
  "probity.config.ts",
  "probity.config.js",
  "probity.config.json",
  ".probityrc",
  ".probityrc.json",
];

/** Validates a raw config object after `${env.NAME}` interpolation. */
export function parseConfig(raw: unknown, source = "config"): ProbityConfig {
  const result = configSchema.safeParse(interpolateEnvVars(raw));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid ${source}:\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}

export async function loadConfig(searchFrom?: string): Promise<ProbityConfig> {
  const explorer = cosmiconfig("probity", { searchPlaces: CONFIG_FILES });

  const result = searchFrom
    ? await explorer.search(searchFrom)
    : await explorer.search();

  if (!result || result.isEmpty) {
    throw new Error("No probity.config.ts found. Run `probity init` to create one.");
  }

  return parseConfig(result.config, result.filepath);
}

export function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => process.env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateEnvVars(entry);
    }
    return result;
  }
  return value;
}
