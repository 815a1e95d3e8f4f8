import { readFile } from "node:fs/promises";
import type { ZodError } from "zod";
import { defaultConfig } from "./defaultConfig.js";
import { ConfigFileSchema, ConfigSchema } from "./schema.js";
import type { Config, ConfigFile } from "./schema.js";

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "config";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/** Merges a partial config file over `base`, section by section. */
export function mergeConfig(base: Config, file: ConfigFile): Config {
  return {
    server: { ...base.server, ...file.server },
    activity: { ...base.activity, ...file.activity },
    report: { ...base.report, ...file.report },
    trend: {
      ...base.trend,
      ...file.trend,
      columns: { ...base.trend.columns, ...file.trend?.columns },
      thresholds: file.trend?.thresholds ?? base.trend.thresholds
    }
  };
}

/** Validates an already-merged config, e.g. after CLI overrides. */
export function validateConfig(candidate: unknown): Config {
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`Invalid config: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export async function loadConfig(path: string): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new Error(`Unable to read config file at ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid JSON in config file at ${path}`, { cause: error });
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config: ${formatZodError(result.error)}`);
  }

  return validateConfig(mergeConfig(defaultConfig, result.data));
}
