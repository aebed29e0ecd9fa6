import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type {
  AppConfig,
  GroupConfig,
  SourceConfig,
  FetchStrategyConfig,
  HtmlSelectors,
  Taxonomy,
} from "./schema";

/**
 * Reads and validates the YAML configuration file. Every schema issue is
 * reported with its dotted path so a bad file fails startup in one pass.
 */
export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Returns a required secret from the environment. Secrets never live in the
 * YAML file.
 */
export function requireEnv(
  name: string,
  env: Readonly<Record<string, string | undefined>> = process.env,
): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`missing required environment variable ${name}`);
  }
  return value;
}

export type {
  AppConfig,
  GroupConfig,
  SourceConfig,
  FetchStrategyConfig,
  HtmlSelectors,
  Taxonomy,
};
