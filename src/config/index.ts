import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema, portOverrideSchema } from "./schema";
import type { AppConfig } from "./schema";

/**
 * Parses and validates configuration from a YAML string. An empty document
 * yields the defaults.
 */
export function parseConfig(raw: string, source = "<inline>"): AppConfig {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${source}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${source}:\n${issues}`);
  }

  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  return parseConfig(raw, configPath);
}

/**
 * Applies a textual port override (the `PORT` environment variable) on top
 * of the configured port. An unset or empty override keeps the configured one.
 */
export function resolvePort(override: string | undefined, configured: number): number {
  if (override === undefined || override.trim() === "") {
    return configured;
  }

  const result = portOverrideSchema.safeParse(override);
  if (!result.success) {
    const issues = result.error.issues.map((i) => i.message).join("; ");
    throw new Error(`invalid PORT "${override}": ${issues}`);
  }

  return result.data;
}

export type { AppConfig };
