import yaml from "js-yaml";
import type { ZodIssue } from "zod";
import type { TexplotConfig } from "../types/config.js";
import { TexplotConfigSchema } from "../types/config.js";

/**
 * Parse a JSON or YAML string into a validated TexplotConfig.
 * JSON is tried first; anything JSON rejects is read as YAML.
 */
export function parseConfig(input: string): TexplotConfig {
  const result = TexplotConfigSchema.safeParse(loadDocument(input));
  if (!result.success) {
    throw new Error(
      `Invalid texplot config:\n${result.error.issues.map(formatZodIssue).join("\n")}`,
    );
  }
  return result.data;
}

function loadDocument(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return loadYaml(input);
  }
}

function loadYaml(input: string): unknown {
  try {
    return yaml.load(input);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse input as JSON or YAML: ${reason}`);
  }
}

function formatZodIssue(issue: ZodIssue): string {
  return `  - ${issue.path.join(".")}: ${issue.message}`;
}
