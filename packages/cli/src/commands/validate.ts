import { readFileSync } from "node:fs";
import {
  buildPicture,
  parseConfig,
  validatePicture,
  type ValidationIssue,
} from "@texplot/core";

const MARKERS = { error: "✗", warning: "⚠" } as const;

/** One issue as printed by `texplot validate`, suggestion line included. */
export function formatIssue(issue: ValidationIssue): string[] {
  const lines = [`  ${MARKERS[issue.severity]} [${issue.code}] ${issue.message}`];
  if (issue.suggestion) {
    lines.push(`    → ${issue.suggestion}`);
  }
  return lines;
}

export function validateCommand(input: string): number {
  let issues: { errors: ValidationIssue[]; warnings: ValidationIssue[] };
  try {
    const picture = buildPicture(parseConfig(readFileSync(input, "utf-8")));
    issues = validatePicture(picture);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const { errors, warnings } = issues;
  if (errors.length === 0 && warnings.length === 0) {
    console.log("✓ Picture is valid. No issues found.");
    return 0;
  }

  if (errors.length > 0) {
    console.error(`\n${errors.length} error(s):`);
    errors.flatMap(formatIssue).forEach((line) => console.error(line));
  }
  if (warnings.length > 0) {
    console.warn(`\n${warnings.length} warning(s):`);
    warnings.flatMap(formatIssue).forEach((line) => console.warn(line));
  }

  console.log(
    `\nSummary: ${errors.length} error(s), ${warnings.length} warning(s)`,
  );
  return errors.length > 0 ? 1 : 0;
}
