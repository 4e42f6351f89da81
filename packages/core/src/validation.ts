import type { Axis } from "./environment/axis.js";
import type { Picture } from "./environment/picture.js";
import type { ValidationIssue, ValidationResult } from "./types/config.js";
import type { CustomKey } from "./types/keys.js";

/**
 * Linter-style validation pass on a built picture.
 * Never throws; the markup itself is not checked.
 */
export function validatePicture(picture: Picture): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  checkEmptyCustomKeys(customKeysOf(picture.keys), null, errors);
  checkDuplicateCustomKeys(customKeysOf(picture.keys), null, warnings);

  picture.axes.forEach((axis, index) => {
    const custom = customKeysOf(axis.keys);
    checkEmptyCustomKeys(custom, index, errors);
    checkDuplicateCustomKeys(custom, index, warnings);
    checkShadowedScaleModes(axis, index, warnings);
  });

  if (picture.axes.length === 0) {
    warnings.push({
      code: "empty-picture",
      severity: "warning",
      message: "Picture contains no axes",
      axisIndex: null,
      suggestion: "Add at least one axis to draw a plot",
    });
  }

  return { errors, warnings };
}

function customKeysOf(keys: readonly { type: string }[]): CustomKey[] {
  return keys.filter((k): k is CustomKey => k.type === "custom");
}

function where(axisIndex: number | null): string {
  return axisIndex === null ? "picture" : `axis ${axisIndex}`;
}

function checkEmptyCustomKeys(
  keys: CustomKey[],
  axisIndex: number | null,
  errors: ValidationIssue[],
): void {
  for (const key of keys) {
    if (key.text.trim() === "") {
      errors.push({
        code: "empty-custom-key",
        severity: "error",
        message: `Empty custom key on ${where(axisIndex)}`,
        axisIndex,
        suggestion: "Remove the key or give it a value",
      });
    }
  }
}

function checkDuplicateCustomKeys(
  keys: CustomKey[],
  axisIndex: number | null,
  warnings: ValidationIssue[],
): void {
  const seen = new Set<string>();
  const reported = new Set<string>();
  for (const key of keys) {
    if (seen.has(key.text) && !reported.has(key.text)) {
      reported.add(key.text);
      warnings.push({
        code: "duplicate-custom-key",
        severity: "warning",
        message: `Custom key "${key.text}" appears more than once on ${where(axisIndex)}`,
        axisIndex,
        suggestion: "Remove the repeated key",
      });
    }
    seen.add(key.text);
  }
}

/**
 * A verbatim "xmode=..." after the typed xmode key silently overrides it,
 * since PGFPlots keeps the last occurrence.
 */
function checkShadowedScaleModes(
  axis: Axis,
  axisIndex: number,
  warnings: ValidationIssue[],
): void {
  for (const direction of ["xmode", "ymode"] as const) {
    const typedIndex = axis.keys.findIndex((k) => k.type === direction);
    if (typedIndex === -1) continue;

    const setsDirection = new RegExp(`^${direction}\\s*=`);
    const shadowing = axis.keys
      .slice(typedIndex + 1)
      .find(
        (k): k is CustomKey =>
          k.type === "custom" && setsDirection.test(k.text.trim()),
      );
    if (shadowing) {
      warnings.push({
        code: "shadowed-scale-mode",
        severity: "warning",
        message: `Custom key "${shadowing.text}" on axis ${axisIndex} also sets ${direction}`,
        axisIndex,
        suggestion: `Use the typed ${direction} key only`,
      });
    }
  }
}
