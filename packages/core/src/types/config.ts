import { z } from "zod";
import { SCALE_MODES, type ScaleMode } from "./keys.js";

// ---- Config interfaces ----

export interface TexplotConfig {
  version: string;
  picture: PictureConfig;
}

export interface PictureConfig {
  /** Verbatim TikZ options, e.g. "baseline" */
  keys?: string[];
  axes?: AxisConfig[];
}

export interface AxisConfig {
  xmode?: ScaleMode;
  ymode?: ScaleMode;
  /** Verbatim PGFPlots options, e.g. "width=8cm" */
  keys?: string[];
  /** Raw markup lines placed inside the axis body */
  content?: string[];
}

// ---- Validation results ----

export interface ValidationIssue {
  code: string;
  severity: "error" | "warning";
  message: string;
  /** Index of the offending axis, or null for picture-level issues */
  axisIndex: number | null;
  suggestion: string | null;
}

export interface ValidationResult {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

// ---- Zod schemas ----

const ScaleModeSchema = z.enum(SCALE_MODES);

const AxisSchema = z.object({
  xmode: ScaleModeSchema.optional(),
  ymode: ScaleModeSchema.optional(),
  keys: z.array(z.string()).optional(),
  content: z.array(z.string()).optional(),
});

const PictureSchema = z.object({
  keys: z.array(z.string()).optional(),
  axes: z.array(AxisSchema).optional(),
});

export const TexplotConfigSchema = z.object({
  version: z.string(),
  picture: PictureSchema,
});
