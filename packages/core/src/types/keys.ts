// ---- Values ----

export const SCALE_MODES = ["log", "normal"] as const;

/** Scaling applied to the coordinates of one axis direction. */
export type ScaleMode = (typeof SCALE_MODES)[number];

// ---- Option keys ----

/**
 * Key-value pair that has no typed variant yet. Written verbatim into the
 * options of its environment.
 */
export interface CustomKey {
  type: "custom";
  text: string;
}

/** Scaling of the x axis. */
export interface XModeKey {
  type: "xmode";
  value: ScaleMode;
}

/** Scaling of the y axis. */
export interface YModeKey {
  type: "ymode";
  value: ScaleMode;
}

/** TikZ options passed to the tikzpicture environment. */
export type PictureKey = CustomKey;

/** PGFPlots options passed to the axis environment. */
export type AxisKey = CustomKey | XModeKey | YModeKey;

// ---- Axis content ----

/** Raw markup line inside an axis, e.g. an \addplot command. */
export interface CustomContent {
  type: "custom";
  text: string;
}

export type AxisContent = CustomContent;

// ---- Factories ----

export function customKey(text: string): CustomKey {
  return { type: "custom", text };
}

export function xMode(value: ScaleMode): XModeKey {
  return { type: "xmode", value };
}

export function yMode(value: ScaleMode): YModeKey {
  return { type: "ymode", value };
}

export function customContent(text: string): CustomContent {
  return { type: "custom", text };
}
