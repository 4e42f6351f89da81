import type {
  AxisContent,
  AxisKey,
  PictureKey,
  ScaleMode,
} from "@texplot/core";

export function renderScaleMode(mode: ScaleMode): string {
  switch (mode) {
    case "log":
      return "log";
    case "normal":
      return "normal";
  }
}

/** Custom keys are written as given; no escaping or validation. */
export function renderPictureKey(key: PictureKey): string {
  switch (key.type) {
    case "custom":
      return key.text;
  }
}

export function renderAxisKey(key: AxisKey): string {
  switch (key.type) {
    case "custom":
      return key.text;
    case "xmode":
      return `xmode=${renderScaleMode(key.value)}`;
    case "ymode":
      return `ymode=${renderScaleMode(key.value)}`;
  }
}

export function renderAxisContent(content: AxisContent): string {
  switch (content.type) {
    case "custom":
      return content.text;
  }
}
