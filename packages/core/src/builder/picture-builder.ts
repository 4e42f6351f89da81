import { Axis } from "../environment/axis.js";
import { Picture } from "../environment/picture.js";
import type { AxisConfig, TexplotConfig } from "../types/config.js";
import { customContent, customKey, xMode, yMode } from "../types/keys.js";

/**
 * Build a Picture from a parsed config. Typed keys (xmode, ymode) come
 * before an axis's verbatim keys; everything else keeps config order.
 */
export function buildPicture(config: TexplotConfig): Picture {
  const picture = new Picture();

  for (const key of config.picture.keys ?? []) {
    picture.addKey(customKey(key));
  }

  for (const axisConfig of config.picture.axes ?? []) {
    picture.addAxis(buildAxis(axisConfig));
  }

  return picture;
}

function buildAxis(config: AxisConfig): Axis {
  const axis = new Axis();

  if (config.xmode) axis.addKey(xMode(config.xmode));
  if (config.ymode) axis.addKey(yMode(config.ymode));
  for (const key of config.keys ?? []) {
    axis.addKey(customKey(key));
  }

  for (const line of config.content ?? []) {
    axis.addContent(customContent(line));
  }

  return axis;
}
