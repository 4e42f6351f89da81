import type { Picture } from "@texplot/core";
import { TexEnvironment } from "../tex-environment.js";
import { renderAxis } from "./axis-renderer.js";
import { renderPictureKey } from "./key-renderer.js";

export function renderPicture(picture: Picture): string {
  const env = new TexEnvironment("tikzpicture");
  for (const key of picture.keys) {
    env.addOption(renderPictureKey(key));
  }
  for (const axis of picture.axes) {
    env.addBlock(renderAxis(axis));
  }
  return env.toString();
}
