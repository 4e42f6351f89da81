import type { Axis } from "@texplot/core";
import { TexEnvironment } from "../tex-environment.js";
import { renderAxisContent, renderAxisKey } from "./key-renderer.js";

export function renderAxis(axis: Axis): string {
  const env = new TexEnvironment("axis");
  for (const key of axis.keys) {
    env.addOption(renderAxisKey(key));
  }
  for (const content of axis.contents) {
    env.addBlock(renderAxisContent(content));
  }
  return env.toString();
}
