import type { Picture } from "@texplot/core";
import { renderPicture } from "./renderers/picture-renderer.js";

export interface TexRenderOptions {
  /** Wrap the picture in a compilable standalone document */
  standalone?: boolean;
  /** Value of \pgfplotsset{compat=...} in standalone output */
  compat?: string;
  /** PGFPlots libraries loaded in standalone output, e.g. "fillbetween" */
  libraries?: readonly string[];
}

const DEFAULT_OPTIONS = {
  standalone: false,
  compat: "newest",
  libraries: [],
} as const;

/**
 * Render a picture either as a fragment for \input, or as a standalone
 * document when `options.standalone` is set.
 */
export function renderTex(picture: Picture, options?: TexRenderOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  if (opts.standalone) {
    return renderStandalone(picture, opts);
  }
  return renderPicture(picture);
}

/** Standalone LaTeX document containing only the picture. Ends with a newline. */
export function renderStandalone(
  picture: Picture,
  options?: Omit<TexRenderOptions, "standalone">,
): string {
  const compat = options?.compat ?? DEFAULT_OPTIONS.compat;
  const libraries = options?.libraries ?? DEFAULT_OPTIONS.libraries;

  const lines = ["\\documentclass{standalone}", "\\usepackage{pgfplots}"];
  for (const library of libraries) {
    lines.push(`\\usepgfplotslibrary{${library}}`);
  }
  lines.push(`\\pgfplotsset{compat=${compat}}`);
  lines.push("\\begin{document}");
  lines.push(renderPicture(picture));
  lines.push("\\end{document}");

  return `${lines.join("\n")}\n`;
}
