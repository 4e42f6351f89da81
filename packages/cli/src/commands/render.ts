import { readFileSync, writeFileSync } from "node:fs";
import { basename, dirname, extname, join, resolve } from "node:path";
import { buildPicture, parseConfig } from "@texplot/core";
import { renderTex } from "@texplot/render-tex";

export interface RenderOptions {
  output?: string;
  standalone?: boolean;
  compat?: string;
  library?: string[];
}

export function renderCommand(input: string, options: RenderOptions): number {
  try {
    const content = readFileSync(input, "utf-8");
    const picture = buildPicture(parseConfig(content));

    const tex = renderTex(picture, {
      standalone: options.standalone === true,
      compat: options.compat,
      libraries: options.library,
    });

    const outputPath = options.output ?? defaultOutputPath(input);
    if (resolve(outputPath) === resolve(input)) {
      throw new Error(`Output path would overwrite the input: ${input}`);
    }
    writeFileSync(outputPath, tex, "utf-8");
    console.log(`Rendered: ${outputPath}`);
    return 0;
  } catch (err) {
    console.error(
      `Error: ${err instanceof Error ? err.message : String(err)}`,
    );
    return 1;
  }
}

/** Input path with its extension (if any) replaced by .tex */
export function defaultOutputPath(input: string): string {
  return join(dirname(input), `${basename(input, extname(input))}.tex`);
}
