import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { initCommand } from "../src/commands/init.js";
import { defaultOutputPath, renderCommand } from "../src/commands/render.js";
import { formatIssue, validateCommand } from "../src/commands/validate.js";

const CONFIG_YAML = `
version: "0.1"
picture:
  axes:
    - xmode: log
      keys: ["width=8cm"]
`;

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "texplot-cli-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("renderCommand", () => {
  it("writes the .tex file next to the input", () => {
    const input = join(dir, "plot.yaml");
    writeFileSync(input, CONFIG_YAML, "utf-8");

    expect(renderCommand(input, {})).toBe(0);
    expect(readFileSync(join(dir, "plot.tex"), "utf-8")).toBe(
      "\\begin{tikzpicture}\n\\begin{axis}[\n\txmode=log,\n\twidth=8cm,\n]\n\\end{axis}\n\\end{tikzpicture}",
    );
    expect(console.log).toHaveBeenCalledWith(`Rendered: ${join(dir, "plot.tex")}`);
  });

  it("writes a standalone document to the requested path", () => {
    const input = join(dir, "plot.json");
    const output = join(dir, "out.tex");
    writeFileSync(input, `{"version": "0.1", "picture": {}}`, "utf-8");

    expect(
      renderCommand(input, {
        output,
        standalone: true,
        library: ["fillbetween"],
      }),
    ).toBe(0);
    expect(readFileSync(output, "utf-8").split("\n").slice(0, 4)).toEqual([
      "\\documentclass{standalone}",
      "\\usepackage{pgfplots}",
      "\\usepgfplotslibrary{fillbetween}",
      "\\pgfplotsset{compat=newest}",
    ]);
  });

  it("replaces any input extension with .tex", () => {
    const input = join(dir, "plot.cfg");
    writeFileSync(input, `version: "0.1"\npicture: {}\n`, "utf-8");

    expect(renderCommand(input, {})).toBe(0);
    expect(readFileSync(input, "utf-8")).toBe(`version: "0.1"\npicture: {}\n`);
    expect(readFileSync(join(dir, "plot.tex"), "utf-8")).toBe(
      "\\begin{tikzpicture}\n\\end{tikzpicture}",
    );
  });

  it("refuses to overwrite a .tex input", () => {
    const input = join(dir, "plot.tex");
    writeFileSync(input, `version: "0.1"\npicture: {}\n`, "utf-8");

    expect(renderCommand(input, {})).toBe(1);
    expect(readFileSync(input, "utf-8")).toBe(`version: "0.1"\npicture: {}\n`);
    expect(console.error).toHaveBeenCalledWith(
      `Error: Output path would overwrite the input: ${input}`,
    );
  });

  it("reports invalid configs and returns 1", () => {
    const input = join(dir, "bad.yaml");
    writeFileSync(input, `version: "0.1"\n`, "utf-8");

    expect(renderCommand(input, {})).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "Error: Invalid texplot config:\n  - picture: Required",
    );
  });
});

describe("validateCommand", () => {
  it("returns 0 for a clean config", () => {
    const input = join(dir, "plot.yaml");
    writeFileSync(input, CONFIG_YAML, "utf-8");

    expect(validateCommand(input)).toBe(0);
    expect(console.log).toHaveBeenCalledWith(
      "✓ Picture is valid. No issues found.",
    );
  });

  it("returns 0 when there are only warnings", () => {
    const input = join(dir, "empty.yaml");
    writeFileSync(input, `version: "0.1"\npicture: {}\n`, "utf-8");

    expect(validateCommand(input)).toBe(0);
    expect(console.warn).toHaveBeenCalledWith(
      "  ⚠ [empty-picture] Picture contains no axes",
    );
  });

  it("returns 1 when there are errors", () => {
    const input = join(dir, "blank-key.yaml");
    writeFileSync(
      input,
      `version: "0.1"\npicture:\n  axes:\n    - keys: [""]\n`,
      "utf-8",
    );

    expect(validateCommand(input)).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      "  ✗ [empty-custom-key] Empty custom key on axis 0",
    );
  });
});

describe("defaultOutputPath", () => {
  it("swaps the extension and keeps the directory", () => {
    expect(defaultOutputPath(join("figs", "growth.yaml"))).toBe(
      join("figs", "growth.tex"),
    );
    expect(defaultOutputPath(join("figs", "growth.plot.json"))).toBe(
      join("figs", "growth.plot.tex"),
    );
  });

  it("appends .tex to a path without an extension", () => {
    expect(defaultOutputPath(join("figs", "growth"))).toBe(
      join("figs", "growth.tex"),
    );
  });
});

describe("formatIssue", () => {
  it("prints the suggestion on its own line", () => {
    expect(
      formatIssue({
        code: "empty-picture",
        severity: "warning",
        message: "Picture contains no axes",
        axisIndex: null,
        suggestion: "Add at least one axis to draw a plot",
      }),
    ).toEqual([
      "  ⚠ [empty-picture] Picture contains no axes",
      "    → Add at least one axis to draw a plot",
    ]);
  });

  it("omits a missing suggestion", () => {
    expect(
      formatIssue({
        code: "empty-custom-key",
        severity: "error",
        message: "Empty custom key on picture",
        axisIndex: null,
        suggestion: null,
      }),
    ).toEqual(["  ✗ [empty-custom-key] Empty custom key on picture"]);
  });
});

describe("initCommand", () => {
  it("prints the requested template", () => {
    const write = vi
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);

    expect(initCommand({ template: "log-log" })).toBe(0);
    const printed = String(write.mock.calls[0][0]);
    expect(printed).toContain("    - xmode: log\n");
  });

  it("rejects unknown templates", () => {
    expect(initCommand({ template: "polar" })).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Unknown template: polar");
    expect(console.error).toHaveBeenCalledWith(
      "Available: single-axis, log-log",
    );
  });
});
