import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { renderCommand, type RenderOptions } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("texplot")
    .description("Generate PGFPlots markup from a YAML/JSON picture config")
    .version("0.1.0");

  program
    .command("render <input>")
    .description("Render a picture config to a .tex file")
    .option("-o, --output <file>", "Output file path (default: <input>.tex)")
    .option("--standalone", "Wrap the picture in a standalone document")
    .option("--compat <version>", "pgfplots compat level for --standalone")
    .option(
      "-l, --library <name>",
      "pgfplots library to load with --standalone (repeatable)",
      collect,
      [],
    )
    .action((input: string, options: RenderOptions) => {
      process.exitCode = renderCommand(input, options);
    });

  program
    .command("validate <input>")
    .description("Check a picture config for likely mistakes")
    .action((input: string) => {
      process.exitCode = validateCommand(input);
    });

  program
    .command("init")
    .description("Print a template picture config")
    .option(
      "-t, --template <name>",
      "Template name (single-axis, log-log)",
      "single-axis",
    )
    .action((options: { template: string }) => {
      process.exitCode = initCommand(options);
    });

  return program;
}

