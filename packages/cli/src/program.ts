import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { renderCommand, type RenderOptions } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";
import { createLogger } from "./logger.js";

type GlobalOptions = {
  verbose?: boolean;
};

export function createProgram(): Command {
  const program = new Command();

  program
    .name("shapecraft")
    .description("Build SVG documents from shape scene files")
    .version("0.1.0")
    .option("-v, --verbose", "Log debug output");

  const logger = () => createLogger(program.opts<GlobalOptions>().verbose ? "debug" : "info");

  program
    .command("render <input>")
    .description("Render a YAML/JSON scene file to SVG")
    .option("-o, --output <file>", "Output file path (default: <input>.svg)")
    .option("--width <px>", "Output width in pixels (default: canvas width)")
    .option("--height <px>", "Output height in pixels (default: canvas height)")
    .option("--background <color>", "Background fill (default: canvas background)")
    .action((input: string, options: RenderOptions) => {
      process.exitCode = renderCommand(input, options, logger());
    });

  program
    .command("validate <input>")
    .description("Check a scene file for invalid and indeterminate geometry")
    .action((input: string) => {
      process.exitCode = validateCommand(input, logger());
    });

  program
    .command("init")
    .description("Print a starter scene file")
    .option("-t, --template <name>", "Template name (basic-shapes, badge)", "basic-shapes")
    .action((options: { template: string }) => {
      process.exitCode = initCommand(options, logger());
    });

  return program;
}
