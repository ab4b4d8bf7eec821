import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { renderCommand } from "./commands/render.js";
import { samplesCommand } from "./commands/samples.js";
import { validateCommand } from "./commands/validate.js";

const program = new Command();

program
  .name("polydraw")
  .description("Render drawing documents through interchangeable interpreters")
  .version("0.1.0");

program
  .command("render <input>")
  .description("Render a YAML/JSON drawing document")
  .option("-o, --output <file>", "Output file path (default: <input>.svg or <input>.ppm)")
  .option("-b, --backend <name>", "Interpreter: layers (SVG) or raster (PPM)", "layers")
  .action(renderCommand);

program
  .command("samples [name]")
  .description("Render one of the built-in drawings")
  .option("-o, --output <file>", "Output file path (default: <name>.svg or <name>.ppm)")
  .option("-b, --backend <name>", "Interpreter: layers (SVG) or raster (PPM)", "layers")
  .option("-l, --list", "List the samples the backend can draw")
  .action(samplesCommand);

program
  .command("validate <input>")
  .description("Validate a drawing document and report which backends can render it")
  .action(validateCommand);

program
  .command("init")
  .description("Print a template drawing document")
  .option(
    "-t, --template <name>",
    "Template name (overlap, gradient, shadow)",
    "overlap",
  )
  .action(initCommand);

program.parse();
