import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { renderCommand } from "./commands/render.js";
import { validateCommand } from "./commands/validate.js";

/**
 * Commands throw; this reports the message on stderr and marks the
 * process as failed without cutting off pending output.
 */
function reportErrors<A extends unknown[]>(
  action: (...args: A) => void,
): (...args: A) => void {
  return (...args) => {
    try {
      action(...args);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("svgtree")
    .description("Assemble SVG documents from scene files")
    .version("0.1.0");

  program
    .command("render <input>")
    .description("Render a YAML/JSON scene file to SVG")
    .option("-o, --output <file>", "Output file path, - for stdout (default: <input>.svg)")
    .option("--fragment", "Omit the XML prolog regardless of the scene's mode")
    .option("--document", "Emit the XML prolog regardless of the scene's mode")
    .action(reportErrors(renderCommand));

  program
    .command("validate <input>")
    .description("Check a scene file against the scene schema")
    .action(reportErrors(validateCommand));

  program
    .command("init")
    .description("Print a template scene file")
    .option("-t, --template <name>", "Template name (basic, badge)", "basic")
    .action(reportErrors(initCommand));

  return program;
}
