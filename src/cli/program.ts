/**
 * Command-line program definition
 */

import { Command } from "commander";
import { generateCommand } from "./commands/generate";
import { configCommand } from "./commands/config";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("snippet-index")
    .description("Generate an index page for a directory of HTML snippets")
    .version("0.1.0")
    // Options after "config" belong to the subcommand
    .enablePositionalOptions();

  // Main generation command (default action)
  // "config" is taken by the subcommand below, so a directory with that name needs a path prefix
  program
    .argument(
      "[directory]",
      'Directory containing the HTML snippets (write "./config" for a directory named config)',
    )
    .option("-o, --output <filename>", "Index page filename, relative to the directory")
    .option("-c, --config <path>", "Path to custom config file")
    .option("-t, --template <path>", "Path to custom Handlebars index template")
    .option("--dry-run", "Render the index without writing it")
    .option("-v, --verbose", "Verbose output")
    .action(generateCommand);

  // Config command - show config location and effective settings
  program
    .command("config")
    .description("Show configuration file location and effective settings")
    .option("-c, --config <path>", "Also apply a custom config file")
    .action(configCommand);

  return program;
}
