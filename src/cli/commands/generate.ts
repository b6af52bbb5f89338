/**
 * Generate command - Loads config and runs the index pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, Logger, Tracker } from "../../utils";
import { createContext, generateIndex, type GeneratorStage } from "../../generator";
import * as modules from "../../modules";

const GenerateOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  config: z.string().optional(),
  template: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof GenerateOptionsSchema>;

const STAGE_TEXT: Record<GeneratorStage, string> = {
  scan: "Scanning snippets...",
  extract: "Reading titles and descriptions...",
  write: "Writing index...",
};

export async function generateCommand(
  directory: string | undefined,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  const logger = new Logger();

  try {
    // Validate CLI options
    const options = GenerateOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI arguments
    if (directory) {
      config.input.directory = directory;
    }
    if (options.output) {
      config.output.filename = options.output;
    }
    if (options.template) {
      config.output.template = options.template;
    }
    logger.setLevel(options.verbose ? "debug" : config.logging.level);

    const tracker = new Tracker();

    // Config layers that failed are skipped, not fatal
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const ctx = createContext(config, {
      tracker,
      logger,
      dryRun: options.dryRun,
      verbose: options.verbose,
    });

    await generateIndex(ctx, (stage) => {
      spinner.text = STAGE_TEXT[stage];
    });

    spinner.clear();
    spinner.stop();

    modules.stats(ctx);
  } catch (error) {
    spinner.fail("Index generation failed");
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
