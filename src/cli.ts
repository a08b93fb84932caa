/**
 * FLAME GPU instrumentation extractor – CLI
 * Parses simulation logs and writes one CSV of per-iteration timings per log.
 */

import { Command } from "commander";
import { loadConfig } from "./infrastructure/utils/config.utils.js";
import { ExtractInstrumentationUseCase } from "./core/use-cases/extract-instrumentation.use-case.js";
import { ConsoleLogger } from "./infrastructure/services/console-logger.service.js";
import { InquirerOverwritePrompt } from "./infrastructure/services/inquirer-overwrite-prompt.service.js";
import type { ILogger } from "./core/domain/services/logger.service.js";
import type { IOverwritePrompt } from "./core/domain/services/overwrite-prompt.service.js";

export interface CliOptions {
  input: string[];
  output: string;
  config?: string;
  force?: boolean;
  verbose?: boolean;
  includeMetadata?: boolean;
}

export interface CliDependencies {
  createLogger?: (verbose: boolean) => ILogger;
  prompt?: IOverwritePrompt;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const createLogger =
    deps.createLogger ?? ((verbose: boolean) => new ConsoleLogger({ verbose }));
  const prompt = deps.prompt ?? new InquirerOverwritePrompt();
  const program = new Command();

  program
    .name("flamegpu-instrumentation-extractor")
    .description(
      "Extract per-iteration instrumentation timings from simulation logs into CSV",
    )
    .requiredOption(
      "-i, --input <paths...>",
      "Input log files or directories to parse",
    )
    .requiredOption(
      "-o, --output <dir>",
      "Output directory; one CSV file is produced per input file",
    )
    .option(
      "-c, --config <path>",
      "Config file path (default: $CONFIG_PATH or ./config/config.yaml when present)",
    )
    .option("-f, --force", "Overwrite existing output files without asking")
    .option("-v, --verbose", "Increase verbosity of output")
    .option(
      "--include-metadata",
      "Add input_file and total_processing_time columns",
    )
    .showHelpAfterError()
    .action(async (opts: CliOptions) => {
      const logger = createLogger(opts.verbose ?? false);
      try {
        const config = loadConfig(opts.config);
        const extractor = new ExtractInstrumentationUseCase(
          config,
          logger,
          prompt,
        );
        await extractor.execute({
          inputs: opts.input,
          outputDir: opts.output,
          force: opts.force,
          includeMetadata: opts.includeMetadata,
        });
      } catch (e) {
        logger.error(
          `Extraction failed: ${e instanceof Error ? e.message : String(e)}`,
        );
        process.exitCode = 1;
      }
    });

  return program;
}
