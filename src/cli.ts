#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import ora from "ora";
import { Application } from ".";
import {
  ConfigurationError,
  DEFAULT_MAX_WIDTH,
  DEFAULT_QUALITY,
  resolveRunConfig,
} from "./config";
import { EVENT_NAMES } from "./models";
import { errorMessage } from "./utils/error";

interface CLIOptions {
  input: string;
  output: string;
  event: string;
  width?: number;
  quality?: number;
  verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export class CLI {
  private program: Command;

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  setupCommands() {
    this.program
      .name("gallery-photo-optimizer")
      .description("Optimize and rename event photos for the gallery");

    this.program
      .command("optimize", { isDefault: true })
      .description(
        "Rename photos by capture time, resize, recompress and back up the originals"
      )
      .requiredOption("-i, --input <dir>", "Input directory containing photos")
      .requiredOption("-o, --output <dir>", "Output directory for optimized photos")
      .requiredOption(
        "-e, --event <name>",
        `Event name for filename prefix (${EVENT_NAMES.join(", ")})`
      )
      .option(
        "-w, --width <pixels>",
        `Maximum width in pixels (default: ${DEFAULT_MAX_WIDTH})`,
        parseInteger
      )
      .option(
        "-q, --quality <1-100>",
        `JPEG quality 1-100 (default: ${DEFAULT_QUALITY})`,
        parseInteger
      )
      .option("-v, --verbose", "Enable verbose logging", false)
      .addHelpText(
        "after",
        `
Examples:
  $ gallery-photo-optimizer --input ~/Desktop/Dec22Photos --output ./images/solstice --event solstice
  $ gallery-photo-optimizer --input ~/Desktop/EquinoxPhotos --output ./images/equinox --event equinox --width 2560`
      )
      .action(async (options: CLIOptions) => {
        await this.runOptimization(options);
      });

    this.program
      .command("events")
      .description("List the accepted event names")
      .action(() => {
        EVENT_NAMES.forEach((name) => console.log(name));
      });
  }

  private async runOptimization(options: CLIOptions): Promise<void> {
    const spinner = ora("🔍 Validating options...").start();
    try {
      const config = await resolveRunConfig({
        input: options.input,
        output: options.output,
        event: options.event,
        width: options.width,
        quality: options.quality,
        verbose: options.verbose,
      });
      spinner.succeed("Options validated");

      const app = new Application(config);
      await app.runOptimization();
    } catch (error) {
      if (spinner.isSpinning) {
        spinner.fail(
          error instanceof ConfigurationError ? "Invalid options" : "Optimization failed"
        );
      }
      console.error(`❌ Error: ${errorMessage(error)}`);
      process.exit(1);
    }
  }

  async run(): Promise<void> {
    await this.program.parseAsync(process.argv);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  const cli = new CLI();
  cli.run().catch((error) => {
    console.error("CLI Error:", error);
    process.exit(1);
  });
}

// Main function for programmatic usage
export async function main(args?: string[]): Promise<void> {
  const cli = new CLI();

  if (args) {
    // Override process.argv for testing
    const originalArgv = process.argv;
    process.argv = ["node", "cli.js", ...args];

    try {
      await cli.run();
    } finally {
      process.argv = originalArgv;
    }
  } else {
    await cli.run();
  }
}
