import * as dotenv from "dotenv";
import fs from "fs/promises";
import path from "path";
import { EVENT_NAMES, isEventName } from "../models";

// Load environment variables from .env file
dotenv.config();

export const DEFAULT_MAX_WIDTH = 1920;
export const DEFAULT_QUALITY = 82;
export const BACKUP_SUFFIX = "_originals";

export interface LoggingConfig {
  level: string;
  format: string;
}

export interface Config {
  paths: {
    inputDir: string;
    outputDir: string;
    backupDir: string;
  };
  event: string;
  optimization: {
    maxWidth: number;
    quality: number;
  };
  logging: LoggingConfig;
}

/** Options as they arrive from the command line. */
export interface RunOptions {
  input: string;
  output: string;
  event: string;
  width?: number | undefined;
  quality?: number | undefined;
  verbose?: boolean | undefined;
}

export interface ValidationError {
  field: string;
  message: string;
}

export class ConfigurationError extends Error {
  public readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const message = `Configuration validation failed:\n${errors
      .map((e) => `- ${e.field}: ${e.message}`)
      .join("\n")}`;
    super(message);
    this.name = "ConfigurationError";
    this.errors = errors;
  }
}

/**
 * Validates log level
 */
function validateLogLevel(level: string): boolean {
  const validLevels = ["error", "warn", "info", "debug"];
  return validLevels.includes(level.toLowerCase());
}

/**
 * Backups live beside the output directory: `images/solstice` is backed up
 * to `images/solstice_originals`.
 */
export function resolveBackupDir(outputDir: string): string {
  const resolved = path.resolve(outputDir);
  return path.join(
    path.dirname(resolved),
    `${path.basename(resolved)}${BACKUP_SUFFIX}`
  );
}

function parseIntegerEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return Number(value.trim());
}

/**
 * Validates configuration object
 */
export function validateConfig(config: Config): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!config.paths.inputDir) {
    errors.push({ field: "input", message: "Input directory is required" });
  }

  if (!config.paths.outputDir) {
    errors.push({ field: "output", message: "Output directory is required" });
  }

  if (!isEventName(config.event)) {
    errors.push({
      field: "event",
      message: `Unknown event "${config.event}". Expected one of: ${EVENT_NAMES.join(", ")}`,
    });
  }

  const { quality, maxWidth } = config.optimization;
  if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
    errors.push({
      field: "quality",
      message: "Quality must be between 1 and 100",
    });
  }

  if (!Number.isInteger(maxWidth) || maxWidth < 1) {
    errors.push({
      field: "width",
      message: "Maximum width must be a positive integer",
    });
  }

  if (!validateLogLevel(config.logging.level)) {
    errors.push({
      field: "logging.level",
      message: "Log level must be one of: error, warn, info, debug",
    });
  }

  const validFormats = ["json", "simple", "combined"];
  if (!validFormats.includes(config.logging.format)) {
    errors.push({
      field: "logging.format",
      message: "Log format must be one of: json, simple, combined",
    });
  }

  return errors;
}

/**
 * Builds the run configuration from command line options over environment
 * defaults, and throws a ConfigurationError listing every invalid field.
 */
export function loadConfig(
  options: RunOptions,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const config: Config = {
    paths: {
      inputDir: options.input,
      outputDir: options.output,
      backupDir: options.output ? resolveBackupDir(options.output) : "",
    },
    event: options.event,
    optimization: {
      maxWidth:
        options.width ?? parseIntegerEnv(env.PHOTO_MAX_WIDTH, DEFAULT_MAX_WIDTH),
      quality:
        options.quality ?? parseIntegerEnv(env.PHOTO_QUALITY, DEFAULT_QUALITY),
    },
    logging: {
      level: options.verbose
        ? "debug"
        : (env.LOG_LEVEL || "info").toLowerCase(),
      format: (env.LOG_FORMAT || "simple").toLowerCase(),
    },
  };

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  return config;
}

/**
 * The only file-system check made before a run starts.
 */
export async function validateInputDirectory(
  inputDir: string
): Promise<ValidationError | null> {
  try {
    const stats = await fs.stat(inputDir);
    if (!stats.isDirectory()) {
      return { field: "input", message: `'${inputDir}' is not a directory` };
    }
    return null;
  } catch (error) {
    return {
      field: "input",
      message: `Input directory '${inputDir}' does not exist`,
    };
  }
}

/**
 * Loads and fully validates a run configuration, including the input
 * directory check.
 */
export async function resolveRunConfig(
  options: RunOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const config = loadConfig(options, env);
  const inputError = await validateInputDirectory(config.paths.inputDir);
  if (inputError) {
    throw new ConfigurationError([inputError]);
  }
  return config;
}
