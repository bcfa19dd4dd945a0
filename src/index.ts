import { Config } from "./config";
import { OptimizationReport } from "./models";
import {
  BatchOptimizationService,
  ConsoleReporter,
  ExifMetadataReader,
  SharpImageTranscoder,
} from "./services";
import type { Reporter } from "./services";
import { configureLogger } from "./utils/logger";

export interface ApplicationOptions {
  reporter?: Reporter;
}

export class Application {
  private readonly config: Config;
  private readonly metadataReader: ExifMetadataReader;
  private readonly transcoder: SharpImageTranscoder;
  private readonly optimizationService: BatchOptimizationService;
  private isRunning = false;

  constructor(config: Config, options: ApplicationOptions = {}) {
    this.config = config;
    configureLogger(config.logging);

    this.metadataReader = new ExifMetadataReader();
    this.transcoder = new SharpImageTranscoder();
    this.optimizationService = new BatchOptimizationService(
      this.metadataReader,
      this.transcoder,
      options.reporter ?? new ConsoleReporter(),
      this.config
    );
  }

  async runOptimization(): Promise<OptimizationReport> {
    if (this.isRunning) {
      throw new Error("An optimization run is already in progress");
    }
    this.isRunning = true;
    try {
      return await this.optimizationService.processAllImages();
    } finally {
      this.isRunning = false;
    }
  }

  getConfig(): Config {
    return this.config;
  }
}

export {
  ConfigurationError,
  loadConfig,
  resolveRunConfig,
  validateConfig,
} from "./config";
export type { Config, RunOptions, ValidationError } from "./config";
export * from "./models";
export * from "./services";
