import fs from "fs/promises";
import path from "path";
import { Config } from "../config";
import {
  isSupportedExtension,
  OptimizationReport,
  PhotoResult,
  RunPlan,
} from "../models";
import {
  BackupError,
  errorMessage,
  OutputWriteError,
  toError,
} from "../utils/error";
import { reductionPercent } from "../utils/format";
import logger from "../utils/logger";
import { fileExistsIn, planOutput } from "./filenameDeriver";
import { ImageTranscoder } from "./imageTranscoder";
import { MetadataReader } from "./metadataReader";
import { Reporter } from "./reporter";

export interface OptimizationService {
  processAllImages(): Promise<OptimizationReport>;
  processImage(sourcePath: string): Promise<PhotoResult>;
  listImages(): Promise<string[]>;
}

export class BatchOptimizationService implements OptimizationService {
  private readonly metadataReader: MetadataReader;
  private readonly transcoder: ImageTranscoder;
  private readonly reporter: Reporter;
  private readonly config: Config;

  constructor(
    metadataReader: MetadataReader,
    transcoder: ImageTranscoder,
    reporter: Reporter,
    config: Config
  ) {
    this.metadataReader = metadataReader;
    this.transcoder = transcoder;
    this.reporter = reporter;
    this.config = config;
  }

  async processAllImages(): Promise<OptimizationReport> {
    const startTime = Date.now();
    const report: OptimizationReport = {
      totalImages: 0,
      successful: 0,
      failed: 0,
      totalSizeBefore: 0,
      totalSizeAfter: 0,
      reductionPercent: null,
      processingDuration: 0,
      results: [],
      errors: [],
    };

    await this.ensureDirectories();
    const images = await this.listImages();
    report.totalImages = images.length;

    const plan = this.buildPlan(images.length);
    this.reporter.runStarted(plan);

    // one photo at a time, in name order
    for (const image of images) {
      const result = await this.processImage(image);
      report.results.push(result);

      if (result.status === "success") {
        report.successful++;
        report.totalSizeBefore += result.originalSize;
        report.totalSizeAfter += result.optimizedSize;
      } else {
        report.failed++;
        report.errors.push(`${result.sourceName}: ${result.error ?? "Unknown error"}`);
      }
    }

    report.reductionPercent = reductionPercent(
      report.totalSizeBefore,
      report.totalSizeAfter
    );
    report.processingDuration = Date.now() - startTime;

    logger.info("Batch optimization completed", {
      operation: "batch.complete",
      duration: report.processingDuration,
      successful: report.successful,
      failed: report.failed,
      totalImages: report.totalImages,
      totalSizeBefore: report.totalSizeBefore,
      totalSizeAfter: report.totalSizeAfter,
    });

    this.reporter.runCompleted(report, plan);
    return report;
  }

  /**
   * Runs the whole pipeline for one photo. Never throws: every failure comes
   * back as a failed result.
   */
  async processImage(sourcePath: string): Promise<PhotoResult> {
    const startTime = Date.now();
    const sourceName = path.basename(sourcePath);
    const result: PhotoResult = {
      sourceName,
      originalSize: 0,
      optimizedSize: 0,
      metadataPreserved: false,
      processingTime: 0,
      status: "failed",
    };

    let targetPath: string | undefined;
    try {
      result.capture = await this.metadataReader.readCaptureTimestamp(sourcePath);

      const outputPlan = await planOutput(
        this.config.event,
        result.capture.timestamp,
        fileExistsIn(this.config.paths.outputDir)
      );
      result.targetName = outputPlan.fileName;
      targetPath = path.join(this.config.paths.outputDir, outputPlan.fileName);

      result.originalSize = (await fs.stat(sourcePath)).size;
      this.reporter.fileStarted(sourceName, outputPlan.fileName);

      const transcoded = await this.transcoder.transcode(sourcePath, targetPath, {
        maxWidth: this.config.optimization.maxWidth,
        quality: this.config.optimization.quality,
      });
      result.optimizedSize = transcoded.size;
      result.width = transcoded.width;
      result.height = transcoded.height;
      result.metadataPreserved = transcoded.metadataPreserved;
    } catch (error) {
      result.error = errorMessage(error);
      result.processingTime = Date.now() - startTime;
      logger.error(`Error optimizing ${sourceName}: ${result.error}`, {
        operation: "transcode.error",
        sourcePath,
        error: result.error,
      });
      if (error instanceof OutputWriteError) {
        await this.discardOutput(error.targetPath);
      }
      this.reporter.fileFailed(sourceName, result.error);
      return result;
    }

    try {
      await this.backupOriginal(sourcePath);
    } catch (error) {
      result.error = errorMessage(error);
      result.processingTime = Date.now() - startTime;
      logger.error(result.error, {
        operation: "backup.error",
        sourcePath,
        backupDir: this.config.paths.backupDir,
      });
      await this.discardOutput(targetPath);
      this.reporter.fileFailed(sourceName, result.error);
      return result;
    }

    result.status = "success";
    result.processingTime = Date.now() - startTime;
    this.reporter.fileOptimized(result);
    return result;
  }

  /**
   * Supported files directly inside the input directory, sorted by name.
   */
  async listImages(): Promise<string[]> {
    const inputDir = this.config.paths.inputDir;
    const entries = await fs.readdir(inputDir, { withFileTypes: true });
    const images: string[] = [];

    for (const entry of entries) {
      if (!isSupportedExtension(path.extname(entry.name))) {
        continue;
      }
      const fullPath = path.join(inputDir, entry.name);
      if (entry.isFile() || (entry.isSymbolicLink() && (await this.isFile(fullPath)))) {
        images.push(entry.name);
      }
    }

    return images.sort().map((name) => path.join(inputDir, name));
  }

  private async ensureDirectories(): Promise<void> {
    await fs.mkdir(this.config.paths.outputDir, { recursive: true });
    await fs.mkdir(this.config.paths.backupDir, { recursive: true });
  }

  /**
   * Byte-for-byte copy under the original name, keeping timestamps and mode.
   * An earlier backup of the same name is replaced.
   */
  private async backupOriginal(sourcePath: string): Promise<void> {
    const backupPath = path.join(
      this.config.paths.backupDir,
      path.basename(sourcePath)
    );
    try {
      const stats = await fs.stat(sourcePath);
      await fs.copyFile(sourcePath, backupPath);
      await fs.chmod(backupPath, stats.mode);
      await fs.utimes(backupPath, stats.atime, stats.mtime);
    } catch (error) {
      throw new BackupError(sourcePath, errorMessage(error), toError(error));
    }
  }

  private async discardOutput(targetPath: string | undefined): Promise<void> {
    if (!targetPath) {
      return;
    }
    try {
      await fs.rm(targetPath, { force: true });
    } catch (error) {
      logger.warn(`Could not remove ${targetPath}: ${errorMessage(error)}`, {
        operation: "output.cleanupError",
        targetPath,
      });
    }
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch (error) {
      return false;
    }
  }

  private buildPlan(imageCount: number): RunPlan {
    return {
      inputDir: this.config.paths.inputDir,
      outputDir: this.config.paths.outputDir,
      backupDir: this.config.paths.backupDir,
      event: this.config.event,
      maxWidth: this.config.optimization.maxWidth,
      quality: this.config.optimization.quality,
      imageCount,
    };
  }
}
