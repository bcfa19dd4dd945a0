import { OptimizationReport, PhotoResult, RunPlan } from "../models";
import {
  formatBytes,
  formatPercent,
  reductionPercent,
} from "../utils/format";

const RULE = "=".repeat(60);

/**
 * Receives run progress. The batch pipeline never writes to the console
 * itself.
 */
export interface Reporter {
  runStarted(plan: RunPlan): void;
  fileStarted(sourceName: string, targetName: string): void;
  fileOptimized(result: PhotoResult): void;
  fileFailed(sourceName: string, message: string): void;
  runCompleted(report: OptimizationReport, plan: RunPlan): void;
}

export function formatRunHeader(plan: RunPlan): string[] {
  return [
    "",
    `📸 Found ${plan.imageCount} photos to process`,
    `📁 Output directory: ${plan.outputDir}`,
    `💾 Backup directory: ${plan.backupDir}`,
    `🎯 Event name: ${plan.event}`,
    `📏 Max width: ${plan.maxWidth}px`,
    `🎨 Quality: ${plan.quality}%`,
    "",
  ];
}

export function formatFileSummary(result: PhotoResult): string {
  const reduction = formatPercent(
    reductionPercent(result.originalSize, result.optimizedSize)
  );
  return `  ✅ ${formatBytes(result.originalSize)} → ${formatBytes(
    result.optimizedSize
  )} (${reduction} reduction)`;
}

export function formatRunSummary(
  report: OptimizationReport,
  plan: RunPlan
): string[] {
  const saved = report.totalSizeBefore - report.totalSizeAfter;
  const lines = [
    "",
    RULE,
    `✅ Successfully processed: ${report.successful} photos`,
  ];
  if (report.failed > 0) {
    lines.push(`❌ Failed: ${report.failed} photos`);
  }
  lines.push(
    "",
    "📊 Storage Summary:",
    `   Original total: ${formatBytes(report.totalSizeBefore)}`,
    `   Optimized total: ${formatBytes(report.totalSizeAfter)}`,
    `   Space saved: ${formatBytes(saved)} (${formatPercent(
      report.reductionPercent
    )} reduction)`,
    "",
    `📁 Optimized photos: ${plan.outputDir}`,
    `💾 Original backups: ${plan.backupDir}`,
    RULE,
    ""
  );
  return lines;
}

export class ConsoleReporter implements Reporter {
  constructor(private readonly write: (line: string) => void = console.log) {}

  runStarted(plan: RunPlan): void {
    if (plan.imageCount === 0) {
      this.write(`❌ No image files found in ${plan.inputDir}`);
      return;
    }
    formatRunHeader(plan).forEach((line) => this.write(line));
  }

  fileStarted(sourceName: string, targetName: string): void {
    this.write(`Processing: ${sourceName} → ${targetName}`);
  }

  fileOptimized(result: PhotoResult): void {
    this.write(formatFileSummary(result));
  }

  fileFailed(sourceName: string, message: string): void {
    this.write(`  ❌ Error processing ${sourceName}: ${message}`);
  }

  runCompleted(report: OptimizationReport, plan: RunPlan): void {
    formatRunSummary(report, plan).forEach((line) => this.write(line));
  }
}

/** Discards everything; for programmatic use. */
export class SilentReporter implements Reporter {
  runStarted(): void {}
  fileStarted(): void {}
  fileOptimized(): void {}
  fileFailed(): void {}
  runCompleted(): void {}
}
