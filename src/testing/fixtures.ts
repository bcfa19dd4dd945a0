import fs from "fs/promises";
import os from "os";
import path from "path";
import sharp from "sharp";
import { Config, resolveBackupDir } from "../config";

export interface JpegFixture {
  width?: number;
  height?: number;
  dateTimeOriginal?: string;
  dateTimeDigitized?: string;
}

export async function makeTempDir(prefix: string = "photo-optimizer-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeJpeg(filePath: string, fixture: JpegFixture = {}): Promise<void> {
  const image = sharp({
    create: {
      width: fixture.width ?? 64,
      height: fixture.height ?? 48,
      channels: 3,
      background: { r: 200, g: 120, b: 40 },
    },
  }).jpeg({ quality: 95 });

  const exifFields: Record<string, string> = {};
  if (fixture.dateTimeOriginal) {
    exifFields.DateTimeOriginal = fixture.dateTimeOriginal;
  }
  if (fixture.dateTimeDigitized) {
    exifFields.DateTimeDigitized = fixture.dateTimeDigitized;
  }
  if (Object.keys(exifFields).length > 0) {
    image.withExif({ IFD0: { Copyright: "test-fixture" }, IFD2: exifFields });
  }

  await image.toFile(filePath);
}

export async function writePng(
  filePath: string,
  options: {
    width?: number;
    height?: number;
    transparent?: boolean;
    dateTimeOriginal?: string;
  } = {}
): Promise<void> {
  const image = sharp({
    create: {
      width: options.width ?? 32,
      height: options.height ?? 32,
      channels: 4,
      background: options.transparent
        ? { r: 0, g: 0, b: 0, alpha: 0 }
        : { r: 10, g: 200, b: 90, alpha: 1 },
    },
  }).png();
  if (options.dateTimeOriginal) {
    image.withExif({ IFD2: { DateTimeOriginal: options.dateTimeOriginal } });
  }
  await image.toFile(filePath);
}

/** Sets atime and mtime to a local wall-clock time, whole seconds. */
export async function setModifiedTime(filePath: string, date: Date): Promise<void> {
  await fs.utimes(filePath, date, date);
}

export function makeConfig(inputDir: string, outputDir: string, overrides: Partial<Config["optimization"]> = {}): Config {
  return {
    paths: {
      inputDir,
      outputDir,
      backupDir: resolveBackupDir(outputDir),
    },
    event: "solstice",
    optimization: {
      maxWidth: overrides.maxWidth ?? 1920,
      quality: overrides.quality ?? 82,
    },
    logging: { level: "info", format: "simple" },
  };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    return false;
  }
}
