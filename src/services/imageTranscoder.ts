import fs from "fs/promises";
import path from "path";
import sharp from "sharp";
import {
  isInputFormat,
  SourceImage,
  TranscodeOptions,
  TranscodeResult,
} from "../models";
import {
  CorruptedImageError,
  errorCode,
  errorMessage,
  ImageProcessingError,
  OutputWriteError,
  toError,
  TranscodeError,
  UnsupportedFormatError,
} from "../utils/error";
import { insertExifSegment } from "../utils/jpeg";
import logger from "../utils/logger";

const WHITE = { r: 255, g: 255, b: 255 };

export interface ImageTranscoder {
  transcode(
    sourcePath: string,
    targetPath: string,
    options: TranscodeOptions
  ): Promise<TranscodeResult>;
  inspect(buffer: Buffer, sourcePath: string): Promise<SourceImage>;
  validateFileIntegrity(buffer: Buffer): Promise<sharp.Metadata>;
  isFormatSupported(format: string): boolean;
}

/**
 * Proportional size that fits `maxWidth`. Never upscales; the height is
 * rounded down.
 */
export function computeTargetSize(
  width: number,
  height: number,
  maxWidth: number
): { width: number; height: number } {
  if (width <= maxWidth) {
    return { width, height };
  }
  const ratio = maxWidth / width;
  return { width: maxWidth, height: Math.max(1, Math.floor(height * ratio)) };
}

export class SharpImageTranscoder implements ImageTranscoder {
  async transcode(
    sourcePath: string,
    targetPath: string,
    options: TranscodeOptions
  ): Promise<TranscodeResult> {
    try {
      const buffer = await fs.readFile(sourcePath);
      const source = await this.inspect(buffer, sourcePath);
      const target = computeTargetSize(
        source.width,
        source.height,
        options.maxWidth
      );

      const pipeline = sharp(buffer);
      if (target.width !== source.width) {
        pipeline.resize(target.width, target.height, {
          kernel: sharp.kernel.lanczos3,
          fit: "fill",
        });
      }
      // JPEG has no alpha channel
      if (source.hasAlpha) {
        pipeline.flatten({ background: WHITE });
      }

      const validQuality = Math.max(1, Math.min(100, options.quality));
      const encoded = await pipeline
        .toColourspace("srgb")
        .jpeg({
          quality: validQuality,
          progressive: true,
          optimiseCoding: true,
        })
        .toBuffer({ resolveWithObject: true });

      const { data, metadataPreserved } = this.attachExif(encoded.data, source);
      await this.writeOutput(targetPath, data);

      logger.debug(`Transcoded ${path.basename(sourcePath)}`, {
        operation: "transcode.complete",
        sourcePath,
        targetPath,
        width: encoded.info.width,
        height: encoded.info.height,
        size: data.length,
        metadataPreserved,
      });

      return {
        width: encoded.info.width,
        height: encoded.info.height,
        size: data.length,
        metadataPreserved,
      };
    } catch (error) {
      if (error instanceof ImageProcessingError) {
        throw error;
      }
      throw new TranscodeError(errorMessage(error), toError(error));
    }
  }

  async inspect(buffer: Buffer, sourcePath: string): Promise<SourceImage> {
    const metadata = await this.validateFileIntegrity(buffer);
    const { format, width, height } = metadata;
    if (!format || !width || !height) {
      throw new CorruptedImageError("Invalid image: missing required metadata");
    }
    if (!this.isFormatSupported(format)) {
      throw new UnsupportedFormatError(format);
    }

    return {
      path: sourcePath,
      width,
      height,
      format,
      space: metadata.space,
      channels: metadata.channels ?? 3,
      hasAlpha: metadata.hasAlpha ?? false,
      exif: metadata.exif,
    };
  }

  isFormatSupported(format: string): boolean {
    return isInputFormat(format.toLowerCase());
  }

  async validateFileIntegrity(buffer: Buffer): Promise<sharp.Metadata> {
    try {
      if (!buffer || buffer.length === 0) {
        throw new CorruptedImageError("Empty or invalid buffer");
      }

      const metadata = await sharp(buffer).metadata();

      if (!metadata.format) {
        throw new CorruptedImageError("Unable to determine image format");
      }

      if (
        !metadata.width ||
        !metadata.height ||
        metadata.width <= 0 ||
        metadata.height <= 0
      ) {
        throw new CorruptedImageError("Invalid image dimensions");
      }
      return metadata;
    } catch (error) {
      if (error instanceof ImageProcessingError) {
        throw error;
      }
      throw new CorruptedImageError(
        "File integrity validation failed",
        toError(error)
      );
    }
  }

  // wx: never replace a file that appeared after the name was chosen
  private async writeOutput(targetPath: string, data: Buffer): Promise<void> {
    try {
      await fs.writeFile(targetPath, data, { flag: "wx" });
    } catch (error) {
      if (errorCode(error) === "EEXIST") {
        throw error;
      }
      throw new OutputWriteError(targetPath, errorMessage(error), toError(error));
    }
  }

  /**
   * Carries the source EXIF block over byte for byte. A block that cannot be
   * attached is dropped with a warning; the image itself is still written.
   */
  private attachExif(
    jpeg: Buffer,
    source: SourceImage
  ): { data: Buffer; metadataPreserved: boolean } {
    if (!source.exif || source.exif.length === 0) {
      return { data: jpeg, metadataPreserved: false };
    }
    try {
      return { data: insertExifSegment(jpeg, source.exif), metadataPreserved: true };
    } catch (error) {
      logger.warn(
        `Skipping EXIF for ${path.basename(source.path)}: ${errorMessage(error)}`,
        {
          operation: "transcode.metadataSkipped",
          sourcePath: source.path,
        }
      );
      return { data: jpeg, metadataPreserved: false };
    }
  }
}
