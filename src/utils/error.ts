export class ImageProcessingError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = "ImageProcessingError";
  }
}
export class CorruptedImageError extends ImageProcessingError {
  constructor(
    message: string = "Image file is corrupted or invalid",
    cause?: Error
  ) {
    super(message, cause);
    this.name = "CorruptedImageError";
  }
}

export class UnsupportedFormatError extends ImageProcessingError {
  constructor(format: string, cause?: Error) {
    super(`Unsupported image format: ${format}`, cause);
    this.name = "UnsupportedFormatError";
  }
}

export class TranscodeError extends ImageProcessingError {
  constructor(message: string, cause?: Error) {
    super(`Image transcoding failed: ${message}`, cause);
    this.name = "TranscodeError";
  }
}

/** The encoded image could not be written; part of it may be on disk. */
export class OutputWriteError extends TranscodeError {
  constructor(
    public readonly targetPath: string,
    message: string,
    cause?: Error
  ) {
    super(`could not write ${targetPath}: ${message}`, cause);
    this.name = "OutputWriteError";
  }
}

export class BackupError extends Error {
  constructor(
    public readonly sourcePath: string,
    message: string,
    public readonly cause?: Error
  ) {
    super(`Backup of ${sourcePath} failed: ${message}`);
    this.name = "BackupError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/** The `code` of a Node system error, such as "EEXIST". */
export function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}
