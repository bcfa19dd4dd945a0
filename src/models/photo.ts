export const EVENT_NAMES = [
  "solstice",
  "equinox",
  "winter-solstice",
  "summer-solstice",
  "spring-equinox",
  "fall-equinox",
] as const;
export type EventName = (typeof EVENT_NAMES)[number];

export const SUPPORTED_EXTENSIONS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".JPG",
  ".JPEG",
  ".PNG",
] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export const OUTPUT_EXTENSION = ".jpg";

/** Calendar wall-clock time, without a zone. */
export interface CaptureTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type TimestampSource = "DateTimeOriginal" | "DateTimeDigitized" | "modified";

export interface CaptureTime {
  timestamp: CaptureTimestamp;
  source: TimestampSource;
}

export interface SourceImage {
  path: string;
  width: number;
  height: number;
  format: string;
  space?: string | undefined;
  channels: number;
  hasAlpha: boolean;
  exif?: Buffer | undefined;
}

export interface OutputPlan {
  event: string;
  timestamp: CaptureTimestamp;
  counter?: number | undefined;
  fileName: string;
}

export interface TranscodeOptions {
  maxWidth: number;
  quality: number;
}

export interface TranscodeResult {
  width: number;
  height: number;
  size: number;
  metadataPreserved: boolean;
}

export interface PhotoResult {
  sourceName: string;
  targetName?: string | undefined;
  capture?: CaptureTime | undefined;
  originalSize: number;
  optimizedSize: number;
  width?: number | undefined;
  height?: number | undefined;
  metadataPreserved: boolean;
  processingTime: number;
  status: "success" | "failed";
  error?: string;
}

export interface OptimizationReport {
  totalImages: number;
  successful: number;
  failed: number;
  totalSizeBefore: number;
  totalSizeAfter: number;
  /** null when nothing was optimized */
  reductionPercent: number | null;
  processingDuration: number;
  results: PhotoResult[];
  errors: string[];
}

export interface RunPlan {
  inputDir: string;
  outputDir: string;
  backupDir: string;
  event: string;
  maxWidth: number;
  quality: number;
  imageCount: number;
}

export function isEventName(value: string): value is EventName {
  return EVENT_NAMES.some((name) => name === value);
}

export function isSupportedExtension(value: string): value is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((extension) => extension === value);
}

/** Container formats sharp must report for an input to be transcoded. */
export const INPUT_FORMATS = ["jpeg", "png"] as const;
export type InputFormat = (typeof INPUT_FORMATS)[number];

export function isInputFormat(value: string): value is InputFormat {
  return INPUT_FORMATS.some((format) => format === value);
}
