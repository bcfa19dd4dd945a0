import { parse as parseExif } from "exifr";
import fs from "fs/promises";
import path from "path";
import { CaptureTime, CaptureTimestamp, TimestampSource } from "../models";
import { errorMessage } from "../utils/error";
import logger from "../utils/logger";

// EXIF stores local capture time as "YYYY:MM:DD HH:MM:SS"
const EXIF_DATE_PATTERN = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/** exifr names the DateTimeDigitized tag (0x9004) CreateDate. */
const EXIF_KEYS = {
  DateTimeOriginal: "DateTimeOriginal",
  DateTimeDigitized: "CreateDate",
} as const;
type ExifDateField = keyof typeof EXIF_KEYS;

export interface ExifDateFields {
  DateTimeOriginal?: unknown;
  DateTimeDigitized?: unknown;
}

export interface ProviderContext {
  filePath: string;
  fileName: string;
  exif?: ExifDateFields | undefined;
}

export interface TimestampProvider {
  readonly source: TimestampSource;
  read(context: ProviderContext): Promise<CaptureTimestamp | undefined>;
}

/** A provider that always yields a timestamp; closes the chain. */
export interface FallbackTimestampProvider {
  readonly source: TimestampSource;
  read(context: ProviderContext): Promise<CaptureTimestamp>;
}

export interface MetadataReader {
  readCaptureTimestamp(filePath: string): Promise<CaptureTime>;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseExifDateTime(value: string): CaptureTimestamp | undefined {
  const match = EXIF_DATE_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => parseInt(part, 10));

  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return undefined;
  }
  return { year, month, day, hour, minute, second };
}

/** Local wall-clock fields of a Date. */
export function timestampFromDate(date: Date): CaptureTimestamp {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  };
}

export function exifFieldProvider(field: ExifDateField): TimestampProvider {
  return {
    source: field,
    async read(context) {
      const value = context.exif?.[field];
      if (value === undefined || value === null) {
        return undefined;
      }
      const timestamp =
        typeof value === "string" ? parseExifDateTime(value.trim()) : undefined;
      if (!timestamp) {
        logger.warn(
          `Unparseable ${field} "${String(value)}" in ${context.fileName}`,
          {
            operation: "metadata.parseError",
            file: context.fileName,
            field,
          }
        );
      }
      return timestamp;
    },
  };
}

export const modifiedTimeProvider: FallbackTimestampProvider = {
  source: "modified",
  async read(context) {
    const stats = await fs.stat(context.filePath);
    return timestampFromDate(stats.mtime);
  },
};

export const DEFAULT_PROVIDERS: readonly TimestampProvider[] = [
  exifFieldProvider("DateTimeOriginal"),
  exifFieldProvider("DateTimeDigitized"),
];

export class ExifMetadataReader implements MetadataReader {
  constructor(
    private readonly providers: readonly TimestampProvider[] = DEFAULT_PROVIDERS,
    private readonly fallback: FallbackTimestampProvider = modifiedTimeProvider
  ) {}

  async readCaptureTimestamp(filePath: string): Promise<CaptureTime> {
    const fileName = path.basename(filePath);
    const context: ProviderContext = {
      filePath,
      fileName,
      exif: await this.readExifFields(filePath),
    };

    for (const provider of this.providers) {
      const timestamp = await provider.read(context);
      if (timestamp) {
        return { timestamp, source: provider.source };
      }
    }

    logger.warn(
      `No EXIF datetime found for ${fileName}, using file modification time`,
      {
        operation: "metadata.fallback",
        file: fileName,
      }
    );
    return {
      timestamp: await this.fallback.read(context),
      source: this.fallback.source,
    };
  }

  /**
   * Returns undefined when the file has no EXIF block or it cannot be read.
   */
  async readExifFields(filePath: string): Promise<ExifDateFields | undefined> {
    try {
      const tags: unknown = await parseExif(filePath, {
        pick: [EXIF_KEYS.DateTimeOriginal, EXIF_KEYS.DateTimeDigitized],
        reviveValues: false,
      });
      if (typeof tags !== "object" || tags === null) {
        return undefined;
      }
      return {
        DateTimeOriginal:
          "DateTimeOriginal" in tags ? tags.DateTimeOriginal : undefined,
        DateTimeDigitized:
          "CreateDate" in tags ? tags.CreateDate : undefined,
      };
    } catch (error) {
      logger.warn(
        `Error reading EXIF from ${path.basename(filePath)}: ${errorMessage(error)}`,
        {
          operation: "metadata.readError",
          file: path.basename(filePath),
        }
      );
      return undefined;
    }
  }
}
