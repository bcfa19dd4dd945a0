import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CaptureTimestamp } from "../models";
import { makeTempDir, setModifiedTime, writeJpeg, writePng } from "../testing/fixtures";
import logger from "../utils/logger";
import {
  exifFieldProvider,
  ExifMetadataReader,
  FallbackTimestampProvider,
  parseExifDateTime,
  timestampFromDate,
  TimestampProvider,
} from "./metadataReader";

describe("parseExifDateTime", () => {
  it("parses the EXIF date layout", () => {
    expect(parseExifDateTime("2024:12:21 08:00:00")).toEqual({
      year: 2024,
      month: 12,
      day: 21,
      hour: 8,
      minute: 0,
      second: 0,
    });
    expect(parseExifDateTime("2024:02:29 23:59:59")).toMatchObject({ month: 2, day: 29 });
  });

  it("rejects other layouts and impossible dates", () => {
    expect(parseExifDateTime("2024-12-21 08:00:00")).toBeUndefined();
    expect(parseExifDateTime("2024:12:21T08:00:00")).toBeUndefined();
    expect(parseExifDateTime("2024:12:21 08:00")).toBeUndefined();
    expect(parseExifDateTime("0000:00:00 00:00:00")).toBeUndefined();
    expect(parseExifDateTime("2023:02:29 10:00:00")).toBeUndefined();
    expect(parseExifDateTime("2024:13:01 10:00:00")).toBeUndefined();
    expect(parseExifDateTime("2024:12:21 24:00:00")).toBeUndefined();
  });
});

describe("timestampFromDate", () => {
  it("uses local wall-clock fields", () => {
    expect(timestampFromDate(new Date(2023, 5, 1, 14, 30, 45))).toEqual({
      year: 2023,
      month: 6,
      day: 1,
      hour: 14,
      minute: 30,
      second: 45,
    });
  });
});

describe("exifFieldProvider", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("treats a malformed value as not available and warns", async () => {
    const warn = vi.spyOn(logger, "warn");
    const provider = exifFieldProvider("DateTimeOriginal");

    const result = await provider.read({
      filePath: "/photos/a.jpg",
      fileName: "a.jpg",
      exif: { DateTimeOriginal: "0000:00:00 00:00:00" },
    });

    expect(result).toBeUndefined();
    expect(warn).toHaveBeenCalledWith('Unparseable DateTimeOriginal "0000:00:00 00:00:00" in a.jpg', {
      operation: "metadata.parseError",
      file: "a.jpg",
      field: "DateTimeOriginal",
    });
  });

  it("is silent when the field is absent", async () => {
    const warn = vi.spyOn(logger, "warn");
    const provider = exifFieldProvider("DateTimeDigitized");

    expect(await provider.read({ filePath: "/photos/a.jpg", fileName: "a.jpg", exif: {} })).toBeUndefined();
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("ExifMetadataReader", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("prefers DateTimeOriginal", async () => {
    const file = path.join(root, "camera.jpg");
    await writeJpeg(file, {
      dateTimeOriginal: "2024:12:21 08:00:00",
      dateTimeDigitized: "2024:12:22 09:30:00",
    });

    const capture = await new ExifMetadataReader().readCaptureTimestamp(file);

    expect(capture).toEqual({
      source: "DateTimeOriginal",
      timestamp: { year: 2024, month: 12, day: 21, hour: 8, minute: 0, second: 0 },
    });
  });

  it("falls back to DateTimeDigitized", async () => {
    const file = path.join(root, "scan.jpg");
    await writeJpeg(file, { dateTimeDigitized: "2024:03:20 17:45:10" });

    const capture = await new ExifMetadataReader().readCaptureTimestamp(file);

    expect(capture).toEqual({
      source: "DateTimeDigitized",
      timestamp: { year: 2024, month: 3, day: 20, hour: 17, minute: 45, second: 10 },
    });
  });

  it("uses the modification time and warns when there is no EXIF date", async () => {
    const warn = vi.spyOn(logger, "warn");
    const file = path.join(root, "plain.png");
    await writePng(file);
    await setModifiedTime(file, new Date(2023, 5, 1, 14, 30, 45));

    const capture = await new ExifMetadataReader().readCaptureTimestamp(file);

    expect(capture).toEqual({
      source: "modified",
      timestamp: { year: 2023, month: 6, day: 1, hour: 14, minute: 30, second: 45 },
    });
    expect(warn).toHaveBeenCalledWith(
      "No EXIF datetime found for plain.png, using file modification time",
      { operation: "metadata.fallback", file: "plain.png" }
    );
  });

  it("never raises on an unreadable metadata block", async () => {
    const warn = vi.spyOn(logger, "warn");
    const file = path.join(root, "broken.jpg");
    await fs.writeFile(file, "this is not an image");
    await setModifiedTime(file, new Date(2022, 11, 22, 6, 15, 30));

    const capture = await new ExifMetadataReader().readCaptureTimestamp(file);

    expect(capture).toEqual({
      source: "modified",
      timestamp: { year: 2022, month: 12, day: 22, hour: 6, minute: 15, second: 30 },
    });
    expect(warn).toHaveBeenCalledWith(
      expect.stringMatching(/^Error reading EXIF from broken\.jpg: /),
      { operation: "metadata.readError", file: "broken.jpg" }
    );
    expect(warn).toHaveBeenCalledWith(
      "No EXIF datetime found for broken.jpg, using file modification time",
      { operation: "metadata.fallback", file: "broken.jpg" }
    );
  });

  it("tries providers in order until one answers", async () => {
    const answer: CaptureTimestamp = { year: 2021, month: 9, day: 22, hour: 19, minute: 21, second: 0 };
    const calls: string[] = [];
    const empty: TimestampProvider = {
      source: "DateTimeOriginal",
      async read() {
        calls.push("first");
        return undefined;
      },
    };
    const found: TimestampProvider = {
      source: "DateTimeDigitized",
      async read() {
        calls.push("second");
        return answer;
      },
    };
    const fallback: FallbackTimestampProvider = {
      source: "modified",
      async read() {
        calls.push("fallback");
        return answer;
      },
    };

    const reader = new ExifMetadataReader([empty, found], fallback);
    const capture = await reader.readCaptureTimestamp(path.join(root, "missing.jpg"));

    expect(capture).toEqual({ source: "DateTimeDigitized", timestamp: answer });
    expect(calls).toEqual(["first", "second"]);
  });
});
