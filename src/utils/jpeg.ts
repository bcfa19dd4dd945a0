const MARKER = 0xff;
const SOI = 0xd8;
const APP0 = 0xe0;
const APP1 = 0xe1;

export const EXIF_HEADER = Buffer.from("Exif\0\0", "binary");
// segment length field is 16 bits and counts itself
export const MAX_SEGMENT_PAYLOAD = 0xffff - 2;

export function isJpeg(data: Buffer): boolean {
  return data.length >= 4 && data[0] === MARKER && data[1] === SOI;
}

/**
 * EXIF blocks read from PNG or WebP containers carry bare TIFF data; JPEG
 * wants the `Exif\0\0` identifier in front of it. The TIFF data itself is
 * never changed, so a PNG's block comes back with only those six bytes added.
 */
export function toExifPayload(exif: Buffer): Buffer {
  return exif.subarray(0, EXIF_HEADER.length).equals(EXIF_HEADER)
    ? exif
    : Buffer.concat([EXIF_HEADER, exif]);
}

/**
 * Inserts `exif` unchanged as an APP1 segment right after SOI, or after the
 * JFIF APP0 segment when there is one.
 */
export function insertExifSegment(jpeg: Buffer, exif: Buffer): Buffer {
  if (!isJpeg(jpeg)) {
    throw new Error("Not a JPEG stream");
  }
  const payload = toExifPayload(exif);
  if (payload.length > MAX_SEGMENT_PAYLOAD) {
    throw new RangeError(
      `EXIF block of ${payload.length} bytes does not fit in one APP1 segment`
    );
  }

  let offset = 2;
  if (jpeg[2] === MARKER && jpeg[3] === APP0 && jpeg.length >= 6) {
    offset = 4 + jpeg.readUInt16BE(4);
  }

  const header = Buffer.alloc(4);
  header[0] = MARKER;
  header[1] = APP1;
  header.writeUInt16BE(payload.length + 2, 2);

  return Buffer.concat([
    jpeg.subarray(0, offset),
    header,
    payload,
    jpeg.subarray(offset),
  ]);
}
