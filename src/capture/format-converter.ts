import { BYTES_PER_PIXEL, type PixelFormat, type RgbaImage } from '@/types/frame';
import { ERROR_MESSAGES, logErrorOnce } from '@/utils/error-handling';
import { OCRErrorCode } from '@/types/ocr-errors';

export function formatName(format: PixelFormat): string {
  return typeof format === 'string' ? format : format.other;
}

export function requiredByteLength(width: number, height: number): number {
  return width * height * BYTES_PER_PIXEL;
}

/**
 * Rewrites packed BGRA pixels as RGBA in place. Each pixel is read as a
 * big-endian word, byte-swapped (BGRA -> ARGB) and rotated left by 8 bits
 * (ARGB -> RGBA).
 */
export function bgraToRgbaInPlace(bytes: Uint8Array): void {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const end = bytes.byteLength - (bytes.byteLength % BYTES_PER_PIXEL);

  for (let offset = 0; offset < end; offset += BYTES_PER_PIXEL) {
    const bgra = view.getUint32(offset, false);
    const argb =
      ((bgra & 0xff) << 24) | ((bgra & 0xff00) << 8) | ((bgra >>> 8) & 0xff00) | (bgra >>> 24);
    const rgba = ((argb << 8) | (argb >>> 24)) >>> 0;
    view.setUint32(offset, rgba, false);
  }
}

/**
 * Normalizes a raw capture buffer to RGBA without copying it. Returns null for
 * buffers too short for the declared size and for formats we cannot convert;
 * the latter is reported once per format name.
 */
export function normalizeToRgba(
  bytes: Uint8Array,
  width: number,
  height: number,
  format: PixelFormat
): RgbaImage | null {
  if (width <= 0 || height <= 0) {
    return null;
  }

  const required = requiredByteLength(width, height);
  if (bytes.byteLength < required) {
    return null;
  }
  const pixels = bytes.subarray(0, required);

  if (typeof format !== 'string') {
    const name = formatName(format);
    logErrorOnce(
      `pixel-format:${name}`,
      `${ERROR_MESSAGES[OCRErrorCode.UNSUPPORTED_PIXEL_FORMAT].message} Got: ${name}`
    );
    return null;
  }

  if (format === 'BGRA' || format === 'BGRx') {
    bgraToRgbaInPlace(pixels);
  }

  return {
    width,
    height,
    data: new Uint8ClampedArray(pixels.buffer, pixels.byteOffset, pixels.byteLength),
  };
}
