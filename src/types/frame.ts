/**
 * Pixel layouts a capture backend may declare. Anything the backend reports
 * that is not one of the four packed 32-bit layouts is carried by name.
 */
export type PixelFormat = 'BGRA' | 'RGBA' | 'BGRx' | 'RGBx' | { other: string };

export interface FrameMeta {
  width: number;
  height: number;
  format: PixelFormat;
}

/**
 * Tightly packed 8-bit RGBA raster. Same shape as a DOM `ImageData`, so
 * callers holding one can pass it straight in.
 */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export const BYTES_PER_PIXEL = 4;
