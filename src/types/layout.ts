import type { Point, Size } from './geometry';

/** 8-bit sRGB color. Alpha is kept for round-tripping but never compared. */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface Layout {
  /** Top-left corner of the text region, in reference-resolution pixels. */
  offset: Point;
  size: Size;
  /** Resolution the offset and size were authored against. */
  referenceResolution: Size;
  themeTextColor: Color;
  itemNameDistance: number;
}

export interface PixelCheck {
  x: number;
  y: number;
  color: Color;
  /** Maximum Euclidean RGB distance. 0 requires an exact match. */
  tolerance: number;
}

/** A layout guarded by an aspect ratio and optional pixel checks. */
export interface LayoutOption {
  aspectRatio: [number, number];
  pixelChecks: PixelCheck[];
  layout: Layout;
}
