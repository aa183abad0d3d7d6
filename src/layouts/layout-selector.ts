import type { Aabb } from '@/types/geometry';
import type { RgbaImage } from '@/types/frame';
import type { Color, Layout, LayoutOption, PixelCheck } from '@/types/layout';

/**
 * Integer cross-multiplication, so 1920x1080 matches 16:9 without any
 * floating point rounding.
 */
export function aspectRatioMatches(option: LayoutOption, width: number, height: number): boolean {
  const [ratioWidth, ratioHeight] = option.aspectRatio;
  return ratioWidth * height === ratioHeight * width;
}

export function colorDistance(a: Color, b: Color): number {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return Math.sqrt(dr * dr + dg * dg + db * db);
}

export function pixelCheckMatches(check: PixelCheck, image: RgbaImage): boolean {
  if (check.x < 0 || check.y < 0 || check.x >= image.width || check.y >= image.height) {
    return false;
  }

  const index = (check.y * image.width + check.x) * 4;
  const pixel: Color = {
    r: image.data[index] ?? 0,
    g: image.data[index + 1] ?? 0,
    b: image.data[index + 2] ?? 0,
    a: image.data[index + 3] ?? 0,
  };

  if (check.tolerance === 0) {
    return pixel.r === check.color.r && pixel.g === check.color.g && pixel.b === check.color.b;
  }
  return colorDistance(check.color, pixel) <= check.tolerance;
}

export function layoutOptionMatches(option: LayoutOption, image: RgbaImage): boolean {
  return (
    aspectRatioMatches(option, image.width, image.height) &&
    option.pixelChecks.every((check) => pixelCheckMatches(check, image))
  );
}

/** The layout of the first matching option, in configured order. */
export function selectLayout(image: RgbaImage, options: LayoutOption[]): Layout | null {
  return options.find((option) => layoutOptionMatches(option, image))?.layout ?? null;
}

export function selectAllLayouts(image: RgbaImage, options: LayoutOption[]): LayoutOption[] {
  return options.filter((option) => layoutOptionMatches(option, image));
}

function scaleFactor(actual: number, reference: number): number {
  return reference > 0 ? Math.floor(actual / reference) : 0;
}

/**
 * The layout's text region rescaled to the captured resolution. Scaling is by
 * whole multiples of the reference resolution, per axis.
 */
export function getOcrBounds(layout: Layout, imageWidth: number, imageHeight: number): Aabb {
  const factorX = scaleFactor(imageWidth, layout.referenceResolution.width);
  const factorY = scaleFactor(imageHeight, layout.referenceResolution.height);
  const minX = layout.offset.x * factorX;
  const minY = layout.offset.y * factorY;

  return {
    min: { x: minX, y: minY },
    max: { x: minX + layout.size.width * factorX, y: minY + layout.size.height * factorY },
  };
}
