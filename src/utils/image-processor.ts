import type { Aabb, Size } from '@/types/geometry';
import type { RgbaImage } from '@/types/frame';

/**
 * One stage of the OCR preprocessing chain.
 *
 * - `unsharpen`: unsharp mask; `sigma` is the Gaussian blur radius and
 *   `threshold` the minimum per-channel difference that gets sharpened
 * - `contrast`: percentage adjustment, positive values increase contrast
 * - `fastBlur`: box-blur approximation of a Gaussian with the given sigma
 * - `invert`: color inversion, alpha untouched
 * - `brighten`: value added to every color channel
 */
export type PreprocessStep =
  | { kind: 'unsharpen'; sigma: number; threshold: number }
  | { kind: 'contrast'; amount: number }
  | { kind: 'fastBlur'; sigma: number }
  | { kind: 'invert' }
  | { kind: 'brighten'; amount: number };

export interface CropRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function isPreprocessStep(value: unknown): value is PreprocessStep {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  switch (record.kind) {
    case 'unsharpen':
      return typeof record.sigma === 'number' && typeof record.threshold === 'number';
    case 'contrast':
    case 'brighten':
      return typeof record.amount === 'number';
    case 'fastBlur':
      return typeof record.sigma === 'number';
    case 'invert':
      return true;
    default:
      return false;
  }
}

/**
 * Tuned for the small, low-contrast, light-on-dark text of the overlay's
 * target UI. The sharpen/blur/sharpen pass thickens strokes before inversion
 * gives the recognizer dark text on a light background.
 */
export const OVERLAY_TEXT_PREPROCESS: readonly PreprocessStep[] = [
  { kind: 'unsharpen', sigma: 20, threshold: 15 },
  { kind: 'contrast', amount: 20 },
  { kind: 'fastBlur', sigma: 1 },
  { kind: 'unsharpen', sigma: 5, threshold: 15 },
  { kind: 'invert' },
  { kind: 'brighten', amount: -30 },
  { kind: 'contrast', amount: 20 },
];

/** Number of box passes used to approximate a Gaussian in `fastBlur`. */
const FAST_BLUR_PASSES = 3;

export class ImageProcessor {
  preprocess(image: RgbaImage, steps: readonly PreprocessStep[] = OVERLAY_TEXT_PREPROCESS): RgbaImage {
    let current = image;
    for (const step of steps) {
      current = this.applyStep(current, step);
    }
    return current;
  }

  applyStep(image: RgbaImage, step: PreprocessStep): RgbaImage {
    switch (step.kind) {
      case 'unsharpen':
        return this.unsharpen(image, step.sigma, step.threshold);
      case 'contrast':
        return this.adjustContrast(image, step.amount);
      case 'fastBlur':
        return this.fastBlur(image, step.sigma);
      case 'invert':
        return this.invert(image);
      case 'brighten':
        return this.brighten(image, step.amount);
    }
  }

  /**
   * Copies the part of `image` inside `bounds`. Bounds reaching past the image
   * are clipped, so the result may be smaller than requested or empty.
   */
  crop(image: RgbaImage, bounds: Aabb): RgbaImage {
    const { x, y, width, height } = this.cropRect(image, bounds);

    const data = new Uint8ClampedArray(width * height * 4);
    for (let row = 0; row < height; row++) {
      const start = ((y + row) * image.width + x) * 4;
      data.set(image.data.subarray(start, start + width * 4), row * width * 4);
    }

    return { width, height, data };
  }

  /** The integer rectangle `crop` copies for `bounds`. */
  cropRect(image: Size, bounds: Aabb): CropRect {
    const x = Math.min(Math.max(0, Math.floor(bounds.min.x)), image.width);
    const y = Math.min(Math.max(0, Math.floor(bounds.min.y)), image.height);
    const width = Math.max(0, Math.min(Math.floor(bounds.max.x) - x, image.width - x));
    const height = Math.max(0, Math.min(Math.floor(bounds.max.y) - y, image.height - y));
    return { x, y, width, height };
  }

  invert(image: RgbaImage): RgbaImage {
    const data = new Uint8ClampedArray(image.data);
    for (let i = 0; i < data.length; i += 4) {
      data[i] = 255 - (data[i] ?? 0);
      data[i + 1] = 255 - (data[i + 1] ?? 0);
      data[i + 2] = 255 - (data[i + 2] ?? 0);
    }
    return { width: image.width, height: image.height, data };
  }

  brighten(image: RgbaImage, amount: number): RgbaImage {
    const data = new Uint8ClampedArray(image.data);
    for (let i = 0; i < data.length; i += 4) {
      data[i] = this.clamp((data[i] ?? 0) + amount);
      data[i + 1] = this.clamp((data[i + 1] ?? 0) + amount);
      data[i + 2] = this.clamp((data[i + 2] ?? 0) + amount);
    }
    return { width: image.width, height: image.height, data };
  }

  /**
   * Scales each color channel's distance from mid-grey by
   * `((100 + amount) / 100)^2`.
   */
  adjustContrast(image: RgbaImage, amount: number): RgbaImage {
    const data = new Uint8ClampedArray(image.data);
    const factor = ((100 + amount) / 100) ** 2;
    const apply = (value: number): number => this.clamp(((value / 255 - 0.5) * factor + 0.5) * 255);

    for (let i = 0; i < data.length; i += 4) {
      data[i] = apply(data[i] ?? 0);
      data[i + 1] = apply(data[i + 1] ?? 0);
      data[i + 2] = apply(data[i + 2] ?? 0);
    }
    return { width: image.width, height: image.height, data };
  }

  /** Separable Gaussian blur over all four channels, edges clamped. */
  gaussianBlur(image: RgbaImage, sigma: number): RgbaImage {
    if (sigma <= 0 || image.width === 0 || image.height === 0) {
      return { width: image.width, height: image.height, data: new Uint8ClampedArray(image.data) };
    }

    const radius = Math.ceil(sigma * 3);
    const kernel = new Float32Array(radius * 2 + 1);
    let sum = 0;
    for (let i = -radius; i <= radius; i++) {
      const weight = Math.exp(-(i * i) / (2 * sigma * sigma));
      kernel[i + radius] = weight;
      sum += weight;
    }
    for (let i = 0; i < kernel.length; i++) {
      kernel[i] = (kernel[i] ?? 0) / sum;
    }

    const horizontal = this.convolve(image.data, image.width, image.height, kernel, true);
    const vertical = this.convolve(horizontal, image.width, image.height, kernel, false);
    return { width: image.width, height: image.height, data: this.toBytes(vertical) };
  }

  /**
   * Unsharp mask: wherever a channel differs from its blurred value by more
   * than `threshold`, the difference is added once more.
   */
  unsharpen(image: RgbaImage, sigma: number, threshold: number): RgbaImage {
    const blurred = this.gaussianBlur(image, sigma);
    const data = new Uint8ClampedArray(image.data.length);

    for (let i = 0; i < data.length; i++) {
      const original = image.data[i] ?? 0;
      const diff = original - (blurred.data[i] ?? 0);
      data[i] = Math.abs(diff) > threshold ? this.clamp(original + diff) : original;
    }

    return { width: image.width, height: image.height, data };
  }

  /** Gaussian approximation by repeated box blurs; cheap for small sigmas. */
  fastBlur(image: RgbaImage, sigma: number): RgbaImage {
    if (sigma <= 0 || image.width === 0 || image.height === 0) {
      return { width: image.width, height: image.height, data: new Uint8ClampedArray(image.data) };
    }

    let current: ArrayLike<number> = image.data;
    for (const size of this.boxSizesForGaussian(sigma, FAST_BLUR_PASSES)) {
      const radius = (size - 1) / 2;
      if (radius < 1) {
        continue;
      }
      const box = new Float32Array(size).fill(1 / size);
      current = this.convolve(current, image.width, image.height, box, true);
      current = this.convolve(current, image.width, image.height, box, false);
    }

    return { width: image.width, height: image.height, data: this.toBytes(current) };
  }

  /** Odd box widths whose successive application approximates `sigma`. */
  boxSizesForGaussian(sigma: number, passes: number): number[] {
    const idealWidth = Math.sqrt((12 * sigma * sigma) / passes + 1);
    let lower = Math.floor(idealWidth);
    if (lower % 2 === 0) {
      lower -= 1;
    }
    const upper = lower + 2;
    const idealLowerCount =
      (12 * sigma * sigma - passes * lower * lower - 4 * passes * lower - 3 * passes) / (-4 * lower - 4);
    const lowerCount = Math.round(idealLowerCount);

    return Array.from({ length: passes }, (_, i) => (i < lowerCount ? lower : upper));
  }

  private convolve(
    source: ArrayLike<number>,
    width: number,
    height: number,
    kernel: Float32Array,
    horizontal: boolean
  ): Float32Array {
    const output = new Float32Array(width * height * 4);
    const radius = (kernel.length - 1) / 2;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        let r = 0;
        let g = 0;
        let b = 0;
        let a = 0;
        for (let k = -radius; k <= radius; k++) {
          const sx = horizontal ? Math.min(width - 1, Math.max(0, x + k)) : x;
          const sy = horizontal ? y : Math.min(height - 1, Math.max(0, y + k));
          const weight = kernel[k + radius] ?? 0;
          const index = (sy * width + sx) * 4;
          r += (source[index] ?? 0) * weight;
          g += (source[index + 1] ?? 0) * weight;
          b += (source[index + 2] ?? 0) * weight;
          a += (source[index + 3] ?? 0) * weight;
        }
        const out = (y * width + x) * 4;
        output[out] = r;
        output[out + 1] = g;
        output[out + 2] = b;
        output[out + 3] = a;
      }
    }

    return output;
  }

  private toBytes(values: ArrayLike<number>): Uint8ClampedArray {
    const data = new Uint8ClampedArray(values.length);
    for (let i = 0; i < values.length; i++) {
      data[i] = this.clamp(values[i] ?? 0);
    }
    return data;
  }

  private clamp(value: number): number {
    return Math.max(0, Math.min(255, Math.round(value)));
  }
}
