import type { Color, Layout, LayoutOption, PixelCheck } from '@/types/layout';
import type { Point, Size } from '@/types/geometry';
import { createInvalidConfigError } from '@/utils/error-handling';

export interface EngineSettings {
  id: string;
  language: string;
  /** Language data directory; the engine's installed default when absent. */
  langPath?: string;
}

export interface OverlaySettings {
  /** Key the input listener maps to an OCR trigger. */
  overlayKey: string;
  /** Seconds displayed items stay on screen. */
  closeLayoutAfter: number;
  saveToDisk: boolean;
  captureDirectory: string;
  gapThreshold: number;
  maxDisplayedItems: number;
  tickIntervalMs: number;
  engine: EngineSettings;
  layouts: LayoutOption[];
}

export const DEFAULT_LAYOUT_OPTION: LayoutOption = {
  aspectRatio: [16, 9],
  pixelChecks: [],
  layout: {
    offset: { x: 478, y: 411 },
    size: { width: 965, height: 49 },
    referenceResolution: { width: 1920, height: 1080 },
    themeTextColor: { r: 0xbe, g: 0xa9, b: 0x66, a: 0xff },
    itemNameDistance: 90,
  },
};

export const DEFAULT_SETTINGS: OverlaySettings = {
  overlayKey: 'KeyI',
  closeLayoutAfter: 14.5,
  saveToDisk: false,
  captureDirectory: 'images',
  gapThreshold: 15,
  maxDisplayedItems: 4,
  tickIntervalMs: 50,
  engine: { id: 'tesseract', language: 'eng' },
  layouts: [DEFAULT_LAYOUT_OPTION],
};

const HEX_COLOR = /^#?([0-9a-f]{3}|[0-9a-f]{4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/** Accepts `#rgb`, `#rgba`, `#rrggbb` and `#rrggbbaa`, with or without `#`. */
export function parseHexColor(value: string): Color {
  const match = HEX_COLOR.exec(value.trim());
  const digits = match?.[1];
  if (!digits) {
    throw createInvalidConfigError(`Invalid hex color: ${value}`);
  }

  const expanded = digits.length <= 4 ? [...digits].map((digit) => digit + digit).join('') : digits;
  const channel = (index: number): number => parseInt(expanded.slice(index * 2, index * 2 + 2), 16);
  return {
    r: channel(0),
    g: channel(1),
    b: channel(2),
    a: expanded.length === 8 ? channel(3) : 255,
  };
}

export function formatHexColor(color: Color): string {
  const hex = (value: number): string => value.toString(16).padStart(2, '0');
  const alpha = color.a === 255 ? '' : hex(color.a);
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}${alpha}`;
}

function parseUnsigned(value: string, what: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw createInvalidConfigError(`Invalid ${what}: ${value}`);
  }
  return Number(trimmed);
}

/** `"16:9"` -> `[16, 9]` */
export function parseAspectRatio(value: string): [number, number] {
  const parts = value.split(':');
  if (parts.length !== 2) {
    throw createInvalidConfigError(`Aspect ratio must be in format 'width:height', got: ${value}`);
  }
  const [width = '', height = ''] = parts;
  return [parseUnsigned(width, 'width'), parseUnsigned(height, 'height')];
}

export function formatAspectRatio(ratio: [number, number]): string {
  return `${ratio[0]}:${ratio[1]}`;
}

/** `"x,y,#hexcolor,tolerance"` */
export function parsePixelCheck(value: string): PixelCheck {
  const parts = value.split(',');
  if (parts.length !== 4) {
    throw createInvalidConfigError(`PixelCheck format must be 'x,y,#hexcolor,tolerance', got: ${value}`);
  }
  const [x = '', y = '', color = '', tolerance = ''] = parts;
  const parsedTolerance = Number(tolerance.trim());
  if (tolerance.trim().length === 0 || !Number.isFinite(parsedTolerance) || parsedTolerance < 0) {
    throw createInvalidConfigError(`Invalid tolerance: ${tolerance}`);
  }

  return {
    x: parseUnsigned(x, 'x coordinate'),
    y: parseUnsigned(y, 'y coordinate'),
    color: parseHexColor(color),
    tolerance: parsedTolerance,
  };
}

export function formatPixelCheck(check: PixelCheck): string {
  return `${check.x},${check.y},${formatHexColor(check.color)},${check.tolerance}`;
}

/** On-disk shape of the settings file. */
export interface RawLayoutOption {
  aspect_ratio: string;
  pixel_checks: string[];
  offset: [number, number];
  size: [number, number];
  reference_resolution: [number, number];
  theme_text_color: string;
  item_name_distance: number;
}

export type RawSettings = {
  overlay_key: string;
  close_layout_after: number;
  save_to_disk: boolean;
  capture_directory: string;
  gap_threshold: number;
  max_displayed_items: number;
  tick_interval_ms: number;
  engine: { id: string; language: string; lang_path?: string };
  layouts: RawLayoutOption[];
};

export function serializeSettings(settings: OverlaySettings): RawSettings {
  return {
    overlay_key: settings.overlayKey,
    close_layout_after: settings.closeLayoutAfter,
    save_to_disk: settings.saveToDisk,
    capture_directory: settings.captureDirectory,
    gap_threshold: settings.gapThreshold,
    max_displayed_items: settings.maxDisplayedItems,
    tick_interval_ms: settings.tickIntervalMs,
    engine: {
      id: settings.engine.id,
      language: settings.engine.language,
      ...(settings.engine.langPath ? { lang_path: settings.engine.langPath } : {}),
    },
    layouts: settings.layouts.map((option) => ({
      aspect_ratio: formatAspectRatio(option.aspectRatio),
      pixel_checks: option.pixelChecks.map(formatPixelCheck),
      offset: [option.layout.offset.x, option.layout.offset.y],
      size: [option.layout.size.width, option.layout.size.height],
      reference_resolution: [
        option.layout.referenceResolution.width,
        option.layout.referenceResolution.height,
      ],
      theme_text_color: formatHexColor(option.layout.themeTextColor),
      item_name_distance: option.layout.itemNameDistance,
    })),
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw createInvalidConfigError(`${key} must be a non-negative number`);
  }
  return value;
}

function readString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw createInvalidConfigError(`${key} must be a string`);
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw createInvalidConfigError(`${key} must be true or false`);
  }
  return value;
}

function readPair(source: Record<string, unknown>, key: string): [number, number] {
  const value = source[key];
  const isCoordinate = (entry: unknown): entry is number =>
    typeof entry === 'number' && Number.isInteger(entry) && entry >= 0;
  if (!Array.isArray(value) || value.length !== 2) {
    throw createInvalidConfigError(`${key} must be a pair of non-negative integers`);
  }
  const [first, second]: unknown[] = value;
  if (!isCoordinate(first) || !isCoordinate(second)) {
    throw createInvalidConfigError(`${key} must be a pair of non-negative integers`);
  }
  return [first, second];
}

function parseLayoutOption(raw: unknown, index: number): LayoutOption {
  if (!isRecord(raw)) {
    throw createInvalidConfigError(`layouts[${index}] must be a table`);
  }

  const aspectRatio = parseAspectRatio(readString(raw, 'aspect_ratio', ''));
  const checks: unknown = raw.pixel_checks ?? [];
  if (!Array.isArray(checks)) {
    throw createInvalidConfigError(`layouts[${index}].pixel_checks must be a list of strings`);
  }
  const pixelChecks = checks.map((check: unknown) => {
    if (typeof check !== 'string') {
      throw createInvalidConfigError(`layouts[${index}].pixel_checks must be a list of strings`);
    }
    return parsePixelCheck(check);
  });

  const [offsetX, offsetY] = readPair(raw, 'offset');
  const [width, height] = readPair(raw, 'size');
  const [referenceWidth, referenceHeight] = readPair(raw, 'reference_resolution');
  if (referenceWidth === 0 || referenceHeight === 0) {
    throw createInvalidConfigError(`layouts[${index}].reference_resolution must be non-zero`);
  }

  const offset: Point = { x: offsetX, y: offsetY };
  const size: Size = { width, height };
  const layout: Layout = {
    offset,
    size,
    referenceResolution: { width: referenceWidth, height: referenceHeight },
    themeTextColor: parseHexColor(readString(raw, 'theme_text_color', '#ffffff')),
    itemNameDistance: readNumber(raw, 'item_name_distance', DEFAULT_LAYOUT_OPTION.layout.itemNameDistance),
  };

  return { aspectRatio, pixelChecks, layout };
}

/**
 * Validates a parsed settings document. Missing keys take their defaults;
 * present keys of the wrong type are rejected.
 */
export function parseSettings(raw: unknown): OverlaySettings {
  if (raw === null || raw === undefined) {
    return DEFAULT_SETTINGS;
  }
  if (!isRecord(raw)) {
    throw createInvalidConfigError('Settings must be a table of keys');
  }

  const engineRaw = raw.engine ?? {};
  if (!isRecord(engineRaw)) {
    throw createInvalidConfigError('engine must be a table');
  }

  const layoutsRaw = raw.layouts;
  let layouts = DEFAULT_SETTINGS.layouts;
  if (layoutsRaw !== undefined) {
    if (!Array.isArray(layoutsRaw)) {
      throw createInvalidConfigError('layouts must be a list');
    }
    layouts = layoutsRaw.map((entry: unknown, index) => parseLayoutOption(entry, index));
  }
  const langPath = readString(engineRaw, 'lang_path', '');

  return {
    overlayKey: readString(raw, 'overlay_key', DEFAULT_SETTINGS.overlayKey),
    closeLayoutAfter: readNumber(raw, 'close_layout_after', DEFAULT_SETTINGS.closeLayoutAfter),
    saveToDisk: readBoolean(raw, 'save_to_disk', DEFAULT_SETTINGS.saveToDisk),
    captureDirectory: readString(raw, 'capture_directory', DEFAULT_SETTINGS.captureDirectory),
    gapThreshold: readNumber(raw, 'gap_threshold', DEFAULT_SETTINGS.gapThreshold),
    maxDisplayedItems: readNumber(raw, 'max_displayed_items', DEFAULT_SETTINGS.maxDisplayedItems),
    tickIntervalMs: readNumber(raw, 'tick_interval_ms', DEFAULT_SETTINGS.tickIntervalMs),
    engine: {
      id: readString(engineRaw, 'id', DEFAULT_SETTINGS.engine.id),
      language: readString(engineRaw, 'language', DEFAULT_SETTINGS.engine.language),
      ...(langPath ? { langPath } : {}),
    },
    layouts,
  };
}
