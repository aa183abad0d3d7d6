import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  DEFAULT_SETTINGS,
  formatHexColor,
  parseAspectRatio,
  parseHexColor,
  parsePixelCheck,
  parseSettings,
  serializeSettings,
} from '../src/config/settings';
import { OCRErrorCode } from '../src/types/ocr-errors';

describe('Settings property tests', () => {
  it('formats colors in a form the parser reads back', () => {
    const channel = fc.integer({ min: 0, max: 255 });
    fc.assert(
      fc.property(fc.record({ r: channel, g: channel, b: channel, a: channel }), (color) => {
        expect(parseHexColor(formatHexColor(color))).toEqual(color);
      }),
      { numRuns: 100 }
    );
  });
});

describe('Settings unit tests', () => {
  it('parses hex colors in all supported lengths', () => {
    expect(parseHexColor('#bea966')).toEqual({ r: 190, g: 169, b: 102, a: 255 });
    expect(parseHexColor('fff')).toEqual({ r: 255, g: 255, b: 255, a: 255 });
    expect(parseHexColor('#1234')).toEqual({ r: 0x11, g: 0x22, b: 0x33, a: 0x44 });
    expect(parseHexColor('#11223344')).toEqual({ r: 0x11, g: 0x22, b: 0x33, a: 0x44 });
  });

  it('rejects malformed colors as invalid config', () => {
    expect(() => parseHexColor('#12345')).toThrow('Invalid hex color: #12345');
    try {
      parseHexColor('blue');
    } catch (error) {
      expect(error).toMatchObject({ code: OCRErrorCode.INVALID_CONFIG, recoverable: false });
    }
  });

  it('parses aspect ratios', () => {
    expect(parseAspectRatio('16:9')).toEqual([16, 9]);
    expect(() => parseAspectRatio('16x9')).toThrow("Aspect ratio must be in format 'width:height', got: 16x9");
    expect(() => parseAspectRatio('16:-9')).toThrow('Invalid height: -9');
  });

  it('parses pixel checks', () => {
    expect(parsePixelCheck('10,20,#FEFEFE,3')).toEqual({
      x: 10,
      y: 20,
      color: { r: 254, g: 254, b: 254, a: 255 },
      tolerance: 3,
    });
    expect(parsePixelCheck(' 1, 2 ,#000,0.5')).toEqual({
      x: 1,
      y: 2,
      color: { r: 0, g: 0, b: 0, a: 255 },
      tolerance: 0.5,
    });
    expect(() => parsePixelCheck('10,20,#FEFEFE')).toThrow(
      "PixelCheck format must be 'x,y,#hexcolor,tolerance', got: 10,20,#FEFEFE"
    );
    expect(() => parsePixelCheck('10,20,#FEFEFE,')).toThrow('Invalid tolerance: ');
  });

  it('returns defaults for an empty document', () => {
    expect(parseSettings(undefined)).toEqual(DEFAULT_SETTINGS);
    expect(parseSettings(null)).toEqual(DEFAULT_SETTINGS);
  });

  it('reads back what it serializes', () => {
    expect(parseSettings(serializeSettings(DEFAULT_SETTINGS))).toEqual(DEFAULT_SETTINGS);
  });

  it('fills missing keys with defaults', () => {
    const settings = parseSettings({ gap_threshold: 20, engine: { language: 'deu' } });

    expect(settings.gapThreshold).toBe(20);
    expect(settings.engine).toEqual({ id: 'tesseract', language: 'deu' });
    expect(settings.closeLayoutAfter).toBe(14.5);
    expect(settings.layouts).toEqual(DEFAULT_SETTINGS.layouts);
  });

  it('parses layout options', () => {
    const settings = parseSettings({
      layouts: [
        {
          aspect_ratio: '16:10',
          pixel_checks: ['5,5,#ffffff,2'],
          offset: [10, 20],
          size: [300, 40],
          reference_resolution: [1920, 1200],
          theme_text_color: '#bea966',
        },
      ],
    });

    expect(settings.layouts).toEqual([
      {
        aspectRatio: [16, 10],
        pixelChecks: [{ x: 5, y: 5, color: { r: 255, g: 255, b: 255, a: 255 }, tolerance: 2 }],
        layout: {
          offset: { x: 10, y: 20 },
          size: { width: 300, height: 40 },
          referenceResolution: { width: 1920, height: 1200 },
          themeTextColor: { r: 190, g: 169, b: 102, a: 255 },
          itemNameDistance: 90,
        },
      },
    ]);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseSettings({ save_to_disk: 'yes' })).toThrow('save_to_disk must be true or false');
    expect(() => parseSettings({ gap_threshold: -1 })).toThrow('gap_threshold must be a non-negative number');
    expect(() => parseSettings({ layouts: {} })).toThrow('layouts must be a list');
    expect(() => parseSettings('text')).toThrow('Settings must be a table of keys');
  });

  it('rejects a zero reference resolution', () => {
    expect(() =>
      parseSettings({
        layouts: [{ aspect_ratio: '16:9', offset: [0, 0], size: [1, 1], reference_resolution: [0, 1080] }],
      })
    ).toThrow('layouts[0].reference_resolution must be non-zero');
  });
});
