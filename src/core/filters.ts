/**
 * Color Filters
 *
 * 4×5 color matrices applied per pixel on 0-255 channels:
 *
 *   r' = m0·r + m1·g + m2·b + m3·a + m4
 *   ...
 *
 * The alpha row is always identity. Intensity is 0-1: for grayscale, sepia
 * and invert it blends from the original (0) to the full effect (1); for
 * brightness, contrast and saturation 0.5 is neutral.
 */
import { PixelBuffer } from "./pixel-buffer";

export const FILTER_TYPES = ["grayscale", "sepia", "invert", "brightness", "contrast", "saturation"] as const;

export type FilterType = (typeof FILTER_TYPES)[number];

export function isFilterType(value: string): value is FilterType {
  return FILTER_TYPES.some((f) => f === value);
}

/** 20 entries, row-major: r, g, b, a rows of (r, g, b, a, offset) */
export type ColorMatrix = readonly number[];

const IDENTITY: ColorMatrix = [
  1, 0, 0, 0, 0,
  0, 1, 0, 0, 0,
  0, 0, 1, 0, 0,
  0, 0, 0, 1, 0,
];

const GRAYSCALE: ColorMatrix = [
  0.2126, 0.7152, 0.0722, 0, 0,
  0.2126, 0.7152, 0.0722, 0, 0,
  0.2126, 0.7152, 0.0722, 0, 0,
  0, 0, 0, 1, 0,
];

const SEPIA: ColorMatrix = [
  0.393, 0.769, 0.189, 0, 0,
  0.349, 0.686, 0.168, 0, 0,
  0.272, 0.534, 0.131, 0, 0,
  0, 0, 0, 1, 0,
];

const INVERT: ColorMatrix = [
  -1, 0, 0, 0, 255,
  0, -1, 0, 0, 255,
  0, 0, -1, 0, 255,
  0, 0, 0, 1, 0,
];

function lerpMatrix(from: ColorMatrix, to: ColorMatrix, t: number): ColorMatrix {
  return from.map((v, i) => v + (to[i] - v) * t);
}

/**
 * Matrix for a filter at the given intensity
 */
export function filterMatrix(filter: FilterType, intensity = 1): ColorMatrix {
  const t = Math.min(1, Math.max(0, intensity));
  switch (filter) {
    case "grayscale":
      return lerpMatrix(IDENTITY, GRAYSCALE, t);
    case "sepia":
      return lerpMatrix(IDENTITY, SEPIA, t);
    case "invert":
      return lerpMatrix(IDENTITY, INVERT, t);
    case "brightness": {
      const value = (t * 2 - 1) * 255;
      return [
        1, 0, 0, 0, value,
        0, 1, 0, 0, value,
        0, 0, 1, 0, value,
        0, 0, 0, 1, 0,
      ];
    }
    case "contrast": {
      const factor = t * 2;
      const offset = 128 * (1 - factor);
      return [
        factor, 0, 0, 0, offset,
        0, factor, 0, 0, offset,
        0, 0, factor, 0, offset,
        0, 0, 0, 1, 0,
      ];
    }
    case "saturation": {
      const s = t * 2;
      const sr = 0.2126 * (1 - s);
      const sg = 0.7152 * (1 - s);
      const sb = 0.0722 * (1 - s);
      return [
        sr + s, sg, sb, 0, 0,
        sr, sg + s, sb, 0, 0,
        sr, sg, sb + s, 0, 0,
        0, 0, 0, 1, 0,
      ];
    }
  }
}

/**
 * Run a color matrix over every non-transparent pixel. Alpha is kept.
 */
export function applyColorMatrix(buffer: PixelBuffer, m: ColorMatrix): PixelBuffer {
  const draft = buffer.toDraft();
  const d = draft.data;
  for (let i = 0; i < d.length; i += 4) {
    const a = d[i + 3];
    if (a === 0) continue;
    const r = d[i];
    const g = d[i + 1];
    const b = d[i + 2];
    // Uint8ClampedArray clamps to 0-255 and rounds
    d[i] = m[0] * r + m[1] * g + m[2] * b + m[3] * a + m[4];
    d[i + 1] = m[5] * r + m[6] * g + m[7] * b + m[8] * a + m[9];
    d[i + 2] = m[10] * r + m[11] * g + m[12] * b + m[13] * a + m[14];
  }
  return draft.publish();
}

export function applyFilter(buffer: PixelBuffer, filter: FilterType, intensity = 1): PixelBuffer {
  return applyColorMatrix(buffer, filterMatrix(filter, intensity));
}
