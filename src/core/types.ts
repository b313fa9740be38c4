/**
 * Type Definitions
 *
 * Shared TypeScript interfaces used across all modules:
 * - PressurePoint: x, y coordinates with pen pressure (0-1)
 * - Color: 8-bit RGBA channels
 * - Size: canvas dimensions in device pixels
 * - BlendMode / BrushType: the closed sets of compositing rules and brush variants
 */
export interface PressurePoint {
  x: number;
  y: number;
  pressure: number;
}

/**
 * Raw pointer sample as delivered by input capture. Pressure is optional
 * (mice report none) and defaults to 1.
 */
export interface PointerSample {
  x: number;
  y: number;
  pressure?: number;
}

export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface Size {
  width: number;
  height: number;
}

export const BLEND_MODES = [
  "normal",
  "multiply",
  "screen",
  "overlay",
  "darken",
  "lighten",
  "color-dodge",
  "color-burn",
  "hard-light",
  "soft-light",
  "difference",
  "exclusion",
  "hue",
  "saturation",
  "color",
  "luminosity",
] as const;

export type BlendMode = (typeof BLEND_MODES)[number];

export const BRUSH_TYPES = [
  "pencil",
  "brush",
  "airbrush",
  "marker",
  "pen",
  "eraser",
  "smudge",
  "watercolor",
  "texture",
] as const;

export type BrushType = (typeof BRUSH_TYPES)[number];

export type StrokeCap = "round" | "butt" | "square";
export type StrokeJoin = "round" | "bevel";

export type ContentType = "drawing" | "image" | "text";

/**
 * `rgb` documents flatten onto opaque white, `rgba` onto transparency.
 */
export type ColorMode = "rgb" | "rgba";

export function isBlendMode(value: unknown): value is BlendMode {
  return BLEND_MODES.some((mode) => mode === value);
}

export function isBrushType(value: unknown): value is BrushType {
  return BRUSH_TYPES.some((type) => type === value);
}
