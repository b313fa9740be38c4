/**
 * Color Utility Functions
 *
 * RGBA value helpers and hex conversion. Channels are integers 0-255,
 * including alpha.
 */
import type { Color } from "./types";

export const TRANSPARENT: Readonly<Color> = Object.freeze({ r: 0, g: 0, b: 0, a: 0 });
export const BLACK: Readonly<Color> = Object.freeze({ r: 0, g: 0, b: 0, a: 255 });
export const WHITE: Readonly<Color> = Object.freeze({ r: 255, g: 255, b: 255, a: 255 });

function channel(x: number): number {
  if (Number.isNaN(x)) return 0;
  return Math.min(255, Math.max(0, Math.round(x)));
}

export function rgba(r: number, g: number, b: number, a = 255): Color {
  return { r: channel(r), g: channel(g), b: channel(b), a: channel(a) };
}

export function toHex(color: Color): string {
  const parts = [color.r, color.g, color.b];
  if (color.a !== 255) parts.push(color.a);
  return (
    "#" +
    parts
      .map((x) => {
        const hex = channel(x).toString(16);
        return hex.length === 1 ? "0" + hex : hex;
      })
      .join("")
  );
}

/**
 * Parse `#rgb`, `#rrggbb` or `#rrggbbaa`. Returns null for anything else.
 */
export function parseHex(hex: string): Color | null {
  const short = /^#?([a-f\d])([a-f\d])([a-f\d])$/i.exec(hex);
  if (short) {
    return rgba(
      parseInt(short[1] + short[1], 16),
      parseInt(short[2] + short[2], 16),
      parseInt(short[3] + short[3], 16),
    );
  }

  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})?$/i.exec(hex);
  if (!result) return null;
  return rgba(
    parseInt(result[1], 16),
    parseInt(result[2], 16),
    parseInt(result[3], 16),
    result[4] === undefined ? 255 : parseInt(result[4], 16),
  );
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * Scale alpha by a 0-1 factor.
 */
export function withOpacity(color: Color, opacity: number): Color {
  return { ...color, a: channel(color.a * Math.min(1, Math.max(0, opacity))) };
}

/**
 * Linear interpolation per channel, t in 0-1.
 */
export function mixColors(from: Color, to: Color, t: number): Color {
  const k = Math.min(1, Math.max(0, t));
  return rgba(
    from.r + (to.r - from.r) * k,
    from.g + (to.g - from.g) * k,
    from.b + (to.b - from.b) * k,
    from.a + (to.a - from.a) * k,
  );
}
