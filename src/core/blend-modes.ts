/**
 * Blend Modes - Per-Pixel Combination Rules
 *
 * Channel math follows the W3C Compositing and Blending Level 1 definitions.
 * All math runs on normalized (0-1) channels; callers convert from bytes.
 *
 * Source-over with a blend function B:
 *   co = cs·as·(1 − ab) + cb·ab·(1 − as) + as·ab·B(cb, cs)
 *   ao = as + ab·(1 − as)
 * and the stored color is co / ao.
 */
import type { BlendMode } from "./types";

type Rgb = [number, number, number];

const SEPARABLE: Partial<Record<BlendMode, (cb: number, cs: number) => number>> = {
  normal: (_cb, cs) => cs,
  multiply: (cb, cs) => cb * cs,
  screen: (cb, cs) => cb + cs - cb * cs,
  overlay: (cb, cs) => hardLight(cs, cb),
  darken: (cb, cs) => Math.min(cb, cs),
  lighten: (cb, cs) => Math.max(cb, cs),
  "color-dodge": (cb, cs) => {
    if (cb === 0) return 0;
    if (cs >= 1) return 1;
    return Math.min(1, cb / (1 - cs));
  },
  "color-burn": (cb, cs) => {
    if (cb >= 1) return 1;
    if (cs <= 0) return 0;
    return 1 - Math.min(1, (1 - cb) / cs);
  },
  "hard-light": (cb, cs) => hardLight(cb, cs),
  "soft-light": (cb, cs) => {
    if (cs <= 0.5) return cb - (1 - 2 * cs) * cb * (1 - cb);
    const d = cb <= 0.25 ? ((16 * cb - 12) * cb + 4) * cb : Math.sqrt(cb);
    return cb + (2 * cs - 1) * (d - cb);
  },
  difference: (cb, cs) => Math.abs(cb - cs),
  exclusion: (cb, cs) => cb + cs - 2 * cb * cs,
};

function hardLight(cb: number, cs: number): number {
  if (cs <= 0.5) return cb * 2 * cs;
  const s = 2 * cs - 1;
  return cb + s - cb * s;
}

// ============================================================
// Non-separable helpers (hue, saturation, color, luminosity)
// ============================================================

function lum([r, g, b]: Rgb): number {
  return 0.3 * r + 0.59 * g + 0.11 * b;
}

function clipColor(c: Rgb): Rgb {
  const l = lum(c);
  const n = Math.min(c[0], c[1], c[2]);
  const x = Math.max(c[0], c[1], c[2]);
  const each = (c: Rgb, f: (v: number) => number): Rgb => [f(c[0]), f(c[1]), f(c[2])];
  let out: Rgb = [c[0], c[1], c[2]];
  if (n < 0) {
    out = each(out, (v) => l + ((v - l) * l) / (l - n));
  }
  if (x > 1) {
    out = each(out, (v) => l + ((v - l) * (1 - l)) / (x - l));
  }
  return out;
}

function setLum(c: Rgb, l: number): Rgb {
  const d = l - lum(c);
  return clipColor([c[0] + d, c[1] + d, c[2] + d]);
}

function sat(c: Rgb): number {
  return Math.max(c[0], c[1], c[2]) - Math.min(c[0], c[1], c[2]);
}

function setSat(c: Rgb, s: number): Rgb {
  const order = [0, 1, 2].sort((i, j) => c[i] - c[j]);
  const [iMin, iMid, iMax] = order;
  const out: Rgb = [0, 0, 0];
  if (c[iMax] > c[iMin]) {
    out[iMid] = ((c[iMid] - c[iMin]) * s) / (c[iMax] - c[iMin]);
    out[iMax] = s;
  }
  out[iMin] = 0;
  return out;
}

/**
 * Blend a backdrop color with a source color (both normalized, unpremultiplied).
 */
export function blendRgb(mode: BlendMode, cb: Rgb, cs: Rgb): Rgb {
  const fn = SEPARABLE[mode];
  if (fn) return [fn(cb[0], cs[0]), fn(cb[1], cs[1]), fn(cb[2], cs[2])];

  switch (mode) {
    case "hue":
      return setLum(setSat(cs, sat(cb)), lum(cb));
    case "saturation":
      return setLum(setSat(cb, sat(cs)), lum(cb));
    case "color":
      return setLum(cs, lum(cb));
    case "luminosity":
      return setLum(cb, lum(cs));
    default:
      return cs;
  }
}

/**
 * Composite one source pixel onto `dst` at byte `offset`.
 *
 * @param alpha - effective source alpha, 0-1 (color alpha × opacity × coverage)
 */
export function compositePixel(
  dst: Uint8ClampedArray,
  offset: number,
  sr: number,
  sg: number,
  sb: number,
  alpha: number,
  mode: BlendMode,
): void {
  if (alpha <= 0) return;
  const as = alpha > 1 ? 1 : alpha;
  const ab = dst[offset + 3] / 255;
  const ao = as + ab * (1 - as);
  if (ao <= 0) return;

  const cb: Rgb = [dst[offset] / 255, dst[offset + 1] / 255, dst[offset + 2] / 255];
  const cs: Rgb = [sr / 255, sg / 255, sb / 255];
  const mixed = ab > 0 && mode !== "normal" ? blendRgb(mode, cb, cs) : cs;

  for (let c = 0; c < 3; c++) {
    const co = cs[c] * as * (1 - ab) + cb[c] * ab * (1 - as) + mixed[c] * as * ab;
    dst[offset + c] = Math.round((co / ao) * 255);
  }
  dst[offset + 3] = Math.round(ao * 255);
}

/**
 * Destination-out: remove coverage from `dst`, leaving its color alone.
 */
export function erasePixel(dst: Uint8ClampedArray, offset: number, alpha: number): void {
  if (alpha <= 0) return;
  const as = alpha > 1 ? 1 : alpha;
  const ab = dst[offset + 3] / 255;
  const ao = ab * (1 - as);
  dst[offset + 3] = Math.round(ao * 255);
  if (dst[offset + 3] === 0) {
    dst[offset] = 0;
    dst[offset + 1] = 0;
    dst[offset + 2] = 0;
  }
}
