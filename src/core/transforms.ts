/**
 * Image Transforms
 *
 * Geometric edits of a whole layer image: flips, rotation about the centre,
 * crop and resize. Sampling is nearest-neighbour, so pixel art stays crisp
 * and quarter turns are exact.
 *
 * Flips and rotation keep the buffer size (rotated corners are clipped);
 * crop and resize produce a buffer of the new size, still drawn at the
 * canvas origin.
 */
import paper from "paper";
import { PixelBuffer } from "./pixel-buffer";

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type LayerTransform =
  | { kind: "flipHorizontal" }
  | { kind: "flipVertical" }
  | {
      kind: "rotate";
      /** Clockwise, in degrees */
      degrees: number;
    }
  | { kind: "crop"; rect: Rect }
  | { kind: "resize"; width: number; height: number; maintainAspectRatio?: boolean };

export function transformLabel(transform: LayerTransform): string {
  switch (transform.kind) {
    case "flipHorizontal":
      return "Flip Horizontal";
    case "flipVertical":
      return "Flip Vertical";
    case "rotate":
      return "Rotate";
    case "crop":
      return "Crop";
    case "resize":
      return "Resize";
  }
}

function copyPixel(src: PixelBuffer, sx: number, sy: number, dst: Uint8ClampedArray, di: number): void {
  const si = (sy * src.width + sx) * 4;
  dst[di] = src.data[si];
  dst[di + 1] = src.data[si + 1];
  dst[di + 2] = src.data[si + 2];
  dst[di + 3] = src.data[si + 3];
}

export function flipHorizontal(buffer: PixelBuffer): PixelBuffer {
  const draft = PixelBuffer.draft(buffer.width, buffer.height);
  for (let y = 0; y < buffer.height; y++) {
    for (let x = 0; x < buffer.width; x++) {
      copyPixel(buffer, buffer.width - 1 - x, y, draft.data, (y * buffer.width + x) * 4);
    }
  }
  return draft.publish();
}

export function flipVertical(buffer: PixelBuffer): PixelBuffer {
  const draft = PixelBuffer.draft(buffer.width, buffer.height);
  for (let y = 0; y < buffer.height; y++) {
    for (let x = 0; x < buffer.width; x++) {
      copyPixel(buffer, x, buffer.height - 1 - y, draft.data, (y * buffer.width + x) * 4);
    }
  }
  return draft.publish();
}

// keeps quarter turns exact (cos 90° is 6e-17 otherwise)
function snap(value: number): number {
  return Math.round(value * 1e10) / 1e10;
}

/**
 * Rotate clockwise about the buffer centre. Pixels rotated in from outside
 * the source are transparent.
 */
export function rotate(buffer: PixelBuffer, degrees: number): PixelBuffer {
  const rad = (degrees * Math.PI) / 180;
  const cos = snap(Math.cos(rad));
  const sin = snap(Math.sin(rad));
  const cx = buffer.width / 2;
  const cy = buffer.height / 2;
  const draft = PixelBuffer.draft(buffer.width, buffer.height);

  for (let y = 0; y < buffer.height; y++) {
    for (let x = 0; x < buffer.width; x++) {
      const dx = x + 0.5 - cx;
      const dy = y + 0.5 - cy;
      const sx = Math.floor(cos * dx + sin * dy + cx);
      const sy = Math.floor(-sin * dx + cos * dy + cy);
      if (sx < 0 || sy < 0 || sx >= buffer.width || sy >= buffer.height) continue;
      copyPixel(buffer, sx, sy, draft.data, (y * buffer.width + x) * 4);
    }
  }
  return draft.publish();
}

/**
 * Cut out `rect` (clamped to the buffer). Null when nothing is left.
 */
export function crop(buffer: PixelBuffer, rect: Rect): PixelBuffer | null {
  const area = new paper.Rectangle(rect.x, rect.y, rect.width, rect.height).intersect(
    new paper.Rectangle(0, 0, buffer.width, buffer.height),
  );
  const x0 = Math.max(0, Math.floor(area.left));
  const y0 = Math.max(0, Math.floor(area.top));
  const x1 = Math.min(buffer.width, Math.ceil(area.right));
  const y1 = Math.min(buffer.height, Math.ceil(area.bottom));
  if (x1 <= x0 || y1 <= y0) return null;

  const width = x1 - x0;
  const draft = PixelBuffer.draft(width, y1 - y0);
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      copyPixel(buffer, x, y, draft.data, ((y - y0) * width + (x - x0)) * 4);
    }
  }
  return draft.publish();
}

/**
 * Scale to `width × height`. With `maintainAspectRatio` the image is fitted
 * inside that box instead, keeping its proportions.
 */
export function resize(buffer: PixelBuffer, width: number, height: number, maintainAspectRatio = true): PixelBuffer {
  let destWidth = width;
  let destHeight = height;
  if (maintainAspectRatio) {
    const sourceAspect = buffer.width / buffer.height;
    if (sourceAspect > width / height) {
      destHeight = width / sourceAspect;
    } else {
      destWidth = height * sourceAspect;
    }
  }

  const draft = PixelBuffer.draft(Math.ceil(destWidth), Math.ceil(destHeight));
  for (let y = 0; y < draft.height; y++) {
    const sy = Math.min(buffer.height - 1, Math.floor(((y + 0.5) * buffer.height) / draft.height));
    for (let x = 0; x < draft.width; x++) {
      const sx = Math.min(buffer.width - 1, Math.floor(((x + 0.5) * buffer.width) / draft.width));
      copyPixel(buffer, sx, sy, draft.data, (y * draft.width + x) * 4);
    }
  }
  return draft.publish();
}

/**
 * False for parameters no transform can honour (non-finite numbers, an
 * empty resize box)
 */
export function isValidTransform(transform: LayerTransform): boolean {
  switch (transform.kind) {
    case "flipHorizontal":
    case "flipVertical":
      return true;
    case "rotate":
      return Number.isFinite(transform.degrees);
    case "crop": {
      const { x, y, width, height } = transform.rect;
      return [x, y, width, height].every(Number.isFinite) && width > 0 && height > 0;
    }
    case "resize":
      return [transform.width, transform.height].every((n) => Number.isFinite(n) && n > 0);
  }
}

export function applyTransform(buffer: PixelBuffer, transform: LayerTransform): PixelBuffer | null {
  switch (transform.kind) {
    case "flipHorizontal":
      return flipHorizontal(buffer);
    case "flipVertical":
      return flipVertical(buffer);
    case "rotate":
      return rotate(buffer, transform.degrees);
    case "crop":
      return crop(buffer, transform.rect);
    case "resize":
      return resize(buffer, transform.width, transform.height, transform.maintainAspectRatio ?? true);
  }
}
