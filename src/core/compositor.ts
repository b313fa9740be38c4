/**
 * Compositor
 *
 * Flattens layers bottom-to-top into one buffer. Each layer's opacity is a
 * uniform alpha multiplier and its blend mode picks the per-pixel rule.
 * Mask layers never draw on their own: a visible mask multiplies its
 * parent's per-pixel alpha by its own alpha.
 *
 * Pure: layers and their buffers are only read.
 */
import { PixelBuffer, type PixelDraft } from "./pixel-buffer";
import { compositePixel } from "./blend-modes";
import { TRANSPARENT, WHITE } from "./color";
import type { Color, ColorMode } from "./types";
import type { Layer } from "./layer";
import type { LayerStack } from "./layer-stack";

export interface CompositeOptions {
  width: number;
  height: number;
  /** Starting fill; opaque white for "rgb" documents, transparent for "rgba" */
  background: Color;
}

export function backgroundFor(colorMode: ColorMode): Color {
  return colorMode === "rgb" ? WHITE : TRANSPARENT;
}

/**
 * Product of the masks' alpha at (x, y); 0 outside any mask
 */
function maskAlpha(masks: readonly PixelBuffer[], x: number, y: number): number {
  let alpha = 1;
  for (const mask of masks) {
    if (x >= mask.width || y >= mask.height) return 0;
    alpha *= mask.data[(y * mask.width + x) * 4 + 3] / 255;
  }
  return alpha;
}

/**
 * Multiply `pixels`' alpha by its masks, as compositing would. Used when the
 * masks are about to be dropped (merging).
 */
export function bakeMasks(pixels: PixelBuffer, masks: readonly PixelBuffer[]): PixelBuffer {
  if (masks.length === 0) return pixels;
  const draft = pixels.toDraft();
  const d = draft.data;
  for (let y = 0; y < draft.height; y++) {
    for (let x = 0; x < draft.width; x++) {
      const i = (y * draft.width + x) * 4 + 3;
      if (d[i] === 0) continue;
      d[i] = Math.round(d[i] * maskAlpha(masks, x, y));
    }
  }
  return draft.publish();
}

/**
 * Draw one layer onto `dst` at the origin, clipped to the smaller of the
 * two sizes. Masks are applied by alpha; pixels outside a mask are hidden.
 */
export function blitLayer(dst: PixelDraft, layer: Layer, masks: readonly PixelBuffer[] = []): void {
  const src = layer.pixels;
  if (!src || layer.opacity <= 0) return;

  const out = dst.data;
  const s = src.data;
  const width = Math.min(dst.width, src.width);
  const height = Math.min(dst.height, src.height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const si = (y * src.width + x) * 4;
      const a = s[si + 3];
      if (a === 0) continue;

      const alpha = (a / 255) * layer.opacity * maskAlpha(masks, x, y);
      if (alpha <= 0) continue;

      compositePixel(out, (y * dst.width + x) * 4, s[si], s[si + 1], s[si + 2], alpha, layer.blendMode);
    }
  }
}

/**
 * Buffers of the visible masks attached to `layer`
 */
export function masksFor(layer: Layer, layers: readonly Layer[]): PixelBuffer[] {
  const masks: PixelBuffer[] = [];
  for (const candidate of layers) {
    if (candidate.isMask && candidate.visible && candidate.parentLayerId === layer.id && candidate.pixels) {
      masks.push(candidate.pixels);
    }
  }
  return masks;
}

/**
 * Flatten a plain layer list (index 0 = bottom)
 */
export function compositeLayers(layers: readonly Layer[], options: CompositeOptions): PixelBuffer {
  const draft = PixelBuffer.draft(options.width, options.height, options.background);
  for (const layer of layers) {
    if (!layer.visible || layer.isMask || !layer.pixels) continue;
    blitLayer(draft, layer, masksFor(layer, layers));
  }
  return draft.publish();
}

/**
 * Flatten a layer stack
 */
export function composite(stack: LayerStack, options: CompositeOptions): PixelBuffer {
  return compositeLayers(stack.layers, options);
}
