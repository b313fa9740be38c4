/**
 * Layer Model
 *
 * A layer is an immutable record: every edit produces a new object and the
 * stack swaps it in. Undo records can therefore keep references to old
 * layers without copying them.
 *
 * `parentLayerId` is a lookup key into the owning stack, never an owning
 * reference. Resolving it may fail once the parent is gone.
 */
import { randomUUID } from "node:crypto";
import type { BlendMode, ContentType } from "./types";
import type { PixelBuffer } from "./pixel-buffer";

export interface Layer {
  readonly id: string;
  readonly name: string;
  readonly visible: boolean;
  /** 0 (invisible) - 1 (fully opaque) */
  readonly opacity: number;
  readonly blendMode: BlendMode;
  readonly locked: boolean;
  /** Masks render only through their parent layer */
  readonly isMask: boolean;
  readonly parentLayerId: string | null;
  readonly pixels: PixelBuffer | null;
  readonly contentType: ContentType;
}

export interface LayerInit {
  id?: string;
  name: string;
  visible?: boolean;
  opacity?: number;
  blendMode?: BlendMode;
  locked?: boolean;
  isMask?: boolean;
  parentLayerId?: string | null;
  pixels?: PixelBuffer | null;
  contentType?: ContentType;
}

export function clampOpacity(opacity: number): number {
  if (Number.isNaN(opacity)) return 1;
  return Math.min(1, Math.max(0, opacity));
}

export function generateLayerId(): string {
  return randomUUID();
}

export function createLayer(init: LayerInit): Layer {
  return Object.freeze({
    id: init.id ?? generateLayerId(),
    name: init.name,
    visible: init.visible ?? true,
    opacity: clampOpacity(init.opacity ?? 1),
    blendMode: init.blendMode ?? "normal",
    locked: init.locked ?? false,
    isMask: init.isMask ?? false,
    parentLayerId: init.parentLayerId ?? null,
    pixels: init.pixels ?? null,
    contentType: init.contentType ?? "drawing",
  });
}

/**
 * Helper clone with updated fields. Opacity stays clamped.
 */
export function updateLayer(layer: Layer, changes: Partial<Omit<Layer, "id">>): Layer {
  const next = { ...layer, ...changes };
  return Object.freeze({ ...next, opacity: clampOpacity(next.opacity) });
}

/**
 * Copy of a layer under a fresh id. Pixels are shared: published buffers
 * never change, so sharing gives a pixel-identical, independent copy.
 */
export function duplicateLayer(layer: Layer, id: string = generateLayerId()): Layer {
  return Object.freeze({ ...layer, id });
}

/**
 * Structural equality (pixel contents compared, not buffer identity)
 */
export function layersEqual(a: Layer, b: Layer): boolean {
  if (
    a.id !== b.id ||
    a.name !== b.name ||
    a.visible !== b.visible ||
    a.opacity !== b.opacity ||
    a.blendMode !== b.blendMode ||
    a.locked !== b.locked ||
    a.isMask !== b.isMask ||
    a.parentLayerId !== b.parentLayerId ||
    a.contentType !== b.contentType
  ) {
    return false;
  }
  if (a.pixels === b.pixels) return true;
  if (!a.pixels || !b.pixels) return false;
  return a.pixels.equals(b.pixels);
}
