/**
 * Layer Stack
 *
 * Ordered layers (index 0 = bottom) plus the current-layer cursor. The stack
 * is never empty and the cursor always points at a layer.
 *
 * Every successful edit:
 * 1. swaps in new immutable Layer objects (layers are never edited in place)
 * 2. hands a HistoryAction to the action recorder, if one is set
 * 3. emits "layers:change" on `events`
 *
 * Invalid requests (bad index, last layer, locked layer, missing pixels)
 * change nothing and return false.
 *
 * The raw primitives at the bottom (insertAt, removeAt, ...) skip all of
 * that; they exist for the history manager to replay records.
 */
import type { BlendMode, ContentType, Size } from "./types";
import type { PixelBuffer } from "./pixel-buffer";
import type { Stroke, StrokeRenderer } from "./brush-engine";
import type { HistoryAction, RemovedLayer, RestorableStack } from "./history-actions";
import { type Layer, clampOpacity, createLayer, duplicateLayer, layersEqual, updateLayer } from "./layer";
import { getBrush } from "./brushes";
import { bakeMasks, blitLayer, masksFor } from "./compositor";
import { type FilterType, applyFilter } from "./filters";
import { type LayerTransform, applyTransform, isValidTransform, transformLabel } from "./transforms";
import { EventBus, type PaintEvents } from "./event-bus";
import { invariant } from "./errors";
import { scopedLogger } from "./logger";

const log = scopedLogger("layers");

export const BASE_LAYER_NAME = "Background";

export interface AddLayerOptions {
  name?: string;
  blendMode?: BlendMode;
  opacity?: number;
  isMask?: boolean;
  parentLayerId?: string | null;
  contentType?: ContentType;
  pixels?: PixelBuffer | null;
}

export type ActionRecorder = (action: HistoryAction) => void;

function stamp(label: string): { label: string; timestamp: number } {
  return { label, timestamp: Date.now() };
}

function filterLabel(filter: FilterType): string {
  return filter.charAt(0).toUpperCase() + filter.slice(1);
}

export class LayerStack implements RestorableStack {
  private items: Layer[];
  private cursor: number;
  private recorder: ActionRecorder | null = null;
  private rasterizing = false;

  readonly canvas: Readonly<Size>;
  readonly events = new EventBus<PaintEvents>();

  /**
   * @param initial - layers bottom-to-top; a single "Background" layer when empty
   */
  constructor(canvas: Size, initial: readonly Layer[] = [], currentIndex = initial.length - 1) {
    this.canvas = Object.freeze({ width: canvas.width, height: canvas.height });
    this.items = initial.length > 0 ? [...initial] : [createLayer({ name: BASE_LAYER_NAME })];
    this.cursor = 0;
    this.setCursor(currentIndex);
  }

  /**
   * Install (or with `null`, remove) the callback that receives every
   * recorded action
   */
  setActionRecorder(recorder: ActionRecorder | null): void {
    this.recorder = recorder;
  }

  // ============================================================
  // Queries
  // ============================================================

  get layers(): readonly Layer[] {
    return this.items.slice();
  }

  get length(): number {
    return this.items.length;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  get currentLayer(): Layer {
    return this.items[this.cursor];
  }

  /**
   * True while a stroke is being rendered; edits are rejected meanwhile
   */
  get isRasterizing(): boolean {
    return this.rasterizing;
  }

  layerAt(index: number): Layer | undefined {
    return this.isValidIndex(index) ? this.items[index] : undefined;
  }

  indexOf(layerId: string): number {
    return this.items.findIndex((l) => l.id === layerId);
  }

  findLayer(layerId: string): Layer | undefined {
    return this.items.find((l) => l.id === layerId);
  }

  /**
   * Parent of a mask layer. Null when the layer has no parent or the parent
   * is no longer in the stack.
   */
  resolveParent(layer: Layer): Layer | null {
    if (layer.parentLayerId === null) return null;
    return this.findLayer(layer.parentLayerId) ?? null;
  }

  masksOf(layerId: string): Layer[] {
    return this.items.filter((l) => l.isMask && l.parentLayerId === layerId);
  }

  /**
   * Structural copy: new layer objects with the same ids, shared buffers.
   * The copy has no recorder and its own event bus.
   */
  clone(): LayerStack {
    return new LayerStack(
      this.canvas,
      this.items.map((l) => updateLayer(l, {})),
      this.cursor,
    );
  }

  /**
   * Copy under fresh layer ids. Mask links are remapped to the new ids.
   */
  cloneWithFreshIds(): LayerStack {
    const ids = new Map<string, string>();
    const copies = this.items.map((l) => {
      const copy = duplicateLayer(l);
      ids.set(l.id, copy.id);
      return copy;
    });
    const remapped = copies.map((l) => {
      const parent = l.parentLayerId === null ? undefined : ids.get(l.parentLayerId);
      return parent ? updateLayer(l, { parentLayerId: parent }) : l;
    });
    return new LayerStack(this.canvas, remapped, this.cursor);
  }

  equals(other: LayerStack): boolean {
    if (this.length !== other.length || this.cursor !== other.cursor) return false;
    return this.items.every((l, i) => layersEqual(l, other.items[i]));
  }

  // ============================================================
  // Structure
  // ============================================================

  /**
   * Insert a new layer directly above the current one and select it
   */
  addLayer(options: AddLayerOptions = {}): Layer | null {
    if (!this.canMutate("addLayer")) return null;

    const layer = createLayer({
      name: options.name ?? `Layer ${this.items.length}`,
      blendMode: options.blendMode,
      opacity: options.opacity,
      isMask: options.isMask,
      parentLayerId: options.parentLayerId,
      contentType: options.contentType,
      pixels: options.pixels,
    });
    const cursorBefore = this.cursor;
    const index = this.cursor + 1;
    this.items.splice(index, 0, layer);
    this.cursor = index;

    this.commit({ kind: "addLayer", ...stamp("Add Layer"), index, layer, cursorBefore, cursorAfter: index });
    return layer;
  }

  deleteLayer(index: number): boolean {
    if (!this.canMutate("deleteLayer") || !this.isValidIndex(index)) return false;
    if (this.items.length === 1) {
      log.debug("refusing to delete the last layer");
      return false;
    }

    const cursorBefore = this.cursor;
    const [layer] = this.items.splice(index, 1);
    if (this.cursor > index) this.cursor--;
    this.setCursor(this.cursor);

    this.commit({
      kind: "deleteLayer",
      ...stamp("Delete Layer"),
      index,
      layer,
      cursorBefore,
      cursorAfter: this.cursor,
    });
    return true;
  }

  /**
   * Move a layer to `to`. The cursor follows the moved layer; if another
   * layer is current, its position shifts with the move.
   */
  moveLayer(from: number, to: number): boolean {
    if (!this.canMutate("moveLayer")) return false;
    if (!this.isValidIndex(from) || !this.isValidIndex(to) || from === to) return false;

    const cursorBefore = this.cursor;
    this.moveRaw(from, to);
    if (this.cursor === from) {
      this.cursor = to;
    } else if (from < this.cursor && to >= this.cursor) {
      this.cursor--;
    } else if (from > this.cursor && to <= this.cursor) {
      this.cursor++;
    }

    this.commit({ kind: "moveLayer", ...stamp("Move Layer"), from, to, cursorBefore, cursorAfter: this.cursor });
    return true;
  }

  selectLayer(index: number): boolean {
    if (!this.isValidIndex(index)) return false;
    this.cursor = index;
    this.events.emit("layers:select", { index, layerId: this.items[index].id });
    return true;
  }

  selectLayerById(layerId: string): boolean {
    return this.selectLayer(this.indexOf(layerId));
  }

  // ============================================================
  // Properties
  // ============================================================

  setVisibility(index: number, visible: boolean): boolean {
    const layer = this.editable(index, "setVisibility");
    if (!layer || layer.visible === visible) return false;
    this.items[index] = updateLayer(layer, { visible });
    this.commit({
      kind: "setVisibility",
      ...stamp(visible ? "Show Layer" : "Hide Layer"),
      index,
      layerId: layer.id,
      before: layer.visible,
      after: visible,
    });
    return true;
  }

  setOpacity(index: number, opacity: number): boolean {
    const layer = this.editable(index, "setOpacity");
    const next = clampOpacity(opacity);
    if (!layer || layer.opacity === next) return false;
    this.items[index] = updateLayer(layer, { opacity: next });
    this.commit({
      kind: "setOpacity",
      ...stamp("Layer Opacity"),
      index,
      layerId: layer.id,
      before: layer.opacity,
      after: next,
    });
    return true;
  }

  setBlendMode(index: number, blendMode: BlendMode): boolean {
    const layer = this.editable(index, "setBlendMode");
    if (!layer || layer.blendMode === blendMode) return false;
    this.items[index] = updateLayer(layer, { blendMode });
    this.commit({
      kind: "setBlendMode",
      ...stamp("Blend Mode"),
      index,
      layerId: layer.id,
      before: layer.blendMode,
      after: blendMode,
    });
    return true;
  }

  setLocked(index: number, locked: boolean): boolean {
    const layer = this.editable(index, "setLocked");
    if (!layer || layer.locked === locked) return false;
    this.items[index] = updateLayer(layer, { locked });
    this.commit({
      kind: "setLocked",
      ...stamp(locked ? "Lock Layer" : "Unlock Layer"),
      index,
      layerId: layer.id,
      before: layer.locked,
      after: locked,
    });
    return true;
  }

  renameLayer(index: number, name: string): boolean {
    const layer = this.editable(index, "renameLayer");
    if (!layer || layer.name === name) return false;
    this.items[index] = updateLayer(layer, { name });
    this.commit({
      kind: "renameLayer",
      ...stamp("Rename Layer"),
      index,
      layerId: layer.id,
      before: layer.name,
      after: name,
    });
    return true;
  }

  // ============================================================
  // Pixels
  // ============================================================

  /**
   * Render `stroke` over the current layer's buffer and swap in the result.
   * Locked layers and empty strokes are skipped.
   */
  applyStroke(stroke: Stroke, renderer: StrokeRenderer): boolean {
    if (!this.canMutate("applyStroke")) return false;
    const index = this.cursor;
    const layer = this.items[index];
    if (layer.locked) {
      log.debug(`stroke skipped: "${layer.name}" is locked`);
      return false;
    }
    if (stroke.points.length === 0) return false;

    let after: PixelBuffer;
    this.rasterizing = true;
    try {
      after = renderer.render(stroke, layer.pixels, this.canvas);
    } finally {
      this.rasterizing = false;
    }

    this.items[index] = updateLayer(layer, { pixels: after });
    this.commit({
      kind: "strokeApplied",
      ...stamp(`${getBrush(stroke.brush).name} Stroke`),
      index,
      layerId: layer.id,
      before: layer.pixels,
      after,
      brush: stroke.brush,
    });
    return true;
  }

  /**
   * Swap in a whole buffer (image import, filters)
   */
  replacePixels(index: number, pixels: PixelBuffer | null, label = "Replace Pixels"): boolean {
    const layer = this.editable(index, "replacePixels");
    if (!layer || layer.pixels === pixels) return false;
    if (layer.locked) {
      log.debug(`replacePixels skipped: "${layer.name}" is locked`);
      return false;
    }
    this.items[index] = updateLayer(layer, { pixels });
    this.commit({
      kind: "pixelsReplaced",
      ...stamp(label),
      index,
      layerId: layer.id,
      before: layer.pixels,
      after: pixels,
    });
    return true;
  }

  applyFilter(index: number, filter: FilterType, intensity = 1): boolean {
    const layer = this.layerAt(index);
    if (!layer?.pixels) return false;
    return this.replacePixels(index, applyFilter(layer.pixels, filter, intensity), filterLabel(filter));
  }

  /**
   * Flip, rotate, crop or resize a layer's image. A crop that misses the
   * image entirely is ignored.
   */
  transformLayer(index: number, transform: LayerTransform): boolean {
    const layer = this.layerAt(index);
    if (!layer?.pixels || !isValidTransform(transform)) return false;
    const pixels = applyTransform(layer.pixels, transform);
    if (!pixels) return false;
    return this.replacePixels(index, pixels, transformLabel(transform));
  }

  /**
   * Draw `topIndex` onto `bottomIndex` and remove the top layer. Both layers
   * need pixels and neither may be a mask.
   *
   * Masks are flattened into the result: the bottom layer's masks are baked
   * into its own pixels first, the top layer is drawn through its masks, and
   * every mask layer of either layer is removed with the top layer.
   */
  mergeLayers(topIndex: number, bottomIndex: number): boolean {
    if (!this.canMutate("mergeLayers")) return false;
    if (!this.isValidIndex(topIndex) || !this.isValidIndex(bottomIndex) || topIndex === bottomIndex) {
      return false;
    }
    const top = this.items[topIndex];
    const bottom = this.items[bottomIndex];
    if (!top.pixels || !bottom.pixels) {
      log.debug("merge skipped: both layers need pixel data");
      return false;
    }
    if (top.isMask || bottom.isMask) {
      log.debug("merge skipped: mask layers merge with their parent only through compositing");
      return false;
    }

    const draft = bakeMasks(bottom.pixels, masksFor(bottom, this.items)).toDraft();
    blitLayer(draft, top, masksFor(top, this.items));
    const merged = updateLayer(bottom, { pixels: draft.publish() });

    const removed: RemovedLayer[] = [];
    this.items.forEach((layer, index) => {
      const ownedMask = layer.isMask && (layer.parentLayerId === top.id || layer.parentLayerId === bottom.id);
      if (index === topIndex || ownedMask) removed.push({ index, layer });
    });
    const removedBelow = (index: number) => removed.filter((r) => r.index < index).length;

    const cursorBefore = this.cursor;
    const mergedIndex = bottomIndex - removedBelow(bottomIndex);
    const cursorAfter = removed.some((r) => r.index === this.cursor)
      ? mergedIndex
      : this.cursor - removedBelow(this.cursor);

    this.items[bottomIndex] = merged;
    for (let i = removed.length - 1; i >= 0; i--) {
      this.items.splice(removed[i].index, 1);
    }
    this.cursor = cursorAfter;

    this.commit({
      kind: "mergeLayers",
      ...stamp("Merge Layers"),
      topIndex,
      bottomIndex,
      mergedIndex,
      removed,
      bottomBefore: bottom,
      bottomAfter: merged,
      cursorBefore,
      cursorAfter,
    });
    return true;
  }

  /**
   * Merge the current layer into the one directly beneath it
   */
  mergeDown(): boolean {
    if (this.cursor === 0) return false;
    return this.mergeLayers(this.cursor, this.cursor - 1);
  }

  // ============================================================
  // Restore primitives (history replay only)
  // ============================================================

  insertAt(index: number, layer: Layer): void {
    invariant(index >= 0 && index <= this.items.length, `insertAt: index ${index} out of range`);
    this.items.splice(index, 0, layer);
  }

  removeAt(index: number): Layer {
    invariant(this.isValidIndex(index) && this.items.length > 1, `removeAt: cannot remove index ${index}`);
    const [layer] = this.items.splice(index, 1);
    this.setCursor(this.cursor);
    return layer;
  }

  replaceAt(index: number, layer: Layer): void {
    invariant(this.isValidIndex(index), `replaceAt: index ${index} out of range`);
    this.items[index] = layer;
  }

  moveRaw(from: number, to: number): void {
    invariant(this.isValidIndex(from) && this.isValidIndex(to), `moveRaw: ${from} -> ${to} out of range`);
    const [layer] = this.items.splice(from, 1);
    this.items.splice(to, 0, layer);
  }

  /**
   * Set the cursor, clamped into range
   */
  setCursor(index: number): void {
    const max = this.items.length - 1;
    this.cursor = Number.isInteger(index) ? Math.min(max, Math.max(0, index)) : 0;
  }

  // ============================================================
  // Internals
  // ============================================================

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  private canMutate(operation: string): boolean {
    if (this.rasterizing) {
      log.warn(`${operation} rejected while a stroke is rasterizing`);
      return false;
    }
    return true;
  }

  private editable(index: number, operation: string): Layer | undefined {
    if (!this.canMutate(operation)) return undefined;
    return this.layerAt(index);
  }

  private commit(action: HistoryAction): void {
    log.debug(action.label);
    this.recorder?.(action);
    this.events.emit("layers:change", action);
  }
}
