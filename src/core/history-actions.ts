/**
 * History Actions
 *
 * One variant per kind of mutation. Each variant stores both sides of the
 * change (the value before AND the value after), so every action can be
 * undone and redone exactly, without recomputing anything:
 *
 * - structural actions keep the affected layer objects, indices and the
 *   cursor position on either side
 * - property actions keep the old and new field value
 * - pixel actions keep the whole buffer before and after (no diffs)
 *
 * Layers and buffers are immutable, so holding references is enough.
 */
import type { BlendMode, BrushType } from "./types";
import type { PixelBuffer } from "./pixel-buffer";
import { type Layer, updateLayer } from "./layer";
import { invariant } from "./errors";

interface ActionBase {
  /** Human-readable name for history listings */
  label: string;
  timestamp: number;
}

interface CursorChange {
  cursorBefore: number;
  cursorAfter: number;
}

export interface AddLayerAction extends ActionBase, CursorChange {
  kind: "addLayer";
  index: number;
  layer: Layer;
}

export interface DeleteLayerAction extends ActionBase, CursorChange {
  kind: "deleteLayer";
  index: number;
  layer: Layer;
}

export interface MoveLayerAction extends ActionBase, CursorChange {
  kind: "moveLayer";
  from: number;
  to: number;
}

interface LayerFieldChange<T> extends ActionBase {
  index: number;
  layerId: string;
  before: T;
  after: T;
}

export interface SetVisibilityAction extends LayerFieldChange<boolean> {
  kind: "setVisibility";
}

export interface SetOpacityAction extends LayerFieldChange<number> {
  kind: "setOpacity";
}

export interface SetBlendModeAction extends LayerFieldChange<BlendMode> {
  kind: "setBlendMode";
}

export interface SetLockedAction extends LayerFieldChange<boolean> {
  kind: "setLocked";
}

export interface RenameLayerAction extends LayerFieldChange<string> {
  kind: "renameLayer";
}

export interface StrokeAppliedAction extends LayerFieldChange<PixelBuffer | null> {
  kind: "strokeApplied";
  brush: BrushType;
}

export interface PixelsReplacedAction extends LayerFieldChange<PixelBuffer | null> {
  kind: "pixelsReplaced";
}

export interface RemovedLayer {
  /** Position before the removal */
  index: number;
  layer: Layer;
}

export interface MergeLayersAction extends ActionBase, CursorChange {
  kind: "mergeLayers";
  topIndex: number;
  bottomIndex: number;
  /** Index of the merged layer once the removed layers are gone */
  mergedIndex: number;
  /** The top layer and the masks of both layers, ascending by index */
  removed: readonly RemovedLayer[];
  bottomBefore: Layer;
  bottomAfter: Layer;
}

export type HistoryAction =
  | AddLayerAction
  | DeleteLayerAction
  | MoveLayerAction
  | SetVisibilityAction
  | SetOpacityAction
  | SetBlendModeAction
  | SetLockedAction
  | RenameLayerAction
  | StrokeAppliedAction
  | PixelsReplacedAction
  | MergeLayersAction;

export type HistoryActionKind = HistoryAction["kind"];

/**
 * Low-level stack edits used to replay actions. They bypass validation and
 * recording; the history manager is their only caller.
 */
export interface RestorableStack {
  layerAt(index: number): Layer | undefined;
  insertAt(index: number, layer: Layer): void;
  removeAt(index: number): Layer;
  replaceAt(index: number, layer: Layer): void;
  moveRaw(from: number, to: number): void;
  setCursor(index: number): void;
}

function expectLayer(stack: RestorableStack, index: number, layerId: string): Layer {
  const layer = stack.layerAt(index);
  invariant(layer && layer.id === layerId, `history out of sync: expected layer ${layerId} at ${index}`);
  return layer;
}

type FieldAction =
  | SetVisibilityAction
  | SetOpacityAction
  | SetBlendModeAction
  | SetLockedAction
  | RenameLayerAction
  | StrokeAppliedAction
  | PixelsReplacedAction;

function applyField(stack: RestorableStack, action: FieldAction, side: "before" | "after"): void {
  const layer = expectLayer(stack, action.index, action.layerId);
  switch (action.kind) {
    case "setVisibility":
      stack.replaceAt(action.index, updateLayer(layer, { visible: action[side] }));
      break;
    case "setOpacity":
      stack.replaceAt(action.index, updateLayer(layer, { opacity: action[side] }));
      break;
    case "setBlendMode":
      stack.replaceAt(action.index, updateLayer(layer, { blendMode: action[side] }));
      break;
    case "setLocked":
      stack.replaceAt(action.index, updateLayer(layer, { locked: action[side] }));
      break;
    case "renameLayer":
      stack.replaceAt(action.index, updateLayer(layer, { name: action[side] }));
      break;
    case "strokeApplied":
    case "pixelsReplaced":
      stack.replaceAt(action.index, updateLayer(layer, { pixels: action[side] }));
      break;
  }
}

/**
 * Put the stack back into the state it had before `action`
 */
export function revertAction(stack: RestorableStack, action: HistoryAction): void {
  switch (action.kind) {
    case "addLayer":
      expectLayer(stack, action.index, action.layer.id);
      stack.removeAt(action.index);
      stack.setCursor(action.cursorBefore);
      break;
    case "deleteLayer":
      stack.insertAt(action.index, action.layer);
      stack.setCursor(action.cursorBefore);
      break;
    case "moveLayer":
      stack.moveRaw(action.to, action.from);
      stack.setCursor(action.cursorBefore);
      break;
    case "mergeLayers":
      expectLayer(stack, action.mergedIndex, action.bottomAfter.id);
      stack.replaceAt(action.mergedIndex, action.bottomBefore);
      for (const { index, layer } of action.removed) {
        stack.insertAt(index, layer);
      }
      stack.setCursor(action.cursorBefore);
      break;
    default:
      applyField(stack, action, "before");
  }
}

/**
 * Replay `action` forward from the state it was recorded in
 */
export function reapplyAction(stack: RestorableStack, action: HistoryAction): void {
  switch (action.kind) {
    case "addLayer":
      stack.insertAt(action.index, action.layer);
      stack.setCursor(action.cursorAfter);
      break;
    case "deleteLayer":
      expectLayer(stack, action.index, action.layer.id);
      stack.removeAt(action.index);
      stack.setCursor(action.cursorAfter);
      break;
    case "moveLayer":
      stack.moveRaw(action.from, action.to);
      stack.setCursor(action.cursorAfter);
      break;
    case "mergeLayers":
      expectLayer(stack, action.bottomIndex, action.bottomBefore.id);
      stack.replaceAt(action.bottomIndex, action.bottomAfter);
      for (let i = action.removed.length - 1; i >= 0; i--) {
        stack.removeAt(action.removed[i].index);
      }
      stack.setCursor(action.cursorAfter);
      break;
    default:
      applyField(stack, action, "after");
  }
}
