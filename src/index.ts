export * from "./core/types";
export * from "./core/errors";
export * from "./core/color";
export { PixelBuffer, PixelDraft, type ReadonlyBytes } from "./core/pixel-buffer";
export { blendRgb, compositePixel, erasePixel } from "./core/blend-modes";
export {
  type BrushDefinition,
  type BrushSettings,
  type RenderMode,
  DEFAULT_SPACING,
  brushes,
  getBrush,
  getBrushByHotkey,
  presetFor,
} from "./core/brushes";
export {
  type BrushState,
  type Stroke,
  type StrokeRenderer,
  BrushEngine,
  normalizePressure,
  pressureWidth,
  resamplePoints,
  toPressurePoint,
} from "./core/brush-engine";
export * from "./core/layer";
export { type ActionRecorder, type AddLayerOptions, BASE_LAYER_NAME, LayerStack } from "./core/layer-stack";
export * from "./core/history-actions";
export {
  type HistoryEntry,
  type HistoryNotice,
  type HistoryOptions,
  type HistoryState,
  BoundedHistory,
  HistoryManager,
} from "./core/history";
export {
  type CompositeOptions,
  backgroundFor,
  bakeMasks,
  blitLayer,
  composite,
  compositeLayers,
  masksFor,
} from "./core/compositor";
export * from "./core/filters";
export * from "./core/transforms";
export { type DocumentManifest, type DocumentOptions, PaintDocument, createDocument } from "./core/document";
export * from "./core/animation";
export * from "./core/records";
export { EventBus, Events, type EventName, type PaintEvents } from "./core/event-bus";
export { Store } from "./core/stores";
export { type LogLevel, type PaintConfig, config, loadConfig } from "./core/config";
export { default as logger, scopedLogger } from "./core/logger";
