/**
 * Document - one open painting
 *
 * Ties together the pieces a host works with: the layer stack, its history
 * and the brush engine. The stack records every edit into the history, so
 * `draw`, layer edits and filters are all undoable.
 */
import { randomUUID } from "node:crypto";
import type { ColorMode, PointerSample } from "./types";
import type { PixelBuffer } from "./pixel-buffer";
import { LayerStack } from "./layer-stack";
import { HistoryManager } from "./history";
import { BrushEngine } from "./brush-engine";
import { type CompositeOptions, backgroundFor, composite } from "./compositor";
import { InvalidBufferError } from "./errors";
import { config } from "./config";
import { scopedLogger } from "./logger";

const log = scopedLogger("document");

export interface DocumentOptions {
  id?: string;
  name: string;
  width: number;
  height: number;
  /** DPI */
  resolution?: number;
  colorMode?: ColorMode;
  filePath?: string;
  /** Undo depth; defaults to PAINT_HISTORY_LIMIT */
  historyLimit?: number;
}

/**
 * Document-level fields handed to persistence
 */
export interface DocumentManifest {
  id: string;
  name: string;
  width: number;
  height: number;
  resolution: number;
  colorMode: ColorMode;
  filePath?: string;
}

export class PaintDocument {
  readonly id: string;
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly resolution: number;
  readonly colorMode: ColorMode;
  readonly filePath: string | undefined;

  readonly layers: LayerStack;
  readonly history: HistoryManager;
  readonly brush = new BrushEngine();

  /**
   * @param layers - existing stack to adopt (restoring a saved document)
   */
  constructor(options: DocumentOptions, layers?: LayerStack) {
    const { width, height } = options;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InvalidBufferError(`invalid canvas size ${width}x${height}`);
    }

    this.id = options.id ?? randomUUID();
    this.name = options.name;
    this.width = width;
    this.height = height;
    this.resolution = options.resolution ?? config.resolution;
    this.colorMode = options.colorMode ?? "rgb";
    this.filePath = options.filePath;

    this.layers = layers ?? new LayerStack({ width, height });
    this.history = new HistoryManager({ maxSize: options.historyLimit, events: this.layers.events });
    this.layers.setActionRecorder((action) => this.history.record(action));

    log.debug(`created "${this.name}" ${width}x${height} @${this.resolution}dpi`);
  }

  get compositeOptions(): CompositeOptions {
    return { width: this.width, height: this.height, background: backgroundFor(this.colorMode) };
  }

  /**
   * Build a stroke from pointer samples with the active brush and apply it
   * to the current layer
   */
  draw(samples: readonly PointerSample[]): boolean {
    if (samples.length === 0) return false;
    const stroke = this.brush.buildStroke(samples);
    return this.layers.applyStroke(stroke, this.brush);
  }

  undo(): boolean {
    return this.history.undo(this.layers);
  }

  redo(): boolean {
    return this.history.redo(this.layers);
  }

  composite(): PixelBuffer {
    return composite(this.layers, this.compositeOptions);
  }

  manifest(): DocumentManifest {
    const manifest: DocumentManifest = {
      id: this.id,
      name: this.name,
      width: this.width,
      height: this.height,
      resolution: this.resolution,
      colorMode: this.colorMode,
    };
    if (this.filePath !== undefined) manifest.filePath = this.filePath;
    return manifest;
  }
}

export function createDocument(options: DocumentOptions): PaintDocument {
  return new PaintDocument(options);
}
