/**
 * Persistence Records
 *
 * Plain shapes handed across the persistence boundary. The encoding (JSON,
 * PNG, ...) is the caller's business; this module only converts between
 * records and live objects, validating anything coming back in.
 */
import { isBlendMode, type ColorMode, type ContentType } from "./types";
import { PixelBuffer } from "./pixel-buffer";
import { type Layer, createLayer } from "./layer";
import { LayerStack } from "./layer-stack";
import { type DocumentManifest, PaintDocument } from "./document";
import { InvalidBufferError, InvalidRecordError } from "./errors";

export interface LayerRecord {
  id: string;
  name: string;
  visible: boolean;
  opacity: number;
  blendMode: string;
  locked: boolean;
  isMask: boolean;
  parentLayerId: string | null;
  contentType: string;
  width?: number;
  height?: number;
  /** Raw RGBA bytes, row-major */
  pixels?: Uint8Array;
}

const CONTENT_TYPES: readonly ContentType[] = ["drawing", "image", "text"];
const COLOR_MODES: readonly ColorMode[] = ["rgb", "rgba"];

export function toLayerRecord(layer: Layer): LayerRecord {
  const record: LayerRecord = {
    id: layer.id,
    name: layer.name,
    visible: layer.visible,
    opacity: layer.opacity,
    blendMode: layer.blendMode,
    locked: layer.locked,
    isMask: layer.isMask,
    parentLayerId: layer.parentLayerId,
    contentType: layer.contentType,
  };
  if (layer.pixels) {
    record.width = layer.pixels.width;
    record.height = layer.pixels.height;
    record.pixels = Uint8Array.from(layer.pixels.bytes());
  }
  return record;
}

export function toDocumentManifest(document: PaintDocument): DocumentManifest {
  return document.manifest();
}

// ============================================================
// Validation
// ============================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function requireString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== "string") throw new InvalidRecordError(field, "expected a string");
  return value;
}

function requireBoolean(record: Record<string, unknown>, field: string): boolean {
  const value = record[field];
  if (typeof value !== "boolean") throw new InvalidRecordError(field, "expected a boolean");
  return value;
}

function requireNumber(record: Record<string, unknown>, field: string): number {
  const value = record[field];
  if (typeof value !== "number" || Number.isNaN(value)) throw new InvalidRecordError(field, "expected a number");
  return value;
}

function readPixels(record: Record<string, unknown>): PixelBuffer | null {
  const bytes = record.pixels;
  if (bytes === undefined || bytes === null) return null;
  if (!(bytes instanceof Uint8Array) && !(bytes instanceof Uint8ClampedArray)) {
    throw new InvalidRecordError("pixels", "expected a byte array");
  }
  const width = requireNumber(record, "width");
  const height = requireNumber(record, "height");
  try {
    return PixelBuffer.from(width, height, bytes);
  } catch (err) {
    if (err instanceof InvalidBufferError) {
      throw new InvalidRecordError("pixels", err.message);
    }
    throw err;
  }
}

/**
 * Rebuild a layer from a record. Opacity is clamped; unknown blend modes
 * and content types are rejected.
 */
export function fromLayerRecord(record: unknown): Layer {
  if (!isObject(record)) throw new InvalidRecordError("record", "expected an object");

  const blendMode = requireString(record, "blendMode");
  if (!isBlendMode(blendMode)) throw new InvalidRecordError("blendMode", `unknown blend mode "${blendMode}"`);

  const contentTypeRaw = requireString(record, "contentType");
  const contentType = CONTENT_TYPES.find((c) => c === contentTypeRaw);
  if (!contentType) throw new InvalidRecordError("contentType", `unknown content type "${contentTypeRaw}"`);

  const parent = record.parentLayerId;
  if (parent !== null && parent !== undefined && typeof parent !== "string") {
    throw new InvalidRecordError("parentLayerId", "expected a string or null");
  }

  return createLayer({
    id: requireString(record, "id"),
    name: requireString(record, "name"),
    visible: requireBoolean(record, "visible"),
    opacity: requireNumber(record, "opacity"),
    blendMode,
    locked: requireBoolean(record, "locked"),
    isMask: requireBoolean(record, "isMask"),
    parentLayerId: parent ?? null,
    contentType,
    pixels: readPixels(record),
  });
}

function readManifest(manifest: unknown): DocumentManifest {
  if (!isObject(manifest)) throw new InvalidRecordError("manifest", "expected an object");
  const colorModeRaw = requireString(manifest, "colorMode");
  const colorMode = COLOR_MODES.find((m) => m === colorModeRaw);
  if (!colorMode) throw new InvalidRecordError("colorMode", `unknown color mode "${colorModeRaw}"`);

  const filePath = manifest.filePath;
  if (filePath !== undefined && typeof filePath !== "string") {
    throw new InvalidRecordError("filePath", "expected a string");
  }

  return {
    id: requireString(manifest, "id"),
    name: requireString(manifest, "name"),
    width: requireNumber(manifest, "width"),
    height: requireNumber(manifest, "height"),
    resolution: requireNumber(manifest, "resolution"),
    colorMode,
    filePath,
  };
}

/**
 * Rebuild a document from its manifest and layer records (bottom layer
 * first). The top layer becomes current and history starts empty.
 */
export function restoreDocument(manifest: unknown, records: readonly unknown[]): PaintDocument {
  const meta = readManifest(manifest);
  if (records.length === 0) throw new InvalidRecordError("layers", "a document needs at least one layer");

  const layers = records.map(fromLayerRecord);
  const ids = new Set(layers.map((l) => l.id));
  if (ids.size !== layers.length) throw new InvalidRecordError("layers", "duplicate layer id");

  const stack = new LayerStack({ width: meta.width, height: meta.height }, layers);
  try {
    return new PaintDocument(meta, stack);
  } catch (err) {
    if (err instanceof InvalidBufferError) throw new InvalidRecordError("manifest", err.message);
    throw err;
  }
}
