/**
 * Centralized Brush Registry
 *
 * Single source of truth for all brush variants. Each definition includes:
 * - Metadata (id, name, hotkey)
 * - The canonical settings preset selected with the variant
 * - The render mode the brush engine switches on
 *
 * To add a new brush: add one object here and, if it needs a new way of
 * putting paint down, a render mode in brush-engine.ts.
 */
import type { BrushType } from "./types";

// ============================================================
// Settings
// ============================================================

export interface BrushSettings {
  /** Base diameter in pixels */
  size: number;
  opacity: number;
  flow: number;
  hardness: number;
  /** Resample step as a fraction of size */
  spacing: number;
  pressureSensitive: boolean;
  /** Name of a texture registered on the brush engine */
  texture?: string;
}

/**
 * How a variant puts paint down:
 * - path: one constant-width path painted once
 * - tapered: per-segment curves whose width follows pressure
 * - spray: a soft circle stamped at every point
 * - texture: an image stamped at every point
 * - smudge: drags color already on the layer
 */
export type RenderMode = "path" | "tapered" | "spray" | "texture" | "smudge";

export interface BrushDefinition {
  id: BrushType;
  name: string;
  hotkey: string;
  mode: RenderMode;
  /** Composites destination-out instead of painting color */
  erases: boolean;
  preset: Readonly<BrushSettings>;
}

export const DEFAULT_SPACING = 0.25;

// ============================================================
// Variants
// ============================================================

export const pencil = {
  id: "pencil",
  name: "Pencil",
  hotkey: "p",
  mode: "path",
  erases: false,
  preset: { size: 2, opacity: 1, flow: 0.8, hardness: 0.9, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const brush = {
  id: "brush",
  name: "Brush",
  hotkey: "b",
  mode: "tapered",
  erases: false,
  preset: { size: 10, opacity: 1, flow: 1, hardness: 0.7, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const airbrush = {
  id: "airbrush",
  name: "Airbrush",
  hotkey: "a",
  mode: "spray",
  erases: false,
  preset: { size: 20, opacity: 0.3, flow: 0.6, hardness: 0, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const marker = {
  id: "marker",
  name: "Marker",
  hotkey: "m",
  mode: "path",
  erases: false,
  preset: { size: 8, opacity: 1, flow: 1, hardness: 1, spacing: DEFAULT_SPACING, pressureSensitive: false },
} as const satisfies BrushDefinition;

export const pen = {
  id: "pen",
  name: "Pen",
  hotkey: "n",
  mode: "path",
  erases: false,
  preset: { size: 3, opacity: 1, flow: 1, hardness: 1, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const eraser = {
  id: "eraser",
  name: "Eraser",
  hotkey: "e",
  mode: "path",
  erases: true,
  preset: { size: 20, opacity: 1, flow: 1, hardness: 0.8, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const smudge = {
  id: "smudge",
  name: "Smudge",
  hotkey: "s",
  mode: "smudge",
  erases: false,
  preset: { size: 15, opacity: 0.5, flow: 0.7, hardness: 0.3, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const watercolor = {
  id: "watercolor",
  name: "Watercolor",
  hotkey: "w",
  mode: "tapered",
  erases: false,
  preset: { size: 25, opacity: 0.4, flow: 0.5, hardness: 0.1, spacing: DEFAULT_SPACING, pressureSensitive: true },
} as const satisfies BrushDefinition;

export const texture = {
  id: "texture",
  name: "Texture",
  hotkey: "t",
  mode: "texture",
  erases: false,
  preset: {
    size: 30,
    opacity: 0.7,
    flow: 0.8,
    hardness: 0.5,
    spacing: DEFAULT_SPACING,
    pressureSensitive: true,
    texture: "default",
  },
} as const satisfies BrushDefinition;

// ============================================================
// Registry
// ============================================================

export const brushes: readonly BrushDefinition[] = [
  pencil,
  brush,
  airbrush,
  marker,
  pen,
  eraser,
  smudge,
  watercolor,
  texture,
];

/**
 * Get a brush definition by id
 */
export function getBrush(id: BrushType): BrushDefinition {
  const found = brushes.find((b) => b.id === id);
  if (!found) {
    throw new RangeError(`unknown brush type: ${id}`);
  }
  return found;
}

/**
 * Get a brush by hotkey
 */
export function getBrushByHotkey(key: string): BrushDefinition | undefined {
  return brushes.find((b) => b.hotkey === key.toLowerCase());
}

/**
 * Fresh copy of a variant's canonical settings
 */
export function presetFor(id: BrushType): BrushSettings {
  return { ...getBrush(id).preset };
}
