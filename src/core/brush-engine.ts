/**
 * Brush Engine - Pointer Samples to Rendered Strokes
 *
 * Three stages:
 * 1. Pressure curve: pen pressure → stroke width
 * 2. Resampling: fills gaps between pointer samples so no two consecutive
 *    points are further apart than `size × spacing`
 * 3. Rendering: a state machine keyed by the brush's render mode (see
 *    brushes.ts) paints the stroke onto a copy of the target buffer
 *
 * Strokes snapshot the settings they were built with, so rendering a stroke
 * later gives the same pixels even if the active brush changed meanwhile.
 */
import paper from "paper";
import type { BrushType, Color, PointerSample, PressurePoint, Size, StrokeCap, StrokeJoin } from "./types";
import { type BrushSettings, getBrush, presetFor } from "./brushes";
import { BLACK, TRANSPARENT, mixColors } from "./color";
import { PixelBuffer, type PixelDraft } from "./pixel-buffer";
import { type RadiusPoint, paintDisc, paintImage, paintPath, polylineShapes } from "./rasterizer";
import { Store } from "./stores";
import { scopedLogger } from "./logger";

const log = scopedLogger("brush");

/** Width never drops below this fraction of the brush size under pressure */
const MIN_PRESSURE_SCALE = 0.2;
const PRESSURE_EXPONENT = 1.5;

export interface Stroke {
  readonly points: readonly PressurePoint[];
  readonly color: Color;
  /** Base width (the brush size when the stroke was built) */
  readonly width: number;
  readonly cap: StrokeCap;
  readonly join: StrokeJoin;
  readonly brush: BrushType;
  readonly settings: Readonly<BrushSettings>;
}

/**
 * Anything that can paint a stroke onto a layer buffer
 */
export interface StrokeRenderer {
  render(stroke: Stroke, target: PixelBuffer | null, canvas: Size): PixelBuffer;
}

export interface BrushState {
  type: BrushType;
  settings: Readonly<BrushSettings>;
  color: Color;
}

function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

/**
 * Pressure in [0, 1]; missing or non-finite values count as full pressure
 */
export function normalizePressure(pressure: number | undefined): number {
  if (pressure === undefined || !Number.isFinite(pressure)) return 1;
  return clamp01(pressure);
}

export function toPressurePoint(sample: PointerSample): PressurePoint {
  return { x: sample.x, y: sample.y, pressure: normalizePressure(sample.pressure) };
}

/**
 * Width for a given pressure. Not pressure sensitive → fixed size; otherwise
 * `size × max(0.2, pressure^1.5)`, so light strokes stay visible.
 */
export function pressureWidth(settings: Readonly<BrushSettings>, pressure: number): number {
  if (!settings.pressureSensitive) return settings.size;
  const adjusted = Math.pow(normalizePressure(pressure), PRESSURE_EXPONENT);
  return settings.size * Math.max(MIN_PRESSURE_SCALE, adjusted);
}

/**
 * Insert interpolated points wherever consecutive samples are at least one
 * step (`size × spacing`) apart. Position and pressure are interpolated
 * linearly. Fewer than two points are returned as they are.
 */
export function resamplePoints(points: readonly PressurePoint[], settings: Readonly<BrushSettings>): PressurePoint[] {
  if (points.length < 2) return points.slice();

  const step = settings.size * settings.spacing;
  if (!(step > 0)) return points.slice();

  const result: PressurePoint[] = [points[0]];
  for (let i = 0; i < points.length - 1; i++) {
    const current = points[i];
    const next = points[i + 1];
    const a = new paper.Point(current.x, current.y);
    const b = new paper.Point(next.x, next.y);

    const ratio = a.getDistance(b) / step;
    // a pair exactly one step apart still gets a midpoint
    const steps = ratio >= 1 ? Math.max(2, Math.ceil(ratio)) : 1;

    for (let j = 1; j < steps; j++) {
      const t = j / steps;
      const p = a.add(b.subtract(a).multiply(t));
      result.push({
        x: p.x,
        y: p.y,
        pressure: current.pressure + (next.pressure - current.pressure) * t,
      });
    }
    result.push(next);
  }
  return result;
}

function midpoint(a: PressurePoint, b: PressurePoint): PressurePoint {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2, pressure: (a.pressure + b.pressure) / 2 };
}

/**
 * Flatten a quadratic curve into vertices whose radius runs from r0 to r1
 */
function flattenQuadratic(
  start: PressurePoint,
  control: PressurePoint,
  end: PressurePoint,
  r0: number,
  r1: number,
): RadiusPoint[] {
  const p0 = new paper.Point(start.x, start.y);
  const p1 = new paper.Point(control.x, control.y);
  const p2 = new paper.Point(end.x, end.y);
  const length = p0.getDistance(p1) + p1.getDistance(p2);
  const pieces = Math.max(1, Math.ceil(length / 2));

  const out: RadiusPoint[] = [];
  for (let i = 0; i <= pieces; i++) {
    const t = i / pieces;
    const u = 1 - t;
    const p = p0.multiply(u * u).add(p1.multiply(2 * u * t)).add(p2.multiply(t * t));
    out.push({ x: p.x, y: p.y, r: r0 + (r1 - r0) * t });
  }
  return out;
}

export class BrushEngine implements StrokeRenderer {
  private type: BrushType = "brush";
  private settings: BrushSettings = presetFor("brush");
  private color: Color = { ...BLACK };
  private textures = new Map<string, PixelBuffer>();

  /**
   * Observable brush state (type, settings, color)
   */
  readonly state = new Store<BrushState>(this.snapshot());

  get currentType(): BrushType {
    return this.type;
  }

  get currentSettings(): Readonly<BrushSettings> {
    return this.settings;
  }

  get currentColor(): Color {
    return this.color;
  }

  set currentColor(color: Color) {
    this.color = { ...color };
    this.publish();
  }

  /**
   * Switch variant. Settings are replaced wholesale by the variant's preset;
   * earlier overrides do not carry over.
   */
  selectVariant(type: BrushType): void {
    this.type = type;
    this.settings = presetFor(type);
    log.debug(`selected ${type} (size ${this.settings.size})`);
    this.publish();
  }

  /**
   * Override individual settings of the current variant
   */
  updateSettings(patch: Partial<BrushSettings>): void {
    const next = { ...this.settings, ...patch };
    next.size = Math.max(0.1, next.size);
    next.opacity = clamp01(next.opacity);
    next.flow = clamp01(next.flow);
    next.hardness = clamp01(next.hardness);
    if (!(next.spacing > 0)) next.spacing = this.settings.spacing;
    this.settings = next;
    this.publish();
  }

  /**
   * Register (or with `null`, drop) a stamp texture by name
   */
  loadTexture(name: string, image: PixelBuffer | null): void {
    if (image) {
      this.textures.set(name, image);
    } else {
      this.textures.delete(name);
    }
  }

  hasTexture(name: string): boolean {
    return this.textures.has(name);
  }

  applyPressureCurve(pressure: number): number {
    return pressureWidth(this.settings, pressure);
  }

  resample(points: readonly PressurePoint[]): PressurePoint[] {
    return resamplePoints(points, this.settings);
  }

  /**
   * Resample raw samples and package them with the active color and settings
   */
  buildStroke(samples: readonly PointerSample[]): Stroke {
    const def = getBrush(this.type);
    const points = this.resample(samples.map(toPressurePoint));
    const color = def.erases || def.mode === "smudge" ? { ...TRANSPARENT } : { ...this.color };

    const stroke: Stroke = {
      points: Object.freeze(points),
      color: Object.freeze(color),
      width: this.settings.size,
      cap: "round",
      join: "round",
      brush: this.type,
      settings: Object.freeze({ ...this.settings }),
    };
    return Object.freeze(stroke);
  }

  /**
   * Paint `stroke` over a copy of `target` (or a blank canvas). The target
   * itself is never modified.
   */
  render(stroke: Stroke, target: PixelBuffer | null, canvas: Size): PixelBuffer {
    const draft = target ? target.toDraft() : PixelBuffer.draft(canvas.width, canvas.height);
    if (stroke.points.length === 0) return draft.publish();

    const def = getBrush(stroke.brush);
    switch (def.mode) {
      case "path":
        this.renderPath(draft, stroke, def.erases);
        break;
      case "tapered":
        this.renderTapered(draft, stroke);
        break;
      case "spray":
        this.renderSpray(draft, stroke);
        break;
      case "texture":
        this.renderTexture(draft, stroke);
        break;
      case "smudge":
        this.renderSmudge(draft, stroke);
        break;
    }
    return draft.publish();
  }

  // ============================================================
  // Render modes
  // ============================================================

  private renderPath(draft: PixelDraft, stroke: Stroke, erases: boolean): void {
    const r = stroke.width / 2;
    const shapes = polylineShapes(
      stroke.points.map((p) => ({ x: p.x, y: p.y, r })),
      stroke.cap,
      stroke.join,
    );
    paintPath(draft, shapes, { color: stroke.color, opacity: stroke.settings.opacity, erase: erases });
  }

  /**
   * Each segment is its own mini path: from the previous midpoint, curving
   * through the sample, to the next midpoint. Width follows pressure across
   * the segment so the stroke tapers without visible facets.
   */
  private renderTapered(draft: PixelDraft, stroke: Stroke): void {
    const pts = stroke.points;
    const s = stroke.settings;
    const paint = { color: stroke.color, opacity: s.opacity };

    if (pts.length === 1) {
      const r = pressureWidth(s, pts[0].pressure) / 2;
      paintPath(draft, polylineShapes([{ x: pts[0].x, y: pts[0].y, r }], stroke.cap, stroke.join), paint);
      return;
    }

    let start = pts[0];
    for (let i = 0; i < pts.length - 1; i++) {
      const end = midpoint(pts[i], pts[i + 1]);
      const r0 = pressureWidth(s, start.pressure) / 2;
      const r1 = pressureWidth(s, end.pressure) / 2;
      const vertices = flattenQuadratic(start, pts[i], end, r0, r1);
      paintPath(draft, polylineShapes(vertices, stroke.cap, stroke.join), paint);
      start = end;
    }

    // tail: last midpoint to the final sample
    const last = pts[pts.length - 1];
    const tail: RadiusPoint[] = [
      { x: start.x, y: start.y, r: pressureWidth(s, start.pressure) / 2 },
      { x: last.x, y: last.y, r: pressureWidth(s, last.pressure) / 2 },
    ];
    paintPath(draft, polylineShapes(tail, stroke.cap, stroke.join), paint);
  }

  private renderSpray(draft: PixelDraft, stroke: Stroke): void {
    const s = stroke.settings;
    const paint = { color: stroke.color, opacity: s.opacity * s.flow };
    for (const p of stroke.points) {
      paintDisc(draft, p.x, p.y, stroke.width / 2, s.hardness, paint);
    }
  }

  private renderTexture(draft: PixelDraft, stroke: Stroke): void {
    const s = stroke.settings;
    const image = s.texture ? this.textures.get(s.texture) : undefined;
    const paint = { color: stroke.color, opacity: s.opacity };

    if (!image) {
      log.debug(`texture "${s.texture ?? ""}" not loaded, stamping circles`);
      for (const p of stroke.points) {
        paintDisc(draft, p.x, p.y, stroke.width / 2, s.hardness, paint);
      }
      return;
    }

    for (const p of stroke.points) {
      paintImage(draft, image, p.x, p.y, stroke.width * 2, paint);
    }
  }

  /**
   * Picks up the color under the first point and drags it along. At every
   * later point the carried color is stamped, then blends toward the color
   * now under the stamp.
   */
  private renderSmudge(draft: PixelDraft, stroke: Stroke): void {
    const s = stroke.settings;
    const strength = clamp01(s.opacity * s.flow);
    const sample = (p: PressurePoint) => draft.getPixel(Math.floor(p.x), Math.floor(p.y));

    let carried = sample(stroke.points[0]);
    for (let i = 1; i < stroke.points.length; i++) {
      const p = stroke.points[i];
      if (carried && carried.a > 0) {
        paintDisc(draft, p.x, p.y, stroke.width / 2, s.hardness, { color: carried, opacity: strength });
      }
      const under = sample(p);
      if (under) {
        carried = carried ? mixColors(carried, under, strength) : under;
      }
    }
  }

  private snapshot(): BrushState {
    return { type: this.type, settings: { ...this.settings }, color: { ...this.color } };
  }

  private publish(): void {
    this.state.set(this.snapshot());
  }
}
