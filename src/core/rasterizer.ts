/**
 * Rasterizer - Shape Coverage onto Pixel Drafts
 *
 * Converts stroke geometry into per-pixel coverage and composites it onto a
 * PixelDraft. Two painting models:
 *
 * - Paths (`paintPath`): a set of shapes (capsules, join discs, bevel triangles)
 *   painted as ONE coverage union. Overlapping pieces of the same path never
 *   darken each other, like a canvas `stroke()` call.
 * - Stamps (`paintDisc`, `paintImage`): each call composites on its own, so
 *   repeated stamps accumulate opacity.
 *
 * Paths use an rbush index over shape bounds so each pixel only tests the
 * shapes that can reach it.
 */
import paper from "paper";
import RBush from "rbush";
import type { BlendMode, Color, StrokeCap, StrokeJoin } from "./types";
import type { PixelBuffer, PixelDraft } from "./pixel-buffer";
import { compositePixel, erasePixel } from "./blend-modes";

// ============================================================
// Shapes
// ============================================================

/**
 * Segment swept by a disc whose radius varies linearly from `ar` to `br`.
 * Butt ends are cut flat at the endpoints; round ends are half discs.
 */
export interface CapsuleShape {
  kind: "capsule";
  ax: number;
  ay: number;
  ar: number;
  bx: number;
  by: number;
  br: number;
  startCap: "round" | "butt";
  endCap: "round" | "butt";
}

export interface DiscShape {
  kind: "disc";
  x: number;
  y: number;
  r: number;
}

export interface TriangleShape {
  kind: "triangle";
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  x3: number;
  y3: number;
}

export type Shape = CapsuleShape | DiscShape | TriangleShape;

/**
 * Polyline vertex with the stroke radius at that vertex
 */
export interface RadiusPoint {
  x: number;
  y: number;
  r: number;
}

export interface Paint {
  color: Color;
  /** Uniform alpha multiplier, 0-1 */
  opacity: number;
  /** Destination-out instead of source-over; color is ignored */
  erase?: boolean;
  blendMode?: BlendMode;
}

interface IndexEntry {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  shape: Shape;
}

const AA = 0.5;

// ============================================================
// Coverage
// ============================================================

function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

function capsuleCoverage(s: CapsuleShape, px: number, py: number): number {
  const dx = s.bx - s.ax;
  const dy = s.by - s.ay;
  const len2 = dx * dx + dy * dy;
  if (len2 === 0) {
    return clamp01(Math.max(s.ar, s.br) + AA - Math.hypot(px - s.ax, py - s.ay));
  }

  let t = ((px - s.ax) * dx + (py - s.ay) * dy) / len2;
  if (t < 0) {
    if (s.startCap === "butt") return 0;
    t = 0;
  } else if (t > 1) {
    if (s.endCap === "butt") return 0;
    t = 1;
  }

  const r = s.ar + (s.br - s.ar) * t;
  const d = Math.hypot(px - (s.ax + dx * t), py - (s.ay + dy * t));
  return clamp01(r + AA - d);
}

function triangleCoverage(s: TriangleShape, px: number, py: number): number {
  const d1 = (px - s.x2) * (s.y1 - s.y2) - (s.x1 - s.x2) * (py - s.y2);
  const d2 = (px - s.x3) * (s.y2 - s.y3) - (s.x2 - s.x3) * (py - s.y3);
  const d3 = (px - s.x1) * (s.y3 - s.y1) - (s.x3 - s.x1) * (py - s.y1);
  const hasNeg = d1 < 0 || d2 < 0 || d3 < 0;
  const hasPos = d1 > 0 || d2 > 0 || d3 > 0;
  return hasNeg && hasPos ? 0 : 1;
}

export function shapeCoverage(shape: Shape, px: number, py: number): number {
  switch (shape.kind) {
    case "capsule":
      return capsuleCoverage(shape, px, py);
    case "disc":
      return clamp01(shape.r + AA - Math.hypot(px - shape.x, py - shape.y));
    case "triangle":
      return triangleCoverage(shape, px, py);
  }
}

/**
 * Radial falloff for stamps. `hardness` 1 gives a crisp edge; 0 fades
 * linearly from the centre.
 */
export function stampCoverage(distance: number, radius: number, hardness: number): number {
  const outer = radius + AA;
  if (distance >= outer) return 0;
  const inner = radius * clamp01(hardness);
  if (distance <= inner) return 1;
  return (outer - distance) / (outer - inner);
}

export function shapeBounds(shape: Shape): paper.Rectangle {
  switch (shape.kind) {
    case "capsule": {
      const a = new paper.Rectangle(
        new paper.Point(shape.ax - shape.ar, shape.ay - shape.ar),
        new paper.Point(shape.ax + shape.ar, shape.ay + shape.ar),
      );
      const b = new paper.Rectangle(
        new paper.Point(shape.bx - shape.br, shape.by - shape.br),
        new paper.Point(shape.bx + shape.br, shape.by + shape.br),
      );
      return a.unite(b).expand(AA * 2);
    }
    case "disc":
      return new paper.Rectangle(
        new paper.Point(shape.x - shape.r, shape.y - shape.r),
        new paper.Point(shape.x + shape.r, shape.y + shape.r),
      ).expand(AA * 2);
    case "triangle":
      return new paper.Rectangle(
        new paper.Point(Math.min(shape.x1, shape.x2, shape.x3), Math.min(shape.y1, shape.y2, shape.y3)),
        new paper.Point(Math.max(shape.x1, shape.x2, shape.x3), Math.max(shape.y1, shape.y2, shape.y3)),
      );
  }
}

// ============================================================
// Geometry builders
// ============================================================

function squareDot(p: RadiusPoint): Shape[] {
  const { x, y, r } = p;
  return [
    { kind: "triangle", x1: x - r, y1: y - r, x2: x + r, y2: y - r, x3: x + r, y3: y + r },
    { kind: "triangle", x1: x - r, y1: y - r, x2: x + r, y2: y + r, x3: x - r, y3: y + r },
  ];
}

/**
 * Outline a polyline as shapes: one capsule per segment, the stroke cap on the
 * two outer ends, and a join shape at every interior vertex.
 */
export function polylineShapes(points: readonly RadiusPoint[], cap: StrokeCap, join: StrokeJoin): Shape[] {
  const pts: RadiusPoint[] = [];
  for (const p of points) {
    const last = pts[pts.length - 1];
    if (!last || last.x !== p.x || last.y !== p.y) pts.push(p);
  }

  if (pts.length === 0) return [];
  if (pts.length === 1) {
    if (cap === "butt") return [];
    if (cap === "square") return squareDot(pts[0]);
    return [{ kind: "disc", x: pts[0].x, y: pts[0].y, r: pts[0].r }];
  }

  const shapes: Shape[] = [];
  const last = pts.length - 2;

  for (let i = 0; i <= last; i++) {
    let a = new paper.Point(pts[i].x, pts[i].y);
    let b = new paper.Point(pts[i + 1].x, pts[i + 1].y);
    const dir = b.subtract(a).normalize();

    let startCap: "round" | "butt" = "butt";
    let endCap: "round" | "butt" = "butt";
    if (i === 0) {
      if (cap === "round") startCap = "round";
      if (cap === "square") a = a.subtract(dir.multiply(pts[i].r));
    }
    if (i === last) {
      if (cap === "round") endCap = "round";
      if (cap === "square") b = b.add(dir.multiply(pts[i + 1].r));
    }

    shapes.push({
      kind: "capsule",
      ax: a.x,
      ay: a.y,
      ar: pts[i].r,
      bx: b.x,
      by: b.y,
      br: pts[i + 1].r,
      startCap,
      endCap,
    });
  }

  for (let k = 1; k < pts.length - 1; k++) {
    const p = new paper.Point(pts[k].x, pts[k].y);
    const r = pts[k].r;
    if (join === "round") {
      shapes.push({ kind: "disc", x: p.x, y: p.y, r });
      continue;
    }

    const d1 = p.subtract(new paper.Point(pts[k - 1].x, pts[k - 1].y)).normalize();
    const d2 = new paper.Point(pts[k + 1].x, pts[k + 1].y).subtract(p).normalize();
    const n1 = new paper.Point(-d1.y, d1.x).multiply(r);
    const n2 = new paper.Point(-d2.y, d2.x).multiply(r);
    for (const side of [1, -1]) {
      const c1 = p.add(n1.multiply(side));
      const c2 = p.add(n2.multiply(side));
      shapes.push({ kind: "triangle", x1: p.x, y1: p.y, x2: c1.x, y2: c1.y, x3: c2.x, y3: c2.y });
    }
  }

  return shapes;
}

// ============================================================
// Painting
// ============================================================

function applyCoverage(draft: PixelDraft, offset: number, paint: Paint, coverage: number): void {
  if (paint.erase) {
    // erasing strength ignores the paint color, which is transparent for erasers
    erasePixel(draft.data, offset, clamp01(paint.opacity) * coverage);
  } else {
    const alpha = (paint.color.a / 255) * clamp01(paint.opacity) * coverage;
    compositePixel(
      draft.data,
      offset,
      paint.color.r,
      paint.color.g,
      paint.color.b,
      alpha,
      paint.blendMode ?? "normal",
    );
  }
}

interface PixelRange {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

function clipToDraft(draft: PixelDraft, bounds: paper.Rectangle): PixelRange | null {
  const x0 = Math.max(0, Math.floor(bounds.left));
  const y0 = Math.max(0, Math.floor(bounds.top));
  const x1 = Math.min(draft.width - 1, Math.ceil(bounds.right));
  const y1 = Math.min(draft.height - 1, Math.ceil(bounds.bottom));
  if (x0 > x1 || y0 > y1) return null;
  return { x0, y0, x1, y1 };
}

/**
 * Paint shapes as a single coverage union.
 * @returns number of pixels touched
 */
export function paintPath(draft: PixelDraft, shapes: readonly Shape[], paint: Paint): number {
  if (shapes.length === 0) return 0;

  const entries: IndexEntry[] = [];
  let union: paper.Rectangle | null = null;
  for (const shape of shapes) {
    const b = shapeBounds(shape);
    entries.push({ minX: b.left, minY: b.top, maxX: b.right, maxY: b.bottom, shape });
    union = union ? union.unite(b) : b;
  }
  if (!union) return 0;

  const range = clipToDraft(draft, union);
  if (!range) return 0;

  const tree = new RBush<IndexEntry>();
  tree.load(entries);

  let touched = 0;
  for (let y = range.y0; y <= range.y1; y++) {
    const py = y + 0.5;
    for (let x = range.x0; x <= range.x1; x++) {
      const px = x + 0.5;
      const hits = tree.search({ minX: px, minY: py, maxX: px, maxY: py });
      let coverage = 0;
      for (const hit of hits) {
        coverage = Math.max(coverage, shapeCoverage(hit.shape, px, py));
        if (coverage >= 1) break;
      }
      if (coverage > 0) {
        applyCoverage(draft, (y * draft.width + x) * 4, paint, coverage);
        touched++;
      }
    }
  }
  return touched;
}

/**
 * Stamp a filled circle with radial falloff.
 */
export function paintDisc(
  draft: PixelDraft,
  cx: number,
  cy: number,
  radius: number,
  hardness: number,
  paint: Paint,
): number {
  if (radius <= 0) return 0;
  const bounds = new paper.Rectangle(
    new paper.Point(cx - radius, cy - radius),
    new paper.Point(cx + radius, cy + radius),
  ).expand(AA * 2);
  const range = clipToDraft(draft, bounds);
  if (!range) return 0;

  let touched = 0;
  for (let y = range.y0; y <= range.y1; y++) {
    for (let x = range.x0; x <= range.x1; x++) {
      const coverage = stampCoverage(Math.hypot(x + 0.5 - cx, y + 0.5 - cy), radius, hardness);
      if (coverage > 0) {
        applyCoverage(draft, (y * draft.width + x) * 4, paint, coverage);
        touched++;
      }
    }
  }
  return touched;
}

/**
 * Stamp an image scaled (nearest neighbour) into a `side`×`side` square centred
 * on (cx, cy). Image alpha is multiplied by the paint's color alpha and opacity.
 */
export function paintImage(
  draft: PixelDraft,
  image: PixelBuffer,
  cx: number,
  cy: number,
  side: number,
  paint: Paint,
): number {
  if (side <= 0) return 0;
  const left = cx - side / 2;
  const top = cy - side / 2;
  const bounds = new paper.Rectangle(left, top, side, side);
  const range = clipToDraft(draft, bounds);
  if (!range) return 0;

  const src = image.data;
  const opacity = (paint.color.a / 255) * clamp01(paint.opacity);
  let touched = 0;
  for (let y = range.y0; y <= range.y1; y++) {
    const v = Math.floor(((y + 0.5 - top) / side) * image.height);
    if (v < 0 || v >= image.height) continue;
    for (let x = range.x0; x <= range.x1; x++) {
      const u = Math.floor(((x + 0.5 - left) / side) * image.width);
      if (u < 0 || u >= image.width) continue;
      const s = (v * image.width + u) * 4;
      const alpha = (src[s + 3] / 255) * opacity;
      if (alpha <= 0) continue;
      const offset = (y * draft.width + x) * 4;
      compositePixel(draft.data, offset, src[s], src[s + 1], src[s + 2], alpha, paint.blendMode ?? "normal");
      touched++;
    }
  }
  return touched;
}
