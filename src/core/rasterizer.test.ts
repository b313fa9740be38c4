import { describe, expect, it } from "vitest";
import { PixelBuffer } from "./pixel-buffer";
import { BLACK, TRANSPARENT } from "./color";
import {
  type CapsuleShape,
  paintDisc,
  paintImage,
  paintPath,
  polylineShapes,
  shapeCoverage,
  stampCoverage,
} from "./rasterizer";

const RED = { r: 255, g: 0, b: 0, a: 255 };
const GREEN = { r: 0, g: 255, b: 0, a: 255 };

describe("coverage", () => {
  it("stamps with a hard core and soft edge", () => {
    expect(stampCoverage(0, 5, 1)).toBe(1);
    expect(stampCoverage(5.5, 5, 1)).toBe(0);
    expect(stampCoverage(2.75, 5, 0)).toBeCloseTo(0.5);
  });

  it("anti-aliases disc edges over half a pixel", () => {
    expect(shapeCoverage({ kind: "disc", x: 0, y: 0, r: 2 }, 2, 0)).toBeCloseTo(0.5);
    expect(shapeCoverage({ kind: "disc", x: 0, y: 0, r: 2 }, 1, 0)).toBe(1);
  });

  it("cuts butt capsule ends flat", () => {
    const capsule: CapsuleShape = {
      kind: "capsule",
      ax: 0,
      ay: 0,
      ar: 2,
      bx: 10,
      by: 0,
      br: 2,
      startCap: "butt",
      endCap: "round",
    };
    expect(shapeCoverage(capsule, -1, 0)).toBe(0);
    expect(shapeCoverage(capsule, 11, 0)).toBe(1);
    expect(shapeCoverage(capsule, 5, 1)).toBe(1);
    expect(shapeCoverage(capsule, 5, 2.25)).toBeCloseTo(0.25);
  });
});

describe("polylineShapes", () => {
  it("turns a single point into a dot per cap style", () => {
    const p = [{ x: 5, y: 5, r: 2 }];
    expect(polylineShapes(p, "round", "round")).toEqual([{ kind: "disc", x: 5, y: 5, r: 2 }]);
    expect(polylineShapes(p, "butt", "round")).toEqual([]);
    expect(polylineShapes(p, "square", "round").map((s) => s.kind)).toEqual(["triangle", "triangle"]);
  });

  it("adds one join per interior vertex", () => {
    const pts = [
      { x: 0, y: 0, r: 1 },
      { x: 5, y: 0, r: 1 },
      { x: 5, y: 5, r: 1 },
    ];
    expect(polylineShapes(pts, "round", "round").map((s) => s.kind)).toEqual(["capsule", "capsule", "disc"]);
    expect(polylineShapes(pts, "round", "bevel").map((s) => s.kind)).toEqual([
      "capsule",
      "capsule",
      "triangle",
      "triangle",
    ]);
  });

  it("drops repeated points", () => {
    const shapes = polylineShapes(
      [
        { x: 0, y: 0, r: 1 },
        { x: 0, y: 0, r: 1 },
        { x: 4, y: 0, r: 1 },
      ],
      "round",
      "round",
    );
    expect(shapes).toHaveLength(1);
    expect(shapes[0]).toMatchObject({ kind: "capsule", startCap: "round", endCap: "round" });
  });

  it("extends square caps past the endpoints", () => {
    const [shape] = polylineShapes(
      [
        { x: 2, y: 0, r: 1 },
        { x: 6, y: 0, r: 1 },
      ],
      "square",
      "round",
    );
    expect(shape).toMatchObject({ kind: "capsule", ax: 1, bx: 7, startCap: "butt", endCap: "butt" });
  });
});

describe("painting", () => {
  it("paints a path once even where its pieces overlap", () => {
    const draft = PixelBuffer.draft(10, 10);
    const disc = { kind: "disc" as const, x: 5, y: 5, r: 2 };
    paintPath(draft, [disc, disc], { color: BLACK, opacity: 0.5 });
    const out = draft.publish();

    expect(out.getPixel(5, 5)).toEqual({ r: 0, g: 0, b: 0, a: 128 });
    expect(out.getPixel(0, 0)).toEqual(TRANSPARENT);
  });

  it("accumulates separate stamps", () => {
    const draft = PixelBuffer.draft(10, 10);
    paintDisc(draft, 5, 5, 2, 1, { color: BLACK, opacity: 0.5 });
    const once = draft.getPixel(5, 5);
    paintDisc(draft, 5, 5, 2, 1, { color: BLACK, opacity: 0.5 });
    const twice = draft.getPixel(5, 5);

    expect(once?.a).toBe(128);
    expect(twice?.a).toBeGreaterThan(128);
  });

  it("erases without regard to the paint color", () => {
    const draft = PixelBuffer.draft(10, 10, RED);
    paintPath(draft, [{ kind: "disc", x: 5, y: 5, r: 2 }], { color: TRANSPARENT, opacity: 1, erase: true });
    const out = draft.publish();

    expect(out.getPixel(5, 5)).toEqual(TRANSPARENT);
    expect(out.getPixel(0, 0)).toEqual(RED);
  });

  it("clips to the draft", () => {
    const draft = PixelBuffer.draft(4, 4);
    expect(paintDisc(draft, -20, -20, 3, 1, { color: BLACK, opacity: 1 })).toBe(0);
    expect(paintPath(draft, [{ kind: "disc", x: 40, y: 40, r: 2 }], { color: BLACK, opacity: 1 })).toBe(0);
  });

  it("stamps images scaled into a square", () => {
    const image = PixelBuffer.create(2, 2, GREEN);
    const draft = PixelBuffer.draft(4, 4);
    const touched = paintImage(draft, image, 2, 2, 4, { color: BLACK, opacity: 1 });
    const out = draft.publish();

    expect(touched).toBe(16);
    expect(out.getPixel(0, 0)).toEqual(GREEN);
    expect(out.getPixel(3, 3)).toEqual(GREEN);
  });
});
