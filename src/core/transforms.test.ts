import { describe, expect, it } from "vitest";
import {
  applyTransform,
  crop,
  flipHorizontal,
  flipVertical,
  isValidTransform,
  resize,
  rotate,
  transformLabel,
} from "./transforms";
import { PixelBuffer } from "./pixel-buffer";

// Four distinguishable opaque pixels
const A = [1, 0, 0, 255];
const B = [2, 0, 0, 255];
const C = [3, 0, 0, 255];
const D = [4, 0, 0, 255];

function image(width: number, height: number, pixels: number[][]): PixelBuffer {
  return PixelBuffer.from(width, height, new Uint8ClampedArray(pixels.flat()));
}

function pixels(buffer: PixelBuffer): number[][] {
  const bytes = Array.from(buffer.bytes());
  const out: number[][] = [];
  for (let i = 0; i < bytes.length; i += 4) out.push(bytes.slice(i, i + 4));
  return out;
}

describe("flips", () => {
  it("mirrors left to right", () => {
    expect(pixels(flipHorizontal(image(2, 2, [A, B, C, D])))).toEqual([B, A, D, C]);
  });

  it("mirrors top to bottom", () => {
    expect(pixels(flipVertical(image(2, 2, [A, B, C, D])))).toEqual([C, D, A, B]);
  });
});

describe("rotate", () => {
  it("turns a quarter clockwise exactly", () => {
    expect(pixels(rotate(image(2, 2, [A, B, C, D]), 90))).toEqual([C, A, D, B]);
  });

  it("turns a half", () => {
    expect(pixels(rotate(image(2, 1, [A, B]), 180))).toEqual([B, A]);
  });

  it("keeps the image after a full turn", () => {
    const source = image(2, 2, [A, B, C, D]);
    expect(rotate(source, 360).equals(source)).toBe(true);
  });

  it("leaves corners rotated in from outside transparent", () => {
    const out = rotate(image(4, 2, [A, A, A, A, B, B, B, B]), 90);
    expect(out.size).toEqual({ width: 4, height: 2 });
    expect(out.getPixel(0, 0)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });
});

describe("crop", () => {
  it("cuts the rectangle, clamped to the image", () => {
    const out = crop(image(2, 2, [A, B, C, D]), { x: 1, y: 0, width: 5, height: 5 });
    expect(out?.size).toEqual({ width: 1, height: 2 });
    expect(out && pixels(out)).toEqual([B, D]);
  });

  it("returns null when the rectangle misses the image", () => {
    expect(crop(image(2, 2, [A, B, C, D]), { x: 5, y: 5, width: 2, height: 2 })).toBeNull();
  });
});

describe("resize", () => {
  it("fits inside the box keeping proportions", () => {
    const out = resize(image(2, 1, [A, B]), 4, 4);
    expect(out.size).toEqual({ width: 4, height: 2 });
    expect(pixels(out).slice(0, 4)).toEqual([A, A, B, B]);
  });

  it("stretches to the box when proportions are not kept", () => {
    const out = resize(image(2, 1, [A, B]), 4, 4, false);
    expect(out.size).toEqual({ width: 4, height: 4 });
    expect(out.getPixel(3, 3)).toEqual({ r: 2, g: 0, b: 0, a: 255 });
  });

  it("samples the nearest source pixel when shrinking", () => {
    const out = resize(image(4, 1, [A, B, C, D]), 2, 2);
    expect(out.size).toEqual({ width: 2, height: 1 });
    expect(pixels(out)).toEqual([B, D]);
  });
});

describe("applyTransform", () => {
  it("dispatches by kind", () => {
    const source = image(2, 1, [A, B]);
    expect(applyTransform(source, { kind: "flipHorizontal" })?.equals(flipHorizontal(source))).toBe(true);
    expect(applyTransform(source, { kind: "crop", rect: { x: 0, y: 0, width: 1, height: 1 } })?.size).toEqual({
      width: 1,
      height: 1,
    });
  });

  it("rejects unusable parameters", () => {
    expect(isValidTransform({ kind: "rotate", degrees: Number.POSITIVE_INFINITY })).toBe(false);
    expect(isValidTransform({ kind: "resize", width: 4, height: -1 })).toBe(false);
    expect(isValidTransform({ kind: "crop", rect: { x: 0, y: 0, width: 0, height: 3 } })).toBe(false);
    expect(isValidTransform({ kind: "flipVertical" })).toBe(true);
  });

  it("names each transform for history", () => {
    expect(transformLabel({ kind: "rotate", degrees: 90 })).toBe("Rotate");
    expect(transformLabel({ kind: "resize", width: 1, height: 1 })).toBe("Resize");
  });
});
