import { describe, expect, it } from "vitest";
import { applyFilter, filterMatrix, isFilterType } from "./filters";
import { PixelBuffer } from "./pixel-buffer";

function single(r: number, g: number, b: number, a: number): PixelBuffer {
  return PixelBuffer.from(1, 1, [r, g, b, a]);
}

describe("filters", () => {
  it("converts to luma-weighted gray", () => {
    expect(applyFilter(single(255, 0, 0, 255), "grayscale").getPixel(0, 0)).toEqual({ r: 54, g: 54, b: 54, a: 255 });
  });

  it("inverts color and keeps alpha", () => {
    expect(applyFilter(single(10, 20, 30, 200), "invert").getPixel(0, 0)).toEqual({ r: 245, g: 235, b: 225, a: 200 });
  });

  it("treats 0.5 as neutral for the tonal filters", () => {
    const px = single(100, 150, 200, 255);
    expect(applyFilter(px, "brightness", 0.5).equals(px)).toBe(true);
    expect(applyFilter(px, "contrast", 0.5).equals(px)).toBe(true);
    expect(applyFilter(px, "saturation", 0.5).equals(px)).toBe(true);
  });

  it("brightens and flattens", () => {
    const px = single(100, 100, 100, 255);
    expect(applyFilter(px, "brightness", 0.6).getPixel(0, 0)).toEqual({ r: 151, g: 151, b: 151, a: 255 });
    expect(applyFilter(px, "contrast", 0).getPixel(0, 0)).toEqual({ r: 128, g: 128, b: 128, a: 255 });
  });

  it("desaturates fully like grayscale", () => {
    const px = single(255, 0, 0, 255);
    expect(applyFilter(px, "saturation", 0).equals(applyFilter(px, "grayscale"))).toBe(true);
  });

  it("leaves the original at zero intensity", () => {
    expect(filterMatrix("sepia", 0)).toEqual(filterMatrix("grayscale", 0));
    const px = single(12, 34, 56, 78);
    expect(applyFilter(px, "sepia", 0).equals(px)).toBe(true);
  });

  it("skips fully transparent pixels and keeps dimensions", () => {
    const source = PixelBuffer.create(3, 2);
    const out = applyFilter(source, "invert");
    expect(out.size).toEqual({ width: 3, height: 2 });
    expect(out.isBlank()).toBe(true);
    expect(out.getPixel(0, 0)).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });

  it("recognizes filter names", () => {
    expect(isFilterType("sepia")).toBe(true);
    expect(isFilterType("blur")).toBe(false);
  });
});
