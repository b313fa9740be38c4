import { describe, expect, it } from "vitest";
import { BLACK, colorsEqual, mixColors, parseHex, rgba, toHex, withOpacity } from "./color";

describe("color", () => {
  it("clamps and rounds channels", () => {
    expect(rgba(300, -4, 12.6)).toEqual({ r: 255, g: 0, b: 13, a: 255 });
    expect(rgba(1, 2, 3, Number.NaN)).toEqual({ r: 1, g: 2, b: 3, a: 0 });
  });

  it("formats hex, with alpha only when not opaque", () => {
    expect(toHex(rgba(255, 128, 0))).toBe("#ff8000");
    expect(toHex(rgba(0, 0, 0, 16))).toBe("#00000010");
  });

  it("parses short, long and alpha hex", () => {
    expect(parseHex("#f80")).toEqual({ r: 255, g: 136, b: 0, a: 255 });
    expect(parseHex("336699")).toEqual({ r: 51, g: 102, b: 153, a: 255 });
    expect(parseHex("#33669980")).toEqual({ r: 51, g: 102, b: 153, a: 128 });
    expect(parseHex("#12")).toBeNull();
    expect(parseHex("#gggggg")).toBeNull();
  });

  it("scales alpha", () => {
    expect(withOpacity(BLACK, 0.5)).toEqual({ r: 0, g: 0, b: 0, a: 128 });
    expect(withOpacity(BLACK, 2)).toEqual(BLACK);
  });

  it("mixes linearly", () => {
    const from = rgba(0, 100, 200, 255);
    const to = rgba(100, 100, 0, 55);
    expect(mixColors(from, to, 0.25)).toEqual({ r: 25, g: 100, b: 150, a: 205 });
    expect(colorsEqual(mixColors(from, to, 1), to)).toBe(true);
    expect(colorsEqual(mixColors(from, to, -1), from)).toBe(true);
  });
});
