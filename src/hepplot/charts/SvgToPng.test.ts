import { describe, it, expect } from "vitest";
import { convertSvgToPng, extractSvgDimensions, rasterWidth } from "./SvgToPng.ts";

describe("extractSvgDimensions", () => {
  it("reads width and height attributes", () => {
    expect(extractSvgDimensions('<svg width="300" height="200" xmlns="http://www.w3.org/2000/svg"></svg>'))
      .toEqual({ width: 300, height: 200 });
  });

  it("falls back to the viewBox", () => {
    expect(extractSvgDimensions('<svg viewBox="0 0 640 480"></svg>')).toEqual({ width: 640, height: 480 });
  });

  it("returns null without an svg element", () => {
    expect(extractSvgDimensions('<div></div>')).toBeNull();
  });
});

describe("rasterWidth", () => {
  it("applies the scale", () => {
    expect(rasterWidth(1500)).toBe(1500);
    expect(rasterWidth(1500, { scale: 2 })).toBe(3000);
  });

  it("prefers dpi over scale", () => {
    expect(rasterWidth(1500, { scale: 3, dpi: 144 })).toBe(3000);
  });

  it("caps the width", () => {
    expect(rasterWidth(1500, { scale: 10 })).toBe(8192);
  });
});

describe("convertSvgToPng", () => {
  it("rasterizes at the requested scale", () => {
    const svg = '<svg width="40" height="20" xmlns="http://www.w3.org/2000/svg"><rect width="40" height="20" fill="#658DCD"/></svg>';
    const png = convertSvgToPng(svg, { scale: 2 });
    expect(png.width).toBe(80);
    expect(png.height).toBe(40);
    expect([...png.data.subarray(1, 4)]).toEqual([0x50, 0x4e, 0x47]);
  });

  it("refuses markup without dimensions", () => {
    expect(() => convertSvgToPng('<g/>')).toThrow('Could not extract SVG dimensions from SVG string');
  });
});
