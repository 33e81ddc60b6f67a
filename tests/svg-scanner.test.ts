import { describe, it, expect } from "vitest";
import { createAmbientContext, generateShapes } from "../src/generator/index.js";
import { isArtworkSvg, renderSvg, scanSvgShapes } from "../src/renderer/index.js";

const context = createAmbientContext(1_650_000_000n, "0x00000000000000000000000000000000000000c0");

describe("scanSvgShapes", () => {
  it("recovers generated shapes in order", () => {
    for (const seed of [0n, 1n, 77n, 123456789n]) {
      const shapes = generateShapes(seed, context);
      expect(scanSvgShapes(renderSvg(shapes))).toEqual(shapes);
    }
  });

  it("reads a single rectangle", () => {
    const svg = '<svg><rect x="10" y="20" width="5" height="8" style="fill:rgb(255,0,0)"/></svg>';
    expect(scanSvgShapes(svg)).toEqual([
      { x: 10, y: 20, width: 5, height: 8, red: 255, green: 0, blue: 0 },
    ]);
  });

  it("skips rectangles in other formats", () => {
    const svg = '<svg><rect x="1" y="2" width="3" height="4" fill="#fff"/><circle r="4"/></svg>';
    expect(scanSvgShapes(svg)).toEqual([]);
  });
});

describe("isArtworkSvg", () => {
  it("accepts rendered artwork", () => {
    expect(isArtworkSvg(renderSvg(generateShapes(5n, context)))).toBe(true);
  });

  it("rejects other documents", () => {
    expect(isArtworkSvg('<svg xmlns="http://www.w3.org/2000/svg"></svg>')).toBe(false);
    expect(isArtworkSvg("Not found")).toBe(false);
  });
});
