import { describe, it, expect } from "vitest";
import type { Shape } from "../src/generator/index.js";
import {
  renderRect,
  renderSvg,
  toSvgDataUrl,
  SVG_FOOTER,
  SVG_HEADER,
} from "../src/renderer/index.js";

const red: Shape = { x: 10, y: 20, width: 5, height: 8, red: 255, green: 0, blue: 0 };
const teal: Shape = { x: 0, y: 49, width: 29, height: 0, red: 0, green: 128, blue: 128 };
const grey: Shape = { x: 3, y: 3, width: 3, height: 3, red: 7, green: 7, blue: 7 };

const collection: Shape[] = [red, teal, grey, grey, grey];

describe("renderRect", () => {
  it("writes five attributes with an rgb fill", () => {
    expect(renderRect(red)).toBe(
      '<rect x="10" y="20" width="5" height="8" style="fill:rgb(255,0,0)"/>'
    );
  });

  it("writes zero and the largest values literally", () => {
    expect(renderRect(teal)).toBe(
      '<rect x="0" y="49" width="29" height="0" style="fill:rgb(0,128,128)"/>'
    );
  });
});

describe("renderSvg", () => {
  it("uses the fixed 64x64 header", () => {
    expect(SVG_HEADER).toBe(
      '<svg width="64" height="64" viewBox="0 0 64 64" xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink">'
    );
  });

  it("wraps the rectangles in collection order", () => {
    const svg = renderSvg(collection);

    expect(svg).toBe(SVG_HEADER + collection.map(renderRect).join("") + SVG_FOOTER);
    expect(svg.startsWith(SVG_HEADER)).toBe(true);
    expect(svg.endsWith("</svg>")).toBe(true);
  });

  it("puts the first shape first", () => {
    const svg = renderSvg(collection);
    const afterHeader = svg.slice(SVG_HEADER.length);

    expect(afterHeader.startsWith(
      '<rect x="10" y="20" width="5" height="8" style="fill:rgb(255,0,0)"/>'
    )).toBe(true);
  });

  it("emits one rect per shape", () => {
    const svg = renderSvg(collection);
    expect(svg.split("<rect ").length - 1).toBe(5);
  });

  it("renders an empty canvas for no shapes", () => {
    expect(renderSvg([])).toBe(SVG_HEADER + SVG_FOOTER);
  });

  it("returns identical text on every call", () => {
    expect(renderSvg(collection)).toBe(renderSvg(collection));
  });
});

describe("toSvgDataUrl", () => {
  it("base64-encodes the markup", () => {
    const url = toSvgDataUrl("<svg></svg>");
    expect(url).toBe("data:image/svg+xml;base64,PHN2Zz48L3N2Zz4=");
  });
});
