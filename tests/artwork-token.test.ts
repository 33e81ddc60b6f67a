import { describe, it, expect } from "vitest";
import { createAmbientContext, generateShapes } from "../src/generator/index.js";
import type { DrawFunction } from "../src/generator/index.js";
import { renderSvg } from "../src/renderer/index.js";
import { ArtworkToken } from "../src/token/index.js";
import { ShapeInvariantError } from "../src/errors.js";

const OWNER = "0x00000000000000000000000000000000000000ab";
const context = createAmbientContext(1_700_000_000n, OWNER);

describe("ArtworkToken.mint", () => {
  it("generates the shapes once from seed and context", () => {
    const token = ArtworkToken.mint({ tokenId: 1, seed: 42n, context });

    expect(token.shapes).toEqual(generateShapes(42n, context));
    expect(token.owner).toBe(OWNER);
  });

  it("returns a frozen token", () => {
    const token = ArtworkToken.mint({ tokenId: 1, seed: 42n, context });
    expect(Object.isFrozen(token)).toBe(true);
    expect(Object.isFrozen(token.shapes)).toBe(true);
  });

  it("refuses to create a token with out-of-bound shapes", () => {
    const overflow: DrawFunction = (upperBound) => upperBound;
    expect(() => ArtworkToken.mint({ tokenId: 1, seed: 0n, context, draw: overflow })).toThrow(
      ShapeInvariantError
    );
  });

  it("refuses a field one past its bound", () => {
    let calls = 0;
    const draw: DrawFunction = (upperBound) => {
      calls++;
      // count draw, then shape 0: x y w h red
      return calls === 6 ? upperBound : 0;
    };
    expect(() => ArtworkToken.mint({ tokenId: 1, seed: 0n, context, draw })).toThrow(
      "Shape 0 field red=256 outside [0, 256)"
    );
  });

  it("rejects negative token ids", () => {
    expect(() => ArtworkToken.mint({ tokenId: -1, seed: 0n, context })).toThrow(RangeError);
  });
});

describe("ArtworkToken queries", () => {
  const token = ArtworkToken.mint({ tokenId: 3, seed: 99n, context });

  it("renders the stored shapes", () => {
    expect(token.toSvg()).toBe(renderSvg(token.shapes));
  });

  it("renders byte-identical text on repeated calls", () => {
    expect(token.toSvg()).toBe(token.toSvg());
  });

  it("describes itself with decimal strings", () => {
    expect(token.describe()).toEqual({
      tokenId: 3,
      seed: "99",
      owner: OWNER,
      mintedAt: "1700000000",
      shapeCount: token.shapes.length,
    });
  });

  it("renders 255 as the literal channel value", () => {
    const draw: DrawFunction = (upperBound) => upperBound - 1;
    const maxed = ArtworkToken.mint({ tokenId: 4, seed: 0n, context, draw });

    expect(maxed.shapes).toHaveLength(9);
    expect(maxed.toSvg()).toContain(
      '<rect x="49" y="49" width="29" height="29" style="fill:rgb(255,255,255)"/>'
    );
    expect(maxed.toSvg()).not.toContain("256");
  });
});
