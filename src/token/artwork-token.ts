/**
 * A minted artwork token
 *
 * Tokens only exist in their finalized state: the constructor is private and
 * `mint` generates, validates and freezes the shapes before one is returned.
 */

import { assertShapeCollection, generateShapes } from "../generator/index.js";
import type { AmbientContext, DrawFunction, ShapeCollection } from "../generator/index.js";
import { renderSvg } from "../renderer/index.js";

export type MintOptions = {
  tokenId: number;
  seed: bigint;
  context: AmbientContext;
  draw?: DrawFunction;
};

export type TokenSummary = {
  tokenId: number;
  seed: string;
  owner: string;
  mintedAt: string;
  shapeCount: number;
};

export class ArtworkToken {
  private constructor(
    readonly tokenId: number,
    readonly seed: bigint,
    readonly context: AmbientContext,
    readonly shapes: ShapeCollection
  ) {}

  static mint({ tokenId, seed, context, draw }: MintOptions): ArtworkToken {
    if (!Number.isSafeInteger(tokenId) || tokenId < 0) {
      throw new RangeError(`Token id must be a non-negative integer, got ${tokenId}`);
    }
    const shapes = generateShapes(seed, context, draw);
    assertShapeCollection(shapes);
    const token = new ArtworkToken(tokenId, seed, context, shapes);
    Object.freeze(token);
    return token;
  }

  get owner(): string {
    return this.context.identity;
  }

  toSvg(): string {
    return renderSvg(this.shapes);
  }

  describe(): TokenSummary {
    return {
      tokenId: this.tokenId,
      seed: this.seed.toString(),
      owner: this.owner,
      mintedAt: this.context.timestamp.toString(),
      shapeCount: this.shapes.length,
    };
  }
}
