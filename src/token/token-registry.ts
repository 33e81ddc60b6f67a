/**
 * In-memory registry of minted tokens, keyed by sequential id
 */

import { TokenNotFoundError } from "../errors.js";
import type { AmbientContext, DrawFunction } from "../generator/index.js";
import { ArtworkToken } from "./artwork-token.js";

export const FIRST_TOKEN_ID = 1;

export class TokenRegistry {
  private readonly tokens = new Map<number, ArtworkToken>();
  private nextTokenId = FIRST_TOKEN_ID;

  constructor(private readonly draw?: DrawFunction) {}

  /**
   * Mint a token under the next id. The id is only consumed when minting
   * succeeds.
   */
  mint(seed: bigint, context: AmbientContext): ArtworkToken {
    const token = ArtworkToken.mint({
      tokenId: this.nextTokenId,
      seed,
      context,
      draw: this.draw,
    });
    this.tokens.set(token.tokenId, token);
    this.nextTokenId++;
    return token;
  }

  has(tokenId: number): boolean {
    return this.tokens.has(tokenId);
  }

  get(tokenId: number): ArtworkToken {
    const token = this.tokens.get(tokenId);
    if (!token) {
      throw new TokenNotFoundError(tokenId);
    }
    return token;
  }

  renderSvg(tokenId: number): string {
    return this.get(tokenId).toSvg();
  }

  list(): ArtworkToken[] {
    return Array.from(this.tokens.values());
  }

  get size(): number {
    return this.tokens.size;
  }
}
