/**
 * Error types shared by the generator, the token registry and the servers
 */

export class ShapeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShapeInvariantError";
  }
}

export class InvalidSeedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSeedError";
  }
}

export class InvalidIdentityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidIdentityError";
  }
}

export class TokenNotFoundError extends Error {
  readonly tokenId: number;

  constructor(tokenId: number) {
    super(`Token not found: ${tokenId}`);
    this.name = "TokenNotFoundError";
    this.tokenId = tokenId;
  }
}
