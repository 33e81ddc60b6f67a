/**
 * Hash-based bounded draws
 *
 * Each draw hashes the ambient timestamp, the caller identity and a local seed
 * packed as 32 + 20 + 32 bytes, reads the SHA-256 digest as an unsigned
 * big-endian integer and reduces it modulo the bound.
 */

import { createHash } from "node:crypto";
import type { AmbientContext, DrawFunction } from "./types.js";
import { UINT256_MAX } from "./types.js";

export const DRAW_HASH_ALGORITHM = "sha256";
export const DRAW_INPUT_LENGTH = 32 + 20 + 32;

function writeUint256(target: Uint8Array, offset: number, value: bigint): void {
  if (value < 0n || value > UINT256_MAX) {
    throw new RangeError(`Value out of uint256 range: ${value}`);
  }
  let remaining = value;
  for (let i = 31; i >= 0; i--) {
    target[offset + i] = Number(remaining & 0xffn);
    remaining >>= 8n;
  }
}

function writeAddress(target: Uint8Array, offset: number, identity: string): void {
  const hex = identity.startsWith("0x") ? identity.slice(2) : identity;
  if (!/^[0-9a-fA-F]{40}$/.test(hex)) {
    throw new RangeError(`Identity is not a 20-byte address: ${identity}`);
  }
  for (let i = 0; i < 20; i++) {
    target[offset + i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
}

/**
 * Pack the hash input for one draw.
 */
export function encodeDrawInput(context: AmbientContext, localSeed: bigint): Uint8Array {
  const bytes = new Uint8Array(DRAW_INPUT_LENGTH);
  writeUint256(bytes, 0, context.timestamp);
  writeAddress(bytes, 32, context.identity);
  writeUint256(bytes, 52, localSeed);
  return bytes;
}

export function digestToBigInt(digest: Uint8Array): bigint {
  let value = 0n;
  for (const byte of digest) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

export const hashDraw: DrawFunction = (upperBound, localSeed, context) => {
  if (!Number.isSafeInteger(upperBound) || upperBound <= 0) {
    throw new RangeError(`Draw bound must be a positive integer, got ${upperBound}`);
  }
  const digest = createHash(DRAW_HASH_ALGORITHM)
    .update(encodeDrawInput(context, localSeed))
    .digest();
  return Number(digestToBigInt(digest) % BigInt(upperBound));
};
