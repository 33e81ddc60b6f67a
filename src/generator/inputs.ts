/**
 * Parsing of caller-supplied seeds and identities
 */

import { InvalidIdentityError, InvalidSeedError } from "../errors.js";
import type { AmbientContext } from "./types.js";
import { UINT256_MAX } from "./types.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

function parseUint256(value: unknown, label: string, fail: (message: string) => Error): bigint {
  let parsed: bigint;

  if (typeof value === "bigint") {
    parsed = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw fail(`${label} must be an integer, got ${value}`);
    }
    parsed = BigInt(value);
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^(0x[0-9a-fA-F]+|\d+)$/.test(trimmed)) {
      throw fail(`${label} is not an unsigned integer: "${value}"`);
    }
    parsed = BigInt(trimmed);
  } else {
    throw fail(`${label} must be a number or string, got ${typeof value}`);
  }

  if (parsed < 0n || parsed > UINT256_MAX) {
    throw fail(`${label} out of uint256 range: ${parsed}`);
  }
  return parsed;
}

/**
 * Accept a non-negative safe integer, a bigint, or a decimal / 0x-hex string.
 */
export function parseSeed(value: unknown): bigint {
  return parseUint256(value, "Seed", (message) => new InvalidSeedError(message));
}

/** Unix time in seconds, in the same forms as a seed. */
export function parseTimestamp(value: unknown): bigint {
  return parseUint256(value, "Timestamp", (message) => new RangeError(message));
}

/**
 * Validate an address and return it lowercased.
 */
export function normalizeIdentity(value: string): string {
  const trimmed = value.trim();
  if (!ADDRESS_PATTERN.test(trimmed)) {
    throw new InvalidIdentityError(
      `Identity must be 0x followed by 40 hex digits, got "${value}"`
    );
  }
  return trimmed.toLowerCase();
}

export function createAmbientContext(timestamp: bigint, identity: string): AmbientContext {
  if (timestamp < 0n || timestamp > UINT256_MAX) {
    throw new RangeError(`Timestamp out of uint256 range: ${timestamp}`);
  }
  return Object.freeze({ timestamp, identity: normalizeIdentity(identity) });
}

/**
 * Context for a mint happening now, on behalf of `identity`.
 */
export function liveAmbientContext(identity: string, now: number = Date.now()): AmbientContext {
  return createAmbientContext(BigInt(Math.floor(now / 1000)), identity);
}
