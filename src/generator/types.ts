/**
 * Shared types and bounds for shape generation
 */

export type Shape = {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly red: number;
  readonly green: number;
  readonly blue: number;
};

export type ShapeCollection = readonly Shape[];

export type ShapeField = keyof Shape;

/**
 * Values read from the environment at mint time. `timestamp` is whole seconds
 * since the Unix epoch; `identity` is a 20-byte address as 0x-prefixed hex.
 */
export type AmbientContext = {
  readonly timestamp: bigint;
  readonly identity: string;
};

export type DrawFunction = (
  upperBound: number,
  localSeed: bigint,
  context: AmbientContext
) => number;

export const BASE_SHAPE_COUNT = 5;
export const SHAPE_COUNT_SPREAD = 5;
export const MIN_SHAPES = BASE_SHAPE_COUNT;
export const MAX_SHAPES = BASE_SHAPE_COUNT + SHAPE_COUNT_SPREAD - 1;

/** Exclusive upper bound of each field, in draw order. */
export const SHAPE_BOUNDS: ReadonlyArray<readonly [ShapeField, number]> = [
  ["x", 50],
  ["y", 50],
  ["width", 30],
  ["height", 30],
  ["red", 256],
  ["green", 256],
  ["blue", 256],
];

export const UINT256_MAX = (1n << 256n) - 1n;
