/**
 * Shape generation and invariant checks
 */

import { ShapeInvariantError } from "../errors.js";
import { hashDraw } from "./draw.js";
import type { AmbientContext, DrawFunction, Shape, ShapeCollection, ShapeField } from "./types.js";
import {
  BASE_SHAPE_COUNT,
  MAX_SHAPES,
  MIN_SHAPES,
  SHAPE_BOUNDS,
  SHAPE_COUNT_SPREAD,
  UINT256_MAX,
} from "./types.js";

/**
 * Sequential draws over a counter that starts at the seed. Every draw uses the
 * current counter value and then advances it, wrapping at 2^256.
 */
class DrawSequence {
  private counter: bigint;

  constructor(
    seed: bigint,
    private readonly context: AmbientContext,
    private readonly draw: DrawFunction
  ) {
    this.counter = seed;
  }

  next(upperBound: number): number {
    const localSeed = this.counter;
    this.counter = localSeed === UINT256_MAX ? 0n : localSeed + 1n;
    return this.draw(upperBound, localSeed, this.context);
  }
}

/**
 * Generate the shapes for one mint. Draw order is the count first, then
 * x, y, width, height, red, green, blue for each shape in index order.
 */
export function generateShapes(
  seed: bigint,
  context: AmbientContext,
  draw: DrawFunction = hashDraw
): ShapeCollection {
  const sequence = new DrawSequence(seed, context, draw);
  const count = BASE_SHAPE_COUNT + sequence.next(SHAPE_COUNT_SPREAD);
  const shapes: Shape[] = [];

  for (let i = 0; i < count; i++) {
    const fields: Record<ShapeField, number> = {
      x: 0,
      y: 0,
      width: 0,
      height: 0,
      red: 0,
      green: 0,
      blue: 0,
    };
    for (const [field, bound] of SHAPE_BOUNDS) {
      fields[field] = sequence.next(bound);
    }
    shapes.push(Object.freeze(fields));
  }

  return Object.freeze(shapes);
}

/**
 * Throw unless the collection has a valid length and every field lies in its
 * bound.
 */
export function assertShapeCollection(shapes: ShapeCollection): void {
  if (shapes.length < MIN_SHAPES || shapes.length > MAX_SHAPES) {
    throw new ShapeInvariantError(
      `Shape count ${shapes.length} outside [${MIN_SHAPES}, ${MAX_SHAPES}]`
    );
  }

  shapes.forEach((shape, index) => {
    for (const [field, bound] of SHAPE_BOUNDS) {
      const value = shape[field];
      if (!Number.isInteger(value) || value < 0 || value >= bound) {
        throw new ShapeInvariantError(
          `Shape ${index} field ${field}=${value} outside [0, ${bound})`
        );
      }
    }
  });
}
