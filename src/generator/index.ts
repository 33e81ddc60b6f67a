/**
 * Generator module - seeded shape generation
 */

export { generateShapes, assertShapeCollection } from "./shape-generator.js";
export {
  hashDraw,
  encodeDrawInput,
  digestToBigInt,
  DRAW_HASH_ALGORITHM,
  DRAW_INPUT_LENGTH,
} from "./draw.js";
export {
  parseSeed,
  parseTimestamp,
  normalizeIdentity,
  createAmbientContext,
  liveAmbientContext,
} from "./inputs.js";

export type {
  Shape,
  ShapeCollection,
  ShapeField,
  AmbientContext,
  DrawFunction,
} from "./types.js";
export {
  SHAPE_BOUNDS,
  BASE_SHAPE_COUNT,
  SHAPE_COUNT_SPREAD,
  MIN_SHAPES,
  MAX_SHAPES,
  UINT256_MAX,
} from "./types.js";
