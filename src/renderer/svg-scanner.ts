/**
 * Read shapes back out of rendered artwork markup
 */

import type { Shape } from "../generator/types.js";
import { SVG_FOOTER, SVG_HEADER } from "./render-types.js";

const RECT_PATTERN =
  /<rect x="(\d+)" y="(\d+)" width="(\d+)" height="(\d+)" style="fill:rgb\((\d+),(\d+),(\d+)\)"\/>/g;

export function isArtworkSvg(svg: string): boolean {
  return svg.startsWith(SVG_HEADER) && svg.endsWith(SVG_FOOTER);
}

/**
 * Rectangles in document order. Anything that is not a rect element in our
 * own format is skipped.
 */
export function scanSvgShapes(svg: string): Shape[] {
  const shapes: Shape[] = [];
  for (const match of svg.matchAll(RECT_PATTERN)) {
    const [, x, y, width, height, red, green, blue] = match.map((group) => Number(group));
    shapes.push({ x, y, width, height, red, green, blue });
  }
  return shapes;
}
