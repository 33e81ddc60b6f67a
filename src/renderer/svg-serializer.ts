/**
 * SVG serialization of a shape collection
 */

import type { Shape, ShapeCollection } from "../generator/types.js";
import { SVG_FOOTER, SVG_HEADER } from "./render-types.js";

export function renderRect(shape: Shape): string {
  const fill = `rgb(${shape.red},${shape.green},${shape.blue})`;
  return `<rect x="${shape.x}" y="${shape.y}" width="${shape.width}" height="${shape.height}" style="fill:${fill}"/>`;
}

/**
 * Render shapes in collection order inside the fixed 64x64 canvas.
 */
export function renderSvg(shapes: ShapeCollection): string {
  const parts: string[] = [SVG_HEADER];
  for (const shape of shapes) {
    parts.push(renderRect(shape));
  }
  parts.push(SVG_FOOTER);
  return parts.join("");
}

/**
 * Encode rendered markup as a data URL, e.g. for an `image` metadata field.
 */
export function toSvgDataUrl(svg: string): string {
  return `data:image/svg+xml;base64,${Buffer.from(svg, "utf-8").toString("base64")}`;
}
