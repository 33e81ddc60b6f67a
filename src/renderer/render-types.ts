/**
 * Shared constants for the SVG renderer modules
 */

export const CANVAS_SIZE = 64;
export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
export const XLINK_NAMESPACE = "http://www.w3.org/1999/xlink";
export const SVG_MIME_TYPE = "image/svg+xml";

export const SVG_HEADER =
  `<svg width="${CANVAS_SIZE}" height="${CANVAS_SIZE}" viewBox="0 0 ${CANVAS_SIZE} ${CANVAS_SIZE}" ` +
  `xmlns="${SVG_NAMESPACE}" xmlns:xlink="${XLINK_NAMESPACE}">`;
export const SVG_FOOTER = "</svg>";
