/**
 * Renderer module - SVG markup for generated shapes
 */

export { renderSvg, renderRect, toSvgDataUrl } from "./svg-serializer.js";
export { scanSvgShapes, isArtworkSvg } from "./svg-scanner.js";
export {
  CANVAS_SIZE,
  SVG_HEADER,
  SVG_FOOTER,
  SVG_MIME_TYPE,
  SVG_NAMESPACE,
  XLINK_NAMESPACE,
} from "./render-types.js";
