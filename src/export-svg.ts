/**
 * Download a token's artwork from a running shapemint HTTP server and save it
 * as an .svg file
 */

import { writeFile } from "fs/promises";
import { SVG_MIME_TYPE, isArtworkSvg } from "./renderer/index.js";
import { config } from "./shared-config.js";

export function defaultBaseUrl(): string {
  return `http://localhost:${config.httpPort}`;
}

/**
 * Token id from a command-line argument, or null unless it is a non-negative
 * integer.
 */
export function parseTokenIdArg(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const tokenId = Number(value.trim());
  return Number.isSafeInteger(tokenId) ? tokenId : null;
}

export async function fetchTokenSvg(
  tokenId: number,
  baseUrl: string = defaultBaseUrl()
): Promise<string> {
  if (!Number.isSafeInteger(tokenId) || tokenId < 0) {
    throw new RangeError(`Token id must be a non-negative integer, got ${tokenId}`);
  }
  const url = `${baseUrl.replace(/\/+$/, "")}/token/${tokenId}/svg`;
  const response = await fetch(url, { headers: { Accept: SVG_MIME_TYPE } });

  if (!response.ok) {
    const detail = (await response.text()).trim();
    throw new Error(
      `Request for token ${tokenId} failed with ${response.status}${detail ? `: ${detail}` : ""}`
    );
  }

  const svg = await response.text();
  if (!isArtworkSvg(svg)) {
    throw new Error(`Response for token ${tokenId} is not artwork SVG`);
  }
  return svg;
}

/**
 * Fetch and write the SVG verbatim. Returns the number of bytes written.
 */
export async function exportTokenSvg(
  tokenId: number,
  outPath: string,
  baseUrl?: string
): Promise<number> {
  const svg = await fetchTokenSvg(tokenId, baseUrl);
  await writeFile(outPath, svg, "utf-8");
  return Buffer.byteLength(svg);
}
