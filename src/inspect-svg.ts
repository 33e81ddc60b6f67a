/**
 * SVG Inspector - print the shapes stored in an artwork file
 *
 * Usage:
 *   shapemint inspect <file.svg> [summary|json]
 */

import { readFile } from "fs/promises";
import type { Shape } from "./generator/index.js";
import { isArtworkSvg, scanSvgShapes } from "./renderer/index.js";

export function formatShapeTable(shapes: readonly Shape[]): string {
  const lines = ["  #    x   y   w   h  fill"];
  shapes.forEach((shape, index) => {
    const cells = [shape.x, shape.y, shape.width, shape.height].map((value) =>
      String(value).padStart(3)
    );
    lines.push(
      `  ${String(index).padEnd(2)} ${cells.join(" ")}  rgb(${shape.red},${shape.green},${shape.blue})`
    );
  });
  return lines.join("\n");
}

export async function runInspect(args: string[]): Promise<void> {
  const filePath = args[0];
  const command = args[1] ?? "summary";

  if (!filePath) {
    console.error("Usage: shapemint inspect <file.svg> [summary|json]");
    process.exit(1);
  }

  try {
    const svg = await readFile(filePath, "utf-8");
    const shapes = scanSvgShapes(svg);

    switch (command) {
      case "summary": {
        if (!isArtworkSvg(svg)) {
          console.log("Warning: file does not look like shapemint artwork");
        }
        console.log(`Shapes: ${shapes.length}`);
        console.log(formatShapeTable(shapes));
        break;
      }

      case "json": {
        console.log(JSON.stringify(shapes, null, 2));
        break;
      }

      default:
        console.error(`Unknown command: ${command}`);
        process.exit(1);
    }
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
