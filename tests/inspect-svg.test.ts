import { describe, it, expect } from "vitest";
import { formatShapeTable } from "../src/inspect-svg.js";

describe("formatShapeTable", () => {
  it("prints one aligned row per shape", () => {
    const table = formatShapeTable([
      { x: 10, y: 20, width: 5, height: 8, red: 255, green: 0, blue: 0 },
      { x: 0, y: 49, width: 29, height: 0, red: 1, green: 2, blue: 3 },
    ]);

    expect(table.split("\n")).toEqual([
      "  #    x   y   w   h  fill",
      "  0   10  20   5   8  rgb(255,0,0)",
      "  1    0  49  29   0  rgb(1,2,3)",
    ]);
  });

  it("prints only the header for no shapes", () => {
    expect(formatShapeTable([])).toBe("  #    x   y   w   h  fill");
  });
});
