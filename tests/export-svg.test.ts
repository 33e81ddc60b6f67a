import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { exportTokenSvg, fetchTokenSvg, parseTokenIdArg } from "../src/export-svg.js";
import { createAmbientContext, generateShapes } from "../src/generator/index.js";
import { renderSvg } from "../src/renderer/index.js";

const svg = renderSvg(
  generateShapes(11n, createAmbientContext(1_700_000_000n, "0x0000000000000000000000000000000000000011"))
);

describe("parseTokenIdArg", () => {
  it("accepts non-negative integers", () => {
    expect(parseTokenIdArg("0")).toBe(0);
    expect(parseTokenIdArg("12")).toBe(12);
  });

  it("rejects negative, fractional, blank and missing ids", () => {
    expect(parseTokenIdArg("-1")).toBeNull();
    expect(parseTokenIdArg("1.5")).toBeNull();
    expect(parseTokenIdArg("")).toBeNull();
    expect(parseTokenIdArg(undefined)).toBeNull();
  });
});

describe("fetchTokenSvg", () => {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    new Response(svg, { status: 200 })
  );

  beforeEach(() => {
    fetchMock.mockClear();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests the token's SVG path", async () => {
    await expect(fetchTokenSvg(1, "http://example.test/")).resolves.toBe(svg);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://example.test/token/1/svg");
  });

  it("includes the server's message on failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Token not found: 3", { status: 404 }));

    await expect(fetchTokenSvg(3, "http://example.test")).rejects.toThrow(
      "Request for token 3 failed with 404: Token not found: 3"
    );
  });

  it("refuses negative token ids without a request", async () => {
    await expect(fetchTokenSvg(-1, "http://example.test")).rejects.toThrow(RangeError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects responses that are not artwork", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html></html>", { status: 200 }));

    await expect(fetchTokenSvg(1, "http://example.test")).rejects.toThrow(
      "Response for token 1 is not artwork SVG"
    );
  });
});

describe("exportTokenSvg", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "shapemint-"));
    vi.stubGlobal("fetch", vi.fn(async () => new Response(svg, { status: 200 })));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the markup verbatim", async () => {
    const outPath = join(dir, "token-1.svg");
    const bytes = await exportTokenSvg(1, outPath, "http://example.test");

    expect(await readFile(outPath, "utf-8")).toBe(svg);
    expect(bytes).toBe(Buffer.byteLength(svg));
  });
});
