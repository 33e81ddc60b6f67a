/**
 * HTTP Server for serving token artwork
 *
 * Runs alongside the MCP server so clients can fetch SVG files by URL
 * instead of unpacking them from tool results. Read-only: tokens are minted
 * through MCP or the CLI.
 */

import http from "http";
import { TokenNotFoundError } from "./errors.js";
import { SVG_MIME_TYPE } from "./renderer/index.js";
import type { TokenRegistry } from "./token/index.js";
import { config } from "./shared-config.js";

const MAX_PORT_ATTEMPTS = 10;

export type HttpResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
};

function text(status: number, body: string): HttpResponse {
  return { status, headers: { "Content-Type": "text/plain" }, body };
}

function json(data: unknown): HttpResponse {
  return {
    status: 200,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(data, null, 2),
  };
}

function parseTokenId(segment: string): number | null {
  if (!/^\d+$/.test(segment)) return null;
  const tokenId = Number(segment);
  return Number.isSafeInteger(tokenId) ? tokenId : null;
}

function parsePathname(target: string): string | null {
  try {
    return new URL(target, `http://localhost:${config.httpPort}`).pathname;
  } catch {
    return null;
  }
}

/**
 * Route one request target against the registry.
 *
 * GET /tokens
 * GET /token/:id/svg (or /token/:id.svg)
 * GET /token/:id/shapes
 */
export function handleHttpRequest(
  registry: TokenRegistry,
  method: string,
  target: string
): HttpResponse {
  if (method !== "GET" && method !== "HEAD") {
    return {
      status: 405,
      headers: { "Content-Type": "text/plain", Allow: "GET, HEAD" },
      body: "Method not allowed",
    };
  }

  const pathname = parsePathname(target);
  if (pathname === null) {
    return text(400, `Invalid request target: ${target}`);
  }
  const parts = pathname.split("/").filter(Boolean);

  try {
    if (parts[0] === "tokens" && parts.length === 1) {
      return json(registry.list().map((token) => token.describe()));
    }

    if (parts[0] === "token" && (parts.length === 2 || parts.length === 3)) {
      let idSegment = parts[1];
      let resource = parts[2];
      if (parts.length === 2 && idSegment.endsWith(".svg")) {
        idSegment = idSegment.slice(0, -".svg".length);
        resource = "svg";
      }

      const tokenId = parseTokenId(idSegment);
      if (tokenId === null) {
        return text(400, `Invalid token id: ${idSegment}`);
      }

      if (resource === "svg") {
        const svg = registry.renderSvg(tokenId);
        return {
          status: 200,
          headers: {
            "Content-Type": SVG_MIME_TYPE,
            "Cache-Control": "public, max-age=31536000", // Artwork never changes after mint
          },
          body: svg,
        };
      }

      if (resource === "shapes") {
        const token = registry.get(tokenId);
        return json({ tokenId, shapes: token.shapes });
      }
    }

    return text(404, "Not found");
  } catch (error) {
    if (error instanceof TokenNotFoundError) {
      return text(404, error.message);
    }
    console.error("HTTP server error:", error);
    return text(500, `Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function createHttpServer(registry: TokenRegistry): http.Server {
  return http.createServer((req, res) => {
    const method = req.method ?? "GET";
    const response = handleHttpRequest(registry, method, req.url ?? "/");

    res.writeHead(response.status, {
      ...response.headers,
      "Content-Length": Buffer.byteLength(response.body),
      "Access-Control-Allow-Origin": "*",
    });
    res.end(method === "HEAD" ? undefined : response.body);
  });
}

/**
 * Listen on the configured port, moving up when it is busy. Resolves with the
 * port in use, or null when no port could be bound.
 */
export function startHttpServer(registry: TokenRegistry): Promise<number | null> {
  const server = createHttpServer(registry);

  return new Promise((resolve) => {
    function tryListen(port: number, attempt: number): void {
      server.once("error", (err: NodeJS.ErrnoException) => {
        if (err.code === "EADDRINUSE" && attempt < MAX_PORT_ATTEMPTS) {
          // Port is busy, try the next one
          const nextPort = port + 1;
          console.error(`Port ${port} in use, trying ${nextPort}...`);
          tryListen(nextPort, attempt + 1);
        } else {
          // Give up; the MCP server keeps running without HTTP
          console.error(`HTTP server error: ${err.message}`);
          resolve(null);
        }
      });

      server.listen(port, () => {
        config.httpPort = port;
        console.error(`HTTP artwork server running on http://localhost:${port}`);
        resolve(port);
      });
    }

    tryListen(config.httpPort, 1);
  });
}
