/**
 * MCP Server for minted artwork
 *
 * Provides tools for:
 * - Minting tokens from a seed
 * - Reading a token's SVG or its shapes
 * - Listing minted tokens
 * - Previewing artwork for a pinned context without minting
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import {
  createAmbientContext,
  generateShapes,
  liveAmbientContext,
  parseSeed,
  parseTimestamp,
} from "../generator/index.js";
import { CANVAS_SIZE, SVG_MIME_TYPE, renderSvg, toSvgDataUrl } from "../renderer/index.js";
import type { TokenRegistry } from "../token/index.js";
import { config } from "../shared-config.js";

const RESOURCE_PREFIX = "artwork://tokens/";

type ToolArguments = Record<string, unknown> | undefined;

function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

function errorResult(text: string) {
  return { content: [{ type: "text" as const, text }], isError: true };
}

function requireTokenId(args: ToolArguments): number {
  const value = args?.["tokenId"];
  if (typeof value === "string" && !/^\d+$/.test(value.trim())) {
    throw new Error(`tokenId must be a non-negative integer, got "${value}"`);
  }
  const tokenId = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof tokenId !== "number" || !Number.isSafeInteger(tokenId) || tokenId < 0) {
    throw new Error(`tokenId must be a non-negative integer, got ${String(value)}`);
  }
  return tokenId;
}

function optionalString(args: ToolArguments, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${key} must be a string`);
  }
  return value;
}

function resourceUri(tokenId: number): string {
  return `${RESOURCE_PREFIX}${tokenId}/svg`;
}

function tokenUrl(tokenId: number): string {
  return `http://localhost:${config.httpPort}/token/${tokenId}/svg`;
}

/**
 * Create and configure the MCP server
 */
export function createServer(registry: TokenRegistry): Server {
  const server = new Server(
    {
      name: "shapemint",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "mint_token",
          description:
            "Mint a new artwork token. Shapes are generated once from the seed, the current time and the owner address, and never change afterwards.",
          inputSchema: {
            type: "object",
            properties: {
              seed: {
                type: "string",
                description: "Unsigned integer seed, decimal or 0x-prefixed hex",
              },
              owner: {
                type: "string",
                description: "Owner address (0x + 40 hex digits). Defaults to the server identity.",
              },
            },
            required: ["seed"],
          },
        },
        {
          name: "get_token_svg",
          description: "Get the SVG markup of a minted token, also as a base64 data URL.",
          inputSchema: {
            type: "object",
            properties: {
              tokenId: {
                type: "number",
                description: "Token id returned by mint_token",
              },
            },
            required: ["tokenId"],
          },
        },
        {
          name: "get_token_shapes",
          description: "Get the rectangle descriptors of a minted token, in drawing order.",
          inputSchema: {
            type: "object",
            properties: {
              tokenId: {
                type: "number",
                description: "Token id returned by mint_token",
              },
            },
            required: ["tokenId"],
          },
        },
        {
          name: "list_tokens",
          description: "List all minted tokens with their seed, owner and shape count.",
          inputSchema: {
            type: "object",
            properties: {},
          },
        },
        {
          name: "preview_artwork",
          description:
            "Render the artwork a seed would produce for a given owner and timestamp, without minting. Same inputs always give the same SVG.",
          inputSchema: {
            type: "object",
            properties: {
              seed: {
                type: "string",
                description: "Unsigned integer seed, decimal or 0x-prefixed hex",
              },
              owner: {
                type: "string",
                description: "Owner address. Defaults to the server identity.",
              },
              timestamp: {
                type: "number",
                description: "Unix time in seconds (default: now)",
              },
            },
            required: ["seed"],
          },
        },
      ],
    };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case "mint_token": {
          const seed = parseSeed(args?.["seed"]);
          const owner = optionalString(args, "owner") ?? config.identity;
          const token = registry.mint(seed, liveAmbientContext(owner));
          console.error(`Minted token ${token.tokenId} (${token.shapes.length} shapes)`);
          return textResult(
            JSON.stringify(
              {
                ...token.describe(),
                resourceUri: resourceUri(token.tokenId),
                url: tokenUrl(token.tokenId),
              },
              null,
              2
            )
          );
        }

        case "get_token_svg": {
          const tokenId = requireTokenId(args);
          if (!registry.has(tokenId)) {
            return errorResult(`Token not found: ${tokenId}`);
          }
          const svg = registry.renderSvg(tokenId);
          return textResult(
            JSON.stringify(
              {
                tokenId,
                format: "svg",
                width: CANVAS_SIZE,
                height: CANVAS_SIZE,
                mimeType: SVG_MIME_TYPE,
                svg,
                dataUrl: toSvgDataUrl(svg),
              },
              null,
              2
            )
          );
        }

        case "get_token_shapes": {
          const tokenId = requireTokenId(args);
          if (!registry.has(tokenId)) {
            return errorResult(`Token not found: ${tokenId}`);
          }
          const token = registry.get(tokenId);
          return textResult(
            JSON.stringify({ tokenId, shapes: token.shapes }, null, 2)
          );
        }

        case "list_tokens": {
          const tokens = registry.list().map((token) => token.describe());
          return textResult(JSON.stringify({ count: tokens.length, tokens }, null, 2));
        }

        case "preview_artwork": {
          const seed = parseSeed(args?.["seed"]);
          const owner = optionalString(args, "owner") ?? config.identity;
          const timestamp = args?.["timestamp"];
          const context =
            timestamp === undefined || timestamp === null
              ? liveAmbientContext(owner)
              : createAmbientContext(parseTimestamp(timestamp), owner);
          const shapes = generateShapes(seed, context);
          return textResult(
            JSON.stringify(
              {
                seed: seed.toString(),
                owner: context.identity,
                timestamp: context.timestamp.toString(),
                shapeCount: shapes.length,
                svg: renderSvg(shapes),
              },
              null,
              2
            )
          );
        }

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return errorResult(`Error: ${message}`);
    }
  });

  // List resources (one per minted token)
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: registry.list().map((token) => ({
        uri: resourceUri(token.tokenId),
        name: `Token ${token.tokenId}`,
        mimeType: SVG_MIME_TYPE,
      })),
    };
  });

  // List resource templates
  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return {
      resourceTemplates: [
        {
          uriTemplate: `${RESOURCE_PREFIX}{tokenId}/svg`,
          name: "Token Artwork",
          description: "SVG artwork of a minted token.",
          mimeType: SVG_MIME_TYPE,
        },
      ],
    };
  });

  // Read resource
  // Format: artwork://tokens/{tokenId}/svg
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const uri = request.params.uri;
    const match = uri.match(/^artwork:\/\/tokens\/(\d+)\/svg$/);

    if (match) {
      const tokenId = Number(match[1]);
      return {
        contents: [
          {
            uri,
            mimeType: SVG_MIME_TYPE,
            text: registry.renderSvg(tokenId),
          },
        ],
      };
    }

    throw new Error(`Resource not found: ${uri}`);
  });

  return server;
}

/**
 * Start the MCP server
 */
export async function startServer(registry: TokenRegistry): Promise<void> {
  const server = createServer(registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("shapemint MCP server started");
}
