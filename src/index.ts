#!/usr/bin/env node
/**
 * shapemint - Main entry point
 *
 * Mints tokens whose artwork is generated once from a seed and served as SVG
 * over MCP and HTTP.
 */

import open from "open";
import { writeFile } from "fs/promises";
import { startServer } from "./mcp/server.js";
import { startHttpServer } from "./http-server.js";
import { exportTokenSvg, parseTokenIdArg } from "./export-svg.js";
import { runInspect } from "./inspect-svg.js";
import { liveAmbientContext, parseSeed } from "./generator/index.js";
import { TokenRegistry } from "./token/index.js";
import { config } from "./shared-config.js";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

// Get package.json for version
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8")
);

/**
 * Remove `--name value` from args and return the value.
 */
function takeOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    console.error(`Missing value for ${name}`);
    process.exit(1);
  }
  args.splice(index, 2);
  return value;
}

const args = process.argv.slice(2);
const owner = takeOption(args, "--owner") ?? config.identity;
const command = args[0];

if (command === "--version" || command === "-v") {
  console.log(pkg.version);
  process.exit(0);
}

if (command === "--help" || command === "-h" || command === "help") {
  console.log(`
shapemint v${pkg.version} - generative SVG artwork tokens

Usage:
  shapemint                                 Start MCP server (for AI assistants) and HTTP server
  shapemint mint <seed> [out.svg]           Generate artwork now and print or save it
  shapemint viewer <seed> [port]            Mint a token and open its SVG in the browser
  shapemint export <tokenId> <out.svg> [url] Download a token's SVG from a running server
  shapemint inspect <file.svg> [command]    Show the shapes stored in an SVG file

Inspect commands:
  summary  - Shape table (default)
  json     - Shapes as JSON

Options:
  --owner <address>   Minting identity (default: $SHAPEMINT_IDENTITY or the zero address)
  --help, -h          Show this help
  --version, -v       Show version

Environment:
  SHAPEMINT_HTTP_PORT  First port the HTTP server tries (default: 3847)
  SHAPEMINT_IDENTITY   Default owner address

Examples:
  shapemint mint 42 art.svg                 # Save freshly generated artwork
  shapemint viewer 42 8080                  # Serve token 1 on port 8080
  shapemint export 1 token-1.svg            # Save token 1 from the local server
`);
  process.exit(0);
}

async function main(): Promise<void> {
  if (command === "mint") {
    const seedArg = args[1];
    const outPath = args[2];
    if (!seedArg) {
      console.error("Usage: shapemint mint <seed> [out.svg] [--owner <address>]");
      process.exit(1);
    }

    const registry = new TokenRegistry();
    const token = registry.mint(parseSeed(seedArg), liveAmbientContext(owner));
    const svg = token.toSvg();
    if (outPath) {
      await writeFile(outPath, svg, "utf-8");
      console.error(`Saved ${token.shapes.length} shapes to ${outPath}`);
    } else {
      console.log(svg);
    }
  } else if (command === "viewer") {
    const seedArg = args[1];
    if (!seedArg) {
      console.error("Usage: shapemint viewer <seed> [port] [--owner <address>]");
      process.exit(1);
    }
    if (args[2]) {
      const port = parseInt(args[2], 10);
      if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        console.error(`Invalid port: ${args[2]}`);
        process.exit(1);
      }
      config.httpPort = port;
    }

    const registry = new TokenRegistry();
    const token = registry.mint(parseSeed(seedArg), liveAmbientContext(owner));
    const port = await startHttpServer(registry);
    if (port === null) {
      process.exit(1);
    }
    await open(`http://localhost:${port}/token/${token.tokenId}/svg`);
  } else if (command === "export") {
    const tokenId = parseTokenIdArg(args[1]);
    const outPath = args[2];
    if (tokenId === null || !outPath) {
      console.error("Usage: shapemint export <tokenId> <out.svg> [baseUrl]");
      process.exit(1);
    }

    const bytes = await exportTokenSvg(tokenId, outPath, args[3]);
    console.error(`Saved token ${tokenId} to ${outPath} (${bytes} bytes)`);
  } else if (command === "inspect") {
    await runInspect(args.slice(1));
  } else if (!command) {
    const registry = new TokenRegistry();

    // Start HTTP server for artwork serving
    await startHttpServer(registry);

    // Exit when stdin closes (MCP client disconnected)
    process.stdin.on("close", () => {
      process.exit(0);
    });

    // Start MCP server
    await startServer(registry);
  } else {
    console.error(`Unknown command: ${command}`);
    console.error("Run 'shapemint --help' for usage information.");
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
