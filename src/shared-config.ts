/**
 * Shared configuration state for the shapemint servers
 *
 * This module avoids circular imports between http-server and mcp/server
 */

export const DEFAULT_HTTP_PORT = 3847;
export const ZERO_IDENTITY = "0x0000000000000000000000000000000000000000";

export type SharedConfig = {
  httpPort: number;
  /** Caller identity used when a mint request names no owner. */
  identity: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SharedConfig {
  const port = parseInt(env["SHAPEMINT_HTTP_PORT"] ?? "", 10);
  return {
    httpPort: Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_HTTP_PORT,
    identity: env["SHAPEMINT_IDENTITY"]?.trim() || ZERO_IDENTITY,
  };
}

export const config: SharedConfig = loadConfig();
