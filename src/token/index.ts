export { ArtworkToken } from "./artwork-token.js";
export type { MintOptions, TokenSummary } from "./artwork-token.js";
export { TokenRegistry, FIRST_TOKEN_ID } from "./token-registry.js";
