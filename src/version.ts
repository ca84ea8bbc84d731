import pkg from "../package.json" with { type: "json" };

/** Reported by the MCP handshake and the status tool. */
export const APP_VERSION: string = pkg.version;
