import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { log } from "../log";

/**
 * Serve a single session over stdin/stdout. All logging goes to stderr, so
 * stdout carries nothing but protocol frames.
 *
 * @returns The connected server, for shutdown.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Serving over stdio");
  return server;
}
