/**
 * Streamable HTTP transport.
 *
 * One MCP Server + transport pair per session. A client opens a session by
 * POSTing an `initialize` request to /mcp without an `mcp-session-id` header;
 * every later request carries the id the transport handed back.
 *
 * Endpoints:
 *  - POST   /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET    /mcp    : server-to-client stream for an existing session.
 *  - DELETE /mcp    : session teardown.
 *  - GET    /health : status snapshot (pipeline state, counters, readiness).
 *
 * Environment:
 *  MCP_PORT                         port to bind (default 3000)
 *  HOST                             interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS                    comma-separated host[:port] allow list
 *  ENABLE_DNS_REBINDING_PROTECTION  "false" disables the host check
 *
 * Sessions live in memory only; they are dropped when their transport closes.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../errors";
import { log } from "../log";
import { statusManager } from "../status";

function jsonRpcError(res: express.Response, status: number, code: number, message: string) {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

/**
 * Bind the HTTP listener. Resolves with the underlying node server once it
 * is listening, so the caller can close it on shutdown.
 *
 * @param createServer Factory producing a new, unconnected Server per session.
 */
export async function startHttpTransport(createServer: () => Server) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  );
  const allowedHosts = (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const enableDnsRebindingProtection = (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false";

  /** Active session transports keyed by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports.set(sid, transport);
        log.debug(`HTTP session opened: ${sid}`);
      },
      enableDnsRebindingProtection,
      allowedHosts,
    });

    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      if (closing) return;
      closing = true;
      if (transport.sessionId) {
        transports.delete(transport.sessionId);
        log.debug(`HTTP session closed: ${transport.sessionId}`);
      }
      // server.close() closes the transport again, which would re-enter here.
      transport.onclose = undefined;
      server.close().catch((e: unknown) => log.warn("Closing session server failed:", describeError(e)));
    };
    await server.connect(transport);
    return transport;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = req.header("mcp-session-id");
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession();
      }

      if (!transport) {
        jsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      log.error("HTTP POST error:", err);
      if (!res.headersSent) jsonRpcError(res, 500, -32603, "Internal server error");
    }
  });

  // GET and DELETE are only valid for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = req.header("mcp-session-id");
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      log.error(`HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  return new Promise<ReturnType<typeof app.listen>>((resolve) => {
    const listener = app.listen(port, host, () => {
      log.info(`Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve(listener);
    });
  });
}
