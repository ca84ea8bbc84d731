/**
 * Application entry point.
 *
 * 1. Load configuration (.env + environment).
 * 2. Build the embedding service (local transformers model or OpenAI) and the
 *    optional completion service.
 * 3. Open the local vector index and the hash ledger (persisted when
 *    INDEX_STORE_PATH is set).
 * 4. Start an MCP server over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http, which also serves /health).
 * 5. Run an ingestion pass over every DOCUMENT_ROOTS entry unless
 *    INGEST_ON_START=false. SIGINT cancels a running pass; the pass still
 *    reconciles what it saw before the process exits.
 *
 * Tools:
 *  - ask    : answer a question from the indexed documents (needs OPENAI_API_KEY).
 *  - search : raw top-k chunks for a query.
 *  - ingest : run an ingestion pass now and return its report.
 *  - status : pipeline state, counters and index size.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { ChangeDetector } from "./change-detector";
import { ChatHistory } from "./chat-history";
import { getConfig, type Config } from "./config";
import { createDocumentTypes } from "./document-types";
import { EmbeddingStage } from "./embedding-stage";
import { Embeddings } from "./embeddings";
import {
  AuthorizationError,
  IndexNotReadyError,
  IngestionInProgressError,
  describeError,
} from "./errors";
import { IndexSynchronizer } from "./index-synchronizer";
import { IngestionPipeline, type IngestionReport } from "./ingestion";
import { JsonHashLedger, MemoryHashLedger } from "./ledger";
import { log } from "./log";
import { OpenAICompletions, OpenAIEmbeddings } from "./openai";
import { COMPLETION_TIMEOUT_MS, QueryOrchestrator } from "./orchestrator";
import { ResiliencePolicy } from "./resilience";
import { FileSystemSource } from "./sources/filesystem";
import { statusManager } from "./status";
import { LocalVectorIndex } from "./vector-store";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import type { EmbeddingService } from "./types";
import { APP_VERSION } from "./version";

const config: Config = getConfig();
const {
  DOCUMENT_ROOTS,
  ALLOWED_EXT,
  EXCLUDED_FOLDERS,
  CHUNK_SIZE,
  CHUNK_OVERLAP,
  INDEX_STORE_PATH,
  LEDGER_PATH,
  EMBEDDING_PROVIDER,
  MODEL_NAME,
  OPENAI_API_KEY,
  OPENAI_BASE_URL,
  CHAT_MODEL,
  OPENAI_EMBEDDING_MODEL,
  RETRY_MAX_ATTEMPTS,
  TOP_K,
  INGEST_ON_START,
  MCP_TRANSPORT,
} = config;

// Embedding service. The local model is loaded eagerly so a bad model name
// fails at startup rather than inside the first tool call.
let embeddingService: EmbeddingService;
if (EMBEDDING_PROVIDER === "openai") {
  embeddingService = new OpenAIEmbeddings(
    { apiKey: OPENAI_API_KEY ?? "", baseURL: OPENAI_BASE_URL },
    OPENAI_EMBEDDING_MODEL,
  );
} else {
  await Embeddings.configureCache();
  const local = new Embeddings(MODEL_NAME);
  await local.init();
  embeddingService = local;
}

const completion = OPENAI_API_KEY
  ? new OpenAICompletions({ apiKey: OPENAI_API_KEY, baseURL: OPENAI_BASE_URL }, CHAT_MODEL)
  : null;
if (!completion) log.warn("OPENAI_API_KEY is not set; the ask tool is disabled.");

const retry = { maxRetries: RETRY_MAX_ATTEMPTS };
const index = new LocalVectorIndex({ modelName: embeddingService.modelName, storePath: INDEX_STORE_PATH });
// Surfaces an index built with another model before anything is served.
await index.open();

const changeDetector = new ChangeDetector(LEDGER_PATH ? new JsonHashLedger(LEDGER_PATH) : new MemoryHashLedger());
const embeddingStage = new EmbeddingStage(embeddingService, ResiliencePolicy.dataPath(retry));
const synchronizer = new IndexSynchronizer(index, changeDetector, {
  administrative: ResiliencePolicy.administrative(retry),
  dataPath: ResiliencePolicy.dataPath(retry),
});
const pipeline = new IngestionPipeline({
  changeDetector,
  embeddingStage,
  synchronizer,
  chunking: { chunkSize: CHUNK_SIZE, overlap: CHUNK_OVERLAP },
  status: statusManager,
});
const orchestrator = completion
  ? new QueryOrchestrator(completion, embeddingStage, synchronizer, {
      policy: ResiliencePolicy.dataPath({ ...retry, timeoutMs: COMPLETION_TIMEOUT_MS }),
      topK: TOP_K,
    })
  : null;

const documentTypes = createDocumentTypes(ALLOWED_EXT);
const sources = DOCUMENT_ROOTS.map(
  (root) => new FileSystemSource({ root, allowedExt: ALLOWED_EXT, excludedFolders: EXCLUDED_FOLDERS, documentTypes }),
);

statusManager.setSources(sources.map((s) => s.prefix));
statusManager.setModelName(embeddingService.modelName);
// A persisted index can answer queries before the first pass completes.
if (await index.exists()) statusManager.markReady();

let activeRun: { controller: AbortController; done: Promise<IngestionReport> } | null = null;

/** Start a pass over every source; rejects while another pass is running. */
function startIngestion(): Promise<IngestionReport> {
  if (activeRun) return Promise.reject(new IngestionInProgressError());
  const controller = new AbortController();
  const done = pipeline.run(sources, controller.signal).finally(() => {
    activeRun = null;
  });
  activeRun = { controller, done };
  return done;
}

function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof IngestionInProgressError) return new McpError(ErrorCode.InvalidRequest, e.message);
  if (e instanceof IndexNotReadyError || e instanceof AuthorizationError) {
    return new McpError(ErrorCode.InternalError, e.message);
  }
  return new McpError(ErrorCode.InternalError, describeError(e));
}

function stringArg(args: Record<string, unknown> | undefined, name: string): string {
  const v = args?.[name];
  if (typeof v !== "string" || !v.trim()) {
    throw new McpError(ErrorCode.InvalidRequest, `Missing ${name}`);
  }
  return v;
}

function numberArg(args: Record<string, unknown> | undefined, name: string, fallback: number): number {
  const v = args?.[name];
  if (v === undefined) return fallback;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new McpError(ErrorCode.InvalidRequest, `${name} must be a number`);
  }
  return v;
}

function textResult(value: unknown) {
  const text = typeof value === "string" ? value : JSON.stringify(value, null, 2);
  return { content: [{ type: "text" as const, text }] };
}

/**
 * Build a fresh MCP Server. One per transport session; the index, pipeline
 * and services are shared, the chat history belongs to the session.
 */
function createServer(): Server {
  const server = new Server({ name: "rag-sync-server", version: APP_VERSION }, { capabilities: { tools: {} } });
  const history = new ChatHistory();

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "ask",
        description:
          "Answer a question using only the indexed documents. The last few questions of this session are used to resolve follow-ups.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "The question, in natural language." },
          },
          required: ["query"],
        },
      },
      {
        name: "search",
        description: "Return the indexed chunks closest to a query, with their document references.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Natural language search query." },
            top_k: {
              type: "number",
              description: `Number of chunks to return (1-50). Defaults to ${TOP_K}.`,
              minimum: 1,
              maximum: 50,
            },
          },
          required: ["query"],
        },
      },
      {
        name: "ingest",
        description:
          "Run an ingestion pass over every document root now: new and changed documents are indexed, deleted ones removed.",
        inputSchema: { type: "object", properties: {} },
      },
      {
        name: "status",
        description: "Report ingestion state, counters from the last pass and the index size.",
        inputSchema: { type: "object", properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req, extra) => {
    const args = req.params.arguments;
    try {
      switch (req.params.name) {
        case "ask": {
          const query = stringArg(args, "query");
          if (!orchestrator) {
            throw new McpError(ErrorCode.InvalidRequest, "The ask tool needs OPENAI_API_KEY to be set");
          }
          return textResult(await orchestrator.ask(query, history, extra.signal));
        }
        case "search": {
          const query = stringArg(args, "query");
          const k = Math.max(1, Math.min(50, Math.floor(numberArg(args, "top_k", TOP_K))));
          const vector = await embeddingStage.embedQuery(query, extra.signal);
          const hits = await synchronizer.search(vector, k, extra.signal);
          return textResult({
            matches: hits.map((h) => ({ documentReference: h.documentReference, content: h.content })),
          });
        }
        case "ingest":
          return textResult(await startIngestion());
        case "status":
          return textResult({ ...statusManager.getStatus(), indexedChunks: await index.size() });
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      log.debug(`Tool ${req.params.name} failed: ${describeError(e)}`);
      throw toMcpError(e);
    }
  });

  return server;
}

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";
let closeTransport: () => Promise<void>;
if (useHttp) {
  statusManager.markTransport("http");
  const listener = await startHttpTransport(createServer);
  closeTransport = () =>
    new Promise<void>((resolve) => {
      listener.close(() => resolve());
      // Open SSE streams would otherwise keep close() waiting.
      listener.closeAllConnections();
    });
} else {
  statusManager.markTransport("stdio");
  const server = await startStdioTransport(createServer);
  closeTransport = () => server.close();
}

let shuttingDown = false;
async function shutdown(): Promise<void> {
  const run = activeRun;
  if (run) {
    log.info("Cancelling ingestion; reconciling what was processed so far...");
    run.controller.abort();
    await run.done.catch((e: unknown) => log.error("Ingestion failed during shutdown:", describeError(e)));
  }
  await closeTransport();
}

process.on("SIGINT", () => {
  if (shuttingDown) {
    log.warn("Second interrupt; exiting immediately.");
    process.exit(130);
  }
  shuttingDown = true;
  shutdown().then(
    () => process.exit(0),
    (e: unknown) => {
      log.error("Shutdown failed:", describeError(e));
      process.exit(1);
    },
  );
});

if (INGEST_ON_START) {
  try {
    await startIngestion();
  } catch (e) {
    // The server keeps serving; a later `ingest` call can retry.
    log.error("Startup ingestion failed:", describeError(e));
  }
}
