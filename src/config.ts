import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { log } from "./log";

// Single dotenv.config() call: prefer the .env at the project root, whether
// running from src/ or a build output directory, else the cwd default.
(() => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const rootEnv = path.resolve(here, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

export type EmbeddingProvider = "local" | "openai";

export interface Config {
  DOCUMENT_ROOTS: string[];
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  /** Persisted vector index; in-memory only when undefined. */
  INDEX_STORE_PATH: string | undefined;
  /** Persisted hash ledger; in-memory only when undefined. */
  LEDGER_PATH: string | undefined;
  EMBEDDING_PROVIDER: EmbeddingProvider;
  /** Local transformers model; undefined falls back to the embeddings default. */
  MODEL_NAME: string | undefined;
  OPENAI_API_KEY: string | undefined;
  OPENAI_BASE_URL: string | undefined;
  CHAT_MODEL: string;
  OPENAI_EMBEDDING_MODEL: string;
  /** Retries after the first attempt for every external call. */
  RETRY_MAX_ATTEMPTS: number;
  TOP_K: number;
  INGEST_ON_START: boolean;
  MCP_TRANSPORT: string;
}

const DEFAULT_CHUNK_SIZE = 800;
const MAX_CHUNK_SIZE = 8000;
const DEFAULT_CHUNK_OVERLAP = 120;

function list(raw: string | undefined): string[] | undefined {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items?.length ? items : undefined;
}

function flag(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function int(raw: string | undefined, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

function text(raw: string | undefined): string | undefined {
  return raw?.trim() || undefined;
}

/**
 * Parse configuration from an environment map. Pure apart from warnings, so
 * it can be exercised without touching process.env.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const DOCUMENT_ROOTS = (list(env.DOCUMENT_ROOTS) ?? [process.cwd()]).map((r) => path.resolve(r));

  const ALLOWED_EXT = (
    list(env.ALLOWED_EXT) ?? ["md", "markdown", "txt", "rst", "adoc", "csv", "json", "yaml", "yml", "xml", "html", "htm", "pdf", "docx"]
  ).map((e) => e.toLowerCase().replace(/^\./, ""));

  // Folder names (not globs) pruned during traversal.
  const EXCLUDED_FOLDERS = list(env.EXCLUDED_FOLDERS) ?? [
    "node_modules",
    "dist",
    "build",
    ".git",
    ".cache",
    ".rag",
    "coverage",
  ];

  const VERBOSE = flag(env.VERBOSE, false);

  const CHUNK_SIZE = int(env.CHUNK_SIZE, DEFAULT_CHUNK_SIZE, 1, MAX_CHUNK_SIZE);
  let CHUNK_OVERLAP = int(env.CHUNK_OVERLAP, DEFAULT_CHUNK_OVERLAP, 0);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.floor(CHUNK_SIZE * 0.15);
    log.warn(`CHUNK_OVERLAP (${CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${CHUNK_SIZE}); using ${fallback}`);
    CHUNK_OVERLAP = fallback;
  }

  const INDEX_STORE_PATH = text(env.INDEX_STORE_PATH);
  // The ledger only makes sense next to a persisted index: a ledger that
  // outlives its index would mark every document unchanged after a restart.
  let LEDGER_PATH = text(env.LEDGER_PATH);
  if (!INDEX_STORE_PATH && LEDGER_PATH) {
    log.warn("LEDGER_PATH is ignored without INDEX_STORE_PATH; the ledger stays in memory");
    LEDGER_PATH = undefined;
  } else if (INDEX_STORE_PATH && !LEDGER_PATH) {
    LEDGER_PATH = INDEX_STORE_PATH.replace(/\.json$/i, "") + ".ledger.json";
  }

  const providerRaw = (env.EMBEDDING_PROVIDER ?? "").trim().toLowerCase();
  let EMBEDDING_PROVIDER: EmbeddingProvider = "local";
  if (providerRaw === "openai") EMBEDDING_PROVIDER = "openai";
  else if (providerRaw && providerRaw !== "local") {
    log.warn(`Unknown EMBEDDING_PROVIDER '${providerRaw}'; using local`);
  }

  return {
    DOCUMENT_ROOTS,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    VERBOSE,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    INDEX_STORE_PATH,
    LEDGER_PATH,
    EMBEDDING_PROVIDER,
    MODEL_NAME: text(env.MODEL_NAME),
    OPENAI_API_KEY: text(env.OPENAI_API_KEY),
    OPENAI_BASE_URL: text(env.OPENAI_BASE_URL),
    CHAT_MODEL: text(env.CHAT_MODEL) ?? "gpt-4o-mini",
    OPENAI_EMBEDDING_MODEL: text(env.OPENAI_EMBEDDING_MODEL) ?? "text-embedding-3-small",
    RETRY_MAX_ATTEMPTS: int(env.RETRY_MAX_ATTEMPTS, 3, 0, 10),
    TOP_K: int(env.TOP_K, 3, 1, 50),
    INGEST_ON_START: flag(env.INGEST_ON_START, true),
    // 'stdio' (default) or 'http' / 'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
  };
}

export function getConfig(): Config {
  const config = parseConfig(process.env);
  log.setVerbose(config.VERBOSE);
  return config;
}
