import fs from "node:fs/promises";
import path from "node:path";
import { env, pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import { log } from "./log";
import type { EmbeddingService, Vector } from "./types";

export const DEFAULT_LOCAL_MODEL = "Xenova/all-MiniLM-L6-v2";

/** Where downloaded models are kept: `cacheDir`, then TRANSFORMERS_CACHE, then ./.cache/transformers. */
export function resolveModelCacheDir(cacheDir?: string, envDir = process.env.TRANSFORMERS_CACHE): string {
  return path.resolve(cacheDir?.trim() || envDir?.trim() || ".cache/transformers");
}

/**
 * Local embedding service backed by a transformers feature-extraction
 * pipeline (mean pooling + L2 normalization). The model is loaded lazily on
 * the first embed() call, or eagerly via {@link init}.
 */
export class Embeddings implements EmbeddingService {
  public readonly modelName: string;
  private embedder: Promise<FeatureExtractionPipeline> | null = null;

  public constructor(modelName?: string) {
    // Resolution precedence: explicit ctor arg > MODEL_NAME env var > default model
    this.modelName = modelName?.trim() || process.env.MODEL_NAME?.trim() || DEFAULT_LOCAL_MODEL;
  }

  /**
   * Point the transformers file cache at {@link resolveModelCacheDir}. Call
   * before the first model load.
   */
  public static async configureCache(cacheDir?: string): Promise<string> {
    const dir = resolveModelCacheDir(cacheDir);
    await fs.mkdir(dir, { recursive: true });
    env.cacheDir = dir;
    env.useBrowserCache = false;
    env.allowLocalModels = true;
    log.info(`Model cache: ${dir}`);
    return dir;
  }

  /** Load the underlying pipeline (idempotent; concurrent callers share one load). */
  public async init(): Promise<void> {
    await this.getEmbedder();
  }

  /**
   * Embed one text. Inputs past the model's context are truncated by its
   * tokenizer. The pipeline runs in process and cannot be interrupted, so
   * the signal is only checked before starting.
   */
  public async embed(text: string, signal?: AbortSignal): Promise<Vector> {
    signal?.throwIfAborted();
    const embedder = await this.getEmbedder();
    const output = await embedder(text, { pooling: "mean", normalize: true });
    if (!(output.data instanceof Float32Array)) {
      throw new Error(`Model ${this.modelName} did not return float32 embeddings`);
    }
    return output.data;
  }

  private getEmbedder(): Promise<FeatureExtractionPipeline> {
    if (!this.embedder) {
      log.info(`Loading embedding model: ${this.modelName}`);
      this.embedder = pipeline("feature-extraction", this.modelName).then((p) => {
        log.info(`Model ready: ${this.modelName}`);
        return p;
      });
      // A failed load must not poison later attempts.
      this.embedder.catch(() => {
        this.embedder = null;
      });
    }
    return this.embedder;
  }
}
