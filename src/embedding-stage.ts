import { chunk } from "./chunker";
import { ResiliencePolicy } from "./resilience";
import type { ChunkingOptions, EmbeddingService, TextChunk, Vector } from "./types";

/**
 * Chunk + embed. Every embedding call goes through the data-path resilience
 * policy. Per document the stage is all-or-nothing: either every non-empty
 * chunk comes back embedded, or the error propagates and nothing is returned.
 */
export class EmbeddingStage {
  private readonly policy: ResiliencePolicy;

  public constructor(
    private readonly embeddings: EmbeddingService,
    policy: ResiliencePolicy = ResiliencePolicy.dataPath(),
  ) {
    this.policy = policy.named("embedding");
  }

  public get modelName(): string {
    return this.embeddings.modelName;
  }

  /** Ingestion path: chunk `fullText` and embed each non-empty chunk. */
  public async embed(
    fullText: string,
    documentReference: string,
    options: ChunkingOptions,
    signal?: AbortSignal,
  ): Promise<TextChunk[]> {
    const chunks = chunk(fullText, documentReference, options).filter((c) => c.content.length > 0);
    const embedded: TextChunk[] = [];
    for (const c of chunks) {
      const embedding = await this.embedText(c.content, signal);
      embedded.push({ ...c, embedding });
    }
    return embedded;
  }

  /** Query path: one vector for one text. */
  public embedQuery(text: string, signal?: AbortSignal): Promise<Vector> {
    return this.embedText(text, signal);
  }

  private embedText(text: string, signal?: AbortSignal): Promise<Vector> {
    return this.policy.execute((s) => this.embeddings.embed(text, s), signal);
  }
}
