import { Readable } from "node:stream";
import { createDocumentInfo } from "../src/document-info";
import { TextDocumentType, resolveDocumentType } from "../src/document-types";
import { ResiliencePolicy, type ResilienceOptions } from "../src/resilience";
import type {
  ChatMessage,
  CompletionResult,
  CompletionService,
  DocumentInfo,
  DocumentSource,
  DocumentType,
  EmbeddingService,
  Vector,
} from "../src/types";

/** Policy with no real waiting between retries. */
export function fastPolicy(overrides: Partial<ResilienceOptions> = {}): ResiliencePolicy {
  return new ResiliencePolicy({ timeoutMs: 1_000, sleep: async () => undefined, ...overrides });
}

/**
 * Deterministic embedder: a 4-dim bag of letter counts (a, e, o, other).
 * Records every input; texts listed in `failOn` always throw.
 */
export class FakeEmbeddings implements EmbeddingService {
  public readonly modelName = "fake-model";
  public readonly calls: string[] = [];
  public readonly failOn = new Set<string>();
  /** Called with each input before it is embedded. */
  public onEmbed: ((text: string) => void) | null = null;

  public async embed(text: string): Promise<Vector> {
    this.calls.push(text);
    this.onEmbed?.(text);
    if (this.failOn.has(text)) throw new Error(`embedding failed for ${text}`);
    return FakeEmbeddings.vectorOf(text);
  }

  public static vectorOf(text: string): Vector {
    const v = new Float32Array(4);
    for (const ch of text.toLowerCase()) {
      if (ch === "a") v[0] += 1;
      else if (ch === "e") v[1] += 1;
      else if (ch === "o") v[2] += 1;
      else v[3] += 1;
    }
    return v;
  }
}

/** Completion fake answering from a queue of canned texts. */
export class FakeCompletions implements CompletionService<{ id: number }> {
  public readonly calls: ChatMessage[][] = [];
  private next = 0;

  public constructor(private readonly answers: Array<string | Error>) {}

  public async complete(messages: readonly ChatMessage[]): Promise<CompletionResult<{ id: number }>> {
    this.calls.push(messages.slice());
    const id = this.next++;
    const answer = this.answers[id];
    if (answer === undefined) throw new Error("no canned answer left");
    if (answer instanceof Error) throw answer;
    return { text: answer, raw: { id } };
  }
}

export const textType = new TextDocumentType(["txt", "md"]);

/** Text type whose extraction always fails. */
export const brokenType: DocumentType = {
  name: "broken",
  canProcess: (locator) => locator.endsWith(".bin"),
  getText: async () => {
    throw new Error("corrupt file");
  },
};

/**
 * In-memory document source: file path → text. Files ending in .bin resolve
 * to {@link brokenType}, other unknown extensions to `unsupported`.
 */
export class MemorySource implements DocumentSource {
  public readonly files = new Map<string, string>();
  /** Streams handed out, to check they were closed. */
  public readonly streams: Readable[] = [];

  public constructor(
    public readonly prefix: string,
    files: Record<string, string> = {},
  ) {
    for (const [p, t] of Object.entries(files)) this.files.set(p, t);
  }

  public async *documents(signal?: AbortSignal): AsyncGenerator<DocumentInfo> {
    for (const [filePath, content] of this.files) {
      if (signal?.aborted) return;
      const stream = Readable.from([Buffer.from(content, "utf8")]);
      this.streams.push(stream);
      yield createDocumentInfo({
        sourcePrefix: this.prefix,
        filePath,
        stream,
        docType: resolveDocumentType(filePath, [textType, brokenType]),
      });
    }
  }
}
