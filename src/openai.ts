import OpenAI from "openai";
import { AuthorizationError } from "./errors";
import type {
  ChatMessage,
  CompletionResult,
  CompletionService,
  EmbeddingService,
  Vector,
} from "./types";

export interface OpenAIOptions {
  apiKey: string;
  /** Alternate endpoint (Azure OpenAI, a local gateway, ...). */
  baseURL?: string;
}

function createClient({ apiKey, baseURL }: OpenAIOptions): OpenAI {
  if (!apiKey) throw new AuthorizationError("OPENAI_API_KEY is not set");
  // Retries and timeouts are owned by ResiliencePolicy, not the SDK.
  return new OpenAI({ apiKey, baseURL, maxRetries: 0 });
}

function toMessageParam(m: ChatMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "user":
      return { role: "user", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
  }
}

/** Completion service over the chat completions endpoint. */
export class OpenAICompletions implements CompletionService<OpenAI.Chat.Completions.ChatCompletion> {
  private readonly client: OpenAI;

  public constructor(
    opts: OpenAIOptions,
    private readonly model: string,
  ) {
    this.client = createClient(opts);
  }

  public async complete(
    messages: readonly ChatMessage[],
    signal?: AbortSignal,
  ): Promise<CompletionResult<OpenAI.Chat.Completions.ChatCompletion>> {
    const raw = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toMessageParam),
      },
      { signal },
    );
    return { text: raw.choices[0]?.message?.content ?? "", raw };
  }
}

/** Embedding service over the embeddings endpoint (one input per request). */
export class OpenAIEmbeddings implements EmbeddingService {
  private readonly client: OpenAI;

  public constructor(
    opts: OpenAIOptions,
    public readonly modelName: string,
  ) {
    this.client = createClient(opts);
  }

  public async embed(text: string, signal?: AbortSignal): Promise<Vector> {
    const res = await this.client.embeddings.create(
      { model: this.modelName, input: [text] },
      { signal },
    );
    const first = res.data[0];
    if (!first) throw new Error(`Embedding model ${this.modelName} returned no data`);
    return Float32Array.from(first.embedding);
  }
}
