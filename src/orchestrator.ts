import type { ChatHistory } from "./chat-history";
import type { EmbeddingStage } from "./embedding-stage";
import { DEFAULT_TOP_K, type IndexSynchronizer } from "./index-synchronizer";
import { log } from "./log";
import { ResiliencePolicy } from "./resilience";
import type { ChatMessage, CompletionResult, CompletionService } from "./types";

export const INTENT_INSTRUCTION =
  "You're an AI assistant reading the transcript of a conversation " +
  "between a user and an assistant. Given the chat history and " +
  "user's query, infer user real intent.";

export const GROUNDING_INSTRUCTION =
  "You are a professional AI bot that returns accurate content for busy workers.\n" +
  "Please answer the user's question using only information you can find in the context.\n" +
  "If the user's question is unrelated to the information in the context, say you don't know.\n";

/** Completions take far longer than the other data-path calls. */
export const COMPLETION_TIMEOUT_MS = 60_000;

/** One `role: content` line per message, each followed by a blank line. */
export function renderTranscript(history: readonly ChatMessage[]): string {
  return history.map((m) => `${m.role}: ${m.content}\n\n`).join("");
}

export function buildIntentPrompt(query: string, history: readonly ChatMessage[]): string {
  return `${INTENT_INSTRUCTION}\n\nChat History: ${renderTranscript(history)}\n\nUser's query: ${query}`;
}

export function buildContext(contents: readonly string[]): string {
  return "Context: \n\n```" + contents.join("\n\n") + "```\n";
}

export interface QueryOrchestratorOptions {
  /** Wraps every completion call. Defaults to the data-path preset with {@link COMPLETION_TIMEOUT_MS}. */
  policy?: ResiliencePolicy;
  /** Chunks retrieved per question. */
  topK?: number;
}

/**
 * Answers a question in two completion calls: the first rewrites the query
 * into a standalone intent using the chat history, the second answers from
 * the chunks retrieved for that intent.
 */
export class QueryOrchestrator<TRaw = unknown> {
  private readonly policy: ResiliencePolicy;
  private readonly topK: number;
  private last: CompletionResult<TRaw> | null = null;

  public constructor(
    private readonly completion: CompletionService<TRaw>,
    private readonly embeddingStage: EmbeddingStage,
    private readonly synchronizer: IndexSynchronizer,
    opts: QueryOrchestratorOptions = {},
  ) {
    this.policy = (opts.policy ?? ResiliencePolicy.dataPath({ timeoutMs: COMPLETION_TIMEOUT_MS })).named("completion");
    this.topK = opts.topK ?? DEFAULT_TOP_K;
  }

  /** Raw provider response of the most recent completion call. */
  public get lastResponse(): CompletionResult<TRaw> | null {
    return this.last;
  }

  /**
   * The user message is appended to `history` only after the answer arrives;
   * on failure the history is left as it was.
   */
  public async ask(query: string, history: ChatHistory, signal?: AbortSignal): Promise<string> {
    const userIntent = await this.summarizeIntent(query, history.messages(), signal);
    log.debug(`User intent: ${userIntent}`);

    const vector = await this.embeddingStage.embedQuery(userIntent, signal);
    const hits = await this.synchronizer.search(vector, this.topK, signal);
    log.debug(`Retrieved ${hits.length} chunks: ${hits.map((h) => h.documentReference).join(", ")}`);

    const userMessage: ChatMessage = { role: "user", content: query };
    const answer = await this.completeText(
      [{ role: "system", content: GROUNDING_INSTRUCTION + buildContext(hits.map((h) => h.content)) }, userMessage],
      signal,
    );
    history.push(userMessage);
    return answer;
  }

  public summarizeIntent(
    query: string,
    history: readonly ChatMessage[],
    signal?: AbortSignal,
  ): Promise<string> {
    return this.completeText([{ role: "system", content: buildIntentPrompt(query, history) }], signal);
  }

  private async completeText(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    const result = await this.policy.execute((s) => this.completion.complete(messages, s), signal);
    this.last = result;
    return result.text;
  }
}
