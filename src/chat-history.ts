import type { ChatMessage } from "./types";

/** Number of past user messages kept for intent summarization. */
export const CHAT_HISTORY_SIZE = 5;

/**
 * Bounded FIFO of past user messages. Pushing into a full history drops the
 * oldest entries first, so it never holds more than `capacity` messages.
 */
export class ChatHistory {
  private readonly items: ChatMessage[] = [];

  public constructor(public readonly capacity = CHAT_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Chat history capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get size(): number {
    return this.items.length;
  }

  public push(message: ChatMessage): void {
    while (this.items.length >= this.capacity) this.items.shift();
    this.items.push(message);
  }

  /** Snapshot, oldest first. */
  public messages(): ChatMessage[] {
    return this.items.slice();
  }

  public clear(): void {
    this.items.length = 0;
  }
}
