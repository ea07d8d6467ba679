import type { ChatId, UserId } from "../types.js";

interface CorrelationEntry {
  operatorChatId: ChatId;
  userId: UserId;
}

/**
 * Routing hints from a message delivered into an operator chat back to the user
 * it came from. Insertion-ordered, so the oldest entry is evicted first once the
 * table is full.
 */
export class IdentityCorrelator {
  private readonly entries = new Map<string, CorrelationEntry>();

  constructor(private readonly maxEntries = 10_000) {
    if (maxEntries < 1) {
      throw new Error(`IdentityCorrelator maxEntries must be >= 1, got ${maxEntries}`);
    }
  }

  record(operatorChatId: ChatId, deliveredMessageId: number, userId: UserId): void {
    const key = keyOf(operatorChatId, deliveredMessageId);
    this.entries.delete(key);
    this.entries.set(key, { operatorChatId, userId });
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  resolve(operatorChatId: ChatId, repliedToMessageId: number): UserId | null {
    return this.entries.get(keyOf(operatorChatId, repliedToMessageId))?.userId ?? null;
  }

  /** Drops every hint pointing at `userId`; returns how many were removed. */
  forgetUser(userId: UserId): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.userId === userId) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

function keyOf(chatId: ChatId, messageId: number): string {
  return `${chatId}:${messageId}`;
}
