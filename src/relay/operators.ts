import { Logger } from "../core/logger.js";
import { errorMessage } from "../core/errors.js";
import { normalizeUsername } from "../config.js";
import type { ChatId, MessagingProvider, UserId } from "../types.js";

export type RegisterOperatorResult = "registered" | "already_registered" | "not_allowed";

/**
 * Who may act as an operator, and the chats messages are copied into, in
 * priority order: configured ids, then resolved usernames, then runtime
 * registrations. The set only grows.
 */
export class OperatorDirectory {
  private readonly logger = new Logger("operators");
  private readonly configuredIds: Set<UserId>;
  private readonly usernames: Set<string>;
  private readonly chatIdSet = new Set<ChatId>();
  private readonly resolved = new Map<string, ChatId>();

  constructor(ids: UserId[], usernames: string[]) {
    this.configuredIds = new Set(ids);
    this.usernames = new Set(usernames.map(normalizeUsername).filter((name) => name.length > 0));
    for (const id of ids) {
      this.chatIdSet.add(id);
    }
  }

  isOperator(userId: UserId, username?: string): boolean {
    if (this.chatIdSet.has(userId)) {
      return true;
    }
    return username !== undefined && this.usernames.has(normalizeUsername(username));
  }

  /** Self-registration for a configured username (or id) messaging the bot directly. */
  register(userId: UserId, username?: string): RegisterOperatorResult {
    const allowed =
      this.configuredIds.has(userId) || (username !== undefined && this.usernames.has(normalizeUsername(username)));
    if (!allowed) {
      return "not_allowed";
    }
    if (this.chatIdSet.has(userId)) {
      return "already_registered";
    }
    this.chatIdSet.add(userId);
    if (username) {
      this.resolved.set(normalizeUsername(username), userId);
    }
    this.logger.info("operator registered", { userId, username });
    return "registered";
  }

  chatIds(): ChatId[] {
    return [...this.chatIdSet];
  }

  unresolvedUsernames(): string[] {
    return [...this.usernames].filter((name) => !this.resolved.has(name));
  }

  /** Resolves pending usernames through the provider; returns how many were newly resolved. */
  async resolveUsernames(provider: Pick<MessagingProvider, "resolveChat">): Promise<number> {
    let count = 0;
    for (const name of this.unresolvedUsernames()) {
      try {
        const chatId = await provider.resolveChat(name);
        this.resolved.set(name, chatId);
        this.chatIdSet.add(chatId);
        count += 1;
        this.logger.info("operator username resolved", { username: name, chatId });
      } catch (err) {
        this.logger.warn("operator username not resolvable yet", { username: name, error: errorMessage(err) });
      }
    }
    return count;
  }
}
