import { TelegramError } from "telegraf";
import type { Message } from "telegraf/types";
import { Logger } from "../core/logger.js";
import { PermanentError, ThrottleError, TransientError, errorMessage } from "../core/errors.js";
import { chunkText } from "../core/utils.js";
import { normalizeUsername } from "../config.js";
import type {
  ChatId,
  DeliveredMessage,
  InboundMessage,
  MessageRef,
  MessagingProvider,
  NoticeResult,
  PayloadKind
} from "../types.js";

/** Telegram caps a text message at 4096 characters. */
const MAX_MESSAGE_LENGTH = 4096;

/** The slice of telegraf's `Telegram` client the relay calls. */
export interface TelegramApi {
  copyMessage(chatId: number | string, fromChatId: number | string, messageId: number): Promise<{ message_id: number }>;
  sendMessage(chatId: number | string, text: string): Promise<unknown>;
  getChat(chatId: number | string): Promise<{ id: number }>;
}

/**
 * Maps a Bot API failure onto the relay's retry taxonomy: 429 is a throttle with
 * the server's delay, 400/403 mean the chat cannot receive messages, anything
 * else (5xx, network) may succeed on retry.
 */
export function classifyTelegramError(err: unknown, context: Record<string, unknown> = {}): Error {
  if (err instanceof TelegramError) {
    const details = { ...context, code: err.code, description: err.description };
    if (err.code === 429) {
      return new ThrottleError(err.parameters?.retry_after ?? 1, details, { cause: err });
    }
    if (err.code === 400 || err.code === 403) {
      return new PermanentError(err.description, details, { cause: err });
    }
    return new TransientError(err.description, details, { cause: err });
  }
  return new TransientError(errorMessage(err), context, { cause: err });
}

export class TelegramProvider implements MessagingProvider {
  private readonly logger = new Logger("telegram");

  constructor(private readonly api: TelegramApi) {}

  async deliverCopy(source: MessageRef, destination: ChatId): Promise<DeliveredMessage> {
    try {
      const copied = await this.api.copyMessage(destination, source.chatId, source.messageId);
      return { chatId: destination, messageId: copied.message_id };
    } catch (err) {
      throw classifyTelegramError(err, { destination, sourceChatId: source.chatId, sourceMessageId: source.messageId });
    }
  }

  async sendNotice(chatId: ChatId, text: string): Promise<NoticeResult> {
    try {
      for (const chunk of chunkText(text, MAX_MESSAGE_LENGTH)) {
        await this.api.sendMessage(chatId, chunk);
      }
      return "ok";
    } catch (err) {
      // usually a user who never opened a chat with the bot, or blocked it
      this.logger.warn("notice failed", { chatId, error: errorMessage(err) });
      return "unreachable";
    }
  }

  async resolveChat(username: string): Promise<ChatId> {
    const chat = await this.api.getChat(`@${normalizeUsername(username)}`);
    return chat.id;
  }
}

function payloadKind(message: Message): PayloadKind | null {
  if ("text" in message) {
    return "text";
  }
  if ("photo" in message) {
    return "photo";
  }
  if ("video" in message) {
    return "video";
  }
  // animations also carry a `document` field
  if ("animation" in message) {
    return "animation";
  }
  if ("document" in message) {
    return "document";
  }
  if ("voice" in message) {
    return "voice";
  }
  if ("audio" in message) {
    return "audio";
  }
  if ("sticker" in message) {
    return "sticker";
  }
  if ("video_note" in message || "location" in message || "contact" in message || "poll" in message) {
    return "other";
  }
  return null;
}

/** Converts a telegraf message; service messages and anonymous senders give null. */
export function toInboundMessage(message: Message): InboundMessage | null {
  const kind = payloadKind(message);
  if (!kind || !message.from || message.chat.type !== "private") {
    return null;
  }
  const from = message.from;
  const displayName = [from.first_name, from.last_name].filter(Boolean).join(" ") || from.username;
  const text = "text" in message ? message.text : "caption" in message ? message.caption : undefined;
  const replied = "reply_to_message" in message ? message.reply_to_message : undefined;

  return {
    chatId: message.chat.id,
    messageId: message.message_id,
    senderId: from.id,
    senderUsername: from.username,
    displayName,
    kind,
    text,
    replyTo: replied ? { chatId: replied.chat.id, messageId: replied.message_id } : undefined
  };
}
