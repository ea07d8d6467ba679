export type UserId = number;
export type ChatId = number;

export type SessionStatus = "unregistered" | "pending" | "active";

export type RequestContactResult = "accepted" | "already_active" | "already_pending" | "banned";
export type CancelRequestResult = "canceled" | "not_pending";
export type AcceptResult = "connected" | "not_pending";
export type RejectResult = "rejected" | "not_pending";
export type ConnectResult = "connected" | "banned";
export type EndSessionResult = "ended" | "not_active";
export type BanResult = "banned";
export type UnbanResult = "unbanned";

export interface SessionSnapshot {
  pending: UserId[];
  active: UserId[];
  banned: UserId[];
}

export interface StoredSession {
  userId: UserId;
  displayName: string | null;
}

export type PayloadKind =
  | "text"
  | "photo"
  | "video"
  | "document"
  | "voice"
  | "audio"
  | "animation"
  | "sticker"
  | "other";

export interface MessageRef {
  chatId: ChatId;
  messageId: number;
}

export type DeliveredMessage = MessageRef;

export interface InboundMessage {
  chatId: ChatId;
  messageId: number;
  senderId: UserId;
  senderUsername?: string;
  displayName?: string;
  kind: PayloadKind;
  text?: string;
  replyTo?: MessageRef;
}

export type NoticeResult = "ok" | "unreachable";

export type TranscriptRole = "user" | "operator";

export interface TranscriptEntry {
  userId: UserId;
  role: TranscriptRole;
  body: string;
  createdAt: string;
}

export interface HealthCheckResult {
  name: string;
  ok: boolean;
  details: string;
}

/** Durable pending/active/banned sets. Each call is individually atomic. */
export interface SessionStore {
  addPending(userId: UserId, displayName: string | null): Promise<void>;
  removePending(userId: UserId): Promise<void>;
  listPending(): Promise<StoredSession[]>;
  addActive(userId: UserId, displayName: string | null): Promise<void>;
  removeActive(userId: UserId): Promise<void>;
  listActive(): Promise<StoredSession[]>;
  ban(userId: UserId): Promise<void>;
  unban(userId: UserId): Promise<void>;
  isBanned(userId: UserId): Promise<boolean>;
  listBanned(): Promise<UserId[]>;
}

export interface TranscriptSink {
  saveMessage(userId: UserId, role: TranscriptRole, body: string): Promise<void>;
}

/**
 * Provider capability consumed by the relay. `deliverCopy` throws ThrottleError,
 * TransientError or PermanentError; `sendNotice` never throws.
 */
export interface MessagingProvider {
  deliverCopy(source: MessageRef, destination: ChatId): Promise<DeliveredMessage>;
  sendNotice(chatId: ChatId, text: string): Promise<NoticeResult>;
  resolveChat(username: string): Promise<ChatId>;
}
