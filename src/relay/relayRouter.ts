import { Logger } from "../core/logger.js";
import { PersistenceError, errorMessage } from "../core/errors.js";
import { restAfterFirstArg, routeTextInput, type CommandName } from "../core/router.js";
import { parseUserId } from "../core/utils.js";
import { formatSessions, operatorNotices, userLabel, userNotices } from "./notices.js";
import type { IdentityCorrelator } from "./correlator.js";
import type { Forwarder } from "./forwarder.js";
import type { OperatorDirectory, RegisterOperatorResult } from "./operators.js";
import type { SessionRegistry } from "./sessionRegistry.js";
import type {
  AcceptResult,
  BanResult,
  CancelRequestResult,
  ChatId,
  ConnectResult,
  EndSessionResult,
  InboundMessage,
  MessagingProvider,
  RejectResult,
  RequestContactResult,
  SessionSnapshot,
  SessionStatus,
  TranscriptRole,
  TranscriptSink,
  UnbanResult,
  UserId
} from "../types.js";

export type UserRelayOutcome =
  | { status: "delivered"; operatorChatId: ChatId; messageId: number }
  | { status: "failed" }
  | { status: "banned" }
  | { status: "not_active"; sessionStatus: Exclude<SessionStatus, "active"> };

export type OperatorRelayOutcome =
  | { status: "delivered"; userId: UserId; messageId: number }
  | { status: "failed"; userId: UserId }
  | { status: "banned"; userId: UserId }
  | { status: "unknown_target" };

export type SendTextOutcome = "delivered" | "unreachable" | "banned";

export interface RelayRouterDeps {
  registry: SessionRegistry;
  forwarder: Forwarder;
  correlator: IdentityCorrelator;
  operators: OperatorDirectory;
  provider: MessagingProvider;
  transcript?: TranscriptSink | null;
}

type UserTargetCommand = "accept" | "reject" | "connect" | "end" | "ban" | "unban";

const USER_TARGET_COMMANDS: ReadonlySet<CommandName> = new Set<UserTargetCommand>([
  "accept",
  "reject",
  "connect",
  "end",
  "ban",
  "unban"
]);

function isUserTargetCommand(command: CommandName): command is UserTargetCommand {
  return USER_TARGET_COMMANDS.has(command);
}

/**
 * Decides, for every inbound event, which session transition to apply and what
 * to copy where. Named actions notify the other party; `handleInbound` also
 * answers the actor who sent the event.
 */
export class RelayRouter {
  private readonly logger = new Logger("relay-router");
  /** user -> operator chat that currently owns the conversation */
  private readonly pins = new Map<UserId, ChatId>();
  private readonly registry: SessionRegistry;
  private readonly forwarder: Forwarder;
  private readonly correlator: IdentityCorrelator;
  private readonly operators: OperatorDirectory;
  private readonly provider: MessagingProvider;
  private readonly transcript: TranscriptSink | null;

  constructor(deps: RelayRouterDeps) {
    this.registry = deps.registry;
    this.forwarder = deps.forwarder;
    this.correlator = deps.correlator;
    this.operators = deps.operators;
    this.provider = deps.provider;
    this.transcript = deps.transcript ?? null;
  }

  async handleInbound(message: InboundMessage): Promise<void> {
    const route = message.kind === "text" && message.text ? routeTextInput(message.text) : { type: "message" as const };

    if (route.type === "command" && route.command === "register") {
      await this.reply(message.chatId, this.registerReply(message.senderId, this.registerOperator(message.senderId, message.senderUsername)));
      return;
    }

    const fromOperator = this.operators.isOperator(message.senderId, message.senderUsername);
    try {
      if (fromOperator) {
        await this.handleOperator(message, route);
      } else {
        await this.handleUser(message, route);
      }
    } catch (err) {
      if (!(err instanceof PersistenceError)) {
        throw err;
      }
      // a failed write aborts the command; the sender still gets an answer
      this.logger.error("command aborted by store failure", {
        chatId: message.chatId,
        operation: err.operation,
        userId: err.userId
      });
      await this.reply(message.chatId, fromOperator ? operatorNotices.storeFailed(err.userId) : userNotices.tryAgain);
    }
  }

  // ---- user-side actions ----

  async apply(userId: UserId, displayName?: string): Promise<RequestContactResult> {
    const result = await this.registry.requestContact(userId, displayName);
    this.logger.info("contact requested", { userId, result });
    if (result === "accepted") {
      const label = userLabel(userId, this.registry.nameOf(userId));
      await this.notifyOperators(operatorNotices.newRequest(label, userId));
    }
    return result;
  }

  async cancel(userId: UserId): Promise<CancelRequestResult> {
    const result = await this.registry.cancelRequest(userId);
    if (result === "canceled") {
      await this.notifyOperators(operatorNotices.requestCanceled(userLabel(userId, this.registry.nameOf(userId))));
    }
    return result;
  }

  async end(userId: UserId): Promise<EndSessionResult> {
    const result = await this.registry.endSession(userId);
    if (result === "ended") {
      this.dropRouting(userId);
      await this.notifyOperators(operatorNotices.userEnded(userLabel(userId, this.registry.nameOf(userId))));
    }
    return result;
  }

  async relayFromUser(message: InboundMessage): Promise<UserRelayOutcome> {
    const userId = message.senderId;
    if (this.registry.isBanned(userId)) {
      return { status: "banned" };
    }
    const sessionStatus = this.registry.status(userId);
    if (sessionStatus !== "active") {
      return { status: "not_active", sessionStatus };
    }

    await this.record(userId, "user", message);

    for (const operatorChatId of this.operatorOrder(userId)) {
      try {
        const delivered = await this.forwarder.forward({ chatId: message.chatId, messageId: message.messageId }, operatorChatId);
        // end or ban may have landed while the copy was in flight
        if (this.registry.isBanned(userId) || this.registry.status(userId) !== "active") {
          this.logger.info("session closed during copy, not routing replies", { userId, operatorChatId });
        } else {
          this.correlator.record(delivered.chatId, delivered.messageId, userId);
          this.pins.set(userId, delivered.chatId);
        }
        return { status: "delivered", operatorChatId: delivered.chatId, messageId: delivered.messageId };
      } catch (err) {
        this.logger.warn("copy to operator failed, trying next", { userId, operatorChatId, error: errorMessage(err) });
      }
    }

    this.logger.error("no operator reachable", { userId });
    return { status: "failed" };
  }

  // ---- operator-side actions ----

  async accept(userId: UserId): Promise<AcceptResult> {
    const result = await this.registry.accept(userId);
    if (result === "connected") {
      await this.notify(userId, userNotices.accepted);
    }
    return result;
  }

  async reject(userId: UserId): Promise<RejectResult> {
    const result = await this.registry.reject(userId);
    if (result === "rejected") {
      await this.notify(userId, userNotices.rejected);
    }
    return result;
  }

  async connect(userId: UserId): Promise<ConnectResult> {
    const { result, opened } = await this.registry.connectTracked(userId);
    if (opened) {
      await this.notify(userId, userNotices.connected);
    }
    return result;
  }

  async endByOperator(userId: UserId): Promise<EndSessionResult> {
    const result = await this.registry.endSession(userId);
    if (result === "ended") {
      this.dropRouting(userId);
      await this.notify(userId, userNotices.endedByOperator);
    }
    return result;
  }

  async ban(userId: UserId): Promise<BanResult> {
    const result = await this.registry.ban(userId);
    this.dropRouting(userId);
    await this.notify(userId, userNotices.banned);
    return result;
  }

  async unban(userId: UserId): Promise<UnbanResult> {
    const wasBanned = this.registry.isBanned(userId);
    const result = await this.registry.unban(userId);
    if (wasBanned) {
      await this.notify(userId, userNotices.unbanned);
    }
    return result;
  }

  listSessions(): SessionSnapshot {
    return this.registry.snapshot();
  }

  async relayFromOperator(message: InboundMessage): Promise<OperatorRelayOutcome> {
    if (!message.replyTo) {
      return { status: "unknown_target" };
    }
    const userId = this.correlator.resolve(message.replyTo.chatId, message.replyTo.messageId);
    if (userId === null) {
      return { status: "unknown_target" };
    }
    if (this.registry.isBanned(userId)) {
      return { status: "banned", userId };
    }

    await this.record(userId, "operator", message);
    try {
      const delivered = await this.forwarder.forward({ chatId: message.chatId, messageId: message.messageId }, userId);
      return { status: "delivered", userId, messageId: delivered.messageId };
    } catch (err) {
      this.logger.warn("copy to user failed", { userId, error: errorMessage(err) });
      return { status: "failed", userId };
    }
  }

  async sendText(userId: UserId, text: string): Promise<SendTextOutcome> {
    if (this.registry.isBanned(userId)) {
      return "banned";
    }
    await this.forwarder.pace();
    const result = await this.provider.sendNotice(userId, text);
    if (result === "ok") {
      await this.saveTranscript(userId, "operator", text);
      return "delivered";
    }
    return "unreachable";
  }

  /** Sends `text` to every active user; returns how many received it. */
  async broadcast(text: string): Promise<number> {
    let count = 0;
    for (const userId of this.registry.activeUsers()) {
      await this.forwarder.pace();
      const result = await this.provider.sendNotice(userId, text);
      if (result === "ok") {
        count += 1;
      }
    }
    this.logger.info("broadcast sent", { delivered: count });
    return count;
  }

  registerOperator(userId: UserId, username?: string): RegisterOperatorResult {
    return this.operators.register(userId, username);
  }

  // ---- dispatch ----

  private async handleUser(message: InboundMessage, route: ReturnType<typeof routeTextInput>): Promise<void> {
    const userId = message.senderId;
    const chatId = message.chatId;

    if (this.registry.isBanned(userId)) {
      await this.reply(chatId, userNotices.banned);
      return;
    }

    if (route.type === "unknown_command") {
      await this.reply(chatId, userNotices.help);
      return;
    }

    if (route.type === "command") {
      switch (route.command) {
        case "apply": {
          const result = await this.apply(userId, message.displayName ?? message.senderUsername);
          await this.reply(chatId, this.applyReply(result));
          return;
        }
        case "cancel": {
          const result = await this.cancel(userId);
          await this.reply(chatId, result === "canceled" ? userNotices.canceled : userNotices.notPending);
          return;
        }
        case "end": {
          const result = await this.end(userId);
          await this.reply(chatId, result === "ended" ? userNotices.ended : userNotices.notActive);
          return;
        }
        default:
          await this.reply(chatId, userNotices.help);
          return;
      }
    }

    const outcome = await this.relayFromUser(message);
    switch (outcome.status) {
      case "delivered":
        return;
      case "failed":
        await this.reply(chatId, userNotices.deliveryFailed);
        return;
      case "banned":
        await this.reply(chatId, userNotices.banned);
        return;
      case "not_active":
        await this.reply(chatId, outcome.sessionStatus === "pending" ? userNotices.alreadyPending : userNotices.notConnected);
        return;
    }
  }

  private async handleOperator(message: InboundMessage, route: ReturnType<typeof routeTextInput>): Promise<void> {
    const chatId = message.chatId;

    if (route.type === "message") {
      const outcome = await this.relayFromOperator(message);
      switch (outcome.status) {
        case "delivered":
          await this.reply(chatId, operatorNotices.delivered(outcome.userId));
          return;
        case "failed":
          await this.reply(chatId, operatorNotices.deliveryFailed(outcome.userId));
          return;
        case "banned":
          await this.reply(chatId, operatorNotices.isBanned(outcome.userId));
          return;
        case "unknown_target":
          await this.reply(chatId, operatorNotices.pickTarget);
          return;
      }
      return;
    }

    if (route.type === "unknown_command") {
      await this.reply(chatId, operatorNotices.help);
      return;
    }

    const { command, args, rest } = route;

    if (isUserTargetCommand(command)) {
      const userId = parseUserId(args[0]);
      if (userId === null) {
        await this.reply(chatId, operatorNotices.usage(command, "<user_id>"));
        return;
      }
      await this.reply(chatId, await this.runUserTargetCommand(command, userId));
      return;
    }

    switch (command) {
      case "list":
        await this.reply(chatId, formatSessions(this.listSessions()));
        return;
      case "send": {
        const userId = parseUserId(args[0]);
        const text = restAfterFirstArg(rest);
        if (userId === null || !text) {
          await this.reply(chatId, operatorNotices.usage("send", "<user_id> <text>"));
          return;
        }
        const outcome = await this.sendText(userId, text);
        const replies: Record<SendTextOutcome, string> = {
          delivered: operatorNotices.delivered(userId),
          unreachable: operatorNotices.unreachable(userId),
          banned: operatorNotices.isBanned(userId)
        };
        await this.reply(chatId, replies[outcome]);
        return;
      }
      case "broadcast": {
        const text = rest.trim();
        if (!text) {
          await this.reply(chatId, operatorNotices.usage("broadcast", "<text>"));
          return;
        }
        await this.reply(chatId, operatorNotices.broadcast(await this.broadcast(text)));
        return;
      }
      case "apply":
      case "cancel":
        await this.reply(chatId, operatorNotices.notForUsers);
        return;
      default:
        await this.reply(chatId, operatorNotices.help);
        return;
    }
  }

  private async runUserTargetCommand(command: UserTargetCommand, userId: UserId): Promise<string> {
    switch (command) {
      case "accept":
        return (await this.accept(userId)) === "connected"
          ? operatorNotices.accepted(userId)
          : operatorNotices.notPending(userId);
      case "reject":
        return (await this.reject(userId)) === "rejected"
          ? operatorNotices.rejected(userId)
          : operatorNotices.notPending(userId);
      case "connect":
        return (await this.connect(userId)) === "connected"
          ? operatorNotices.connected(userId)
          : operatorNotices.isBanned(userId);
      case "end":
        return (await this.endByOperator(userId)) === "ended"
          ? operatorNotices.ended(userId)
          : operatorNotices.notActive(userId);
      case "ban":
        await this.ban(userId);
        return operatorNotices.banned(userId);
      case "unban":
        await this.unban(userId);
        return operatorNotices.unbanned(userId);
    }
  }

  private applyReply(result: RequestContactResult): string {
    switch (result) {
      case "accepted":
        return userNotices.requestSent;
      case "already_pending":
        return userNotices.alreadyPending;
      case "already_active":
        return userNotices.alreadyActive;
      case "banned":
        return userNotices.banned;
    }
  }

  private registerReply(userId: UserId, result: RegisterOperatorResult): string {
    switch (result) {
      case "registered":
        return operatorNotices.registered(userId);
      case "already_registered":
        return operatorNotices.alreadyRegistered;
      case "not_allowed":
        return operatorNotices.notAllowed;
    }
  }

  // ---- helpers ----

  /** Pinned operator first, then the rest in priority order. */
  private operatorOrder(userId: UserId): ChatId[] {
    const all = this.operators.chatIds();
    const pinned = this.pins.get(userId);
    if (pinned === undefined || !all.includes(pinned)) {
      return all;
    }
    return [pinned, ...all.filter((id) => id !== pinned)];
  }

  private dropRouting(userId: UserId): void {
    this.pins.delete(userId);
    const dropped = this.correlator.forgetUser(userId);
    if (dropped > 0) {
      this.logger.debug("dropped routing hints", { userId, dropped });
    }
  }

  private async notifyOperators(text: string): Promise<void> {
    for (const chatId of this.operators.chatIds()) {
      await this.reply(chatId, text);
    }
  }

  /** Best-effort notice to a user; the transition it reports has already happened. */
  private async notify(userId: UserId, text: string): Promise<void> {
    await this.reply(userId, text);
  }

  private async reply(chatId: ChatId, text: string): Promise<void> {
    const result = await this.provider.sendNotice(chatId, text);
    if (result === "unreachable") {
      this.logger.warn("notice not delivered", { chatId });
    }
  }

  private async record(userId: UserId, role: TranscriptRole, message: InboundMessage): Promise<void> {
    const body = message.text ?? (message.kind === "text" ? "" : `[${message.kind}]`);
    if (body) {
      await this.saveTranscript(userId, role, body);
    }
  }

  private async saveTranscript(userId: UserId, role: TranscriptRole, body: string): Promise<void> {
    if (!this.transcript) {
      return;
    }
    try {
      await this.transcript.saveMessage(userId, role, body);
    } catch (err) {
      this.logger.warn("transcript write failed", { userId, role, error: errorMessage(err) });
    }
  }
}
