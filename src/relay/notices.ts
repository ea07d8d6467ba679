import type { SessionSnapshot, UserId } from "../types.js";

export function userLabel(userId: UserId, displayName: string | null): string {
  return displayName ? `${displayName} (${userId})` : String(userId);
}

export const userNotices = {
  help:
    "Commands:\n" +
    "/apply - ask to talk with an operator\n" +
    "/cancel - withdraw a pending request\n" +
    "/end - close the current conversation",
  requestSent: "Your request was sent. An operator will get back to you soon.",
  alreadyPending: "Your request is waiting for an operator. Use /cancel to withdraw it.",
  alreadyActive: "You are already connected to an operator. Just send your message.",
  canceled: "Your request was withdrawn.",
  notPending: "You have no pending request.",
  ended: "You ended the conversation.",
  notActive: "You have no open conversation.",
  notConnected: "You are not connected to an operator yet. Use /apply to ask for one.",
  banned: "You are blocked from using this service.",
  deliveryFailed: "Your message could not be delivered. Operators are unreachable right now, please try again later.",
  accepted: "An operator accepted your request. You are now connected.",
  connected: "An operator opened a conversation with you.",
  rejected: "Sorry, your request was declined.",
  endedByOperator: "The operator closed this conversation.",
  unbanned: "You can request contact again with /apply.",
  tryAgain: "Something went wrong on our side. Please try again in a moment."
} as const;

export const operatorNotices = {
  help:
    "Operator commands:\n" +
    "/list - pending, active and banned users\n" +
    "/accept <user_id> - accept a request\n" +
    "/reject <user_id> - decline a request\n" +
    "/connect <user_id> - open a conversation directly\n" +
    "/end <user_id> - close a conversation\n" +
    "/ban <user_id> - block a user\n" +
    "/unban <user_id> - lift a block\n" +
    "/send <user_id> <text> - message a user\n" +
    "/broadcast <text> - message every active user\n" +
    "/register - register this chat as an operator\n" +
    "Reply to a forwarded message to answer its sender.",
  pickTarget: "Reply to a forwarded message to answer its sender, or use /send <user_id> <text>.",
  notForUsers: "That command is for users, not operators.",
  usage: (command: string, args: string) => `Usage: /${command} ${args}`,
  newRequest: (label: string, userId: UserId) =>
    `New contact request from ${label}.\nUse /accept ${userId} or /reject ${userId}.`,
  requestCanceled: (label: string) => `${label} withdrew their request.`,
  userEnded: (label: string) => `${label} ended the conversation.`,
  accepted: (userId: UserId) => `Connected to ${userId}.`,
  connected: (userId: UserId) => `Conversation with ${userId} is open.`,
  rejected: (userId: UserId) => `Declined ${userId}.`,
  notPending: (userId: UserId) => `${userId} has no pending request.`,
  ended: (userId: UserId) => `Closed the conversation with ${userId}.`,
  notActive: (userId: UserId) => `${userId} has no open conversation.`,
  banned: (userId: UserId) => `Banned ${userId} and closed any session.`,
  isBanned: (userId: UserId) => `${userId} is banned.`,
  unbanned: (userId: UserId) => `Unbanned ${userId}.`,
  delivered: (userId: UserId) => `Delivered to ${userId}.`,
  deliveryFailed: (userId: UserId) => `Delivery to ${userId} failed.`,
  unreachable: (userId: UserId) => `${userId} cannot be reached right now.`,
  broadcast: (count: number) => `Broadcast delivered to ${count} active user(s).`,
  storeFailed: (userId: UserId) => `Could not save the change for ${userId}. Check /list and try again.`,
  registered: (userId: UserId) => `Registered operator id ${userId}.`,
  alreadyRegistered: "This chat is already registered as an operator.",
  notAllowed: "Only configured operators can register."
} as const;

export function formatSessions(snapshot: SessionSnapshot): string {
  const section = (title: string, ids: UserId[]) =>
    `${title} (${ids.length}):\n${ids.length > 0 ? ids.join("\n") : "none"}`;
  return [
    section("Active", snapshot.active),
    section("Pending", snapshot.pending),
    section("Banned", snapshot.banned)
  ].join("\n\n");
}
