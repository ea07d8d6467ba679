export const COMMANDS = [
  "start",
  "help",
  "apply",
  "cancel",
  "end",
  "register",
  "accept",
  "reject",
  "connect",
  "ban",
  "unban",
  "list",
  "send",
  "broadcast"
] as const;

export type CommandName = (typeof COMMANDS)[number];

export type RouteDecision =
  | { type: "command"; command: CommandName; args: string[]; rest: string }
  | { type: "unknown_command"; name: string }
  | { type: "message" };

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((name) => name === value);
}

/**
 * Splits "/accept@SomeBot 100" into command and arguments. `rest` keeps the raw
 * text after the command so /send and /broadcast preserve spacing.
 */
export function routeTextInput(rawText: string): RouteDecision {
  const text = rawText.trim();
  if (!text.startsWith("/")) {
    return { type: "message" };
  }
  const match = /^\/([A-Za-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text);
  if (!match) {
    return { type: "unknown_command", name: text.slice(1).split(/\s+/, 1)[0] ?? "" };
  }
  const name = match[1].toLowerCase();
  if (!isCommandName(name)) {
    return { type: "unknown_command", name };
  }
  const rest = match[2] ?? "";
  const args = rest.split(/\s+/).filter((part) => part.length > 0);
  return { type: "command", command: name, args, rest };
}

/** "/send 42 hello there" -> rest after the first argument. */
export function restAfterFirstArg(rest: string): string {
  const trimmed = rest.trimStart();
  const gap = trimmed.search(/\s/);
  return gap === -1 ? "" : trimmed.slice(gap).trim();
}
