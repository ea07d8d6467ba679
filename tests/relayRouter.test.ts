import { describe, expect, it } from "vitest";
import { PermanentError } from "../src/core/errors.js";
import { IdentityCorrelator } from "../src/relay/correlator.js";
import { Forwarder } from "../src/relay/forwarder.js";
import { operatorNotices, userNotices } from "../src/relay/notices.js";
import { OperatorDirectory } from "../src/relay/operators.js";
import { RateLimiter } from "../src/relay/rateLimiter.js";
import { RelayRouter } from "../src/relay/relayRouter.js";
import { SessionRegistry } from "../src/relay/sessionRegistry.js";
import type { InboundMessage, MessageRef } from "../src/types.js";
import { FakeProvider, FakeStore, FakeTranscript, ManualClock } from "./fakes.js";

const USER = 100;
const OPERATOR = 900;
const BACKUP_OPERATOR = 901;

function setup(options: { usernames?: string[]; provider?: FakeProvider } = {}) {
  const clock = new ManualClock();
  const provider = options.provider ?? new FakeProvider();
  const store = new FakeStore();
  const transcript = new FakeTranscript();
  const registry = new SessionRegistry(store);
  const limiter = new RateLimiter({ capacity: 100, fillRate: 30, pollIntervalMs: 50 }, clock);
  const forwarder = new Forwarder(
    provider,
    limiter,
    { maxRetries: 2, acquireTimeoutMs: 0, throttleMarginMs: 0, backoffBaseMs: 10, exhaustedBackoffMs: 10 },
    clock
  );
  const correlator = new IdentityCorrelator();
  const operators = new OperatorDirectory([OPERATOR, BACKUP_OPERATOR], options.usernames ?? []);
  const router = new RelayRouter({ registry, forwarder, correlator, operators, provider, transcript });
  return { provider, store, transcript, registry, correlator, operators, limiter, router };
}

/** Holds every copy until `release` is called. */
class HeldProvider extends FakeProvider {
  readonly entered: Promise<void>;
  private markEntered: () => void = () => undefined;
  private openGate: () => void = () => undefined;
  private readonly gate: Promise<void>;

  constructor() {
    super();
    this.entered = new Promise((resolve) => {
      this.markEntered = resolve;
    });
    this.gate = new Promise((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate();
  }

  async deliverCopy(source: MessageRef, destination: number) {
    this.markEntered();
    await this.gate;
    return await super.deliverCopy(source, destination);
  }
}

let nextMessageId = 1;

function text(from: number, body: string, extra: Partial<InboundMessage> = {}): InboundMessage {
  const messageId = nextMessageId;
  nextMessageId += 1;
  return { chatId: from, messageId, senderId: from, kind: "text", text: body, ...extra };
}

function replyTo(from: number, target: MessageRef, body: string): InboundMessage {
  return text(from, body, { replyTo: target });
}

describe("RelayRouter conversation", () => {
  it("relays a full request, accept, message and reply cycle", async () => {
    const { provider, router, transcript } = setup();

    await router.handleInbound(text(USER, "/apply", { displayName: "Alice" }));
    expect(provider.notices).toEqual([
      { chatId: OPERATOR, text: operatorNotices.newRequest("Alice (100)", USER) },
      { chatId: BACKUP_OPERATOR, text: operatorNotices.newRequest("Alice (100)", USER) },
      { chatId: USER, text: userNotices.requestSent }
    ]);

    await router.handleInbound(text(OPERATOR, "/accept 100"));
    expect(provider.noticesFor(USER).at(-1)).toBe(userNotices.accepted);
    expect(provider.noticesFor(OPERATOR).at(-1)).toBe("Connected to 100.");

    const question = text(USER, "hi there");
    await router.handleInbound(question);
    expect(provider.copies).toEqual([
      { source: { chatId: USER, messageId: question.messageId }, destination: OPERATOR }
    ]);

    const answer = replyTo(OPERATOR, { chatId: OPERATOR, messageId: 1000 }, "how can I help");
    await router.handleInbound(answer);
    expect(provider.copies.at(-1)).toEqual({
      source: { chatId: OPERATOR, messageId: answer.messageId },
      destination: USER
    });
    expect(provider.noticesFor(OPERATOR).at(-1)).toBe("Delivered to 100.");

    expect(transcript.entries).toEqual([
      { userId: USER, role: "user", body: "hi there" },
      { userId: USER, role: "operator", body: "how can I help" }
    ]);
  });

  it("tells a pending user to wait instead of relaying", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(USER, "/apply"));
    await router.handleInbound(text(USER, "anyone there?"));

    expect(provider.copies).toEqual([]);
    expect(provider.noticesFor(USER).at(-1)).toBe(userNotices.alreadyPending);
  });

  it("tells an unregistered user how to apply", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(USER, "hello"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.notConnected]);
  });

  it("relays media with a placeholder transcript line", async () => {
    const { provider, router, registry, transcript } = setup();
    await registry.connect(USER);

    await router.handleInbound({ chatId: USER, messageId: 77, senderId: USER, kind: "photo" });
    expect(provider.copies).toEqual([{ source: { chatId: USER, messageId: 77 }, destination: OPERATOR }]);
    expect(transcript.entries).toEqual([{ userId: USER, role: "user", body: "[photo]" }]);
  });

  it("keeps relaying when the transcript fails", async () => {
    const { provider, router, registry, transcript } = setup();
    await registry.connect(USER);
    transcript.failing = true;

    const outcome = await router.relayFromUser(text(USER, "still there?"));
    expect(outcome).toEqual({ status: "delivered", operatorChatId: OPERATOR, messageId: 1000 });
    expect(provider.copies).toHaveLength(1);
  });
});

describe("RelayRouter operator failover", () => {
  it("falls back to the next operator and pins the one that answered", async () => {
    const { provider, router, registry } = setup();
    await registry.connect(USER);
    provider.alwaysFail.set(OPERATOR, new PermanentError("chat not found"));

    const first = await router.relayFromUser(text(USER, "one"));
    expect(first).toEqual({ status: "delivered", operatorChatId: BACKUP_OPERATOR, messageId: 1000 });

    provider.alwaysFail.clear();
    const second = await router.relayFromUser(text(USER, "two"));
    expect(second).toEqual({ status: "delivered", operatorChatId: BACKUP_OPERATOR, messageId: 1001 });
    expect(provider.copies.map((copy) => copy.destination)).toEqual([OPERATOR, BACKUP_OPERATOR, BACKUP_OPERATOR]);
  });

  it("tells the user when no operator is reachable", async () => {
    const { provider, router, registry } = setup();
    await registry.connect(USER);
    provider.alwaysFail.set(OPERATOR, new PermanentError("chat not found"));
    provider.alwaysFail.set(BACKUP_OPERATOR, new PermanentError("chat not found"));

    await router.handleInbound(text(USER, "hello?"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.deliveryFailed]);
  });
});

describe("RelayRouter operator commands", () => {
  it("asks for a target when an operator message is not a reply", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(OPERATOR, "hello"));
    expect(provider.noticesFor(OPERATOR)).toEqual([operatorNotices.pickTarget]);
  });

  it("asks for a target when the reply is to an unknown message", async () => {
    const { provider, router } = setup();
    await router.handleInbound(replyTo(OPERATOR, { chatId: OPERATOR, messageId: 4242 }, "hello"));
    expect(provider.copies).toEqual([]);
    expect(provider.noticesFor(OPERATOR)).toEqual([operatorNotices.pickTarget]);
  });

  it("bans a user, drops routing and refuses further traffic", async () => {
    const { provider, router, registry } = setup();
    await registry.connect(USER);
    await router.handleInbound(text(USER, "hi"));

    await router.handleInbound(text(OPERATOR, "/ban 100"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.banned]);
    expect(provider.noticesFor(OPERATOR)).toEqual(["Banned 100 and closed any session."]);
    expect(registry.snapshot()).toEqual({ pending: [], active: [], banned: [USER] });

    await router.handleInbound(text(USER, "let me in"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.banned, userNotices.banned]);
    expect(provider.copies).toHaveLength(1);

    await router.handleInbound(replyTo(OPERATOR, { chatId: OPERATOR, messageId: 1000 }, "bye"));
    expect(provider.noticesFor(OPERATOR).at(-1)).toBe(operatorNotices.pickTarget);
  });

  it("notifies only on real unban", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(OPERATOR, "/unban 100"));
    expect(provider.noticesFor(USER)).toEqual([]);

    await router.ban(USER);
    await router.handleInbound(text(OPERATOR, "/unban 100"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.banned, userNotices.unbanned]);
  });

  it("ends a session from either side", async () => {
    const { provider, router, registry } = setup();
    await registry.connect(USER);
    await router.handleInbound(text(OPERATOR, "/end 100"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.endedByOperator]);
    expect(provider.noticesFor(OPERATOR)).toEqual(["Closed the conversation with 100."]);

    await registry.connect(USER);
    await router.handleInbound(text(USER, "/end"));
    expect(provider.noticesFor(USER).at(-1)).toBe(userNotices.ended);
    expect(provider.noticesFor(OPERATOR).at(-1)).toBe("100 ended the conversation.");
  });

  it("notifies on connect only when the user was not active", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(OPERATOR, "/connect 100"));
    await router.handleInbound(text(OPERATOR, "/connect 100"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.connected]);
    expect(provider.noticesFor(OPERATOR)).toEqual(["Conversation with 100 is open.", "Conversation with 100 is open."]);
  });

  it("rejects a pending request", async () => {
    const { provider, router, registry } = setup();
    await router.handleInbound(text(USER, "/apply"));
    await router.handleInbound(text(OPERATOR, "/reject 100"));

    expect(registry.status(USER)).toBe("unregistered");
    expect(provider.noticesFor(USER).at(-1)).toBe(userNotices.rejected);
    expect(provider.noticesFor(OPERATOR).at(-1)).toBe("Declined 100.");
  });

  it("validates user id arguments", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(OPERATOR, "/accept bob"));
    expect(provider.noticesFor(OPERATOR)).toEqual(["Usage: /accept <user_id>"]);
  });

  it("sends free text with /send keeping inner spacing", async () => {
    const { provider, router, transcript } = setup();
    await router.handleInbound(text(OPERATOR, "/send 100 hello   world"));

    expect(provider.noticesFor(USER)).toEqual(["hello   world"]);
    expect(provider.noticesFor(OPERATOR)).toEqual(["Delivered to 100."]);
    expect(transcript.entries).toEqual([{ userId: USER, role: "operator", body: "hello   world" }]);
  });

  it("reports unreachable users on /send", async () => {
    const { provider, router } = setup();
    provider.unreachable.add(USER);
    await router.handleInbound(text(OPERATOR, "/send 100 ping"));
    expect(provider.noticesFor(OPERATOR)).toEqual(["100 cannot be reached right now."]);
  });

  it("broadcasts to active users only", async () => {
    const { provider, router, registry } = setup();
    await registry.connect(100);
    await registry.connect(200);
    await registry.requestContact(300);

    await router.handleInbound(text(OPERATOR, "/broadcast maintenance at noon"));
    expect(provider.noticesFor(100)).toEqual(["maintenance at noon"]);
    expect(provider.noticesFor(200)).toEqual(["maintenance at noon"]);
    expect(provider.noticesFor(300)).toEqual([]);
    expect(provider.noticesFor(OPERATOR)).toEqual(["Broadcast delivered to 2 active user(s)."]);
  });

  it("lists sessions", async () => {
    const { provider, router, registry } = setup();
    await registry.connect(200);
    await registry.requestContact(300);

    await router.handleInbound(text(OPERATOR, "/list"));
    expect(provider.noticesFor(OPERATOR)).toEqual(["Active (1):\n200\n\nPending (1):\n300\n\nBanned (0):\nnone"]);
  });

  it("answers user-only commands and unknown commands", async () => {
    const { provider, router } = setup();
    await router.handleInbound(text(OPERATOR, "/apply"));
    await router.handleInbound(text(OPERATOR, "/frobnicate"));
    expect(provider.noticesFor(OPERATOR)).toEqual([operatorNotices.notForUsers, operatorNotices.help]);

    await router.handleInbound(text(USER, "/frobnicate"));
    expect(provider.noticesFor(USER)).toEqual([userNotices.help]);
  });
});

describe("RelayRouter operator registration", () => {
  it("registers a configured username and routes to it", async () => {
    const { provider, router, operators } = setup({ usernames: ["carol"] });

    await router.handleInbound(text(555, "/register", { senderUsername: "Carol" }));
    expect(provider.noticesFor(555)).toEqual(["Registered operator id 555."]);
    expect(operators.chatIds()).toEqual([OPERATOR, BACKUP_OPERATOR, 555]);

    await router.handleInbound(text(555, "/register", { senderUsername: "Carol" }));
    expect(provider.noticesFor(555).at(-1)).toBe(operatorNotices.alreadyRegistered);
  });

  it("refuses strangers", async () => {
    const { provider, router, operators } = setup();
    await router.handleInbound(text(556, "/register", { senderUsername: "mallory" }));
    expect(provider.noticesFor(556)).toEqual([operatorNotices.notAllowed]);
    expect(operators.isOperator(556, "mallory")).toBe(false);
  });
});

describe("RelayRouter store failures", () => {
  it("tells the user to try again when a request cannot be saved", async () => {
    const { provider, router, registry, store } = setup();
    store.failOn.add("addPending");

    await router.handleInbound(text(USER, "/apply"));
    expect(provider.notices).toEqual([{ chatId: USER, text: userNotices.tryAgain }]);
    expect(registry.status(USER)).toBe("unregistered");
  });

  it("tells the operator when an accept cannot be saved", async () => {
    const { provider, router, registry, store } = setup();
    await registry.requestContact(USER);
    store.failOn.add("addActive");

    await router.handleInbound(text(OPERATOR, "/accept 100"));
    expect(provider.noticesFor(OPERATOR)).toEqual(["Could not save the change for 100. Check /list and try again."]);
    expect(provider.noticesFor(USER)).toEqual([]);
    expect(registry.status(USER)).toBe("pending");
  });
});

describe("RelayRouter races", () => {
  it("does not route replies for a session ended while its copy was in flight", async () => {
    const provider = new HeldProvider();
    const { router, registry, correlator } = setup({ provider });
    await registry.connect(USER);
    provider.alwaysFail.set(OPERATOR, new PermanentError("chat not found"));

    const pending = router.relayFromUser(text(USER, "are you there?"));
    await provider.entered;
    await router.end(USER);
    provider.release();

    expect(await pending).toEqual({ status: "delivered", operatorChatId: BACKUP_OPERATOR, messageId: 1000 });
    expect(correlator.size).toBe(0);
    expect(correlator.resolve(BACKUP_OPERATOR, 1000)).toBeNull();

    // no pin survived: the next session starts from the first operator again
    provider.alwaysFail.clear();
    await registry.connect(USER);
    await router.relayFromUser(text(USER, "back again"));
    expect(provider.copies.at(-1)?.destination).toBe(OPERATOR);
  });

  it("sends the connected notice once for concurrent connects", async () => {
    const { provider, router } = setup();
    const results = await Promise.all([router.connect(USER), router.connect(USER)]);

    expect(results).toEqual(["connected", "connected"]);
    expect(provider.noticesFor(USER)).toEqual([userNotices.connected]);
  });
});

describe("RelayRouter pacing", () => {
  it("takes a limiter token for every broadcast recipient and /send", async () => {
    const { router, registry, limiter } = setup();
    await registry.connect(100);
    await registry.connect(200);
    await registry.connect(300);

    expect(await router.broadcast("hello all")).toBe(3);
    expect(await limiter.available()).toBe(97);

    await router.sendText(100, "just you");
    expect(await limiter.available()).toBe(96);
  });
});
