import type { SwitchboardConfig } from "../config.js";
import type { MessagingProvider, SessionStore, TranscriptSink } from "../types.js";
import { IdentityCorrelator } from "./correlator.js";
import { Forwarder } from "./forwarder.js";
import { OperatorDirectory } from "./operators.js";
import { RateLimiter } from "./rateLimiter.js";
import { RelayRouter } from "./relayRouter.js";
import { SessionRegistry } from "./sessionRegistry.js";

export interface RelayRuntime {
  registry: SessionRegistry;
  operators: OperatorDirectory;
  router: RelayRouter;
}

/** Wires the relay engine around a provider and a store, each component owning its own state. */
export function createRelayRuntime(
  cfg: SwitchboardConfig,
  provider: MessagingProvider,
  store: SessionStore & TranscriptSink
): RelayRuntime {
  const registry = new SessionRegistry(store);
  const limiter = new RateLimiter({
    capacity: cfg.rateLimit.capacity,
    fillRate: cfg.rateLimit.fillRate,
    pollIntervalMs: cfg.rateLimit.pollIntervalMs
  });
  const forwarder = new Forwarder(provider, limiter, cfg.forwarding);
  const correlator = new IdentityCorrelator(cfg.correlation.maxEntries);
  const operators = new OperatorDirectory(cfg.operators.ids, cfg.operators.usernames);
  const router = new RelayRouter({
    registry,
    forwarder,
    correlator,
    operators,
    provider,
    transcript: cfg.transcript.enabled ? store : null
  });
  return { registry, operators, router };
}
