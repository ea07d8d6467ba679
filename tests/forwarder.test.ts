import { describe, expect, it } from "vitest";
import { DeliveryFailedError, PermanentError, ThrottleError, TransientError } from "../src/core/errors.js";
import { Forwarder, type ForwarderOptions } from "../src/relay/forwarder.js";
import { RateLimiter } from "../src/relay/rateLimiter.js";
import { FakeProvider, ManualClock } from "./fakes.js";

const options: ForwarderOptions = {
  maxRetries: 3,
  acquireTimeoutMs: 0,
  throttleMarginMs: 500,
  backoffBaseMs: 200,
  exhaustedBackoffMs: 150
};

function setup(capacity = 10) {
  const clock = new ManualClock();
  const provider = new FakeProvider();
  const limiter = new RateLimiter({ capacity, fillRate: 0.001, pollIntervalMs: 50 }, clock);
  const forwarder = new Forwarder(provider, limiter, options, clock);
  return { clock, provider, forwarder };
}

const source = { chatId: 100, messageId: 11 };

describe("Forwarder", () => {
  it("returns the delivered message on the first try", async () => {
    const { provider, forwarder, clock } = setup();

    await expect(forwarder.forward(source, 900)).resolves.toEqual({ chatId: 900, messageId: 1000 });
    expect(provider.copies).toEqual([{ source, destination: 900 }]);
    expect(clock.sleeps).toEqual([]);
  });

  it("waits out a throttle and stops after maxRetries attempts", async () => {
    const { provider, forwarder, clock } = setup();
    provider.alwaysFail.set(900, new ThrottleError(2));

    const error = await forwarder.forward(source, 900).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DeliveryFailedError);
    expect(error).toMatchObject({ destination: 900, attempts: 3 });
    expect(provider.copies).toHaveLength(3);
    expect(clock.sleeps).toEqual([2500, 2500]);
  });

  it("honours sub-second throttle delays", async () => {
    const { provider, forwarder, clock } = setup();
    provider.alwaysFail.set(900, new ThrottleError(0.1));

    await expect(forwarder.forward(source, 900)).rejects.toBeInstanceOf(DeliveryFailedError);
    expect(provider.copies).toHaveLength(options.maxRetries);
    expect(clock.sleeps).toEqual([600, 600]);
  });

  it("does not retry a permanent failure", async () => {
    const { provider, forwarder, clock } = setup();
    provider.alwaysFail.set(900, new PermanentError("bot was blocked by the user"));

    const error = await forwarder.forward(source, 900).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DeliveryFailedError);
    expect(error).toMatchObject({ attempts: 1 });
    expect(provider.copies).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("backs off linearly on transient errors and then succeeds", async () => {
    const { provider, forwarder, clock } = setup();
    provider.failNext.push(new TransientError("bad gateway"), new TransientError("bad gateway"));

    await expect(forwarder.forward(source, 900)).resolves.toEqual({ chatId: 900, messageId: 1000 });
    expect(provider.copies).toHaveLength(3);
    expect(clock.sleeps).toEqual([200, 400]);
  });

  it("still sends when the bucket is empty, after backing off", async () => {
    const { provider, forwarder, clock } = setup(1);

    await forwarder.forward(source, 900);
    await forwarder.forward({ chatId: 100, messageId: 12 }, 900);

    expect(provider.copies).toHaveLength(2);
    expect(clock.sleeps).toEqual([150]);
  });

  it("paces plain sends without dropping them", async () => {
    const { forwarder, clock } = setup(1);

    expect(await forwarder.pace()).toBe(true);
    expect(await forwarder.pace()).toBe(false);
    expect(clock.sleeps).toEqual([150]);
  });
});
