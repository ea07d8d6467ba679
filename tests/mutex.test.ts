import { describe, expect, it } from "vitest";
import { Mutex } from "../src/core/mutex.js";

describe("Mutex", () => {
  it("runs critical sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive(async () => {
      events.push("first:start");
      await gate;
      events.push("first:end");
    });
    const second = mutex.runExclusive(() => {
      events.push("second");
    });
    const third = mutex.runExclusive(() => {
      events.push("third");
    });

    await Promise.resolve();
    expect(mutex.isLocked).toBe(true);
    expect(mutex.waiting).toBe(2);

    release();
    await Promise.all([first, second, third]);
    expect(events).toEqual(["first:start", "first:end", "second", "third"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("releases the lock when the section throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });
});
