import { describe, it, expect } from "vitest";
import { ReadWriteLock } from "./lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe("ReadWriteLock", () => {
  it("should let readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.withRead(async () => {
      events.push("first start");
      await gate.promise;
      events.push("first end");
    });
    const second = lock.withRead(async () => {
      events.push("second");
    });

    await second;
    expect(events).toEqual(["first start", "second"]);
    expect(lock.readers).toBe(1);

    gate.resolve();
    await first;
    expect(lock.readers).toBe(0);
  });

  it("should run writers alone and in order", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];

    await Promise.all([
      lock.withWrite(async () => {
        events.push("a start");
        await tick();
        events.push("a end");
      }),
      lock.withWrite(async () => {
        events.push("b");
      }),
    ]);

    expect(events).toEqual(["a start", "a end", "b"]);
  });

  it("should queue new readers behind a waiting writer", async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const events: string[] = [];

    const reader = lock.withRead(async () => {
      events.push("r1 start");
      await gate.promise;
      events.push("r1 end");
    });
    const writer = lock.withWrite(() => {
      events.push("w");
    });
    const lateReader = lock.withRead(() => {
      events.push("r2");
    });

    await tick();
    expect(events).toEqual(["r1 start"]);

    gate.resolve();
    await Promise.all([reader, writer, lateReader]);
    expect(events).toEqual(["r1 start", "r1 end", "w", "r2"]);
  });

  it("should release the lock when the callback throws", async () => {
    const lock = new ReadWriteLock();

    await expect(
      lock.withWrite(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(lock.writing).toBe(false);
    await expect(lock.withRead(() => 42)).resolves.toBe(42);
  });
});
