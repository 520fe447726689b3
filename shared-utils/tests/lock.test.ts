import { describe, expect, it } from "vitest";
import { KeyedMutex, LockTimeoutError } from "../src/lock";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("KeyedMutex", () => {
  it("should run work for the same key one at a time in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("listing-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("listing-1", async () => {
      order.push("second");
    });

    await flush();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("should not block work for different keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const blocked = mutex.runExclusive("listing-1", async () => {
      await gate.promise;
      order.push("listing-1");
    });
    await mutex.runExclusive("listing-2", async () => {
      order.push("listing-2");
    });

    expect(order).toEqual(["listing-2"]);

    gate.resolve();
    await blocked;
    expect(order).toEqual(["listing-2", "listing-1"]);
  });

  it("should return the work result and propagate its errors", async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive("a", async () => 42)).resolves.toBe(42);
    await expect(
      mutex.runExclusive("a", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    // a failed holder still releases the key
    await expect(mutex.runExclusive("a", async () => "next")).resolves.toBe("next");
  });

  it("should time out waiting with LockTimeoutError", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const holder = mutex.runExclusive("listing-1", () => gate.promise);

    const waiter = mutex.runExclusive("listing-1", async () => "ran", 10);
    await expect(waiter).rejects.toBeInstanceOf(LockTimeoutError);
    await expect(waiter).rejects.toThrow(
      "Timed out after 10ms waiting for lock on listing-1"
    );

    // the original holder still owns the key
    expect(mutex.isLocked("listing-1")).toBe(true);

    gate.resolve();
    await holder;
    await flush();
    expect(mutex.isLocked("listing-1")).toBe(false);
  });

  it("should keep later callers behind a holder after an earlier waiter timed out", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const holder = mutex.runExclusive("k", async () => {
      await gate.promise;
      order.push("holder");
    });
    const timedOut = mutex.runExclusive("k", async () => undefined, 5);
    await expect(timedOut).rejects.toBeInstanceOf(LockTimeoutError);

    const later = mutex.runExclusive("k", async () => {
      order.push("later");
    });

    await flush();
    expect(order).toEqual([]);

    gate.resolve();
    await Promise.all([holder, later]);
    expect(order).toEqual(["holder", "later"]);
  });

  it("should forget keys once all holders are done", async () => {
    const mutex = new KeyedMutex();

    await Promise.all([
      mutex.runExclusive("a", async () => undefined),
      mutex.runExclusive("b", async () => undefined),
      mutex.runExclusive("a", async () => undefined),
    ]);
    await flush();

    expect(mutex.size()).toBe(0);
  });
});
