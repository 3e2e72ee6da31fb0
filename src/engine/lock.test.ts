import { describe, expect, it } from "vitest";

import { KeyedLock } from "./lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("serializes work on the same key", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.run(["compras"], async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run(["compras"], async () => {
      order.push("second");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("lets unrelated keys run concurrently", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.run(["compras"], async () => {
      await gate.promise;
      order.push("compras");
    });
    await lock.run(["viajes"], async () => {
      order.push("viajes");
    });

    gate.resolve();
    await slow;
    expect(order).toEqual(["viajes", "compras"]);
  });

  it("does not deadlock on overlapping key sets taken in different orders", async () => {
    const lock = new KeyedLock();
    const results = await Promise.all([
      lock.run(["a", "b"], async () => "ab"),
      lock.run(["b", "a"], async () => "ba"),
    ]);
    expect(results).toEqual(["ab", "ba"]);
  });

  it("releases keys when the work throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run(["compras"], async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(lock.activeKeys).toBe(0);
    await expect(lock.run(["compras"], async () => 1)).resolves.toBe(1);
  });
});
