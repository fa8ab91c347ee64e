import { describe, expect, it } from "vitest";

import { deferred } from "../testing/fixtures.js";
import { KeyedQueue } from "./queue.js";

describe("KeyedQueue", () => {
  it("runs operations with the same key one at a time", async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const gate = deferred<void>();

    const first = queue.run("a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = queue.run("a", async () => {
      order.push("second");
    });
    const other = queue.run("b", async () => {
      order.push("other");
    });

    await other;
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "other", "first:end", "second"]);
  });

  it("keeps going after a failed operation", async () => {
    const queue = new KeyedQueue();
    await expect(queue.run("a", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(queue.run("a", async () => "next")).resolves.toBe("next");
  });
});
