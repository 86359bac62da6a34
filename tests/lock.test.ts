import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../src/utils/lock.js";

describe("KeyedMutex", () => {
  it("serialises tasks per key while other keys proceed", async () => {
    const lock = new KeyedMutex();
    const order: string[] = [];

    const first = lock.runExclusive("calibre-sync", async () => {
      order.push("first start");
      await new Promise(resolve => setTimeout(resolve, 10));
      order.push("first end");
    });
    const second = lock.runExclusive("calibre-sync", async () => {
      order.push("second");
    });
    const other = lock.runExclusive("dict-lookup", async () => {
      order.push("other");
    });

    expect(lock.size).toBe(2);
    await Promise.all([first, second, other]);
    expect(order.indexOf("second")).toBeGreaterThan(order.indexOf("first end"));
    expect(order.indexOf("other")).toBeLessThan(order.indexOf("first end"));
    expect(lock.size).toBe(0);
  });

  it("releases the key when a task throws", async () => {
    const lock = new KeyedMutex();
    await expect(
      lock.runExclusive("calibre-sync", async () => {
        throw new Error("disk full");
      })
    ).rejects.toThrow("disk full");
    expect(lock.size).toBe(0);
    await expect(lock.runExclusive("calibre-sync", async () => "done")).resolves.toBe("done");
  });
});
