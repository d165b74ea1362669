import { describe, expect, it } from "vitest";
import { KeyedLock } from "../src/services/keyed-lock.js";

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("KeyedLock", () => {
  it("runs operations on one key in call order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        await tick(20);
        order.push("first");
      }),
      lock.run("a", async () => {
        order.push("second");
      }),
    ]);

    expect(order).toEqual(["first", "second"]);
  });

  it("does not serialize different keys", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        await tick(20);
        order.push("a");
      }),
      lock.run("b", async () => {
        order.push("b");
      }),
    ]);

    expect(order).toEqual(["b", "a"]);
  });

  it("keeps the chain going after a failure", async () => {
    const lock = new KeyedLock();

    const failing = lock.run("a", async () => {
      throw new Error("boom");
    });
    const next = lock.run("a", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("forgets idle keys", async () => {
    const lock = new KeyedLock();
    const running = lock.run("a", () => tick(10));
    expect(lock.isLocked("a")).toBe(true);

    await running;
    expect(lock.isLocked("a")).toBe(false);
  });
});
