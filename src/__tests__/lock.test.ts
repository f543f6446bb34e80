import { describe, expect, it } from "vitest";
import { Mutex, RwLock } from "../lib/lock.js";
import { TimeoutError, withTimeout } from "../lib/timeout.js";

function deferred() {
  let release: () => void = () => {};
  const done = new Promise<void>(r => { release = r; });
  return { done, release };
}

describe("RwLock", () => {
  it("lets readers share", async () => {
    const lock = new RwLock();
    const gate = deferred();
    const a = lock.read(() => gate.done);
    const b = lock.read(() => gate.done);
    await Promise.resolve();
    expect(lock.activeReaders).toBe(2);
    gate.release();
    await Promise.all([a, b]);
    expect(lock.activeReaders).toBe(0);
  });

  it("a queued writer holds back readers that arrive after it", async () => {
    const lock = new RwLock();
    const order: string[] = [];
    const gate = deferred();
    const r1 = lock.read(async () => { await gate.done; order.push("r1"); });
    const w = lock.write(() => { order.push("w"); });
    const r2 = lock.read(() => { order.push("r2"); });
    gate.release();
    await Promise.all([r1, w, r2]);
    expect(order).toEqual(["r1", "w", "r2"]);
  });

  it("releases the lock when the body throws", async () => {
    const lock = new RwLock();
    await expect(lock.write(() => { throw new Error("nope"); })).rejects.toThrow("nope");
    expect(lock.isWriteLocked).toBe(false);
    await expect(lock.write(() => 7)).resolves.toBe(7);
  });
});

describe("Mutex", () => {
  it("runs bodies one at a time in call order", async () => {
    const m = new Mutex();
    const order: number[] = [];
    let active = 0;
    let peak = 0;
    const job = (n: number) => m.run(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(r => setTimeout(r, 1));
      order.push(n);
      active--;
    });
    await Promise.all([job(1), job(2), job(3)]);
    expect(order).toEqual([1, 2, 3]);
    expect(peak).toBe(1);
  });
});

describe("withTimeout", () => {
  it("rejects with TimeoutError when the work is too slow", async () => {
    const never = new Promise<number>(() => {});
    const err = await withTimeout(never, 5, "slow op").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof Error ? err.message : "").toBe("slow op timed out after 5ms");
  });

  it("passes through the result and the error of fast work", async () => {
    await expect(withTimeout(Promise.resolve(3), 50, "x")).resolves.toBe(3);
    await expect(withTimeout(Promise.reject(new Error("bad")), 50, "x")).rejects.toThrow("bad");
  });

  it("does not bound the work when ms is zero", async () => {
    const p = Promise.resolve("ok");
    expect(withTimeout(p, 0, "x")).toBe(p);
  });
});
