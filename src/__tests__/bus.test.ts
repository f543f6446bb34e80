import { describe, expect, it } from "vitest";
import { EventBus, type ShellEvent } from "../lib/bus.js";

const vol = (level: number): ShellEvent => ({ type: "audio/volume", level, muted: false });

describe("EventBus", () => {
  it("publishing with no subscribers is a no-op", () => {
    const bus = new EventBus(4);
    expect(() => bus.publish(vol(1))).not.toThrow();
    expect(bus.subscriberCount()).toBe(0);
  });

  it("a late subscriber sees nothing published before it subscribed", async () => {
    const bus = new EventBus(8);
    bus.publish(vol(1));
    bus.publish(vol(2));
    const rx = bus.subscribe();
    expect(rx.tryRecv()).toBeNull();
    bus.publish(vol(3));
    expect(await rx.recv()).toEqual(vol(3));
  });

  it("delivers to every subscriber in publish order", async () => {
    const bus = new EventBus(8);
    const a = bus.subscribe();
    const b = bus.subscribe();
    bus.publish(vol(1));
    bus.publish({ type: "wifi/disconnected" });
    expect(await a.recv()).toEqual(vol(1));
    expect(await a.recv()).toEqual({ type: "wifi/disconnected" });
    expect(await b.recv()).toEqual(vol(1));
    expect(await b.recv()).toEqual({ type: "wifi/disconnected" });
  });

  it("a lagging receiver loses the oldest events and counts them", () => {
    const bus = new EventBus(2);
    const rx = bus.subscribe();
    bus.publish(vol(1));
    bus.publish(vol(2));
    bus.publish(vol(3));
    expect(rx.lagged).toBe(1);
    expect(rx.pending).toBe(2);
    expect(rx.tryRecv()).toEqual(vol(2));
    expect(rx.tryRecv()).toEqual(vol(3));
    expect(rx.tryRecv()).toBeNull();
  });

  it("a slow receiver does not affect a fast one", () => {
    const bus = new EventBus(1);
    const slow = bus.subscribe();
    const fast = bus.subscribe();
    bus.publish(vol(1));
    expect(fast.tryRecv()).toEqual(vol(1));
    bus.publish(vol(2));
    expect(fast.tryRecv()).toEqual(vol(2));
    expect(fast.lagged).toBe(0);
    expect(slow.lagged).toBe(1);
  });

  it("a pending recv resolves with the next event", async () => {
    const bus = new EventBus(4);
    const rx = bus.subscribe();
    const next = rx.recv();
    bus.publish(vol(42));
    expect(await next).toEqual(vol(42));
  });

  it("closing a receiver resolves a pending recv with null and unsubscribes it", async () => {
    const bus = new EventBus(4);
    const rx = bus.subscribe();
    const next = rx.recv();
    rx.close();
    expect(await next).toBeNull();
    expect(rx.isClosed).toBe(true);
    expect(bus.subscriberCount()).toBe(0);
  });

  it("rejects a second concurrent recv", async () => {
    const bus = new EventBus(4);
    const rx = bus.subscribe();
    const first = rx.recv();
    await expect(rx.recv()).rejects.toThrow("receiver already has a pending recv()");
    rx.close();
    expect(await first).toBeNull();
  });

  it("iterates until closed", async () => {
    const bus = new EventBus(4);
    const rx = bus.subscribe();
    bus.publish(vol(1));
    bus.publish(vol(2));
    rx.close();
    const seen: ShellEvent[] = [];
    for await (const e of rx) seen.push(e);
    expect(seen).toEqual([vol(1), vol(2)]);
  });

  it("listen keeps delivering after a listener throws", async () => {
    const bus = new EventBus(4);
    const seen: number[] = [];
    const stop = bus.listen(e => {
      if (e.type !== "audio/volume") return;
      if (e.level === 1) throw new Error("boom");
      seen.push(e.level);
    });
    bus.publish(vol(1));
    bus.publish(vol(2));
    await new Promise(r => setTimeout(r, 10));
    expect(seen).toEqual([2]);
    stop();
    expect(bus.subscriberCount()).toBe(0);
  });

  it("rejects a capacity that is not a positive integer", () => {
    expect(() => new EventBus(0)).toThrow(RangeError);
    expect(() => new EventBus(1.5)).toThrow(RangeError);
  });
});
