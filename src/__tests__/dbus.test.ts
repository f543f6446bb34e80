import { describe, expect, it } from "vitest";
import { ProxyCache } from "../lib/backend/dbus.js";

describe("ProxyCache", () => {
  it("evicts the least recently used entry past its limit", async () => {
    const cache = new ProxyCache<string>(2);
    const made: string[] = [];
    const make = (key: string) => () => {
      made.push(key);
      return Promise.resolve(`proxy:${key}`);
    };
    await cache.get("a", make("a"));
    await cache.get("b", make("b"));
    expect(await cache.get("a", make("a"))).toBe("proxy:a");
    await cache.get("c", make("c"));
    expect(cache.size).toBe(2);
    await cache.get("a", make("a"));
    await cache.get("b", make("b"));
    expect(made).toEqual(["a", "b", "c", "b"]);
  });

  it("forgets a failed introspection", async () => {
    const cache = new ProxyCache<string>();
    await expect(cache.get("ap", () => Promise.reject(new Error("gone")))).rejects.toThrow("gone");
    expect(cache.size).toBe(0);
    expect(await cache.get("ap", () => Promise.resolve("proxy:ap"))).toBe("proxy:ap");
  });

  it("stays bounded across many distinct paths", async () => {
    const cache = new ProxyCache<number>(8);
    for (let i = 0; i < 100; i++) await cache.get(`/org/freedesktop/NetworkManager/AccessPoint/${i}`, () => Promise.resolve(i));
    expect(cache.size).toBe(8);
  });
});
