import { describe, expect, it } from "vitest";
import type { ShortTermMessage } from "@convomem/shared";
import { FallbackCache } from "../../../src/services/FallbackCache.js";

const base = new Date("2026-03-01T10:00:00.000Z");

function message(id: string, sessionId: string, sequence: number, ttlMs = 60_000): ShortTermMessage {
  return {
    id,
    sessionId,
    role: "user",
    content: `content of ${id}`,
    sequence,
    createdAt: base,
    expiresAt: new Date(base.getTime() + ttlMs)
  };
}

describe("FallbackCache", () => {
  it("flags appended entries as degraded and returns copies", () => {
    const cache = new FallbackCache({ maxEntries: 10 });
    const stored = cache.append(message("m1", "s1", 1), base);

    expect(stored.degraded).toBe(true);
    stored.content = "mutated";
    expect(cache.list(base)[0]?.content).toBe("content of m1");
  });

  it("lists entries ordered by session then sequence", () => {
    const cache = new FallbackCache({ maxEntries: 10 });
    cache.append(message("b2", "s-b", 20), base);
    cache.append(message("a2", "s-a", 20), base);
    cache.append(message("b1", "s-b", 10), base);
    cache.append(message("a1", "s-a", 10), base);

    expect(cache.list(base).map((entry) => entry.id)).toEqual(["a1", "a2", "b1", "b2"]);
    expect(cache.list(base, "s-b").map((entry) => entry.id)).toEqual(["b1", "b2"]);
  });

  it("drops entries whose TTL has passed", () => {
    const cache = new FallbackCache({ maxEntries: 10 });
    cache.append(message("short", "s1", 1, 1_000), base);
    cache.append(message("long", "s1", 2, 60_000), base);

    const later = new Date(base.getTime() + 1_000);
    expect(cache.list(later).map((entry) => entry.id)).toEqual(["long"]);
    expect(cache.size(later)).toBe(1);
    expect(cache.has("short")).toBe(false);
  });

  it("evicts the lowest sequence once full", () => {
    const cache = new FallbackCache({ maxEntries: 2 });
    cache.append(message("m1", "s1", 1), base);
    cache.append(message("m2", "s1", 2), base);
    cache.append(message("m3", "s1", 3), base);

    expect(cache.list(base).map((entry) => entry.id)).toEqual(["m2", "m3"]);
    expect(cache.evictions).toBe(1);
  });

  it("removes flushed ids and clears", () => {
    const cache = new FallbackCache({ maxEntries: 10 });
    cache.append(message("m1", "s1", 1), base);
    cache.append(message("m2", "s1", 2), base);

    cache.remove(["m1"]);
    expect(cache.list(base).map((entry) => entry.id)).toEqual(["m2"]);

    cache.clear();
    expect(cache.size(base)).toBe(0);
  });
});
