/**
 * Tests for the SQLite generation cache.
 *
 * Uses an in-memory database and an injected clock so expiry is deterministic.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CachedTextGenerator, GenerationCache, generateCacheKey } from "@/lib/generation-cache";
import { FakeTextGenerator } from "@test/helpers/test-helpers";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("generateCacheKey", () => {
  it("separates tasks and generators for the same prompt", () => {
    const key = generateCacheKey("claim", "openai:gpt-4o", "prompt");
    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(generateCacheKey("claim", "openai:gpt-4o", "prompt")).toBe(key);
    expect(generateCacheKey("perspective", "openai:gpt-4o", "prompt")).not.toBe(key);
    expect(generateCacheKey("claim", "anthropic:claude", "prompt")).not.toBe(key);
  });
});

describe("GenerationCache", () => {
  let clock: Date;
  let cache: GenerationCache;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    clock = new Date("2026-01-01T00:00:00.000Z");
    cache = new GenerationCache({ dbPath: ":memory:", ttlDays: 7 }, () => clock);
  });

  afterEach(async () => {
    await cache.close();
    vi.restoreAllMocks();
  });

  it("returns stored output until it expires", async () => {
    await cache.set("claim", "fake", "prompt", "Memes are art.");
    expect(await cache.get("claim", "fake", "prompt")).toBe("Memes are art.");
    expect(await cache.get("perspective", "fake", "prompt")).toBeNull();

    clock = new Date(clock.getTime() + 7 * DAY_MS);
    expect(await cache.get("claim", "fake", "prompt")).toBeNull();
  });

  it("reports and removes expired entries", async () => {
    await cache.set("claim", "fake", "old", "a");
    clock = new Date(clock.getTime() + 3 * DAY_MS);
    await cache.set("perspective", "fake", "new-1", "b");
    await cache.set("perspective", "fake", "new-2", "c");
    clock = new Date(clock.getTime() + 5 * DAY_MS);

    expect(await cache.getStats()).toEqual({
      totalEntries: 3,
      validEntries: 2,
      expiredEntries: 1,
      taskBreakdown: { perspective: 2 },
    });
    expect(await cache.cleanupExpired()).toBe(1);
    expect((await cache.getStats()).totalEntries).toBe(2);
  });
});

describe("CachedTextGenerator", () => {
  let cache: GenerationCache;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    cache = new GenerationCache({ dbPath: ":memory:", ttlDays: 1 });
  });

  afterEach(async () => {
    await cache.close();
    vi.restoreAllMocks();
  });

  it("calls the inner generator once per distinct prompt", async () => {
    const inner = new FakeTextGenerator((prompt) => `answer to ${prompt}`);
    const generator = new CachedTextGenerator(inner, cache);

    expect(await generator.generate("p1", { task: "claim" })).toBe("answer to p1");
    expect(await generator.generate("p1", { task: "claim" })).toBe("answer to p1");
    expect(await generator.generate("p2", { task: "claim" })).toBe("answer to p2");

    expect(inner.calls.map((c) => c.prompt)).toEqual(["p1", "p2"]);
    expect(generator.name).toBe("fake:test-model");
  });

  it("does not store failed generations", async () => {
    let fail = true;
    const inner = new FakeTextGenerator(() => {
      if (fail) throw new Error("provider down");
      return "recovered";
    });
    const generator = new CachedTextGenerator(inner, cache);

    await expect(generator.generate("p", { task: "perspective" })).rejects.toThrow("provider down");
    fail = false;
    expect(await generator.generate("p", { task: "perspective" })).toBe("recovered");
    expect(inner.calls).toHaveLength(2);
  });
});
