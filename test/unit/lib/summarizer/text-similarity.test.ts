/**
 * Tests for lexical similarity scoring.
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  LexicalSimilarityScorer,
  LlmSimilarityScorer,
  createSimilarityScorer,
  findNearDuplicatePairs,
  jaccardSimilarity,
} from "@/lib/summarizer/text-similarity";
import { FakeTextGenerator, sectionOf, testConfig } from "@test/helpers/test-helpers";

const A = "Memes remix imagery like collage.";
const B = "Memes remix images like collage.";
const C = "Tax reform shifts the fiscal burden.";

describe("jaccardSimilarity", () => {
  it("compares content-token sets", () => {
    expect(jaccardSimilarity(A, B)).toBeCloseTo(4 / 6, 10);
    expect(jaccardSimilarity(A, C)).toBe(0);
    expect(jaccardSimilarity(A, A.toUpperCase())).toBe(1);
  });

  it("compares raw text when neither side has content tokens", () => {
    expect(jaccardSimilarity("The", " the ")).toBe(1);
    expect(jaccardSimilarity("the", "of")).toBe(0);
  });
});

describe("LlmSimilarityScorer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends all pairs in one prompt and clamps scores", async () => {
    const generator = new FakeTextGenerator(() => "[1.4, -0.2]");
    const scorer = new LlmSimilarityScorer(generator);

    const scores = await scorer.scoreBatch([
      { id: "x", textA: A, textB: B },
      { id: "y", textA: A, textB: C },
    ]);

    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].task).toBe("similarity");
    expect(sectionOf(generator.calls[0].prompt)).toBe("SIMILARITY_BATCH");
    expect(generator.calls[0].prompt).toContain(`1. A: ${A}\n   B: ${B}`);
    expect(scores).toEqual(new Map([["x", 1], ["y", 0]]));
  });

  it("uses lexical scores for pairs the model leaves out", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const scorer = new LlmSimilarityScorer(new FakeTextGenerator(() => "Scores: [0.05]"));

    const scores = await scorer.scoreBatch([
      { id: "x", textA: A, textB: C },
      { id: "y", textA: A, textB: B },
    ]);
    expect(scores.get("x")).toBe(0.05);
    expect(scores.get("y")).toBeCloseTo(4 / 6, 10);
  });

  it("falls back entirely to lexical scores on unparseable output", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const scorer = new LlmSimilarityScorer(new FakeTextGenerator(() => "they look similar"));
    const scores = await scorer.scoreBatch([{ id: "x", textA: A, textB: B }]);
    expect(scores.get("x")).toBeCloseTo(4 / 6, 10);
  });

  it("makes no call for an empty batch", async () => {
    const generator = new FakeTextGenerator(() => "[]");
    expect(await new LlmSimilarityScorer(generator).scoreBatch([])).toEqual(new Map());
    expect(generator.calls).toHaveLength(0);
  });
});

describe("createSimilarityScorer", () => {
  it("follows the configured mode", () => {
    const generator = new FakeTextGenerator(() => "[]");
    expect(createSimilarityScorer(testConfig(), generator).mode).toBe("lexical");
    expect(createSimilarityScorer(testConfig({ similarity: { mode: "llm" } }), generator).mode).toBe("llm");
  });
});

describe("findNearDuplicatePairs", () => {
  const scorer = new LexicalSimilarityScorer();

  it("returns every pair at or above the threshold in index order", async () => {
    const pairs = await findNearDuplicatePairs([A, C, B, A], scorer, 0.6);
    expect(pairs.map((p) => [p.first, p.second])).toEqual([
      [0, 2],
      [0, 3],
      [2, 3],
    ]);
    expect(pairs[1].similarity).toBe(1);
  });

  it("has nothing to compare for fewer than two texts", async () => {
    expect(await findNearDuplicatePairs([A], scorer, 0.1)).toEqual([]);
  });
});
