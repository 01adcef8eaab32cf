import { describe, expect, it } from "vitest";
import { distanceToScore, makeSnippet, rankMatches, SNIPPET_LENGTH } from "../ranking.js";

describe("distanceToScore", () => {
  it("turns cosine distance into a clamped similarity", () => {
    expect(distanceToScore(0)).toBe(1);
    expect(distanceToScore(0.25)).toBe(0.75);
    expect(distanceToScore(1.5)).toBe(0);
  });

  it("absorbs float noise around an exact match", () => {
    expect(distanceToScore(-1e-9)).toBe(1);
    expect(distanceToScore(1e-9)).toBe(1);
  });
});

describe("makeSnippet", () => {
  it("keeps at most the first characters of the chunk", () => {
    expect(makeSnippet("short")).toBe("short");
    expect(makeSnippet("x".repeat(SNIPPET_LENGTH + 50))).toHaveLength(SNIPPET_LENGTH);
  });
});

describe("rankMatches", () => {
  it("keeps the best chunk per page, ordered by score then url", () => {
    const ranked = rankMatches(
      [
        { url: "https://a.example/b", chunkIndex: 0, score: 0.5, snippet: "b0" },
        { url: "https://a.example/a", chunkIndex: 1, score: 0.5, snippet: "a1" },
        { url: "https://a.example/c", chunkIndex: 0, score: 0.9, snippet: "c0" },
        { url: "https://a.example/b", chunkIndex: 2, score: 0.7, snippet: "b2" },
        { url: "https://a.example/a", chunkIndex: 0, score: 0.5, snippet: "a0" },
      ],
      10
    );

    expect(ranked.map((m) => [m.url, m.snippet])).toEqual([
      ["https://a.example/c", "c0"],
      ["https://a.example/b", "b2"],
      ["https://a.example/a", "a0"],
    ]);
  });

  it("truncates to topK", () => {
    const ranked = rankMatches(
      [
        { url: "https://a.example/1", chunkIndex: 0, score: 0.1, snippet: "" },
        { url: "https://a.example/2", chunkIndex: 0, score: 0.2, snippet: "" },
      ],
      1
    );
    expect(ranked.map((m) => m.url)).toEqual(["https://a.example/2"]);
  });
});
