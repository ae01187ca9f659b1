import { describe, expect, test } from "vitest";
import { parseAnalysisResponse, parseAudioQuality, parseTopFiveList } from "../../analysis/parseAnalysis.js";

describe("parseAnalysisResponse", () => {
  test("reads named categories inside sections", () => {
    const raw = JSON.stringify({
      comedy_categories: {
        best_joke: {
          speaker: "Jon",
          timestamp: "00:12:30",
          quote: "That's no moon",
          entertainment_score: 12,
          audio_quality: "background noise",
          runners_up: [{ speaker: "Katie", timestamp: "00:13:00", brief_description: "pun" }],
        },
      },
      top_5_lists: {
        funniest_sentences: {
          entries: [
            { rank: 2, speaker: "Katie", quote: "second", estimated_start_end: [75, 80] },
            { rank: 1, speaker: "Jon", quote: "first" },
          ],
        },
      },
      opening_questions: [{ question: "Rating?", speaker: "Katie", answer: "8", timestamp: "00:00:45" }],
    });

    const parsed = parseAnalysisResponse(raw);
    if (parsed.kind !== "nested") throw new Error(`expected nested, got ${parsed.kind}`);

    expect(parsed.analysis.winners.bestJoke).toEqual({
      speaker: "Jon",
      timestamp: "00:12:30",
      quote: "That's no moon",
      setup: "",
      groupReaction: "",
      whyItsGreat: "",
      audioQuality: "BackgroundNoise",
      entertainmentScore: 10,
      runnersUp: [{ speaker: "Katie", timestamp: "00:13:00", briefDescription: "pun", place: 2 }],
    });
    const entries = parsed.analysis.topFives.funniestSentences?.entries ?? [];
    expect(entries.map((e) => e.quote)).toEqual(["first", "second"]);
    expect(entries[1].estimatedStartEnd).toEqual([75, 80]);
    expect(entries[0].estimatedStartEnd).toBeUndefined();
    expect(parsed.analysis.openingQuestions).toEqual([
      { question: "Rating?", speaker: "Katie", answer: "8", timestamp: "00:00:45", entertainmentValue: 5 },
    ]);
  });

  test("matches numerically keyed categories by their title field", () => {
    const raw = JSON.stringify({
      comedy_categories: {
        "1": { category: "Best Joke", speaker: "Jon", quote: "x" },
        "2": { title: "Hottest Take of the night", speaker: "Katie", quote: "y" },
        "3": { category: "Something else", speaker: "Mikey", quote: "z" },
      },
    });

    const parsed = parseAnalysisResponse(raw);
    if (parsed.kind !== "nested") throw new Error(`expected nested, got ${parsed.kind}`);

    expect(Object.keys(parsed.analysis.winners).sort()).toEqual(["bestJoke", "hottestTake"]);
    expect(parsed.analysis.winners.hottestTake?.speaker).toBe("Katie");
  });

  test("falls back to categories on the root", () => {
    const raw = [
      "Here you go:",
      "```json",
      JSON.stringify({
        BestJoke: { Speaker: "Jon", Quote: "q", EntertainmentScore: "7" },
        Top5FunniestSentences: [{ Speaker: "Katie", Quote: "a" }],
        Unknown: 1,
      }),
      "```",
    ].join("\n");

    const parsed = parseAnalysisResponse(raw);
    if (parsed.kind !== "flat") throw new Error(`expected flat, got ${parsed.kind}`);

    expect(parsed.analysis.winners.bestJoke?.entertainmentScore).toBe(7);
    expect(parsed.analysis.winners.bestJoke?.timestamp).toBe("0:00");
    expect(parsed.analysis.topFives.funniestSentences?.entries[0].rank).toBe(1);
  });

  test("entries with neither speaker nor quote are dropped", () => {
    const parsed = parseAnalysisResponse(JSON.stringify({ BestJoke: { timestamp: "01:00" }, HottestTake: { quote: "q" } }));
    if (parsed.kind !== "flat") throw new Error(`expected flat, got ${parsed.kind}`);

    expect(parsed.analysis.winners.bestJoke).toBeUndefined();
    expect(parsed.analysis.winners.hottestTake?.speaker).toBe("Unknown");
  });

  test.each([
    ["   ", "empty response"],
    ["no json here", "Model response did not contain parseable JSON."],
    ["[1, 2]", "response JSON is not an object"],
    [JSON.stringify({ foo: { bar: 1 } }), "no recognizable categories in response"],
  ])("%j fails with %s", (raw, reason) => {
    expect(parseAnalysisResponse(raw)).toEqual({ kind: "failed", reason });
  });
});

describe("parseTopFiveList", () => {
  test("keeps at most five entries", () => {
    const list = parseTopFiveList(Array.from({ length: 7 }, (_, i) => ({ speaker: "Jon", quote: `q${i}` })));
    expect(list?.entries.map((e) => e.rank)).toEqual([1, 2, 3, 4, 5]);
  });

  test("an empty list is null", () => {
    expect(parseTopFiveList({ entries: [] })).toBeNull();
  });
});

test("audio quality defaults to clear", () => {
  expect(parseAudioQuality("MUFFLED")).toBe("Muffled");
  expect(parseAudioQuality("noisy")).toBe("BackgroundNoise");
  expect(parseAudioQuality(undefined)).toBe("Clear");
});
