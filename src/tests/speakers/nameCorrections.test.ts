import path from "node:path";
import { describe, expect, test } from "vitest";
import type { CategoryResults, CategoryWinner } from "../../analysis/types.js";
import {
  applyNameCorrections,
  buildNameCorrections,
  correctName,
  loadNameCorrections,
} from "../../speakers/nameCorrections.js";

function winner(speaker: string, runnerUp: string): CategoryWinner {
  return {
    speaker,
    timestamp: "00:01:00",
    quote: "q",
    setup: "",
    groupReaction: "",
    whyItsGreat: "",
    audioQuality: "Clear",
    entertainmentScore: 7,
    runnersUp: [{ speaker: runnerUp, timestamp: "00:02:00", briefDescription: "", place: 2 }],
  };
}

describe("buildNameCorrections", () => {
  test("maps every variant, case- and whitespace-insensitive", () => {
    const table = buildNameCorrections({
      corrections: [{ canonical: "Jon", variants: ["John", "  Jon  Athan "] }],
    });

    expect(correctName("JOHN", table)).toBe("Jon");
    expect(correctName("jon athan", table)).toBe("Jon");
    expect(correctName("Jonny", table)).toBe("Jonny");
  });

  test("a variant claimed twice keeps its first canonical name", () => {
    const table = buildNameCorrections({
      corrections: [
        { canonical: "Mikey", variants: ["Mike"] },
        { canonical: "Michael", variants: ["Mike"] },
      ],
    });

    expect(table.get("mike")).toBe("Mikey");
  });

  test("empty input gives an empty table", () => {
    expect(buildNameCorrections(null).size).toBe(0);
    expect(buildNameCorrections({}).size).toBe(0);
  });

  test("malformed files fail loudly", () => {
    expect(() => buildNameCorrections({ corrections: "Jon" })).toThrow("`corrections` must be a list");
    expect(() => buildNameCorrections({ corrections: [{ variants: ["x"] }] })).toThrow(
      "Name correction #1 is missing `canonical`",
    );
    expect(() => buildNameCorrections(["Jon"])).toThrow(
      "Name corrections must be a YAML mapping with a `corrections` list",
    );
  });
});

describe("loadNameCorrections", () => {
  test("reads the bundled YAML table", () => {
    const table = loadNameCorrections(path.join(process.cwd(), "data", "name-corrections.yml"));
    expect(correctName("Katy", table)).toBe("Katie");
  });

  test("a missing file means no corrections", () => {
    expect(loadNameCorrections(path.join(process.cwd(), "data", "no-such-file.yml")).size).toBe(0);
  });
});

describe("applyNameCorrections", () => {
  test("fixes winners, runners-up, top-five entries and question answers", () => {
    const table = buildNameCorrections({
      corrections: [
        { canonical: "Jon", variants: ["John"] },
        { canonical: "Katie", variants: ["Katy"] },
      ],
    });
    const results: CategoryResults = {
      winners: { bestJoke: winner("John", "Katy") },
      topFives: {
        funniestSentences: {
          entries: [
            {
              rank: 1,
              speaker: "katy",
              timestamp: "00:03:00",
              quote: "q",
              context: "",
              audioQuality: "Clear",
              score: 9,
              reasoning: "",
            },
          ],
        },
      },
      openingQuestions: [
        { question: "Rating?", speaker: "John", answer: "7", timestamp: "00:00:30", entertainmentValue: 5 },
      ],
      source: "nested",
      notes: [],
      generatedAt: "2024-03-16T12:00:00.000Z",
    };

    expect(applyNameCorrections(results, table)).toBe(4);
    expect(results.winners.bestJoke?.speaker).toBe("Jon");
    expect(results.winners.bestJoke?.runnersUp[0].speaker).toBe("Katie");
    expect(results.topFives.funniestSentences?.entries[0].speaker).toBe("Katie");
    expect(results.openingQuestions[0].speaker).toBe("Jon");

    expect(applyNameCorrections(results, table)).toBe(0);
  });
});
