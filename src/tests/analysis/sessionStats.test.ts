import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { generateSessionStats, loadWordLists, type WordLists } from "../../analysis/sessionStats.js";
import { makeSession, results, topFiveEntry, transcribed, winner } from "../helpers/sessionFixtures.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

const WORDS: WordLists = { laughter: ["haha", "lol"], curseWords: ["damn"] };

function masterJson(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stats-"));
  tempDirs.push(dir);
  const jsonPath = path.join(dir, "MASTER_MIX_transcription.json");
  fs.writeFileSync(
    jsonPath,
    JSON.stringify({
      id: "job-1",
      status: "done",
      result: {
        transcription: {
          utterances: [
            { speaker: 0, start: 0, end: 5, text: "a" },
            { speaker: 1, start: 4, end: 8, text: "b" },
            { speaker: 1, start: 8.5, end: 9, text: "c" },
            { speaker: 0, start: 8.8, end: 10, text: "d" },
          ],
        },
      },
    }),
  );
  return jsonPath;
}

describe("generateSessionStats", () => {
  test("counts per person from mic transcripts and interruptions from master timing", () => {
    const session = makeSession({
      participantsAbsent: ["Mikey"],
      audioFiles: [
        transcribed("MIC1.wav", "Jon: haha that is damn good?\nJon: lol what?", { speakerSlot: 0 }),
        transcribed("MIC2.wav", "Katie: fine", { speakerSlot: 1 }),
        transcribed("MASTER_MIX.wav", "Jon: everything", {
          isMasterRecording: true,
          durationSeconds: 3900,
          jsonFilePath: masterJson(),
        }),
      ],
    });
    const analysis = results({
      winners: { bestJoke: winner("Jon", "01:00", { entertainmentScore: 9 }), hottestTake: winner("Katie", "02:00", { entertainmentScore: 7 }) },
      topFives: { funniestSentences: { entries: [topFiveEntry(1, "Jon", "03:00", { score: 8.6 })] } },
    });

    expect(generateSessionStats(session, analysis, WORDS)).toEqual({
      totalDuration: "1h 5m",
      energyLevel: "High",
      technicalQuality: "Excellent - all audio clear",
      highlightMoments: 3,
      attendancePattern: "2/3 regular members present",
      bestMomentsSummary: "Best joke by Jon, Hot take from Katie, 1 hilarious moments.",
      wordCounts: { Jon: 7, Katie: 1 },
      questionCounts: { Jon: 2, Katie: 0 },
      laughterCounts: { Jon: 2, Katie: 0 },
      curseWordCounts: { Jon: 1, Katie: 0 },
      interruptionCounts: { Katie: 1, Jon: 1 },
      mostTalkativePerson: "Jon",
      quietestPerson: "Katie",
      mostInquisitivePerson: "Jon",
      biggestInterruptor: "Katie",
      mostProfanePerson: "Jon",
      totalWords: 8,
      totalQuestions: 2,
      totalLaughterMoments: 2,
      totalCurseWords: 1,
      totalInterruptions: 2,
    });
  });

  test("without analysis or transcripts the summary fields fall back", () => {
    const stats = generateSessionStats(makeSession({ participantsPresent: [] }), null, WORDS);

    expect(stats.totalDuration).toBe("0m");
    expect(stats.energyLevel).toBe("Medium");
    expect(stats.technicalQuality).toBe("Unknown");
    expect(stats.highlightMoments).toBe(0);
    expect(stats.attendancePattern).toBe("0/0 regular members present");
    expect(stats.bestMomentsSummary).toBe("Session analyzed but no standout moments identified");
    expect(stats.mostTalkativePerson).toBeUndefined();
    expect(stats.biggestInterruptor).toBeUndefined();
  });

  test("low scores mean low energy", () => {
    const analysis = results({ winners: { bestJoke: winner("Jon", "01:00", { entertainmentScore: 3 }) } });
    expect(generateSessionStats(makeSession(), analysis, WORDS).energyLevel).toBe("Low");
  });
});

describe("loadWordLists", () => {
  test("reads the bundled lists", () => {
    const lists = loadWordLists(path.join(process.cwd(), "data", "word-lists.json"));
    expect(lists.laughter).toContain("haha");
    expect(lists.curseWords).toContain("damn");
  });

  test("a missing file gives empty lists", () => {
    expect(loadWordLists(path.join(process.cwd(), "data", "missing.json"))).toEqual({ laughter: [], curseWords: [] });
  });
});
