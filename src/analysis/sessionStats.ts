import fs from "node:fs";
import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";
import { hasTranscript, participantForSlot, type AudioFile, type Session } from "../sessions/types.js";
import type { CategoryResults, EnergyLevel, SessionStats } from "./types.js";

const statsLog = log.withScope("stats");

export type WordLists = {
  laughter: string[];
  curseWords: string[];
};

function escapeRegex(word: string): string {
  return word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function wordRegex(words: readonly string[]): RegExp | null {
  const cleaned = words.map((w) => w.trim()).filter(Boolean);
  if (cleaned.length === 0) return null;
  return new RegExp(`\\b(${cleaned.map(escapeRegex).join("|")})\\b`, "gi");
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function loadWordLists(filePath: string = cfg.analysis.wordListsPath): WordLists {
  if (!fs.existsSync(filePath)) {
    statsLog.warn(`Word lists not found at ${filePath}; laughter and curse counts will be zero`);
    return { laughter: [], curseWords: [] };
  }
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`Word lists file must hold a JSON object: ${filePath}`);
  }
  const laughter = "laughter" in raw ? raw.laughter : [];
  const curseWords = "curseWords" in raw ? raw.curseWords : [];
  if (!isStringArray(laughter) || !isStringArray(curseWords)) {
    throw new Error(`Word lists must be arrays of strings: ${filePath}`);
  }
  return { laughter, curseWords };
}

/** `1h 5m` for an hour or more, else `42m`. Longest file wins (usually the master). */
export function formatSessionDuration(files: readonly AudioFile[]): string {
  const seconds = Math.max(0, ...files.map((f) => f.durationSeconds ?? 0));
  const totalMinutes = seconds / 60;
  if (totalMinutes >= 60) {
    return `${Math.floor(totalMinutes / 60)}h ${Math.floor(totalMinutes % 60)}m`;
  }
  return `${Math.floor(totalMinutes)}m`;
}

export function determineEnergyLevel(results: CategoryResults | null): EnergyLevel {
  if (!results) return "Medium";
  const scores: number[] = [];
  for (const key of ["bestJoke", "hottestTake", "bestPlotTwistRevelation"] as const) {
    const winner = results.winners[key];
    if (winner) scores.push(winner.entertainmentScore);
  }
  for (const entry of results.topFives.funniestSentences?.entries ?? []) {
    scores.push(Math.trunc(entry.score));
  }
  if (scores.length === 0) return "Medium";

  const average = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  if (average >= 8) return "High";
  if (average >= 6) return "Medium";
  return "Low";
}

export function assessTechnicalQuality(files: readonly AudioFile[]): string {
  if (files.length === 0) return "Unknown";
  const percentage = (files.filter(hasTranscript).length / files.length) * 100;
  if (percentage >= 90) return "Excellent - all audio clear";
  if (percentage >= 70) return "Good - most audio clear";
  if (percentage >= 50) return "Fair - some audio issues";
  return "Poor - significant audio problems";
}

export function countHighlightMoments(results: CategoryResults | null): number {
  if (!results) return 0;
  const winners = (["bestJoke", "hottestTake", "mostOffensiveTake", "bestPlotTwistRevelation", "biggestArgumentStarter"] as const)
    .filter((key) => results.winners[key]).length;
  return (
    winners +
    (results.topFives.funniestSentences?.entries.length ?? 0) +
    (results.topFives.mostBlandComments?.entries.length ?? 0)
  );
}

export function bestMomentsSummary(results: CategoryResults | null): string {
  const parts: string[] = [];
  const bestJoke = results?.winners.bestJoke;
  const hottestTake = results?.winners.hottestTake;
  const plotTwist = results?.winners.bestPlotTwistRevelation;
  const funniest = results?.topFives.funniestSentences?.entries.length ?? 0;

  if (bestJoke) parts.push(`Best joke by ${bestJoke.speaker}`);
  if (hottestTake) parts.push(`Hot take from ${hottestTake.speaker}`);
  if (plotTwist) parts.push(`Great insight by ${plotTwist.speaker}`);
  if (funniest > 0) parts.push(`${funniest} hilarious moments`);

  return parts.length > 0 ? `${parts.join(", ")}.` : "Session analyzed but no standout moments identified";
}

/** Drop the `Name:` prefix the label mapper puts on each line. */
function spokenText(transcript: string): string {
  return transcript
    .split("\n")
    .map((line) => line.replace(/^[^:\n]{1,60}:\s*/, ""))
    .join("\n");
}

function countMatches(text: string, regex: RegExp | null): number {
  if (!regex) return 0;
  return text.match(regex)?.length ?? 0;
}

function topOf(counts: Record<string, number>, pick: "max" | "min"): string | undefined {
  const entries = Object.entries(counts);
  if (entries.length === 0) return undefined;
  const sorted = [...entries].sort((a, b) => (pick === "max" ? b[1] - a[1] : a[1] - b[1]));
  return sorted[0][0];
}

type TimedUtterance = { speaker: number; start: number; end: number };

function readTimedUtterances(jsonFilePath: string | undefined): TimedUtterance[] {
  if (!jsonFilePath || !fs.existsSync(jsonFilePath)) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(jsonFilePath, "utf-8"));
  } catch (err) {
    statsLog.warn(`Could not read transcription JSON ${jsonFilePath}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  const isObj = (v: unknown): v is Record<string, unknown> => !!v && typeof v === "object" && !Array.isArray(v);
  if (!isObj(parsed) || !isObj(parsed.result) || !isObj(parsed.result.transcription)) return [];
  const utterances = parsed.result.transcription.utterances;
  if (!Array.isArray(utterances)) return [];

  return utterances.filter(isObj).flatMap((u) =>
    typeof u.speaker === "number" && typeof u.start === "number" && typeof u.end === "number"
      ? [{ speaker: u.speaker, start: u.start, end: u.end }]
      : [],
  );
}

/**
 * Interruptions from master timing: the speaker changes and the new utterance
 * starts before the previous one ended. Credited to the one who cut in.
 */
export function countInterruptions(
  utterances: readonly TimedUtterance[],
  nameFor: (speaker: number) => string,
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (let i = 1; i < utterances.length; i++) {
    const prev = utterances[i - 1];
    const next = utterances[i];
    if (next.speaker !== prev.speaker && next.start < prev.end) {
      const name = nameFor(next.speaker);
      counts[name] = (counts[name] ?? 0) + 1;
    }
  }
  return counts;
}

/**
 * Deterministic counters over the stored transcripts plus summary fields
 * derived from the analysis. Per-person counts come from personal mic files
 * only; the master only feeds interruptions.
 */
export function generateSessionStats(
  session: Pick<Session, "audioFiles" | "micAssignments" | "participantsPresent" | "participantsAbsent">,
  results: CategoryResults | null,
  wordLists: WordLists = loadWordLists(),
): SessionStats {
  const laughterRegex = wordRegex(wordLists.laughter);
  const curseRegex = wordRegex(wordLists.curseWords);

  const wordCounts: Record<string, number> = {};
  const questionCounts: Record<string, number> = {};
  const laughterCounts: Record<string, number> = {};
  const curseWordCounts: Record<string, number> = {};

  for (const file of session.audioFiles) {
    if (file.speakerSlot === undefined || file.isMasterRecording || !hasTranscript(file)) continue;
    const name = participantForSlot(session, file.speakerSlot);
    const text = spokenText(file.transcriptText ?? "");

    wordCounts[name] = (wordCounts[name] ?? 0) + text.split(/\s+/).filter(Boolean).length;
    questionCounts[name] = (questionCounts[name] ?? 0) + (text.match(/\?/g)?.length ?? 0);
    laughterCounts[name] = (laughterCounts[name] ?? 0) + countMatches(text, laughterRegex);
    curseWordCounts[name] = (curseWordCounts[name] ?? 0) + countMatches(text, curseRegex);
  }

  const master = session.audioFiles.find((f) => f.isMasterRecording && hasTranscript(f));
  const interruptionCounts = countInterruptions(readTimedUtterances(master?.jsonFilePath), (speaker) =>
    session.micAssignments[speaker + 1]?.trim() || `Speaker ${speaker + 1}`,
  );

  const sum = (counts: Record<string, number>): number => Object.values(counts).reduce((a, b) => a + b, 0);
  const nonZeroMax = (counts: Record<string, number>): string | undefined =>
    sum(counts) > 0 ? topOf(counts, "max") : undefined;

  const present = session.participantsPresent.length;
  const absent = session.participantsAbsent.length;

  const stats: SessionStats = {
    totalDuration: formatSessionDuration(session.audioFiles),
    energyLevel: determineEnergyLevel(results),
    technicalQuality: assessTechnicalQuality(session.audioFiles),
    highlightMoments: countHighlightMoments(results),
    attendancePattern: `${present}/${present + absent} regular members present`,
    bestMomentsSummary: bestMomentsSummary(results),
    wordCounts,
    questionCounts,
    laughterCounts,
    curseWordCounts,
    interruptionCounts,
    mostTalkativePerson: topOf(wordCounts, "max"),
    quietestPerson: topOf(wordCounts, "min"),
    mostInquisitivePerson: nonZeroMax(questionCounts),
    biggestInterruptor: nonZeroMax(interruptionCounts),
    mostProfanePerson: nonZeroMax(curseWordCounts),
    totalWords: sum(wordCounts),
    totalQuestions: sum(questionCounts),
    totalLaughterMoments: sum(laughterCounts),
    totalCurseWords: sum(curseWordCounts),
    totalInterruptions: sum(interruptionCounts),
  };

  statsLog.info(`Generated session stats: ${stats.totalDuration}, ${stats.energyLevel}, ${stats.highlightMoments} highlights`);
  return stats;
}
