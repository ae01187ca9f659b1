import type { CategoryResults, CategoryWinner, TopFiveEntry } from "../../analysis/types.js";
import type { AudioFile, Session } from "../../sessions/types.js";

export const FIXED_NOW = "2024-03-16T12:00:00.000Z";

export function audioFile(fileName: string, overrides: Partial<AudioFile> = {}): AudioFile {
  return {
    fileName,
    filePath: `/recordings/2024-March-Inception/${fileName}`,
    fileSize: 1000,
    isMasterRecording: false,
    processingStatus: "Pending",
    canRetry: true,
    lastUpdated: FIXED_NOW,
    ...overrides,
  };
}

export function transcribed(fileName: string, transcriptText: string, overrides: Partial<AudioFile> = {}): AudioFile {
  return audioFile(fileName, { processingStatus: "TranscriptionComplete", transcriptText, ...overrides });
}

export function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: "session-1",
    title: "Inception",
    sessionDate: "2024-03-01",
    folderPath: "/recordings/2024-March-Inception",
    status: "Pending",
    audioFiles: [],
    micAssignments: { 1: "Jon", 2: "Katie" },
    participantsPresent: ["Jon", "Katie"],
    participantsAbsent: [],
    discussionQuestions: [],
    categoryResults: null,
    stats: null,
    createdAt: FIXED_NOW,
    updatedAt: FIXED_NOW,
    ...overrides,
  };
}

export function winner(speaker: string, timestamp: string, overrides: Partial<CategoryWinner> = {}): CategoryWinner {
  return {
    speaker,
    timestamp,
    quote: "quote",
    setup: "",
    groupReaction: "",
    whyItsGreat: "",
    audioQuality: "Clear",
    entertainmentScore: 8,
    runnersUp: [],
    ...overrides,
  };
}

export function topFiveEntry(rank: number, speaker: string, timestamp: string, overrides: Partial<TopFiveEntry> = {}): TopFiveEntry {
  return {
    rank,
    speaker,
    timestamp,
    quote: `line ${rank}`,
    context: "",
    audioQuality: "Clear",
    score: 8,
    reasoning: "",
    ...overrides,
  };
}

export function results(overrides: Partial<CategoryResults> = {}): CategoryResults {
  return {
    winners: {},
    topFives: {},
    openingQuestions: [],
    source: "nested",
    notes: [],
    generatedAt: FIXED_NOW,
    ...overrides,
  };
}
