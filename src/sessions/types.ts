import type { CategoryResults, SessionStats } from "../analysis/types.js";

export const SESSION_STATUSES = [
  "Pending",
  "Validating",
  "Transcribing",
  "Analyzing",
  "Complete",
  "Failed",
] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const AUDIO_PROCESSING_STATUSES = [
  "Pending",
  "ConvertingToMp3",
  "PendingMp3",
  "FailedMp3",
  "ProcessedMp3",
  "UploadingToGladia",
  "UploadedToGladia",
  "Transcribing",
  "TranscriptionComplete",
  "Failed",
] as const;

export type AudioProcessingStatus = (typeof AUDIO_PROCESSING_STATUSES)[number];

/** 1-based microphone number (MIC1 → 1) to participant name. */
export type MicAssignments = Record<number, string>;

export type AudioFile = {
  fileName: string;
  /** Source-stage file (WAV or whatever was recorded). */
  filePath: string;
  /** Compressed upload copy, set once conversion succeeded. */
  mp3FilePath?: string;
  fileSize: number;
  durationSeconds?: number;
  /** 0-based; MIC1 → 0. Never reassigned once set. */
  speakerSlot?: number;
  isMasterRecording: boolean;
  /** PHONE / SOUND_PAD style sources: identified, but no speaker slot. */
  auxiliaryRole?: "phone" | "soundPad";
  processingStatus: AudioProcessingStatus;
  audioUrl?: string;
  transcriptText?: string;
  transcriptId?: string;
  jsonFilePath?: string;
  conversionError?: string;
  canRetry: boolean;
  lastUpdated: string;
};

export type Session = {
  id: string;
  title: string;
  sessionDate: string; // ISO date (yyyy-MM-dd)
  folderPath: string;
  status: SessionStatus;
  audioFiles: AudioFile[];
  micAssignments: MicAssignments;
  participantsPresent: string[];
  participantsAbsent: string[];
  discussionQuestions: string[];
  categoryResults: CategoryResults | null;
  stats: SessionStats | null;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
  processedAt?: string;
};

export function isSessionStatus(value: unknown): value is SessionStatus {
  return SESSION_STATUSES.some((s) => s === value);
}

export function participantForSlot(session: Pick<Session, "micAssignments">, slot: number): string {
  const name = session.micAssignments[slot + 1];
  return name && name.trim() ? name.trim() : `Mic ${slot + 1}`;
}

export function hasTranscript(file: AudioFile): boolean {
  return file.processingStatus === "TranscriptionComplete" && !!file.transcriptText?.trim();
}
