import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";
import { hasTranscript, participantForSlot, type AudioFile, type Session } from "../sessions/types.js";
import { flattenTranscript } from "./flattenTranscript.js";

const aggregateLog = log.withScope("aggregate");

export const TRUNCATION_MARKER = "\n\n[... middle of the conversation omitted for length ...]\n\n";
/** Below this many free characters another individual file is not worth starting. */
export const MIN_SECTION_CHARS = 300;
const HEAD_SHARE = 0.6;

export type AggregateSource = "master" | "individual" | "none";

export type AggregatedTranscript = {
  text: string;
  truncated: boolean;
  includedFiles: string[];
  skippedFiles: string[];
  source: AggregateSource;
};

type AggregateSession = Pick<Session, "title" | "sessionDate" | "participantsPresent" | "micAssignments" | "audioFiles">;

function header(session: AggregateSession): string {
  return [
    "=== TRANSCRIPT ANALYSIS CONTEXT ===",
    `Movie: ${session.title}`,
    `Date: ${session.sessionDate}`,
    `Participants: ${session.participantsPresent.join(", ")}`,
    "",
    "",
  ].join("\n");
}

const MASTER_HEADER = [
  "=== MASTER RECORDING (Full Group Conversation) ===",
  "IMPORTANT: Use ONLY timestamps from this master recording for audio clips.",
  "This captures everyone talking together with natural overlaps and interruptions.",
  "",
  "",
].join("\n");

const INDIVIDUAL_HEADER = [
  "=== INDIVIDUAL RECORDINGS (Merged) ===",
  "Note: These are separate mic recordings merged together.",
  "",
].join("\n");

/** Keep the first 60% and last 40% of `text` so the result with the marker is exactly `budget` long. */
export function headTailTruncate(text: string, budget: number): string {
  if (text.length <= budget) return text;
  const available = Math.max(0, budget - TRUNCATION_MARKER.length);
  const headLength = Math.floor(available * HEAD_SHARE);
  const tailLength = available - headLength;
  return text.slice(0, headLength) + TRUNCATION_MARKER + (tailLength > 0 ? text.slice(-tailLength) : "");
}

export function speakerNameFor(file: AudioFile, session: Pick<Session, "micAssignments">): string {
  if (file.speakerSlot !== undefined) return participantForSlot(session, file.speakerSlot);
  if (file.auxiliaryRole === "phone") return "Phone Input";
  if (file.auxiliaryRole === "soundPad") return "Sound Effects";
  return file.fileName;
}

function slotOrder(a: AudioFile, b: AudioFile): number {
  const slotA = a.speakerSlot ?? Number.MAX_SAFE_INTEGER;
  const slotB = b.speakerSlot ?? Number.MAX_SAFE_INTEGER;
  return slotA - slotB || a.fileName.localeCompare(b.fileName);
}

/**
 * One analysis input per session. The master transcript is preferred (it
 * already holds everyone); without one, individual mic transcripts are merged
 * in slot order. The result never exceeds `maxChars`.
 */
export function aggregateTranscript(
  session: AggregateSession,
  maxChars: number = cfg.analysis.maxTranscriptChars,
): AggregatedTranscript {
  const head = header(session);
  const transcribed = session.audioFiles.filter(hasTranscript);
  const master = transcribed.find((f) => f.isMasterRecording);

  if (master) {
    const labelFor = (speaker: number | undefined): string =>
      speaker === undefined ? "Speaker" : session.micAssignments[speaker + 1]?.trim() || `Speaker ${speaker + 1}`;
    const body = flattenTranscript(master.transcriptText ?? "", labelFor);
    const budget = Math.max(0, maxChars - head.length - MASTER_HEADER.length);
    const truncated = body.length > budget;
    if (truncated) {
      aggregateLog.warn(`Master transcript truncated to fit analysis budget`, {
        file: master.fileName,
        chars: body.length,
        budget,
      });
    }
    const text = (head + MASTER_HEADER + headTailTruncate(body, budget)).slice(0, maxChars);
    return { text, truncated, includedFiles: [master.fileName], skippedFiles: [], source: "master" };
  }

  const individuals = transcribed.filter((f) => !f.isMasterRecording).sort(slotOrder);
  if (individuals.length === 0) {
    return { text: head.slice(0, maxChars), truncated: false, includedFiles: [], skippedFiles: [], source: "none" };
  }

  let text = (head + INDIVIDUAL_HEADER).slice(0, maxChars);
  let truncated = false;
  const includedFiles: string[] = [];
  const skippedFiles: string[] = [];

  for (const file of individuals) {
    const remaining = maxChars - text.length;
    if (remaining < MIN_SECTION_CHARS) {
      skippedFiles.push(file.fileName);
      continue;
    }

    const speaker = speakerNameFor(file, session);
    const body = flattenTranscript(file.transcriptText ?? "", () => speaker);
    const opening = `\n--- ${speaker} (from ${file.fileName}) ---\n`;
    const block = `${opening}${body}\n`;

    if (block.length > remaining) {
      // only one file can overflow; the budget is spent afterwards
      const bodyBudget = remaining - opening.length - 1;
      text += `${opening}${headTailTruncate(body, bodyBudget)}\n`.slice(0, remaining);
      truncated = true;
      aggregateLog.warn(`Transcript truncated to fit analysis budget`, {
        file: file.fileName,
        chars: body.length,
        budget: bodyBudget,
      });
    } else {
      text += block;
    }
    includedFiles.push(file.fileName);
  }

  if (skippedFiles.length > 0) {
    truncated = true;
    aggregateLog.warn(`Analysis budget exhausted; ${skippedFiles.length} transcript(s) left out`, {
      skipped: skippedFiles,
    });
  }

  return { text, truncated, includedFiles, skippedFiles, source: "individual" };
}
