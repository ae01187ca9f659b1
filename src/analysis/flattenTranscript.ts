import { log } from "../utils/logger.js";

const aggregateLog = log.withScope("aggregate");

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

type FlatUtterance = { speaker?: number; text: string };

function utterancesOf(parsed: unknown): FlatUtterance[] | null {
  let list: unknown = null;
  if (Array.isArray(parsed)) {
    list = parsed;
  } else if (isRecord(parsed)) {
    if (Array.isArray(parsed.utterances)) {
      list = parsed.utterances;
    } else if (isRecord(parsed.result) && isRecord(parsed.result.transcription)) {
      list = parsed.result.transcription.utterances;
    } else if (isRecord(parsed.transcription)) {
      list = parsed.transcription.utterances;
    }
  }
  if (!Array.isArray(list)) return null;

  return list.filter(isRecord).map((u) => ({
    speaker: typeof u.speaker === "number" ? u.speaker : undefined,
    text: typeof u.text === "string" ? u.text : "",
  }));
}

/**
 * Stored transcripts are usually plain `Name: text` lines, but older records
 * hold the raw JSON. JSON with utterances becomes one `label: text` line per
 * non-empty utterance; anything else passes through unchanged.
 */
export function flattenTranscript(text: string, labelFor: (speaker: number | undefined) => string): string {
  const trimmed = text.trimStart();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) {
    return text;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    aggregateLog.warn(`Transcript looks like JSON but does not parse; using it as-is`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return text;
  }

  const utterances = utterancesOf(parsed);
  if (!utterances) return text;

  return utterances
    .filter((u) => u.text.trim())
    .map((u) => `${labelFor(u.speaker)}: ${u.text.trim()}`)
    .join("\n");
}
