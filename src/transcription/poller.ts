import fs from "node:fs";
import path from "node:path";
import { cfg } from "../config/env.js";
import { errorMessage, log } from "../utils/logger.js";
import { sleep as realSleep, systemClock, type Clock, type Sleep } from "../utils/clock.js";
import { baseNameWithoutExt, isMp3 } from "../audio/audioFiles.js";
import { mapSpeakerLabels } from "../speakers/labelMapper.js";
import type { AudioFile, MicAssignments } from "../sessions/types.js";
import type { GladiaTranscriptionResult, TranscriptionApi } from "./types.js";
import { buildTranscriptionRequest } from "./requestBuilder.js";
import { failFile, relocateForStatus, setFileStatus, uploadPathFor, type FileStageContext } from "./uploadFile.js";

const pollLog = log.withScope("transcribe");

export class TranscriptionTimeoutError extends Error {
  constructor(
    readonly transcriptionId: string,
    readonly timeoutMs: number,
  ) {
    super(`Transcription ${transcriptionId} did not finish within ${Math.round(timeoutMs / 60_000)} minutes`);
    this.name = "TranscriptionTimeoutError";
  }
}

export class TranscriptionFailedError extends Error {
  constructor(
    readonly transcriptionId: string,
    detail: string,
  ) {
    super(`Transcription ${transcriptionId} failed: ${detail}`);
    this.name = "TranscriptionFailedError";
  }
}

export type PollOptions = {
  pollIntervalMs?: number;
  timeoutMs?: number;
  sleep?: Sleep;
  clock?: Clock;
};

/**
 * Poll until the job is `done` (returns the result) or `error` (throws
 * TranscriptionFailedError). Gives up with TranscriptionTimeoutError once the
 * ceiling has passed.
 */
export async function waitForTranscription(
  api: TranscriptionApi,
  transcriptionId: string,
  opts: PollOptions = {},
): Promise<GladiaTranscriptionResult> {
  const pollIntervalMs = opts.pollIntervalMs ?? cfg.gladia.pollIntervalMs;
  const timeoutMs = opts.timeoutMs ?? cfg.gladia.timeoutMs;
  const sleep = opts.sleep ?? realSleep;
  const clock = opts.clock ?? systemClock;

  const startedAt = clock.now().getTime();
  let polls = 0;

  for (;;) {
    const result = await api.getResult(transcriptionId);
    polls++;

    if (result.status === "done") {
      pollLog.info(`Transcription ${transcriptionId} complete after ${polls} poll(s)`);
      return result;
    }

    if (result.status === "error") {
      const detail = result.error?.message ?? (result.error_code ? `error code ${result.error_code}` : "unknown error");
      throw new TranscriptionFailedError(transcriptionId, detail);
    }

    const elapsed = clock.now().getTime() - startedAt;
    if (elapsed + pollIntervalMs > timeoutMs) {
      throw new TranscriptionTimeoutError(transcriptionId, timeoutMs);
    }

    pollLog.debug(`Transcription ${transcriptionId} ${result.status}`, { elapsedMs: elapsed });
    await sleep(pollIntervalMs);
  }
}

/**
 * Utterances as `Speaker {n}: text` lines (n is 1-based), else the plain
 * transcript. Throws when the result carries neither.
 */
export function formatTranscript(result: GladiaTranscriptionResult): string {
  const transcription = result.result?.transcription;
  const utterances = (transcription?.utterances ?? []).filter((u) => u.text.trim());

  if (utterances.length > 0) {
    return utterances
      .map((u) => `Speaker ${(u.speaker ?? 0) + 1}: ${u.text.trim()}`)
      .join("\n");
  }

  const full = transcription?.full_transcript?.trim();
  if (full) return full;

  throw new TranscriptionFailedError(result.id, "completed without utterances or transcript text");
}

export type TranscriptionSidecars = {
  jsonFilePath: string;
  textFilePath: string;
};

/** `{base}_transcription.json` (raw result) and `{base}.txt` beside the audio file. */
export function persistTranscriptionSidecars(
  audioPath: string,
  result: GladiaTranscriptionResult,
  transcriptText: string,
): TranscriptionSidecars {
  const dir = path.dirname(audioPath);
  const base = baseNameWithoutExt(audioPath);
  const jsonFilePath = path.join(dir, `${base}_transcription.json`);
  const textFilePath = path.join(dir, `${base}.txt`);

  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(jsonFilePath, JSON.stringify(result, null, 2), "utf-8");
  fs.writeFileSync(textFilePath, transcriptText, "utf-8");
  return { jsonFilePath, textFilePath };
}

/**
 * Build the label-mapped transcript for a finished result and store it on the
 * file together with its sidecars.
 */
export function applyTranscriptionResult(
  file: AudioFile,
  result: GladiaTranscriptionResult,
  micAssignments: MicAssignments,
): void {
  const raw = formatTranscript(result);
  const mapped = mapSpeakerLabels(raw, micAssignments, file.fileName);
  const sidecars = persistTranscriptionSidecars(uploadPathFor(file), result, mapped);

  file.transcriptText = mapped;
  file.jsonFilePath = sidecars.jsonFilePath;
  const duration = result.result?.metadata?.audio_duration;
  if (typeof duration === "number" && duration > 0) {
    file.durationSeconds = duration;
  }
}

export type TranscribeContext = FileStageContext & {
  micAssignments: MicAssignments;
  language?: string;
  poll?: PollOptions;
};

/**
 * Submit an uploaded file, wait for the job and store the transcript. A file
 * that already has a transcript id resumes polling instead of resubmitting.
 */
export async function transcribeFile(
  file: AudioFile,
  api: TranscriptionApi,
  ctx: TranscribeContext,
): Promise<boolean> {
  if (!file.audioUrl) {
    failFile(file, "Transcription", new Error("file has no uploaded audio URL"), ctx, { canRetry: true });
    return false;
  }

  try {
    if (!file.transcriptId) {
      const request = buildTranscriptionRequest({
        audioUrl: file.audioUrl,
        fileName: file.fileName,
        isMasterRecording: file.isMasterRecording,
        speakerCount: Object.keys(ctx.micAssignments).length || 2,
        language: ctx.language ?? cfg.gladia.language,
      });
      file.transcriptId = await api.submit(request);
    }
    setFileStatus(file, "Transcribing", ctx);

    const result = await waitForTranscription(api, file.transcriptId, { clock: ctx.clock, ...ctx.poll });

    if (isMp3(uploadPathFor(file))) {
      relocateForStatus(file, "TranscriptionComplete", ctx.layout);
    }
    applyTranscriptionResult(file, result, ctx.micAssignments);
    file.conversionError = undefined;
    setFileStatus(file, "TranscriptionComplete", ctx);
    return true;
  } catch (err) {
    pollLog.error(`Transcription failed for ${file.fileName}`, { error: errorMessage(err) });
    // a timed-out job may still finish upstream; keep the id so a redownload can pick it up
    if (err instanceof TranscriptionFailedError) file.transcriptId = undefined;
    failFile(file, "Transcription", err, ctx, { canRetry: true });
    return false;
  }
}
