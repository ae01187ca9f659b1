import { randomUUID } from "node:crypto";
import path from "node:path";
import { analyzeSession, analyzeSessions, type AnalyzeDeps } from "../analysis/analyzeSession.js";
import { loadActiveDiscussionQuestions } from "../analysis/discussionQuestions.js";
import { generateSessionStats, loadWordLists, type WordLists } from "../analysis/sessionStats.js";
import type { CategoryResults } from "../analysis/types.js";
import { isMp3 } from "../audio/audioFiles.js";
import { classifyFolder } from "../audio/classifyFiles.js";
import type { AudioConverter } from "../audio/ffmpeg.js";
import { initializeStatusFolders, resolveLayout } from "../audio/statusFolders.js";
import { generateHighlightClips } from "../clips/highlightClips.js";
import { cfg } from "../config/env.js";
import { determineParticipants, parseFolderDate, suggestTitle } from "../sessions/folderMetadata.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import {
  hasTranscript,
  type AudioFile,
  type AudioProcessingStatus,
  type MicAssignments,
  type Session,
  type SessionStatus,
} from "../sessions/types.js";
import { applyTranscriptionResult, transcribeFile, type PollOptions } from "../transcription/poller.js";
import type { TranscriptionApi } from "../transcription/types.js";
import {
  convertFile,
  relocateForStatus,
  setFileStatus,
  uploadFile,
  uploadPathFor,
  type FileStageContext,
  type UploadOptions,
} from "../transcription/uploadFile.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { errorMessage, log } from "../utils/logger.js";

const pipelineLog = log.withScope("pipeline");

export type PipelineDeps = {
  store: SessionStore;
  api: TranscriptionApi;
  converter: AudioConverter;
  clock?: Clock;
  newId?: () => string;
  analysis?: AnalyzeDeps;
  upload?: UploadOptions;
  poll?: PollOptions;
  language?: string;
  largeFileThresholdBytes?: number;
  discussionQuestions?: string[];
  wordLists?: WordLists;
  clipsDir?: string;
};

const FAILED_FILE_STATUSES: readonly AudioProcessingStatus[] = ["Failed", "FailedMp3"];
const IN_FLIGHT_SESSION_STATUSES: readonly SessionStatus[] = ["Validating", "Transcribing", "Analyzing"];

function isFailed(file: AudioFile): boolean {
  return FAILED_FILE_STATUSES.includes(file.processingStatus);
}

/** Files the current pass still has work for. Failed files wait for recoverFailedFiles. */
function isActive(file: AudioFile): boolean {
  return !isFailed(file) && !hasTranscript(file);
}

function nowIso(deps: Pick<PipelineDeps, "clock">): string {
  return (deps.clock ?? systemClock).now().toISOString();
}

function persist(session: Session, deps: Pick<PipelineDeps, "store" | "clock">): void {
  session.updatedAt = nowIso(deps);
  deps.store.upsert(session);
}

function setSessionStatus(session: Session, status: SessionStatus, deps: Pick<PipelineDeps, "store" | "clock">): void {
  session.status = status;
  persist(session, deps);
  pipelineLog.info(`Session ${session.title} → ${status}`, { sessionId: session.id });
}

function requireSession(id: string, store: SessionStore): Session {
  const session = store.getById(id);
  if (!session) throw new Error(`Session ${id} not found`);
  return session;
}

function fileContext(session: Session, deps: PipelineDeps): FileStageContext {
  return {
    folderPath: session.folderPath,
    layout: resolveLayout(session.folderPath),
    clock: deps.clock,
    onUpdate: () => persist(session, deps),
  };
}

function applyMicAssignments(
  session: Session,
  micAssignments: MicAssignments,
  deps: Pick<PipelineDeps, "store" | "clock">,
): Session {
  const changed = Object.entries(micAssignments).filter(([mic, name]) => session.micAssignments[Number(mic)] !== name);
  if (changed.length === 0) return session;

  session.micAssignments = { ...session.micAssignments, ...micAssignments };
  determineParticipants(session);
  session.updatedAt = nowIso(deps);
  deps.store.upsert(session);
  pipelineLog.info(`Updated mic assignments for session ${session.id}`, {
    mics: Object.fromEntries(changed),
    present: session.participantsPresent,
  });
  return session;
}

/**
 * Classify a recording folder into a new Pending session and store it. A
 * folder that already has a session returns that one, with any mic
 * assignments given here layered over the stored ones.
 */
export function createSessionFromFolder(
  folderPath: string,
  micAssignments: MicAssignments,
  deps: Pick<PipelineDeps, "store" | "clock" | "newId" | "discussionQuestions">,
): Session {
  const resolved = path.resolve(folderPath);
  const existing = deps.store.findBy((s) => s.folderPath === resolved)[0];
  if (existing) {
    pipelineLog.info(`Resuming existing session for ${path.basename(resolved)}`, { sessionId: existing.id });
    return applyMicAssignments(existing, micAssignments, deps);
  }

  const classification = classifyFolder(resolved, { clock: deps.clock });
  const now = nowIso(deps);

  const session: Session = {
    id: (deps.newId ?? randomUUID)(),
    title: suggestTitle(resolved),
    sessionDate: parseFolderDate(resolved),
    folderPath: resolved,
    status: "Pending",
    audioFiles: classification.audioFiles,
    micAssignments,
    participantsPresent: [],
    participantsAbsent: [],
    discussionQuestions: deps.discussionQuestions ?? loadActiveDiscussionQuestions(),
    categoryResults: null,
    stats: null,
    createdAt: now,
    updatedAt: now,
  };
  determineParticipants(session);
  deps.store.upsert(session);

  pipelineLog.info(`Created session ${session.title} (${session.sessionDate})`, {
    sessionId: session.id,
    files: session.audioFiles.length,
    master: classification.master?.fileName ?? null,
    present: session.participantsPresent,
  });
  return session;
}

function validateSessionData(session: Session): void {
  if (session.audioFiles.length === 0) {
    throw new Error("No audio files found in session");
  }
}

function validateProcessingResults(session: Session): void {
  const transcribed = session.audioFiles.filter(hasTranscript).length;
  const total = session.audioFiles.length;

  if (transcribed === 0) {
    throw new Error(`No successful transcripts generated from ${total} audio files`);
  }
  if (transcribed < total) {
    pipelineLog.warn(`Only ${transcribed}/${total} files transcribed`, { sessionId: session.id });
  }
  if (!session.categoryResults) {
    throw new Error("Session analysis not completed");
  }
}

async function runFileStages(session: Session, deps: PipelineDeps): Promise<void> {
  const ctx = fileContext(session, deps);
  initializeStatusFolders(ctx.layout);

  const needsConversion = session.audioFiles.filter((f) => isActive(f) && !f.audioUrl && !f.mp3FilePath);
  if (needsConversion.length > 0) {
    const ffmpegAvailable = await deps.converter.isAvailable();
    if (!ffmpegAvailable) pipelineLog.warn("FFmpeg not available; large WAV files will fail until it is installed");
    for (const file of needsConversion) {
      await convertFile(file, deps.converter, {
        ...ctx,
        ffmpegAvailable,
        largeFileThresholdBytes: deps.largeFileThresholdBytes,
      });
    }
    persist(session, deps);
  }

  for (const file of session.audioFiles.filter((f) => isActive(f) && !f.audioUrl)) {
    await uploadFile(file, deps.api, ctx, deps.upload);
  }
  persist(session, deps);

  for (const file of session.audioFiles.filter((f) => isActive(f) && !!f.audioUrl)) {
    await transcribeFile(file, deps.api, {
      ...ctx,
      micAssignments: session.micAssignments,
      language: deps.language,
      poll: deps.poll,
    });
  }
  persist(session, deps);
}

/** Store fresh analysis together with the stats and clips derived from it. */
function applyAnalysis(session: Session, results: CategoryResults, deps: PipelineDeps): void {
  session.categoryResults = results;
  try {
    generateHighlightClips(session, { clipsDir: deps.clipsDir });
  } catch (err) {
    pipelineLog.error(`Highlight clips failed for ${session.title}`, { sessionId: session.id, error: errorMessage(err) });
  }
  session.stats = generateSessionStats(session, results, deps.wordLists ?? loadWordLists());
}

function markComplete(session: Session, deps: PipelineDeps): void {
  validateProcessingResults(session);
  session.errorMessage = undefined;
  session.processedAt = nowIso(deps);
  setSessionStatus(session, "Complete", deps);
}

function markFailed(session: Session, err: unknown, deps: PipelineDeps): void {
  session.errorMessage = errorMessage(err);
  setSessionStatus(session, "Failed", deps);
  pipelineLog.error(`Processing failed for ${session.title}: ${session.errorMessage}`, { sessionId: session.id });
}

/**
 * Validate → convert → upload → transcribe → analyze, persisting after every
 * phase and file update. Work already done (an MP3 on disk, an upload URL, a
 * transcript id) is skipped. The session comes back `Complete` only with at
 * least one transcript and an analysis; otherwise `Failed` with the reason.
 */
export async function processSession(session: Session, deps: PipelineDeps): Promise<Session> {
  pipelineLog.info(`Processing ${session.title}`, { sessionId: session.id, files: session.audioFiles.length });

  try {
    setSessionStatus(session, "Validating", deps);
    validateSessionData(session);

    setSessionStatus(session, "Transcribing", deps);
    await runFileStages(session, deps);

    setSessionStatus(session, "Analyzing", deps);
    const results = await analyzeSession(session, { clock: deps.clock, ...deps.analysis });
    applyAnalysis(session, results, deps);
    persist(session, deps);

    markComplete(session, deps);
  } catch (err) {
    markFailed(session, err, deps);
  }
  return session;
}

/** Load a stored session and run it through processSession. */
export async function processSessionById(id: string, deps: PipelineDeps): Promise<Session> {
  return processSession(requireSession(id, deps.store), deps);
}

/** Every Pending or Failed session, oldest first, one at a time. */
export async function processPendingSessions(deps: PipelineDeps): Promise<Session[]> {
  const queue = [...deps.store.findByStatus("Pending"), ...deps.store.findByStatus("Failed")];
  pipelineLog.info(`${queue.length} session(s) waiting for processing`);

  const processed: Session[] = [];
  for (const session of queue) {
    processed.push(await processSession(session, deps));
  }
  return processed;
}

/**
 * Analyze again from the stored transcripts. The new results, stats and clips
 * replace the old ones together; a failing call leaves the session untouched
 * and throws.
 */
export async function rerunAnalysis(id: string, deps: PipelineDeps): Promise<Session> {
  const session = requireSession(id, deps.store);
  const results = await analyzeSession(session, { clock: deps.clock, ...deps.analysis });

  applyAnalysis(session, results, deps);
  try {
    markComplete(session, deps);
  } catch (err) {
    markFailed(session, err, deps);
  }
  return session;
}

/**
 * rerunAnalysis for several sessions, analyzing at most `concurrency` at a
 * time. A session whose analysis threw is left as it was.
 */
export async function rerunAnalyses(
  ids: readonly string[],
  deps: PipelineDeps,
  concurrency: number = cfg.analysis.concurrency,
): Promise<Session[]> {
  const sessions = ids.map((id) => requireSession(id, deps.store));
  const results = await analyzeSessions(sessions, { clock: deps.clock, ...deps.analysis }, concurrency);

  sessions.forEach((session, index) => {
    const result = results[index];
    if (!result) return;
    applyAnalysis(session, result, deps);
    try {
      markComplete(session, deps);
    } catch (err) {
      markFailed(session, err, deps);
    }
  });
  return sessions;
}

/**
 * Put retry-eligible failed files back into the queue and the session back to
 * Pending. Returns the number of files reset.
 */
export function recoverFailedFiles(id: string, deps: Pick<PipelineDeps, "store" | "clock">): number {
  const session = requireSession(id, deps.store);
  const layout = resolveLayout(session.folderPath);
  let recovered = 0;

  for (const file of session.audioFiles) {
    if (!isFailed(file) || !file.canRetry) continue;

    const status: AudioProcessingStatus = file.audioUrl ? "UploadedToGladia" : file.mp3FilePath ? "PendingMp3" : "Pending";
    try {
      relocateForStatus(file, status, layout);
    } catch (err) {
      pipelineLog.error(`Could not move ${file.fileName} back for ${status}`, { error: errorMessage(err) });
      continue;
    }
    file.conversionError = undefined;
    setFileStatus(file, status, { clock: deps.clock });
    recovered++;
  }

  if (recovered > 0 || session.status === "Failed") {
    session.errorMessage = undefined;
    setSessionStatus(session, "Pending", deps);
  }
  pipelineLog.info(`Recovered ${recovered} failed file(s) in ${session.title}`, { sessionId: session.id });
  return recovered;
}

/**
 * Fetch the result of every file that has a transcription id again and
 * rewrite its transcript and sidecars. Jobs that are not finished are left
 * alone. Returns the number of files refreshed.
 */
export async function redownloadTranscriptions(id: string, deps: PipelineDeps): Promise<number> {
  const session = requireSession(id, deps.store);
  const layout = resolveLayout(session.folderPath);
  let refreshed = 0;

  for (const file of session.audioFiles) {
    if (!file.transcriptId) continue;
    try {
      const result = await deps.api.getResult(file.transcriptId);
      if (result.status !== "done") {
        pipelineLog.warn(`Transcription ${file.transcriptId} for ${file.fileName} is ${result.status}; skipping`);
        continue;
      }
      if (isMp3(uploadPathFor(file))) relocateForStatus(file, "TranscriptionComplete", layout);
      applyTranscriptionResult(file, result, session.micAssignments);
      file.conversionError = undefined;
      setFileStatus(file, "TranscriptionComplete", { clock: deps.clock });
      persist(session, deps);
      refreshed++;
    } catch (err) {
      pipelineLog.error(`Redownload failed for ${file.fileName}`, { error: errorMessage(err) });
    }
  }

  pipelineLog.info(`Redownloaded ${refreshed} transcript(s) for ${session.title}`, { sessionId: session.id });
  return refreshed;
}

/**
 * Sessions left in Validating, Transcribing or Analyzing longer than
 * `stuckAfterMs` (a crash mid-run) go back to Pending. Returns how many.
 */
export function resetStuckSessions(stuckAfterMs: number, deps: Pick<PipelineDeps, "store" | "clock">): number {
  const cutoff = (deps.clock ?? systemClock).now().getTime() - stuckAfterMs;
  const stuck = deps.store.findBy(
    (s) => IN_FLIGHT_SESSION_STATUSES.includes(s.status) && Date.parse(s.updatedAt) < cutoff,
  );

  for (const session of stuck) {
    const previous = session.status;
    session.errorMessage = `Session was stuck in ${previous} for over ${Math.round(stuckAfterMs / 60_000)} minutes and has been reset`;
    setSessionStatus(session, "Pending", deps);
  }
  return stuck.length;
}
