import path from "node:path";
import { cfg } from "../config/env.js";
import { errorMessage, log } from "../utils/logger.js";
import { systemClock, type Clock, type Sleep } from "../utils/clock.js";
import { baseNameWithoutExt, isMp3, isUncompressed } from "../audio/audioFiles.js";
import { FfmpegUnavailableError, type AudioConverter } from "../audio/ffmpeg.js";
import {
  canHold,
  getFolderForStatus,
  moveToStatusFolder,
  type LibraryLayout,
} from "../audio/statusFolders.js";
import { uploadTitlePrefix } from "../sessions/folderMetadata.js";
import type { AudioFile, AudioProcessingStatus } from "../sessions/types.js";
import type { TranscriptionApi } from "./types.js";
import { withRetry } from "./retry.js";

const uploadLog = log.withScope("transcribe");

export type FileStageContext = {
  /** Session folder as created; drives the upload title prefix. */
  folderPath: string;
  layout: LibraryLayout;
  clock?: Clock;
  /** Called after every status change so the caller can persist. */
  onUpdate?: (file: AudioFile) => void;
};

export function setFileStatus(
  file: AudioFile,
  status: AudioProcessingStatus,
  ctx: Pick<FileStageContext, "clock" | "onUpdate">,
): void {
  file.processingStatus = status;
  file.lastUpdated = (ctx.clock ?? systemClock).now().toISOString();
  ctx.onUpdate?.(file);
}

/** The path that goes to the transcription service: the MP3 copy when one exists. */
export function uploadPathFor(file: AudioFile): string {
  return file.mp3FilePath ?? file.filePath;
}

/** `2024-March-Inception` + `MIC1.mp3` → `Inception_MIC1.mp3`. */
export function uploadNameFor(folderPath: string, filePath: string): string {
  const fileName = path.basename(filePath);
  const prefix = uploadTitlePrefix(folderPath);
  return prefix ? `${prefix}_${fileName}` : fileName;
}

/**
 * Move the file's current upload artifact into the folder for `status`, when
 * that folder may hold it. Files that cannot be held (an unconverted WAV in an
 * MP3 stage) stay where they are.
 */
export function relocateForStatus(file: AudioFile, status: AudioProcessingStatus, layout: LibraryLayout): void {
  const current = uploadPathFor(file);
  if (!canHold(status, current)) {
    uploadLog.debug(`Leaving ${path.basename(current)} in place for ${status}`);
    return;
  }

  const moved = moveToStatusFolder(current, status, layout, { cleanupSource: true });
  if (file.mp3FilePath) {
    file.mp3FilePath = moved;
  } else {
    file.filePath = moved;
  }
}

/** Record a per-file failure (prefixed with the phase) and park the file in its failed folder. */
export function failFile(
  file: AudioFile,
  phase: string,
  err: unknown,
  ctx: FileStageContext,
  opts: { canRetry: boolean },
): void {
  const failedStatus: AudioProcessingStatus = isMp3(uploadPathFor(file)) ? "FailedMp3" : "Failed";
  file.conversionError = `${phase}: ${errorMessage(err)}`;
  file.canRetry = opts.canRetry;
  try {
    relocateForStatus(file, failedStatus, ctx.layout);
  } catch (moveErr) {
    uploadLog.error(`Could not move ${file.fileName} to the ${failedStatus} folder`, {
      error: errorMessage(moveErr),
    });
  }
  setFileStatus(file, failedStatus, ctx);
}

export type ConvertOutcome = "converted" | "alreadyMp3" | "uploadAsIs" | "failed";

/**
 * Prepare one file for upload. MP3s go straight to `pending_mp3/`; everything
 * else is transcoded when ffmpeg is present. Without ffmpeg a WAV over the
 * size threshold fails (retryable once the tool is installed); smaller files
 * upload unconverted.
 */
export async function convertFile(
  file: AudioFile,
  converter: AudioConverter,
  ctx: FileStageContext & { ffmpegAvailable: boolean; largeFileThresholdBytes?: number },
): Promise<ConvertOutcome> {
  const threshold = ctx.largeFileThresholdBytes ?? cfg.upload.largeFileThresholdBytes;

  if (file.mp3FilePath || isMp3(file.filePath)) {
    const recordedAsMp3 = !file.mp3FilePath;
    if (!file.mp3FilePath) file.mp3FilePath = file.filePath;
    relocateForStatus(file, "PendingMp3", ctx.layout);
    // the recording itself is the MP3, so both paths follow it
    if (recordedAsMp3) file.filePath = file.mp3FilePath;
    setFileStatus(file, "PendingMp3", ctx);
    return "alreadyMp3";
  }

  if (!ctx.ffmpegAvailable) {
    if (isUncompressed(file.filePath) && file.fileSize > threshold) {
      const err = new FfmpegUnavailableError(
        `${file.fileName} is ${Math.round(file.fileSize / 1024 / 1024)}MB and must be compressed before upload`,
      );
      uploadLog.error(err.message);
      failFile(file, "Conversion", err, ctx, { canRetry: true });
      return "failed";
    }
    uploadLog.warn(`FFmpeg unavailable; uploading ${file.fileName} unconverted`);
    return "uploadAsIs";
  }

  setFileStatus(file, "ConvertingToMp3", ctx);
  const outputPath = path.join(
    getFolderForStatus("PendingMp3", ctx.layout),
    `${baseNameWithoutExt(file.fileName)}.mp3`,
  );

  try {
    await converter.convertToMp3(file.filePath, outputPath);
  } catch (err) {
    uploadLog.error(`Conversion failed for ${file.fileName}`, { error: errorMessage(err) });
    failFile(file, "Conversion", err, ctx, { canRetry: true });
    return "failed";
  }

  file.mp3FilePath = outputPath;
  file.conversionError = undefined;
  setFileStatus(file, "PendingMp3", ctx);
  return "converted";
}

export type UploadOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
};

/**
 * Upload with retry on transient network failures. Success leaves the file
 * `UploadedToGladia` with its `audioUrl`; exhaustion leaves it `FailedMp3`
 * (or `Failed` for an unconverted source) with the error recorded.
 */
export async function uploadFile(
  file: AudioFile,
  api: TranscriptionApi,
  ctx: FileStageContext,
  opts: UploadOptions = {},
): Promise<boolean> {
  const sourcePath = uploadPathFor(file);
  const uploadName = uploadNameFor(ctx.folderPath, sourcePath);

  setFileStatus(file, "UploadingToGladia", ctx);

  try {
    const audioUrl = await withRetry(() => api.upload(sourcePath, uploadName), {
      maxAttempts: opts.maxAttempts ?? cfg.upload.maxAttempts,
      baseDelayMs: opts.baseDelayMs ?? cfg.upload.baseDelayMs,
      sleep: opts.sleep,
      label: `Upload of ${uploadName}`,
    });

    file.audioUrl = audioUrl;
    file.conversionError = undefined;
    relocateForStatus(file, "UploadedToGladia", ctx.layout);
    setFileStatus(file, "UploadedToGladia", ctx);
    uploadLog.info(`Uploaded ${uploadName}`);
    return true;
  } catch (err) {
    uploadLog.error(`Upload failed for ${uploadName}`, { error: errorMessage(err) });
    failFile(file, "Upload", err, ctx, { canRetry: true });
    return false;
  }
}
