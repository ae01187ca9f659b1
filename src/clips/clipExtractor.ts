import fs from "node:fs";
import path from "node:path";
import { cfg } from "../config/env.js";
import { resolveClipsDir } from "../dataPaths.js";
import { errorMessage, log } from "../utils/logger.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { buildWavHeader, readWavInfo, type WavInfo } from "../audio/wav.js";

const clipsLog = log.withScope("clips");

export const MAX_CLIP_SECONDS = 300;

export type ClipRequest = {
  sourcePath: string;
  sessionId: string;
  clipId: string;
  startSeconds: number;
  endSeconds: number;
};

export type ClipOptions = {
  clipsDir?: string;
};

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_.-]+/g, "_").replace(/^\.+/, "_");
}

function tryReadWavInfo(sourcePath: string, clipId: string): WavInfo | null {
  try {
    return readWavInfo(sourcePath);
  } catch (err) {
    clipsLog.error(`Cannot read WAV source for clip ${clipId}`, { source: sourcePath, error: errorMessage(err) });
    return null;
  }
}

export function clipUrlFor(sessionId: string, clipId: string): string {
  return `/clips/${safeSegment(sessionId)}/${safeSegment(clipId)}.wav`;
}

/**
 * Cut `[startSeconds, endSeconds)` out of a WAV file into
 * `{clipsDir}/{sessionId}/{clipId}.wav`. Returns the clip URL, or null for a
 * rejected range (empty, negative, over five minutes) or an unreadable source.
 * The range is clamped to the recording and aligned to whole frames.
 */
export function extractClip(request: ClipRequest, opts: ClipOptions = {}): string | null {
  const duration = request.endSeconds - request.startSeconds;
  if (!Number.isFinite(duration) || duration <= 0 || duration > MAX_CLIP_SECONDS) {
    clipsLog.warn(`Rejected clip ${request.clipId}: duration ${duration}s outside (0, ${MAX_CLIP_SECONDS}]`);
    return null;
  }

  const info = tryReadWavInfo(request.sourcePath, request.clipId);
  if (!info) return null;

  const frame = info.blockAlign > 0 ? info.blockAlign : 1;
  const align = (bytes: number): number => bytes - (bytes % frame);
  const clamp = (bytes: number): number => Math.min(Math.max(0, bytes), info.dataLength);

  const startByte = align(clamp(Math.floor(Math.max(0, request.startSeconds) * info.byteRate)));
  const endByte = align(clamp(Math.floor(request.endSeconds * info.byteRate)));
  const length = endByte - startByte;

  if (length <= 0) {
    clipsLog.warn(`Clip ${request.clipId} falls outside the recording`, {
      startSeconds: request.startSeconds,
      recordingSeconds: info.durationSeconds,
    });
    return null;
  }

  const clipsDir = opts.clipsDir ?? resolveClipsDir();
  const sessionDir = path.join(clipsDir, safeSegment(request.sessionId));
  const outputPath = path.join(sessionDir, `${safeSegment(request.clipId)}.wav`);
  fs.mkdirSync(sessionDir, { recursive: true });

  const input = fs.openSync(request.sourcePath, "r");
  const output = fs.openSync(outputPath, "w");
  try {
    fs.writeSync(output, buildWavHeader(length, info));

    // one second of audio per read
    const chunkSize = Math.max(frame, align(info.byteRate) || frame);
    const buffer = Buffer.alloc(chunkSize);
    let copied = 0;
    while (copied < length) {
      const want = Math.min(chunkSize, length - copied);
      const read = fs.readSync(input, buffer, 0, want, info.dataOffset + startByte + copied);
      if (read <= 0) break;
      fs.writeSync(output, buffer, 0, read);
      copied += read;
    }
  } finally {
    fs.closeSync(input);
    fs.closeSync(output);
  }

  clipsLog.info(`Extracted clip ${request.clipId}`, {
    source: path.basename(request.sourcePath),
    seconds: Number((length / info.byteRate).toFixed(2)),
  });
  return clipUrlFor(request.sessionId, request.clipId);
}

/**
 * Delete clip files older than `daysOld`, then session folders left empty.
 * Returns the number of files removed.
 */
export function cleanupOldClips(
  daysOld: number = cfg.data.clipMaxAgeDays,
  opts: ClipOptions & { clock?: Clock } = {},
): number {
  const clipsDir = opts.clipsDir ?? resolveClipsDir();
  if (!fs.existsSync(clipsDir)) return 0;

  const cutoff = (opts.clock ?? systemClock).now().getTime() - daysOld * 24 * 60 * 60 * 1000;
  let removed = 0;

  for (const entry of fs.readdirSync(clipsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const sessionDir = path.join(clipsDir, entry.name);

    for (const clip of fs.readdirSync(sessionDir, { withFileTypes: true })) {
      if (!clip.isFile()) continue;
      const clipPath = path.join(sessionDir, clip.name);
      if (fs.statSync(clipPath).mtime.getTime() < cutoff) {
        fs.unlinkSync(clipPath);
        removed++;
      }
    }

    if (fs.readdirSync(sessionDir).length === 0) {
      fs.rmdirSync(sessionDir);
    }
  }

  clipsLog.info(`Removed ${removed} clip(s) older than ${daysOld} day(s)`);
  return removed;
}
