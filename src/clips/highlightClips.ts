import fs from "node:fs";
import path from "node:path";
import { TOP_FIVE_CATEGORIES, WINNER_CATEGORIES } from "../analysis/categories.js";
import { isDegraded } from "../analysis/fallback.js";
import type { Session } from "../sessions/types.js";
import { parseTimecode } from "../utils/timecode.js";
import { log } from "../utils/logger.js";
import { extractClip, type ClipOptions } from "./clipExtractor.js";

const clipsLog = log.withScope("clips");

export const WINNER_CLIP_SECONDS = 30;
export const DEFAULT_ENTRY_SECONDS = 10;
const LEAD_IN_SECONDS = 2;
const TAIL_SECONDS = 3;

/** The master recording, but only while it is still an uncompressed WAV on disk. */
export function findMasterWav(session: Session): string | null {
  const master = session.audioFiles.find((f) => f.isMasterRecording);
  if (!master) return null;
  if (path.extname(master.filePath).toLowerCase() !== ".wav") return null;
  return fs.existsSync(master.filePath) ? master.filePath : null;
}

/**
 * Cut highlight clips from the master WAV and write their URLs back onto the
 * analysis results: every ranked top-five entry (padded around the estimated
 * range) and one fixed-length clip per category winner. Returns clips made.
 */
export function generateHighlightClips(session: Session, opts: ClipOptions = {}): number {
  const results = session.categoryResults;
  if (!results || isDegraded(results)) return 0;

  const sourcePath = findMasterWav(session);
  if (!sourcePath) {
    clipsLog.warn(`No master WAV for session ${session.id}; skipping highlight clips`);
    return 0;
  }

  const cut = (clipId: string, startSeconds: number, endSeconds: number): string | null =>
    extractClip(
      {
        sourcePath,
        sessionId: session.id,
        clipId,
        startSeconds: Math.max(0, startSeconds - LEAD_IN_SECONDS),
        endSeconds: endSeconds + TAIL_SECONDS,
      },
      opts,
    );

  let made = 0;

  for (const list of TOP_FIVE_CATEGORIES) {
    for (const entry of results.topFives[list.key]?.entries ?? []) {
      const start = entry.estimatedStartEnd?.[0] ?? parseTimecode(entry.timestamp);
      if (start === null) {
        clipsLog.warn(`No usable time for ${list.key} #${entry.rank}`, { timestamp: entry.timestamp });
        continue;
      }
      const end = entry.estimatedStartEnd?.[1] ?? start + DEFAULT_ENTRY_SECONDS;

      const url = cut(`${list.key}_${entry.rank}`, start, end);
      if (url) {
        entry.clipUrl = url;
        made++;
      }
    }
  }

  for (const category of WINNER_CATEGORIES) {
    const winner = results.winners[category.key];
    if (!winner) continue;
    const start = parseTimecode(winner.timestamp);
    if (start === null) continue;

    const url = cut(category.key, start, start + WINNER_CLIP_SECONDS);
    if (url) {
      winner.clipUrl = url;
      made++;
    }
  }

  clipsLog.info(`Generated ${made} highlight clip(s) for session ${session.id}`);
  return made;
}
