import fs from "node:fs";
import path from "node:path";
import { DateTime } from "luxon";
import type { Session } from "./types.js";
import { participantForSlot } from "./types.js";

const MONTH_TITLE_PATTERN = /^(\d{4})-([A-Za-z]+)-(.+)$/;
const ISO_PREFIX_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[-_ ](.*))?$/;
const MAX_SPEAKER_SLOTS = 9;
const UNKNOWN_TITLE = "Unknown Movie";

/**
 * Session date from a folder name: `2024-March-Inception` → 2024-03-01,
 * `2024-03-15_Inception` → 2024-03-15. Falls back to the folder's mtime.
 */
export function parseFolderDate(folderPath: string): string {
  const name = path.basename(folderPath);

  const monthMatch = name.match(MONTH_TITLE_PATTERN);
  if (monthMatch) {
    const parsed = DateTime.fromFormat(`${monthMatch[1]}-${monthMatch[2]}`, "yyyy-MMMM", { locale: "en" });
    if (parsed.isValid) return parsed.toISODate() ?? fallbackDate(folderPath);
    const short = DateTime.fromFormat(`${monthMatch[1]}-${monthMatch[2]}`, "yyyy-MMM", { locale: "en" });
    if (short.isValid) return short.toISODate() ?? fallbackDate(folderPath);
  }

  const isoMatch = name.match(ISO_PREFIX_PATTERN);
  if (isoMatch) {
    const parsed = DateTime.fromISO(`${isoMatch[1]}-${isoMatch[2]}-${isoMatch[3]}`);
    if (parsed.isValid) return parsed.toISODate() ?? fallbackDate(folderPath);
  }

  return fallbackDate(folderPath);
}

function fallbackDate(folderPath: string): string {
  const mtime = fs.existsSync(folderPath) ? fs.statSync(folderPath).mtime : new Date();
  return DateTime.fromJSDate(mtime).toISODate() ?? "1970-01-01";
}

/** `2024-March-the_dark-knight` → `The Dark Knight`. */
export function suggestTitle(folderPath: string): string {
  const name = path.basename(folderPath);
  let raw = name;

  const monthMatch = name.match(MONTH_TITLE_PATTERN);
  const isoMatch = name.match(ISO_PREFIX_PATTERN);
  if (monthMatch) {
    raw = monthMatch[3];
  } else if (isoMatch) {
    raw = isoMatch[4] ?? "";
  }

  const words = raw
    .replace(/[_-]+/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

  return words.length > 0 ? words.join(" ") : UNKNOWN_TITLE;
}

/**
 * The part of the title used to prefix upload names (`Inception_MIC1.mp3`).
 * Only `YYYY-Month-Title` folders carry one.
 */
export function uploadTitlePrefix(folderPath: string): string | null {
  const monthMatch = path.basename(folderPath).match(MONTH_TITLE_PATTERN);
  return monthMatch ? monthMatch[3] : null;
}

export function determineParticipants(session: Session): void {
  const present = [
    ...new Set(
      session.audioFiles
        .map((f) => f.speakerSlot)
        .filter((slot): slot is number => slot !== undefined)
    ),
  ].sort((a, b) => a - b);

  const absent = Array.from({ length: MAX_SPEAKER_SLOTS }, (_, slot) => slot).filter(
    (slot) => !present.includes(slot)
  );

  session.participantsPresent = present.map((slot) => participantForSlot(session, slot));
  session.participantsAbsent = absent
    .filter((slot) => session.micAssignments[slot + 1]?.trim())
    .map((slot) => participantForSlot(session, slot));
}
