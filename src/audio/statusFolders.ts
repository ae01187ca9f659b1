import fs from "node:fs";
import path from "node:path";
import { log } from "../utils/logger.js";
import type { AudioProcessingStatus } from "../sessions/types.js";
import { isMp3 } from "./audioFiles.js";

const folderLog = log.withScope("folders");

export const STATUS_FOLDER_NAMES = [
  "pending",
  "pending_mp3",
  "failed",
  "failed_mp3",
  "processed_mp3",
] as const;

export type StatusFolderName = (typeof STATUS_FOLDER_NAMES)[number];

const MP3_FOLDERS: readonly StatusFolderName[] = ["pending_mp3", "failed_mp3", "processed_mp3"];
const SOURCE_FOLDERS: readonly StatusFolderName[] = ["pending", "failed"];

export class StatusFolderViolationError extends Error {
  constructor(
    readonly filePath: string,
    readonly status: AudioProcessingStatus,
    readonly folder: StatusFolderName,
  ) {
    super(
      isMp3(filePath)
        ? `MP3 file ${path.basename(filePath)} cannot move to ${folder}/ (status ${status}); that folder holds source recordings only`
        : `Source file ${path.basename(filePath)} cannot move to ${folder}/ (status ${status}); that folder holds MP3 files only`,
    );
    this.name = "StatusFolderViolationError";
  }
}

export function statusFolderName(status: AudioProcessingStatus): StatusFolderName {
  switch (status) {
    case "Pending":
      return "pending";
    case "PendingMp3":
    case "UploadedToGladia":
      return "pending_mp3";
    case "FailedMp3":
      return "failed_mp3";
    case "ProcessedMp3":
    case "TranscriptionComplete":
      return "processed_mp3";
    case "Failed":
      return "failed";
    default:
      return "pending";
  }
}

function isStatusFolderName(name: string): boolean {
  return STATUS_FOLDER_NAMES.some((folder) => folder === name.toLowerCase());
}

export type LibraryLayout = {
  /** Directory holding the `{status}/` folders. */
  root: string;
  sessionName: string;
};

/**
 * `/uploads/Inception` → root `/uploads`; `/uploads/failed/Inception` → root `/uploads`.
 */
export function resolveLayout(sessionFolderPath: string): LibraryLayout {
  const resolved = path.resolve(sessionFolderPath);
  const sessionName = path.basename(resolved);
  const parent = path.dirname(resolved);

  if (isStatusFolderName(path.basename(parent))) {
    return { root: path.dirname(parent), sessionName };
  }
  return { root: parent, sessionName };
}

export function getFolderForStatus(
  status: AudioProcessingStatus,
  layout: LibraryLayout,
  opts: { ensureExists?: boolean } = {},
): string {
  const folder = path.join(layout.root, statusFolderName(status), layout.sessionName);
  if (opts.ensureExists ?? true) {
    fs.mkdirSync(folder, { recursive: true });
  }
  return folder;
}

export function initializeStatusFolders(layout: LibraryLayout): void {
  for (const folder of STATUS_FOLDER_NAMES) {
    fs.mkdirSync(path.join(layout.root, folder), { recursive: true });
  }
}

/** True when a file at `filePath` may live in the folder of `status`. */
export function canHold(status: AudioProcessingStatus, filePath: string): boolean {
  const folder = statusFolderName(status);
  if (MP3_FOLDERS.includes(folder)) return isMp3(filePath);
  if (SOURCE_FOLDERS.includes(folder)) return !isMp3(filePath);
  return true;
}

export function assertCanHold(status: AudioProcessingStatus, filePath: string): void {
  if (!canHold(status, filePath)) {
    const folder = statusFolderName(status);
    folderLog.error(`Refusing cross-stage move of ${path.basename(filePath)} into ${folder}/`, { status });
    throw new StatusFolderViolationError(filePath, status, folder);
  }
}

function uniqueTargetPath(folder: string, fileName: string): string {
  let target = path.join(folder, fileName);
  if (!fs.existsSync(target)) return target;

  const ext = path.extname(fileName);
  const stem = path.basename(fileName, ext);
  let counter = 1;
  do {
    target = path.join(folder, `${stem}_${counter}${ext}`);
    counter++;
  } while (fs.existsSync(target));
  return target;
}

export type MoveOptions = {
  /** Remove the source session folder (and its status folder) when they end up empty. */
  cleanupSource?: boolean;
};

/**
 * Move a file into the folder for `status`. The only place that builds status
 * paths for moves. Returns the file's path afterwards.
 */
export function moveToStatusFolder(
  filePath: string,
  status: AudioProcessingStatus,
  layout: LibraryLayout,
  opts: MoveOptions = {},
): string {
  assertCanHold(status, filePath);

  const targetFolder = getFolderForStatus(status, layout, { ensureExists: false });
  const sourceFolder = path.dirname(path.resolve(filePath));

  if (path.resolve(targetFolder) === sourceFolder) {
    folderLog.debug(`${path.basename(filePath)} already in ${statusFolderName(status)}/`);
    return filePath;
  }

  if (!fs.existsSync(filePath)) {
    folderLog.warn(`Source file not found for move: ${filePath}`);
    return filePath;
  }

  fs.mkdirSync(targetFolder, { recursive: true });
  const targetPath = uniqueTargetPath(targetFolder, path.basename(filePath));
  fs.renameSync(filePath, targetPath);
  folderLog.info(`Moved ${path.basename(filePath)} → ${path.relative(layout.root, targetPath)}`, { status });

  if (opts.cleanupSource) {
    cleanupEmptyFolders(sourceFolder, layout);
  }

  return targetPath;
}

/**
 * Delete `folder` if it is an empty session folder inside a status folder, then
 * the status folder itself if that became empty too.
 */
export function cleanupEmptyFolders(folder: string, layout: LibraryLayout): void {
  const resolved = path.resolve(folder);
  const statusFolder = path.dirname(resolved);

  if (path.dirname(statusFolder) !== path.resolve(layout.root)) return;
  if (!isStatusFolderName(path.basename(statusFolder))) return;

  if (fs.existsSync(resolved) && fs.readdirSync(resolved).length === 0) {
    fs.rmdirSync(resolved);
    folderLog.debug(`Removed empty folder ${path.relative(layout.root, resolved)}`);
  }

  if (fs.existsSync(statusFolder) && fs.readdirSync(statusFolder).length === 0) {
    fs.rmdirSync(statusFolder);
    folderLog.debug(`Removed empty status folder ${path.basename(statusFolder)}`);
  }
}
