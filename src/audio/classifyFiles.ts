import fs from "node:fs";
import path from "node:path";
import { log } from "../utils/logger.js";
import { systemClock, type Clock } from "../utils/clock.js";
import type { AudioFile } from "../sessions/types.js";
import { baseNameWithoutExt, isAudioFile } from "./audioFiles.js";

const classifyLog = log.withScope("classify");

export const MASTER_CANONICAL_BASENAME = "MASTER_MIX";

const MIC_PATTERN = /^MIC(\d+)\.[a-z0-9]+$/i;
const LEGACY_SPEAKER_PATTERN = /^(\d)_Speaker\d/i;
const TIMESTAMP_MASTER_PATTERN = /^\d{4}_\d{4}_\d{4}\.(wav|mp3|m4a|aac|ogg|flac)$/i;
const MASTER_KEYWORDS = ["master", "combined", "full", "group"];

const AUXILIARY_NAMES: Record<string, "phone" | "soundPad"> = {
  PHONE: "phone",
  SOUND_PAD: "soundPad",
  SOUNDPAD: "soundPad",
};

export type FileNameClass =
  | { kind: "mic"; micNumber: number; slot: number; pattern: "mic" | "legacySpeaker" }
  | { kind: "auxiliary"; role: "phone" | "soundPad" }
  | { kind: "master"; reason: "timestamp" | "keyword" }
  | { kind: "unidentified" };

/**
 * Classify a single file name in priority order:
 * MIC<N> → legacy `<d>_Speaker` → auxiliary role → master pattern.
 */
export function classifyFileName(fileName: string): FileNameClass {
  const micMatch = fileName.match(MIC_PATTERN);
  if (micMatch) {
    const micNumber = Number(micMatch[1]);
    if (micNumber >= 1) {
      return { kind: "mic", micNumber, slot: micNumber - 1, pattern: "mic" };
    }
  }

  const legacyMatch = fileName.match(LEGACY_SPEAKER_PATTERN);
  if (legacyMatch) {
    const micNumber = Number(legacyMatch[1]);
    if (micNumber >= 1) {
      return { kind: "mic", micNumber, slot: micNumber - 1, pattern: "legacySpeaker" };
    }
  }

  const role = AUXILIARY_NAMES[baseNameWithoutExt(fileName).toUpperCase()];
  if (role) {
    return { kind: "auxiliary", role };
  }

  if (TIMESTAMP_MASTER_PATTERN.test(fileName)) {
    return { kind: "master", reason: "timestamp" };
  }

  const lowered = baseNameWithoutExt(fileName).toLowerCase();
  if (MASTER_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
    return { kind: "master", reason: "keyword" };
  }

  return { kind: "unidentified" };
}

export type MasterDecision = "pattern" | "elimination" | "largest" | "none";

export type ClassificationResult = {
  audioFiles: AudioFile[];
  master: AudioFile | null;
  masterDecision: MasterDecision;
  unidentified: string[];
};

export type ClassifyOptions = {
  clock?: Clock;
  /** Rename the chosen master to MASTER_MIX<ext> (default true). */
  renameMaster?: boolean;
};

function newAudioFile(folderPath: string, fileName: string, fileSize: number, clock: Clock): AudioFile {
  return {
    fileName,
    filePath: path.join(folderPath, fileName),
    fileSize,
    isMasterRecording: false,
    processingStatus: "Pending",
    canRetry: true,
    lastUpdated: clock.now().toISOString(),
  };
}

function largest(files: AudioFile[]): AudioFile {
  return files.reduce((best, file) => (file.fileSize > best.fileSize ? file : best));
}

/**
 * Scan a session folder and classify every audio file. Mutates the filesystem
 * at most once (the master rename).
 */
export function classifyFolder(folderPath: string, opts: ClassifyOptions = {}): ClassificationResult {
  const clock = opts.clock ?? systemClock;
  const renameMaster = opts.renameMaster ?? true;

  if (!fs.existsSync(folderPath)) {
    throw new Error(`Session folder not found: ${folderPath}`);
  }

  const names = fs
    .readdirSync(folderPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isAudioFile(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  const audioFiles: AudioFile[] = [];
  const patternMasters: AudioFile[] = [];
  const unidentified: AudioFile[] = [];

  for (const name of names) {
    const stat = fs.statSync(path.join(folderPath, name));
    const file = newAudioFile(folderPath, name, stat.size, clock);
    const cls = classifyFileName(name);

    switch (cls.kind) {
      case "mic":
        file.speakerSlot = cls.slot;
        classifyLog.debug(`Detected microphone file ${name} as MIC${cls.micNumber} (slot ${cls.slot})`);
        break;
      case "auxiliary":
        file.auxiliaryRole = cls.role;
        classifyLog.debug(`Identified ${cls.role} file ${name}`);
        break;
      case "master":
        patternMasters.push(file);
        classifyLog.debug(`Master candidate ${name} (${cls.reason})`);
        break;
      case "unidentified":
        unidentified.push(file);
        break;
    }

    audioFiles.push(file);
  }

  let master: AudioFile | null = null;
  let masterDecision: MasterDecision = "none";

  if (patternMasters.length > 0) {
    master = patternMasters.length === 1 ? patternMasters[0] : largest(patternMasters);
    masterDecision = "pattern";
    if (patternMasters.length > 1) {
      classifyLog.warn(`Several master candidates; keeping the largest`, {
        candidates: patternMasters.map((f) => f.fileName),
        chosen: master.fileName,
      });
    }
  } else if (unidentified.length === 1) {
    master = unidentified[0];
    masterDecision = "elimination";
    classifyLog.info(`Master recording identified by elimination: ${master.fileName}`);
  } else if (unidentified.length > 1) {
    master = largest(unidentified);
    masterDecision = "largest";
    classifyLog.info(`Master recording chosen as largest of ${unidentified.length} unidentified files`, {
      chosen: master.fileName,
      bytes: master.fileSize,
    });
  }

  if (master) {
    master.isMasterRecording = true;
    if (renameMaster) {
      renameToCanonical(master);
    }
  } else {
    classifyLog.error(`No master recording identified in ${folderPath}; analysis will use individual mics only`, {
      files: names,
    });
  }

  return {
    audioFiles,
    master,
    masterDecision,
    unidentified: unidentified.filter((f) => f !== master).map((f) => f.fileName),
  };
}

function renameToCanonical(master: AudioFile): void {
  if (baseNameWithoutExt(master.fileName).toUpperCase().startsWith(MASTER_CANONICAL_BASENAME)) {
    return;
  }

  const targetName = `${MASTER_CANONICAL_BASENAME}${path.extname(master.fileName)}`;
  const targetPath = path.join(path.dirname(master.filePath), targetName);
  if (fs.existsSync(targetPath)) {
    classifyLog.warn(`Not renaming ${master.fileName}: ${targetName} already exists`);
    return;
  }

  fs.renameSync(master.filePath, targetPath);
  classifyLog.info(`Renamed master recording ${master.fileName} → ${targetName}`);
  master.fileName = targetName;
  master.filePath = targetPath;
}
