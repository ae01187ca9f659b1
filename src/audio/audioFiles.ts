import path from "node:path";

export const AUDIO_EXTENSIONS: readonly string[] = [
  ".mp3",
  ".wav",
  ".ogg",
  ".flac",
  ".aac",
  ".m4a",
  ".wma",
  ".mp4",
  ".mov",
  ".avi",
  ".mkv",
  ".webm",
  ".m4v",
  ".3gp",
];

/** Formats that carry raw PCM and blow past the upload size limit. */
const UNCOMPRESSED_EXTENSIONS: readonly string[] = [".wav"];

export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.includes(extensionOf(filePath));
}

export function isMp3(filePath: string): boolean {
  return extensionOf(filePath) === ".mp3";
}

export function isUncompressed(filePath: string): boolean {
  return UNCOMPRESSED_EXTENSIONS.includes(extensionOf(filePath));
}

export function baseNameWithoutExt(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}
