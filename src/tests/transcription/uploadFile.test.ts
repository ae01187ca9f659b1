import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import type { AudioConverter } from "../../audio/ffmpeg.js";
import { resolveLayout } from "../../audio/statusFolders.js";
import type { AudioFile, AudioProcessingStatus } from "../../sessions/types.js";
import type { TranscriptionApi } from "../../transcription/types.js";
import { convertFile, uploadFile, uploadNameFor, type FileStageContext } from "../../transcription/uploadFile.js";
import { fixedClock } from "../../utils/clock.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function setup(fileName: string, bytes = 100) {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "upload-"));
  tempDirs.push(root);
  const folder = path.join(root, "2024-March-Inception");
  fs.mkdirSync(folder);
  const filePath = path.join(folder, fileName);
  fs.writeFileSync(filePath, Buffer.alloc(bytes));

  const file: AudioFile = {
    fileName,
    filePath,
    fileSize: bytes,
    isMasterRecording: false,
    speakerSlot: 0,
    processingStatus: "Pending",
    canRetry: true,
    lastUpdated: "2024-03-15T00:00:00.000Z",
  };
  const statuses: AudioProcessingStatus[] = [];
  const ctx: FileStageContext = {
    folderPath: folder,
    layout: resolveLayout(folder),
    clock: fixedClock("2024-03-16T12:00:00.000Z"),
    onUpdate: (f) => statuses.push(f.processingStatus),
  };
  return { root, folder, file, ctx, statuses };
}

const writingConverter: AudioConverter = {
  isAvailable: async () => true,
  convertToMp3: async (_input, output) => {
    fs.mkdirSync(path.dirname(output), { recursive: true });
    fs.writeFileSync(output, "mp3");
  },
};

function socketError(): Error {
  return Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
}

function uploadApi(upload: TranscriptionApi["upload"]): TranscriptionApi {
  return {
    upload,
    submit: async () => {
      throw new Error("not used");
    },
    getResult: async () => {
      throw new Error("not used");
    },
  };
}

test("upload names carry the movie title from YYYY-Month-Title folders", () => {
  expect(uploadNameFor("/rec/2024-March-Inception", "/rec/pending_mp3/x/MIC1.mp3")).toBe("Inception_MIC1.mp3");
  expect(uploadNameFor("/rec/2024-03-15_Inception", "/rec/MIC1.mp3")).toBe("MIC1.mp3");
});

test("conversion writes the MP3 into pending_mp3 and leaves the WAV in place", async () => {
  const { root, folder, file, ctx, statuses } = setup("MIC1.wav");

  await expect(convertFile(file, writingConverter, { ...ctx, ffmpegAvailable: true })).resolves.toBe("converted");

  expect(file.mp3FilePath).toBe(path.join(root, "pending_mp3", "2024-March-Inception", "MIC1.mp3"));
  expect(file.filePath).toBe(path.join(folder, "MIC1.wav"));
  expect(file.processingStatus).toBe("PendingMp3");
  expect(file.lastUpdated).toBe("2024-03-16T12:00:00.000Z");
  expect(statuses).toEqual(["ConvertingToMp3", "PendingMp3"]);
});

test("an MP3 recording skips conversion and both paths follow it into pending_mp3", async () => {
  const { root, file, ctx } = setup("MIC2.mp3");

  await expect(convertFile(file, writingConverter, { ...ctx, ffmpegAvailable: true })).resolves.toBe("alreadyMp3");

  const moved = path.join(root, "pending_mp3", "2024-March-Inception", "MIC2.mp3");
  expect(file.mp3FilePath).toBe(moved);
  expect(file.filePath).toBe(moved);
  expect(fs.existsSync(moved)).toBe(true);
});

test("without ffmpeg a WAV over the threshold fails as retryable and moves to failed/", async () => {
  const { root, file, ctx } = setup("MIC1.wav", 100);

  const outcome = await convertFile(file, writingConverter, {
    ...ctx,
    ffmpegAvailable: false,
    largeFileThresholdBytes: 10,
  });

  expect(outcome).toBe("failed");
  expect(file.processingStatus).toBe("Failed");
  expect(file.canRetry).toBe(true);
  expect(file.conversionError).toBe(
    "Conversion: FFmpeg not available (MIC1.wav is 0MB and must be compressed before upload). Install FFmpeg or set FFMPEG_PATH.",
  );
  expect(file.filePath).toBe(path.join(root, "failed", "2024-March-Inception", "MIC1.wav"));
});

test("without ffmpeg a small file uploads unconverted", async () => {
  const { file, ctx } = setup("MIC1.wav", 100);

  await expect(
    convertFile(file, writingConverter, { ...ctx, ffmpegAvailable: false, largeFileThresholdBytes: 1000 }),
  ).resolves.toBe("uploadAsIs");
  expect(file.processingStatus).toBe("Pending");
  expect(file.mp3FilePath).toBeUndefined();
});

test("two network timeouts then success leaves the file uploaded with no error", async () => {
  const { file, ctx, statuses } = setup("MIC1.wav");
  await convertFile(file, writingConverter, { ...ctx, ffmpegAvailable: true });
  statuses.length = 0;

  const uploads: Array<[string, string]> = [];
  const delays: number[] = [];
  const api = uploadApi(async (filePath, uploadName) => {
    uploads.push([filePath, uploadName]);
    if (uploads.length < 3) throw socketError();
    return "https://files.test/mic1";
  });

  const ok = await uploadFile(file, api, ctx, {
    maxAttempts: 3,
    baseDelayMs: 10,
    sleep: async (ms) => void delays.push(ms),
  });

  expect(ok).toBe(true);
  expect(uploads).toHaveLength(3);
  expect(uploads[0][1]).toBe("Inception_MIC1.mp3");
  expect(delays).toEqual([10, 20]);
  expect(file.processingStatus).toBe("UploadedToGladia");
  expect(file.audioUrl).toBe("https://files.test/mic1");
  expect(file.conversionError).toBeUndefined();
  expect(statuses).toEqual(["UploadingToGladia", "UploadedToGladia"]);
});

test("exhausted upload retries park the MP3 in failed_mp3", async () => {
  const { root, file, ctx } = setup("MIC1.wav");
  await convertFile(file, writingConverter, { ...ctx, ffmpegAvailable: true });

  const ok = await uploadFile(
    file,
    uploadApi(async () => {
      throw socketError();
    }),
    ctx,
    { maxAttempts: 2, baseDelayMs: 1, sleep: async () => {} },
  );

  expect(ok).toBe(false);
  expect(file.processingStatus).toBe("FailedMp3");
  expect(file.conversionError).toBe("Upload: socket hang up");
  expect(file.canRetry).toBe(true);
  expect(file.mp3FilePath).toBe(path.join(root, "failed_mp3", "2024-March-Inception", "MIC1.mp3"));
  expect(file.audioUrl).toBeUndefined();
});
