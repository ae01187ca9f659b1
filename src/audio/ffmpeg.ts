/**
 * FFmpeg transcoding for the upload stage.
 *
 * Env vars:
 * - FFMPEG_PATH=/usr/bin/ffmpeg (default: "ffmpeg" on PATH)
 * - FFMPEG_TIMEOUT_MS=600000 (default: 10 minutes per conversion)
 */

import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { log } from "../utils/logger.js";
import { cfg } from "../config/env.js";

const ffmpegLog = log.withScope("ffmpeg");

export class FfmpegUnavailableError extends Error {
  constructor(detail: string) {
    super(`FFmpeg not available (${detail}). Install FFmpeg or set FFMPEG_PATH.`);
    this.name = "FfmpegUnavailableError";
  }
}

export class FfmpegFailedError extends Error {
  constructor(
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(`FFmpeg exited with code ${exitCode}: ${stderr.trim().split("\n").slice(-5).join("\n")}`);
    this.name = "FfmpegFailedError";
  }
}

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type CommandRunner = (
  command: string,
  args: string[],
  opts: { timeoutMs: number },
) => Promise<CommandResult>;

/**
 * Spawn a process, capture stdout/stderr, kill it after `timeoutMs`.
 * Rejects only when the process cannot be started at all.
 */
export const spawnCommand: CommandRunner = (command, args, opts) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, opts.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ exitCode: code, stdout, stderr, timedOut });
    });
  });

export const MP3_ENCODE_ARGS = [
  "-codec:a", "libmp3lame",
  "-b:a", "192k",
  "-ar", "44100",
  "-ac", "2",
  "-af", "volume=1.5",
] as const;

export interface AudioConverter {
  isAvailable(): Promise<boolean>;
  convertToMp3(inputPath: string, outputPath: string): Promise<void>;
}

export class FfmpegConverter implements AudioConverter {
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(opts: { ffmpegPath?: string; timeoutMs?: number; run?: CommandRunner } = {}) {
    this.ffmpegPath = opts.ffmpegPath ?? cfg.ffmpeg.path;
    this.timeoutMs = opts.timeoutMs ?? cfg.ffmpeg.timeoutMs;
    this.run = opts.run ?? spawnCommand;
  }

  /** Probes `ffmpeg -version` on every call; installs can change between runs. */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.run(this.ffmpegPath, ["-version"], { timeoutMs: 10_000 });
      return result.exitCode === 0;
    } catch (err) {
      ffmpegLog.debug(`FFmpeg probe failed`, { path: this.ffmpegPath, error: String(err) });
      return false;
    }
  }

  async convertToMp3(inputPath: string, outputPath: string): Promise<void> {
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input file not found: ${inputPath}`);
    }
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });

    const args = ["-y", "-i", inputPath, ...MP3_ENCODE_ARGS, outputPath];
    ffmpegLog.info(`Converting ${path.basename(inputPath)} → ${path.basename(outputPath)}`);

    let result: CommandResult;
    try {
      result = await this.run(this.ffmpegPath, args, { timeoutMs: this.timeoutMs });
    } catch (err) {
      throw new FfmpegUnavailableError(err instanceof Error ? err.message : String(err));
    }

    if (result.timedOut) {
      throw new FfmpegFailedError(null, `conversion timed out after ${this.timeoutMs}ms\n${result.stderr}`);
    }
    if (result.exitCode !== 0) {
      throw new FfmpegFailedError(result.exitCode, result.stderr);
    }
    if (!fs.existsSync(outputPath)) {
      throw new FfmpegFailedError(result.exitCode, `no output written to ${outputPath}\n${result.stderr}`);
    }

    const originalSize = fs.statSync(inputPath).size;
    const compressedSize = fs.statSync(outputPath).size;
    ffmpegLog.info(`Converted ${path.basename(inputPath)}`, {
      originalBytes: originalSize,
      compressedBytes: compressedSize,
      ratio: originalSize > 0 ? Number((compressedSize / originalSize).toFixed(3)) : null,
    });
  }
}
