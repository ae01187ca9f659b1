import "dotenv/config";
import path from "node:path";
import type { Config, LogFormat, LogLevel } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optPositiveInt(name: string, def: number): number {
  const n = optInt(name, def);
  if (n <= 0) throw new Error(`Expected a positive value for ${name}: ${n}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((candidate) => candidate === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const satisfies readonly LogLevel[];
const LOG_FORMATS = ["pretty", "json"] as const satisfies readonly LogFormat[];

export function loadConfig(): Config {
  const dataRoot = opt("DATA_ROOT") ?? "./data";

  const cfg: Config = {
    openai: {
      apiKey: opt("OPENAI_API_KEY"),
    },

    gladia: {
      apiKey: opt("GLADIA_API_KEY"),
      baseUrl: (opt("GLADIA_BASE_URL") ?? "https://api.gladia.io").replace(/\/+$/, ""),
      language: opt("TRANSCRIPTION_LANGUAGE") ?? "en",
      pollIntervalMs: optPositiveInt("TRANSCRIPTION_POLL_INTERVAL_MS", 10_000),
      timeoutMs: optPositiveInt("TRANSCRIPTION_TIMEOUT_MS", 30 * 60_000),
    },

    upload: {
      maxAttempts: optPositiveInt("UPLOAD_MAX_ATTEMPTS", 3),
      baseDelayMs: optInt("UPLOAD_BASE_DELAY_MS", 2000),
      largeFileThresholdBytes: optPositiveInt("LARGE_FILE_THRESHOLD_BYTES", 100 * 1024 * 1024),
    },

    ffmpeg: {
      path: opt("FFMPEG_PATH") ?? "ffmpeg",
      timeoutMs: optPositiveInt("FFMPEG_TIMEOUT_MS", 10 * 60_000),
    },

    llm: {
      model: opt("LLM_MODEL") ?? "gpt-4o",
      temperature: optFloat("LLM_TEMPERATURE", 0.3),
      maxTokens: optPositiveInt("LLM_MAX_TOKENS", 4000),
      timeoutMs: optPositiveInt("LLM_TIMEOUT_MS", 20 * 60_000),
      maxAttempts: optPositiveInt("LLM_MAX_ATTEMPTS", 3),
      rateLimitBaseDelayMs: optInt("LLM_RATE_LIMIT_BASE_DELAY_MS", 10_000),
      retryDelayMs: optInt("LLM_RETRY_DELAY_MS", 2000),
    },

    analysis: {
      maxTranscriptChars: optPositiveInt("ANALYSIS_MAX_TRANSCRIPT_CHARS", 400_000),
      concurrency: optPositiveInt("ANALYSIS_CONCURRENCY", 3),
      nameCorrectionsPath: opt("NAME_CORRECTIONS_PATH") ?? path.join(dataRoot, "name-corrections.yml"),
      discussionQuestionsPath:
        opt("DISCUSSION_QUESTIONS_PATH") ?? path.join(dataRoot, "discussion-questions.yml"),
      wordListsPath: opt("STATS_WORD_LISTS_PATH") ?? path.join(dataRoot, "word-lists.json"),
    },

    data: {
      root: dataRoot,
      dbFilename: opt("DATA_DB_FILENAME") ?? "sessions.sqlite",
      clipsDir: opt("CLIPS_DIR") ?? path.join(dataRoot, "clips"),
      clipMaxAgeDays: optPositiveInt("CLIP_MAX_AGE_DAYS", 30),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", LOG_LEVELS, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", LOG_FORMATS, "pretty"),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    OPENAI_API_KEY: cfg.openai.apiKey,
    GLADIA_API_KEY: cfg.gladia.apiKey,
    GLADIA_BASE_URL: cfg.gladia.baseUrl,
    TRANSCRIPTION_LANGUAGE: cfg.gladia.language,
    TRANSCRIPTION_POLL_INTERVAL_MS: cfg.gladia.pollIntervalMs,
    TRANSCRIPTION_TIMEOUT_MS: cfg.gladia.timeoutMs,
    UPLOAD_MAX_ATTEMPTS: cfg.upload.maxAttempts,
    UPLOAD_BASE_DELAY_MS: cfg.upload.baseDelayMs,
    LARGE_FILE_THRESHOLD_BYTES: cfg.upload.largeFileThresholdBytes,
    FFMPEG_PATH: cfg.ffmpeg.path,
    FFMPEG_TIMEOUT_MS: cfg.ffmpeg.timeoutMs,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    LLM_TIMEOUT_MS: cfg.llm.timeoutMs,
    LLM_MAX_ATTEMPTS: cfg.llm.maxAttempts,
    LLM_RATE_LIMIT_BASE_DELAY_MS: cfg.llm.rateLimitBaseDelayMs,
    LLM_RETRY_DELAY_MS: cfg.llm.retryDelayMs,
    ANALYSIS_MAX_TRANSCRIPT_CHARS: cfg.analysis.maxTranscriptChars,
    ANALYSIS_CONCURRENCY: cfg.analysis.concurrency,
    NAME_CORRECTIONS_PATH: cfg.analysis.nameCorrectionsPath,
    DISCUSSION_QUESTIONS_PATH: cfg.analysis.discussionQuestionsPath,
    STATS_WORD_LISTS_PATH: cfg.analysis.wordListsPath,
    DATA_ROOT: cfg.data.root,
    DATA_DB_FILENAME: cfg.data.dbFilename,
    CLIPS_DIR: cfg.data.clipsDir,
    CLIP_MAX_AGE_DAYS: cfg.data.clipMaxAgeDays,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.log("=== PIPELINE CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("================================");
}

export const cfg = loadConfig();
