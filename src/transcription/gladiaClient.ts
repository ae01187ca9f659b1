import fs from "node:fs";
import path from "node:path";
import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";
import type {
  GladiaResultStatus,
  GladiaTranscriptionResult,
  TranscriptionApi,
  TranscriptionRequest,
} from "./types.js";

const gladiaLog = log.withScope("gladia");

export class GladiaHttpError extends Error {
  constructor(
    readonly operation: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Gladia ${operation} failed with HTTP ${status}: ${body.slice(0, 500)}`);
    this.name = "GladiaHttpError";
  }
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

const RESULT_STATUSES: readonly GladiaResultStatus[] = ["queued", "processing", "done", "error"];

function toResultStatus(value: unknown): GladiaResultStatus {
  const match = RESULT_STATUSES.find((s) => s === value);
  return match ?? "processing";
}

export function parseTranscriptionResult(id: string, body: unknown): GladiaTranscriptionResult {
  if (!isRecord(body)) {
    throw new Error(`Gladia result for ${id} was not a JSON object`);
  }

  const parsed: GladiaTranscriptionResult = {
    id: typeof body.id === "string" ? body.id : id,
    status: toResultStatus(body.status),
    result: null,
    error: null,
    error_code: typeof body.error_code === "number" ? body.error_code : null,
  };

  if (isRecord(body.result)) {
    const result = body.result;
    const transcription = isRecord(result.transcription) ? result.transcription : undefined;
    parsed.result = {
      transcription: transcription
        ? {
            full_transcript:
              typeof transcription.full_transcript === "string" ? transcription.full_transcript : undefined,
            utterances: Array.isArray(transcription.utterances)
              ? transcription.utterances.filter(isRecord).map((u) => ({
                  start: typeof u.start === "number" ? u.start : 0,
                  end: typeof u.end === "number" ? u.end : 0,
                  text: typeof u.text === "string" ? u.text : "",
                  speaker: typeof u.speaker === "number" ? u.speaker : undefined,
                  confidence: typeof u.confidence === "number" ? u.confidence : undefined,
                  channel: typeof u.channel === "number" ? u.channel : undefined,
                }))
              : undefined,
          }
        : undefined,
      summarization: isRecord(result.summarization)
        ? { results: typeof result.summarization.results === "string" ? result.summarization.results : undefined }
        : null,
      chapterization: result.chapterization,
      sentiment_analysis: result.sentiment_analysis,
      named_entity_recognition: result.named_entity_recognition,
      metadata: isRecord(result.metadata)
        ? {
            audio_duration:
              typeof result.metadata.audio_duration === "number" ? result.metadata.audio_duration : undefined,
          }
        : undefined,
    };
  }

  if (isRecord(body.error)) {
    parsed.error = {
      message: typeof body.error.message === "string" ? body.error.message : undefined,
      code: typeof body.error.code === "number" ? body.error.code : undefined,
    };
  }

  return parsed;
}

export type GladiaClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

/**
 * Thin HTTP client for the Gladia v2 pre-recorded API. No retries here;
 * callers decide what is worth retrying.
 */
export class GladiaClient implements TranscriptionApi {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(opts: GladiaClientOptions = {}) {
    this.apiKey = opts.apiKey ?? cfg.gladia.apiKey;
    this.baseUrl = (opts.baseUrl ?? cfg.gladia.baseUrl).replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  get isConfigured(): boolean {
    return !!this.apiKey;
  }

  private requireKey(): string {
    if (!this.apiKey) {
      throw new Error("GLADIA_API_KEY not configured in .env");
    }
    return this.apiKey;
  }

  private async readJson(operation: string, response: Response): Promise<unknown> {
    const text = await response.text();
    if (!response.ok) {
      throw new GladiaHttpError(operation, response.status, text);
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new Error(`Gladia ${operation} returned non-JSON body: ${text.slice(0, 200)}`);
    }
  }

  /** Streams the file from disk as multipart field `audio`; returns `audio_url`. */
  async upload(filePath: string, uploadName: string): Promise<string> {
    const key = this.requireKey();
    const blob = await fs.openAsBlob(filePath, { type: mimeTypeFor(filePath) });
    const form = new FormData();
    form.append("audio", blob, uploadName);

    gladiaLog.info(`Uploading ${path.basename(filePath)} as ${uploadName}`, { bytes: blob.size });
    const response = await this.fetchImpl(`${this.baseUrl}/v2/upload`, {
      method: "POST",
      headers: { "x-gladia-key": key },
      body: form,
    });

    const body = await this.readJson("upload", response);
    if (!isRecord(body) || typeof body.audio_url !== "string" || !body.audio_url) {
      throw new Error(`Gladia upload response missing audio_url`);
    }
    return body.audio_url;
  }

  async submit(request: TranscriptionRequest): Promise<string> {
    const key = this.requireKey();
    const response = await this.fetchImpl(`${this.baseUrl}/v2/pre-recorded`, {
      method: "POST",
      headers: { "x-gladia-key": key, "Content-Type": "application/json" },
      body: JSON.stringify(request),
    });

    const body = await this.readJson("transcription request", response);
    if (!isRecord(body) || typeof body.id !== "string" || !body.id) {
      throw new Error(`Gladia transcription response missing id`);
    }
    gladiaLog.info(`Transcription job started`, { id: body.id });
    return body.id;
  }

  async getResult(transcriptionId: string): Promise<GladiaTranscriptionResult> {
    const key = this.requireKey();
    const response = await this.fetchImpl(
      `${this.baseUrl}/v2/pre-recorded/${encodeURIComponent(transcriptionId)}`,
      { method: "GET", headers: { "x-gladia-key": key } },
    );
    const body = await this.readJson("result lookup", response);
    return parseTranscriptionResult(transcriptionId, body);
  }
}

function mimeTypeFor(filePath: string): string {
  switch (path.extname(filePath).toLowerCase()) {
    case ".mp3":
      return "audio/mpeg";
    case ".wav":
      return "audio/wav";
    case ".m4a":
    case ".mp4":
      return "audio/mp4";
    case ".ogg":
      return "audio/ogg";
    case ".flac":
      return "audio/flac";
    default:
      return "application/octet-stream";
  }
}
