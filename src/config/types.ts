export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  openai: {
    apiKey?: string;
  };

  gladia: {
    apiKey?: string;
    baseUrl: string;
    language: string;
    pollIntervalMs: number;
    timeoutMs: number; // hard ceiling for one transcription job
  };

  upload: {
    maxAttempts: number;
    baseDelayMs: number;
    largeFileThresholdBytes: number;
  };

  ffmpeg: {
    path: string;
    timeoutMs: number;
  };

  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxAttempts: number;
    rateLimitBaseDelayMs: number;
    retryDelayMs: number;
  };

  analysis: {
    maxTranscriptChars: number;
    concurrency: number;
    nameCorrectionsPath: string;
    discussionQuestionsPath: string;
    wordListsPath: string;
  };

  data: {
    root: string;
    dbFilename: string;
    clipsDir: string;
    clipMaxAgeDays: number;
  };

  logging: {
    level: LogLevel;
    scopes?: string[];
    format: LogFormat;
  };
}
