export type GladiaUploadResponse = {
  audio_url: string;
  audio_metadata?: Record<string, unknown>;
};

export type GladiaJobResponse = {
  id: string;
  result_url?: string;
};

export type DiarizationConfig = {
  number_of_speakers: number;
  min_speakers: number;
  max_speakers: number;
  enhanced?: boolean;
};

export type TranscriptionRequest = {
  audio_url: string;
  diarization: boolean;
  diarization_config?: DiarizationConfig;
  sentences: boolean;
  summarization: boolean;
  audio_enhancer: boolean;
  chapterization: boolean;
  sentiment_analysis: boolean;
  named_entity_recognition: boolean;
  speaker_reidentification: boolean;
  punctuation_enhanced: boolean;
  name_consistency: boolean;
  accurate_words_timestamps: boolean;
  language: string;
};

export type GladiaWord = {
  word: string;
  start: number;
  end: number;
  confidence?: number;
};

export type GladiaUtterance = {
  start: number;
  end: number;
  text: string;
  speaker?: number;
  confidence?: number;
  channel?: number;
  words?: GladiaWord[];
};

export type GladiaTranscription = {
  full_transcript?: string;
  utterances?: GladiaUtterance[];
  languages?: string[];
};

export type GladiaResultStatus = "queued" | "processing" | "done" | "error";

/** `GET /v2/pre-recorded/{id}`; everything beyond `status` is optional on the wire. */
export type GladiaTranscriptionResult = {
  id: string;
  status: GladiaResultStatus;
  result?: {
    transcription?: GladiaTranscription;
    summarization?: { results?: string } | null;
    chapterization?: unknown;
    sentiment_analysis?: unknown;
    named_entity_recognition?: unknown;
    metadata?: { audio_duration?: number; number_of_distinct_channels?: number };
  } | null;
  error?: { message?: string; code?: number } | null;
  error_code?: number | null;
};

export interface TranscriptionApi {
  upload(filePath: string, uploadName: string): Promise<string>;
  submit(request: TranscriptionRequest): Promise<string>;
  getResult(transcriptionId: string): Promise<GladiaTranscriptionResult>;
}
