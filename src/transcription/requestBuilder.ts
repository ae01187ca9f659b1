import { classifyFileName } from "../audio/classifyFiles.js";
import { baseNameWithoutExt } from "../audio/audioFiles.js";
import type { DiarizationConfig, TranscriptionRequest } from "./types.js";

const SINGLE_SOURCE_NAMES = new Set(["USB"]);

/** Personal mics and auxiliary inputs carry a single source; diarizing them only invents speakers. */
export function isSingleSpeakerFile(fileName: string): boolean {
  const cls = classifyFileName(fileName);
  if (cls.kind === "mic" || cls.kind === "auxiliary") return true;
  return SINGLE_SOURCE_NAMES.has(baseNameWithoutExt(fileName).toUpperCase());
}

function isMixFile(fileName: string, isMasterRecording: boolean): boolean {
  const upper = fileName.toUpperCase();
  return isMasterRecording || upper.includes("MIX") || upper.includes("MASTER");
}

export function buildTranscriptionRequest(args: {
  audioUrl: string;
  fileName: string;
  isMasterRecording: boolean;
  speakerCount: number;
  language: string;
}): TranscriptionRequest {
  const singleSpeaker = isSingleSpeakerFile(args.fileName);

  let speakers = Math.max(1, args.speakerCount);
  if (singleSpeaker) {
    speakers = 1;
  } else if (isMixFile(args.fileName, args.isMasterRecording)) {
    speakers = Math.max(2, args.speakerCount);
  }

  const diarization = !singleSpeaker;
  const diarizationConfig: DiarizationConfig | undefined = diarization
    ? {
        number_of_speakers: speakers,
        min_speakers: Math.max(1, speakers - 1),
        max_speakers: Math.min(8, speakers + 1),
        // enhanced diarization only supports one or two speakers
        ...(speakers <= 2 ? { enhanced: true } : {}),
      }
    : undefined;

  return {
    audio_url: args.audioUrl,
    diarization,
    ...(diarizationConfig ? { diarization_config: diarizationConfig } : {}),
    sentences: true,
    summarization: true,
    audio_enhancer: true,
    chapterization: true,
    sentiment_analysis: true,
    named_entity_recognition: true,
    speaker_reidentification: true,
    punctuation_enhanced: true,
    name_consistency: true,
    accurate_words_timestamps: true,
    language: args.language,
  };
}
