import { expect, test } from "vitest";
import { buildTranscriptionRequest, isSingleSpeakerFile } from "../../transcription/requestBuilder.js";

function request(fileName: string, isMasterRecording: boolean, speakerCount: number) {
  return buildTranscriptionRequest({
    audioUrl: "https://files.test/audio",
    fileName,
    isMasterRecording,
    speakerCount,
    language: "en",
  });
}

test("personal mics and single-source inputs turn diarization off", () => {
  expect(isSingleSpeakerFile("MIC2.wav")).toBe(true);
  expect(isSingleSpeakerFile("PHONE.mp3")).toBe(true);
  expect(isSingleSpeakerFile("usb.wav")).toBe(true);
  expect(isSingleSpeakerFile("MASTER_MIX.wav")).toBe(false);

  const mic = request("MIC1.mp3", false, 4);
  expect(mic.diarization).toBe(false);
  expect(mic).not.toHaveProperty("diarization_config");
});

test("the master is diarized for the assigned speaker count", () => {
  expect(request("MASTER_MIX.mp3", true, 4).diarization_config).toEqual({
    number_of_speakers: 4,
    min_speakers: 3,
    max_speakers: 5,
  });
});

test("a mix always expects at least two speakers and gets enhanced diarization at two", () => {
  expect(request("MASTER_MIX.mp3", true, 1).diarization_config).toEqual({
    number_of_speakers: 2,
    min_speakers: 1,
    max_speakers: 3,
    enhanced: true,
  });
});

test("the speaker range is capped at eight", () => {
  expect(request("MASTER_MIX.mp3", true, 9).diarization_config).toEqual({
    number_of_speakers: 9,
    min_speakers: 8,
    max_speakers: 8,
  });
});

test("an unnamed room recording uses the plain count", () => {
  const room = request("room.wav", false, 3);
  expect(room.diarization).toBe(true);
  expect(room.diarization_config).toEqual({ number_of_speakers: 3, min_speakers: 2, max_speakers: 4 });
  expect(room.language).toBe("en");
  expect(room.summarization).toBe(true);
  expect(room.accurate_words_timestamps).toBe(true);
});
