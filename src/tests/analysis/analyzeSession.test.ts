import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { analyzeSession, analyzeSessions, callLlmWithRetry, type AnalyzeDeps } from "../../analysis/analyzeSession.js";
import type { LlmCall, LlmCallInput } from "../../analysis/types.js";
import { LlmRequestError } from "../../llm/client.js";
import { buildNameCorrections } from "../../speakers/nameCorrections.js";
import { fixedClock } from "../../utils/clock.js";
import { FIXED_NOW, makeSession, transcribed } from "../helpers/sessionFixtures.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

function auditDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "analysis-"));
  tempDirs.push(dir);
  return dir;
}

const RESPONSE = JSON.stringify({
  comedy_categories: {
    best_joke: { speaker: "John", timestamp: "00:12:30", quote: "That's no moon" },
  },
});

function scripted(...steps: Array<string | Error>): LlmCall & { inputs: LlmCallInput[] } {
  const inputs: LlmCallInput[] = [];
  const call = async (input: LlmCallInput): Promise<string> => {
    const step = steps[Math.min(inputs.length, steps.length - 1)];
    inputs.push(input);
    if (step instanceof Error) throw step;
    return step;
  };
  return Object.assign(call, { inputs });
}

function deps(callLlm: LlmCall, dir: string, extra: Partial<AnalyzeDeps> = {}): AnalyzeDeps {
  return {
    callLlm,
    model: "test-model",
    clock: fixedClock(FIXED_NOW),
    corrections: buildNameCorrections({ corrections: [{ canonical: "Jon", variants: ["John"] }] }),
    discussionQuestions: ["Rate it out of ten"],
    auditDir: dir,
    retry: { maxAttempts: 3, rateLimitBaseDelayMs: 100, retryDelayMs: 50, sleep: async () => {} },
    ...extra,
  };
}

const transcribedSession = () =>
  makeSession({ audioFiles: [transcribed("MIC1.wav", "Jon: hello there", { speakerSlot: 0 })] });

describe("callLlmWithRetry", () => {
  const input: LlmCallInput = { systemPrompt: "s", userPrompt: "u", model: "m" };

  test("rate limits back off exponentially", async () => {
    const delays: number[] = [];
    const call = scripted(new LlmRequestError("slow down", 429, true), new LlmRequestError("slow down", 429, true), "ok");

    const out = await callLlmWithRetry(call, input, {
      maxAttempts: 3,
      rateLimitBaseDelayMs: 100,
      retryDelayMs: 50,
      sleep: async (ms) => void delays.push(ms),
    });

    expect(out).toBe("ok");
    expect(delays).toEqual([100, 200]);
  });

  test("other transient failures wait linearly", async () => {
    const delays: number[] = [];
    const call = scripted(new LlmRequestError("bad gateway", 502, true), new LlmRequestError("empty", undefined, true), "ok");

    await callLlmWithRetry(call, input, {
      maxAttempts: 3,
      rateLimitBaseDelayMs: 100,
      retryDelayMs: 50,
      sleep: async (ms) => void delays.push(ms),
    });

    expect(delays).toEqual([50, 100]);
  });

  test("a permanent failure is not retried", async () => {
    const call = scripted(new LlmRequestError("bad request", 400, false));

    await expect(callLlmWithRetry(call, input, { maxAttempts: 3, sleep: async () => {} })).rejects.toThrow("bad request");
    expect(call.inputs).toHaveLength(1);
  });
});

describe("analyzeSession", () => {
  test("parses the response, corrects names and writes the audit record", async () => {
    const dir = auditDir();
    const call = scripted(RESPONSE);

    const results = await analyzeSession(transcribedSession(), deps(call, dir));

    expect(results.source).toBe("nested");
    expect(results.notes).toEqual([]);
    expect(results.generatedAt).toBe(FIXED_NOW);
    expect(results.winners.bestJoke?.speaker).toBe("Jon");

    expect(call.inputs).toHaveLength(1);
    expect(call.inputs[0].model).toBe("test-model");
    expect(call.inputs[0].userPrompt).toContain("1. Rate it out of ten");
    expect(call.inputs[0].userPrompt).toContain("Jon: hello there");

    const audit: unknown = JSON.parse(fs.readFileSync(path.join(dir, "openai_analysis_20240316_120000.json"), "utf-8"));
    expect(audit).toMatchObject({
      sessionId: "session-1",
      model: "test-model",
      transcriptSource: "individual",
      includedFiles: ["MIC1.wav"],
      rawResponse: RESPONSE,
      parseSource: "nested",
    });
  });

  test("a session without transcripts is degraded without calling the model", async () => {
    const call = scripted(RESPONSE);

    const results = await analyzeSession(makeSession(), deps(call, auditDir()));

    expect(results).toEqual({
      winners: {},
      topFives: {},
      openingQuestions: [],
      source: "degraded",
      notes: ["analysis unavailable: no transcripts available"],
      generatedAt: FIXED_NOW,
    });
    expect(call.inputs).toHaveLength(0);
  });

  test("an unparseable response is degraded and the audit records why", async () => {
    const dir = auditDir();

    const results = await analyzeSession(transcribedSession(), deps(scripted("I cannot help with that."), dir));

    expect(results.source).toBe("degraded");
    expect(results.notes).toEqual(["analysis unavailable: Model response did not contain parseable JSON."]);
    const audit: unknown = JSON.parse(fs.readFileSync(path.join(dir, "openai_analysis_20240316_120000.json"), "utf-8"));
    expect(audit).toMatchObject({
      parseSource: "failed",
      parseFailure: "Model response did not contain parseable JSON.",
    });
  });

  test("a rate-limited call succeeds on retry", async () => {
    const call = scripted(new LlmRequestError("slow down", 429, true), RESPONSE);

    const results = await analyzeSession(transcribedSession(), deps(call, auditDir()));

    expect(results.source).toBe("nested");
    expect(call.inputs).toHaveLength(2);
  });

  test("exhausted retries throw", async () => {
    const call = scripted(new LlmRequestError("slow down", 429, true));

    await expect(analyzeSession(transcribedSession(), deps(call, auditDir()))).rejects.toThrow("slow down");
    expect(call.inputs).toHaveLength(3);
  });
});

describe("analyzeSessions", () => {
  test("results come back in input order with null for a failed session", async () => {
    const alien = makeSession({
      id: "session-2",
      title: "Alien",
      audioFiles: [transcribed("MIC1.wav", "Jon: in space", { speakerSlot: 0 })],
    });
    const call: LlmCall = async (input) => {
      if (input.userPrompt.includes('"Alien"')) throw new LlmRequestError("bad request", 400, false);
      return RESPONSE;
    };

    const out = await analyzeSessions([transcribedSession(), alien], deps(call, auditDir()), 2);

    expect(out).toHaveLength(2);
    expect(out[0]?.source).toBe("nested");
    expect(out[1]).toBeNull();
  });
});
