import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { loadConfig } from "../../config/env.js";
import { redactConfigSnapshot } from "../../config/redact.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadConfig", () => {
  test("blank values fall back to defaults", () => {
    vi.stubEnv("TRANSCRIPTION_POLL_INTERVAL_MS", "");
    vi.stubEnv("UPLOAD_MAX_ATTEMPTS", "  ");
    vi.stubEnv("LLM_MODEL", "");

    const cfg = loadConfig();

    expect(cfg.gladia.pollIntervalMs).toBe(10_000);
    expect(cfg.upload.maxAttempts).toBe(3);
    expect(cfg.llm.model).toBe("gpt-4o");
  });

  test("paths hang off the data root unless set", () => {
    vi.stubEnv("DATA_ROOT", "/srv/pipeline");
    vi.stubEnv("CLIPS_DIR", "");
    vi.stubEnv("NAME_CORRECTIONS_PATH", "/etc/names.yml");

    const cfg = loadConfig();

    expect(cfg.data.clipsDir).toBe(path.join("/srv/pipeline", "clips"));
    expect(cfg.analysis.wordListsPath).toBe(path.join("/srv/pipeline", "word-lists.json"));
    expect(cfg.analysis.nameCorrectionsPath).toBe("/etc/names.yml");
  });

  test("the service URL loses trailing slashes and scopes are split", () => {
    vi.stubEnv("GLADIA_BASE_URL", "https://gladia.test///");
    vi.stubEnv("LOG_SCOPES", " analysis , ,clips");

    const cfg = loadConfig();

    expect(cfg.gladia.baseUrl).toBe("https://gladia.test");
    expect(cfg.logging.scopes).toEqual(["analysis", "clips"]);
  });

  test.each([
    ["UPLOAD_MAX_ATTEMPTS", "three", "Invalid integer for UPLOAD_MAX_ATTEMPTS: three"],
    ["UPLOAD_MAX_ATTEMPTS", "0", "Expected a positive value for UPLOAD_MAX_ATTEMPTS: 0"],
    ["LLM_TEMPERATURE", "warm", "Invalid number for LLM_TEMPERATURE: warm"],
    ["LOG_LEVEL", "loud", "Invalid value for LOG_LEVEL: loud. Allowed: error, warn, info, debug, trace"],
  ])("%s=%s is rejected", (name, value, message) => {
    vi.stubEnv(name, value);
    expect(() => loadConfig()).toThrow(message);
  });
});

test("secrets are redacted wherever they appear", () => {
  expect(
    redactConfigSnapshot({
      OPENAI_API_KEY: "test-secret",
      GLADIA_API_KEY: undefined,
      nested: { OPENAI_API_KEY: "test-secret" },
      LLM_MODEL: "gpt-4o",
    }),
  ).toEqual({
    OPENAI_API_KEY: "<redacted>",
    GLADIA_API_KEY: "<unset>",
    nested: { OPENAI_API_KEY: "<redacted>" },
    LLM_MODEL: "gpt-4o",
  });
});
