import { expect, test } from "vitest";
import { LlmJsonError, parseJsonObjectFromLlm } from "../../llm/parseJsonFromLlm.js";

test("plain JSON parses directly", () => {
  expect(parseJsonObjectFromLlm(' {"a": 1} ')).toEqual({ a: 1 });
});

test("fenced JSON is unwrapped", () => {
  expect(parseJsonObjectFromLlm('Sure!\n```json\n{"a": [1, 2]}\n```\nEnjoy.')).toEqual({ a: [1, 2] });
});

test("an object embedded in prose is sliced out", () => {
  expect(parseJsonObjectFromLlm('The result is {"best": "Jon"} as requested')).toEqual({ best: "Jon" });
});

test("text without JSON throws with the start of the reply", () => {
  let caught: unknown;
  try {
    parseJsonObjectFromLlm("nothing to see");
  } catch (err) {
    caught = err;
  }

  expect(caught).toBeInstanceOf(LlmJsonError);
  expect(caught instanceof LlmJsonError && caught.message).toBe("Model response did not contain parseable JSON.");
  expect(caught instanceof LlmJsonError && caught.snippet).toBe("nothing to see");
});

test("JSON that is not an object is rejected", () => {
  expect(() => parseJsonObjectFromLlm("[1, 2]")).toThrow("response JSON is not an object");
});
