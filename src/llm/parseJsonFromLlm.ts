/** Raised when a chat response holds no usable JSON object. */
export class LlmJsonError extends Error {
  constructor(
    message: string,
    /** Start of the offending response, for logs and audit notes. */
    public readonly snippet: string,
  ) {
    super(message);
    this.name = "LlmJsonError";
  }
}

const SNIPPET_CHARS = 200;

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Pull a JSON object out of a model reply. Tries the whole reply, then a
 * ```json fence, then the outermost `{...}` slice, so chatty preambles and
 * trailing remarks are tolerated.
 */
export function parseJsonObjectFromLlm(raw: string): Record<string, unknown> {
  const trimmed = raw.trim();
  const candidates = [trimmed, extractFencedContent(trimmed), extractObjectSlice(trimmed)];

  let sawJson = false;
  for (const candidate of candidates) {
    if (candidate === null) continue;
    const parsed = tryParse(candidate);
    if (!parsed.ok) continue;
    if (isRecord(parsed.value)) return parsed.value;
    sawJson = true;
  }

  const snippet = trimmed.slice(0, SNIPPET_CHARS);
  throw sawJson
    ? new LlmJsonError("response JSON is not an object", snippet)
    : new LlmJsonError("Model response did not contain parseable JSON.", snippet);
}

function tryParse(value: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(value) };
  } catch {
    return { ok: false };
  }
}

function extractFencedContent(value: string): string | null {
  const match = value.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  return match?.[1]?.trim() ?? null;
}

function extractObjectSlice(value: string): string | null {
  const start = value.indexOf("{");
  const end = value.lastIndexOf("}");
  if (start < 0 || end <= start) return null;
  return value.slice(start, end + 1);
}
