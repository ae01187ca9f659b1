import OpenAI from "openai";
import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";

const llmLog = log.withScope("llm");

/**
 * A failed chat completion. `status` is the upstream HTTP status when there
 * was a response; `transient` marks failures worth another attempt.
 */
export class LlmRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | undefined,
    readonly transient: boolean,
  ) {
    super(message);
    this.name = "LlmRequestError";
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }
}

let openaiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const apiKey = cfg.openai.apiKey;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY not configured in .env");
    }
    // retries are ours, so rate limits and transient failures can be told apart
    openaiClient = new OpenAI({ apiKey, timeout: cfg.llm.timeoutMs, maxRetries: 0 });
  }
  return openaiClient;
}

function toLlmError(err: unknown): LlmRequestError {
  if (err instanceof OpenAI.APIConnectionError) {
    return new LlmRequestError(`LLM request failed: ${err.message}`, undefined, true);
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    const transient = status === 429 || status === 408 || (status !== undefined && status >= 500);
    return new LlmRequestError(`LLM request failed (HTTP ${status ?? "?"}): ${err.message}`, status, transient);
  }
  return new LlmRequestError(
    "LLM request failed: " + (err instanceof Error ? err.message : "unknown error"),
    undefined,
    false,
  );
}

export async function chat(opts: {
  systemPrompt: string;
  userMessage: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: "text" | "json_object";
}): Promise<string> {
  const client = getOpenAIClient();

  const model = opts.model ?? cfg.llm.model;
  const temperature = opts.temperature ?? cfg.llm.temperature;
  const maxTokens = opts.maxTokens ?? cfg.llm.maxTokens;

  let content: string | undefined;
  try {
    const response = await client.chat.completions.create({
      model,
      temperature,
      max_tokens: maxTokens,
      ...(opts.responseFormat === "json_object"
        ? { response_format: { type: "json_object" as const } }
        : {}),
      messages: [
        { role: "system", content: opts.systemPrompt },
        { role: "user", content: opts.userMessage },
      ],
    });
    content = response.choices[0]?.message?.content?.trim();
  } catch (err) {
    const llmErr = toLlmError(err);
    llmLog.error(llmErr.message, { model, status: llmErr.status });
    throw llmErr;
  }

  if (!content) {
    throw new LlmRequestError("Empty response from OpenAI", undefined, true);
  }
  return content;
}
