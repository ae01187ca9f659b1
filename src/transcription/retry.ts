import { log } from "../utils/logger.js";
import { sleep as realSleep, type Sleep } from "../utils/clock.js";

const retryLog = log.withScope("transcribe");

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorCause(err: unknown): unknown {
  if (err instanceof Error && "cause" in err) return err.cause;
  return undefined;
}

/**
 * Network/timeout-class failures only. HTTP errors that came back with a
 * status (4xx/5xx) are business errors and are not retried.
 */
export function isTransientNetworkError(err: unknown): boolean {
  for (let current: unknown = err, depth = 0; current && depth < 4; current = errorCause(current), depth++) {
    const code = errorCode(current);
    if (code && TRANSIENT_CODES.has(code)) return true;
    if (current instanceof Error) {
      if (current.name === "AbortError" || current.name === "TimeoutError") return true;
      // undici reports socket failures as a bare TypeError("fetch failed") with the real error in `cause`
      if (current.name === "TypeError" && current.message === "fetch failed") return true;
    }
  }
  return false;
}

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  isRetryable?: (err: unknown) => boolean;
  sleep?: Sleep;
  label?: string;
};

/**
 * Run `fn` up to `maxAttempts` times, waiting baseDelayMs * 2^(attempt-1)
 * between attempts. Non-retryable errors propagate immediately.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const isRetryable = opts.isRetryable ?? isTransientNetworkError;
  const sleep = opts.sleep ?? realSleep;
  const label = opts.label ?? "operation";

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= opts.maxAttempts || !isRetryable(err)) {
        throw err;
      }
      const delayMs = opts.baseDelayMs * 2 ** (attempt - 1);
      retryLog.warn(`${label} failed (attempt ${attempt}/${opts.maxAttempts}), retrying in ${delayMs}ms`, {
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(delayMs);
    }
  }
}
