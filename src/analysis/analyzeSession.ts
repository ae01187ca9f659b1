import fs from "node:fs";
import path from "node:path";
import { cfg } from "../config/env.js";
import { chat, LlmRequestError } from "../llm/client.js";
import { errorMessage, log } from "../utils/logger.js";
import { fileStamp, sleep as realSleep, systemClock, type Clock, type Sleep } from "../utils/clock.js";
import { runBounded } from "../utils/boundedPool.js";
import { isTransientNetworkError } from "../transcription/retry.js";
import { applyNameCorrections, loadNameCorrections, type NameCorrections } from "../speakers/nameCorrections.js";
import type { Session } from "../sessions/types.js";
import { aggregateTranscript } from "./aggregateTranscript.js";
import { loadActiveDiscussionQuestions } from "./discussionQuestions.js";
import { degradedResults } from "./fallback.js";
import { parseAnalysisResponse } from "./parseAnalysis.js";
import { buildAnalysisPrompt } from "./prompt.js";
import type { CategoryResults, LlmCall, LlmCallInput } from "./types.js";

const analysisLog = log.withScope("analysis");

export const defaultLlmCall: LlmCall = (input) =>
  chat({
    systemPrompt: input.systemPrompt,
    userMessage: input.userPrompt,
    model: input.model,
    responseFormat: "json_object",
  });

export type LlmRetryOptions = {
  maxAttempts?: number;
  rateLimitBaseDelayMs?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
};

function isTransientLlmError(err: unknown): boolean {
  if (err instanceof LlmRequestError) return err.transient;
  return isTransientNetworkError(err);
}

/**
 * Rate limits back off exponentially from `rateLimitBaseDelayMs`; other
 * transient failures wait `retryDelayMs * attempt`. Anything else throws at once.
 */
export async function callLlmWithRetry(
  callLlm: LlmCall,
  input: LlmCallInput,
  opts: LlmRetryOptions = {},
): Promise<string> {
  const maxAttempts = opts.maxAttempts ?? cfg.llm.maxAttempts;
  const rateLimitBaseDelayMs = opts.rateLimitBaseDelayMs ?? cfg.llm.rateLimitBaseDelayMs;
  const retryDelayMs = opts.retryDelayMs ?? cfg.llm.retryDelayMs;
  const sleep = opts.sleep ?? realSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await callLlm(input);
    } catch (err) {
      if (attempt >= maxAttempts || !isTransientLlmError(err)) throw err;

      const rateLimited = err instanceof LlmRequestError && err.isRateLimited;
      const delayMs = rateLimited ? rateLimitBaseDelayMs * 2 ** (attempt - 1) : retryDelayMs * attempt;
      analysisLog.warn(
        `${rateLimited ? "Rate limited" : "LLM call failed"} (attempt ${attempt}/${maxAttempts}), retrying in ${delayMs}ms`,
        { error: errorMessage(err) },
      );
      await sleep(delayMs);
    }
  }
}

export type AnalyzeDeps = {
  callLlm?: LlmCall;
  model?: string;
  clock?: Clock;
  retry?: LlmRetryOptions;
  corrections?: NameCorrections;
  discussionQuestions?: string[];
  maxTranscriptChars?: number;
  /** Directory for the audit record; defaults to the session folder. */
  auditDir?: string;
};

type AuditRecord = {
  sessionId: string;
  title: string;
  model: string;
  generatedAt: string;
  transcriptSource: string;
  includedFiles: string[];
  skippedFiles: string[];
  truncated: boolean;
  systemPrompt: string;
  userPrompt: string;
  rawResponse: string;
  parseSource: string;
  parseFailure?: string;
};

function writeAudit(dir: string, clock: Clock, record: AuditRecord): string | null {
  const auditPath = path.join(dir, `openai_analysis_${fileStamp(clock)}.json`);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(auditPath, JSON.stringify(record, null, 2), "utf-8");
    return auditPath;
  } catch (err) {
    analysisLog.error(`Could not write analysis audit file ${auditPath}`, { error: errorMessage(err) });
    return null;
  }
}

/**
 * Aggregate, prompt, call, parse, correct names. Sessions without any
 * transcript and responses neither parser understands come back degraded; LLM
 * failures that outlive the retries throw.
 */
export async function analyzeSession(session: Session, deps: AnalyzeDeps = {}): Promise<CategoryResults> {
  const clock = deps.clock ?? systemClock;
  const model = deps.model ?? cfg.llm.model;

  const aggregate = aggregateTranscript(session, deps.maxTranscriptChars ?? cfg.analysis.maxTranscriptChars);
  if (aggregate.includedFiles.length === 0) {
    analysisLog.warn(`No transcripts to analyze for ${session.title}`, { sessionId: session.id });
    return degradedResults("no transcripts available", clock);
  }

  const discussionQuestions =
    deps.discussionQuestions ??
    (session.discussionQuestions.length > 0 ? session.discussionQuestions : loadActiveDiscussionQuestions());

  const prompt = buildAnalysisPrompt({
    title: session.title,
    sessionDate: session.sessionDate,
    micAssignments: session.micAssignments,
    participantsPresent: session.participantsPresent,
    discussionQuestions,
    transcript: aggregate.text,
    truncated: aggregate.truncated,
  });

  analysisLog.info(`Analyzing ${session.title}`, {
    sessionId: session.id,
    source: aggregate.source,
    chars: aggregate.text.length,
    files: aggregate.includedFiles.length,
  });

  const raw = await callLlmWithRetry(
    deps.callLlm ?? defaultLlmCall,
    { systemPrompt: prompt.systemPrompt, userPrompt: prompt.userPrompt, model },
    deps.retry,
  );

  const parsed = parseAnalysisResponse(raw);

  writeAudit(deps.auditDir ?? session.folderPath, clock, {
    sessionId: session.id,
    title: session.title,
    model,
    generatedAt: clock.now().toISOString(),
    transcriptSource: aggregate.source,
    includedFiles: aggregate.includedFiles,
    skippedFiles: aggregate.skippedFiles,
    truncated: aggregate.truncated,
    systemPrompt: prompt.systemPrompt,
    userPrompt: prompt.userPrompt,
    rawResponse: raw,
    parseSource: parsed.kind,
    ...(parsed.kind === "failed" ? { parseFailure: parsed.reason } : {}),
  });

  if (parsed.kind === "failed") {
    analysisLog.warn(`Analysis response could not be parsed: ${parsed.reason}`, { sessionId: session.id });
    return degradedResults(parsed.reason, clock);
  }

  const results: CategoryResults = {
    ...parsed.analysis,
    source: parsed.kind,
    notes: aggregate.skippedFiles.length > 0 ? [`transcripts left out for length: ${aggregate.skippedFiles.join(", ")}`] : [],
    generatedAt: clock.now().toISOString(),
  };
  applyNameCorrections(results, deps.corrections ?? loadNameCorrections());

  analysisLog.info(`Analysis parsed (${parsed.kind})`, {
    sessionId: session.id,
    winners: Object.keys(results.winners).length,
    topFives: Object.keys(results.topFives).length,
  });
  return results;
}

/**
 * Analyze several sessions with at most `concurrency` in flight. Results are
 * in input order; a session whose analysis threw gets `null`.
 */
export async function analyzeSessions(
  sessions: readonly Session[],
  deps: AnalyzeDeps = {},
  concurrency: number = cfg.analysis.concurrency,
): Promise<Array<CategoryResults | null>> {
  const outcomes = await runBounded(sessions, concurrency, (session) => analyzeSession(session, deps));

  return outcomes.map((outcome, index) => {
    if (outcome.status === "fulfilled") return outcome.value;
    analysisLog.error(`Analysis failed for ${sessions[index].title}`, {
      sessionId: sessions[index].id,
      error: errorMessage(outcome.reason),
    });
    return null;
  });
}
