import fs from "node:fs";
import yaml from "yaml";
import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";

const analysisLog = log.withScope("analysis");

export type DiscussionQuestion = {
  question: string;
  order: number;
  active: boolean;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function parseDiscussionQuestions(raw: unknown): DiscussionQuestion[] {
  if (!isRecord(raw) || !Array.isArray(raw.questions)) return [];

  const parsed: DiscussionQuestion[] = [];
  raw.questions.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.question !== "string" || !entry.question.trim()) {
      analysisLog.warn(`Skipping discussion question #${index + 1}: missing \`question\``);
      return;
    }
    parsed.push({
      question: entry.question.trim(),
      order: typeof entry.order === "number" ? entry.order : index + 1,
      active: entry.active !== false,
    });
  });
  return parsed;
}

/** Active questions in display order. A missing file means a free-form discussion. */
export function loadActiveDiscussionQuestions(
  filePath: string = cfg.analysis.discussionQuestionsPath,
): string[] {
  if (!fs.existsSync(filePath)) return [];
  return parseDiscussionQuestions(yaml.parse(fs.readFileSync(filePath, "utf-8")))
    .filter((q) => q.active)
    .sort((a, b) => a.order - b.order)
    .map((q) => q.question);
}
