import { parseJsonObjectFromLlm } from "../llm/parseJsonFromLlm.js";
import { log } from "../utils/logger.js";
import {
  TOP_FIVE_CATEGORIES,
  WINNER_CATEGORIES,
  categoryAliases,
  normalizeCategoryName,
  type TopFiveCategory,
  type WinnerCategory,
} from "./categories.js";
import type {
  AudioQuality,
  CategoryWinner,
  ParseResult,
  ParsedAnalysis,
  QuestionAnswer,
  RunnerUp,
  TopFiveEntry,
  TopFiveList,
} from "./types.js";

const analysisLog = log.withScope("analysis");

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/** Field lookup that ignores case, `_`, `-` and spaces in key names. */
class Fields {
  private readonly byName = new Map<string, unknown>();

  constructor(obj: JsonRecord) {
    for (const [key, value] of Object.entries(obj)) {
      const norm = normalizeCategoryName(key);
      if (!this.byName.has(norm)) this.byName.set(norm, value);
    }
  }

  get(...names: string[]): unknown {
    for (const name of names) {
      const value = this.byName.get(normalizeCategoryName(name));
      if (value !== undefined && value !== null) return value;
    }
    return undefined;
  }

  str(...names: string[]): string | undefined {
    const value = this.get(...names);
    if (typeof value === "string") return value.trim();
    if (typeof value === "number") return String(value);
    return undefined;
  }

  num(...names: string[]): number | undefined {
    const value = this.get(...names);
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim()) {
      const n = Number(value.trim());
      if (Number.isFinite(n)) return n;
    }
    return undefined;
  }
}

function clampScore(value: number | undefined): number {
  if (value === undefined) return 5;
  return Math.min(10, Math.max(1, value));
}

export function parseAudioQuality(value: string | undefined): AudioQuality {
  switch (normalizeCategoryName(value ?? "")) {
    case "muffled":
      return "Muffled";
    case "backgroundnoise":
    case "noisy":
      return "BackgroundNoise";
    default:
      return "Clear";
  }
}

function parseRunnersUp(value: unknown): RunnerUp[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((raw, index) => {
    const f = new Fields(raw);
    return {
      speaker: f.str("speaker") ?? "Unknown",
      timestamp: f.str("timestamp") ?? "0:00",
      briefDescription: f.str("briefDescription", "description", "quote") ?? "",
      place: f.num("place", "rank") ?? index + 2,
    };
  });
}

/** Null when the object carries neither a speaker nor a quote. */
export function parseCategoryWinner(raw: JsonRecord): CategoryWinner | null {
  const f = new Fields(raw);
  const speaker = f.str("speaker");
  const quote = f.str("quote");
  if (!speaker && !quote) return null;

  return {
    speaker: speaker || "Unknown",
    timestamp: f.str("timestamp") ?? "0:00",
    quote: quote ?? "",
    setup: f.str("setup") ?? "",
    groupReaction: f.str("groupReaction") ?? "",
    whyItsGreat: f.str("whyItsGreat", "reasoning") ?? "",
    audioQuality: parseAudioQuality(f.str("audioQuality", "audioQualityString")),
    entertainmentScore: clampScore(f.num("entertainmentScore", "score")),
    runnersUp: parseRunnersUp(f.get("runnersUp")),
  };
}

function parseStartEnd(value: unknown): [number, number] | undefined {
  if (!Array.isArray(value) || value.length < 2) return undefined;
  const [start, end] = value;
  if (typeof start !== "number" || typeof end !== "number") return undefined;
  if (!Number.isFinite(start) || !Number.isFinite(end)) return undefined;
  return [start, end];
}

function parseTopFiveEntry(raw: JsonRecord, index: number): TopFiveEntry | null {
  const f = new Fields(raw);
  const speaker = f.str("speaker");
  const quote = f.str("quote");
  if (!speaker && !quote) return null;

  const entry: TopFiveEntry = {
    rank: f.num("rank") ?? index + 1,
    speaker: speaker || "Unknown",
    timestamp: f.str("timestamp") ?? "0:00",
    quote: quote ?? "",
    context: f.str("context", "setup") ?? "",
    audioQuality: parseAudioQuality(f.str("audioQuality", "audioQualityString")),
    score: clampScore(f.num("score", "entertainmentScore")),
    reasoning: f.str("reasoning", "whyItsGreat") ?? "",
  };
  const startEnd = parseStartEnd(f.get("estimatedStartEnd"));
  if (startEnd) entry.estimatedStartEnd = startEnd;
  const source = f.str("sourceAudioFile");
  if (source) entry.sourceAudioFile = source;
  return entry;
}

/** Accepts `{ Entries: [...] }` or a bare array. Empty lists come back null. */
export function parseTopFiveList(value: unknown): TopFiveList | null {
  let list: unknown = value;
  if (isRecord(value)) list = new Fields(value).get("entries", "items");
  if (!Array.isArray(list)) return null;

  const entries = list
    .filter(isRecord)
    .map((raw, index) => parseTopFiveEntry(raw, index))
    .filter((e): e is TopFiveEntry => e !== null)
    .sort((a, b) => a.rank - b.rank)
    .slice(0, 5);
  return entries.length > 0 ? { entries } : null;
}

function parseOpeningQuestions(value: unknown): QuestionAnswer[] {
  let list: unknown = value;
  if (isRecord(value)) list = new Fields(value).get("questions");
  if (!Array.isArray(list)) return [];

  return list.filter(isRecord).map((raw) => {
    const f = new Fields(raw);
    return {
      question: f.str("question") ?? "",
      speaker: f.str("speaker") ?? "Unknown",
      answer: f.str("answer") ?? "",
      timestamp: f.str("timestamp") ?? "0:00",
      entertainmentValue: clampScore(f.num("entertainmentValue", "score")),
    };
  });
}

type CategoryMatch =
  | { kind: "winner"; category: WinnerCategory }
  | { kind: "topFive"; category: TopFiveCategory };

const ALIAS_INDEX: ReadonlyMap<string, CategoryMatch> = (() => {
  const index = new Map<string, CategoryMatch>();
  for (const category of WINNER_CATEGORIES) {
    for (const alias of categoryAliases(category)) index.set(alias, { kind: "winner", category });
  }
  for (const category of TOP_FIVE_CATEGORIES) {
    for (const alias of categoryAliases(category)) index.set(alias, { kind: "topFive", category });
    // "funniest_sentences" inside top_5_lists, "Top5FunniestSentences" at the root
    index.set(normalizeCategoryName(`top5${category.nestedKey}`), { kind: "topFive", category });
    index.set(normalizeCategoryName(`top_5_${category.nestedKey}`), { kind: "topFive", category });
  }
  return index;
})();

const OPENING_QUESTION_KEYS = new Set(["openingquestions", "initialquestions", "questions"]);

function matchByKey(key: string): CategoryMatch | undefined {
  return ALIAS_INDEX.get(normalizeCategoryName(key));
}

/**
 * Match an entry by its own `category` / `title` / `name` field: exact alias
 * first, then the first alias the field contains.
 */
function matchByTitleField(raw: JsonRecord): CategoryMatch | undefined {
  const f = new Fields(raw);
  const label = f.str("category", "title", "name", "categoryName");
  if (!label) return undefined;

  const norm = normalizeCategoryName(label);
  const exact = ALIAS_INDEX.get(norm);
  if (exact) return exact;

  for (const [alias, match] of ALIAS_INDEX) {
    if (alias.length >= 6 && norm.includes(alias)) return match;
  }
  return undefined;
}

function emptyAnalysis(): ParsedAnalysis {
  return { winners: {}, topFives: {}, openingQuestions: [] };
}

function countFound(analysis: ParsedAnalysis): number {
  return Object.keys(analysis.winners).length + Object.keys(analysis.topFives).length;
}

function assign(analysis: ParsedAnalysis, match: CategoryMatch, value: unknown): void {
  if (match.kind === "winner") {
    if (analysis.winners[match.category.key] || !isRecord(value)) return;
    const winner = parseCategoryWinner(value);
    if (winner) analysis.winners[match.category.key] = winner;
    return;
  }
  if (analysis.topFives[match.category.key]) return;
  const list = parseTopFiveList(value);
  if (list) analysis.topFives[match.category.key] = list;
}

function sectionEntries(section: unknown): Array<[string, unknown]> {
  if (Array.isArray(section)) return section.map((value, index) => [String(index), value]);
  if (isRecord(section)) return Object.entries(section);
  return [];
}

/**
 * Sections (`comedy_categories`, `top_5_lists`, or any other object) holding
 * categories keyed by name or by number.
 */
export function parseNestedAnalysis(root: JsonRecord): ParsedAnalysis | null {
  const analysis = emptyAnalysis();

  for (const [sectionKey, section] of Object.entries(root)) {
    if (OPENING_QUESTION_KEYS.has(normalizeCategoryName(sectionKey))) {
      analysis.openingQuestions = parseOpeningQuestions(section);
      continue;
    }
    // a category sitting at the root is the flat shape, not a section
    if (matchByKey(sectionKey)) continue;

    for (const [entryKey, value] of sectionEntries(section)) {
      if (OPENING_QUESTION_KEYS.has(normalizeCategoryName(entryKey))) {
        analysis.openingQuestions = parseOpeningQuestions(value);
        continue;
      }
      const match = matchByKey(entryKey) ?? (isRecord(value) ? matchByTitleField(value) : undefined);
      if (match) assign(analysis, match, value);
    }
  }

  return countFound(analysis) > 0 ? analysis : null;
}

/** Categories directly on the root: `BestJoke`, `Top5FunniestSentences`, `best_joke`, … */
export function parseFlatAnalysis(root: JsonRecord): ParsedAnalysis | null {
  const analysis = emptyAnalysis();

  for (const [key, value] of Object.entries(root)) {
    if (OPENING_QUESTION_KEYS.has(normalizeCategoryName(key))) {
      analysis.openingQuestions = parseOpeningQuestions(value);
      continue;
    }
    const match = matchByKey(key);
    if (match) {
      assign(analysis, match, value);
    } else {
      analysisLog.debug(`Unrecognized category in response: ${key}`);
    }
  }

  return countFound(analysis) > 0 ? analysis : null;
}

export function parseAnalysisResponse(raw: string): ParseResult {
  if (!raw.trim()) return { kind: "failed", reason: "empty response" };

  let parsed: Record<string, unknown>;
  try {
    parsed = parseJsonObjectFromLlm(raw);
  } catch (err) {
    return { kind: "failed", reason: err instanceof Error ? err.message : String(err) };
  }

  const nested = parseNestedAnalysis(parsed);
  if (nested) return { kind: "nested", analysis: nested };

  const flat = parseFlatAnalysis(parsed);
  if (flat) return { kind: "flat", analysis: flat };

  return { kind: "failed", reason: "no recognizable categories in response" };
}
