import fs from "node:fs";
import yaml from "yaml";
import { cfg } from "../config/env.js";
import { log } from "../utils/logger.js";
import type { CategoryResults } from "../analysis/types.js";

const speakersLog = log.withScope("speakers");

/** Lower-cased variant → canonical name. */
export type NameCorrections = ReadonlyMap<string, string>;

function normName(s: string): string {
  return s.trim().replace(/\s+/g, " ").toLowerCase();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Build the lookup from parsed YAML (`corrections: [{ canonical, variants }]`).
 * Hard fails on a malformed entry.
 */
export function buildNameCorrections(raw: unknown): NameCorrections {
  const table = new Map<string, string>();
  if (raw === null || raw === undefined) return table;
  if (!isRecord(raw)) {
    throw new Error("Name corrections must be a YAML mapping with a `corrections` list");
  }

  const entries = raw.corrections ?? [];
  if (!Array.isArray(entries)) {
    throw new Error("`corrections` must be a list");
  }

  entries.forEach((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.canonical !== "string" || !entry.canonical.trim()) {
      throw new Error(`Name correction #${index + 1} is missing \`canonical\``);
    }
    const canonical = entry.canonical.trim();
    const variants = Array.isArray(entry.variants) ? entry.variants : [];
    for (const variant of variants) {
      if (typeof variant !== "string" || !variant.trim()) continue;
      const key = normName(variant);
      const existing = table.get(key);
      if (existing && existing !== canonical) {
        speakersLog.warn(`Name variant "${variant}" maps to both ${existing} and ${canonical}; keeping ${existing}`);
        continue;
      }
      table.set(key, canonical);
    }
  });

  return table;
}

export function loadNameCorrections(filePath: string = cfg.analysis.nameCorrectionsPath): NameCorrections {
  if (!fs.existsSync(filePath)) {
    speakersLog.debug(`No name corrections file at ${filePath}`);
    return new Map();
  }
  return buildNameCorrections(yaml.parse(fs.readFileSync(filePath, "utf-8")));
}

export function correctName(name: string, corrections: NameCorrections): string {
  return corrections.get(normName(name)) ?? name;
}

/**
 * One pass over every speaker field in the results: winners, their
 * runners-up, and every top-five entry. Returns the number of fields changed.
 */
export function applyNameCorrections(results: CategoryResults, corrections: NameCorrections): number {
  if (corrections.size === 0) return 0;

  let changed = 0;
  const fix = (name: string): string => {
    const corrected = correctName(name, corrections);
    if (corrected !== name) changed++;
    return corrected;
  };

  for (const winner of Object.values(results.winners)) {
    if (!winner) continue;
    winner.speaker = fix(winner.speaker);
    for (const runnerUp of winner.runnersUp) {
      runnerUp.speaker = fix(runnerUp.speaker);
    }
  }

  for (const list of Object.values(results.topFives)) {
    if (!list) continue;
    for (const entry of list.entries) {
      entry.speaker = fix(entry.speaker);
    }
  }

  for (const answer of results.openingQuestions) {
    answer.speaker = fix(answer.speaker);
  }

  if (changed > 0) {
    speakersLog.info(`Applied ${changed} speaker name correction(s)`);
  }
  return changed;
}
