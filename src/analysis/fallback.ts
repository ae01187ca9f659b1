import { systemClock, type Clock } from "../utils/clock.js";
import type { CategoryResults } from "./types.js";

/**
 * Result recorded when no real analysis can be produced. Carries a note and
 * nothing else: no winners, no scores.
 */
export function degradedResults(reason: string, clock: Clock = systemClock): CategoryResults {
  return {
    winners: {},
    topFives: {},
    openingQuestions: [],
    source: "degraded",
    notes: [`analysis unavailable: ${reason}`],
    generatedAt: clock.now().toISOString(),
  };
}

export function isDegraded(results: CategoryResults | null): boolean {
  return results?.source === "degraded";
}
