import { DateTime } from "luxon";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(at: Date | string): Clock {
  const instant = typeof at === "string" ? new Date(at) : at;
  return { now: () => new Date(instant.getTime()) };
}

/** `yyyyMMdd_HHmmss` in UTC, used for audit file names. */
export function fileStamp(clock: Clock): string {
  return DateTime.fromJSDate(clock.now(), { zone: "utc" }).toFormat("yyyyMMdd_HHmmss");
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleep = (ms: number) => Promise<void>;
