/**
 * Parse `MM:SS`, `H:MM:SS`, `[MM:SS]` or a plain seconds value into seconds.
 * Returns null for anything else (placeholders like "[MM:SS format]", empty strings).
 */
export function parseTimecode(value: string | null | undefined): number | null {
  if (!value) return null;
  const cleaned = value.trim().replace(/^\[|\]$/g, "").trim();
  if (!cleaned) return null;

  if (/^\d+(\.\d+)?$/.test(cleaned)) {
    return Number(cleaned);
  }

  const parts = cleaned.split(":");
  if (parts.length < 2 || parts.length > 3) return null;
  if (!parts.every((p) => /^\d+(\.\d+)?$/.test(p))) return null;

  const nums = parts.map(Number);
  if (nums.length === 2) {
    const [minutes, seconds] = nums;
    return minutes * 60 + seconds;
  }
  const [hours, minutes, seconds] = nums;
  return hours * 3600 + minutes * 60 + seconds;
}

export function formatTimecode(totalSeconds: number): string {
  const safe = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;
  const mm = String(minutes).padStart(2, "0");
  const ss = String(seconds).padStart(2, "0");
  return hours > 0 ? `${hours}:${mm}:${ss}` : `${mm}:${ss}`;
}
