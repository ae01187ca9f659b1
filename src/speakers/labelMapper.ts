import { classifyFileName } from "../audio/classifyFiles.js";
import type { MicAssignments } from "../sessions/types.js";

const PHONE_LABEL = "Phone Input";
const SOUND_PAD_LABEL = "Sound Effects";
const MAX_MASTER_SPEAKERS = 10;

// `Speaker 1:`, `speaker 1 :`, `[Speaker 1]:`, `(Speaker 1):`
const BRACKETED_LABEL = /([[(])\s*speaker\s+(\d+)\s*([\])])\s*:/gi;
const COLON_LABEL = /\bspeaker\s+(\d+)\s*:/gi;
// `Speaker 1 hello` at the start of a line, no colon
const LEADING_LABEL = /^([ \t]*)speaker[ \t]+(\d+)(?=[ \t])/gim;

function assignedName(micAssignments: MicAssignments, micNumber: number): string | undefined {
  const name = micAssignments[micNumber];
  return name && name.trim() ? name.trim() : undefined;
}

function replaceLabels(text: string, nameFor: (speakerNumber: number) => string | undefined): string {
  return text
    .replace(BRACKETED_LABEL, (match: string, _open: string, n: string) => {
      const name = nameFor(Number(n));
      return name ? `${name}:` : match;
    })
    .replace(COLON_LABEL, (match: string, n: string) => {
      const name = nameFor(Number(n));
      return name ? `${name}:` : match;
    })
    .replace(LEADING_LABEL, (match: string, indent: string, n: string) => {
      const name = nameFor(Number(n));
      return name ? `${indent}${name}:` : match;
    });
}

/**
 * Rewrite generic diarization labels (`Speaker 1:`) to participant names.
 *
 * - Personal mic files: every label is the mic owner, whatever number the
 *   service picked.
 * - PHONE / SOUND_PAD files: fixed labels.
 * - Everything else (the master): `Speaker N` → assignment for mic N; labels
 *   without an assignment stay as they are.
 *
 * Applying it twice gives the same text as applying it once.
 */
export function mapSpeakerLabels(text: string, micAssignments: MicAssignments, fileName: string): string {
  if (!text) return text;

  const cls = classifyFileName(fileName);

  if (cls.kind === "mic") {
    const owner = assignedName(micAssignments, cls.micNumber) ?? `Mic ${cls.micNumber}`;
    return replaceLabels(text, () => owner);
  }

  if (cls.kind === "auxiliary") {
    const label = cls.role === "phone" ? PHONE_LABEL : SOUND_PAD_LABEL;
    return replaceLabels(text, () => label);
  }

  return replaceLabels(text, (n) =>
    n >= 1 && n <= MAX_MASTER_SPEAKERS ? assignedName(micAssignments, n) : undefined,
  );
}
