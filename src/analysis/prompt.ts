import type { MicAssignments } from "../sessions/types.js";
import { TOP_FIVE_CATEGORIES, WINNER_CATEGORIES } from "./categories.js";

export type AnalysisPromptInput = {
  title: string;
  sessionDate: string;
  micAssignments: MicAssignments;
  participantsPresent: string[];
  discussionQuestions: string[];
  transcript: string;
  truncated: boolean;
};

export type AnalysisPrompt = {
  systemPrompt: string;
  userPrompt: string;
};

const SYSTEM_PROMPT = `You are an entertainment analyst who finds the most memorable moments in recordings of a group discussing a movie.
You answer with a single JSON object and nothing else.`;

const WINNER_SHAPE = `{
    "Speaker": "[Name]",
    "Timestamp": "[MM:SS]",
    "Quote": "[Exact words]",
    "Setup": "[What led to it]",
    "GroupReaction": "[How the others reacted]",
    "WhyItsGreat": "[Why it is memorable]",
    "AudioQuality": "Clear | Muffled | BackgroundNoise",
    "EntertainmentScore": 1-10,
    "RunnersUp": [{ "Speaker": "[Name]", "Timestamp": "[MM:SS]", "BriefDescription": "[One line]", "Place": 2 }]
  }`;

const TOP_FIVE_SHAPE = `{
    "Entries": [
      {
        "Rank": 1,
        "Speaker": "[Name]",
        "Timestamp": "[MM:SS]",
        "Quote": "[Exact words]",
        "Context": "[Setup]",
        "AudioQuality": "Clear | Muffled | BackgroundNoise",
        "Score": 1-10,
        "Reasoning": "[Why it made the list]",
        "EstimatedStartEnd": [start_seconds, end_seconds]
      }
    ]
  }`;

/** `MIC1 = Alice, MIC2 = Bob` in mic order. */
export function rosterLine(micAssignments: MicAssignments): string {
  const entries = Object.entries(micAssignments)
    .map(([mic, name]) => ({ mic: Number(mic), name: name.trim() }))
    .filter((e) => Number.isInteger(e.mic) && e.name)
    .sort((a, b) => a.mic - b.mic);
  return entries.length > 0 ? entries.map((e) => `MIC${e.mic} = ${e.name}`).join(", ") : "No microphone assignments";
}

export function buildAnalysisPrompt(input: AnalysisPromptInput): AnalysisPrompt {
  const participants = input.participantsPresent.length > 0 ? input.participantsPresent.join(", ") : "Unknown participants";

  const questions =
    input.discussionQuestions.length > 0
      ? `The group was guided by these discussion questions:\n${input.discussionQuestions.map((q, i) => `${i + 1}. ${q}`).join("\n")}`
      : "This was a free-form discussion without structured questions.";

  const categoryList = WINNER_CATEGORIES.map((c) => `- ${c.flatKey}: ${c.description}`).join("\n");
  const topFiveList = TOP_FIVE_CATEGORIES.map((c) => `- ${c.flatKey}: ${c.description}`).join("\n");

  const shape = [
    ...WINNER_CATEGORIES.map((c) => `  "${c.flatKey}": ${WINNER_SHAPE}`),
    ...TOP_FIVE_CATEGORIES.map((c) => `  "${c.flatKey}": ${TOP_FIVE_SHAPE}`),
    `  "OpeningQuestions": {
    "Questions": [
      { "Question": "[Question]", "Speaker": "[Who answered]", "Answer": "[Their answer]", "Timestamp": "[MM:SS]", "EntertainmentValue": 1-10 }
    ]
  }`,
  ].join(",\n");

  const userPrompt = `Analyze the discussion of "${input.title}" from ${input.sessionDate}.

Participants present: ${participants}
Microphone assignments (use these to check who is speaking): ${rosterLine(input.micAssignments)}

${questions}

CATEGORIES (pick the single best moment for each):
${categoryList}

RANKED LISTS (exactly five entries each):
${topFiveList}

Respond with JSON in exactly this shape:
{
${shape}
}

RULES:
1. Use timestamps from the master recording only; clips are cut from that file.
2. Quote people exactly. Do not paraphrase inside "Quote".
3. Spread the winners across different people and different parts of the conversation.
4. Use participant names from the roster above, not "Speaker 1".
5. If a category has no fitting moment, leave it out rather than inventing one.
${input.truncated ? "\nNOTE: The middle of the transcript was cut for length; a marker shows where.\n" : ""}
TRANSCRIPT:
${input.transcript}`;

  return { systemPrompt: SYSTEM_PROMPT, userPrompt };
}
