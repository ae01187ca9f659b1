export type AudioQuality = "Clear" | "Muffled" | "BackgroundNoise";

export const WINNER_CATEGORY_KEYS = [
  "mostOffensiveTake",
  "hottestTake",
  "biggestArgumentStarter",
  "bestJoke",
  "bestRoast",
  "funniestRandomTangent",
  "mostPassionateDefense",
  "biggestUnanimousReaction",
  "mostBoringStatement",
  "bestPlotTwistRevelation",
  "movieSnobMoment",
  "guiltyPleasureAdmission",
  "quietestPersonBestMoment",
] as const;

export type WinnerCategoryKey = (typeof WINNER_CATEGORY_KEYS)[number];

export const TOP_FIVE_KEYS = ["funniestSentences", "mostBlandComments"] as const;

export type TopFiveKey = (typeof TOP_FIVE_KEYS)[number];

export type RunnerUp = {
  speaker: string;
  timestamp: string;
  briefDescription: string;
  place: number;
};

export type CategoryWinner = {
  speaker: string;
  timestamp: string;
  quote: string;
  setup: string;
  groupReaction: string;
  whyItsGreat: string;
  audioQuality: AudioQuality;
  entertainmentScore: number;
  runnersUp: RunnerUp[];
  clipUrl?: string;
};

export type TopFiveEntry = {
  rank: number;
  speaker: string;
  timestamp: string;
  quote: string;
  context: string;
  audioQuality: AudioQuality;
  score: number;
  reasoning: string;
  estimatedStartEnd?: [number, number];
  sourceAudioFile?: string;
  clipUrl?: string;
};

export type TopFiveList = {
  entries: TopFiveEntry[];
};

export type QuestionAnswer = {
  question: string;
  speaker: string;
  answer: string;
  timestamp: string;
  entertainmentValue: number;
};

export type AnalysisSource = "nested" | "flat" | "degraded";

export type CategoryResults = {
  winners: Partial<Record<WinnerCategoryKey, CategoryWinner>>;
  topFives: Partial<Record<TopFiveKey, TopFiveList>>;
  openingQuestions: QuestionAnswer[];
  source: AnalysisSource;
  /** Set on degraded results; explains why no real analysis is present. */
  notes: string[];
  generatedAt: string;
};

export type ParsedAnalysis = Omit<CategoryResults, "source" | "generatedAt" | "notes">;

export type ParseResult =
  | { kind: "nested"; analysis: ParsedAnalysis }
  | { kind: "flat"; analysis: ParsedAnalysis }
  | { kind: "failed"; reason: string };

export type EnergyLevel = "Low" | "Medium" | "High";

export type SessionStats = {
  totalDuration: string;
  energyLevel: EnergyLevel;
  technicalQuality: string;
  highlightMoments: number;
  attendancePattern: string;
  bestMomentsSummary: string;
  wordCounts: Record<string, number>;
  questionCounts: Record<string, number>;
  laughterCounts: Record<string, number>;
  curseWordCounts: Record<string, number>;
  interruptionCounts: Record<string, number>;
  mostTalkativePerson?: string;
  quietestPerson?: string;
  mostInquisitivePerson?: string;
  biggestInterruptor?: string;
  mostProfanePerson?: string;
  totalWords: number;
  totalQuestions: number;
  totalLaughterMoments: number;
  totalCurseWords: number;
  totalInterruptions: number;
};

export type LlmCallInput = {
  systemPrompt: string;
  userPrompt: string;
  model: string;
};

export type LlmCall = (input: LlmCallInput) => Promise<string>;
