import type { TopFiveKey, WinnerCategoryKey } from "./types.js";

export type CategorySection =
  | "comedy_categories"
  | "opinion_categories"
  | "insight_categories"
  | "discussion_categories";

export type WinnerCategory = {
  key: WinnerCategoryKey;
  title: string;
  /** Key in the flat response shape. */
  flatKey: string;
  /** Key inside the nested sections. */
  nestedKey: string;
  section: CategorySection;
  description: string;
};

export type TopFiveCategory = {
  key: TopFiveKey;
  title: string;
  flatKey: string;
  nestedKey: string;
  description: string;
};

export const WINNER_CATEGORIES: readonly WinnerCategory[] = [
  {
    key: "mostOffensiveTake",
    title: "Most Offensive Take",
    flatKey: "MostOffensiveTake",
    nestedKey: "most_offensive_take",
    section: "comedy_categories",
    description: "The most outrageous or controversial statement that got a reaction",
  },
  {
    key: "hottestTake",
    title: "Hottest Take",
    flatKey: "HottestTake",
    nestedKey: "hottest_take",
    section: "opinion_categories",
    description: "The spiciest opinion about the movie that others pushed back on",
  },
  {
    key: "biggestArgumentStarter",
    title: "Biggest Argument Starter",
    flatKey: "BiggestArgumentStarter",
    nestedKey: "biggest_argument_starter",
    section: "discussion_categories",
    description: "The statement that kicked off the longest disagreement",
  },
  {
    key: "bestJoke",
    title: "Best Joke",
    flatKey: "BestJoke",
    nestedKey: "best_joke",
    section: "comedy_categories",
    description: "The line that got the biggest laugh",
  },
  {
    key: "bestRoast",
    title: "Best Roast",
    flatKey: "BestRoast",
    nestedKey: "best_roast",
    section: "comedy_categories",
    description: "The best burn aimed at another participant or the movie",
  },
  {
    key: "funniestRandomTangent",
    title: "Funniest Random Tangent",
    flatKey: "FunniestRandomTangent",
    nestedKey: "funniest_random_tangent",
    section: "comedy_categories",
    description: "An off-topic detour that turned out to be entertaining",
  },
  {
    key: "mostPassionateDefense",
    title: "Most Passionate Defense",
    flatKey: "MostPassionateDefense",
    nestedKey: "most_passionate_defense",
    section: "opinion_categories",
    description: "Someone standing up for a scene, character or choice with real conviction",
  },
  {
    key: "biggestUnanimousReaction",
    title: "Biggest Unanimous Reaction",
    flatKey: "BiggestUnanimousReaction",
    nestedKey: "biggest_unanimous_reaction",
    section: "discussion_categories",
    description: "A moment where everyone reacted the same way at once",
  },
  {
    key: "mostBoringStatement",
    title: "Most Boring Statement",
    flatKey: "MostBoringStatement",
    nestedKey: "most_boring_statement",
    section: "discussion_categories",
    description: "The memorably dull remark that landed with silence",
  },
  {
    key: "bestPlotTwistRevelation",
    title: "Best Plot Twist Revelation",
    flatKey: "BestPlotTwistRevelation",
    nestedKey: "best_plot_twist",
    section: "insight_categories",
    description: "An insight about the movie that changed how the group saw it",
  },
  {
    key: "movieSnobMoment",
    title: "Movie Snob Moment",
    flatKey: "MovieSnobMoment",
    nestedKey: "movie_snob_moment",
    section: "insight_categories",
    description: "Peak film-snob behaviour",
  },
  {
    key: "guiltyPleasureAdmission",
    title: "Guilty Pleasure Admission",
    flatKey: "GuiltyPleasureAdmission",
    nestedKey: "guilty_pleasure_admission",
    section: "opinion_categories",
    description: "Someone confessing they enjoyed something they probably should not have",
  },
  {
    key: "quietestPersonBestMoment",
    title: "Quietest Person's Best Moment",
    flatKey: "QuietestPersonBestMoment",
    nestedKey: "quietest_person_best_moment",
    section: "discussion_categories",
    description: "The standout contribution from whoever spoke least",
  },
];

export const TOP_FIVE_CATEGORIES: readonly TopFiveCategory[] = [
  {
    key: "funniestSentences",
    title: "Top 5 Funniest Sentences",
    flatKey: "Top5FunniestSentences",
    nestedKey: "funniest_sentences",
    description: "The five funniest individual sentences, ranked",
  },
  {
    key: "mostBlandComments",
    title: "Top 5 Most Bland Comments",
    flatKey: "Top5MostBlandComments",
    nestedKey: "most_bland_comments",
    description: "The five blandest comments, ranked",
  },
];

/** Lowercase and drop `_`, `-` and spaces: `Best_Joke`, `best-joke`, `BestJoke` → `bestjoke`. */
export function normalizeCategoryName(value: string): string {
  return value.toLowerCase().replace(/[_\-\s']/g, "");
}

/** Every spelling a category is accepted under, normalized. */
export function categoryAliases(category: { key: string; title: string; flatKey: string; nestedKey: string }): string[] {
  return [...new Set([category.key, category.title, category.flatKey, category.nestedKey].map(normalizeCategoryName))];
}
