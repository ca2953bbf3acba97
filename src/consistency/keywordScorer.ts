import { assignCategory } from './categories';
import { toCellText } from './normalize';
import { ConsistencyLevel, KeywordScore, ThematicCategory } from './schema';

export type KeywordScorerOptions = {
  categories: ThematicCategory[];
  actionVerbs: string[];
};

const SEMANTIC_WEIGHT = 0.4;
const THEMATIC_WEIGHT = 0.4;
const OPERATIONAL_WEIGHT = 0.2;

const MIN_OBJECTIVE_WORD_LENGTH = 4;

const toOneDecimal = (value: number): number => Math.round(value * 10) / 10;

/** 1 for two or more keyword hits, 0.5 for one, 0 otherwise. */
export const scoreKeywordMatches = (activity: string, keywords: readonly string[]): number => {
  const text = activity.toLowerCase();
  const matches = keywords.filter((keyword) => text.includes(keyword)).length;

  if (matches >= 2) {
    return 1;
  }
  if (matches === 1) {
    return 0.5;
  }
  return 0;
};

export const extractObjectiveKeywords = (objectiveText: string): string[] =>
  objectiveText
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => Array.from(word).length >= MIN_OBJECTIVE_WORD_LENGTH);

export const scoreOperational = (activity: string, actionVerbs: readonly string[]): number => {
  const text = activity.toLowerCase();

  if (actionVerbs.some((verb) => text.includes(verb))) {
    return 1;
  }
  if (text.trim().length > 3) {
    return 0.5;
  }
  return 0;
};

export const toConsistencyLevel = (score: number): ConsistencyLevel => {
  if (score < 31) {
    return 'Low';
  }
  if (score < 71) {
    return 'Medium';
  }
  return 'High';
};

export const scoreByKeywordGroups = (
  objectiveText: unknown,
  activityText: unknown,
  { categories, actionVerbs }: KeywordScorerOptions,
): KeywordScore => {
  const objective = toCellText(objectiveText).toLowerCase();
  const activity = toCellText(activityText).toLowerCase();

  const category = assignCategory(objective, categories);
  const categoryKeywords = categories.find((entry) => entry.name === category)?.keywords ?? [];

  const semantic = scoreKeywordMatches(activity, extractObjectiveKeywords(objective));
  const thematic = scoreKeywordMatches(activity, categoryKeywords);
  const operational = scoreOperational(activity, actionVerbs);

  const consistencyScore = activity.trim()
    ? toOneDecimal((semantic * SEMANTIC_WEIGHT + thematic * THEMATIC_WEIGHT + operational * OPERATIONAL_WEIGHT) * 100)
    : 0;

  return {
    consistencyScore,
    level: toConsistencyLevel(consistencyScore),
    category,
    semantic,
    thematic,
    operational,
  };
};
