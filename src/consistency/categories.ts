import { ThematicCategory } from './schema';

export const DEFAULT_CATEGORY = 'other';

/** First category whose keywords appear in the objective wins, in configured order. */
export const assignCategory = (objectiveText: string, categories: ThematicCategory[]): string => {
  const objective = objectiveText.toLowerCase();
  const match = categories.find((category) => category.keywords.some((keyword) => objective.includes(keyword)));
  return match?.name ?? DEFAULT_CATEGORY;
};
