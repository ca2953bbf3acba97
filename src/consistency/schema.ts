export interface TextRecord {
  id: string;
  objectiveId?: string;
  objectiveText: string;
  activityText: string;
  detailText?: string;
  year?: string;
}

export interface ObjectiveCatalogEntry {
  objectiveId: string;
  objectiveText: string;
}

export interface ThematicCategory {
  name: string;
  keywords: string[];
}

export type DiscreteScore = 0 | 10 | 30 | 50 | 70 | 90 | 100;

export const DISCRETE_SCORES: readonly DiscreteScore[] = [0, 10, 30, 50, 70, 90, 100];

export type RowIssue = 'objective_not_in_catalog';

export interface RankingScore {
  consistencyScore: DiscreteScore;
  bestMatchingObjectiveId: string | null;
  similarityToChosen: number;
  similarityToBest: number;
  /** 1 = best match; null when the chosen objective is missing from the catalog. */
  rankOfChosen: number | null;
  issue: RowIssue | null;
}

export type ConsistencyLevel = 'Low' | 'Medium' | 'High';

export interface KeywordScore {
  /** 0–100 with one decimal. */
  consistencyScore: number;
  level: ConsistencyLevel;
  category: string;
  semantic: number;
  thematic: number;
  operational: number;
}

export type StrategyKind = 'similarity-ranking' | 'keyword-groups';

export type ScoringStrategy =
  | {
      kind: 'similarity-ranking';
      catalog?: ObjectiveCatalogEntry[];
    }
  | {
      kind: 'keyword-groups';
      categories: ThematicCategory[];
      actionVerbs: string[];
    };

export type ScoreResult =
  | ({ strategy: 'similarity-ranking' } & RankingScore)
  | ({ strategy: 'keyword-groups' } & KeywordScore);

export type ScoredRecord = TextRecord & {
  result: ScoreResult;
};
