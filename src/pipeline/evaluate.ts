import { scoreRecords } from '../consistency/orchestrator';
import { ObjectiveCatalogEntry, ScoredRecord, ScoringStrategy, StrategyKind } from '../consistency/schema';
import { summarizeScores } from '../consistency/summary';
import { EvalResult, EvaluationRow } from '../types';
import { getDefaultKeywordConfig, KeywordConfig } from './keywordConfig';
import { FieldMapping, RawRow, resolveRecords } from './resolveFields';

export type EvaluatePayload = {
  strategy: StrategyKind;
  rows: RawRow[];
  catalog?: ObjectiveCatalogEntry[];
  fieldMapping?: Partial<FieldMapping>;
  keywordConfig?: KeywordConfig;
};

// Keyword data is read here so the scoring core never touches the filesystem.
export const toStrategy = (payload: EvaluatePayload): ScoringStrategy => {
  if (payload.strategy === 'keyword-groups') {
    const { categories, actionVerbs } = payload.keywordConfig ?? getDefaultKeywordConfig();
    return { kind: 'keyword-groups', categories, actionVerbs };
  }
  return { kind: 'similarity-ranking', catalog: payload.catalog };
};

const toEvaluationRow = (record: ScoredRecord): EvaluationRow => {
  const base = {
    id: record.id,
    objective_id: record.objectiveId ?? null,
    objective_text: record.objectiveText,
    activity_text: record.activityText,
    detail_text: record.detailText ?? '',
    year: record.year ?? null,
  };
  const { result } = record;

  if (result.strategy === 'similarity-ranking') {
    return {
      ...base,
      strategy: result.strategy,
      consistency_score: result.consistencyScore,
      best_matching_objective_id: result.bestMatchingObjectiveId,
      similarity_to_chosen: result.similarityToChosen,
      similarity_to_best: result.similarityToBest,
      rank_of_chosen: result.rankOfChosen,
      issue: result.issue,
    };
  }

  return {
    ...base,
    strategy: result.strategy,
    consistency_score: result.consistencyScore,
    level: result.level,
    category: result.category,
    semantic: result.semantic,
    thematic: result.thematic,
    operational: result.operational,
  };
};

export const runEvaluation = (payload: EvaluatePayload): EvalResult => {
  const records = resolveRecords(payload.rows, payload.fieldMapping);
  const scored = scoreRecords(records, toStrategy(payload));
  const summary = summarizeScores(scored);

  if (summary.flagged > 0) {
    console.warn(`${summary.flagged} of ${summary.total} rows reference an objective missing from the catalog.`);
  }

  return {
    strategy: payload.strategy,
    rows: scored.map(toEvaluationRow),
    summary,
  };
};
