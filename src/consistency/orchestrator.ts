import { scoreByKeywordGroups } from './keywordScorer';
import { composeActivityText, toCellText } from './normalize';
import { buildCatalog, scoreBySimilarityRanking } from './rankingScorer';
import { ScoredRecord, ScoringStrategy, ScoreResult, TextRecord } from './schema';

// Missing optional text is scored as an empty string.
const withTextDefaults = (record: TextRecord): TextRecord => ({
  ...record,
  objectiveText: toCellText(record.objectiveText),
  activityText: toCellText(record.activityText),
  detailText: toCellText(record.detailText),
});

const scoreResults = (records: TextRecord[], strategy: ScoringStrategy): ScoreResult[] => {
  switch (strategy.kind) {
    case 'similarity-ranking': {
      const catalog = strategy.catalog ?? buildCatalog(records);
      return scoreBySimilarityRanking(records, catalog).map((score) => ({
        strategy: 'similarity-ranking',
        ...score,
      }));
    }
    case 'keyword-groups':
      return records.map((record) => ({
        strategy: 'keyword-groups',
        ...scoreByKeywordGroups(record.objectiveText, composeActivityText(record), strategy),
      }));
    default: {
      const exhaustive: never = strategy;
      throw new Error(`Unsupported scoring strategy: ${JSON.stringify(exhaustive)}`);
    }
  }
};

/**
 * Scores every record with one strategy and returns copies of the input
 * records, in order, each carrying its `result`.
 */
export const scoreRecords = (records: TextRecord[], strategy: ScoringStrategy): ScoredRecord[] => {
  const prepared = records.map(withTextDefaults);
  const results = scoreResults(prepared, strategy);

  return prepared.map((record, index) => {
    const result = results[index];
    if (!result) {
      throw new Error(`Scorer returned no result for row ${record.id}.`);
    }
    return { ...record, result };
  });
};
