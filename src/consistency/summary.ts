import { DiscreteScore, ScoredRecord } from './schema';

export type YearSummary = {
  year: string;
  count: number;
  average: number;
};

export type ScoreSummary = {
  total: number;
  average: number;
  distribution: Record<`${DiscreteScore}`, number>;
  byYear: YearSummary[];
  flagged: number;
};

const toOneDecimal = (value: number): number => Math.round(value * 10) / 10;

const average = (values: number[]): number =>
  values.length ? toOneDecimal(values.reduce((sum, value) => sum + value, 0) / values.length) : 0;

/** Buckets a 0–100 percentage onto the seven-level reporting scale. */
export const toDiscreteLevel = (percent: number): DiscreteScore => {
  if (!Number.isFinite(percent) || percent < 5) {
    return 0;
  }
  if (percent < 20) {
    return 10;
  }
  if (percent < 40) {
    return 30;
  }
  if (percent < 60) {
    return 50;
  }
  if (percent < 80) {
    return 70;
  }
  if (percent < 95) {
    return 90;
  }
  return 100;
};

const emptyDistribution = (): Record<`${DiscreteScore}`, number> => ({
  '0': 0,
  '10': 0,
  '30': 0,
  '50': 0,
  '70': 0,
  '90': 0,
  '100': 0,
});

export const summarizeScores = (records: ScoredRecord[]): ScoreSummary => {
  const distribution = emptyDistribution();
  const scoresByYear = new Map<string, number[]>();
  const scores: number[] = [];
  let flagged = 0;

  records.forEach((record) => {
    const { result } = record;

    // Catalog errors are not scores; they only count towards `flagged`.
    if (result.strategy === 'similarity-ranking' && result.issue !== null) {
      flagged += 1;
      return;
    }

    const score = result.consistencyScore;
    scores.push(score);

    const level = result.strategy === 'similarity-ranking' ? result.consistencyScore : toDiscreteLevel(score);
    distribution[`${level}`] += 1;

    const year = record.year?.trim();
    if (year) {
      const bucket = scoresByYear.get(year) ?? [];
      bucket.push(score);
      scoresByYear.set(year, bucket);
    }
  });

  const byYear = Array.from(scoresByYear.entries())
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0))
    .map(([year, values]) => ({ year, count: values.length, average: average(values) }));

  return {
    total: records.length,
    average: average(scores),
    distribution,
    byYear,
    flagged,
  };
};
