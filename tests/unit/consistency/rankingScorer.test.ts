import { describe, expect, it } from 'vitest';

import { buildCatalog, mapSimilarityToScore, scoreBySimilarityRanking } from '../../../src/consistency/rankingScorer';
import { DISCRETE_SCORES, ObjectiveCatalogEntry, TextRecord } from '../../../src/consistency/schema';

const CATALOG: ObjectiveCatalogEntry[] = [
  { objectiveId: 'O1', objectiveText: 'Fortalecer investigación científica' },
  { objectiveId: 'O2', objectiveText: 'Mejorar calidad docente' },
  { objectiveId: 'O3', objectiveText: 'Ampliar vinculación con la comunidad' },
];

const record = (id: string, objectiveId: string | undefined, activityText: string): TextRecord => ({
  id,
  objectiveId,
  objectiveText: '',
  activityText,
});

describe('mapSimilarityToScore', () => {
  it('does not penalize vague text below the informative threshold', () => {
    expect(mapSimilarityToScore(0.05, 0.09, 1)).toBe(30);
    expect(mapSimilarityToScore(0, 0.09, 7)).toBe(30);
  });

  it('grades the best match by strength', () => {
    expect(mapSimilarityToScore(0.9, 0.9, 1)).toBe(100);
    expect(mapSimilarityToScore(0.35, 0.35, 1)).toBe(90);
    expect(mapSimilarityToScore(0.25, 0.25, 1)).toBe(70);
    expect(mapSimilarityToScore(0.15, 0.15, 1)).toBe(50);
    expect(mapSimilarityToScore(0.1, 0.1, 1)).toBe(50);
  });

  it('applies the epsilon to the ratio', () => {
    // 0.45 / 0.500001 falls just short of 0.9
    expect(mapSimilarityToScore(0.45, 0.5, 1)).toBe(70);
  });

  it('gives partial credit to close runners-up', () => {
    expect(mapSimilarityToScore(0.4, 0.5, 2)).toBe(30);
    expect(mapSimilarityToScore(0.4, 0.5, 3)).toBe(30);
    expect(mapSimilarityToScore(0.4, 0.5, 4)).toBe(10);
    expect(mapSimilarityToScore(0.3, 0.5, 2)).toBe(10);
    expect(mapSimilarityToScore(0.1, 0.5, 5)).toBe(0);
  });

  it('only ever returns a level of the discrete scale', () => {
    const similarities = [0, 0.05, 0.1, 0.2, 0.3, 0.45, 0.6, 0.95];
    similarities.forEach((simSelected) => {
      similarities.forEach((simBest) => {
        [1, 2, 3, 4, 10].forEach((rank) => {
          expect(DISCRETE_SCORES).toContain(mapSimilarityToScore(simSelected, simBest, rank));
        });
      });
    });
  });
});

describe('buildCatalog', () => {
  it('keeps the first text per objective id and skips rows without one', () => {
    const records: TextRecord[] = [
      { id: '1', objectiveId: 'O1', objectiveText: 'a', activityText: '' },
      { id: '2', objectiveId: 'O1', objectiveText: 'b', activityText: '' },
      { id: '3', objectiveText: 'c', activityText: '' },
      { id: '4', objectiveId: 'O2', objectiveText: 'd', activityText: '' },
    ];

    expect(buildCatalog(records)).toEqual([
      { objectiveId: 'O1', objectiveText: 'a' },
      { objectiveId: 'O2', objectiveText: 'd' },
    ]);
  });
});

describe('scoreBySimilarityRanking', () => {
  it('scores an activity identical to its only objective at 100', () => {
    const catalog = [{ objectiveId: 'O1', objectiveText: 'Fortalecer la investigación científica' }];
    const [score] = scoreBySimilarityRanking(
      [record('1', 'O1', 'Fortalecer la investigación científica')],
      catalog,
    );

    expect(score?.consistencyScore).toBe(100);
    expect(score?.rankOfChosen).toBe(1);
    expect(score?.similarityToChosen).toBeCloseTo(1, 10);
    expect(score?.bestMatchingObjectiveId).toBe('O1');
    expect(score?.issue).toBeNull();
  });

  it('flags a chosen objective missing from the catalog instead of failing', () => {
    const [score] = scoreBySimilarityRanking([record('1', 'O9', 'Mejorar calidad docente')], CATALOG);

    expect(score).toEqual({
      consistencyScore: 0,
      bestMatchingObjectiveId: null,
      similarityToChosen: 0,
      similarityToBest: 0,
      rankOfChosen: null,
      issue: 'objective_not_in_catalog',
    });
  });

  it('treats rows without an objective id as missing from the catalog', () => {
    const [score] = scoreBySimilarityRanking([record('1', undefined, 'Mejorar calidad docente')], CATALOG);
    expect(score?.issue).toBe('objective_not_in_catalog');
  });

  it('returns 30 when nothing in the catalog resembles the activity', () => {
    const [score] = scoreBySimilarityRanking([record('1', 'O2', 'Reparación edilicia del techo')], CATALOG);

    expect(score?.consistencyScore).toBe(30);
    expect(score?.similarityToBest).toBe(0);
    // every objective ties at 0, so catalog order decides
    expect(score?.rankOfChosen).toBe(2);
    expect(score?.bestMatchingObjectiveId).toBe('O1');
  });

  it('ranks the chosen objective against the rest of the catalog', () => {
    const activity = 'Curso para mejorar calidad docente';
    const scores = scoreBySimilarityRanking(
      [record('1', 'O2', activity), record('2', 'O1', activity), record('3', 'O3', activity)],
      CATALOG,
    );

    expect(scores.map((score) => score.rankOfChosen)).toEqual([1, 2, 3]);
    expect(scores.map((score) => score.bestMatchingObjectiveId)).toEqual(['O2', 'O2', 'O2']);
    expect(scores.map((score) => score.consistencyScore)).toEqual([100, 0, 0]);
    expect(scores[1]?.similarityToChosen).toBe(0);
    expect(scores[0]?.similarityToBest).toBeGreaterThan(0.4);
  });

  it('uses the first catalog entry when ids repeat', () => {
    const catalog = [
      { objectiveId: 'O1', objectiveText: 'Mejorar calidad docente' },
      { objectiveId: 'O1', objectiveText: 'Texto distinto' },
    ];
    const [score] = scoreBySimilarityRanking([record('1', 'O1', 'Mejorar calidad docente')], catalog);

    expect(score?.consistencyScore).toBe(100);
  });

  it('returns an empty list for no rows and flags every row for an empty catalog', () => {
    expect(scoreBySimilarityRanking([], CATALOG)).toEqual([]);

    const scores = scoreBySimilarityRanking([record('1', 'O1', 'Taller')], []);
    expect(scores).toHaveLength(1);
    expect(scores[0]?.issue).toBe('objective_not_in_catalog');
  });

  it('is deterministic across runs', () => {
    const records = [record('1', 'O2', 'Curso docente'), record('2', 'O3', 'Jornada con la comunidad')];
    expect(scoreBySimilarityRanking(records, CATALOG)).toEqual(scoreBySimilarityRanking(records, CATALOG));
  });
});
