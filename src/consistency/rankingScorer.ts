import { composeActivityText, toCellText } from './normalize';
import { ObjectiveCatalogEntry, RankingScore, DiscreteScore, TextRecord } from './schema';
import { buildVectorSpace, cosineSimilarity } from './vectorSpace';

const RATIO_EPSILON = 1e-6;

/**
 * Maps the chosen objective's similarity, the best similarity and the chosen
 * objective's rank onto the discrete consistency scale. Rules are evaluated
 * top to bottom; the thresholds are calibrated values and must not drift.
 */
export const mapSimilarityToScore = (
  simSelected: number,
  simBest: number,
  rankSelected: number,
): DiscreteScore => {
  // Vague text: nothing in the catalog is similar enough to judge.
  if (simBest < 0.1) {
    return 30;
  }

  const ratio = simSelected / (simBest + RATIO_EPSILON);

  if (rankSelected === 1) {
    if (simSelected >= 0.4 && ratio >= 0.95) {
      return 100;
    }
    if (simSelected >= 0.3 && ratio >= 0.9) {
      return 90;
    }
    if (simSelected >= 0.2 && ratio >= 0.8) {
      return 70;
    }
    return 50;
  }

  if ((rankSelected === 2 || rankSelected === 3) && ratio >= 0.7) {
    return 30;
  }

  if (ratio >= 0.4) {
    return 10;
  }

  return 0;
};

/** Deduplicates by objective id; the first occurrence wins. */
export const buildCatalog = (records: TextRecord[]): ObjectiveCatalogEntry[] => {
  const seen = new Set<string>();
  const catalog: ObjectiveCatalogEntry[] = [];

  records.forEach((record) => {
    const objectiveId = record.objectiveId;
    if (objectiveId === undefined || objectiveId === '' || seen.has(objectiveId)) {
      return;
    }
    seen.add(objectiveId);
    catalog.push({ objectiveId, objectiveText: toCellText(record.objectiveText) });
  });

  return catalog;
};

const dedupeCatalog = (catalog: ObjectiveCatalogEntry[]): ObjectiveCatalogEntry[] => {
  const seen = new Set<string>();
  return catalog.filter((entry) => {
    if (seen.has(entry.objectiveId)) {
      return false;
    }
    seen.add(entry.objectiveId);
    return true;
  });
};

const missingObjective = (): RankingScore => ({
  consistencyScore: 0,
  bestMatchingObjectiveId: null,
  similarityToChosen: 0,
  similarityToBest: 0,
  rankOfChosen: null,
  issue: 'objective_not_in_catalog',
});

/**
 * 1-based position of `selected` when similarities are sorted descending with
 * ties kept in catalog order.
 */
const rankOf = (similarities: number[], selected: number): number => {
  const target = similarities[selected] ?? 0;
  let rank = 1;

  similarities.forEach((similarity, index) => {
    if (similarity > target || (similarity === target && index < selected)) {
      rank += 1;
    }
  });

  return rank;
};

const indexOfBest = (similarities: number[]): number => {
  let best = 0;
  similarities.forEach((similarity, index) => {
    if (similarity > (similarities[best] ?? 0)) {
      best = index;
    }
  });
  return best;
};

export const scoreBySimilarityRanking = (
  records: TextRecord[],
  catalog: ObjectiveCatalogEntry[],
): RankingScore[] => {
  if (!records.length) {
    return [];
  }

  const entries = dedupeCatalog(catalog);
  const positionById = new Map(entries.map((entry, index) => [entry.objectiveId, index]));

  const { objectiveVectors, activityVectors } = buildVectorSpace(
    entries.map((entry) => toCellText(entry.objectiveText)),
    records.map((record) => composeActivityText(record)),
  );

  return records.map((record, rowIndex) => {
    const selected = record.objectiveId === undefined ? undefined : positionById.get(record.objectiveId);
    const activityVector = activityVectors[rowIndex];

    if (selected === undefined || activityVector === undefined) {
      return missingObjective();
    }

    const similarities = objectiveVectors.map((objectiveVector) => cosineSimilarity(activityVector, objectiveVector));
    const best = indexOfBest(similarities);
    const simSelected = similarities[selected] ?? 0;
    const simBest = similarities[best] ?? 0;
    const rank = rankOf(similarities, selected);

    return {
      consistencyScore: mapSimilarityToScore(simSelected, simBest, rank),
      bestMatchingObjectiveId: entries[best]?.objectiveId ?? null,
      similarityToChosen: simSelected,
      similarityToBest: simBest,
      rankOfChosen: rank,
      issue: null,
    };
  });
};
