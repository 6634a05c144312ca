/**
 * Agrégation lobby : pression par trait à partir du core de tête de chaque joueur
 */

import type { ContentionEntry, ContentionRanking, ContentionTally, Prediction } from "@/types/tft";

export const CONTENTION_DISPLAY_LIMIT = 8;

/**
 * Pour chaque joueur avec au moins une prédiction, ajoute la probabilité
 * de son core de tête à chacun de ses traits. Joueurs sans donnée : absents.
 */
export function aggregateContention(
  predictionsByPlayer: ReadonlyMap<string, readonly Prediction[]>
): ContentionTally {
  const tally: ContentionTally = new Map();
  for (const predictions of predictionsByPlayer.values()) {
    const top = predictions[0];
    if (!top) continue;
    for (const trait of top.core) {
      tally.set(trait, (tally.get(trait) ?? 0) + top.probability);
    }
  }
  return tally;
}

/**
 * Plus disputés (décroissant) et moins disputés (croissant).
 * Avec peu de traits, les deux listes se recoupent.
 */
export function rankContention(tally: ContentionTally, limit = CONTENTION_DISPLAY_LIMIT): ContentionRanking {
  const sorted: ContentionEntry[] = [...tally.entries()]
    .map(([trait, score]) => ({ trait, score }))
    .sort((a, b) => b.score - a.score);
  return {
    mostContested: sorted.slice(0, limit),
    leastContested: limit > 0 ? sorted.slice(-limit).reverse() : [],
  };
}
