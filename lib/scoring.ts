/**
 * Scoring des cores d'un joueur
 * Poids d'une partie = 0.85^récence × (1.3 si top 4), normalisé sur tous les cores vus
 */

import type { Core, EvidenceRecord, Prediction, WeightedCore } from "@/types/tft";
import { coreKey, selectCore } from "./core-selection";

export const RECENCY_DECAY = 0.85;
export const TOP_FOUR_BONUS = 1.3;
export const TOP_FOUR_CUTOFF = 4;
export const MAX_PREDICTIONS = 5;

export function recencyWeight(recencyIndex: number): number {
  return RECENCY_DECAY ** recencyIndex;
}

export function placementBonus(placement: number): number {
  return placement <= TOP_FOUR_CUTOFF ? TOP_FOUR_BONUS : 1.0;
}

export function recordWeight(record: EvidenceRecord): number {
  return recencyWeight(record.recencyIndex) * placementBonus(record.placement);
}

/** Parties sans core exploitable écartées */
export function weighRecords(records: readonly EvidenceRecord[]): WeightedCore[] {
  const weighted: WeightedCore[] = [];
  for (const record of records) {
    const core = selectCore(record.traits);
    if (core.length === 0) continue;
    weighted.push({ core, weight: recordWeight(record) });
  }
  return weighted;
}

/**
 * Cumule les poids par core, normalise par le total de TOUS les cores,
 * renvoie les `limit` premiers (égalités : ordre de première apparition).
 */
export function rankCores(weighted: readonly WeightedCore[], limit = MAX_PREDICTIONS): Prediction[] {
  const tally = new Map<string, { core: Core; weight: number }>();
  for (const { core, weight } of weighted) {
    if (core.length === 0 || !Number.isFinite(weight) || weight < 0) continue;
    const key = coreKey(core);
    const entry = tally.get(key);
    if (entry) entry.weight += weight;
    else tally.set(key, { core, weight });
  }
  if (tally.size === 0) return [];

  const entries = [...tally.values()];
  const sum = entries.reduce((acc, e) => acc + e.weight, 0);
  const total = sum > 0 ? sum : 1;

  return entries
    .sort((a, b) => b.weight - a.weight)
    .slice(0, limit)
    .map((e) => ({ core: e.core, probability: e.weight / total }));
}

export function scoreRecords(records: readonly EvidenceRecord[]): Prediction[] {
  return rankCores(weighRecords(records));
}
