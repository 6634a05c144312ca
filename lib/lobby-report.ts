/**
 * Rendu console du rapport de lobby
 */

import type { ContentionEntry, ContentionRanking, Core, PlayerPrediction, Prediction } from "@/types/tft";
import { displayLabel } from "./name-resolution-service";

export const PREDICTIONS_SHOWN = 3;

export interface LobbyReport {
  players: PlayerPrediction[];
  ranking: ContentionRanking;
}

/** "TFT13_Ambusher" → "Ambusher", "Set9_Void" → "Void" */
export function formatTraitName(name: string): string {
  return name.replace(/^(?:TFT|Set)\d+[a-z]?_/i, "");
}

export function formatCore(core: Core): string {
  return core.map(formatTraitName).join(" + ");
}

export function formatPercent(probability: number): string {
  return `${(probability * 100).toFixed(0)}%`;
}

export function formatPredictions(predictions: readonly Prediction[], limit = PREDICTIONS_SHOWN): string {
  return predictions
    .slice(0, limit)
    .map((p) => `${formatCore(p.core)} (${formatPercent(p.probability)})`)
    .join(",  ");
}

export function formatPlayerLine(entry: PlayerPrediction): string {
  const body = entry.predictions.length > 0 ? formatPredictions(entry.predictions) : "(not enough data)";
  return `- ${displayLabel(entry.player)}: ${body}`;
}

function formatContentionLine(entry: ContentionEntry): string {
  return `  • ${formatTraitName(entry.trait)}: ${entry.score.toFixed(2)} players-likely`;
}

export function renderLobbyReport(report: LobbyReport): string[] {
  const lines = ["", "=== Likely cores per player (top 3) ===", ...report.players.map(formatPlayerLine)];

  lines.push("", "=== Trait contestedness ===");
  const { mostContested, leastContested } = report.ranking;
  if (mostContested.length === 0) {
    lines.push("(no signal)");
    return lines;
  }
  lines.push("Most contested:", ...mostContested.map(formatContentionLine));
  lines.push("Least contested:", ...leastContested.map(formatContentionLine));
  lines.push(
    "",
    "Tip: if your target core overlaps the top 2-3 traits above, pivot to adjacent traits with lower pressure."
  );
  return lines;
}

/** Sortie --json : mêmes données, sans mise en forme */
export function toJsonReport(report: LobbyReport): object {
  return {
    players: report.players.map((p) => ({
      puuid: p.player.puuid,
      label: displayLabel(p.player),
      source: p.source,
      predictions: p.predictions.slice(0, PREDICTIONS_SHOWN).map((pr) => ({
        core: [...pr.core],
        probability: pr.probability,
      })),
    })),
    mostContested: report.ranking.mostContested,
    leastContested: report.ranking.leastContested,
  };
}
