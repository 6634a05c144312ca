/**
 * Prédiction des cores d'un joueur avec fallback entre sources
 *
 * tactics.tools d'abord ; résultat vide ou en échec → historique Riot (quelques matchs).
 * Aucune donnée = prédictions vides, jamais une erreur.
 */

import type {
  ExtractionResult,
  MatchEvidenceSource,
  PlayerIdentity,
  PlayerPrediction,
  ProfileEvidenceSource,
} from "@/types/tft";
import { describeError, toError } from "./errors";
import type { Logger } from "./logger";
import { displayLabel } from "./name-resolution-service";
import { rankCores, scoreRecords } from "./scoring";

export const DEFAULT_FALLBACK_SAMPLES = 4;

export interface PredictionServiceOptions {
  /** Absent = scraping désactivé, l'historique Riot est la seule source */
  profile?: ProfileEvidenceSource;
  matchHistory: MatchEvidenceSource;
  /** Nombre de matchs lus sur l'historique */
  matchSamples?: number;
  logger: Logger;
}

async function attempt<T>(run: () => Promise<ExtractionResult<T>>): Promise<ExtractionResult<T>> {
  try {
    return await run();
  } catch (err) {
    return { kind: "failure", error: toError(err) };
  }
}

function reasonOf<T>(result: ExtractionResult<T>): string {
  if (result.kind === "empty") return result.reason;
  if (result.kind === "failure") return describeError(result.error);
  return "no non-empty core";
}

export class PredictionService {
  constructor(private readonly options: PredictionServiceOptions) {}

  async predict(player: PlayerIdentity): Promise<PlayerPrediction> {
    const { profile, matchHistory, logger } = this.options;
    const log = logger.child({ player: displayLabel(player) });

    if (profile) {
      const scraped = await attempt(() => profile.extract(player));
      if (scraped.kind === "evidence") {
        const predictions = rankCores(scraped.items);
        if (predictions.length > 0) return { player, predictions, source: "tactics_tools" };
      }
      const level = scraped.kind === "failure" ? "warn" : "info";
      log[level]("no comps on tactics.tools, falling back to match history", { reason: reasonOf(scraped) });
    }

    const samples = this.options.matchSamples ?? DEFAULT_FALLBACK_SAMPLES;
    const history = await attempt(() => matchHistory.extract(player.puuid, samples));
    if (history.kind === "evidence") {
      const predictions = scoreRecords(history.items);
      if (predictions.length > 0) return { player, predictions, source: "match_history" };
    }

    log[history.kind === "failure" ? "warn" : "info"]("no usable evidence", { reason: reasonOf(history) });
    return { player, predictions: [], source: "none" };
  }
}
