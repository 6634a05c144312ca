/**
 * Pipeline complet d'un run : session → noms → prédictions (séquentielles) → agrégation
 */

import type { PlayerIdentity, PlayerPrediction, Prediction } from "@/types/tft";
import type { AppConfig } from "./config";
import type { FetchLike, Sleep } from "./http-client";
import { aggregateContention, rankContention } from "./lobby-aggregation";
import type { LobbyReport } from "./lobby-report";
import { createLogger, type Logger } from "./logger";
import { MatchHistoryExtractor } from "./match-history-extractor";
import { createAccountNameResolver, resolveDisplayNames } from "./name-resolution-service";
import { PredictionService } from "./prediction-service";
import { createRiotClient } from "./riot-client";
import { RobotsPolicy, TACTICS_TOOLS_ORIGIN, TacticsToolsExtractor } from "./scrapers";
import { SessionService, type LobbySession } from "./session-service";

export interface PipelineDeps {
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
  /** Appelé avant/après chaque joueur (affichage de progression) */
  onPlayerStart?: (player: PlayerIdentity, index: number, total: number) => void;
  onPlayerDone?: (result: PlayerPrediction, index: number, total: number) => void;
}

export type LobbyRunResult =
  | { kind: "not_in_game"; puuid: string }
  | { kind: "report"; session: LobbySession; report: LobbyReport };

export async function runLobbyPipeline(config: AppConfig, deps: PipelineDeps = {}): Promise<LobbyRunResult> {
  const logger = deps.logger ?? createLogger("lobby", { level: config.logLevel, format: config.logFormat });
  const client = createRiotClient(config.apiKey, {
    baseDelayMs: config.rateLimitBaseDelayMs,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
  });

  const sessions = new SessionService(client, logger.child({ step: "session" }), deps.sleep);
  const lookup = await sessions.bootstrap(config.riotId, config.platformGuess);
  if (lookup.kind === "not_in_game") return { kind: "not_in_game", puuid: lookup.puuid };
  const { session } = lookup;

  const names = await resolveDisplayNames(
    session.participants.map((p) => p.puuid),
    createAccountNameResolver(client, session.region),
    logger.child({ step: "names" })
  );
  const players = session.participants.map((p) => ({ ...p, name: names.get(p.puuid) }));

  const matchHistory = new MatchHistoryExtractor(client, session.region, logger.child({ source: "match-history" }));
  const profile = config.scrape.enabled
    ? new TacticsToolsExtractor(
        {
          policy: new RobotsPolicy({
            origin: TACTICS_TOOLS_ORIGIN,
            minIntervalMs: config.scrape.delayMs,
            userAgent: config.scrape.userAgent,
            logger: logger.child({ source: "robots" }),
            fetchImpl: deps.fetchImpl,
            sleep: deps.sleep,
            now: deps.now,
          }),
          userAgent: config.scrape.userAgent,
          logger: logger.child({ source: "tactics-tools" }),
          fetchImpl: deps.fetchImpl,
          sleep: deps.sleep,
        },
        session.tacticsSlug
      )
    : undefined;

  const predictor = new PredictionService({
    profile,
    matchHistory,
    matchSamples: config.scrape.enabled ? config.fallbackSamples : config.matchSamples,
    logger: logger.child({ step: "predict" }),
  });

  // Séquentiel : le pacing tactics.tools interdit de scraper en parallèle
  const results: PlayerPrediction[] = [];
  const byPlayer = new Map<string, Prediction[]>();
  for (const [index, player] of players.entries()) {
    deps.onPlayerStart?.(player, index, players.length);
    const result = await predictor.predict(player);
    results.push(result);
    byPlayer.set(player.puuid, result.predictions);
    deps.onPlayerDone?.(result, index, players.length);
  }

  const ranking = rankContention(aggregateContention(byPlayer));
  return { kind: "report", session, report: { players: results, ranking } };
}
