/**
 * Client Riot API - comptes, spectator TFT, historique de matchs
 * https://developer.riotgames.com/apis
 *
 * Tous les appels passent par fetchWithBackoff (429 → retry, 404 → not_found).
 */

import type { z } from "zod";
import type { FetchFailure } from "./errors";
import { describeError } from "./errors";
import { fetchWithBackoff, type FetchLike, type Sleep } from "./http-client";
import {
  riotPlatformUrl,
  riotRegionUrl,
  type RiotPlatform,
  type RiotRegion,
} from "./platform-config";
import {
  ActiveGameSchema,
  MatchIdsSchema,
  MatchSchema,
  PlatformStatusSchema,
  RiotAccountSchema,
  SummonerSchema,
  type ActiveGame,
  type RiotAccount,
  type RiotMatch,
  type Summoner,
} from "./riot-schemas";

export type ApiResult<T> =
  | { kind: "ok"; data: T }
  | { kind: "not_found" }
  | { kind: "failure"; failure: FetchFailure };

export interface RiotClientOptions {
  /** Délai initial du backoff sur 429 */
  baseDelayMs?: number;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

/** Timeouts par famille d'appels (ms) */
const LOOKUP_TIMEOUT_MS = 8_000;
const MATCH_TIMEOUT_MS = 10_000;

export class RiotClient {
  constructor(
    private readonly apiKey: string,
    private readonly options: RiotClientOptions = {}
  ) {}

  private async request<S extends z.ZodTypeAny>(
    url: string,
    schema: S,
    opts: { timeoutMs: number; params?: Record<string, string | number> }
  ): Promise<ApiResult<z.output<S>>> {
    const outcome = await fetchWithBackoff(url, {
      headers: { "X-Riot-Token": this.apiKey, Accept: "application/json" },
      params: opts.params,
      timeoutMs: opts.timeoutMs,
      baseDelayMs: this.options.baseDelayMs,
      fetchImpl: this.options.fetchImpl,
      sleep: this.options.sleep,
    });
    if (outcome.kind === "not_found") return { kind: "not_found" };
    if (outcome.kind === "failure") return outcome;

    let json: unknown;
    try {
      json = JSON.parse(outcome.body);
    } catch (err) {
      return { kind: "failure", failure: { kind: "parse", url, message: describeError(err) } };
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return {
        kind: "failure",
        failure: { kind: "parse", url, message: issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid payload" },
      };
    }
    return { kind: "ok", data: parsed.data };
  }

  /** Ping bon marché pour détecter une clé invalide avant le reste */
  async getPlatformStatus(platform: RiotPlatform): Promise<ApiResult<unknown>> {
    return this.request(riotPlatformUrl(platform, "/tft/status/v1/platform-data"), PlatformStatusSchema, {
      timeoutMs: LOOKUP_TIMEOUT_MS,
    });
  }

  async getAccountByRiotId(region: RiotRegion, gameName: string, tagLine: string): Promise<ApiResult<RiotAccount>> {
    const path = `/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`;
    return this.request(riotRegionUrl(region, path), RiotAccountSchema, { timeoutMs: LOOKUP_TIMEOUT_MS });
  }

  async getAccountByPuuid(region: RiotRegion, puuid: string): Promise<ApiResult<RiotAccount>> {
    return this.request(
      riotRegionUrl(region, `/riot/account/v1/accounts/by-puuid/${encodeURIComponent(puuid)}`),
      RiotAccountSchema,
      { timeoutMs: LOOKUP_TIMEOUT_MS }
    );
  }

  async getSummonerByPuuid(platform: RiotPlatform, puuid: string): Promise<ApiResult<Summoner>> {
    return this.request(
      riotPlatformUrl(platform, `/tft/summoner/v1/summoners/by-puuid/${encodeURIComponent(puuid)}`),
      SummonerSchema,
      { timeoutMs: LOOKUP_TIMEOUT_MS }
    );
  }

  /** Partie TFT en cours (not_found = pas en partie ou lobby pas encore lancé) */
  async getActiveGame(platform: RiotPlatform, puuid: string): Promise<ApiResult<ActiveGame>> {
    return this.request(
      riotPlatformUrl(platform, `/lol/spectator/tft/v5/active-games/by-puuid/${encodeURIComponent(puuid)}`),
      ActiveGameSchema,
      { timeoutMs: LOOKUP_TIMEOUT_MS }
    );
  }

  /** Ids des derniers matchs, du plus récent au plus ancien */
  async getMatchIds(region: RiotRegion, puuid: string, count: number): Promise<ApiResult<string[]>> {
    return this.request(
      riotRegionUrl(region, `/tft/match/v1/matches/by-puuid/${encodeURIComponent(puuid)}/ids`),
      MatchIdsSchema,
      { timeoutMs: MATCH_TIMEOUT_MS, params: { count } }
    );
  }

  async getMatch(region: RiotRegion, matchId: string): Promise<ApiResult<RiotMatch>> {
    return this.request(
      riotRegionUrl(region, `/tft/match/v1/matches/${encodeURIComponent(matchId)}`),
      MatchSchema,
      { timeoutMs: MATCH_TIMEOUT_MS }
    );
  }
}

export function createRiotClient(apiKey: string, options?: RiotClientOptions): RiotClient {
  return new RiotClient(apiKey, options);
}
