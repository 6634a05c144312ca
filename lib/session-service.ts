/**
 * Bootstrap de session : clé API → compte → plateforme → partie en cours
 *
 * Seule étape qui peut interrompre un run (AuthError, NotFoundError).
 */

import type { PlayerIdentity } from "@/types/tft";
import type { RiotId } from "./config";
import { AuthError, FetchFailureError, NotFoundError, type FetchFailure } from "./errors";
import { delay, type Sleep } from "./http-client";
import type { Logger } from "./logger";
import {
  ACCOUNT_REGIONS,
  ALL_PLATFORMS,
  getRegionForPlatform,
  getTacticsToolsSlug,
  type RiotPlatform,
  type RiotRegion,
} from "./platform-config";
import type { RiotClient } from "./riot-client";
import type { ActiveGame, RiotAccount } from "./riot-schemas";

/** Pause entre 2 sondes de plateforme après un 401/429 */
const PROBE_PAUSE_MS = 500;

export interface LobbySession {
  puuid: string;
  platform: RiotPlatform;
  region: RiotRegion;
  tacticsSlug: string;
  /** Ordre du spectator, sans doublon de PUUID */
  participants: PlayerIdentity[];
}

export type SessionLookup =
  | { kind: "in_game"; session: LobbySession }
  | { kind: "not_in_game"; puuid: string; platform: RiotPlatform };

function authError(step: string, failure: FetchFailure): AuthError {
  const hint = failure.status === 403 ? "key/app not authorized for TFT" : "key missing/expired";
  return new AuthError(`${failure.status ?? "auth"} on ${step}: ${hint}`, failure.status);
}

/** Participants du spectator → identités (sans PUUID : ignorés ; doublons : 1re occurrence) */
export function toPlayerIdentities(game: ActiveGame): PlayerIdentity[] {
  const seen = new Set<string>();
  const players: PlayerIdentity[] = [];
  for (const p of game.participants) {
    if (!p.puuid || seen.has(p.puuid)) continue;
    seen.add(p.puuid);
    players.push({ puuid: p.puuid, spectatorName: p.riotId?.trim() || p.summonerName?.trim() || undefined });
  }
  return players;
}

export class SessionService {
  constructor(
    private readonly client: RiotClient,
    private readonly logger: Logger,
    private readonly sleep: Sleep = delay
  ) {}

  /** Ping /tft/status pour remonter une clé invalide tout de suite */
  async verifyApiKey(platform: RiotPlatform): Promise<void> {
    const res = await this.client.getPlatformStatus(platform);
    if (res.kind === "failure") {
      if (res.failure.kind === "auth") throw authError("/tft/status", res.failure);
      this.logger.warn("status ping failed, continuing", { reason: res.failure.message });
    }
  }

  /** Essaie americas, europe puis asia (certains tags migrent bizarrement) */
  async resolveAccount(riotId: RiotId): Promise<{ account: RiotAccount; region: RiotRegion }> {
    for (const region of ACCOUNT_REGIONS) {
      const res = await this.client.getAccountByRiotId(region, riotId.gameName, riotId.tagLine);
      if (res.kind === "ok") return { account: res.data, region };
      if (res.kind === "not_found") continue;
      if (res.failure.kind === "auth") {
        if (res.failure.status === 403) continue;
        throw authError("account lookup", res.failure);
      }
      throw new FetchFailureError(res.failure);
    }
    throw new NotFoundError(`Account not found for ${riotId.gameName}#${riotId.tagLine}. Double-check spelling/case.`);
  }

  /** Plateforme supposée d'abord, puis toutes les autres */
  async resolvePlatform(puuid: string, guess?: RiotPlatform): Promise<RiotPlatform> {
    const candidates = guess ? [guess, ...ALL_PLATFORMS.filter((p) => p !== guess)] : [...ALL_PLATFORMS];
    for (const platform of candidates) {
      const res = await this.client.getSummonerByPuuid(platform, puuid);
      if (res.kind === "ok") return platform;
      if (res.kind === "failure" && (res.failure.status === 401 || res.failure.kind === "rate_limited")) {
        await this.sleep(PROBE_PAUSE_MS);
      }
    }
    throw new NotFoundError("Couldn't resolve platform via /tft/summoner");
  }

  async findActiveGame(platform: RiotPlatform, puuid: string): Promise<ActiveGame | null> {
    const res = await this.client.getActiveGame(platform, puuid);
    if (res.kind === "ok") return res.data;
    if (res.kind === "not_found") return null;
    if (res.failure.kind === "auth") throw authError("spectator", res.failure);
    throw new FetchFailureError(res.failure);
  }

  async bootstrap(riotId: RiotId, platformGuess?: RiotPlatform): Promise<SessionLookup> {
    await this.verifyApiKey(platformGuess ?? "na1");

    const { account } = await this.resolveAccount(riotId);
    this.logger.info("account resolved", { puuid: `${account.puuid.slice(0, 8)}…` });

    const platform = await this.resolvePlatform(account.puuid, platformGuess);
    const region = getRegionForPlatform(platform);
    const tacticsSlug = getTacticsToolsSlug(platform);
    this.logger.info("platform resolved", { platform, region, tacticsSlug });

    const game = await this.findActiveGame(platform, account.puuid);
    if (!game) return { kind: "not_in_game", puuid: account.puuid, platform };

    const participants = toPlayerIdentities(game);
    this.logger.info("live game found", { players: participants.length });
    return {
      kind: "in_game",
      session: { puuid: account.puuid, platform, region, tacticsSlug, participants },
    };
  }
}
