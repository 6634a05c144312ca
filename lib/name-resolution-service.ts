/**
 * Résolution des noms (gameName#tagLine) des joueurs du lobby
 * Pool borné à 6 requêtes simultanées ; un échec n'affecte que son joueur.
 */

import pLimit from "p-limit";
import type { PlayerIdentity, RiotName } from "@/types/tft";
import type { Logger } from "./logger";
import type { RiotRegion } from "./platform-config";
import type { RiotClient } from "./riot-client";

export const MAX_NAME_WORKERS = 6;

export type NameResolver = (puuid: string) => Promise<RiotName | null>;

/** Résolveur via account-v1 by-puuid ; null si nom incomplet ou compte absent */
export function createAccountNameResolver(client: RiotClient, region: RiotRegion): NameResolver {
  return async (puuid) => {
    const res = await client.getAccountByPuuid(region, puuid);
    if (res.kind !== "ok") return null;
    const gameName = res.data.gameName?.trim() ?? "";
    const tagLine = res.data.tagLine?.trim() ?? "";
    return gameName && tagLine ? { gameName, tagLine } : null;
  };
}

export async function resolveDisplayNames(
  puuids: readonly string[],
  resolve: NameResolver,
  logger: Logger
): Promise<Map<string, RiotName>> {
  const names = new Map<string, RiotName>();
  const unique = [...new Set(puuids)];
  if (unique.length === 0) return names;

  const limit = pLimit(Math.min(MAX_NAME_WORKERS, unique.length));
  await Promise.all(
    unique.map((puuid) =>
      limit(async () => {
        try {
          const name = await resolve(puuid);
          if (name) names.set(puuid, name);
        } catch (err) {
          logger.debug("name lookup failed", { puuid: puuid.slice(0, 8), error: err });
        }
      })
    )
  );
  return names;
}

/** "Name#Tag", sinon le nom spectator, sinon le début du PUUID */
export function displayLabel(player: PlayerIdentity): string {
  if (player.name) return `${player.name.gameName}#${player.name.tagLine}`;
  return player.spectatorName?.trim() || player.puuid.slice(0, 8);
}
