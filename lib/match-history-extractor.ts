/**
 * Extracteur structuré - historique de matchs TFT (API Riot)
 * Bon marché en fallback : 1 appel ids + N appels match.
 */

import type { EvidenceRecord, ExtractionResult, MatchEvidenceSource, TraitObservation } from "@/types/tft";
import { FetchFailureError } from "./errors";
import type { Logger } from "./logger";
import type { RiotRegion } from "./platform-config";
import type { RiotClient } from "./riot-client";
import type { RiotMatch } from "./riot-schemas";

/** Classement retenu quand le match ne le donne pas (pas de bonus top 4) */
const UNKNOWN_PLACEMENT = 9;

/**
 * Observation du joueur dans un match ; null s'il n'y figure pas
 * ou s'il n'a aucun trait actif (palier > 0).
 */
export function toEvidenceRecord(match: RiotMatch, puuid: string, recencyIndex: number): EvidenceRecord | null {
  const me = match.info.participants.find((p) => p.puuid === puuid);
  if (!me) return null;
  const traits: TraitObservation[] = me.traits
    .filter((t) => t.tier_current > 0 && t.name)
    .map((t) => ({ name: t.name, tier: t.tier_current, units: t.num_units }));
  if (traits.length === 0) return null;
  return { traits, placement: me.placement ?? UNKNOWN_PLACEMENT, recencyIndex };
}

export class MatchHistoryExtractor implements MatchEvidenceSource {
  constructor(
    private readonly client: RiotClient,
    private readonly region: RiotRegion,
    private readonly logger: Logger
  ) {}

  async extract(puuid: string, maxSamples: number): Promise<ExtractionResult<EvidenceRecord>> {
    const ids = await this.client.getMatchIds(this.region, puuid, maxSamples);
    if (ids.kind === "not_found") return { kind: "empty", reason: "no match history" };
    if (ids.kind === "failure") return { kind: "failure", error: new FetchFailureError(ids.failure) };

    const records: EvidenceRecord[] = [];
    for (const [index, matchId] of ids.data.slice(0, maxSamples).entries()) {
      const match = await this.client.getMatch(this.region, matchId);
      if (match.kind !== "ok") {
        if (match.kind === "failure") {
          this.logger.debug("match skipped", { matchId, reason: match.failure.message });
        }
        continue;
      }
      const record = toEvidenceRecord(match.data, puuid, index);
      if (record) records.push(record);
    }

    if (records.length === 0) return { kind: "empty", reason: "no usable matches" };
    return { kind: "evidence", items: records };
  }
}
