/**
 * Schémas zod des payloads Riot (account-v1, summoner, spectator v5, tft match-v1)
 * Champs inconnus conservés (passthrough) : l'API ajoute des champs à chaque set.
 */

import { z } from "zod";

export const RiotAccountSchema = z
  .object({
    puuid: z.string(),
    gameName: z.string().optional(),
    tagLine: z.string().optional(),
  })
  .passthrough();

export const SummonerSchema = z
  .object({
    puuid: z.string().optional(),
    summonerLevel: z.number().optional(),
  })
  .passthrough();

export const PlatformStatusSchema = z.object({ id: z.string().optional() }).passthrough();

export const SpectatorParticipantSchema = z
  .object({
    puuid: z.string().optional(),
    riotId: z.string().optional(),
    summonerName: z.string().optional(),
  })
  .passthrough();

export const ActiveGameSchema = z
  .object({
    gameId: z.number().optional(),
    participants: z.array(SpectatorParticipantSchema).default([]),
  })
  .passthrough();

export const MatchIdsSchema = z.array(z.string());

export const MatchTraitSchema = z
  .object({
    name: z.string(),
    tier_current: z.number().default(0),
    num_units: z.number().default(0),
    style: z.number().optional(),
  })
  .passthrough();

export const MatchParticipantSchema = z
  .object({
    puuid: z.string(),
    placement: z.number().optional(),
    traits: z.array(MatchTraitSchema).default([]),
    augments: z.array(z.string()).optional(),
  })
  .passthrough();

export const MatchSchema = z
  .object({
    metadata: z.object({ match_id: z.string() }).passthrough().optional(),
    info: z
      .object({
        participants: z.array(MatchParticipantSchema).default([]),
      })
      .passthrough(),
  })
  .passthrough();

export type RiotAccount = z.infer<typeof RiotAccountSchema>;
export type Summoner = z.infer<typeof SummonerSchema>;
export type ActiveGame = z.infer<typeof ActiveGameSchema>;
export type RiotMatch = z.infer<typeof MatchSchema>;
