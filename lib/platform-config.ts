/**
 * Routage Riot : plateforme (na1, euw1...) → hôte régional (americas, europe, asia)
 * et slug de région tactics.tools.
 */

export const ALL_PLATFORMS = [
  "na1", "br1", "la1", "la2", "oc1", "euw1", "eun1", "tr1", "ru", "jp1", "kr",
  "ph2", "sg2", "th2", "tw2", "vn2",
] as const;

export type RiotPlatform = (typeof ALL_PLATFORMS)[number];
export type RiotRegion = "americas" | "europe" | "asia";

/** Ordre de recherche d'un compte (certains tags migrent d'une région à l'autre) */
export const ACCOUNT_REGIONS: readonly RiotRegion[] = ["americas", "europe", "asia"];

const PLATFORM_TO_REGION: Record<RiotPlatform, RiotRegion> = {
  na1: "americas",
  br1: "americas",
  la1: "americas",
  la2: "americas",
  oc1: "americas",
  euw1: "europe",
  eun1: "europe",
  tr1: "europe",
  ru: "europe",
  jp1: "asia",
  kr: "asia",
  ph2: "asia",
  sg2: "asia",
  th2: "asia",
  tw2: "asia",
  vn2: "asia",
};

const PLATFORM_TO_TACTICS_SLUG: Record<RiotPlatform, string> = {
  na1: "na",
  br1: "br",
  la1: "lan",
  la2: "las",
  oc1: "oce",
  euw1: "euw",
  eun1: "eune",
  tr1: "tr",
  ru: "ru",
  jp1: "jp",
  kr: "kr",
  ph2: "sea",
  sg2: "sea",
  th2: "sea",
  tw2: "tw",
  vn2: "vn",
};

const PLATFORMS = new Set<string>(ALL_PLATFORMS);

export function isRiotPlatform(value: string): value is RiotPlatform {
  return PLATFORMS.has(value);
}

export function getRegionForPlatform(platform: RiotPlatform): RiotRegion {
  return PLATFORM_TO_REGION[platform];
}

export function getTacticsToolsSlug(platform: RiotPlatform): string {
  return PLATFORM_TO_TACTICS_SLUG[platform];
}

export function riotPlatformUrl(platform: RiotPlatform, path: string): string {
  return `https://${platform}.api.riotgames.com${path}`;
}

export function riotRegionUrl(region: RiotRegion, path: string): string {
  return `https://${region}.api.riotgames.com${path}`;
}
