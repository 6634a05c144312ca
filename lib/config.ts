/**
 * Configuration du run : variables d'environnement, surchargées par les flags CLI.
 *
 * Env : RIOT_API_KEY, RIOT_ID ("Name#Tag"), RIOT_PLATFORM, SCRAPE_ENABLED,
 * SCRAPE_DELAY_MS, SCRAPE_USER_AGENT, MATCH_SAMPLES, FALLBACK_SAMPLES,
 * RATE_LIMIT_BASE_DELAY_MS, LOG_LEVEL, LOG_FORMAT
 */

import { ConfigError } from "./errors";
import { isLogLevel, type LogFormat, type LogLevel } from "./logger";
import { isRiotPlatform, type RiotPlatform } from "./platform-config";

export const DEFAULT_SCRAPE_USER_AGENT = "lobby-contest/0.1 (personal lobby scouting)";

export interface RiotId {
  gameName: string;
  tagLine: string;
}

export interface AppConfig {
  apiKey: string;
  riotId: RiotId;
  /** Plateforme supposée (évite de sonder toutes les plateformes) */
  platformGuess?: RiotPlatform;
  scrape: {
    enabled: boolean;
    /** Intervalle minimum entre 2 requêtes tactics.tools */
    delayMs: number;
    userAgent: string;
  };
  /** Nombre de matchs lus quand le scraping est désactivé */
  matchSamples: number;
  /** Nombre de matchs lus en fallback après un scraping vide */
  fallbackSamples: number;
  rateLimitBaseDelayMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

export interface ConfigOverrides {
  apiKey?: string;
  riotId?: string;
  platform?: string;
  scrapeEnabled?: boolean;
  matchSamples?: number;
  fallbackSamples?: number;
}

type Env = Record<string, string | undefined>;

function parseIntSetting(value: string | number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || value === "") return fallback;
  const n = typeof value === "number" ? value : parseInt(value, 10);
  if (!Number.isFinite(n) || n < min || n > max) return fallback;
  return Math.floor(n);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (!value?.trim()) return fallback;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  return fallback;
}

/** Retire espaces et guillemets collés par erreur autour de la clé */
function cleanApiKey(value: string | undefined): string {
  return (value ?? "").trim().replace(/^["']|["']$/g, "");
}

export function parseRiotId(value: string): RiotId {
  const idx = value.indexOf("#");
  if (idx < 0) throw new ConfigError(`Riot ID must look like "Name#Tag" (got "${value}")`);
  const gameName = value.slice(0, idx).trim();
  const tagLine = value.slice(idx + 1).trim();
  if (!gameName || !tagLine) throw new ConfigError(`Riot ID must look like "Name#Tag" (got "${value}")`);
  return { gameName, tagLine };
}

export function maskApiKey(key: string): string {
  return key.length < 12 ? key : `${key.slice(0, 8)}...${key.slice(-4)}`;
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const apiKey = cleanApiKey(overrides.apiKey ?? env.RIOT_API_KEY);
  if (!apiKey.startsWith("RGAPI-")) {
    throw new ConfigError("Set RIOT_API_KEY (or --api-key) to a key starting with RGAPI-");
  }

  const rawRiotId = overrides.riotId ?? env.RIOT_ID;
  if (!rawRiotId?.trim()) throw new ConfigError("Set RIOT_ID (or --riot-id) to your \"Name#Tag\"");
  const riotId = parseRiotId(rawRiotId);

  const rawPlatform = (overrides.platform ?? env.RIOT_PLATFORM ?? "").trim().toLowerCase();
  if (rawPlatform && !isRiotPlatform(rawPlatform)) {
    throw new ConfigError(`Unknown platform "${rawPlatform}"`);
  }
  const platformGuess = rawPlatform && isRiotPlatform(rawPlatform) ? rawPlatform : undefined;

  const logLevel = env.LOG_LEVEL?.toLowerCase();

  return {
    apiKey,
    riotId,
    platformGuess,
    scrape: {
      enabled: overrides.scrapeEnabled ?? parseFlag(env.SCRAPE_ENABLED, true),
      delayMs: parseIntSetting(env.SCRAPE_DELAY_MS, 1000, 0, 60_000),
      userAgent: env.SCRAPE_USER_AGENT?.trim() || DEFAULT_SCRAPE_USER_AGENT,
    },
    matchSamples: parseIntSetting(overrides.matchSamples ?? env.MATCH_SAMPLES, 12, 1, 100),
    fallbackSamples: parseIntSetting(overrides.fallbackSamples ?? env.FALLBACK_SAMPLES, 4, 1, 100),
    rateLimitBaseDelayMs: parseIntSetting(env.RATE_LIMIT_BASE_DELAY_MS, 1000, 0, 60_000),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    logFormat: env.LOG_FORMAT === "json" ? "json" : "pretty",
  };
}
