/**
 * Module Scraping - compos jouées par les joueurs du lobby
 *
 * Source : tactics.tools (best effort, fallback sur l'historique Riot)
 *
 * ATTENTION :
 * - robots.txt respecté (bloc "User-agent: *")
 * - 1 requête/seconde maximum par défaut (SCRAPE_DELAY_MS)
 * - Usage personnel recommandé
 */

export { fetchHtml } from "./base-scraper";
export type { ScrapeContext, HtmlResult } from "./base-scraper";
export { RobotsPolicy, parseRobotsDisallows, isPathAllowed } from "./robots-policy";
export type { RobotsPolicyOptions } from "./robots-policy";
export {
  TacticsToolsExtractor,
  TACTICS_TOOLS_ORIGIN,
  buildProfilePath,
  candidateWeight,
  extractNextData,
  findCompCandidates,
} from "./sources/tactics-tools";
export type { CompCandidate } from "./sources/tactics-tools";
