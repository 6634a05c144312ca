/**
 * Scraper tactics.tools - compos jouées par un joueur
 * https://tactics.tools/player/<region>/<name>/<tag>
 *
 * La page Next.js embarque ses données dans <script id="__NEXT_DATA__">.
 * On y cherche, à n'importe quelle profondeur, les objets qui exposent une
 * liste "traits" (résumés de compo), puis on les pondère avec les stats dispo.
 */

import * as cheerio from "cheerio";
import { decodeHTML } from "entities";
import type { PlayerIdentity, ExtractionResult, TraitObservation, WeightedCore } from "@/types/tft";
import { FetchFailureError, ParseError, describeError } from "@/lib/errors";
import { selectCore } from "@/lib/core-selection";
import { fetchHtml, type ScrapeContext } from "../base-scraper";

export const TACTICS_TOOLS_ORIGIN = "https://tactics.tools";

/** Profondeur max de la recherche dans le JSON embarqué */
const MAX_SEARCH_DEPTH = 12;

/** Palier supposé pour un trait donné sans palier (garde l'ordre de la page) */
const ASSUMED_TIER = 2;

const SAMPLE_COUNT_KEYS = ["games", "matches", "count"] as const;
const PLAY_RATE_KEYS = ["playRate", "playrate", "rate", "pr"] as const;
const WIN_RATE_KEYS = ["winRate", "wr"] as const;

type SampleCountKey = (typeof SAMPLE_COUNT_KEYS)[number];
type PlayRateKey = (typeof PLAY_RATE_KEYS)[number];
type WinRateKey = (typeof WIN_RATE_KEYS)[number];

/** Résumé de compo trouvé dans la page : traits + stats optionnelles */
export type CompCandidate = {
  traits: TraitObservation[];
} & Partial<Record<SampleCountKey | PlayRateKey | WinRateKey, number>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberField(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" && v.trim() ? v.trim() : undefined;
}

function firstNumber(obj: Record<string, unknown>, keys: readonly string[]): number | undefined {
  for (const k of keys) {
    const v = numberField(obj, k);
    if (v !== undefined) return v;
  }
  return undefined;
}

/** Entrée de trait : "TFT13_Ambusher" ou { name|slug|key, tier?, numUnits? } */
function toTraitObservation(entry: unknown): TraitObservation | null {
  if (typeof entry === "string") {
    return entry.trim() ? { name: entry.trim(), tier: ASSUMED_TIER, units: 0 } : null;
  }
  if (!isRecord(entry)) return null;
  const name = stringField(entry, "name") ?? stringField(entry, "slug") ?? stringField(entry, "key");
  if (!name) return null;
  return {
    name,
    tier: firstNumber(entry, ["tier", "tier_current", "style"]) ?? ASSUMED_TIER,
    units: firstNumber(entry, ["numUnits", "num_units", "units"]) ?? 0,
  };
}

function toCompCandidate(obj: Record<string, unknown>, traits: unknown[]): CompCandidate {
  const candidate: CompCandidate = {
    traits: traits.map(toTraitObservation).filter((t): t is TraitObservation => t !== null),
  };
  for (const key of [...SAMPLE_COUNT_KEYS, ...PLAY_RATE_KEYS, ...WIN_RATE_KEYS]) {
    const v = numberField(obj, key);
    if (v !== undefined) candidate[key] = v;
  }
  return candidate;
}

/**
 * Parcours en profondeur borné : tout objet dont "traits" est un tableau est un candidat
 * (on continue aussi à descendre dans ses valeurs).
 */
export function findCompCandidates(root: unknown, maxDepth = MAX_SEARCH_DEPTH): CompCandidate[] {
  const found: CompCandidate[] = [];
  const visit = (node: unknown, depth: number): void => {
    if (depth > maxDepth) return;
    if (Array.isArray(node)) {
      for (const v of node) visit(v, depth + 1);
      return;
    }
    if (!isRecord(node)) return;
    const traits = node.traits;
    if (Array.isArray(traits)) found.push(toCompCandidate(node, traits));
    for (const v of Object.values(node)) visit(v, depth + 1);
  };
  visit(root, 0);
  return found;
}

/**
 * Poids heuristique d'un candidat :
 * max(1, games|matches|count, playRate×100), puis + winRate×10, plancher à 0.
 * À valider sur données réelles (voir DESIGN.md).
 */
export function candidateWeight(candidate: CompCandidate): number {
  let w = 1.0;
  for (const k of SAMPLE_COUNT_KEYS) {
    const v = candidate[k];
    if (v !== undefined) w = Math.max(w, v);
  }
  for (const k of PLAY_RATE_KEYS) {
    const v = candidate[k];
    if (v !== undefined) w = Math.max(w, v * 100);
  }
  for (const k of WIN_RATE_KEYS) {
    const v = candidate[k];
    if (v !== undefined) w += v * 10;
  }
  // un winRate négatif ne fait jamais passer le poids sous 0 (probabilités dans [0, 1])
  return Math.max(0, w);
}

/** JSON du bloc __NEXT_DATA__ (entités HTML décodées) ; ParseError si absent ou illisible */
export function extractNextData(html: string): unknown {
  const $ = cheerio.load(html);
  const raw = $("script#__NEXT_DATA__").first().text().trim();
  if (!raw) throw new ParseError("no __NEXT_DATA__ block");
  try {
    return JSON.parse(decodeHTML(raw));
  } catch (err) {
    throw new ParseError(`invalid __NEXT_DATA__ JSON: ${describeError(err)}`);
  }
}

/** props.pageProps, sinon pageProps, sinon le document entier */
function pagePropsRoot(data: unknown): unknown {
  if (!isRecord(data)) return data;
  const props = data.props;
  if (isRecord(props) && props.pageProps) return props.pageProps;
  return data.pageProps || data;
}

export function buildProfilePath(regionSlug: string, gameName: string, tagLine?: string): string {
  let path = `/player/${regionSlug}/${encodeURIComponent(gameName)}`;
  if (tagLine) path += `/${encodeURIComponent(tagLine)}`;
  return path;
}

export class TacticsToolsExtractor {
  constructor(
    private readonly ctx: ScrapeContext,
    private readonly regionSlug: string
  ) {}

  async extract(player: PlayerIdentity): Promise<ExtractionResult<WeightedCore>> {
    if (!player.name?.gameName) return { kind: "empty", reason: "no game name to look up" };

    const path = buildProfilePath(this.regionSlug, player.name.gameName, player.name.tagLine || undefined);
    const page = await fetchHtml(`${TACTICS_TOOLS_ORIGIN}${path}`, this.ctx);
    if (page.kind === "disallowed") return { kind: "empty", reason: "disallowed by robots.txt" };
    if (page.kind === "not_found") return { kind: "empty", reason: "profile not found" };
    if (page.kind === "failure") return { kind: "failure", error: new FetchFailureError(page.failure) };

    let data: unknown;
    try {
      data = extractNextData(page.html);
    } catch (err) {
      this.ctx.logger.debug("unusable profile page", { path, error: err });
      return { kind: "empty", reason: describeError(err) };
    }

    const candidates = findCompCandidates(pagePropsRoot(data));
    const weighted: WeightedCore[] = [];
    for (const candidate of candidates) {
      const core = selectCore(candidate.traits);
      if (core.length === 0) continue;
      weighted.push({ core, weight: candidateWeight(candidate) });
    }
    if (weighted.length === 0) return { kind: "empty", reason: "no comp summaries on page" };
    return { kind: "evidence", items: weighted };
  }
}
