/**
 * Règle de sélection du "core" d'une compo, commune aux deux extracteurs :
 * les 2 traits les plus forts par (palier, unités), en remplaçant un 2e trait
 * encore au palier 1 par le 3e quand il existe.
 */

import type { Core, TraitObservation } from "@/types/tft";

/** Palier à partir duquel un trait est considéré comme engagé */
export const DEFINITIVE_TIER = 2;

export function selectCore(traits: readonly TraitObservation[]): Core {
  const seen = new Set<string>();
  const ranked = traits
    .filter((t) => t.tier > 0 && t.name)
    .sort((a, b) => b.tier - a.tier || b.units - a.units)
    .filter((t) => {
      if (seen.has(t.name)) return false;
      seen.add(t.name);
      return true;
    });

  if (ranked.length < 2) return ranked.map((t) => t.name);
  if (ranked.length >= 3 && ranked[1].tier < DEFINITIVE_TIER) {
    return [ranked[0].name, ranked[2].name];
  }
  return [ranked[0].name, ranked[1].name];
}

/** Clé de regroupement : même traits dans le même ordre = même core */
export function coreKey(core: Core): string {
  return core.join("|");
}
