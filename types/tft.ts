/**
 * Types du domaine : joueurs du lobby, observations de traits, prédictions de "core"
 */

export interface RiotName {
  gameName: string;
  tagLine: string;
}

/** Joueur du lobby, identifié par son PUUID (le nom n'est qu'un affichage) */
export interface PlayerIdentity {
  puuid: string;
  /** Nom résolu via account-v1 (absent si la résolution a échoué) */
  name?: RiotName;
  /** riotId ou summonerName renvoyé par le spectator */
  spectatorName?: string;
}

/** Un trait actif dans une partie : palier + nombre d'unités */
export interface TraitObservation {
  name: string;
  tier: number;
  units: number;
}

/** Ce qu'un joueur a joué dans une partie passée */
export interface EvidenceRecord {
  traits: TraitObservation[];
  /** Classement final, 1 = premier */
  placement: number;
  /** 0 = partie la plus récente */
  recencyIndex: number;
}

/** 1 à 3 noms de traits, ordonnés, sans doublon */
export type Core = readonly string[];

export interface WeightedCore {
  core: Core;
  weight: number;
}

export interface Prediction {
  core: Core;
  probability: number;
}

export type PredictionSource = "tactics_tools" | "match_history" | "none";

export interface PlayerPrediction {
  player: PlayerIdentity;
  /** Au plus 5, par probabilité décroissante ; vide = pas assez de données */
  predictions: Prediction[];
  source: PredictionSource;
}

export type ExtractionResult<T> =
  | { kind: "evidence"; items: T[] }
  | { kind: "empty"; reason: string }
  | { kind: "failure"; error: Error };

/** Extracteur par scraping d'un profil (tactics.tools) */
export interface ProfileEvidenceSource {
  extract(player: PlayerIdentity): Promise<ExtractionResult<WeightedCore>>;
}

/** Extracteur sur l'historique de matchs structuré (API Riot) */
export interface MatchEvidenceSource {
  extract(puuid: string, maxSamples: number): Promise<ExtractionResult<EvidenceRecord>>;
}

/** trait → somme des probabilités des cores de tête qui le contiennent */
export type ContentionTally = Map<string, number>;

export interface ContentionEntry {
  trait: string;
  score: number;
}

export interface ContentionRanking {
  mostContested: ContentionEntry[];
  leastContested: ContentionEntry[];
}
