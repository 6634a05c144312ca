/**
 * Taxonomie d'erreurs du pipeline
 *
 * Seules AuthError, NotFoundError et ConfigError interrompent un run (bootstrap).
 * Le reste (FetchFailure, ParseError) est absorbé joueur par joueur.
 */

export type FailureKind = "rate_limited" | "timeout" | "network" | "http" | "auth" | "parse";

/** Échec terminal d'un appel réseau (après retries éventuels) */
export interface FetchFailure {
  kind: FailureKind;
  url: string;
  status?: number;
  message: string;
}

/** Clé API absente, expirée ou non autorisée pour TFT */
export class AuthError extends Error {
  readonly name = "AuthError";

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

/** Identité, plateforme ou session introuvable */
export class NotFoundError extends Error {
  readonly name = "NotFoundError";
}

export class ConfigError extends Error {
  readonly name = "ConfigError";
}

/** Payload inattendu (page scrapée, JSON Riot) */
export class ParseError extends Error {
  readonly name = "ParseError";
}

export class FetchFailureError extends Error {
  readonly name = "FetchFailureError";

  constructor(readonly failure: FetchFailure) {
    super(`${failure.kind}: ${failure.message}`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
