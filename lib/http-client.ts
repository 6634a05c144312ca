/**
 * Fetch avec backoff exponentiel sur 429, timeout par appel (en-têtes et corps)
 *
 * 404 = résultat vide légitime, 429 = transitoire (retry), le reste = échec terminal.
 */

import type { FetchFailure } from "./errors";
import { describeError } from "./errors";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export const MAX_ATTEMPTS = 7;
export const BACKOFF_GROWTH = 1.6;
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_BASE_DELAY_MS = 1_000;

export type FetchOutcome =
  /** Corps déjà lu : le délai couvre toute la réponse */
  | { kind: "ok"; status: number; body: string }
  | { kind: "not_found"; url: string }
  | { kind: "failure"; failure: FetchFailure };

export interface BackoffOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number>;
  timeoutMs?: number;
  /** Délai avant le 1er retry, multiplié par BACKOFF_GROWTH ensuite */
  baseDelayMs?: number;
  maxAttempts?: number;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

export function delay(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function buildUrl(url: string, params?: Record<string, string | number>): string {
  if (!params) return url;
  const u = new URL(url);
  Object.entries(params).forEach(([k, v]) => u.searchParams.set(k, String(v)));
  return u.toString();
}

/** Retry-After en secondes (la variante date HTTP est ignorée) */
function retryAfterMs(res: Response): number {
  const raw = res.headers.get("retry-after");
  if (!raw) return 0;
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : 0;
}

class DeadlineExceeded extends Error {
  readonly name = "DeadlineExceeded";
}

/** Réponse lue en entier : corps en texte si 2xx, sinon corps annulé */
interface Attempt {
  status: number;
  retryAfterMs: number;
  body: string;
}

/**
 * Une tentative complète (en-têtes + corps) sous un même délai :
 * un corps qui ne finit jamais d'arriver expire comme une absence de réponse.
 */
async function attemptWithin(
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<Attempt>
): Promise<Attempt> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      // rejet avant l'abort : la course doit se conclure sur le délai, pas sur l'AbortError
      reject(new DeadlineExceeded(`no response after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchWithBackoff(url: string, options: BackoffOptions = {}): Promise<FetchOutcome> {
  const {
    headers,
    params,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    maxAttempts = MAX_ATTEMPTS,
    fetchImpl = fetch,
    sleep = delay,
  } = options;
  const target = buildUrl(url, params);

  let backoff = baseDelayMs;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let res: Attempt;
    try {
      res = await attemptWithin(timeoutMs, async (signal) => {
        const response = await fetchImpl(target, { headers, signal });
        if (!response.ok) {
          // libère la connexion (429 retentés, erreurs)
          await response.body?.cancel();
          return { status: response.status, retryAfterMs: retryAfterMs(response), body: "" };
        }
        return { status: response.status, retryAfterMs: 0, body: await response.text() };
      });
    } catch (err) {
      return {
        kind: "failure",
        failure:
          err instanceof DeadlineExceeded
            ? { kind: "timeout", url: target, message: err.message }
            : { kind: "network", url: target, message: describeError(err) },
      };
    }

    if (res.status === 429) {
      if (attempt < maxAttempts) {
        await sleep(Math.max(backoff, res.retryAfterMs));
        backoff *= BACKOFF_GROWTH;
      }
      continue;
    }
    if (res.status === 404) return { kind: "not_found", url: target };
    if (res.status === 401 || res.status === 403) {
      return { kind: "failure", failure: { kind: "auth", url: target, status: res.status, message: `HTTP ${res.status}` } };
    }
    if (res.status < 200 || res.status >= 300) {
      return { kind: "failure", failure: { kind: "http", url: target, status: res.status, message: `HTTP ${res.status}` } };
    }
    return { kind: "ok", status: res.status, body: res.body };
  }

  return {
    kind: "failure",
    failure: { kind: "rate_limited", url: target, status: 429, message: `still rate limited after ${maxAttempts} attempts` },
  };
}
