/**
 * robots.txt minimal + pacing par source
 *
 * Une instance par run : le robots.txt est lu une seule fois (au 1er scrape),
 * illisible ou vide → tout est autorisé, mais on garde le pacing.
 */

import type { Logger } from "@/lib/logger";
import { delay, fetchWithBackoff, type FetchLike, type Sleep } from "@/lib/http-client";

const ROBOTS_TIMEOUT_MS = 6_000;

export interface RobotsPolicyOptions {
  /** ex. https://tactics.tools */
  origin: string;
  /** Délai minimum entre 2 requêtes vers une même source (ms) */
  minIntervalMs: number;
  userAgent: string;
  logger: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Préfixes Disallow du bloc "User-agent: *".
 * Une ligne User-agent ouvre (ou ferme) le bloc wildcard ; les autres agents sont ignorés.
 */
export function parseRobotsDisallows(txt: string): string[] {
  let uaStar = false;
  const disallows: string[] = [];
  for (const raw of txt.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const lower = line.toLowerCase();
    const value = line.slice(line.indexOf(":") + 1).trim();
    if (lower.startsWith("user-agent:")) {
      uaStar = value === "*";
    } else if (uaStar && lower.startsWith("disallow:") && value) {
      disallows.push(value);
    }
  }
  return disallows;
}

export function isPathAllowed(disallows: readonly string[], path: string): boolean {
  return !disallows.some((prefix) => path.startsWith(prefix));
}

export class RobotsPolicy {
  private disallows: Promise<string[]> | null = null;
  private readonly lastRequestBySource = new Map<string, number>();
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(private readonly options: RobotsPolicyOptions) {
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? Date.now;
  }

  async allowed(path: string): Promise<boolean> {
    this.disallows ??= this.load();
    return isPathAllowed(await this.disallows, path);
  }

  /** Attend si nécessaire avant une requête vers sourceKey (plancher, pas de token bucket) */
  async pace(sourceKey: string): Promise<void> {
    const last = this.lastRequestBySource.get(sourceKey);
    if (last !== undefined) {
      const elapsed = this.now() - last;
      if (elapsed < this.options.minIntervalMs) {
        await this.sleep(this.options.minIntervalMs - elapsed);
      }
    }
    this.lastRequestBySource.set(sourceKey, this.now());
  }

  private async load(): Promise<string[]> {
    const { origin, userAgent, logger, fetchImpl } = this.options;
    const outcome = await fetchWithBackoff(`${origin}/robots.txt`, {
      headers: { "User-Agent": userAgent },
      timeoutMs: ROBOTS_TIMEOUT_MS,
      maxAttempts: 1,
      fetchImpl,
    });
    if (outcome.kind !== "ok") {
      logger.debug("robots.txt unavailable, allowing with pacing", {
        reason: outcome.kind === "failure" ? outcome.failure.message : "not found",
      });
      return [];
    }
    return parseRobotsDisallows(outcome.body);
  }
}
