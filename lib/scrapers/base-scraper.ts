/**
 * Base scraper - fetch HTML poli : robots.txt, pacing, user-agent, timeout
 */

import type { FetchFailure } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { fetchWithBackoff, type FetchLike, type Sleep } from "@/lib/http-client";
import type { RobotsPolicy } from "./robots-policy";

const PAGE_TIMEOUT_MS = 12_000;

export interface ScrapeContext {
  policy: RobotsPolicy;
  userAgent: string;
  logger: Logger;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
}

export type HtmlResult =
  | { kind: "ok"; html: string }
  | { kind: "disallowed"; path: string }
  | { kind: "not_found" }
  | { kind: "failure"; failure: FetchFailure };

/**
 * Récupère le HTML d'une page, après vérification robots.txt et pacing
 */
export async function fetchHtml(url: string, ctx: ScrapeContext): Promise<HtmlResult> {
  const { pathname, hostname } = new URL(url);
  if (!(await ctx.policy.allowed(pathname))) {
    ctx.logger.info("robots.txt disallows path, skipping", { path: pathname });
    return { kind: "disallowed", path: pathname };
  }

  await ctx.policy.pace(hostname);

  const outcome = await fetchWithBackoff(url, {
    headers: {
      "User-Agent": ctx.userAgent,
      Accept: "text/html,application/xhtml+xml",
    },
    timeoutMs: PAGE_TIMEOUT_MS,
    fetchImpl: ctx.fetchImpl,
    sleep: ctx.sleep,
  });
  if (outcome.kind === "not_found") return { kind: "not_found" };
  if (outcome.kind === "failure") return outcome;
  return { kind: "ok", html: outcome.body };
}
