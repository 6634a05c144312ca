/**
 * Prédit les cores du lobby TFT en cours et les traits les plus disputés.
 *
 * Usage: npx tsx scripts/lobby-contest.ts --riot-id "Name#Tag" [--platform na1]
 *        [--no-scrape] [--samples 12] [--fallback-samples 4] [--json]
 * Env: RIOT_API_KEY (obligatoire), voir lib/config.ts
 */

import mri from "mri";
import { loadConfig, maskApiKey, type ConfigOverrides } from "@/lib/config";
import { AuthError, ConfigError, NotFoundError, describeError } from "@/lib/errors";
import { runLobbyPipeline } from "@/lib/lobby-pipeline";
import { formatPredictions, renderLobbyReport, toJsonReport } from "@/lib/lobby-report";
import { createLogger } from "@/lib/logger";
import { displayLabel } from "@/lib/name-resolution-service";

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  return Number.isFinite(n) ? n : undefined;
}

function parseArgs(argv: string[]): { overrides: ConfigOverrides; json: boolean } {
  const args = mri(argv, {
    boolean: ["scrape", "json"],
    string: ["riot-id", "platform", "api-key"],
    default: { scrape: true, json: false },
  });
  return {
    overrides: {
      riotId: optionalString(args["riot-id"]),
      platform: optionalString(args.platform),
      apiKey: optionalString(args["api-key"]),
      scrapeEnabled: args.scrape === false ? false : undefined,
      matchSamples: optionalNumber(args.samples),
      fallbackSamples: optionalNumber(args["fallback-samples"]),
    },
    json: args.json === true,
  };
}

async function main(): Promise<number> {
  const { overrides, json } = parseArgs(process.argv.slice(2));
  const config = loadConfig(process.env, overrides);
  const logger = createLogger("lobby", { level: config.logLevel, format: config.logFormat });
  logger.info("starting", { apiKey: maskApiKey(config.apiKey), riotId: `${config.riotId.gameName}#${config.riotId.tagLine}` });

  const result = await runLobbyPipeline(config, {
    logger,
    onPlayerStart: (player, index, total) => {
      if (!json) console.log(`[${index + 1}/${total}] ${displayLabel(player)} …`);
    },
    onPlayerDone: (entry) => {
      if (json) return;
      console.log(entry.predictions.length > 0 ? `   → ${formatPredictions(entry.predictions)}` : "   → (still no signal)");
    },
  });

  if (result.kind === "not_in_game") {
    console.log("Not in an active TFT game. Try again during champ select/loading/in-game.");
    return 0;
  }

  if (json) console.log(JSON.stringify(toJsonReport(result.report), null, 2));
  else for (const line of renderLobbyReport(result.report)) console.log(line);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError || err instanceof AuthError || err instanceof NotFoundError) {
      console.error(err.message);
    } else {
      console.error("Unexpected failure:", describeError(err));
    }
    process.exitCode = 1;
  });
